import { codeBlockBody, segmentContent } from "@socratic-check/response-tokenizer";
import type {
  Match,
  Pattern,
  PatternDefinition,
  PatternHit,
  PatternMetadata,
  PatternOverride,
  PatternThresholds,
  Segment,
  ThresholdKey,
} from "@socratic-check/shared-types";
import { THRESHOLD_KEYS } from "@socratic-check/shared-types";

import {
  COMPLETE_SOLUTION_PATTERNS,
  DECISIVE_PHRASE_PATTERNS,
  SECURITY_QUESTION_PATTERN,
  SECURITY_SENSITIVE_CODE_PATTERNS,
  TEST_CONSTRUCT_PATTERNS,
} from "./phrases";

const SENTENCE_PATTERN = /[^.!?]+(?:[.!?]+|$)/g;
const WORD_CHARACTER_PATTERN = /\w/;
const INTERROGATIVE_SENTENCE_PATTERN = /[^.!?\n]*\?/g;
const PHRASE_LEAD_PATTERN = /^[.!;:\s]*(?:(?:[-*+]|\d{1,9}[.)])\s+)?/;

/**
 * Library-wide thresholds applied when neither the caller nor an override sets one.
 */
export const DEFAULT_PATTERN_THRESHOLDS: PatternThresholds = {
  codeBlockLineThreshold: 8,
  proseSentenceThreshold: 3,
  questionLookahead: 2,
};

/**
 * Error raised when a pattern library cannot be built from its definitions and overrides.
 */
export class PatternLibraryConfigError extends Error {
  /**
   * Creates a library configuration error.
   *
   * @param details - Description of the configuration defect.
   */
  constructor(details: string) {
    super(`Invalid pattern library configuration: ${details}`);
    this.name = "PatternLibraryConfigError";
  }
}

/**
 * Flags large code blocks handed over without a question first.
 */
export const finishedCodeBlockPattern: PatternDefinition = {
  metadata: {
    id: "socratic/finished-code-block",
    name: "Finished code block",
    category: "gave-finished-code",
    severity: "high",
    description:
      "Detects fenced code longer than the line threshold that is not preceded by a question.",
  },
  thresholdKeys: ["codeBlockLineThreshold"],
  scan: (segments, thresholds) => {
    const hits: PatternHit[] = [];

    segments.forEach((segment, segmentIndex) => {
      if (segment.kind !== "code_block" || isPrecededByQuestion(segments, segmentIndex)) {
        return;
      }

      const lineCount = codeBlockBody(segment).length;
      if (lineCount > thresholds.codeBlockLineThreshold) {
        hits.push({
          segmentIndex,
          explanation: `Code block spans ${lineCount} lines (threshold ${thresholds.codeBlockLineThreshold}) and is not preceded by a question.`,
        });
      }
    });

    return hits;
  },
};

/**
 * Flags test suites written for the developer.
 */
export const handedOverTestsPattern: PatternDefinition = {
  metadata: {
    id: "socratic/handed-over-tests",
    name: "Handed-over tests",
    category: "wrote-tests-for-user",
    severity: "high",
    description:
      "Detects code blocks containing test-framework constructs that are not preceded by a question.",
  },
  thresholdKeys: [],
  scan: (segments) => {
    const hits: PatternHit[] = [];

    segments.forEach((segment, segmentIndex) => {
      if (segment.kind !== "code_block" || isPrecededByQuestion(segments, segmentIndex)) {
        return;
      }

      const body = codeBlockBody(segment).join("\n");
      const construct = findFirstMatch(TEST_CONSTRUCT_PATTERNS, body);
      if (construct !== null) {
        hits.push({
          segmentIndex,
          explanation: `Code block contains test code (\`${construct.trim()}\`) written for the developer.`,
        });
      }
    });

    return hits;
  },
};

/**
 * Flags responses that solve the problem without asking anything.
 */
export const answerWithoutQuestionsPattern: PatternDefinition = {
  metadata: {
    id: "socratic/answer-without-questions",
    name: "Answer without questions",
    category: "solved-without-reasoning",
    severity: "medium",
    description:
      "Detects responses with no question at all that still carry a substantial explanation or code block.",
  },
  thresholdKeys: ["proseSentenceThreshold"],
  scan: (segments, thresholds) => {
    const asksAnything = segments.some(
      (segment) =>
        segment.kind === "question" ||
        (segment.kind !== "code_block" && segmentContent(segment).includes("?")),
    );
    if (asksAnything) {
      return [];
    }

    const segmentIndex = segments.findIndex(
      (segment) => measureSegment(segment) > thresholds.proseSentenceThreshold,
    );
    const segment = segments[segmentIndex];
    if (!segment) {
      return [];
    }

    const unit = segment.kind === "code_block" ? "code lines" : "sentences";
    return [
      {
        segmentIndex,
        explanation: `Response asks no questions but contains ${measureSegment(segment)} ${unit} (threshold ${thresholds.proseSentenceThreshold}).`,
      },
    ];
  },
};

/**
 * Flags decisions stated for the developer without inviting their reasoning.
 */
export const decisiveDirectivePattern: PatternDefinition = {
  metadata: {
    id: "socratic/decisive-directive",
    name: "Decisive directive",
    category: "made-decision-for-user",
    severity: "medium",
    description:
      "Detects prose that prescribes a choice and is not followed by a question within the lookahead window.",
  },
  thresholdKeys: ["questionLookahead"],
  scan: (segments, thresholds) => {
    const hits: PatternHit[] = [];

    segments.forEach((segment, segmentIndex) => {
      if (segment.kind !== "prose" && segment.kind !== "bullet_list") {
        return;
      }

      const phrase = findFirstMatch(DECISIVE_PHRASE_PATTERNS, segmentContent(segment));
      if (phrase === null) {
        return;
      }

      const followingSegments = segments.slice(
        segmentIndex + 1,
        segmentIndex + 1 + thresholds.questionLookahead,
      );
      if (followingSegments.some((following) => following.kind === "question")) {
        return;
      }

      hits.push({
        segmentIndex,
        explanation: `Directive "${phrase.replace(PHRASE_LEAD_PATTERN, "").trim()}" is not followed by a question within ${thresholds.questionLookahead} segments.`,
      });
    });

    return hits;
  },
};

/**
 * Flags security-sensitive code written without asking about threats.
 */
export const unprobedSecurityTopicPattern: PatternDefinition = {
  metadata: {
    id: "socratic/unprobed-security-topic",
    name: "Unprobed security topic",
    category: "skipped-security-question",
    severity: "high",
    description:
      "Detects code handling security-sensitive material when no question in the response raises security.",
  },
  thresholdKeys: [],
  scan: (segments) => {
    const raisesSecurity = segments.some((segment) =>
      collectInterrogativeSentences(segment).some((sentence) =>
        SECURITY_QUESTION_PATTERN.test(sentence),
      ),
    );
    if (raisesSecurity) {
      return [];
    }

    for (const [segmentIndex, segment] of segments.entries()) {
      if (segment.kind !== "code_block") {
        continue;
      }

      const sensitiveTerm = findFirstMatch(
        SECURITY_SENSITIVE_CODE_PATTERNS,
        codeBlockBody(segment).join("\n"),
      );
      if (sensitiveTerm !== null) {
        return [
          {
            segmentIndex,
            explanation: `Code handles security-sensitive material ("${sensitiveTerm}") but no question raises security or the threat model.`,
          },
        ];
      }
    }

    return [];
  },
};

/**
 * Flags announcements of a finished solution.
 */
export const announcedCompleteSolutionPattern: PatternDefinition = {
  metadata: {
    id: "socratic/announced-complete-solution",
    name: "Announced complete solution",
    category: "other",
    severity: "low",
    description:
      "Detects text presenting the response as a finished solution when the response hands over code.",
  },
  thresholdKeys: [],
  scan: (segments) => {
    if (!segments.some((segment) => segment.kind === "code_block")) {
      return [];
    }

    const hits: PatternHit[] = [];

    segments.forEach((segment, segmentIndex) => {
      if (segment.kind === "code_block" || segment.kind === "question") {
        return;
      }

      const phrase = findFirstMatch(COMPLETE_SOLUTION_PATTERNS, segmentContent(segment));
      if (phrase !== null) {
        hits.push({
          segmentIndex,
          explanation: `"${phrase}" presents the response as a finished solution.`,
        });
      }
    });

    return hits;
  },
};

/**
 * Built-in pattern definitions in registration order.
 */
export const socraticPatternDefinitions: readonly PatternDefinition[] = [
  finishedCodeBlockPattern,
  handedOverTestsPattern,
  answerWithoutQuestionsPattern,
  decisiveDirectivePattern,
  unprobedSecurityTopicPattern,
  announcedCompleteSolutionPattern,
];

/**
 * Inputs for building a pattern library.
 */
export interface CreatePatternLibraryOptions {
  /**
   * Definitions to instantiate, in registration order.
   */
  readonly definitions?: readonly PatternDefinition[];
  /**
   * Library-wide thresholds layered over {@link DEFAULT_PATTERN_THRESHOLDS}.
   */
  readonly thresholds?: Readonly<Partial<PatternThresholds>>;
  /**
   * Per-pattern overrides keyed by pattern id.
   */
  readonly overrides?: readonly PatternOverride[];
}

/**
 * Builds an immutable, ordered pattern library.
 *
 * @remarks
 * Overrides are validated against the definitions before anything is
 * instantiated, so a bad override never yields a partially applied library.
 *
 * @param options - Definitions, thresholds and overrides.
 * @returns Frozen patterns in registration order, disabled patterns omitted.
 * @throws {@link PatternLibraryConfigError} For duplicate ids, unknown override
 * ids, unsupported thresholds or invalid threshold values.
 */
export function createPatternLibrary(
  options: CreatePatternLibraryOptions = {},
): readonly Pattern[] {
  const definitions = options.definitions ?? socraticPatternDefinitions;
  const baseThresholds = mergeThresholds(
    DEFAULT_PATTERN_THRESHOLDS,
    options.thresholds ?? {},
    "thresholds",
  );
  const definitionsById = indexDefinitions(definitions);
  const overridesById = indexOverrides(options.overrides ?? [], definitionsById);

  const patterns: Pattern[] = [];
  for (const definition of definitions) {
    const override = overridesById.get(definition.metadata.id);
    if (override?.enabled === false) {
      continue;
    }

    patterns.push(instantiatePattern(definition, baseThresholds, override));
  }

  return Object.freeze(patterns);
}

function instantiatePattern(
  definition: PatternDefinition,
  baseThresholds: PatternThresholds,
  override: PatternOverride | undefined,
): Pattern {
  const metadata: PatternMetadata = Object.freeze({
    ...definition.metadata,
    category: override?.category ?? definition.metadata.category,
    severity: override?.severity ?? definition.metadata.severity,
  });
  const thresholds = mergeThresholds(
    baseThresholds,
    override?.thresholds ?? {},
    `patterns.${metadata.id}.thresholds`,
  );

  const detect = (segments: readonly Segment[]): readonly Match[] =>
    definition.scan(segments, thresholds).map((hit) =>
      Object.freeze({
        patternId: metadata.id,
        category: metadata.category,
        severity: metadata.severity,
        segmentIndex: hit.segmentIndex,
        explanation: hit.explanation,
      }),
    );

  return Object.freeze({ metadata, thresholds, detect });
}

function indexDefinitions(
  definitions: readonly PatternDefinition[],
): ReadonlyMap<string, PatternDefinition> {
  const definitionsById = new Map<string, PatternDefinition>();
  for (const definition of definitions) {
    if (definitionsById.has(definition.metadata.id)) {
      throw new PatternLibraryConfigError(
        `duplicate pattern id ${definition.metadata.id}`,
      );
    }
    definitionsById.set(definition.metadata.id, definition);
  }
  return definitionsById;
}

function indexOverrides(
  overrides: readonly PatternOverride[],
  definitionsById: ReadonlyMap<string, PatternDefinition>,
): ReadonlyMap<string, PatternOverride> {
  const overridesById = new Map<string, PatternOverride>();

  for (const override of overrides) {
    const definition = definitionsById.get(override.id);
    if (!definition) {
      throw new PatternLibraryConfigError(`unknown pattern id ${override.id}`);
    }

    if (overridesById.has(override.id)) {
      throw new PatternLibraryConfigError(`duplicate override for pattern ${override.id}`);
    }

    for (const key of THRESHOLD_KEYS) {
      if (override.thresholds?.[key] !== undefined && !definition.thresholdKeys.includes(key)) {
        throw new PatternLibraryConfigError(
          `pattern ${override.id} does not accept threshold ${key}`,
        );
      }
    }

    overridesById.set(override.id, override);
  }

  return overridesById;
}

function mergeThresholds(
  base: PatternThresholds,
  overrides: Readonly<Partial<Record<ThresholdKey, number>>>,
  fieldPath: string,
): PatternThresholds {
  const merged: Record<ThresholdKey, number> = { ...base };

  for (const key of THRESHOLD_KEYS) {
    const value = overrides[key];
    if (value === undefined) {
      continue;
    }

    if (!Number.isInteger(value) || value < 0) {
      throw new PatternLibraryConfigError(
        `${fieldPath}.${key} must be a non-negative integer`,
      );
    }
    merged[key] = value;
  }

  return Object.freeze(merged);
}

function isPrecededByQuestion(segments: readonly Segment[], segmentIndex: number): boolean {
  return segments[segmentIndex - 1]?.kind === "question";
}

function findFirstMatch(patterns: readonly RegExp[], text: string): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      return match[0];
    }
  }
  return null;
}

function measureSegment(segment: Segment): number {
  if (segment.kind === "code_block") {
    return codeBlockBody(segment).filter((line) => line.trim() !== "").length;
  }

  if (segment.kind === "prose") {
    return countSentences(segmentContent(segment));
  }

  return 0;
}

/**
 * Counts sentences in prose by terminal punctuation.
 *
 * @remarks
 * A trailing fragment without punctuation counts as one sentence.
 * Abbreviations such as "e.g." are over-counted.
 *
 * @param text - Prose text.
 * @returns Number of sentences containing at least one word character.
 */
export function countSentences(text: string): number {
  const sentences = text.match(SENTENCE_PATTERN) ?? [];
  return sentences.filter((sentence) => WORD_CHARACTER_PATTERN.test(sentence)).length;
}

function collectInterrogativeSentences(segment: Segment): readonly string[] {
  if (segment.kind === "code_block") {
    return [];
  }

  if (segment.kind === "question") {
    return [segmentContent(segment)];
  }

  return segmentContent(segment).match(INTERROGATIVE_SENTENCE_PATTERN) ?? [];
}

export type { Match, Pattern, PatternDefinition, PatternHit, PatternOverride };
