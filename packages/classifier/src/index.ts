import { buildComplianceReport } from "@socratic-check/compliance-report";
import {
  createPatternLibrary,
  socraticPatternDefinitions,
} from "@socratic-check/pattern-library";
import {
  assertQuestionBankCoverage,
  createQuestionBank,
} from "@socratic-check/question-bank";
import { tokenize } from "@socratic-check/response-tokenizer";
import { evaluate } from "@socratic-check/rule-engine";
import type {
  ClassifierConfig,
  ComplianceReport,
  Pattern,
  PatternDefinition,
  PatternOverride,
  QuestionBank,
  ViolationCategory,
} from "@socratic-check/shared-types";

/**
 * Classifier options applied when the caller leaves them out.
 */
export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  codeBlockLineThreshold: 8,
  proseSentenceThreshold: 3,
  maxInputLength: 100_000,
};

/**
 * Error raised when raw input exceeds the configured maximum length.
 */
export class InputTooLargeError extends Error {
  /**
   * Length of the rejected input in Unicode code points.
   */
  length: number;
  /**
   * Configured maximum length in characters.
   */
  maxInputLength: number;

  /**
   * Creates an input size error.
   *
   * @param length - Length of the rejected input.
   * @param maxInputLength - Configured maximum.
   */
  constructor(length: number, maxInputLength: number) {
    super(`Input of ${length} characters exceeds the maximum of ${maxInputLength}`);
    this.name = "InputTooLargeError";
    this.length = length;
    this.maxInputLength = maxInputLength;
  }
}

/**
 * Error raised when classifier options are out of range.
 */
export class InvalidClassifierConfigError extends Error {
  /**
   * Offending option name.
   */
  field: keyof ClassifierConfig;

  /**
   * Creates a classifier config error.
   *
   * @param field - Offending option name.
   * @param details - Constraint the value violates.
   */
  constructor(field: keyof ClassifierConfig, details: string) {
    super(`Invalid classifier option ${field}: ${details}`);
    this.name = "InvalidClassifierConfigError";
    this.field = field;
  }
}

/**
 * Inputs for constructing a compliance engine.
 */
export interface ComplianceEngineOptions {
  /**
   * Classifier options layered over {@link DEFAULT_CLASSIFIER_CONFIG}.
   */
  readonly config?: Partial<ClassifierConfig>;
  /**
   * Pattern definitions in registration order.
   */
  readonly definitions?: readonly PatternDefinition[];
  /**
   * Per-pattern overrides applied when the library is built.
   */
  readonly patternOverrides?: readonly PatternOverride[];
  /**
   * Question bank consulted for suggested questions.
   */
  readonly questionBank?: QuestionBank;
}

/**
 * A fully configured, immutable classifier.
 *
 * @remarks
 * Engines hold no per-call state, so one engine may serve concurrent callers
 * and differently configured engines may coexist. To reconfigure, build a new
 * engine; an existing one never changes.
 */
export interface ComplianceEngine {
  /** Effective classifier options. */
  readonly config: ClassifierConfig;
  /** Pattern library in registration order. */
  readonly patterns: readonly Pattern[];
  /** Question bank covering every category the library can emit. */
  readonly questionBank: QuestionBank;
  /**
   * Classifies one raw response.
   *
   * @param rawText - Raw response text.
   * @returns Compliance report.
   */
  readonly classify: (rawText: string) => ComplianceReport;
}

/**
 * Builds a compliance engine and checks its configuration once.
 *
 * @param options - Engine options.
 * @returns Frozen engine.
 * @throws {@link InvalidClassifierConfigError} For out-of-range options.
 * @throws PatternLibraryConfigError For invalid pattern overrides.
 * @throws UnknownCategoryError When the question bank misses a library category.
 */
export function createComplianceEngine(
  options: ComplianceEngineOptions = {},
): ComplianceEngine {
  const config = resolveClassifierConfig(options.config ?? {});
  const patterns = createPatternLibrary({
    definitions: options.definitions ?? socraticPatternDefinitions,
    thresholds: {
      codeBlockLineThreshold: config.codeBlockLineThreshold,
      proseSentenceThreshold: config.proseSentenceThreshold,
    },
    overrides: options.patternOverrides ?? [],
  });
  const questionBank = options.questionBank ?? createQuestionBank();

  const libraryCategories = new Set<ViolationCategory>(
    patterns.map((pattern) => pattern.metadata.category),
  );
  assertQuestionBankCoverage(libraryCategories, questionBank);

  const classify = (rawText: string): ComplianceReport => {
    const length = countCharacters(rawText);
    if (length > config.maxInputLength) {
      throw new InputTooLargeError(length, config.maxInputLength);
    }

    const segments = tokenize(rawText);
    const matches = evaluate(segments, patterns);
    return buildComplianceReport(matches, questionBank);
  };

  return Object.freeze({ config, patterns, questionBank, classify });
}

/**
 * Classifies one raw response with the built-in patterns and questions.
 *
 * @param rawText - Raw response text.
 * @param config - Classifier options layered over the defaults.
 * @returns Compliance report.
 * @throws {@link InputTooLargeError} When the input exceeds `maxInputLength`.
 * @throws MalformedInputError When code fences are unbalanced.
 */
export function classify(
  rawText: string,
  config: Partial<ClassifierConfig> = {},
): ComplianceReport {
  return createComplianceEngine({ config }).classify(rawText);
}

/**
 * Layers options over the defaults and validates the result.
 *
 * @param config - Partial classifier options.
 * @returns Frozen, validated classifier options.
 * @throws {@link InvalidClassifierConfigError} For out-of-range options.
 */
export function resolveClassifierConfig(
  config: Partial<ClassifierConfig>,
): ClassifierConfig {
  const resolved: ClassifierConfig = {
    codeBlockLineThreshold:
      config.codeBlockLineThreshold ?? DEFAULT_CLASSIFIER_CONFIG.codeBlockLineThreshold,
    proseSentenceThreshold:
      config.proseSentenceThreshold ?? DEFAULT_CLASSIFIER_CONFIG.proseSentenceThreshold,
    maxInputLength: config.maxInputLength ?? DEFAULT_CLASSIFIER_CONFIG.maxInputLength,
  };

  assertInteger(resolved, "codeBlockLineThreshold", 0);
  assertInteger(resolved, "proseSentenceThreshold", 0);
  assertInteger(resolved, "maxInputLength", 1);

  return Object.freeze(resolved);
}

/**
 * Counts Unicode code points, so a surrogate pair counts once.
 *
 * @param text - Text to measure.
 * @returns Number of characters.
 */
export function countCharacters(text: string): number {
  let count = 0;
  for (const _character of text) {
    count += 1;
  }
  return count;
}

function assertInteger(
  config: ClassifierConfig,
  field: keyof ClassifierConfig,
  minimum: number,
): void {
  const value = config[field];
  if (!Number.isInteger(value) || value < minimum) {
    throw new InvalidClassifierConfigError(
      field,
      `expected an integer greater than or equal to ${minimum}, received ${value}`,
    );
  }
}

export { MalformedInputError } from "@socratic-check/response-tokenizer";
export { createQuestionBank, UnknownCategoryError } from "@socratic-check/question-bank";
export { PatternEvaluationError } from "@socratic-check/rule-engine";
export { PatternLibraryConfigError } from "@socratic-check/pattern-library";
export type {
  ClassifierConfig,
  ComplianceReport,
  Pattern,
  PatternDefinition,
  PatternOverride,
  QuestionBank,
};
