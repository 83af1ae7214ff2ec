import { describe, expect, test } from "vitest";

import { decisiveDirectivePattern } from "@socratic-check/pattern-library";
import type { QuestionBank, ViolationCategory } from "@socratic-check/shared-types";
import { VIOLATION_CATEGORIES } from "@socratic-check/shared-types";

import {
  classify,
  countCharacters,
  createComplianceEngine,
  DEFAULT_CLASSIFIER_CONFIG,
  InputTooLargeError,
  InvalidClassifierConfigError,
  MalformedInputError,
  PatternLibraryConfigError,
  resolveClassifierConfig,
  UnknownCategoryError,
} from "./index";

function fenced(bodyLines: readonly string[]): string {
  return ["```", ...bodyLines, "```"].join("\n");
}

function numberedCodeLines(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `code line ${index + 1}`);
}

const COMPLETE_IMPLEMENTATION = `Here's the complete implementation:\n${fenced(numberedCodeLines(12))}`;

describe("classify", () => {
  test("flags a complete implementation handed over without a question", () => {
    const report = classify(COMPLETE_IMPLEMENTATION);

    expect(report.verdict).toBe("non_compliant");
    expect(report.matches.map((match) => match.category)).toEqual([
      "other",
      "gave-finished-code",
      "solved-without-reasoning",
    ]);
    expect(report.matches.map((match) => match.segmentIndex)).toEqual([0, 1, 1]);
    expect(report.maxSeverity).toBe("high");
  });

  test("accepts a response made only of questions", () => {
    const report = classify("What's your threat model? What attacks concern you most?");

    expect(report.verdict).toBe("compliant");
    expect(report.matches).toEqual([]);
    expect(report.suggestedQuestions).toEqual([]);
  });

  test("rejects an unbalanced fence", () => {
    expect(() => classify("Start here:\n```js\nconsole.log(1);")).toThrow(MalformedInputError);
  });

  test("rejects oversized input before tokenizing it", () => {
    const oversizedAndMalformed = "```" + "x".repeat(20);

    try {
      classify(oversizedAndMalformed, { maxInputLength: 10 });
      throw new Error("expected classify to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(InputTooLargeError);
      if (error instanceof InputTooLargeError) {
        expect(error.length).toBe(23);
        expect(error.maxInputLength).toBe(10);
        expect(error.message).toBe("Input of 23 characters exceeds the maximum of 10");
      }
    }
  });

  test("measures input length in code points", () => {
    const faces = "\u{1F600}\u{1F600}\u{1F600}";

    expect(faces).toHaveLength(6);
    expect(countCharacters(faces)).toBe(3);
    expect(classify(faces, { maxInputLength: 3 }).verdict).toBe("compliant");
    expect(() => classify(faces, { maxInputLength: 2 })).toThrow(
      "Input of 3 characters exceeds the maximum of 2",
    );
  });

  test("flags a design decision made for the developer", () => {
    const report = classify("Use the Repository pattern with dependency injection.");

    expect(report.matches).toEqual([
      {
        patternId: "socratic/decisive-directive",
        category: "made-decision-for-user",
        severity: "medium",
        segmentIndex: 0,
        explanation:
          'Directive "Use the Repository pattern with dependency injection" is not followed by a question within 2 segments.',
      },
    ]);
    expect(report.suggestedQuestions).toEqual([
      "What trade-offs do you see between the options you are considering?",
      "What constraints matter most for this decision?",
      "What would change your mind about this choice?",
    ]);
  });

  test("flags security-sensitive code and handed-over tests", () => {
    const response = [
      "Add this:",
      fenced(["const token = jwt.sign(payload, secret);"]),
      "And cover it with:",
      fenced(['test("signs tokens", () => {', "  expect(sign()).toBeTruthy();", "});"]),
    ].join("\n");

    const report = classify(response);

    expect(report.matches.map((match) => match.patternId)).toEqual([
      "socratic/unprobed-security-topic",
      "socratic/handed-over-tests",
    ]);
    expect(report.categoryCounts["skipped-security-question"]).toBe(1);
    expect(report.categoryCounts["wrote-tests-for-user"]).toBe(1);
  });
});

describe("classify properties", () => {
  test("returns identical reports for identical calls", () => {
    const first = classify(COMPLETE_IMPLEMENTATION, { codeBlockLineThreshold: 4 });
    const second = classify(COMPLETE_IMPLEMENTATION, { codeBlockLineThreshold: 4 });

    expect(JSON.stringify(first)).toBe(JSON.stringify(second));
  });

  test("accepts code-free responses that ask something and prescribe nothing", () => {
    const responses = [
      "I see two directions here. Which one fits your deadline?",
      "Interesting. Before anything else, what does the current test suite cover?",
      "You mentioned caching. Did the slow path show up in profiling? It might, or it might not.",
      "## Next step\n\n- the parser\n- the cache\n\nWhere would you start?",
      "I have implemented the parser.\nDoes it match what you expected?",
      "I've fixed the import. Does the build pass on your machine now?",
    ];

    for (const response of responses) {
      expect(classify(response).verdict).toBe("compliant");
    }
  });

  test("flags every code block above the configured threshold that lacks a preceding question", () => {
    for (const lineCount of [4, 9, 30]) {
      const report = classify(`Sketch:\n${fenced(numberedCodeLines(lineCount))}`, {
        codeBlockLineThreshold: 3,
      });

      expect(report.matches.map((match) => match.category)).toContain("gave-finished-code");
    }

    const atThreshold = classify(`Sketch:\n${fenced(numberedCodeLines(3))}`, {
      codeBlockLineThreshold: 3,
    });
    expect(atThreshold.categoryCounts["gave-finished-code"]).toBe(0);
  });

  test("always reports every declared category", () => {
    for (const response of ["Why?", COMPLETE_IMPLEMENTATION, ""]) {
      expect(Object.keys(classify(response).categoryCounts)).toEqual(VIOLATION_CATEGORIES);
    }
  });

  test("applies the sentence threshold", () => {
    expect(classify("First. Second.", { proseSentenceThreshold: 1 }).matches).toEqual([
      {
        patternId: "socratic/answer-without-questions",
        category: "solved-without-reasoning",
        severity: "medium",
        segmentIndex: 0,
        explanation: "Response asks no questions but contains 2 sentences (threshold 1).",
      },
    ]);
    expect(classify("First. Second.").verdict).toBe("compliant");
  });
});

describe("createComplianceEngine", () => {
  test("builds a frozen engine with default options", () => {
    const engine = createComplianceEngine();

    expect(engine.config).toEqual(DEFAULT_CLASSIFIER_CONFIG);
    expect(engine.patterns).toHaveLength(6);
    expect(Object.isFrozen(engine)).toBe(true);
    expect(Object.isFrozen(engine.config)).toBe(true);
  });

  test("lets differently configured engines coexist", () => {
    const strict = createComplianceEngine({ config: { codeBlockLineThreshold: 2 } });
    const lenient = createComplianceEngine({ config: { codeBlockLineThreshold: 20 } });
    const response = `What shape should the loop take?\n\nOne option:\n${fenced(numberedCodeLines(3))}`;

    expect(strict.classify(response).categoryCounts["gave-finished-code"]).toBe(1);
    expect(lenient.classify(response).verdict).toBe("compliant");
  });

  test("applies pattern overrides", () => {
    const engine = createComplianceEngine({
      patternOverrides: [
        { id: "socratic/decisive-directive", enabled: false },
        { id: "socratic/announced-complete-solution", severity: "high" },
      ],
    });

    const report = engine.classify(
      `Use the Repository pattern.\n\nHere's the full solution:\n${fenced(["save(order);"])}`,
    );

    expect(engine.patterns.map((pattern) => pattern.metadata.id)).not.toContain(
      "socratic/decisive-directive",
    );
    expect(report.matches.map((match) => [match.patternId, match.severity])).toEqual([
      ["socratic/announced-complete-solution", "high"],
    ]);
  });

  test("checks question bank coverage once at construction", () => {
    const partialBank: QuestionBank = new Map<ViolationCategory, readonly string[]>([
      ["made-decision-for-user", ["What else did you consider?"]],
    ]);

    expect(() => createComplianceEngine({ questionBank: partialBank })).toThrow(
      UnknownCategoryError,
    );

    const engine = createComplianceEngine({
      definitions: [decisiveDirectivePattern],
      questionBank: partialBank,
    });
    expect(engine.classify("You should add an index.").suggestedQuestions).toEqual([
      "What else did you consider?",
    ]);
  });

  test("surfaces invalid pattern overrides", () => {
    expect(() =>
      createComplianceEngine({ patternOverrides: [{ id: "socratic/unknown" }] }),
    ).toThrow(PatternLibraryConfigError);
  });
});

describe("resolveClassifierConfig", () => {
  test("fills omitted options from the defaults", () => {
    expect(resolveClassifierConfig({ maxInputLength: 50 })).toEqual({
      codeBlockLineThreshold: 8,
      proseSentenceThreshold: 3,
      maxInputLength: 50,
    });
  });

  test("rejects out-of-range options", () => {
    expect(() => resolveClassifierConfig({ maxInputLength: 0 })).toThrow(
      "Invalid classifier option maxInputLength: expected an integer greater than or equal to 1, received 0",
    );

    try {
      resolveClassifierConfig({ codeBlockLineThreshold: 2.5 });
      throw new Error("expected resolveClassifierConfig to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidClassifierConfigError);
      if (error instanceof InvalidClassifierConfigError) {
        expect(error.field).toBe("codeBlockLineThreshold");
      }
    }
  });
});
