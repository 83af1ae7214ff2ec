import { describe, expect, test } from "vitest";

import type { QuestionBank, ViolationCategory } from "@socratic-check/shared-types";
import { VIOLATION_CATEGORIES } from "@socratic-check/shared-types";

import {
  assertQuestionBankCoverage,
  createQuestionBank,
  DEFAULT_QUESTIONS,
  questionsFor,
  UnknownCategoryError,
} from "./index";

describe("createQuestionBank", () => {
  test("covers every declared category with the default questions", () => {
    const questionBank = createQuestionBank();

    expect([...questionBank.keys()]).toEqual(VIOLATION_CATEGORIES);
    expect(questionBank.get("skipped-security-question")).toEqual([
      "What's your threat model?",
      "What attacks concern you most?",
      "Who should be able to reach this data, and how will you enforce that?",
    ]);
  });

  test("replaces only the overridden categories", () => {
    const questionBank = createQuestionBank({ other: ["What do you want to explore?"] });

    expect(questionBank.get("other")).toEqual(["What do you want to explore?"]);
    expect(questionBank.get("gave-finished-code")).toEqual(
      DEFAULT_QUESTIONS["gave-finished-code"],
    );
  });

  test("freezes each question list", () => {
    const questionBank = createQuestionBank();

    expect(Object.isFrozen(questionBank.get("other"))).toBe(true);
  });
});

describe("questionsFor", () => {
  test("throws UnknownCategoryError for a missing category", () => {
    const partialBank: QuestionBank = new Map<ViolationCategory, readonly string[]>([
      ["other", ["What next?"]],
    ]);

    expect(questionsFor(partialBank, "other")).toEqual(["What next?"]);
    expect(() => questionsFor(partialBank, "gave-finished-code")).toThrow(UnknownCategoryError);
  });

  test("treats an empty question list as missing", () => {
    const questionBank = createQuestionBank({ "wrote-tests-for-user": [] });

    expect(() => questionsFor(questionBank, "wrote-tests-for-user")).toThrow(
      "Question bank has no entry for category wrote-tests-for-user",
    );
  });
});

describe("assertQuestionBankCoverage", () => {
  test("passes when every category is covered", () => {
    expect(() =>
      assertQuestionBankCoverage(VIOLATION_CATEGORIES, createQuestionBank()),
    ).not.toThrow();
  });

  test("reports the first uncovered category", () => {
    const partialBank: QuestionBank = new Map<ViolationCategory, readonly string[]>([
      ["gave-finished-code", ["Why this approach?"]],
    ]);

    try {
      assertQuestionBankCoverage(["gave-finished-code", "other", "wrote-tests-for-user"], partialBank);
      throw new Error("expected assertQuestionBankCoverage to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownCategoryError);
      if (error instanceof UnknownCategoryError) {
        expect(error.category).toBe("other");
      }
    }
  });
});
