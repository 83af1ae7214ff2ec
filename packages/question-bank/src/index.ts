import type { QuestionBank, ViolationCategory } from "@socratic-check/shared-types";
import { VIOLATION_CATEGORIES } from "@socratic-check/shared-types";

/**
 * Corrective questions suggested for each violation category.
 */
export const DEFAULT_QUESTIONS: Readonly<Record<ViolationCategory, readonly string[]>> = {
  "gave-finished-code": [
    "What made you decide this approach is the simplest one?",
    "Which part of this would you write first, and why?",
    "What would you expect this code to do if the input were empty?",
  ],
  "solved-without-reasoning": [
    "What have you already tried, and what happened?",
    "How would you describe the problem in your own words?",
    "Which step of the solution feels least certain to you?",
  ],
  "made-decision-for-user": [
    "What trade-offs do you see between the options you are considering?",
    "What constraints matter most for this decision?",
    "What would change your mind about this choice?",
  ],
  "skipped-security-question": [
    "What's your threat model?",
    "What attacks concern you most?",
    "Who should be able to reach this data, and how will you enforce that?",
  ],
  "wrote-tests-for-user": [
    "Which behaviours matter most to verify here?",
    "What edge cases do you think could break this?",
    "How would you know if a test were passing for the wrong reason?",
  ],
  other: [
    "What would you like to try next?",
    "Which part of this would you like to reason through together?",
  ],
};

/**
 * Error raised when a violation category has no questions in the bank.
 */
export class UnknownCategoryError extends Error {
  /**
   * Category missing from the question bank.
   */
  category: string;

  /**
   * Creates an unknown category error.
   *
   * @param category - Category with no question bank entry.
   */
  constructor(category: string) {
    super(`Question bank has no entry for category ${category}`);
    this.name = "UnknownCategoryError";
    this.category = category;
  }
}

/**
 * Builds a frozen question bank from the defaults.
 *
 * @param overrides - Categories whose questions replace the defaults.
 * @returns Question bank covering every declared category.
 */
export function createQuestionBank(
  overrides: Readonly<Partial<Record<ViolationCategory, readonly string[]>>> = {},
): QuestionBank {
  const entries = new Map<ViolationCategory, readonly string[]>();

  for (const category of VIOLATION_CATEGORIES) {
    const questions = overrides[category] ?? DEFAULT_QUESTIONS[category];
    entries.set(category, Object.freeze([...questions]));
  }

  return entries;
}

/**
 * Looks up the questions for one category.
 *
 * @param questionBank - Question bank to consult.
 * @param category - Violation category.
 * @returns Questions for the category.
 * @throws {@link UnknownCategoryError} When the category has no or an empty entry.
 */
export function questionsFor(
  questionBank: QuestionBank,
  category: ViolationCategory,
): readonly string[] {
  const questions = questionBank.get(category);
  if (!questions || questions.length === 0) {
    throw new UnknownCategoryError(category);
  }
  return questions;
}

/**
 * Asserts that every category a pattern library can emit has questions.
 *
 * @remarks
 * Runs once when an engine is configured.
 *
 * @param categories - Categories the pattern library can emit.
 * @param questionBank - Question bank to check.
 * @throws {@link UnknownCategoryError} For the first uncovered category.
 */
export function assertQuestionBankCoverage(
  categories: Iterable<ViolationCategory>,
  questionBank: QuestionBank,
): void {
  for (const category of categories) {
    questionsFor(questionBank, category);
  }
}

export type { QuestionBank, ViolationCategory };
