import { questionsFor } from "@socratic-check/question-bank";
import type {
  ComplianceReport,
  Match,
  QuestionBank,
  Severity,
  ViolationCategory,
} from "@socratic-check/shared-types";
import { SEVERITY_LEVELS } from "@socratic-check/shared-types";

/**
 * Aggregates evaluator matches into a compliance report.
 *
 * @param matches - Matches in pattern registration order.
 * @param questionBank - Question bank consulted for suggested questions.
 * @returns Frozen report with source-ordered matches and zero-filled counts.
 * @throws UnknownCategoryError When a matched category has no questions.
 */
export function buildComplianceReport(
  matches: readonly Match[],
  questionBank: QuestionBank,
): ComplianceReport {
  const orderedMatches = sortBySourceOrder(matches);
  const report: ComplianceReport = {
    verdict: orderedMatches.length === 0 ? "compliant" : "non_compliant",
    matches: orderedMatches,
    categoryCounts: createCategoryCountMap(orderedMatches),
    suggestedQuestions: collectSuggestedQuestions(orderedMatches, questionBank),
    maxSeverity: findMaxSeverity(orderedMatches),
  };

  return Object.freeze(report);
}

function sortBySourceOrder(matches: readonly Match[]): readonly Match[] {
  return Object.freeze(
    matches
      .map((match, registrationIndex) => ({ match, registrationIndex }))
      .sort(
        (left, right) =>
          left.match.segmentIndex - right.match.segmentIndex ||
          left.registrationIndex - right.registrationIndex,
      )
      .map(({ match }) => match),
  );
}

function createCategoryCountMap(
  matches: readonly Match[],
): Readonly<Record<ViolationCategory, number>> {
  const counts: Record<ViolationCategory, number> = {
    "gave-finished-code": 0,
    "solved-without-reasoning": 0,
    "made-decision-for-user": 0,
    "skipped-security-question": 0,
    "wrote-tests-for-user": 0,
    other: 0,
  };

  for (const match of matches) {
    counts[match.category] += 1;
  }

  return Object.freeze(counts);
}

function collectSuggestedQuestions(
  matches: readonly Match[],
  questionBank: QuestionBank,
): readonly string[] {
  const categories = new Set<ViolationCategory>();
  for (const match of matches) {
    categories.add(match.category);
  }

  const questions = new Set<string>();
  for (const category of categories) {
    for (const question of questionsFor(questionBank, category)) {
      questions.add(question);
    }
  }

  return Object.freeze([...questions]);
}

function findMaxSeverity(matches: readonly Match[]): Severity | null {
  let maxRank = -1;
  for (const match of matches) {
    maxRank = Math.max(maxRank, SEVERITY_LEVELS.indexOf(match.severity));
  }
  return SEVERITY_LEVELS[maxRank] ?? null;
}

export type { ComplianceReport, Match, QuestionBank };
