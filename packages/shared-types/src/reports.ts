import type { Match, Severity, ViolationCategory } from "./patterns";

/**
 * Overall outcome of a classification.
 */
export type ComplianceVerdict = "compliant" | "non_compliant";

/**
 * Lookup from violation category to suggested corrective questions.
 */
export type QuestionBank = ReadonlyMap<ViolationCategory, readonly string[]>;

/**
 * Structured verdict for one classified response.
 */
export interface ComplianceReport {
  /** `compliant` iff `matches` is empty. */
  readonly verdict: ComplianceVerdict;
  /** Matches in source order; ties keep pattern registration order. */
  readonly matches: readonly Match[];
  /** Match counts keyed by every declared category, zero-filled. */
  readonly categoryCounts: Readonly<Record<ViolationCategory, number>>;
  /** Deduplicated corrective questions in first-occurrence category order. */
  readonly suggestedQuestions: readonly string[];
  /** Highest severity among matches, or `null` when compliant. */
  readonly maxSeverity: Severity | null;
}

/**
 * Options recognized by the classification entry point.
 */
export interface ClassifierConfig {
  /** Code blocks with more body lines than this count as finished code. */
  readonly codeBlockLineThreshold: number;
  /** Prose with more sentences than this counts as a worked solution. */
  readonly proseSentenceThreshold: number;
  /** Maximum accepted raw input length in characters (Unicode code points). */
  readonly maxInputLength: number;
}
