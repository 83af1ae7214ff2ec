import type { Segment } from "./segments";

/**
 * Policy violation categories a pattern can report.
 */
export type ViolationCategory =
  | "gave-finished-code"
  | "solved-without-reasoning"
  | "made-decision-for-user"
  | "skipped-security-question"
  | "wrote-tests-for-user"
  | "other";

/**
 * Declared categories in reporting order.
 */
export const VIOLATION_CATEGORIES: readonly ViolationCategory[] = [
  "gave-finished-code",
  "solved-without-reasoning",
  "made-decision-for-user",
  "skipped-security-question",
  "wrote-tests-for-user",
  "other",
];

/**
 * Severity attached to a pattern and every match it produces.
 */
export type Severity = "low" | "medium" | "high";

/**
 * Declared severities from lowest to highest.
 */
export const SEVERITY_LEVELS: readonly Severity[] = ["low", "medium", "high"];

/**
 * Tunable numeric thresholds a pattern may accept.
 */
export type ThresholdKey =
  | "codeBlockLineThreshold"
  | "proseSentenceThreshold"
  | "questionLookahead";

/**
 * Declared threshold keys.
 */
export const THRESHOLD_KEYS: readonly ThresholdKey[] = [
  "codeBlockLineThreshold",
  "proseSentenceThreshold",
  "questionLookahead",
];

/**
 * Resolved threshold values handed to a pattern scan.
 */
export type PatternThresholds = Readonly<Record<ThresholdKey, number>>;

/**
 * Identity and classification of a pattern.
 */
export interface PatternMetadata {
  /** Unique pattern identifier (e.g. `"socratic/finished-code-block"`). */
  readonly id: string;
  /** Human-readable pattern name. */
  readonly name: string;
  /** Category assigned to every match of this pattern. */
  readonly category: ViolationCategory;
  /** Severity assigned to every match of this pattern. */
  readonly severity: Severity;
  /** Short description of what the pattern detects. */
  readonly description: string;
}

/**
 * Raw detection emitted by a pattern scan before it is stamped with metadata.
 */
export interface PatternHit {
  /** Index of the offending segment in the segment list. */
  readonly segmentIndex: number;
  /** Explanation of why the segment violates the policy. */
  readonly explanation: string;
}

/**
 * A single policy violation detected in a response.
 */
export interface Match {
  /** Identifier of the pattern that produced the match. */
  readonly patternId: string;
  /** Violation category. */
  readonly category: ViolationCategory;
  /** Violation severity. */
  readonly severity: Severity;
  /** Index of the offending segment in the segment list. */
  readonly segmentIndex: number;
  /** Explanation of why the segment violates the policy. */
  readonly explanation: string;
}

/**
 * Declarative template a library pattern is instantiated from.
 *
 * @remarks
 * `scan` must be a pure function of its arguments. It may not read clocks,
 * randomness, environment or files, so repeated evaluation of the same
 * segments yields the same hits in the same order.
 */
export interface PatternDefinition {
  /** Default identity and classification. */
  readonly metadata: PatternMetadata;
  /** Threshold keys this pattern reads; overrides of other keys are rejected. */
  readonly thresholdKeys: readonly ThresholdKey[];
  /**
   * Scans the full segment list in source order.
   *
   * @param segments - Tokenized response.
   * @param thresholds - Resolved thresholds for this pattern.
   * @returns Hits in source order, empty when the pattern does not apply.
   */
  readonly scan: (
    segments: readonly Segment[],
    thresholds: PatternThresholds,
  ) => readonly PatternHit[];
}

/**
 * An instantiated pattern registered in a pattern library.
 */
export interface Pattern {
  /** Effective identity and classification after overrides. */
  readonly metadata: PatternMetadata;
  /** Effective thresholds after overrides. */
  readonly thresholds: PatternThresholds;
  /**
   * Detects violations across the full segment list.
   *
   * @param segments - Tokenized response.
   * @returns Matches in source order.
   */
  readonly detect: (segments: readonly Segment[]) => readonly Match[];
}

/**
 * Declarative per-pattern adjustment applied when a library is built.
 */
export interface PatternOverride {
  /** Identifier of the pattern to adjust. */
  readonly id: string;
  /** Set to `false` to leave the pattern out of the library. */
  readonly enabled?: boolean;
  /** Replacement category. */
  readonly category?: ViolationCategory;
  /** Replacement severity. */
  readonly severity?: Severity;
  /** Threshold values overriding the library-wide thresholds. */
  readonly thresholds?: Readonly<Partial<Record<ThresholdKey, number>>>;
}

/**
 * Returns true when a value is a declared violation category.
 *
 * @param value - Candidate value.
 * @returns Type guard for {@link ViolationCategory}.
 */
export function isViolationCategory(value: unknown): value is ViolationCategory {
  return VIOLATION_CATEGORIES.some((category) => category === value);
}

/**
 * Returns true when a value is a declared severity.
 *
 * @param value - Candidate value.
 * @returns Type guard for {@link Severity}.
 */
export function isSeverity(value: unknown): value is Severity {
  return SEVERITY_LEVELS.some((severity) => severity === value);
}

/**
 * Returns true when a value is a declared threshold key.
 *
 * @param value - Candidate value.
 * @returns Type guard for {@link ThresholdKey}.
 */
export function isThresholdKey(value: unknown): value is ThresholdKey {
  return THRESHOLD_KEYS.some((key) => key === value);
}
