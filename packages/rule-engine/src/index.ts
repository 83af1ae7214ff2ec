import type { Match, Pattern, Segment } from "@socratic-check/shared-types";

/**
 * Error raised when a pattern throws during evaluation.
 *
 * @remarks
 * Patterns are expected to be total over any segment list. A throw is a
 * defect in the pattern, so evaluation stops instead of returning a partial
 * match list that could hide a violation.
 */
export class PatternEvaluationError extends Error {
  /**
   * Identifier of the pattern that failed.
   */
  patternId: string;

  /**
   * Creates an evaluation error for one pattern.
   *
   * @param patternId - Identifier of the failing pattern.
   * @param cause - Thrown error value.
   */
  constructor(patternId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Pattern ${patternId} failed during evaluation: ${detail}`, { cause });
    this.name = "PatternEvaluationError";
    this.patternId = patternId;
  }
}

/**
 * Runs every pattern against one segment list.
 *
 * @remarks
 * Patterns run in registration order and each contributes its matches in
 * source order, so identical inputs always yield an identically ordered list.
 * The segment list is passed through untouched.
 *
 * @param segments - Tokenized response.
 * @param patterns - Pattern library in registration order.
 * @returns Frozen concatenation of every pattern's matches.
 * @throws {@link PatternEvaluationError} When a pattern throws.
 */
export function evaluate(
  segments: readonly Segment[],
  patterns: readonly Pattern[],
): readonly Match[] {
  const matches: Match[] = [];

  for (const pattern of patterns) {
    let patternMatches: readonly Match[];
    try {
      patternMatches = pattern.detect(segments);
    } catch (error) {
      throw new PatternEvaluationError(pattern.metadata.id, error);
    }
    matches.push(...patternMatches);
  }

  return Object.freeze(matches);
}

export type { Match, Pattern, Segment };
