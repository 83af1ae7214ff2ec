import { tokenize } from "@socratic-check/response-tokenizer";
import type { Segment } from "@socratic-check/shared-types";

/**
 * Builds fenced code block lines for tests.
 *
 * @param bodyLines - Lines placed between the fences.
 * @param info - Optional info string for the opening fence.
 * @returns Fence and body lines ready to join into a response.
 */
export function makeCodeBlock(bodyLines: readonly string[], info = ""): string[] {
  return ["```" + info, ...bodyLines, "```"];
}

/**
 * Builds numbered placeholder code lines for tests.
 *
 * @param count - Number of lines.
 * @returns Lines `code line 1` through `code line <count>`.
 */
export function makeCodeLines(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `code line ${index + 1}`);
}

/**
 * Tokenizes a response assembled from lines.
 *
 * @param lines - Response lines, nested arrays flattened in order.
 * @returns Segments of the joined response.
 */
export function segmentsOf(...lines: ReadonlyArray<string | readonly string[]>): readonly Segment[] {
  return tokenize(lines.flat().join("\n"));
}
