import type { Segment, SegmentKind } from "@socratic-check/shared-types";

const FENCE_PATTERN = /^\s*```/;
const HEADING_PATTERN = /^\s{0,3}#{1,6}(?:\s|$)/;
const LIST_ITEM_PATTERN = /^\s*(?:[-*+]|\d{1,9}[.)])\s+/;
const LIST_CONTINUATION_PATTERN = /^\s+\S/;
const EMPHASIS_EDGE_PATTERN = /^[*_\s]+|[*_\s]+$/g;
const TRAILING_WHITESPACE_PATTERN = /\s+$/;
const LINE_BREAK_PATTERN = /\r\n?/g;
const TRAILING_LINE_BREAKS_PATTERN = /\n+$/;

type RunKind = Extract<SegmentKind, "prose" | "bullet_list">;

type PendingRun = {
  kind: RunKind;
  startLine: number;
  endLine: number;
};

type SegmentSpan = {
  kind: SegmentKind;
  startLine: number;
  endLine: number;
};

type RunState = {
  pending: PendingRun | null;
};

/**
 * Error raised when fenced code delimiters are unbalanced.
 */
export class MalformedInputError extends Error {
  /**
   * One-indexed line of the fence marker that has no partner.
   */
  line: number;
  /**
   * Total number of fence markers found in the response.
   */
  fenceCount: number;

  /**
   * Creates a malformed input error with fence context.
   *
   * @param line - One-indexed line of the unmatched fence.
   * @param fenceCount - Number of fence markers found.
   */
  constructor(line: number, fenceCount: number) {
    super(
      `Unbalanced code fence: the fence on line ${line} has no closing fence (${fenceCount} fence markers found)`,
    );
    this.name = "MalformedInputError";
    this.line = line;
    this.fenceCount = fenceCount;
  }
}

/**
 * Applies the normalization every tokenization starts from.
 *
 * @remarks
 * Line endings become `\n`, trailing whitespace is removed from every line and
 * leading and trailing blank lines are dropped. Segment offsets and line spans
 * refer to this normalized text.
 *
 * @param rawText - Raw response text.
 * @returns Normalized response text.
 */
export function normalizeResponseText(rawText: string): string {
  const lines = rawText
    .replace(LINE_BREAK_PATTERN, "\n")
    .split("\n")
    .map((line) => line.replace(TRAILING_WHITESPACE_PATTERN, ""));

  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  const firstContentLine = lines.findIndex((line) => line !== "");
  return lines.slice(Math.max(firstContentLine, 0)).join("\n");
}

/**
 * Splits a raw response into classified segments.
 *
 * @remarks
 * Each segment's `text` runs up to the next segment, so it carries its line
 * terminator and any blank lines that follow. Joining the texts in order gives
 * back the normalized response.
 *
 * @param rawText - Raw response text.
 * @returns Frozen segment list in source order.
 * @throws {@link MalformedInputError} When fence markers are unbalanced.
 */
export function tokenize(rawText: string): readonly Segment[] {
  const normalizedText = normalizeResponseText(rawText);
  if (normalizedText === "") {
    return Object.freeze([]);
  }

  const lines = normalizedText.split("\n");
  const fenceLineIndexes = findFenceLineIndexes(lines);
  if (fenceLineIndexes.length % 2 !== 0) {
    const unmatchedIndex = fenceLineIndexes[fenceLineIndexes.length - 1] ?? 0;
    throw new MalformedInputError(unmatchedIndex + 1, fenceLineIndexes.length);
  }

  const lineOffsets = computeLineOffsets(lines);
  const closingFenceByOpening = pairFences(fenceLineIndexes);
  const spans: SegmentSpan[] = [];
  const runState: RunState = { pending: null };

  const emit = (kind: SegmentKind, startLine: number, endLine: number): void => {
    spans.push({ kind, startLine, endLine });
  };

  const flushRun = (): void => {
    const pending = runState.pending;
    if (pending) {
      emit(pending.kind, pending.startLine, pending.endLine);
      runState.pending = null;
    }
  };

  const extendRun = (kind: RunKind, lineIndex: number): void => {
    const pending = runState.pending;
    if (pending && pending.kind === kind) {
      pending.endLine = lineIndex;
      return;
    }

    flushRun();
    runState.pending = { kind, startLine: lineIndex, endLine: lineIndex };
  };

  let lineIndex = 0;
  while (lineIndex < lines.length) {
    const line = lines[lineIndex] ?? "";
    const closingFenceIndex = closingFenceByOpening.get(lineIndex);

    if (closingFenceIndex !== undefined) {
      flushRun();
      emit("code_block", lineIndex, closingFenceIndex);
      lineIndex = closingFenceIndex + 1;
      continue;
    }

    if (line === "") {
      flushRun();
    } else if (isQuestionLine(line)) {
      flushRun();
      emit("question", lineIndex, lineIndex);
    } else if (HEADING_PATTERN.test(line)) {
      flushRun();
      emit("heading", lineIndex, lineIndex);
    } else if (LIST_ITEM_PATTERN.test(line)) {
      extendRun("bullet_list", lineIndex);
    } else if (
      runState.pending?.kind === "bullet_list" &&
      LIST_CONTINUATION_PATTERN.test(line)
    ) {
      extendRun("bullet_list", lineIndex);
    } else {
      extendRun("prose", lineIndex);
    }

    lineIndex += 1;
  }

  flushRun();

  const segments = spans.map((span, index): Segment => {
    const position = lineOffsets[span.startLine] ?? 0;
    const nextSpan = spans[index + 1];
    const end =
      nextSpan === undefined ? normalizedText.length : lineOffsets[nextSpan.startLine] ?? 0;

    return Object.freeze({
      kind: span.kind,
      text: normalizedText.slice(position, end),
      position,
      lineSpan: Object.freeze([span.startLine + 1, span.endLine + 1] as const),
    });
  });

  return Object.freeze(segments);
}

/**
 * Returns a segment's text without its trailing line terminator and blank lines.
 *
 * @param segment - Segment to inspect.
 * @returns The lines covered by `lineSpan`, joined with `\n`.
 */
export function segmentContent(segment: Segment): string {
  return segment.text.replace(TRAILING_LINE_BREAKS_PATTERN, "");
}

/**
 * Returns the lines between the opening and closing fence of a code block.
 *
 * @param segment - Segment to inspect.
 * @returns Body lines, or an empty list for segments that are not code blocks.
 */
export function codeBlockBody(segment: Segment): readonly string[] {
  if (segment.kind !== "code_block") {
    return [];
  }

  return segmentContent(segment).split("\n").slice(1, -1);
}

/**
 * Returns true when a line reads as a question once markdown list and
 * emphasis markers are stripped.
 *
 * @param line - One normalized response line.
 * @returns Whether the line ends with a question mark.
 */
export function isQuestionLine(line: string): boolean {
  const stripped = line
    .replace(LIST_ITEM_PATTERN, "")
    .replace(EMPHASIS_EDGE_PATTERN, "");
  return stripped.endsWith("?");
}

function findFenceLineIndexes(lines: readonly string[]): number[] {
  const fenceLineIndexes: number[] = [];
  lines.forEach((line, index) => {
    if (FENCE_PATTERN.test(line)) {
      fenceLineIndexes.push(index);
    }
  });
  return fenceLineIndexes;
}

function pairFences(fenceLineIndexes: readonly number[]): ReadonlyMap<number, number> {
  const closingFenceByOpening = new Map<number, number>();
  for (let index = 0; index + 1 < fenceLineIndexes.length; index += 2) {
    const opening = fenceLineIndexes[index];
    const closing = fenceLineIndexes[index + 1];
    if (opening !== undefined && closing !== undefined) {
      closingFenceByOpening.set(opening, closing);
    }
  }
  return closingFenceByOpening;
}

function computeLineOffsets(lines: readonly string[]): number[] {
  const offsets: number[] = [];
  let offset = 0;
  for (const line of lines) {
    offsets.push(offset);
    offset += line.length + 1;
  }
  return offsets;
}

export type { Segment, SegmentKind };
