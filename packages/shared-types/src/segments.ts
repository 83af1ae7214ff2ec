/**
 * Structural kinds a response line range can be classified as.
 */
export type SegmentKind =
  | "prose"
  | "code_block"
  | "question"
  | "bullet_list"
  | "heading";

/**
 * A classified contiguous span of a response's normalized text.
 *
 * @remarks
 * Produced once per response by the tokenizer and frozen afterwards. Every
 * pattern reads the same segment list, so nothing downstream may mutate it.
 */
export interface Segment {
  /** Structural kind of the span. */
  readonly kind: SegmentKind;
  /** Exact text of the span, fence lines included for code blocks. */
  readonly text: string;
  /** Zero-indexed character offset of the span in the normalized text. */
  readonly position: number;
  /** One-indexed inclusive `[start, end]` line range of the span. */
  readonly lineSpan: readonly [number, number];
}
