// CHANGE: zero-copy (start, end) views into the document's owned buffer
// FORMAT THEOREM: ∀b,s: spanBytes(b, s).length ≤ max(0, s.end - s.start)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: reads through a span never reach outside the buffer
// COMPLEXITY: O(1)/O(1) for views, O(n) for decoded text

export interface Span {
  readonly start: number
  readonly end: number
}

const utf8 = new TextDecoder("utf-8")

/**
 * View the bytes of a span without copying.
 *
 * @returns A subarray sharing memory with `buffer`, clamped to its bounds.
 *
 * @pure true
 * @invariant result.length ≤ span.end - span.start
 * @complexity O(1)
 */
export const spanBytes = (buffer: Uint8Array, span: Span): Uint8Array => {
  const end = Math.min(span.end, buffer.length)
  const start = Math.min(span.start, end)
  return buffer.subarray(start, end)
}

export const spanText = (buffer: Uint8Array, span: Span): string => utf8.decode(spanBytes(buffer, span))
