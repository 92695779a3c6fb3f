// CHANGE: byte classification and whitespace skipping over the owned input buffer
// FORMAT THEOREM: ∀b,i: skipWhiteSpace(b,i) = j → j ≥ i ∧ ¬isWhiteSpace(byteAt(b,j))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: bytes ≥ 0x80 are never whitespace; positions past the buffer read as the terminator
// COMPLEXITY: O(n)/O(1)

export const TERMINATOR = 0

export const Byte = {
  quote: 0x22,
  backslash: 0x5c,
  comma: 0x2c,
  colon: 0x3a,
  minus: 0x2d,
  plus: 0x2b,
  dot: 0x2e,
  openBrace: 0x7b,
  closeBrace: 0x7d,
  openBracket: 0x5b,
  closeBracket: 0x5d
} as const

/** Kind of node a significant byte opens, as decided by the dispatcher. */
export type TokenClass = "literal" | "string" | "object" | "array" | "number" | "unknown"

export const byteAt = (buffer: Uint8Array, index: number): number => buffer[index] ?? TERMINATOR

export const isHighBit = (byte: number): boolean => (byte & 0x80) !== 0

// space, \t \n \v \f \r
export const isWhiteSpace = (byte: number): boolean =>
  !isHighBit(byte) && (byte === 0x20 || (byte >= 0x09 && byte <= 0x0d))

export const isDigit = (byte: number): boolean => byte >= 0x30 && byte <= 0x39

export const isAtEnd = (buffer: Uint8Array, index: number): boolean => byteAt(buffer, index) === TERMINATOR

export const skipWhiteSpace = (buffer: Uint8Array, index: number): number => {
  let cursor = index
  while (isWhiteSpace(byteAt(buffer, cursor))) {
    cursor++
  }
  return cursor
}

/**
 * Classify the byte that starts a value.
 *
 * @param byte - First significant byte of the token.
 * @returns The token class; "unknown" when no value starts with this byte.
 *
 * @pure true
 * @invariant classify(TERMINATOR) = "unknown"
 * @complexity O(1)
 */
export const classify = (byte: number): TokenClass => {
  if (byte === 0x6e || byte === 0x74 || byte === 0x66) {
    return "literal"
  }
  if (byte === Byte.quote) {
    return "string"
  }
  if (byte === Byte.openBrace) {
    return "object"
  }
  if (byte === Byte.openBracket) {
    return "array"
  }
  if (byte === Byte.minus || isDigit(byte)) {
    return "number"
  }
  return "unknown"
}

/**
 * Length of the longest decimal floating point prefix at `index`, 0 when there is none.
 * Grammar: `[-+]? (digits [. digits?] | . digits) ([eE] [-+]? digits)?`; the exponent is only
 * consumed when at least one digit follows it.
 */
export const scanNumberLength = (buffer: Uint8Array, index: number): number => {
  let cursor = index
  const sign = byteAt(buffer, cursor)
  if (sign === Byte.minus || sign === Byte.plus) {
    cursor++
  }
  let mantissaDigits = 0
  while (isDigit(byteAt(buffer, cursor))) {
    cursor++
    mantissaDigits++
  }
  if (byteAt(buffer, cursor) === Byte.dot) {
    cursor++
    while (isDigit(byteAt(buffer, cursor))) {
      cursor++
      mantissaDigits++
    }
  }
  if (mantissaDigits === 0) {
    return 0
  }
  const marker = byteAt(buffer, cursor)
  if (marker === 0x65 || marker === 0x45) {
    let exponent = cursor + 1
    const exponentSign = byteAt(buffer, exponent)
    if (exponentSign === Byte.minus || exponentSign === Byte.plus) {
      exponent++
    }
    if (isDigit(byteAt(buffer, exponent))) {
      while (isDigit(byteAt(buffer, exponent))) {
        exponent++
      }
      cursor = exponent
    }
  }
  return cursor - index
}

const ascii = new TextDecoder("utf-8")

/** Text of `buffer[start, end)` for runs the scanner accepted as ASCII, such as numbers. */
export const asciiText = (buffer: Uint8Array, start: number, end: number): string =>
  ascii.decode(buffer.subarray(start, end))

export const matchesAscii = (buffer: Uint8Array, index: number, word: string): boolean => {
  for (let offset = 0; offset < word.length; offset++) {
    if (byteAt(buffer, index + offset) !== word.charCodeAt(offset)) {
      return false
    }
  }
  return true
}
