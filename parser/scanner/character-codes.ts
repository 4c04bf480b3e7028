/**
 * Character code constants and classification functions
 * Only the characters the inline scanner dispatches on are named here.
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  asterisk = 0x2A,              // *
  backslash = 0x5C,             // \
  tilde = 0x7E,                 // ~

  // UTF-16 surrogate ranges
  highSurrogateStart = 0xD800,
  highSurrogateEnd = 0xDBFF,
  lowSurrogateStart = 0xDC00,
  lowSurrogateEnd = 0xDFFF,
}

export function isHighSurrogate(ch: number): boolean {
  return ch >= CharacterCodes.highSurrogateStart && ch <= CharacterCodes.highSurrogateEnd;
}

export function isLowSurrogate(ch: number): boolean {
  return ch >= CharacterCodes.lowSurrogateStart && ch <= CharacterCodes.lowSurrogateEnd;
}

/**
 * Width in UTF-16 code units of the scalar value starting at `pos`.
 * A high surrogate only pairs when a low surrogate follows within `end`.
 */
export function scalarWidthAt(source: string, pos: number, end: number): number {
  if (pos + 1 < end &&
      isHighSurrogate(source.charCodeAt(pos)) &&
      isLowSurrogate(source.charCodeAt(pos + 1)))
    return 2;
  return 1;
}
