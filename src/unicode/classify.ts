const WHITE_SPACE = /^\p{White_Space}$/u;
const ZERO_WIDTH = /^[\p{Mn}\p{Me}\p{Cf}]$/u;

/**
 * Whether a single code point has the Unicode White_Space property
 * (TAB..CR, SPACE, U+0085, U+00A0 and the Zs/Zl/Zp separators).
 * Units: Unicode scalar values.
 */
export function isSpace(char: string): boolean {
  return WHITE_SPACE.test(char);
}

/**
 * Whether a code point is a C0 or C1 control.
 * Units: Unicode scalar values.
 */
export function isControl(codePoint: number): boolean {
  return codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0);
}

/**
 * Whether a code point is a nonspacing or enclosing mark, or a format character.
 * Units: Unicode scalar values.
 */
export function isZeroWidthCategory(codePoint: number): boolean {
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) return false;
  return ZERO_WIDTH.test(String.fromCodePoint(codePoint));
}
