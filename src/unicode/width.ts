import { eastAsianWidth } from "get-east-asian-width";
import { iterateCodePoints } from "../core/codepoint.ts";
import type { Text } from "../core/text.ts";
import { toView } from "../core/text.ts";
import { isControl, isZeroWidthCategory } from "./classify.ts";

/**
 * Terminal column count of one code point: 0, 1 or 2.
 * Units: Unicode scalar values.
 */
export function charWidth(codePoint: number): number {
  if (isControl(codePoint)) return 0;
  // Hangul medial vowels and final consonants combine with the preceding syllable.
  if (codePoint >= 0x1160 && codePoint <= 0x11ff) return 0;
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) return 1;
  if (isZeroWidthCategory(codePoint)) return 0;
  return eastAsianWidth(codePoint);
}

/**
 * Display width of a text: the sum of its code point widths.
 * Units: terminal columns.
 */
export function textWidth(text: Text): number {
  const view = toView(text);
  let total = 0;
  for (const { codePoint } of iterateCodePoints(view.source, view.startCU, view.endCU)) {
    total += charWidth(codePoint);
  }
  return total;
}
