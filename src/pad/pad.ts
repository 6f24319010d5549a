import { assertInteger, TextsliceError } from "../core/error.ts";
import type { Text } from "../core/text.ts";
import { textToString } from "../core/text.ts";
import type { WidthFn } from "../core/types.ts";
import { textWidth } from "../unicode/width.ts";

/**
 * PadOptions defines an exported structural contract.
 */
export interface PadOptions {
  /** Display-width oracle. Defaults to {@link textWidth}. */
  width?: WidthFn;
}

/**
 * Leading code points of `pad` until their width reaches `columns`. A wide last
 * character may overshoot.
 */
function leadingColumns(pad: string, columns: number, width: WidthFn): string {
  let taken = 0;
  let endCU = 0;
  for (const char of pad) {
    if (taken >= columns) break;
    taken += width(char);
    endCU += char.length;
  }
  return pad.slice(0, endCU);
}

function padding(text: string, targetWidth: number, padText: Text, width: WidthFn): string {
  assertInteger("targetWidth", targetWidth);
  const missing = targetWidth - width(text);
  if (missing <= 0) return "";
  const pad = textToString(padText);
  const unit = width(pad);
  if (unit === 0) {
    throw new TextsliceError("PAD_ZERO_WIDTH", "Pad text has zero display width", { pad });
  }
  const whole = Math.floor(missing / unit);
  return pad.repeat(whole) + leadingColumns(pad, missing % unit, width);
}

/**
 * Stringify `value` and pad it on the left to `targetWidth` display columns.
 *
 * @example
 * lpad("March", 10); // "     March"
 */
export function lpad(
  value: unknown,
  targetWidth: number,
  padText: Text = " ",
  options: PadOptions = {},
): string {
  const text = String(value);
  return padding(text, targetWidth, padText, options.width ?? textWidth) + text;
}

/**
 * Stringify `value` and pad it on the right to `targetWidth` display columns.
 *
 * @example
 * rpad("March", 10); // "March     "
 */
export function rpad(
  value: unknown,
  targetWidth: number,
  padText: Text = " ",
  options: PadOptions = {},
): string {
  const text = String(value);
  return text + padding(text, targetWidth, padText, options.width ?? textWidth);
}
