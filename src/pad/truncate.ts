import { iterateCodePoints, nextIndex, prevIndex } from "../core/codepoint.ts";
import { assertNonNegative } from "../core/error.ts";
import type { Text, TextView } from "../core/text.ts";
import { textToString, toView } from "../core/text.ts";
import type { WidthFn } from "../core/types.ts";
import { textWidth } from "../unicode/width.ts";

/**
 * TruncateOptions defines an exported structural contract.
 */
export interface TruncateOptions {
  /** Marker spliced in at the cut. Default "…". */
  replacement?: Text;
  /** Center mode only: start by keeping a character from the left. Default true. */
  preferLeft?: boolean;
  /** Display-width oracle. Defaults to {@link textWidth}. */
  width?: WidthFn;
}

type TruncateMode = "left" | "right" | "center";

/**
 * Whether `text` fits in `maxWidth` display columns. Stops at the first column past it.
 */
export function fitsWidth(text: Text, maxWidth: number, width: WidthFn = textWidth): boolean {
  const { source, startCU, endCU } = toView(text);
  let total = 0;
  for (const { indexCU, sizeCU } of iterateCodePoints(source, startCU, endCU)) {
    total += width(source.slice(indexCU, indexCU + sizeCU));
    if (total > maxWidth) return false;
  }
  return true;
}

function fitReplacement(replacement: string, maxWidth: number, width: WidthFn): string {
  let total = 0;
  let endCU = 0;
  for (const char of replacement) {
    total += width(char);
    if (total > maxWidth) break;
    endCU += char.length;
  }
  return replacement.slice(0, endCU);
}

function truncate(
  text: Text,
  maxWidth: number,
  mode: TruncateMode,
  options: TruncateOptions,
): string {
  assertNonNegative("maxWidth", maxWidth);
  const width = options.width ?? textWidth;
  const view: TextView = toView(text);
  if (fitsWidth(view, maxWidth, width)) return view.toString();

  let replacement = textToString(options.replacement ?? "…");
  let total = width(replacement);
  if (total > maxWidth) {
    replacement = fitReplacement(replacement, maxWidth, width);
    total = width(replacement);
  }
  const preferLeft = options.preferLeft ?? true;
  const { source, startCU, endCU } = view;
  let left = startCU;
  let right = endCU;
  let keptLeft = 0;
  let keptRight = 0;
  // Set when one side was skipped to rebalance; the other side must then take a turn.
  let force = false;
  for (;;) {
    if (mode === "left" || (mode === "center" && (!preferLeft || left > startCU))) {
      if (mode === "left" || keptRight <= keptLeft || force) {
        force = false;
        const before = prevIndex(source, right, 1, startCU);
        const columns = width(source.slice(before, right));
        total += columns;
        if (total > maxWidth) break;
        keptRight += columns;
        right = before;
      } else {
        force = true;
      }
    }
    if (mode !== "left") {
      if (mode === "right" || keptLeft <= keptRight || force) {
        force = false;
        const after = nextIndex(source, left, 1, endCU);
        const columns = width(source.slice(left, after));
        total += columns;
        if (total > maxWidth) break;
        keptLeft += columns;
        left = after;
      } else {
        force = true;
      }
    }
  }
  return source.slice(startCU, left) + replacement + source.slice(right, endCU);
}

/**
 * Keep the start of `text` and end it with the replacement so it fits `maxWidth` columns.
 *
 * @example
 * rtruncate("🍕🍕 I love 🍕", 10); // "🍕🍕 I lo…"
 */
export function rtruncate(text: Text, maxWidth: number, options: TruncateOptions = {}): string {
  return truncate(text, maxWidth, "right", options);
}

/**
 * Keep the end of `text`, prefixed by the replacement.
 *
 * @example
 * ltruncate("🍕🍕 I love 🍕", 10); // "…I love 🍕"
 */
export function ltruncate(text: Text, maxWidth: number, options: TruncateOptions = {}): string {
  return truncate(text, maxWidth, "left", options);
}

/**
 * Keep both ends of `text` with balanced widths and the replacement in between.
 *
 * @example
 * ctruncate("🍕🍕 I love 🍕", 10); // "🍕🍕 …e 🍕"
 */
export function ctruncate(text: Text, maxWidth: number, options: TruncateOptions = {}): string {
  return truncate(text, maxWidth, "center", options);
}
