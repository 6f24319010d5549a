import type { Text, TextView } from "./text.ts";
import { textView } from "./text.ts";
import type { Span } from "./types.ts";

/**
 * Slice text by a UTF-16 code unit span, without copying.
 * Units: UTF-16 code units.
 */
export function sliceBySpan(text: Text, span: Span): TextView {
  return textView(text, span.startCU, span.endCU);
}

/**
 * Materialise every view of an iterable as a string.
 */
export function toStrings(iterable: Iterable<Text>): string[] {
  return Array.from(iterable, (item) => item.toString());
}
