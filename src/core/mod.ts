export type { CodePointInfo } from "./codepoint.ts";
export {
  codePointLength,
  isCodePointBoundary,
  isHighSurrogate,
  isLowSurrogate,
  iterateCodePoints,
  iterateCodePointsReverse,
  nextIndex,
  prevIndex,
} from "./codepoint.ts";
export type { TextsliceErrorCode, TextsliceErrorKind } from "./error.ts";
export { TextsliceError } from "./error.ts";
export type { Text } from "./text.ts";
export { TextView, textToString, textView, toView } from "./text.ts";
export { sliceBySpan, toStrings } from "./span.ts";
export type { CharPredicate, CharSet, Span, WidthFn } from "./types.ts";
