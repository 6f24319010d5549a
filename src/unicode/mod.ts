export { isControl, isSpace, isZeroWidthCategory } from "./classify.ts";
export { charWidth, textWidth } from "./width.ts";
