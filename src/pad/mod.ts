export type { PadOptions } from "./pad.ts";
export { lpad, rpad } from "./pad.ts";
export type { TruncateOptions } from "./truncate.ts";
export { ctruncate, fitsWidth, ltruncate, rtruncate } from "./truncate.ts";
