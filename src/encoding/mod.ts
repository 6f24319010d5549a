export { ascii } from "./ascii.ts";
export type { HexSource } from "./hex.ts";
export { bytes2hex, hex2bytes, hex2bytesInto, writeBytes2hex } from "./hex.ts";
export { utf8Bytes, utf8Decode, utf8Length, utf8SequenceLength } from "./utf8.ts";
