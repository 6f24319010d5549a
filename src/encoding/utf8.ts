import type { Text } from "../core/text.ts";
import { toView } from "../core/text.ts";

const UTF8_ENCODER = new TextEncoder();
const UTF8_DECODER = new TextDecoder("utf-8");

/**
 * Encode text as UTF-8. Lone surrogates become U+FFFD.
 * Units: bytes (UTF-8).
 */
export function utf8Bytes(text: Text): Uint8Array {
  return UTF8_ENCODER.encode(text.toString());
}

/**
 * Decode UTF-8 bytes, replacing malformed sequences with U+FFFD.
 * Units: bytes (UTF-8).
 */
export function utf8Decode(bytes: Uint8Array): string {
  return UTF8_DECODER.decode(bytes);
}

/**
 * Number of bytes in a UTF-8 sequence introduced by `leadByte`; 1 for stray bytes.
 * Units: bytes (UTF-8).
 */
export function utf8SequenceLength(leadByte: number): number {
  if (leadByte < 0x80) return 1;
  if (leadByte >= 0xc2 && leadByte <= 0xdf) return 2;
  if (leadByte >= 0xe0 && leadByte <= 0xef) return 3;
  if (leadByte >= 0xf0 && leadByte <= 0xf4) return 4;
  return 1;
}

/**
 * UTF-8 length of a text without encoding it.
 * Units: bytes (UTF-8).
 */
export function utf8Length(text: Text): number {
  return toView(text).utf8ByteLength;
}
