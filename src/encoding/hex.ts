import { TextsliceError } from "../core/error.ts";
import type { Text } from "../core/text.ts";
import { TextView } from "../core/text.ts";
import type { TextSink } from "../stream/stream.ts";

/**
 * Hex digits as text, or as their ASCII code units.
 */
export type HexSource = Text | Iterable<number>;

const HEX_PAIRS: readonly string[] = Array.from({ length: 256 }, (_, byte) =>
  byte.toString(16).padStart(2, "0"),
);

function digitUnits(source: HexSource): number[] {
  if (typeof source === "string" || source instanceof TextView) {
    const text = source.toString();
    const units: number[] = [];
    for (let index = 0; index < text.length; index += 1) units.push(text.charCodeAt(index));
    return units;
  }
  return Array.from(source);
}

function digitValue(unit: number): number {
  if (unit >= 0x30 && unit <= 0x39) return unit - 0x30;
  if (unit >= 0x61 && unit <= 0x66) return unit - 0x61 + 10;
  if (unit >= 0x41 && unit <= 0x46) return unit - 0x41 + 10;
  return -1;
}

function checkDigits(units: readonly number[]): void {
  units.forEach((unit, index) => {
    if (digitValue(unit) === -1) {
      throw new TextsliceError("HEX_INVALID_DIGIT", "Invalid hexadecimal digit", {
        index,
        unit,
      });
    }
  });
}

function decodeInto(dest: Uint8Array, units: readonly number[]): Uint8Array {
  for (let index = 0; index < dest.length; index += 1) {
    const high = digitValue(units[2 * index] ?? 0);
    const low = digitValue(units[2 * index + 1] ?? 0);
    dest[index] = (high << 4) | low;
  }
  return dest;
}

/**
 * Decode pairs of hex digits (either case) into bytes.
 *
 * @example
 * hex2bytes("01abEF"); // Uint8Array [1, 171, 239]
 */
export function hex2bytes(source: HexSource): Uint8Array {
  const units = digitUnits(source);
  if (units.length % 2 !== 0) {
    throw new TextsliceError("HEX_ODD_LENGTH", "Hex input must have an even length", {
      length: units.length,
    });
  }
  checkDigits(units);
  return decodeInto(new Uint8Array(units.length / 2), units);
}

/**
 * Decode hex digits into `dest`, which must hold exactly half as many bytes as there are
 * digits. Nothing is written when the input is rejected.
 */
export function hex2bytesInto(dest: Uint8Array, source: HexSource): Uint8Array {
  const units = digitUnits(source);
  if (2 * dest.length !== units.length) {
    throw new TextsliceError(
      "HEX_LENGTH_MISMATCH",
      "Destination must hold half as many bytes as there are hex digits",
      { destLength: dest.length, sourceLength: units.length },
    );
  }
  checkDigits(units);
  return decodeInto(dest, units);
}

function checkedBytes(bytes: Iterable<unknown>): readonly number[] | Uint8Array {
  if (bytes instanceof Uint8Array) return bytes;
  const values = Array.from(bytes);
  const checked: number[] = [];
  values.forEach((value, index) => {
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new TextsliceError("BYTES_NOT_UINT8", "Expected bytes (integers 0..255)", {
        index,
        value,
      });
    }
    checked.push(value);
  });
  return checked;
}

/**
 * Lowercase hex string of `bytes`, two digits per byte.
 *
 * @example
 * bytes2hex([1, 171, 239]); // "01abef"
 */
export function bytes2hex(bytes: Iterable<unknown>): string {
  let out = "";
  for (const byte of checkedBytes(bytes)) out += HEX_PAIRS[byte] ?? "";
  return out;
}

/**
 * Write the lowercase hex form of `bytes` to `sink`, one pair per byte. Every element is
 * checked before the first write.
 */
export function writeBytes2hex(sink: TextSink, bytes: Iterable<unknown>): void {
  for (const byte of checkedBytes(bytes)) sink.write(HEX_PAIRS[byte] ?? "");
}
