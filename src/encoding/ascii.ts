import { TextsliceError } from "../core/error.ts";
import type { Text } from "../core/text.ts";
import { textToString } from "../core/text.ts";

/**
 * Return `text` as a string after checking every code unit is ASCII.
 * Throws `ASCII_INVALID` with the offset of the first unit above 0x7f.
 * Units: UTF-16 code units.
 */
export function ascii(text: Text): string {
  const value = textToString(text);
  for (let indexCU = 0; indexCU < value.length; indexCU += 1) {
    if (value.charCodeAt(indexCU) > 0x7f) {
      throw new TextsliceError("ASCII_INVALID", "Text is not ASCII", { indexCU });
    }
  }
  return value;
}
