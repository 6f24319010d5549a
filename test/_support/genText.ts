import type { Rng } from "./prng.ts";

const ASCII = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const PUNCT = "-_.:;!?/|@#%&()[]{}<>";
const SPACES = [" ", "\t", "\n", "\r", " ", "　"];

// Width 2: CJK ideographs, Hangul syllables, fullwidth forms, emoji.
const WIDE = [0x4e00, 0x6587, 0x5b57, 0xac00, 0xd55c, 0xff21, 0x1f355, 0x1f600];
// Width 0: combining marks and invisible format characters.
const ZERO_WIDTH = [0x0300, 0x0301, 0x0308, 0x20dd, 0x200b, 0x200d, 0x2060];
// Width 1 outside ASCII, including astral letters.
const NARROW = [0x00e9, 0x00df, 0x03b1, 0x0436, 0x05d0, 0x1d400];

function pick(rng: Rng, pool: string): string {
  return pool[rng.int(0, pool.length - 1)] ?? "a";
}

function fromCodePoint(rng: Rng, pool: readonly number[]): string {
  return String.fromCodePoint(rng.choice(pool));
}

/**
 * Well-formed text mixing ASCII, white space, wide, zero-width and astral characters.
 */
export function genMixedText(rng: Rng, size: number): string {
  const out: string[] = [];
  const length = rng.int(0, size);
  for (let index = 0; index < length; index += 1) {
    const roll = rng.int(0, 9);
    if (roll <= 3) out.push(pick(rng, ASCII));
    else if (roll === 4) out.push(pick(rng, PUNCT));
    else if (roll === 5) out.push(rng.choice(SPACES));
    else if (roll === 6) out.push(fromCodePoint(rng, WIDE));
    else if (roll === 7 && out.length > 0) out.push(fromCodePoint(rng, ZERO_WIDTH));
    else out.push(fromCodePoint(rng, NARROW));
  }
  return out.join("");
}

/**
 * Fields of mixed text joined by `delimiter`; fields never contain the delimiter.
 */
export function genDelimited(rng: Rng, size: number, delimiter: string): string {
  const fields: string[] = [];
  const count = rng.int(0, Math.max(1, Math.floor(size / 4)));
  for (let index = 0; index < count; index += 1) {
    fields.push(genMixedText(rng, 6).split(delimiter).join(""));
  }
  return fields.join(delimiter);
}

/**
 * Even-length hex string in mixed case.
 */
export function genHex(rng: Rng, size: number): string {
  const digits = "0123456789abcdefABCDEF";
  const out: string[] = [];
  const pairs = rng.int(0, size);
  for (let index = 0; index < 2 * pairs; index += 1) out.push(pick(rng, digits));
  return out.join("");
}

/**
 * Byte values 0..255.
 */
export function genBytes(rng: Rng, size: number): number[] {
  return Array.from({ length: rng.int(0, size) }, () => rng.int(0, 255));
}
