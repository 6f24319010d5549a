/**
 * Deterministic random source for property tests. Same seed, same sequence.
 */
export interface Rng {
  nextU32(): number;
  int(min: number, max: number): number;
  bool(): boolean;
  choice<T>(items: readonly T[]): T;
}

function seedFromString(input: string): number {
  // FNV-1a over UTF-16 code units, 32-bit.
  let hash = 0x811c9dc5;
  for (let index = 0; index < input.length; index += 1) {
    hash ^= input.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function makeRng(seed: number | string): Rng {
  // mulberry32
  let state = (typeof seed === "number" ? seed : seedFromString(seed)) >>> 0;

  const nextU32 = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let mixed = state;
    mixed = Math.imul(mixed ^ (mixed >>> 15), mixed | 1);
    mixed ^= mixed + Math.imul(mixed ^ (mixed >>> 7), mixed | 61);
    return (mixed ^ (mixed >>> 14)) >>> 0;
  };

  const int = (min: number, max: number): number => {
    const low = Math.min(min, max);
    const span = Math.max(min, max) - low + 1;
    return span <= 1 ? low : low + (nextU32() % span);
  };

  const choice = <T>(items: readonly T[]): T => {
    const item = items[int(0, items.length - 1)];
    if (item === undefined) throw new Error("rng.choice requires a non-empty array");
    return item;
  };

  return { nextU32, int, bool: () => (nextU32() & 1) === 1, choice };
}
