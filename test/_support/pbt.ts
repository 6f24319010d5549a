import type { Rng } from "./prng.ts";
import { makeRng } from "./prng.ts";

export type Generator<T> = (rng: Rng, size: number) => T;
export type Property<T> = (value: T) => boolean | undefined;
export type Shrinker<T> = (value: T) => Iterable<T>;

export interface EvalPropertyConfig<T> {
  name: string;
  seed: string;
  runs: number;
  gen: Generator<T>;
  property: Property<T>;
  /** Smaller candidates for a failing value, tried in order. */
  shrink?: Shrinker<T>;
}

export function getPbtRuns(defaultRuns = 100): number {
  const raw = process.env["TEXTSLICE_PBT_RUNS"];
  if (!raw) return defaultRuns;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultRuns;
}

export function getPbtSeed(defaultSeed = "textslice-pbt-v1"): string {
  return process.env["TEXTSLICE_PBT_SEED"] ?? defaultSeed;
}

/**
 * Candidates for a failing string: halves, then single code point deletions.
 */
export function* shrinkText(value: string): Iterable<string> {
  const chars = Array.from(value);
  if (chars.length === 0) return;
  yield "";
  const half = Math.floor(chars.length / 2);
  if (half > 0) {
    yield chars.slice(0, half).join("");
    yield chars.slice(half).join("");
  }
  for (let index = 0; index < Math.min(chars.length, 24); index += 1) {
    yield [...chars.slice(0, index), ...chars.slice(index + 1)].join("");
  }
}

/**
 * Candidates for a failing array: halves, then single element deletions.
 */
export function* shrinkList<T>(value: readonly T[]): Iterable<T[]> {
  if (value.length === 0) return;
  yield [];
  const half = Math.floor(value.length / 2);
  if (half > 0) {
    yield value.slice(0, half);
    yield value.slice(half);
  }
  for (let index = 0; index < Math.min(value.length, 16); index += 1) {
    yield [...value.slice(0, index), ...value.slice(index + 1)];
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    const units = Array.from({ length: value.length }, (_, index) =>
      value.charCodeAt(index).toString(16).padStart(4, "0"),
    );
    return `${JSON.stringify(value)} (cu=[${units.join(" ")}])`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function fails<T>(property: Property<T>, value: T): boolean {
  try {
    return property(value) === false;
  } catch {
    return true;
  }
}

function minimize<T>(value: T, property: Property<T>, shrink: Shrinker<T>): T {
  let current = value;
  // Bounded: each accepted candidate restarts the search from the smaller value.
  for (let round = 0; round < 256; round += 1) {
    let next: T | undefined;
    for (const candidate of shrink(current)) {
      if (fails(property, candidate)) {
        next = candidate;
        break;
      }
    }
    if (next === undefined) break;
    current = next;
  }
  return current;
}

export function evalProperty<T>(config: EvalPropertyConfig<T>): void {
  const { name, seed, runs, gen, property, shrink } = config;
  const rng = makeRng(seed);
  for (let runIndex = 0; runIndex < runs; runIndex += 1) {
    const size = Math.max(4, (runIndex % 48) + 1);
    const value = gen(rng, size);
    if (!fails(property, value)) continue;
    const minimized = shrink ? minimize(value, property, shrink) : value;
    throw new Error(
      `[PBT] ${name} failed\nseed=${seed} run=${runIndex}\ncounterexample=${formatValue(
        minimized,
      )}`,
    );
  }
}
