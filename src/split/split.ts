import { nextIndex, prevIndex } from "../core/codepoint.ts";
import { assertInteger, TextsliceError } from "../core/error.ts";
import type { Text } from "../core/text.ts";
import { TextView, toView } from "../core/text.ts";
import type { Pattern, PatternInput } from "../pattern/pattern.ts";
import { isPattern, predicate, toPattern } from "../pattern/pattern.ts";
import { searchBackward, searchForward } from "../pattern/search.ts";
import { isSpace } from "../unicode/classify.ts";

/**
 * SplitOptions defines an exported structural contract.
 */
export interface SplitOptions {
  /** Maximum number of fields; `0` or less means unbounded. */
  limit?: number;
  /** Emit empty fields. Defaults to `true` with a delimiter, `false` without. */
  keepEmpty?: boolean;
}

interface ResolvedSplit {
  view: TextView;
  pattern: Pattern;
  limit: number;
  keepEmpty: boolean;
}

const WHITESPACE: Pattern = predicate(isSpace);

function isPatternInput(value: unknown): value is PatternInput {
  return (
    typeof value === "string" ||
    typeof value === "function" ||
    value instanceof TextView ||
    value instanceof RegExp ||
    value instanceof Set ||
    Array.isArray(value) ||
    isPattern(value)
  );
}

function readOptions(value: unknown): SplitOptions {
  const options: SplitOptions = {};
  if (typeof value !== "object" || value === null) return options;
  if ("limit" in value && typeof value.limit === "number") options.limit = value.limit;
  if ("keepEmpty" in value && typeof value.keepEmpty === "boolean") {
    options.keepEmpty = value.keepEmpty;
  }
  return options;
}

function resolveSplit(
  text: Text,
  delimiterOrOptions: PatternInput | SplitOptions | undefined,
  options: SplitOptions | undefined,
): ResolvedSplit {
  const view = toView(text);
  if (isPatternInput(delimiterOrOptions)) {
    const limit = options?.limit ?? 0;
    assertInteger("limit", limit);
    return {
      view,
      pattern: toPattern(delimiterOrOptions),
      limit,
      keepEmpty: options?.keepEmpty ?? true,
    };
  }
  const resolved = readOptions(delimiterOrOptions ?? options);
  const limit = resolved.limit ?? 0;
  assertInteger("limit", limit);
  return {
    view,
    pattern: WHITESPACE,
    limit,
    keepEmpty: resolved.keepEmpty ?? false,
  };
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Lazy left-to-right field iterator. Single pass: once exhausted it stays exhausted.
 * Units: UTF-16 code units.
 */
export class SplitIterator implements IterableIterator<TextView> {
  readonly #source: string;
  readonly #endCU: number;
  readonly #startCU: number;
  readonly #pattern: Pattern;
  readonly #limit: number;
  readonly #keepEmpty: boolean;
  #fieldStart: number;
  #cursor: number;
  #emitted = 0;
  #finished = false;

  constructor(view: TextView, pattern: Pattern, limit: number, keepEmpty: boolean) {
    this.#source = view.source;
    this.#startCU = view.startCU;
    this.#endCU = view.endCU;
    this.#pattern = pattern;
    this.#limit = limit;
    this.#keepEmpty = keepEmpty;
    this.#fieldStart = view.startCU;
    this.#cursor = view.startCU;
  }

  next(): IteratorResult<TextView, undefined> {
    if (this.#finished) return DONE;
    while (this.#emitted !== this.#limit - 1) {
      const match = searchForward(
        this.#pattern,
        this.#source,
        this.#startCU,
        this.#endCU,
        this.#cursor,
      );
      if (!match || match.startCU >= this.#endCU) break;
      let field: TextView | undefined;
      if (this.#fieldStart < match.endCU) {
        if (this.#keepEmpty || this.#fieldStart < match.startCU) {
          field = new TextView(this.#source, this.#fieldStart, match.startCU);
        }
        this.#fieldStart = match.endCU;
      }
      this.#cursor =
        match.endCU <= match.startCU
          ? nextIndex(this.#source, match.startCU, 1, this.#endCU)
          : match.endCU;
      if (field) {
        this.#emitted += 1;
        return { done: false, value: field };
      }
    }
    this.#finished = true;
    if (!this.#keepEmpty && this.#fieldStart >= this.#endCU) return DONE;
    return { done: false, value: new TextView(this.#source, this.#fieldStart, this.#endCU) };
  }

  [Symbol.iterator](): IterableIterator<TextView> {
    return this;
  }
}

/**
 * Lazy right-to-left field iterator. Fields come out last first.
 * Units: UTF-16 code units.
 */
export class RSplitIterator implements IterableIterator<TextView> {
  readonly #source: string;
  readonly #startCU: number;
  readonly #pattern: Pattern;
  readonly #keepEmpty: boolean;
  // End of the next field; undefined once the start of the text has been emitted.
  #fieldEnd: number | undefined;
  #remaining: number;

  constructor(view: TextView, pattern: Pattern, limit: number, keepEmpty: boolean) {
    this.#source = view.source;
    this.#startCU = view.startCU;
    this.#pattern = pattern;
    this.#keepEmpty = keepEmpty;
    this.#fieldEnd = view.endCU;
    this.#remaining = limit - 1;
  }

  next(): IteratorResult<TextView, undefined> {
    let end = this.#fieldEnd;
    if (end === undefined) return DONE;
    let from = this.#startCU;
    let nextEnd: number | undefined;
    while (this.#remaining !== 0) {
      let match = searchBackward(this.#pattern, this.#source, this.#startCU, end);
      if (match && match.startCU === end && match.endCU === end && end > this.#startCU) {
        const before = prevIndex(this.#source, end, 1, this.#startCU);
        match = searchBackward(this.#pattern, this.#source, this.#startCU, before);
      }
      if (!match) {
        from = this.#startCU;
        nextEnd = undefined;
        break;
      }
      from = match.endCU;
      const atStart = match.startCU === match.endCU && match.startCU === this.#startCU;
      nextEnd = atStart ? undefined : match.startCU;
      if (from >= end && !this.#keepEmpty) {
        if (nextEnd === undefined) {
          this.#fieldEnd = undefined;
          return DONE;
        }
        end = nextEnd;
        from = this.#startCU;
        nextEnd = undefined;
        continue;
      }
      break;
    }
    if (from >= end && !this.#keepEmpty) {
      this.#fieldEnd = undefined;
      return DONE;
    }
    this.#fieldEnd = nextEnd;
    this.#remaining -= 1;
    return { done: false, value: new TextView(this.#source, from, end) };
  }

  [Symbol.iterator](): IterableIterator<TextView> {
    return this;
  }
}

/**
 * Lazily split `text` on `delimiter` (default: any white space character).
 *
 * @example
 * [...eachSplit("a,b,,c", ",")].map(String); // ["a", "b", "", "c"]
 */
export function eachSplit(text: Text, options?: SplitOptions): SplitIterator;
export function eachSplit(
  text: Text,
  delimiter: PatternInput,
  options?: SplitOptions,
): SplitIterator;
export function eachSplit(
  text: Text,
  delimiterOrOptions?: PatternInput | SplitOptions,
  options?: SplitOptions,
): SplitIterator {
  const { view, pattern, limit, keepEmpty } = resolveSplit(text, delimiterOrOptions, options);
  return new SplitIterator(view, pattern, limit, keepEmpty);
}

/**
 * Lazily split `text` from the end; with a `limit` the leftover prefix is the last field.
 *
 * @example
 * [...eachRSplit("Ma.r.ch", ".", { limit: 2 })].map(String); // ["ch", "Ma.r"]
 */
export function eachRSplit(text: Text, options?: SplitOptions): RSplitIterator;
export function eachRSplit(
  text: Text,
  delimiter: PatternInput,
  options?: SplitOptions,
): RSplitIterator;
export function eachRSplit(
  text: Text,
  delimiterOrOptions?: PatternInput | SplitOptions,
  options?: SplitOptions,
): RSplitIterator {
  const { view, pattern, limit, keepEmpty } = resolveSplit(text, delimiterOrOptions, options);
  return new RSplitIterator(view, pattern, limit, keepEmpty);
}

/**
 * Split `text` into fields, left to right.
 */
export function split(text: Text, options?: SplitOptions): TextView[];
export function split(text: Text, delimiter: PatternInput, options?: SplitOptions): TextView[];
export function split(
  text: Text,
  delimiterOrOptions?: PatternInput | SplitOptions,
  options?: SplitOptions,
): TextView[] {
  const { view, pattern, limit, keepEmpty } = resolveSplit(text, delimiterOrOptions, options);
  return Array.from(new SplitIterator(view, pattern, limit, keepEmpty));
}

/**
 * Split `text` into fields starting from the end, returned in left-to-right order.
 *
 * @example
 * rsplit("a.b.c", ".", { limit: 2 }).map(String); // ["a.b", "c"]
 */
export function rsplit(text: Text, options?: SplitOptions): TextView[];
export function rsplit(text: Text, delimiter: PatternInput, options?: SplitOptions): TextView[];
export function rsplit(
  text: Text,
  delimiterOrOptions?: PatternInput | SplitOptions,
  options?: SplitOptions,
): TextView[] {
  const { view, pattern, limit, keepEmpty } = resolveSplit(text, delimiterOrOptions, options);
  return Array.from(new RSplitIterator(view, pattern, limit, keepEmpty)).reverse();
}

function* partitionViews(view: TextView, size: number): IterableIterator<TextView> {
  const { source, startCU, endCU } = view;
  for (let position = startCU; position < endCU; ) {
    const next = Math.min(nextIndex(source, position, size, endCU), endCU);
    yield new TextView(source, position, next);
    position = next;
  }
}

/**
 * Lazily cut `text` into consecutive views of `size` code points; the last may be shorter.
 *
 * @example
 * [...partition("abcde", 2)].map(String); // ["ab", "cd", "e"]
 */
export function partition(text: Text, size: number): IterableIterator<TextView> {
  if (!Number.isInteger(size) || size < 1) {
    throw new TextsliceError("NON_POSITIVE_ARGUMENT", "Partition size must be at least 1", {
      size,
    });
  }
  return partitionViews(toView(text), size);
}
