import {
  iterateCodePoints,
  iterateCodePointsReverse,
  nextIndex,
  prevIndex,
} from "../core/codepoint.ts";
import { assertNonNegative } from "../core/error.ts";
import type { Text } from "../core/text.ts";
import { TextView, toView } from "../core/text.ts";
import type { CharMatcher, CharMatcherInput } from "../pattern/pattern.ts";
import { anchorAtEnd, matchesChar, predicate, regex, toCharMatcher } from "../pattern/pattern.ts";
import { isSpace } from "../unicode/classify.ts";
import { endsWith, startsWith } from "../affix/affix.ts";

/**
 * ChopOptions defines an exported structural contract.
 */
export interface ChopOptions {
  /** Code points removed from the start. Default 0. */
  head?: number;
  /** Code points removed from the end. Default 1. */
  tail?: number;
}

/**
 * Trim set: a matcher, or text, which is rejected.
 */
export type TrimInput = CharMatcherInput | Text;

const SPACE_MATCHER: CharMatcher = predicate(isSpace);

/**
 * Remove `head` code points from the start and `tail` from the end.
 * Asking for more than the text holds yields an empty view.
 *
 * @example
 * chop("March").toString(); // "Marc"
 * chop("March", { head: 1, tail: 2 }).toString(); // "ar"
 */
export function chop(text: Text, options: ChopOptions = {}): TextView {
  const head = options.head ?? 0;
  const tail = options.tail ?? 1;
  assertNonNegative("head", head);
  assertNonNegative("tail", tail);
  const view = toView(text);
  const { source, startCU, endCU } = view;
  const from = Math.min(nextIndex(source, startCU, head, endCU), endCU);
  const to = Math.max(prevIndex(source, endCU, tail, startCU), startCU);
  if (from >= to) return new TextView(source, from, from);
  return new TextView(source, from, to);
}

/**
 * Remove `prefix` once from the start of `text`, if present.
 *
 * @example
 * chopPrefix("Hamburger", "Ham").toString(); // "burger"
 */
export function chopPrefix(text: Text, prefix: Text | RegExp): TextView {
  const view = toView(text);
  if (prefix instanceof RegExp) {
    const sticky = regex(prefix).sticky;
    sticky.lastIndex = 0;
    const found = sticky.exec(view.toString());
    return found ? view.slice(found[0].length) : view;
  }
  const value = prefix.toString();
  if (value.length === 0 || !startsWith(view, value)) return view;
  return view.slice(value.length);
}

/**
 * Remove `suffix` once from the end of `text`, if present. An empty suffix is a no-op.
 *
 * @example
 * chopSuffix("Hamburger", "er").toString(); // "Hamburg"
 */
export function chopSuffix(text: Text, suffix: Text | RegExp): TextView {
  const view = toView(text);
  if (suffix instanceof RegExp) {
    const found = anchorAtEnd(suffix).exec(view.toString());
    return found ? view.slice(0, found.index) : view;
  }
  const value = suffix.toString();
  if (value.length === 0 || !endsWith(view, value)) return view;
  return view.slice(0, view.lengthCU - value.length);
}

/**
 * Remove a single trailing "\n" or "\r\n".
 *
 * @example
 * chomp("line\r\n\n").toString(); // "line\r\n"
 */
export function chomp(text: Text): TextView {
  const view = toView(text);
  const { source, startCU, endCU } = view;
  if (endCU === startCU || source.charCodeAt(endCU - 1) !== 0x0a) return view;
  const hasCr = endCU - 2 >= startCU && source.charCodeAt(endCU - 2) === 0x0d;
  return new TextView(source, startCU, endCU - (hasCr ? 2 : 1));
}

function resolveTrim(chars: TrimInput | undefined): CharMatcher {
  return chars === undefined ? SPACE_MATCHER : toCharMatcher(chars);
}

/**
 * Remove leading characters accepted by `chars` (default: white space).
 * Passing text instead of a character matcher throws `TRIM_SET_IS_TEXT`.
 */
export function lstrip(text: Text, chars?: TrimInput): TextView {
  const matcher = resolveTrim(chars);
  const view = toView(text);
  const { source, startCU, endCU } = view;
  for (const { indexCU, sizeCU } of iterateCodePoints(source, startCU, endCU)) {
    const value = source.slice(indexCU, indexCU + sizeCU);
    if (!matchesChar(matcher, value, indexCU - startCU)) {
      return new TextView(source, indexCU, endCU);
    }
  }
  return new TextView(source, endCU, endCU);
}

/**
 * Remove trailing characters accepted by `chars` (default: white space).
 * Passing text instead of a character matcher throws `TRIM_SET_IS_TEXT`.
 */
export function rstrip(text: Text, chars?: TrimInput): TextView {
  const matcher = resolveTrim(chars);
  const view = toView(text);
  const { source, startCU, endCU } = view;
  for (const { indexCU, sizeCU } of iterateCodePointsReverse(source, startCU, endCU)) {
    const value = source.slice(indexCU, indexCU + sizeCU);
    if (!matchesChar(matcher, value, indexCU - startCU)) {
      return new TextView(source, startCU, indexCU + sizeCU);
    }
  }
  return new TextView(source, startCU, startCU);
}

/**
 * Remove leading and trailing characters accepted by `chars` (default: white space).
 *
 * @example
 * strip("{3, 5}\n", ["{", "}", "\n"]).toString(); // "3, 5"
 */
export function strip(text: Text, chars?: TrimInput): TextView {
  const matcher = resolveTrim(chars);
  return lstrip(rstrip(text, matcher), matcher);
}
