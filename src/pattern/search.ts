import {
  isCodePointBoundary,
  iterateCodePoints,
  iterateCodePointsReverse,
  nextIndex,
} from "../core/codepoint.ts";
import type { Text } from "../core/text.ts";
import { toView } from "../core/text.ts";
import type { Span } from "../core/types.ts";
import type { Pattern, PatternInput, RegexPattern } from "./pattern.ts";
import { matchesChar, toPattern } from "./pattern.ts";

/**
 * A located match. Regex matches keep their capture groups.
 * Units: UTF-16 code units.
 */
export interface PatternMatch extends Span {
  captures?: RegExpExecArray;
}

function haystackOf(source: string, startCU: number, endCU: number): string {
  return startCU === 0 && endCU === source.length ? source : source.slice(startCU, endCU);
}

function literalForward(
  needle: string,
  source: string,
  endCU: number,
  fromCU: number,
): PatternMatch | undefined {
  if (needle.length === 0) return fromCU <= endCU ? { startCU: fromCU, endCU: fromCU } : undefined;
  let index = source.indexOf(needle, fromCU);
  while (index !== -1 && index + needle.length <= endCU) {
    if (isCodePointBoundary(source, index) && isCodePointBoundary(source, index + needle.length)) {
      return { startCU: index, endCU: index + needle.length };
    }
    index = source.indexOf(needle, index + 1);
  }
  return undefined;
}

function literalBackward(
  needle: string,
  source: string,
  startCU: number,
  toCU: number,
): PatternMatch | undefined {
  if (needle.length === 0) return toCU >= startCU ? { startCU: toCU, endCU: toCU } : undefined;
  let index = toCU - needle.length;
  if (index < startCU) return undefined;
  index = source.lastIndexOf(needle, index);
  while (index >= startCU) {
    if (isCodePointBoundary(source, index) && isCodePointBoundary(source, index + needle.length)) {
      return { startCU: index, endCU: index + needle.length };
    }
    if (index === 0) break;
    index = source.lastIndexOf(needle, index - 1);
  }
  return undefined;
}

function regexForward(
  pattern: RegexPattern,
  source: string,
  startCU: number,
  endCU: number,
  fromCU: number,
): PatternMatch | undefined {
  if (fromCU > endCU) return undefined;
  const haystack = haystackOf(source, startCU, endCU);
  const matcher = pattern.forward;
  matcher.lastIndex = fromCU - startCU;
  const found = matcher.exec(haystack);
  if (!found) return undefined;
  const matchStart = found.index + startCU;
  return { startCU: matchStart, endCU: matchStart + found[0].length, captures: found };
}

// Last match of a forward scan over the haystack cut at `toCU`.
function regexBackward(
  pattern: RegexPattern,
  source: string,
  startCU: number,
  toCU: number,
): PatternMatch | undefined {
  const haystack = haystackOf(source, startCU, toCU);
  const matcher = pattern.forward;
  matcher.lastIndex = 0;
  let last: RegExpExecArray | undefined;
  for (let found = matcher.exec(haystack); found; found = matcher.exec(haystack)) {
    last = found;
    if (found[0].length === 0) {
      if (found.index >= haystack.length) break;
      matcher.lastIndex = nextIndex(haystack, found.index, 1, haystack.length);
    }
  }
  if (!last) return undefined;
  const matchStart = last.index + startCU;
  return { startCU: matchStart, endCU: matchStart + last[0].length, captures: last };
}

/**
 * First match of `pattern` in `source[startCU, endCU)` starting at or after `fromCU`.
 * Offsets are absolute in `source`.
 * Units: UTF-16 code units.
 */
export function searchForward(
  pattern: Pattern,
  source: string,
  startCU: number,
  endCU: number,
  fromCU: number,
): PatternMatch | undefined {
  switch (pattern.kind) {
    case "literal":
      return literalForward(pattern.text, source, endCU, fromCU);
    case "regex":
      return regexForward(pattern, source, startCU, endCU, fromCU);
    default:
      for (const { indexCU, sizeCU } of iterateCodePoints(source, fromCU, endCU)) {
        const value = source.slice(indexCU, indexCU + sizeCU);
        if (matchesChar(pattern, value, indexCU - startCU)) {
          return { startCU: indexCU, endCU: indexCU + sizeCU };
        }
      }
      return undefined;
  }
}

/**
 * Last match of `pattern` lying inside `source[startCU, toCU)`.
 * Offsets are absolute in `source`.
 * Units: UTF-16 code units.
 */
export function searchBackward(
  pattern: Pattern,
  source: string,
  startCU: number,
  toCU: number,
): PatternMatch | undefined {
  switch (pattern.kind) {
    case "literal":
      return literalBackward(pattern.text, source, startCU, toCU);
    case "regex":
      return regexBackward(pattern, source, startCU, toCU);
    default:
      for (const { indexCU, sizeCU } of iterateCodePointsReverse(source, startCU, toCU)) {
        const value = source.slice(indexCU, indexCU + sizeCU);
        if (matchesChar(pattern, value, indexCU - startCU)) {
          return { startCU: indexCU, endCU: indexCU + sizeCU };
        }
      }
      return undefined;
  }
}

/**
 * First match at or after `fromCU`, with offsets relative to `text`.
 * Units: UTF-16 code units.
 */
export function findNext(pattern: PatternInput, text: Text, fromCU = 0): Span | undefined {
  const view = toView(text);
  if (fromCU < 0 || fromCU > view.lengthCU) return undefined;
  const found = searchForward(
    toPattern(pattern),
    view.source,
    view.startCU,
    view.endCU,
    view.startCU + fromCU,
  );
  return found && { startCU: found.startCU - view.startCU, endCU: found.endCU - view.startCU };
}

/**
 * Last match lying entirely before `toCU`, with offsets relative to `text`.
 * Units: UTF-16 code units.
 */
export function findPrev(
  pattern: PatternInput,
  text: Text,
  toCU: number = toView(text).lengthCU,
): Span | undefined {
  const view = toView(text);
  if (toCU < 0 || toCU > view.lengthCU) return undefined;
  const found = searchBackward(toPattern(pattern), view.source, view.startCU, view.startCU + toCU);
  return found && { startCU: found.startCU - view.startCU, endCU: found.endCU - view.startCU };
}

/**
 * Whether the pattern occurs anywhere in `text`.
 */
export function occursIn(pattern: PatternInput, text: Text): boolean {
  return findNext(pattern, text) !== undefined;
}
