import { isCodePointBoundary } from "../core/codepoint.ts";
import type { Text } from "../core/text.ts";
import { TextView, toView } from "../core/text.ts";
import type { CharMatcherInput, PatternInput } from "../pattern/pattern.ts";
import { anchorAtEnd, matchesChar, regex, toCharMatcher } from "../pattern/pattern.ts";
import { occursIn } from "../pattern/search.ts";

/**
 * What a text may start or end with: a literal, a regular expression, or a matcher
 * tested against the first or last character.
 */
export type AffixInput = Text | RegExp | CharMatcherInput;

/**
 * Unary test produced by the curried forms.
 */
export type TextTest = (text: Text) => boolean;

function hasLiteralPrefix(view: TextView, prefix: string): boolean {
  if (prefix.length > view.lengthCU) return false;
  return (
    view.source.startsWith(prefix, view.startCU) &&
    isCodePointBoundary(view.source, view.startCU + prefix.length)
  );
}

function hasLiteralSuffix(view: TextView, suffix: string): boolean {
  const offset = view.endCU - suffix.length;
  if (offset < view.startCU) return false;
  return view.source.startsWith(suffix, offset) && isCodePointBoundary(view.source, offset);
}

function matchesPrefix(view: TextView, prefix: AffixInput): boolean {
  if (typeof prefix === "string" || prefix instanceof TextView) {
    return hasLiteralPrefix(view, prefix.toString());
  }
  if (prefix instanceof RegExp) {
    const sticky = regex(prefix).sticky;
    sticky.lastIndex = 0;
    return sticky.test(view.toString());
  }
  const first = view.first();
  return first !== undefined && matchesChar(toCharMatcher(prefix), first, 0);
}

function matchesSuffix(view: TextView, suffix: AffixInput): boolean {
  if (typeof suffix === "string" || suffix instanceof TextView) {
    return hasLiteralSuffix(view, suffix.toString());
  }
  if (suffix instanceof RegExp) {
    return anchorAtEnd(suffix).test(view.toString());
  }
  const last = view.last();
  if (last === undefined) return false;
  return matchesChar(toCharMatcher(suffix), last, view.prevIndex(view.lengthCU));
}

/**
 * Whether `text` starts with `prefix`. Given only a prefix, returns a test for it.
 *
 * A literal prefix is compared unit by unit, and rejected when its end would fall
 * inside a surrogate pair of `text`. A matcher tests the first character.
 * Units: UTF-16 code units.
 *
 * @example
 * startsWith("TypeScript", "Type"); // true
 * ["apple", "avocado", "kiwi"].filter(startsWith("a")); // ["apple", "avocado"]
 */
export function startsWith(prefix: AffixInput): TextTest;
export function startsWith(text: Text, prefix: AffixInput): boolean;
export function startsWith(...args: [AffixInput] | [Text, AffixInput]): boolean | TextTest {
  if (args.length === 1) {
    const [prefix] = args;
    return (text: Text) => matchesPrefix(toView(text), prefix);
  }
  const [text, prefix] = args;
  return matchesPrefix(toView(text), prefix);
}

/**
 * Whether `text` ends with `suffix`. Given only a suffix, returns a test for it.
 * Units: UTF-16 code units.
 *
 * @example
 * endsWith("Sunday", "day"); // true
 */
export function endsWith(suffix: AffixInput): TextTest;
export function endsWith(text: Text, suffix: AffixInput): boolean;
export function endsWith(...args: [AffixInput] | [Text, AffixInput]): boolean | TextTest {
  if (args.length === 1) {
    const [suffix] = args;
    return (text: Text) => matchesSuffix(toView(text), suffix);
  }
  const [text, suffix] = args;
  return matchesSuffix(toView(text), suffix);
}

/**
 * Whether `haystack` contains `needle`. Given only a needle, returns a test for it.
 */
export function contains(needle: PatternInput): TextTest;
export function contains(haystack: Text, needle: PatternInput): boolean;
export function contains(...args: [PatternInput] | [Text, PatternInput]): boolean | TextTest {
  if (args.length === 1) {
    const [needle] = args;
    return (haystack: Text) => occursIn(needle, haystack);
  }
  const [haystack, needle] = args;
  return occursIn(needle, haystack);
}
