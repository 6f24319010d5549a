import { nextIndex } from "../core/codepoint.ts";
import { assertNonNegative, TextsliceError } from "../core/error.ts";
import type { Text } from "../core/text.ts";
import { TextView, textToString, toView } from "../core/text.ts";
import type { Pattern, PatternInput } from "../pattern/pattern.ts";
import { toPattern } from "../pattern/pattern.ts";
import type { PatternMatch } from "../pattern/search.ts";
import { searchForward } from "../pattern/search.ts";
import type { TextSink } from "../stream/stream.ts";
import { StringSink } from "../stream/stream.ts";
import type { Substitution } from "./substitution.ts";
import { checkSubstitution, expandSubstitution } from "./substitution.ts";

/**
 * Computes the replacement from the matched text (a single character for character
 * matchers).
 */
export type ReplaceFn = (match: string) => Text;

/**
 * What a match is replaced with.
 */
export type Replacement = string | TextView | ReplaceFn | Substitution;

/**
 * A pattern and its replacement. Earlier pairs win when matches start together.
 */
export type ReplacePair = readonly [PatternInput, Replacement];

/**
 * ReplaceOptions defines an exported structural contract.
 */
export interface ReplaceOptions {
  /** Maximum number of replacements. Defaults to unbounded. */
  count?: number;
}

interface Rule {
  pattern: Pattern;
  replacement: Replacement;
}

function compileRule([input, replacement]: ReplacePair): Rule {
  const pattern = toPattern(input);
  if (typeof replacement === "object" && !(replacement instanceof TextView)) {
    if (pattern.kind !== "regex") {
      throw new TextsliceError(
        "SUBSTITUTION_NEEDS_REGEX",
        "Substitution templates apply to regular expressions only",
        { template: replacement.template },
      );
    }
    checkSubstitution(replacement, pattern.regex);
  }
  return { pattern, replacement };
}

function writeReplacement(sink: TextSink, rule: Rule, source: string, match: PatternMatch): void {
  const { replacement } = rule;
  if (typeof replacement === "string") {
    sink.write(replacement);
  } else if (replacement instanceof TextView) {
    sink.write(replacement.toString());
  } else if (typeof replacement === "function") {
    sink.write(textToString(replacement(source.slice(match.startCU, match.endCU))));
  } else if (match.captures) {
    sink.write(expandSubstitution(replacement, match.captures));
  }
}

function firstMatchIndex(matches: readonly (PatternMatch | undefined)[]): number {
  let best = -1;
  let bestStart = Infinity;
  matches.forEach((match, index) => {
    if (match && match.startCU < bestStart) {
      best = index;
      bestStart = match.startCU;
    }
  });
  return best;
}

/**
 * Replace matches of several patterns in one left-to-right pass, writing to `sink`.
 * At each step the earliest match wins; ties go to the pair listed first. An empty
 * match advances the scan by one code point.
 */
export function replaceInto(
  sink: TextSink,
  text: Text,
  pairs: readonly ReplacePair[],
  options: ReplaceOptions = {},
): void {
  const count = options.count ?? Infinity;
  assertNonNegative("count", count, true);
  const rules = pairs.map(compileRule);
  const view = toView(text);
  const { source, startCU, endCU } = view;
  if (count === 0) {
    sink.write(view.toString());
    return;
  }
  const matches = rules.map((rule) => searchForward(rule.pattern, source, startCU, endCU, startCU));
  if (matches.every((match) => match === undefined)) {
    sink.write(view.toString());
    return;
  }

  let copied = startCU;
  let cursor = startCU;
  let replaced = 1;
  for (;;) {
    const winner = firstMatchIndex(matches);
    const match = matches[winner];
    const rule = rules[winner];
    if (!match || !rule) break;
    if (copied === startCU || copied < match.endCU) {
      sink.write(source.slice(copied, match.startCU));
      writeReplacement(sink, rule, source, match);
    }
    if (match.endCU <= match.startCU) {
      copied = match.startCU;
      if (match.startCU === endCU) break;
      cursor = nextIndex(source, match.startCU, 1, endCU);
    } else {
      copied = match.endCU;
      cursor = match.endCU;
    }
    if (replaced === count) break;
    matches.forEach((previous, index) => {
      const pending = rules[index];
      if (previous && pending && previous.startCU < cursor) {
        matches[index] = searchForward(pending.pattern, source, startCU, endCU, cursor);
      }
    });
    replaced += 1;
  }
  sink.write(source.slice(copied, endCU));
}

/**
 * Replace matches of several patterns in one left-to-right pass.
 *
 * @example
 * replace("abcabc", [["a", "b"], ["b", "c"], [/.+/, "a"]]); // "bca"
 */
export function replace(
  text: Text,
  pairs: readonly ReplacePair[],
  options: ReplaceOptions = {},
): string {
  const sink = new StringSink();
  replaceInto(sink, text, pairs, options);
  return sink.toString();
}
