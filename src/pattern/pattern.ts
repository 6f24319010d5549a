import { TextsliceError } from "../core/error.ts";
import { TextView } from "../core/text.ts";
import type { CharPredicate, CharSet } from "../core/types.ts";

/**
 * Pattern is the tagged variant every search dispatches on.
 */
export type Pattern =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "char"; readonly char: string }
  | { readonly kind: "charset"; readonly chars: ReadonlySet<string> }
  | { readonly kind: "predicate"; readonly test: CharPredicate }
  | RegexPattern;

/**
 * Externally compiled regular expression, with the global and sticky clones the
 * searches need.
 */
export interface RegexPattern {
  readonly kind: "regex";
  readonly regex: RegExp;
  readonly forward: RegExp;
  readonly sticky: RegExp;
}

/**
 * CharMatcher is the single-character subset of {@link Pattern}.
 */
export type CharMatcher = Extract<Pattern, { kind: "char" | "charset" | "predicate" }>;

/**
 * Inputs accepted wherever a character matcher is expected.
 */
export type CharMatcherInput = CharMatcher | CharSet | CharPredicate;

/**
 * Inputs accepted wherever a pattern is expected. Strings and views are literals.
 */
export type PatternInput = Pattern | string | TextView | RegExp | CharSet | CharPredicate;

function isCharSetInput(value: unknown): value is CharSet {
  return Array.isArray(value) || value instanceof Set;
}

function isSingleCodePoint(value: string): boolean {
  if (value.length === 0 || value.length > 2) return false;
  const codePoint = value.codePointAt(0) ?? 0;
  return value.length === (codePoint > 0xffff ? 2 : 1);
}

function stripFlags(flags: string, remove: string): string {
  return Array.from(flags)
    .filter((flag) => !remove.includes(flag))
    .join("");
}

/**
 * Literal substring pattern.
 */
export function literal(text: string | TextView): Pattern {
  return { kind: "literal", text: text.toString() };
}

/**
 * Single code point equality.
 */
export function char(value: string): CharMatcher {
  if (!isSingleCodePoint(value)) {
    throw new TextsliceError("CHAR_NOT_SINGLE", "Expected exactly one code point", { value });
  }
  return { kind: "char", char: value };
}

/**
 * Membership in a finite set of code points.
 */
export function charSet(chars: CharSet): CharMatcher {
  const set = new Set<string>();
  for (const value of chars) {
    if (!isSingleCodePoint(value)) {
      throw new TextsliceError("CHAR_NOT_SINGLE", "Character sets hold single code points", {
        value,
      });
    }
    set.add(value);
  }
  return { kind: "charset", chars: set };
}

/**
 * Arbitrary character predicate.
 */
export function predicate(test: CharPredicate): CharMatcher {
  return { kind: "predicate", test };
}

/**
 * Compiled regular expression pattern.
 */
export function regex(value: RegExp): RegexPattern {
  const base = stripFlags(value.flags, "gy");
  return {
    kind: "regex",
    regex: value,
    forward: new RegExp(value.source, `${base}g`),
    sticky: new RegExp(value.source, `${base}y`),
  };
}

/**
 * Clone of `value` that only matches at the end of the input.
 */
export function anchorAtEnd(value: RegExp): RegExp {
  return new RegExp(`(?:${value.source})$`, stripFlags(value.flags, "gmy"));
}

/**
 * Whether a value is already a tagged {@link Pattern}.
 */
export function isPattern(value: unknown): value is Pattern {
  if (typeof value !== "object" || value === null) return false;
  if (value instanceof RegExp || value instanceof TextView || value instanceof Set) return false;
  return !Array.isArray(value) && "kind" in value;
}

/**
 * Normalise user input into a tagged {@link Pattern}.
 */
export function toPattern(input: PatternInput): Pattern {
  if (typeof input === "string" || input instanceof TextView) return literal(input);
  if (input instanceof RegExp) return regex(input);
  if (typeof input === "function") return predicate(input);
  if (isCharSetInput(input)) return charSet(input);
  return input;
}

/**
 * Normalise user input into a {@link CharMatcher}. Text and regular expressions are
 * rejected: a trim set made of a whole string is ambiguous.
 */
export function toCharMatcher(input: CharMatcherInput | string | TextView | RegExp): CharMatcher {
  if (typeof input === "string" || input instanceof TextView) {
    throw new TextsliceError(
      "TRIM_SET_IS_TEXT",
      "Expected a character, a collection of characters or a predicate, not text",
      { value: input.toString() },
    );
  }
  if (input instanceof RegExp) {
    throw new TextsliceError(
      "PATTERN_UNSUPPORTED",
      "A regular expression is not a character matcher",
      { source: input.source },
    );
  }
  if (typeof input === "function") return predicate(input);
  if (isCharSetInput(input)) return charSet(input);
  return input;
}

/**
 * Whether `value` is accepted by a character matcher.
 */
export function matchesChar(matcher: CharMatcher, value: string, indexCU = 0): boolean {
  switch (matcher.kind) {
    case "char":
      return matcher.char === value;
    case "charset":
      return matcher.chars.has(value);
    case "predicate":
      return matcher.test(value, indexCU);
  }
}
