export type {
  CharMatcher,
  CharMatcherInput,
  Pattern,
  PatternInput,
  RegexPattern,
} from "./pattern.ts";
export {
  anchorAtEnd,
  char,
  charSet,
  isPattern,
  literal,
  matchesChar,
  predicate,
  regex,
  toCharMatcher,
  toPattern,
} from "./pattern.ts";
export type { PatternMatch } from "./search.ts";
export { findNext, findPrev, occursIn, searchBackward, searchForward } from "./search.ts";
