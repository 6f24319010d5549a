/**
 * Span defines an exported structural contract.
 * Units: UTF-16 code units, half-open.
 */
export interface Span {
  startCU: number;
  endCU: number;
}

/**
 * Character test used by trimming, splitting and replacing.
 * `char` is a single code point; `indexCU` is its offset in the text being scanned.
 */
export type CharPredicate = (char: string, indexCU: number) => boolean;

/**
 * A finite set of single-code-point strings.
 */
export type CharSet = ReadonlySet<string> | readonly string[];

/**
 * Display-width oracle. Must return the same width for the same input.
 */
export type WidthFn = (text: string) => number;
