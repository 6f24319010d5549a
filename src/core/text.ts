import type { CodePointInfo } from "./codepoint.ts";
import { isCodePointBoundary, iterateCodePoints, nextIndex, prevIndex } from "./codepoint.ts";
import { TextsliceError } from "./error.ts";
import type { Span } from "./types.ts";

/**
 * Text accepted by every operation: an owning string or a borrowed view.
 */
export type Text = string | TextView;

function checkBound(source: string, indexCU: number, label: string): void {
  if (!Number.isInteger(indexCU) || indexCU < 0 || indexCU > source.length) {
    throw new TextsliceError("INDEX_OUT_OF_BOUNDS", `${label} is outside the text`, {
      indexCU,
      lengthCU: source.length,
    });
  }
  if (!isCodePointBoundary(source, indexCU)) {
    throw new TextsliceError("INDEX_NOT_BOUNDARY", `${label} splits a surrogate pair`, {
      indexCU,
    });
  }
}

/**
 * A non-owning window `[startCU, endCU)` into a source string.
 *
 * Views never nest: slicing a view yields another view on the same root source.
 * Both bounds always fall on code point boundaries of the source.
 * Units: UTF-16 code units.
 */
export class TextView implements Iterable<string> {
  readonly source: string;
  readonly startCU: number;
  readonly endCU: number;

  constructor(source: string, startCU = 0, endCU: number = source.length) {
    checkBound(source, startCU, "View start");
    checkBound(source, endCU, "View end");
    if (endCU < startCU) {
      throw new TextsliceError("INDEX_OUT_OF_BOUNDS", "View end precedes its start", {
        startCU,
        endCU,
      });
    }
    this.source = source;
    this.startCU = startCU;
    this.endCU = endCU;
  }

  get lengthCU(): number {
    return this.endCU - this.startCU;
  }

  get isEmpty(): boolean {
    return this.endCU === this.startCU;
  }

  get span(): Span {
    return { startCU: this.startCU, endCU: this.endCU };
  }

  /**
   * Length of the view once encoded as UTF-8.
   * Units: bytes (UTF-8).
   */
  get utf8ByteLength(): number {
    let total = 0;
    for (const { codePoint } of iterateCodePoints(this.source, this.startCU, this.endCU)) {
      if (codePoint <= 0x7f) total += 1;
      else if (codePoint <= 0x7ff) total += 2;
      else if (codePoint <= 0xffff) total += 3;
      else total += 4;
    }
    return total;
  }

  *[Symbol.iterator](): Iterator<string> {
    for (const { indexCU, sizeCU } of iterateCodePoints(this.source, this.startCU, this.endCU)) {
      yield this.source.slice(indexCU, indexCU + sizeCU);
    }
  }

  /**
   * Code points with offsets relative to the view start.
   * Units: UTF-16 code units.
   */
  *codePoints(): Iterable<CodePointInfo> {
    for (const info of iterateCodePoints(this.source, this.startCU, this.endCU)) {
      yield { ...info, indexCU: info.indexCU - this.startCU };
    }
  }

  /**
   * The code point starting at `indexCU`; the offset must be a boundary inside the view.
   * Units: UTF-16 code units.
   */
  at(indexCU: number): string {
    if (!Number.isInteger(indexCU) || indexCU < 0 || indexCU >= this.lengthCU) {
      throw new TextsliceError("INDEX_OUT_OF_BOUNDS", "Index is outside the view", {
        indexCU,
        lengthCU: this.lengthCU,
      });
    }
    const absolute = this.startCU + indexCU;
    if (!isCodePointBoundary(this.source, absolute)) {
      throw new TextsliceError("INDEX_NOT_BOUNDARY", "Index splits a surrogate pair", {
        indexCU,
      });
    }
    return this.source.slice(absolute, nextIndex(this.source, absolute, 1, this.endCU));
  }

  /**
   * Offset `count` code points after `indexCU`, relative to the view.
   * Units: UTF-16 code units.
   */
  nextIndex(indexCU: number, count = 1): number {
    return nextIndex(this.source, this.startCU + indexCU, count, this.endCU) - this.startCU;
  }

  /**
   * Offset `count` code points before `indexCU`, relative to the view.
   * Units: UTF-16 code units.
   */
  prevIndex(indexCU: number, count = 1): number {
    return prevIndex(this.source, this.startCU + indexCU, count, this.startCU) - this.startCU;
  }

  first(): string | undefined {
    return this.isEmpty ? undefined : this.at(0);
  }

  last(): string | undefined {
    return this.isEmpty ? undefined : this.at(this.prevIndex(this.lengthCU));
  }

  /**
   * Sub-view with offsets relative to this view.
   * Units: UTF-16 code units.
   */
  slice(startCU = 0, endCU: number = this.lengthCU): TextView {
    if (startCU < 0 || endCU > this.lengthCU) {
      throw new TextsliceError("INDEX_OUT_OF_BOUNDS", "Slice is outside the view", {
        startCU,
        endCU,
        lengthCU: this.lengthCU,
      });
    }
    return new TextView(this.source, this.startCU + startCU, this.startCU + endCU);
  }

  equals(other: Text): boolean {
    return this.toString() === textToString(other);
  }

  toString(): string {
    return this.source.slice(this.startCU, this.endCU);
  }
}

/**
 * View over the whole text. A view is returned as is.
 */
export function toView(text: Text): TextView {
  return typeof text === "string" ? new TextView(text) : text;
}

/**
 * Validated view over `[startCU, endCU)` of `text`, offsets relative to `text`.
 * Units: UTF-16 code units.
 */
export function textView(text: Text, startCU?: number, endCU?: number): TextView {
  return toView(text).slice(startCU, endCU);
}

/**
 * Materialise text as a string.
 */
export function textToString(text: Text): string {
  return typeof text === "string" ? text : text.toString();
}
