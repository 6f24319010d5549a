/**
 * Code point and its UTF-16 index metadata.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export interface CodePointInfo {
  codePoint: number;
  indexCU: number;
  sizeCU: number;
}

/**
 * Whether a UTF-16 code unit is a high (leading) surrogate.
 */
export function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

/**
 * Whether a UTF-16 code unit is a low (trailing) surrogate.
 */
export function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

/**
 * Length of a Unicode scalar value in UTF-16 code units.
 * Units: Unicode scalar values.
 */
export function codePointLength(codePoint: number): number {
  return codePoint > 0xffff ? 2 : 1;
}

/**
 * Whether `indexCU` sits between two code points, i.e. not inside a surrogate pair.
 * Offsets `0` and `text.length` are boundaries; anything outside is not.
 * Units: UTF-16 code units.
 */
export function isCodePointBoundary(text: string, indexCU: number): boolean {
  if (!Number.isInteger(indexCU) || indexCU < 0 || indexCU > text.length) return false;
  if (indexCU === 0 || indexCU === text.length) return true;
  return !(
    isLowSurrogate(text.charCodeAt(indexCU)) && isHighSurrogate(text.charCodeAt(indexCU - 1))
  );
}

/**
 * Step `count` code points forward from `indexCU`. Once `limitCU` is reached each
 * further step advances by one unit, so the result may exceed `limitCU`.
 * Units: UTF-16 code units.
 */
export function nextIndex(
  text: string,
  indexCU: number,
  count = 1,
  limitCU: number = text.length,
): number {
  let position = indexCU;
  for (let step = 0; step < count; step += 1) {
    if (position >= limitCU) {
      position += 1;
      continue;
    }
    const size = codePointLength(text.codePointAt(position) ?? 0);
    position += position + size > limitCU ? 1 : size;
  }
  return position;
}

/**
 * Step `count` code points backward from `indexCU`. Below `floorCU` each further step
 * retreats by one unit, so the result may be smaller than `floorCU`.
 * Units: UTF-16 code units.
 */
export function prevIndex(text: string, indexCU: number, count = 1, floorCU = 0): number {
  let position = indexCU;
  for (let step = 0; step < count; step += 1) {
    if (position <= floorCU) {
      position -= 1;
      continue;
    }
    position -= 1;
    if (
      position > floorCU &&
      isLowSurrogate(text.charCodeAt(position)) &&
      isHighSurrogate(text.charCodeAt(position - 1))
    ) {
      position -= 1;
    }
  }
  return position;
}

/**
 * Iterate code points with UTF-16 code unit offsets.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export function* iterateCodePoints(
  text: string,
  startCU = 0,
  endCU: number = text.length,
): Iterable<CodePointInfo> {
  for (let codeUnitIndex = startCU; codeUnitIndex < endCU; ) {
    const indexCU = codeUnitIndex;
    codeUnitIndex = nextIndex(text, indexCU, 1, endCU);
    const sizeCU = codeUnitIndex - indexCU;
    const codePoint = sizeCU === 2 ? (text.codePointAt(indexCU) ?? 0) : text.charCodeAt(indexCU);
    yield { codePoint, indexCU, sizeCU };
  }
}

/**
 * Iterate code points from the end of the range towards its start.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export function* iterateCodePointsReverse(
  text: string,
  startCU = 0,
  endCU: number = text.length,
): Iterable<CodePointInfo> {
  for (let codeUnitIndex = endCU; codeUnitIndex > startCU; ) {
    const indexCU = prevIndex(text, codeUnitIndex, 1, startCU);
    const sizeCU = codeUnitIndex - indexCU;
    const codePoint = sizeCU === 2 ? (text.codePointAt(indexCU) ?? 0) : text.charCodeAt(indexCU);
    yield { codePoint, indexCU, sizeCU };
    codeUnitIndex = indexCU;
  }
}
