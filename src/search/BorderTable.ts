import { ElementEquals, ElementSequence, strictEquals } from './Sequence';
type BorderTable = readonly number[];
function getBorderTableLength(patternLength: number): number {
  return patternLength === 0 ? 0 : patternLength + 1;
}
// borders[i] is the length of the longest proper border of the first i pattern elements.
function buildBorderTable<T>(pattern: ElementSequence<T>, equals: ElementEquals<T> = strictEquals): BorderTable {
  const M = pattern.length;
  if (M === 0) {
    return Object.freeze([]);
  }
  const borders: number[] = [0, 0];
  for (let i = 2; i <= M; i++) {
    const last = pattern[i - 1];
    let b = borders[i - 1];
    while (b !== 0 && !equals(pattern[b], last)) {
      b = borders[b];
    }
    borders[i] = equals(pattern[b], last) ? b + 1 : 0;
  }
  return Object.freeze(borders);
}
export { type BorderTable, getBorderTableLength, buildBorderTable };
