import { Maybe, None, Some } from '../common/maybe';
import { BorderTable, getBorderTableLength } from './BorderTable';
import { TableMismatchError } from './errors';
import { ElementEquals, ElementSequence, assertValidFromIndex, strictEquals } from './Sequence';
function kmpSearch<T>(
  pattern: ElementSequence<T>,
  text: ElementSequence<T>,
  borders: BorderTable,
  equals: ElementEquals<T> = strictEquals,
  fromIndex = 0,
): Maybe<number> {
  assertValidFromIndex(fromIndex);
  const M = pattern.length;
  const N = text.length;
  const expectedBordersLength = getBorderTableLength(M);
  if (borders.length !== expectedBordersLength) {
    throw new TableMismatchError('Border table', expectedBordersLength, borders.length);
  }
  if (M === 0) {
    return fromIndex <= N ? Some(fromIndex) : None;
  }
  let t = fromIndex;
  let p = 0;
  while (t + p < N) {
    if (equals(text[t + p], pattern[p])) {
      p++;
      if (p === M) {
        return Some(t);
      }
    } else if (p === 0) {
      t++;
    } else {
      const border = borders[p];
      t += p - border;
      p = border;
    }
  }
  return None;
}
export { kmpSearch };
