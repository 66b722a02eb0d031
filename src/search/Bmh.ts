import { Maybe, None, Some } from '../common/maybe';
import { BAD_CHARACTER_TABLE_SIZE, BadCharacterTable } from './BadCharacterTable';
import { TableMismatchError } from './errors';
import { ByteSequence, assertValidFromIndex } from './Sequence';
function bmhSearch(pattern: ByteSequence, text: ByteSequence, badCharacterTable: BadCharacterTable, fromIndex = 0): Maybe<number> {
  assertValidFromIndex(fromIndex);
  if (badCharacterTable.length !== BAD_CHARACTER_TABLE_SIZE) {
    throw new TableMismatchError('Bad character table', BAD_CHARACTER_TABLE_SIZE, badCharacterTable.length);
  }
  const M = pattern.length;
  const N = text.length;
  if (M === 0) {
    return None;
  }
  let t = fromIndex;
  while (t + M <= N) {
    let p = M - 1;
    while (text[t + p] === pattern[p]) {
      if (p === 0) {
        return Some(t);
      }
      p--;
    }
    // Measured from the failing position, so a table entry of 0 still advances the window.
    const shift = badCharacterTable[text[t + p]] - (M - 1 - p);
    t += Math.max(1, shift);
  }
  return None;
}
export { bmhSearch };
