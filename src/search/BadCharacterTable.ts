import { ByteSequence } from './Sequence';
const BAD_CHARACTER_TABLE_SIZE = 256;
type BadCharacterTable = readonly number[];
// Later positions overwrite earlier ones, so each byte ends up with the shift of its rightmost occurrence.
function buildBadCharacterTable(pattern: ByteSequence): BadCharacterTable {
  const M = pattern.length;
  const table = new Array<number>(BAD_CHARACTER_TABLE_SIZE).fill(M);
  for (let i = 0; i < M; i++) {
    table[pattern[i]] = M - 1 - i;
  }
  return Object.freeze(table);
}
export { BAD_CHARACTER_TABLE_SIZE, type BadCharacterTable, buildBadCharacterTable };
