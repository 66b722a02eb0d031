export { type BadCharacterTable, BAD_CHARACTER_TABLE_SIZE, buildBadCharacterTable } from './BadCharacterTable';
export { bmhSearch } from './Bmh';
export { type BorderTable, buildBorderTable } from './BorderTable';
export { TableMismatchError, UnsupportedAlgorithmError } from './errors';
export { kmpSearch } from './Kmp';
export { linearSearch } from './LinearSearch';
export { Pattern, BytePattern } from './Pattern';
export { SearchAlgorithm } from './SearchAlgorithm';
export { type ByteSequence, type ElementEquals, type ElementSequence, encodeUtf8, strictEquals, toScalarValues } from './Sequence';
export { maybeToIndexOrMinusOne } from './result';
