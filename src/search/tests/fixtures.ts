const SENTENCE = 'the dog is very dead then';
const SENTENCE_CASES: readonly (readonly [string, number | null])[] = [
  ['the', 0],
  ['the dog is', 0],
  ['he ', 1],
  ['dog', 4],
  ['dead', 16],
  ['then', 21],
  ['frank', null],
];
// Reading an index outside [0, length) fails the test instead of yielding undefined.
function makeBoundsCheckedSequence<S extends ArrayLike<unknown> & object>(sequence: S): S {
  return new Proxy(sequence, {
    get(target, property) {
      if (typeof property === 'string' && /^\d+$/.test(property) && Number(property) >= target.length) {
        throw new RangeError(`read past the end of the text at ${property}`);
      }
      return Reflect.get(target, property);
    },
  });
}
export { SENTENCE, SENTENCE_CASES, makeBoundsCheckedSequence };
