import { Maybe, None, Some } from '../common/maybe';
import { ElementEquals, ElementSequence, assertValidFromIndex, strictEquals } from './Sequence';
function linearSearch<T>(
  pattern: ElementSequence<T>,
  text: ElementSequence<T>,
  equals: ElementEquals<T> = strictEquals,
  fromIndex = 0,
): Maybe<number> {
  assertValidFromIndex(fromIndex);
  const M = pattern.length;
  const N = text.length;
  // The loop bound keeps every candidate window inside the text.
  candidates: for (let s = fromIndex; s + M <= N; s++) {
    for (let j = 0; j < M; j++) {
      if (!equals(text[s + j], pattern[j])) {
        continue candidates;
      }
    }
    return Some(s);
  }
  return None;
}
export { linearSearch };
