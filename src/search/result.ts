import { Maybe, unwrapMaybeOr } from '../common/maybe';
function maybeToIndexOrMinusOne(result: Maybe<number>): number {
  return unwrapMaybeOr(result, -1);
}
export { maybeToIndexOrMinusOne };
