import { assert, isNonNegativeInteger } from '../common/util';
type ElementSequence<T> = ArrayLike<T>;
type ByteSequence = Uint8Array;
type ElementEquals<T> = (a: T, b: T) => boolean;
function strictEquals<T>(a: T, b: T): boolean {
  return a === b;
}
// Code points, so that result indices count characters rather than UTF-16 code units.
function toScalarValues(text: string): string[] {
  return Array.from(text);
}
const utf8Encoder = new TextEncoder();
function encodeUtf8(text: string): ByteSequence {
  return utf8Encoder.encode(text);
}
function assertValidFromIndex(fromIndex: number): void {
  assert(isNonNegativeInteger(fromIndex), `fromIndex must be a non-negative integer, got ${fromIndex}`);
}
export { type ElementSequence, type ByteSequence, type ElementEquals, strictEquals, toScalarValues, encodeUtf8, assertValidFromIndex };
