import { Lazy } from '../common/Lazy';
import { Maybe } from '../common/maybe';
import { assert, assertUnreachable } from '../common/util';
import { BadCharacterTable, buildBadCharacterTable } from './BadCharacterTable';
import { bmhSearch } from './Bmh';
import { BorderTable, buildBorderTable } from './BorderTable';
import { UnsupportedAlgorithmError } from './errors';
import { kmpSearch } from './Kmp';
import { linearSearch } from './LinearSearch';
import { SearchAlgorithm } from './SearchAlgorithm';
import { ByteSequence, ElementEquals, ElementSequence, encodeUtf8, strictEquals, toScalarValues } from './Sequence';
class Pattern<T> {
  private $p_elements: readonly T[];
  private $p_equals: ElementEquals<T>;
  private $p_borderTable: Lazy<BorderTable>;
  constructor(elements: ElementSequence<T>, equals: ElementEquals<T> = strictEquals) {
    this.$p_elements = Object.freeze(Array.from(elements));
    this.$p_equals = equals;
    this.$p_borderTable = new Lazy(() => buildBorderTable(this.$p_elements, this.$p_equals));
  }
  static fromString(text: string): Pattern<string> {
    return new Pattern(toScalarValues(text));
  }
  get length(): number {
    return this.$p_elements.length;
  }
  get elements(): readonly T[] {
    return this.$p_elements;
  }
  get borderTable(): BorderTable {
    return this.$p_borderTable.value;
  }
  get isBorderTableComputed(): boolean {
    return this.$p_borderTable.isComputed;
  }
  linear(text: ElementSequence<T>, fromIndex = 0): Maybe<number> {
    return linearSearch(this.$p_elements, text, this.$p_equals, fromIndex);
  }
  kmp(text: ElementSequence<T>, fromIndex = 0): Maybe<number> {
    return kmpSearch(this.$p_elements, text, this.borderTable, this.$p_equals, fromIndex);
  }
  search(text: ElementSequence<T>, algorithm: SearchAlgorithm, fromIndex = 0): Maybe<number> {
    switch (algorithm) {
      case SearchAlgorithm.Linear: {
        return this.linear(text, fromIndex);
      }
      case SearchAlgorithm.Kmp: {
        return this.kmp(text, fromIndex);
      }
      case SearchAlgorithm.Bmh: {
        return this.$p_searchBmh(text, fromIndex);
      }
      default: {
        assertUnreachable(algorithm);
      }
    }
  }
  protected $p_searchBmh(_text: ElementSequence<T>, _fromIndex: number): Maybe<number> {
    throw new UnsupportedAlgorithmError(SearchAlgorithm.Bmh);
  }
}
function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}
function toByteSequence(sequence: ElementSequence<number>): ByteSequence {
  if (sequence instanceof Uint8Array) {
    return sequence;
  }
  const bytes = new Uint8Array(sequence.length);
  for (let i = 0; i < sequence.length; i++) {
    const value = sequence[i];
    assert(isByte(value), `element ${i} is not a byte: ${value}`);
    bytes[i] = value;
  }
  return bytes;
}
/**
 * A pattern over bytes, which adds Boyer-Moore-Horspool search. Results are byte offsets, so they only line up
 * with the code-point offsets of a `Pattern<string>` when the text is ASCII.
 */
class BytePattern extends Pattern<number> {
  private $p_bytes: ByteSequence;
  private $p_badCharacterTable: Lazy<BadCharacterTable>;
  constructor(bytes: ElementSequence<number>) {
    const ownBytes = Uint8Array.from(toByteSequence(bytes));
    super(ownBytes);
    this.$p_bytes = ownBytes;
    this.$p_badCharacterTable = new Lazy(() => buildBadCharacterTable(this.$p_bytes));
  }
  static fromUtf8(text: string): BytePattern {
    return new BytePattern(encodeUtf8(text));
  }
  get badCharacterTable(): BadCharacterTable {
    return this.$p_badCharacterTable.value;
  }
  get isBadCharacterTableComputed(): boolean {
    return this.$p_badCharacterTable.isComputed;
  }
  bmh(text: ByteSequence, fromIndex = 0): Maybe<number> {
    return bmhSearch(this.$p_bytes, text, this.badCharacterTable, fromIndex);
  }
  protected override $p_searchBmh(text: ElementSequence<number>, fromIndex: number): Maybe<number> {
    return this.bmh(toByteSequence(text), fromIndex);
  }
}
export { Pattern, BytePattern };
