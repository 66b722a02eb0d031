import { describe, expect, test } from '@jest/globals';
import { BAD_CHARACTER_TABLE_SIZE, buildBadCharacterTable } from '../BadCharacterTable';
import { encodeUtf8 } from '../Sequence';
describe('buildBadCharacterTable', () => {
  test('keeps the shift of the rightmost occurrence', () => {
    const table = buildBadCharacterTable(encodeUtf8('abca'));
    expect(table.length).toBe(BAD_CHARACTER_TABLE_SIZE);
    expect(table[0x61]).toBe(0);
    expect(table[0x62]).toBe(2);
    expect(table[0x63]).toBe(1);
    table.forEach((shift, byte) => {
      if (byte < 0x61 || byte > 0x63) {
        expect(shift).toBe(4);
      }
    });
  });
  test('empty pattern gives a table of zeros', () => {
    const table = buildBadCharacterTable(new Uint8Array(0));
    expect(table.length).toBe(BAD_CHARACTER_TABLE_SIZE);
    expect(table.every((shift) => shift === 0)).toBe(true);
  });
  test('entries stay within [0, m]', () => {
    const pattern = Uint8Array.from([0, 255, 7, 7, 0, 128]);
    const table = buildBadCharacterTable(pattern);
    expect(table[0]).toBe(1);
    expect(table[255]).toBe(4);
    expect(table[7]).toBe(2);
    expect(table[128]).toBe(0);
    expect(table.every((shift) => shift >= 0 && shift <= pattern.length)).toBe(true);
  });
  test('the table is read-only', () => {
    expect(Object.isFrozen(buildBadCharacterTable(encodeUtf8('ab')))).toBe(true);
  });
});
