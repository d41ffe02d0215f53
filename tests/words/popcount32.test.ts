import { popcount32 } from '../../src/words/popcount32';
import { isWordName } from '../../src/words/WordType';

describe('popcount32', () => {
  it('counts set bits in 32-bit values', () => {
    expect(popcount32(0)).toBe(0);
    expect(popcount32(0b1011)).toBe(3);
    expect(popcount32(0x80000000)).toBe(1);
    expect(popcount32(0x12345678)).toBe(13);
    expect(popcount32(0xffffffff)).toBe(32);
  });
});

describe('isWordName', () => {
  it('recognizes the built-in word types', () => {
    expect(isWordName('u8')).toBe(true);
    expect(isWordName('u64')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isWordName('u128')).toBe(false);
    expect(isWordName('U8')).toBe(false);
  });
});
