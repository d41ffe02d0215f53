import { popcount32 } from './popcount32';
import type { WordType } from './WordType';

function numberWord(name: 'u8' | 'u16' | 'u32', bits: 8 | 16 | 32): WordType<number> {
  // `>>> 0` keeps results unsigned; JS bitwise operators work on int32.
  const mask = bits === 32 ? 0xffffffff : (1 << bits) - 1;
  const lowMask = (count: number): number =>
    count >= 32 ? 0xffffffff : ((1 << count) - 1) >>> 0;

  return {
    name,
    bits,
    zero: 0,
    one: 1,
    and: (a, b) => (a & b) >>> 0,
    or: (a, b) => (a | b) >>> 0,
    not: a => (~a & mask) >>> 0,
    shl: (a, n) => ((a << n) & mask) >>> 0,
    shr: (a, n) => a >>> n,
    dec: a => ((a - 1) & mask) >>> 0,
    isZero: a => a === 0,
    popcount: popcount32,
    lowMask,
    fits: a => Number.isInteger(a) && a >= 0 && a <= mask,
    toBinary: (a, digits) => ((a & lowMask(digits)) >>> 0).toString(2).padStart(digits, '0'),
  };
}

/** 8-bit word backed by `number`. */
export const u8: WordType<number> = numberWord('u8', 8);

/** 16-bit word backed by `number`. */
export const u16: WordType<number> = numberWord('u16', 16);

/** 32-bit word backed by `number`. */
export const u32: WordType<number> = numberWord('u32', 32);
