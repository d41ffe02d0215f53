import { popcount32 } from './popcount32';
import type { WordType } from './WordType';

const MASK_64 = (1n << 64n) - 1n;
const LOW_32 = 0xffffffffn;

function lowMask(count: number): bigint {
  return (1n << BigInt(count)) - 1n;
}

/**
 * 64-bit word backed by `bigint`. Default word type of `UintN`.
 * Population count runs on two 32-bit lanes.
 */
export const u64: WordType<bigint> = {
  name: 'u64',
  bits: 64,
  zero: 0n,
  one: 1n,
  and: (a, b) => a & b,
  or: (a, b) => a | b,
  not: a => ~a & MASK_64,
  shl: (a, n) => (a << BigInt(n)) & MASK_64,
  shr: (a, n) => a >> BigInt(n),
  // two's complement bigint: (0n - 1n) & MASK_64 is all ones
  dec: a => (a - 1n) & MASK_64,
  isZero: a => a === 0n,
  popcount: a => popcount32(Number(a & LOW_32)) + popcount32(Number((a >> 32n) & LOW_32)),
  lowMask,
  fits: a => a >= 0n && a <= MASK_64,
  toBinary: (a, digits) => (a & lowMask(digits)).toString(2).padStart(digits, '0'),
};
