/** Storage primitive for one word: `number` for widths up to 32 bits, `bigint` above. */
export type Word = number | bigint;

export type WordName = 'u8' | 'u16' | 'u32' | 'u64';

/**
 * Descriptor of an unsigned machine word.
 * Every operation returns a value kept inside `[0, 2^bits)`.
 */
export interface WordType<W extends Word> {
  readonly name: WordName;
  /** Bits per word. */
  readonly bits: number;
  readonly zero: W;
  readonly one: W;

  and(a: W, b: W): W;
  or(a: W, b: W): W;
  not(a: W): W;
  /** Shift left by `n` bits, `0 <= n < bits`. High bits are discarded. */
  shl(a: W, n: number): W;
  /** Logical shift right by `n` bits, `0 <= n < bits`. */
  shr(a: W, n: number): W;
  /** `a - 1` modulo `2^bits`. */
  dec(a: W): W;
  isZero(a: W): boolean;
  popcount(a: W): number;
  /** Word with the low `count` bits set, `1 <= count <= bits`. */
  lowMask(count: number): W;
  /** Whether `a` is a valid value of this word type. */
  fits(a: W): boolean;
  /** The low `digits` bits of `a` as exactly `digits` binary characters. */
  toBinary(a: W, digits: number): string;
}

const WORD_NAMES: readonly WordName[] = ['u8', 'u16', 'u32', 'u64'];

/** Type guard for word type names accepted on the command line. */
export function isWordName(value: string): value is WordName {
  return WORD_NAMES.some(name => name === value);
}
