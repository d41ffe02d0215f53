import { debugAssert } from './debug';
import { parseBinaryLiteral } from './literal/parseBinaryLiteral';
import { u64 } from './words/bigintWords';
import type { Word, WordType } from './words/WordType';

/**
 * Bit width accepted by the `UintN` factories. A literal `0` or negative
 * width resolves to `never` and fails to compile; widths only known at
 * runtime are checked when the value is created.
 */
export type PositiveWidth<N extends number> = N &
  (number extends N ? unknown : `${N}` extends '0' | `-${string}` ? never : unknown);

export interface FormatOptions {
  /** Inserted between words. Defaults to `'`. */
  separator?: string;
}

function checkWidth(width: number): void {
  if (!Number.isInteger(width) || width <= 0) {
    throw new RangeError(`UintN: width must be a positive integer, got ${width}`);
  }
}

/**
 * Unsigned integer of exactly `N` bits, packed into a fixed number of words.
 *
 * Words are stored most significant first: `words()[0]` holds the highest
 * bits. When `N` is not a multiple of the word size, the bits of the first
 * word at or above `N % bits` are filler. Shifts, AND, decrement and
 * set/unset leave filler as it falls; `popcount`, `isZero`, `equals` and
 * formatting mask it out.
 */
export class UintN<N extends number = number, W extends Word = Word> {
  private readonly _width: N;
  private readonly _word: WordType<W>;
  private readonly _words: W[];

  private constructor(width: N, word: WordType<W>, words: W[]) {
    this._width = width;
    this._word = word;
    this._words = words;
  }

  /** All bits clear. Words default to `u64`. */
  static zero<N extends number>(width: PositiveWidth<N>): UintN<N, bigint>;
  static zero<N extends number, W extends Word>(width: PositiveWidth<N>, word: WordType<W>): UintN<N, W>;
  static zero<N extends number, W extends Word>(
    width: N, word?: WordType<W>,
  ): UintN<N, W> | UintN<N, bigint> {
    return word ? UintN.allocate(width, word) : UintN.allocate(width, u64);
  }

  /**
   * Place `x` in the least significant word, all other words zero.
   * `x` is not range-checked against `N`.
   */
  static fromWord<N extends number>(width: PositiveWidth<N>, x: bigint): UintN<N, bigint>;
  static fromWord<N extends number, W extends Word>(
    width: PositiveWidth<N>, x: W, word: WordType<W>,
  ): UintN<N, W>;
  static fromWord<N extends number, W extends Word>(
    width: N, x: W, word?: WordType<W>,
  ): UintN<N, W> | UintN<N, bigint> {
    if (word) {
      return UintN.allocate(width, word).setLeastSignificantWord(x);
    }
    if (typeof x !== 'bigint') {
      throw new TypeError(`UintN: u64 words are bigint, got ${typeof x}`);
    }
    return UintN.allocate(width, u64).setLeastSignificantWord(x);
  }

  /**
   * Build from exactly `ceil(N / bits)` words, most significant first.
   * No masking is applied to the first word.
   */
  static fromWords<N extends number>(width: PositiveWidth<N>, words: readonly bigint[]): UintN<N, bigint>;
  static fromWords<N extends number, W extends Word>(
    width: PositiveWidth<N>, words: readonly W[], word: WordType<W>,
  ): UintN<N, W>;
  static fromWords<N extends number, W extends Word>(
    width: N, words: readonly W[], word?: WordType<W>,
  ): UintN<N, W> | UintN<N, bigint> {
    if (word) {
      return UintN.allocate(width, word).assignWords(words);
    }
    if (!words.every((w): w is W & bigint => typeof w === 'bigint')) {
      throw new TypeError('UintN: u64 words are bigint');
    }
    return UintN.allocate(width, u64).assignWords(words);
  }

  /**
   * Build from a grouped binary literal such as `100'10001010`.
   * Group boundaries need not match word boundaries; the literal may
   * have at most `N` digits.
   */
  static parse<N extends number>(width: PositiveWidth<N>, literal: string): UintN<N, bigint>;
  static parse<N extends number, W extends Word>(
    width: PositiveWidth<N>, literal: string, word: WordType<W>,
  ): UintN<N, W>;
  static parse<N extends number, W extends Word>(
    width: N, literal: string, word?: WordType<W>,
  ): UintN<N, W> | UintN<N, bigint> {
    const digits = parseBinaryLiteral(literal);
    const value = word ? UintN.allocate(width, word) : UintN.allocate(width, u64);
    if (digits.length > width) {
      throw new RangeError(
        `UintN: literal has ${digits.length} digits, width is ${width}`,
      );
    }
    for (let i = 0; i < digits.length; i++) {
      if (digits[digits.length - 1 - i] === '1') value.set(i);
    }
    return value;
  }

  private static allocate<N extends number, W extends Word>(width: N, word: WordType<W>): UintN<N, W> {
    checkWidth(width);
    const count = Math.ceil(width / word.bits);
    return new UintN(width, word, new Array<W>(count).fill(word.zero));
  }

  private setLeastSignificantWord(x: W): this {
    debugAssert(() => this._word.fits(x), () => `${String(x)} is not a valid ${this._word.name} word`);
    this._words[this._words.length - 1] = x;
    return this;
  }

  private assignWords(words: readonly W[]): this {
    if (words.length !== this._words.length) {
      throw new RangeError(
        `UintN: width ${this._width} needs ${this._words.length} ${this._word.name} word(s), got ${words.length}`,
      );
    }
    for (let i = 0; i < words.length; i++) {
      const w = words[i];
      debugAssert(() => this._word.fits(w), () => `${String(w)} is not a valid ${this._word.name} word`);
      this._words[i] = w;
    }
    return this;
  }

  /** Number of logical bits. */
  get width(): N {
    return this._width;
  }

  get wordType(): WordType<W> {
    return this._word;
  }

  get wordCount(): number {
    return this._words.length;
  }

  /** Copy of the storage, most significant word first, filler included. */
  words(): W[] {
    return this._words.slice();
  }

  clone(): UintN<N, W> {
    return new UintN(this._width, this._word, this._words.slice());
  }

  /** `this <<= amount`. Bits shifted past the top word are discarded. */
  shiftLeftAssign(amount: number): this {
    debugAssert(
      () => Number.isInteger(amount) && amount >= 0,
      () => `shift amount must be a non-negative integer, got ${amount}`,
    );
    const word = this._word;
    const words = this._words;
    const upper = Math.floor(amount / word.bits);
    const lower = upper + 1;
    const shift = amount % word.bits;

    for (let i = 0; i < words.length; i++) {
      if (i + upper >= words.length) {
        words[i] = word.zero;
        continue;
      }
      words[i] = word.shl(words[i + upper], shift);

      // `x >>> 32` is `x`, not 0: a whole-word shift must not pull in the lower word
      if (shift !== 0 && i + lower < words.length) {
        words[i] = word.or(words[i], word.shr(words[i + lower], word.bits - shift));
      }
    }
    return this;
  }

  /** `this << amount` as a new value. */
  shiftLeft(amount: number): UintN<N, W> {
    return this.clone().shiftLeftAssign(amount);
  }

  /** `this &= rhs`. */
  andAssign(rhs: UintN<N, W>): this {
    debugAssert(
      () => rhs._width === this._width && rhs._word.name === this._word.name,
      () => `cannot AND ${rhs.describe()} into ${this.describe()}`,
    );
    for (let i = 0; i < this._words.length; i++) {
      this._words[i] = this._word.and(this._words[i], rhs._words[i]);
    }
    return this;
  }

  /** `this & rhs` as a new value. */
  and(rhs: UintN<N, W>): UintN<N, W> {
    return this.clone().andAssign(rhs);
  }

  /**
   * Pre-decrement (`--x`): subtract one modulo 2^N, borrowing from the least
   * significant word upwards. Filler bits take part in the borrow.
   */
  decrement(): this {
    const word = this._word;
    for (let i = this._words.length - 1; i >= 0; i--) {
      const before = this._words[i];
      this._words[i] = word.dec(before);
      if (!word.isZero(before)) break;
    }
    return this;
  }

  /** Number of set bits among the `N` logical bits. */
  popcount(): number {
    const word = this._word;
    let count = word.popcount(word.and(this._words[0], this.topMask()));
    for (let i = 1; i < this._words.length; i++) {
      count += word.popcount(this._words[i]);
    }
    return count;
  }

  /** Whether bit `pos` (0 = least significant) is set. */
  test(pos: number): boolean {
    this.checkBitIndex(pos);
    const word = this._word;
    const index = this._words.length - 1 - Math.floor(pos / word.bits);
    return !word.isZero(word.and(this._words[index], word.shl(word.one, pos % word.bits)));
  }

  set(pos: number): this {
    this.checkBitIndex(pos);
    const word = this._word;
    const index = this._words.length - 1 - Math.floor(pos / word.bits);
    this._words[index] = word.or(this._words[index], word.shl(word.one, pos % word.bits));
    return this;
  }

  unset(pos: number): this {
    this.checkBitIndex(pos);
    const word = this._word;
    const index = this._words.length - 1 - Math.floor(pos / word.bits);
    this._words[index] = word.and(this._words[index], word.not(word.shl(word.one, pos % word.bits)));
    return this;
  }

  /** True when every logical bit is clear. */
  isZero(): boolean {
    const word = this._word;
    if (!word.isZero(word.and(this._words[0], this.topMask()))) return false;
    for (let i = 1; i < this._words.length; i++) {
      if (!word.isZero(this._words[i])) return false;
    }
    return true;
  }

  /** Same width, same word type and same logical bits. Filler is ignored. */
  equals(other: UintN<N, W>): boolean {
    if (other._width !== this._width || other._word.name !== this._word.name) return false;
    const word = this._word;
    const mask = this.topMask();
    if (word.and(this._words[0], mask) !== word.and(other._words[0], mask)) return false;
    for (let i = 1; i < this._words.length; i++) {
      if (this._words[i] !== other._words[i]) return false;
    }
    return true;
  }

  /**
   * Exactly `N` binary digits, MSB first, with `separator` between words.
   * The first word contributes only its `N % bits` (or `bits`) low digits.
   */
  format(options: FormatOptions = {}): string {
    const separator = options.separator ?? "'";
    const word = this._word;
    const parts = [word.toBinary(this._words[0], this.topBits())];
    for (let i = 1; i < this._words.length; i++) {
      parts.push(word.toBinary(this._words[i], word.bits));
    }
    return parts.join(separator);
  }

  toString(): string {
    return this.format();
  }

  private topBits(): number {
    return this._width % this._word.bits || this._word.bits;
  }

  private topMask(): W {
    return this._word.lowMask(this.topBits());
  }

  private checkBitIndex(pos: number): void {
    debugAssert(
      () => Number.isInteger(pos) && pos >= 0 && pos < this._width,
      () => `bit index ${pos} out of range [0, ${this._width})`,
    );
  }

  private describe(): string {
    return `uint${this._width}/${this._word.name}`;
  }
}

/** Number of set bits among the `N` logical bits of `x`. */
export function popcount<N extends number, W extends Word>(x: UintN<N, W>): number {
  return x.popcount();
}
