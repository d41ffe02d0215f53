import { UintN } from './UintN';
import { u8, u16, u32 } from './words/numberWords';
import { u64 } from './words/bigintWords';
import type { Word, WordName } from './words/WordType';

function parseCount(op: string, arg: string | undefined): number {
  const n = arg === undefined || arg === '' ? NaN : Number(arg);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`evaluate: '${op}' needs a non-negative integer argument`);
  }
  return n;
}

function run<W extends Word>(x: UintN<number, W>, ops: readonly string[]): string[] {
  const lines = [`init  ${x.toString()}`];

  for (const op of ops) {
    const sep = op.indexOf(':');
    const name = sep === -1 ? op : op.slice(0, sep);
    const arg = sep === -1 ? undefined : op.slice(sep + 1);

    switch (name) {
      case 'shl':
        x.shiftLeftAssign(parseCount(op, arg));
        break;
      case 'and':
        if (arg === undefined) throw new Error(`evaluate: '${op}' needs a literal argument`);
        x.andAssign(UintN.parse(x.width, arg, x.wordType));
        break;
      case 'dec':
        x.decrement();
        break;
      case 'set':
        x.set(parseCount(op, arg));
        break;
      case 'unset':
        x.unset(parseCount(op, arg));
        break;
      case 'test':
        lines.push(`${op}  ${x.test(parseCount(op, arg))}`);
        continue;
      case 'popcount':
        lines.push(`${op}  ${x.popcount()}`);
        continue;
      default:
        throw new Error(`evaluate: unknown operation '${op}'`);
    }
    lines.push(`${op}  ${x.toString()}`);
  }
  return lines;
}

/**
 * Apply a sequence of textual operations to a value parsed from `literal`
 * and return one output line per step.
 *
 * Operations: `shl:<n>`, `and:<literal>`, `dec`, `set:<pos>`, `unset:<pos>`,
 * `test:<pos>`, `popcount`. `test` and `popcount` report without modifying.
 */
export function evaluate(
  width: number, wordName: WordName, literal: string, ops: readonly string[],
): string[] {
  switch (wordName) {
    case 'u8':
      return run(UintN.parse(width, literal, u8), ops);
    case 'u16':
      return run(UintN.parse(width, literal, u16), ops);
    case 'u32':
      return run(UintN.parse(width, literal, u32), ops);
    case 'u64':
      return run(UintN.parse(width, literal, u64), ops);
  }
}
