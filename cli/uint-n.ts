#!/usr/bin/env npx tsx
/**
 * CLI tool to inspect fixed-width unsigned integers.
 *
 * Usage:
 *   npx tsx cli/uint-n.ts <width> <u8|u16|u32|u64> <literal> [op ...]
 *
 * Ops are applied left to right:
 *   shl:<n>  and:<literal>  dec  set:<pos>  unset:<pos>  test:<pos>  popcount
 *
 * Example:
 *   npx tsx cli/uint-n.ts 11 u8 "101'10001010" unset:0 shl:3 popcount
 *
 * Contract checks (bit index range, shift amount) are always on here.
 */

import { setDebugAssertions } from '../src/debug';
import { evaluate } from '../src/evaluate';
import { isWordName } from '../src/words/WordType';

const USAGE = 'Usage: npx tsx cli/uint-n.ts <width> <u8|u16|u32|u64> <literal> [op ...]';

function main(): void {
  const args = process.argv.slice(2);

  if (args.length < 3) {
    console.error(USAGE);
    process.exit(1);
  }

  const [widthArg, wordArg, literal, ...ops] = args;
  const width = Number(widthArg);

  if (!Number.isInteger(width) || width <= 0) {
    console.error(`Error: width must be a positive integer, got '${widthArg}'`);
    process.exit(1);
  }
  if (!isWordName(wordArg)) {
    console.error(`Error: unknown word type '${wordArg}'`);
    console.error(USAGE);
    process.exit(1);
  }

  setDebugAssertions(true);

  try {
    for (const line of evaluate(width, wordArg, literal, ops)) {
      console.log(line);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main();
