import { generate, type Parser } from 'peggy';
import { BINARY_LITERAL_GRAMMAR } from './grammar';

let cachedParser: Parser | null = null;

function getParser(): Parser {
  if (!cachedParser) {
    cachedParser = generate(BINARY_LITERAL_GRAMMAR);
  }
  return cachedParser;
}

/**
 * Parse a grouped binary literal into its bare digit string, MSB first.
 *
 * Groups of `0`/`1` digits may be separated by single `'` characters,
 * the separator `UintN.prototype.toString` emits between words.
 *
 * @throws peggy `SyntaxError` (with location) if the input is malformed
 */
export function parseBinaryLiteral(input: string): string {
  const result: unknown = getParser().parse(input);
  if (typeof result !== 'string') {
    throw new Error(`parseBinaryLiteral: expected a digit string, got ${typeof result}`);
  }
  return result;
}
