export { UintN, popcount } from './UintN';
export type { FormatOptions, PositiveWidth } from './UintN';
export { setDebugAssertions, debugAssertionsEnabled } from './debug';
export { parseBinaryLiteral } from './literal';
export { evaluate } from './evaluate';
export { u8, u16, u32, u64, popcount32, isWordName } from './words';
export type { Word, WordName, WordType } from './words';
