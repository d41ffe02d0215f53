export type { Word, WordName, WordType } from './WordType';
export { isWordName } from './WordType';
export { u8, u16, u32 } from './numberWords';
export { u64 } from './bigintWords';
export { popcount32 } from './popcount32';
