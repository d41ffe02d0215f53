export { parseBinaryLiteral } from './parseBinaryLiteral';
