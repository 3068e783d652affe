export { Parser, parse } from './parser';
export { ParserError } from './parser-error';
export type { ParserErrorKind } from './parser-error';
