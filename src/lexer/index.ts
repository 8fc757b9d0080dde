/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError, type LexerErrorData } from './errors.js';
export {
  advance,
  createCursor,
  currentLocation,
  emit,
  has,
  matchPattern,
  peekChar,
  peekPattern,
  resetMark,
  type Cursor,
} from './cursor.js';
export {
  is,
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isLetter,
  isWhitespace,
  noneOf,
  oneOf,
  type CharPredicate,
} from './helpers.js';
export { lex, lexToken, type LexOptions } from './tokenizer.js';
