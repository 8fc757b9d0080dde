/**
 * imp-lex
 * Lexer for a small imperative language
 */

export {
  advance,
  createCursor,
  currentLocation,
  emit,
  has,
  is,
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isLetter,
  isWhitespace,
  lex,
  lexToken,
  LexerError,
  type LexerErrorData,
  matchPattern,
  noneOf,
  oneOf,
  peekChar,
  peekPattern,
  resetMark,
  type CharPredicate,
  type Cursor,
  type LexOptions,
} from './lexer/index.js';
export {
  makeToken,
  TOKEN_KINDS,
  tokensEqual,
  type Token,
  type TokenKind,
} from './token-types.js';
export { START_LOCATION, type SourceLocation } from './source-location.js';
export { ImpError, type ImpErrorData } from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
