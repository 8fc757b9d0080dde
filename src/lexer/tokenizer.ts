/**
 * Tokenizer
 * Main tokenization logic
 */

import type { SourceLocation } from '../source-location.js';
import type { Token } from '../token-types.js';
import {
  advance,
  createCursor,
  has,
  peekChar,
  peekPattern,
  resetMark,
  type Cursor,
} from './cursor.js';
import { lexerError } from './errors.js';
import {
  is,
  isDigit,
  isIdentifierStart,
  isSign,
  isWhitespace,
} from './helpers.js';
import {
  readCharacter,
  readIdentifier,
  readNumber,
  readOperator,
  readString,
} from './readers.js';

// Dispatch lookahead patterns
const IDENTIFIER_START = [isIdentifierStart] as const;
const DIGIT = [isDigit] as const;
const SIGNED_DIGIT = [isSign, isDigit] as const;
const SINGLE_QUOTE = [is("'")] as const;
const DOUBLE_QUOTE = [is('"')] as const;

function skipWhitespace(cursor: Cursor): void {
  while (has(cursor) && isWhitespace(peekChar(cursor))) {
    advance(cursor);
    resetMark(cursor);
  }
}

/**
 * Lex exactly one token at the cursor. Picks the reader by lookahead only;
 * the cursor must sit on a non-whitespace character.
 */
export function lexToken(cursor: Cursor): Token {
  if (!has(cursor) || isWhitespace(peekChar(cursor))) {
    throw lexerError(cursor, 'IMP-L009', {
      found: has(cursor) ? 'whitespace' : 'end of input',
    });
  }

  if (peekPattern(cursor, IDENTIFIER_START)) {
    return readIdentifier(cursor);
  }
  if (peekPattern(cursor, DIGIT) || peekPattern(cursor, SIGNED_DIGIT)) {
    return readNumber(cursor);
  }
  if (peekPattern(cursor, SINGLE_QUOTE)) {
    return readCharacter(cursor);
  }
  if (peekPattern(cursor, DOUBLE_QUOTE)) {
    return readString(cursor);
  }
  return readOperator(cursor);
}

export interface LexOptions {
  /** Position of the input inside an enclosing document */
  baseLocation?: SourceLocation | undefined;
}

/**
 * Tokenize the whole input. Throws LexerError on the first invalid
 * construct; no partial result is returned.
 */
export function lex(input: string, options?: LexOptions): Token[] {
  const cursor = createCursor(input, options?.baseLocation);
  const tokens: Token[] = [];

  while (has(cursor)) {
    skipWhitespace(cursor);
    if (has(cursor)) {
      tokens.push(lexToken(cursor));
    }
  }

  return tokens;
}
