/**
 * Token Readers
 * One reader per token kind. Each expects the cursor mark at the token start.
 */

import type { Token } from '../token-types.js';
import { TOKEN_KINDS } from '../token-types.js';
import {
  advance,
  emit,
  has,
  matchPattern,
  peekChar,
  type Cursor,
} from './cursor.js';
import { lexerError } from './errors.js';
import {
  is,
  isCharacterEscape,
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isLineBreak,
  isNonZeroDigit,
  isSign,
  isStringEscape,
  noneOf,
  type CharPredicate,
} from './helpers.js';
import { TWO_CHAR_OPERATORS } from './operators.js';

const isSingleQuote = is("'");

/** Raw character allowed as the body of a character literal */
const isCharacterBody = noneOf(isSingleQuote, is('\\'), isLineBreak);

/** Raw character allowed inside a string literal */
const isStringBody = noneOf(is('"'), is('\\'), isLineBreak);

// Single-character patterns, shared so matching allocates nothing
const IDENTIFIER_START = [isIdentifierStart] as const;
const IDENTIFIER_CHAR = [isIdentifierChar] as const;
const SIGN = [isSign] as const;
const ZERO = [is('0')] as const;
const NON_ZERO_DIGIT = [isNonZeroDigit] as const;
const DIGIT = [isDigit] as const;
const DOT = [is('.')] as const;
const SINGLE_QUOTE = [isSingleQuote] as const;
const DOUBLE_QUOTE = [is('"')] as const;
const BACKSLASH = [is('\\')] as const;
const CHARACTER_BODY = [isCharacterBody] as const;
const STRING_BODY = [isStringBody] as const;
const CHARACTER_ESCAPE = [isCharacterEscape] as const;
const STRING_ESCAPE = [isStringEscape] as const;

export function readIdentifier(cursor: Cursor): Token {
  if (!matchPattern(cursor, IDENTIFIER_START)) {
    throw lexerError(cursor, 'IMP-L008', {
      token: 'identifier',
      expected: 'a letter or underscore',
    });
  }
  while (matchPattern(cursor, IDENTIFIER_CHAR)) {
    // greedy
  }
  return emit(cursor, TOKEN_KINDS.IDENTIFIER);
}

export function readNumber(cursor: Cursor): Token {
  const sign = peekChar(cursor);
  const signed = matchPattern(cursor, SIGN);

  // Integer part: a lone 0, or digits without a leading zero
  if (!matchPattern(cursor, ZERO)) {
    if (!matchPattern(cursor, NON_ZERO_DIGIT)) {
      throw lexerError(cursor, 'IMP-L006', {
        sign: signed ? `'${sign}'` : 'start of number',
      });
    }
    while (matchPattern(cursor, DIGIT)) {
      // greedy
    }
  }

  if (!matchPattern(cursor, DOT)) {
    return emit(cursor, TOKEN_KINDS.INTEGER);
  }

  if (!matchPattern(cursor, DIGIT)) {
    throw lexerError(cursor, 'IMP-L007', {
      value: cursor.source.slice(cursor.markStart, cursor.index),
    });
  }
  while (matchPattern(cursor, DIGIT)) {
    // greedy
  }
  return emit(cursor, TOKEN_KINDS.DECIMAL);
}

export function readCharacter(cursor: Cursor): Token {
  if (!matchPattern(cursor, SINGLE_QUOTE)) {
    throw lexerError(cursor, 'IMP-L008', {
      token: 'character literal',
      expected: "'",
    });
  }

  if (matchPattern(cursor, BACKSLASH)) {
    readEscape(cursor, CHARACTER_ESCAPE, 'IMP-L001');
  } else if (!has(cursor)) {
    throw lexerError(cursor, 'IMP-L001');
  } else if (isSingleQuote(peekChar(cursor))) {
    throw lexerError(cursor, 'IMP-L002');
  } else if (!matchPattern(cursor, CHARACTER_BODY)) {
    throw lexerError(cursor, 'IMP-L003', {
      char: peekChar(cursor) === '\n' ? '\\n' : '\\r',
    });
  }

  if (!matchPattern(cursor, SINGLE_QUOTE)) {
    throw lexerError(cursor, 'IMP-L001');
  }
  return emit(cursor, TOKEN_KINDS.CHARACTER);
}

export function readString(cursor: Cursor): Token {
  if (!matchPattern(cursor, DOUBLE_QUOTE)) {
    throw lexerError(cursor, 'IMP-L008', {
      token: 'string literal',
      expected: '"',
    });
  }

  while (!matchPattern(cursor, DOUBLE_QUOTE)) {
    if (matchPattern(cursor, BACKSLASH)) {
      readEscape(cursor, STRING_ESCAPE, 'IMP-L005');
    } else if (!matchPattern(cursor, STRING_BODY)) {
      // End of input, or a raw line break
      throw lexerError(cursor, 'IMP-L005');
    }
  }
  return emit(cursor, TOKEN_KINDS.STRING);
}

/**
 * Consume the letter after a backslash. End of input raises
 * `unterminatedId` for the enclosing literal.
 */
function readEscape(
  cursor: Cursor,
  escape: readonly CharPredicate[],
  unterminatedId: string
): void {
  if (!has(cursor)) {
    throw lexerError(cursor, unterminatedId);
  }
  if (!matchPattern(cursor, escape)) {
    throw lexerError(cursor, 'IMP-L004', { char: peekChar(cursor) });
  }
}

export function readOperator(cursor: Cursor): Token {
  if (!TWO_CHAR_OPERATORS.some((patterns) => matchPattern(cursor, patterns))) {
    advance(cursor);
  }
  return emit(cursor, TOKEN_KINDS.OPERATOR);
}
