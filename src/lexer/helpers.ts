/**
 * Lexer Helper Functions
 * ASCII character classification
 */

export type CharPredicate = (ch: string) => boolean;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9' && ch.length === 1;
}

export function isNonZeroDigit(ch: string): boolean {
  return isDigit(ch) && ch !== '0';
}

export function isLetter(ch: string): boolean {
  return (
    ch.length === 1 && ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z'))
  );
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch) || ch === '-';
}

/** Space, backspace, newline, carriage return and tab; nothing else */
export function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' || ch === '\b' || ch === '\n' || ch === '\r' || ch === '\t'
  );
}

export function isSign(ch: string): boolean {
  return ch === '+' || ch === '-';
}

export function isLineBreak(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

/** Letters allowed after a backslash in a character literal */
export const isCharacterEscape = oneOf('bnrt\'"\\');

/** String escapes also accept an escaped space */
export const isStringEscape = oneOf('bnrt\'"\\ ');

/** Predicate matching exactly `expected` */
export function is(expected: string): CharPredicate {
  return (ch) => ch === expected;
}

/** Predicate matching any single character of `chars` */
export function oneOf(chars: string): CharPredicate {
  return (ch) => ch.length === 1 && chars.includes(ch);
}

/** Predicate matching any single character rejected by every `predicates` */
export function noneOf(...predicates: CharPredicate[]): CharPredicate {
  return (ch) => ch.length === 1 && !predicates.some((p) => p(ch));
}
