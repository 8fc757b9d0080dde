/**
 * Lexer Cursor
 * Tracks the read position and the start of the pending lexeme
 */

import { START_LOCATION, type SourceLocation } from '../source-location.js';
import { makeToken, type Token, type TokenKind } from '../token-types.js';
import type { CharPredicate } from './helpers.js';

export interface Cursor {
  readonly source: string;
  /** Next character to read */
  index: number;
  /** First character not yet emitted or skipped */
  markStart: number;
  line: number;
  column: number;
  readonly baseOffset: number;
}

export function createCursor(
  source: string,
  baseLocation: SourceLocation = START_LOCATION
): Cursor {
  return {
    source,
    index: 0,
    markStart: 0,
    line: baseLocation.line,
    column: baseLocation.column,
    baseOffset: baseLocation.offset,
  };
}

export function currentLocation(cursor: Cursor): SourceLocation {
  return {
    line: cursor.line,
    column: cursor.column,
    offset: cursor.index + cursor.baseOffset,
  };
}

export function has(cursor: Cursor, offset = 0): boolean {
  return cursor.index + offset < cursor.source.length;
}

/** Character `offset` places ahead, or '' past the end */
export function peekChar(cursor: Cursor, offset = 0): string {
  return cursor.source.charAt(cursor.index + offset);
}

export function advance(cursor: Cursor): string {
  const ch = cursor.source.charAt(cursor.index);
  cursor.index++;
  if (ch === '\n') {
    cursor.line++;
    cursor.column = 1;
  } else {
    cursor.column++;
  }
  return ch;
}

export function resetMark(cursor: Cursor): void {
  cursor.markStart = cursor.index;
}

/** Emit everything consumed since the mark as one token */
export function emit(cursor: Cursor, kind: TokenKind): Token {
  const token = makeToken(
    kind,
    cursor.source.slice(cursor.markStart, cursor.index),
    cursor.markStart + cursor.baseOffset
  );
  resetMark(cursor);
  return token;
}

/**
 * True when the next `patterns.length` characters exist and each satisfies
 * the predicate at the same position. Consumes nothing.
 */
export function peekPattern(
  cursor: Cursor,
  patterns: readonly CharPredicate[]
): boolean {
  for (let i = 0; i < patterns.length; i++) {
    const pattern = patterns[i];
    if (!pattern || !has(cursor, i) || !pattern(peekChar(cursor, i))) {
      return false;
    }
  }
  return true;
}

/** peekPattern, consuming the matched characters on success */
export function matchPattern(
  cursor: Cursor,
  patterns: readonly CharPredicate[]
): boolean {
  if (!peekPattern(cursor, patterns)) {
    return false;
  }
  for (let i = 0; i < patterns.length; i++) advance(cursor);
  return true;
}
