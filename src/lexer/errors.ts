/**
 * Lexer Errors
 */

import { ImpError, type ImpErrorData } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import type { SourceLocation } from '../source-location.js';
import { currentLocation, type Cursor } from './cursor.js';

/** Structured lexer error data; `offset` is the failing character index */
export interface LexerErrorData extends ImpErrorData {
  readonly location: SourceLocation;
  readonly offset: number;
}

export class LexerError extends ImpError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ errorId, message, location, context });

    this.name = 'LexerError';
    this.location = location;
  }

  /** Character index at which lexing became invalid */
  get offset(): number {
    return this.location.offset;
  }

  override toData(): LexerErrorData {
    return { ...super.toData(), location: this.location, offset: this.offset };
  }
}

/**
 * Build a LexerError at the cursor's read position, rendering the
 * registry template for `errorId` with `context`.
 */
export function lexerError(
  cursor: Cursor,
  errorId: string,
  context: Record<string, unknown> = {}
): LexerError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  const message = renderMessage(definition.messageTemplate, context);
  return new LexerError(errorId, message, currentLocation(cursor), context);
}
