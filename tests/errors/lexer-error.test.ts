/**
 * Error Tests: ImpError and LexerError
 */

import { describe, expect, it } from 'vitest';
import {
  ERROR_REGISTRY,
  ImpError,
  lex,
  LexerError,
  type SourceLocation,
} from '../../src/index.js';
import { catchLexerError } from '../helpers/lexer.js';

const location: SourceLocation = { line: 1, column: 5, offset: 4 };

describe('ImpError', () => {
  it('appends the location to the message', () => {
    const error = new ImpError({
      errorId: 'IMP-L001',
      message: 'Test error',
      location,
    });
    expect(error.message).toBe('Test error at 1:5');
    expect(error.name).toBe('ImpError');
  });

  it('omits the suffix without a location', () => {
    const error = new ImpError({ errorId: 'IMP-L001', message: 'Test error' });
    expect(error.message).toBe('Test error');
  });

  it('strips the location suffix from structured data', () => {
    const error = new ImpError({
      errorId: 'IMP-L005',
      message: 'Unterminated string literal',
      location,
      context: { quote: '"' },
    });
    expect(error.toData()).toEqual({
      errorId: 'IMP-L005',
      message: 'Unterminated string literal',
      location,
      context: { quote: '"' },
    });
  });

  it('formats with a host formatter', () => {
    const error = new ImpError({
      errorId: 'IMP-L002',
      message: 'Empty character literal',
      location,
    });
    expect(error.format()).toBe('Empty character literal at 1:5');
    expect(
      error.format((data) => `[${data.errorId}] ${data.message}`)
    ).toBe('[IMP-L002] Empty character literal');
  });

  it('requires an errorId', () => {
    expect(() => new ImpError({ errorId: '', message: 'x' })).toThrow(
      'errorId is required'
    );
  });

  it('rejects unknown error IDs', () => {
    expect(() => new ImpError({ errorId: 'IMP-X999', message: 'x' })).toThrow(
      TypeError
    );
    expect(() => new ImpError({ errorId: 'IMP-X999', message: 'x' })).toThrow(
      'Unknown error ID: IMP-X999'
    );
  });
});

describe('LexerError', () => {
  it('exposes the failure offset', () => {
    const error = new LexerError('IMP-L005', 'Unterminated string literal', {
      line: 2,
      column: 3,
      offset: 13,
    });
    expect(error.offset).toBe(13);
    expect(error.location).toEqual({ line: 2, column: 3, offset: 13 });
    expect(error.message).toBe('Unterminated string literal at 2:3');
  });

  it('is an ImpError', () => {
    const error = new LexerError('IMP-L001', 'Test error', location);
    expect(error).toBeInstanceOf(ImpError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('LexerError');
  });

  it('keeps optional context', () => {
    const context = { char: 'x' };
    const error = new LexerError(
      'IMP-L004',
      'Invalid escape sequence',
      location,
      context
    );
    expect(error.context).toEqual(context);
  });

  it('rejects unknown error IDs', () => {
    expect(() => new LexerError('INVALID', 'Test error', location)).toThrow(
      'Unknown error ID: INVALID'
    );
  });

  it('accepts every registered error ID', () => {
    for (const [errorId] of ERROR_REGISTRY.entries()) {
      expect(new LexerError(errorId, 'Test error', location).errorId).toBe(
        errorId
      );
    }
  });

  it('includes the offset in structured data', () => {
    const error = new LexerError('IMP-L002', 'Empty character literal', location);
    expect(error.toData()).toEqual({
      errorId: 'IMP-L002',
      message: 'Empty character literal',
      location,
      context: undefined,
      offset: 4,
    });
  });

  it('reports the failing offset in data from lex', () => {
    const data = catchLexerError(() => lex('"unterminated')).toData();
    expect(data.offset).toBe(13);
    expect(data.message).toBe('Unterminated string literal');
  });
});
