/**
 * Error Tests: Registry and Message Rendering
 */

import { describe, expect, it } from 'vitest';
import { ERROR_REGISTRY, lex, renderMessage } from '../../src/index.js';
import { catchLexerError } from '../helpers/lexer.js';

describe('Error Registry', () => {
  it('holds the lexer error catalogue', () => {
    expect(ERROR_REGISTRY.size).toBe(9);
    expect(ERROR_REGISTRY.has('IMP-L001')).toBe(true);
    expect(ERROR_REGISTRY.has('IMP-L010')).toBe(false);
  });

  it('uses IMP-L### identifiers in the lexer category', () => {
    for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
      expect(errorId).toMatch(/^IMP-L\d{3}$/);
      expect(definition.errorId).toBe(errorId);
      expect(definition.category).toBe('lexer');
    }
  });

  it('documents cause, resolution and examples for every entry', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.description.length).toBeLessThanOrEqual(50);
      expect(definition.cause).toBeTruthy();
      expect(definition.resolution).toBeTruthy();
      expect(definition.examples?.length ?? 0).toBeGreaterThan(0);
    }
  });

  it('raises each literal and number error from its own examples', () => {
    for (const errorId of [
      'IMP-L001',
      'IMP-L002',
      'IMP-L003',
      'IMP-L004',
      'IMP-L005',
      'IMP-L007',
    ]) {
      for (const example of ERROR_REGISTRY.get(errorId)?.examples ?? []) {
        expect(catchLexerError(() => lex(example.code)).errorId).toBe(errorId);
      }
    }
  });

  it('returns undefined for unknown IDs', () => {
    expect(ERROR_REGISTRY.get('IMP-X999')).toBeUndefined();
  });

  it('describes each error', () => {
    expect(ERROR_REGISTRY.get('IMP-L005')?.description).toBe(
      'Unterminated string literal'
    );
  });
});

describe('renderMessage', () => {
  it('substitutes placeholders', () => {
    expect(renderMessage('Hello {name}', { name: 'x' })).toBe('Hello x');
  });

  it('coerces non-string values', () => {
    expect(renderMessage('{n} items', { n: 3 })).toBe('3 items');
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('Hello {name}', {})).toBe('Hello ');
  });

  it('returns the template unchanged for an unclosed brace', () => {
    expect(renderMessage('Hello {name', { name: 'x' })).toBe('Hello {name');
  });

  it('keeps doubled braces literally', () => {
    expect(renderMessage('{{literal}}', { literal: 'x' })).toBe('{{literal}}');
  });

  it('renders a backslash before a placeholder', () => {
    expect(
      renderMessage(ERROR_REGISTRY.get('IMP-L004')?.messageTemplate ?? '', {
        char: 'q',
      })
    ).toBe('Invalid escape sequence: \\q');
  });
});
