/**
 * Operator Patterns
 * Multi-character operators, tried longest first
 */

import { is, oneOf, type CharPredicate } from './helpers.js';

/** Two-character operators: `&&`, `||`, `!=`, `==`, `<=`, `>=` */
export const TWO_CHAR_OPERATORS: readonly (readonly CharPredicate[])[] = [
  [is('&'), is('&')],
  [is('|'), is('|')],
  [oneOf('!=<>'), is('=')],
];
