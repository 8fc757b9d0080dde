// ============================================================
// TOKEN KINDS
// ============================================================

export const TOKEN_KINDS = {
  IDENTIFIER: 'IDENTIFIER',
  INTEGER: 'INTEGER', // 0, 42, -7
  DECIMAL: 'DECIMAL', // 1.5, -0.25
  CHARACTER: 'CHARACTER', // 'c', '\n'
  STRING: 'STRING', // "text"
  OPERATOR: 'OPERATOR', // any other single character, &&, ||, !=, ==, <=, >=
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

export interface Token {
  readonly kind: TokenKind;
  /** Exact source text of the token, escapes left unprocessed */
  readonly lexeme: string;
  /** Index of the token's first character */
  readonly offset: number;
}

export function makeToken(
  kind: TokenKind,
  lexeme: string,
  offset: number
): Token {
  return Object.freeze({ kind, lexeme, offset });
}

export function tokensEqual(a: Token, b: Token): boolean {
  return a.kind === b.kind && a.lexeme === b.lexeme && a.offset === b.offset;
}
