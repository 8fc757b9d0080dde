/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Source text that triggers the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: IMP-{category}{3-digit} (e.g., IMP-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (IMP-L0xx)
  {
    errorId: 'IMP-L001',
    category: 'lexer',
    description: 'Unterminated character literal',
    messageTemplate: 'Unterminated character literal',
    cause:
      'Character literal opened with a single quote but not closed right after its one character.',
    resolution:
      "Close the literal with a single quote. A character literal holds exactly one character or escape; use a string for more.",
    examples: [
      { description: 'Missing closing quote', code: "'c" },
      { description: 'More than one character', code: "'abc'" },
    ],
  },
  {
    errorId: 'IMP-L002',
    category: 'lexer',
    description: 'Empty character literal',
    messageTemplate: 'Empty character literal',
    cause: 'Two single quotes with nothing between them.',
    resolution: "Put one character between the quotes, or write '\\'' for a quote.",
    examples: [{ description: 'Empty literal', code: "''" }],
  },
  {
    errorId: 'IMP-L003',
    category: 'lexer',
    description: 'Invalid character literal content',
    messageTemplate: 'Invalid character in character literal: {char}',
    cause: 'A raw line break appears inside a character literal.',
    resolution: "Use the escapes '\\n' or '\\r' instead of a raw line break.",
    examples: [{ description: 'Raw newline', code: "'\n'" }],
  },
  {
    errorId: 'IMP-L004',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{char}',
    cause: 'Backslash followed by a character that is not a known escape.',
    resolution:
      "Use one of \\b \\n \\r \\t \\' \\\" \\\\ (strings also accept an escaped space).",
    examples: [
      { description: 'Unknown escape in a character', code: "'\\a'" },
      { description: 'Unknown escape in a string', code: '"invalid\\escape"' },
    ],
  },
  {
    errorId: 'IMP-L005',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause:
      'String opened with a double quote but never closed before end of line or input.',
    resolution:
      'Add the closing double quote. Write line breaks inside strings as \\n.',
    examples: [
      { description: 'Missing closing quote', code: '"hello' },
      { description: 'Newline inside string', code: '"hello\nworld"' },
    ],
  },
  {
    errorId: 'IMP-L006',
    category: 'lexer',
    description: 'Invalid number',
    messageTemplate: 'Invalid number: expected a digit after {sign}',
    cause: 'A sign was read as the start of a number but no digit follows.',
    resolution: 'Write a digit right after the sign, with no space between.',
    examples: [{ description: 'Lone sign', code: '-' }],
  },
  {
    errorId: 'IMP-L007',
    category: 'lexer',
    description: 'Invalid decimal number',
    messageTemplate: 'Invalid decimal number: expected a digit after {value}',
    cause: 'A decimal point is not followed by a fractional digit.',
    resolution: 'Write at least one digit after the decimal point (1.0, not 1.).',
    examples: [
      { description: 'Trailing decimal point', code: '123.' },
      { description: 'Doubled decimal point', code: '1..0' },
    ],
  },
  {
    errorId: 'IMP-L008',
    category: 'lexer',
    description: 'Invalid token start',
    messageTemplate: 'Invalid {token} start: expected {expected}',
    cause: 'A token reader was entered at a character that cannot start it.',
    resolution: 'Dispatch through lexToken, which picks the reader by lookahead.',
    examples: [{ description: 'Identifier starting with a hyphen', code: '-five' }],
  },
  {
    errorId: 'IMP-L009',
    category: 'lexer',
    description: 'No token at position',
    messageTemplate: 'Expected a token, found {found}',
    cause: 'lexToken was called at end of input or on whitespace.',
    resolution: 'Skip whitespace and check for remaining input before lexToken.',
    examples: [{ description: 'Whitespace only', code: ' ' }],
  },
];

/**
 * Global error registry instance.
 * Contains all error definitions, immutable after initialization.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// MESSAGE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} names with context values.
 *
 * Missing context values render as an empty string. A template with an
 * unclosed brace is returned unchanged. `{{` is kept literally.
 *
 * @example
 * renderMessage("Invalid escape sequence: \\{char}", { char: "a" })
 * // Returns: "Invalid escape sequence: \\a"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // Objects without a usable toString (e.g. null prototype)
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    if (char === '{') {
      // Escaped brace pair
      result += '{{';
      i += 2;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
