/**
 * ModelGraph Engine - Formula Tokenizer
 *
 * The dependency index consumes tokenizers through the narrow `Tokenizer`
 * contract: text in, ordered classified spans out, failure by throwing.
 * `tokenizeFormula` is the default DAX-style implementation.
 *
 * Grammar handled by the default tokenizer:
 * - "text" string literals, "" escapes a quote
 * - 'Table Name' quoted names, '' escapes a quote
 * - [Member Name] bracketed names, ]] escapes a bracket
 * - // and -- line comments, block comments
 * - identifiers, numbers, single-character operators
 */

import type { TextSpan } from '../types/index.js';
import { TokenizeError } from '../types/errors.js';

// =============================================================================
// Types
// =============================================================================

export type TokenClass =
  | 'identifier'
  | 'bracketedReference'
  | 'quotedQualifiedReference'
  | 'stringLiteral'
  | 'comment'
  | 'other';

export interface FormulaToken {
  readonly span: TextSpan;
  readonly classification: TokenClass;
}

/**
 * Pure function. Throws on text it cannot tokenize.
 */
export type Tokenizer = (text: string) => readonly FormulaToken[];

// =============================================================================
// Default Tokenizer
// =============================================================================

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_.]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

export const tokenizeFormula: Tokenizer = (text: string): FormulaToken[] => {
  const tokens: FormulaToken[] = [];
  const push = (start: number, end: number, classification: TokenClass): void => {
    tokens.push({ span: { start, end }, classification });
  };

  let pos = 0;
  while (pos < text.length) {
    const ch = text[pos];
    const next = text[pos + 1];

    if (WHITESPACE.test(ch)) {
      pos++;
      continue;
    }

    // Comments
    if ((ch === '/' && next === '/') || (ch === '-' && next === '-')) {
      const newline = text.indexOf('\n', pos);
      const end = newline === -1 ? text.length : newline;
      push(pos, end, 'comment');
      pos = end;
      continue;
    }
    if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', pos + 2);
      if (close === -1) {
        throw new TokenizeError('Unterminated block comment', pos);
      }
      push(pos, close + 2, 'comment');
      pos = close + 2;
      continue;
    }

    // Delimited constructs
    if (ch === '"') {
      const end = scanDelimited(text, pos, '"', 'string literal');
      push(pos, end, 'stringLiteral');
      pos = end;
      continue;
    }
    if (ch === "'") {
      const end = scanDelimited(text, pos, "'", 'quoted name');
      push(pos, end, 'quotedQualifiedReference');
      pos = end;
      continue;
    }
    if (ch === '[') {
      const end = scanDelimited(text, pos, ']', 'bracketed name');
      push(pos, end, 'bracketedReference');
      pos = end;
      continue;
    }

    if (IDENTIFIER_START.test(ch)) {
      let end = pos + 1;
      while (end < text.length && IDENTIFIER_PART.test(text[end])) end++;
      push(pos, end, 'identifier');
      pos = end;
      continue;
    }

    if (DIGIT.test(ch) || (ch === '.' && next !== undefined && DIGIT.test(next))) {
      const end = scanNumber(text, pos);
      push(pos, end, 'other');
      pos = end;
      continue;
    }

    push(pos, pos + 1, 'other');
    pos++;
  }

  return tokens;
};

/**
 * Scan from an opening delimiter to its closing one. A doubled closing
 * delimiter is an escape.
 *
 * @returns Offset just past the closing delimiter
 */
function scanDelimited(text: string, start: number, close: string, what: string): number {
  let pos = start + 1;
  while (pos < text.length) {
    if (text[pos] === close) {
      if (text[pos + 1] === close) {
        pos += 2;
        continue;
      }
      return pos + 1;
    }
    pos++;
  }
  throw new TokenizeError(`Unterminated ${what}`, start);
}

function scanNumber(text: string, start: number): number {
  let pos = start;
  while (pos < text.length && DIGIT.test(text[pos])) pos++;
  if (text[pos] === '.') {
    pos++;
    while (pos < text.length && DIGIT.test(text[pos])) pos++;
  }
  if (text[pos] === 'e' || text[pos] === 'E') {
    let exp = pos + 1;
    if (text[exp] === '+' || text[exp] === '-') exp++;
    if (exp < text.length && DIGIT.test(text[exp])) {
      pos = exp;
      while (pos < text.length && DIGIT.test(text[pos])) pos++;
    }
  }
  return pos;
}

// =============================================================================
// Token Helpers
// =============================================================================

export function tokenText(text: string, token: FormulaToken): string {
  return text.slice(token.span.start, token.span.end);
}

export function isReferenceToken(token: FormulaToken): boolean {
  return token.classification === 'bracketedReference' ||
    token.classification === 'quotedQualifiedReference';
}
