/**
 * Expression Tokenizer
 *
 * Splits formula text into number, string, name and operator tokens.
 * Characters outside the grammar (`.`, `=`, `;`, braces, ...) are rejected here.
 */

import { ExpressionFault } from './ast.js';

export type TokenType = 'number' | 'string' | 'name' | 'op' | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  position: number;
  /** Parsed value for number tokens */
  numeric?: number;
}

// Longest operators first so '**' wins over '*'
const OPERATORS = ['**', '//', '<=', '>=', '==', '!=', '+', '-', '*', '/', '%', '<', '>', '(', ')', '[', ']', ','];

const STRING_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

const isDigit = (c: string | undefined): boolean => c !== undefined && c >= '0' && c <= '9';
const isNameStart = (c: string | undefined): boolean => c !== undefined && /[A-Za-z_]/.test(c);
const isNameChar = (c: string | undefined): boolean => c !== undefined && /[A-Za-z0-9_]/.test(c);

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const c = input[i];

    if (c === ' ' || c === '\t' || c === '\n' || c === '\r') {
      i++;
      continue;
    }

    // number: 12, 1.5, .5, 1., 1e-3
    if (isDigit(c) || (c === '.' && isDigit(input[i + 1]))) {
      const start = i;
      while (isDigit(input[i])) i++;
      if (input[i] === '.') {
        i++;
        while (isDigit(input[i])) i++;
      }
      if (input[i] === 'e' || input[i] === 'E') {
        const mark = i;
        i++;
        if (input[i] === '+' || input[i] === '-') i++;
        if (!isDigit(input[i])) {
          throw new ExpressionFault(`malformed number at position ${mark}`);
        }
        while (isDigit(input[i])) i++;
      }
      if (isNameChar(input[i]) || input[i] === '.') {
        throw new ExpressionFault(`malformed number at position ${start}`);
      }
      const text = input.slice(start, i);
      tokens.push({ type: 'number', value: text, position: start, numeric: Number(text) });
      continue;
    }

    if (c === '"' || c === "'") {
      const start = i;
      const quote = c;
      let value = '';
      i++;
      let closed = false;
      while (i < input.length) {
        const ch = input[i];
        if (ch === '\\') {
          const escaped = input[i + 1];
          if (escaped === undefined) break;
          value += STRING_ESCAPES[escaped] ?? `\\${escaped}`;
          i += 2;
          continue;
        }
        if (ch === quote) {
          closed = true;
          i++;
          break;
        }
        value += ch;
        i++;
      }
      if (!closed) {
        throw new ExpressionFault(`unterminated string starting at position ${start}`);
      }
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    if (isNameStart(c)) {
      const start = i;
      while (isNameChar(input[i])) i++;
      tokens.push({ type: 'name', value: input.slice(start, i), position: start });
      continue;
    }

    const op = OPERATORS.find((candidate) => input.startsWith(candidate, i));
    if (op) {
      tokens.push({ type: 'op', value: op, position: i });
      i += op.length;
      continue;
    }

    throw new ExpressionFault(`unexpected character '${c}' at position ${i}`);
  }

  tokens.push({ type: 'eof', value: '', position: input.length });
  return tokens;
}
