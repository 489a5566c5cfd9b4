/**
 * Expression Parser
 *
 * Recursive descent over the whitelisted grammar:
 *
 *   or_expr    := and_expr ("or" and_expr)*
 *   and_expr   := not_expr ("and" not_expr)*
 *   not_expr   := "not" not_expr | comparison
 *   comparison := sum (cmp_op sum)*
 *   sum        := term (("+" | "-") term)*
 *   term       := unary (("*" | "/" | "//" | "%") unary)*
 *   unary      := ("+" | "-") unary | power
 *   power      := primary ("**" unary)?
 *   primary    := literal | name | call | "(" ... ")" | "[" ... "]"
 *
 * Calls are only accepted when the callee is a whitelisted builtin name.
 */

import {
  ExpressionFault,
  isBuiltinName,
  type ArithmeticOperator,
  type ComparisonOperator,
  type ExpressionNode,
} from './ast.js';
import { tokenize, type Token } from './tokenizer.js';

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['<', '>', '<=', '>=', '==', '!='];
const TERM_OPERATORS: readonly ArithmeticOperator[] = ['*', '/', '//', '%'];
const SUM_OPERATORS: readonly ArithmeticOperator[] = ['+', '-'];

const BOOLEAN_LITERALS = new Map<string, boolean>([
  ['True', true],
  ['False', false],
  ['true', true],
  ['false', false],
]);

// Names that read like statements or unsupported constructs
const RESERVED_WORDS = new Set([
  'as', 'assert', 'async', 'await', 'break', 'class', 'continue', 'def', 'del',
  'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import',
  'in', 'is', 'lambda', 'nonlocal', 'pass', 'raise', 'return', 'try',
  'while', 'with', 'yield',
]);

export function parseExpression(text: string): ExpressionNode {
  const parser = new Parser(tokenize(text));
  return parser.parse();
}

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExpressionNode {
    if (this.peek().type === 'eof') {
      throw new ExpressionFault('empty expression');
    }
    const node = this.parseOr();
    const trailing = this.peek();
    if (trailing.type !== 'eof') {
      throw this.unexpected(trailing);
    }
    return node;
  }

  // ==========================================================================
  // Token helpers
  // ==========================================================================

  private peek(): Token {
    return this.tokens[this.position];
  }

  private advance(): Token {
    const token = this.tokens[this.position];
    if (token.type !== 'eof') {
      this.position++;
    }
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.type === 'op' && token.value === value;
  }

  private isKeyword(value: string): boolean {
    const token = this.peek();
    return token.type === 'name' && token.value === value;
  }

  /**
   * Consume the next token when it is one of `operators`
   */
  private matchOperator<T extends string>(operators: readonly T[]): T | undefined {
    const token = this.peek();
    if (token.type !== 'op') {
      return undefined;
    }
    const match = operators.find((operator) => operator === token.value);
    if (match) {
      this.advance();
    }
    return match;
  }

  private expectOp(value: string): void {
    if (!this.isOp(value)) {
      throw this.unexpected(this.peek(), `expected '${value}'`);
    }
    this.advance();
  }

  private unexpected(token: Token, detail?: string): ExpressionFault {
    const found = token.type === 'eof' ? 'end of expression' : `'${token.value}'`;
    const suffix = detail ? ` (${detail})` : '';
    return new ExpressionFault(`unexpected ${found} at position ${token.position}${suffix}`);
  }

  // ==========================================================================
  // Grammar
  // ==========================================================================

  private parseOr(): ExpressionNode {
    const operands = [this.parseAnd()];
    while (this.isKeyword('or')) {
      this.advance();
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { type: 'logical', operator: 'or', operands };
  }

  private parseAnd(): ExpressionNode {
    const operands = [this.parseNot()];
    while (this.isKeyword('and')) {
      this.advance();
      operands.push(this.parseNot());
    }
    return operands.length === 1 ? operands[0] : { type: 'logical', operator: 'and', operands };
  }

  private parseNot(): ExpressionNode {
    if (this.isKeyword('not')) {
      this.advance();
      return { type: 'unary', operator: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    const first = this.parseSum();
    const rest: Array<{ operator: ComparisonOperator; operand: ExpressionNode }> = [];

    let operator = this.matchOperator(COMPARISON_OPERATORS);
    while (operator) {
      rest.push({ operator, operand: this.parseSum() });
      operator = this.matchOperator(COMPARISON_OPERATORS);
    }

    return rest.length === 0 ? first : { type: 'compare', first, rest };
  }

  private parseSum(): ExpressionNode {
    let left = this.parseTerm();
    let operator = this.matchOperator(SUM_OPERATORS);
    while (operator) {
      left = { type: 'binary', operator, left, right: this.parseTerm() };
      operator = this.matchOperator(SUM_OPERATORS);
    }
    return left;
  }

  private parseTerm(): ExpressionNode {
    let left = this.parseUnary();
    let operator = this.matchOperator(TERM_OPERATORS);
    while (operator) {
      left = { type: 'binary', operator, left, right: this.parseUnary() };
      operator = this.matchOperator(TERM_OPERATORS);
    }
    return left;
  }

  private parseUnary(): ExpressionNode {
    if (this.isOp('+') || this.isOp('-')) {
      const operator = this.advance().value === '-' ? '-' : '+';
      return { type: 'unary', operator, operand: this.parseUnary() };
    }
    return this.parsePower();
  }

  private parsePower(): ExpressionNode {
    const base = this.parsePrimary();
    if (this.isOp('**')) {
      this.advance();
      // right-associative, and the exponent may carry its own sign
      return { type: 'binary', operator: '**', left: base, right: this.parseUnary() };
    }
    return base;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.peek();

    switch (token.type) {
      case 'number':
        this.advance();
        return { type: 'literal', value: token.numeric ?? Number(token.value) };

      case 'string':
        this.advance();
        return { type: 'literal', value: token.value };

      case 'name':
        return this.parseName();

      case 'op':
        if (token.value === '(') {
          return this.parseParenthesized();
        }
        if (token.value === '[') {
          this.advance();
          return { type: 'list', elements: this.parseElements(']') };
        }
        throw this.unexpected(token);

      default:
        throw this.unexpected(token);
    }
  }

  private parseName(): ExpressionNode {
    const token = this.advance();
    const name = token.value;

    const boolean = BOOLEAN_LITERALS.get(name);
    if (boolean !== undefined) {
      return { type: 'literal', value: boolean };
    }
    if (name === 'None') {
      return { type: 'literal', value: null };
    }
    if (name === 'and' || name === 'or' || name === 'not' || RESERVED_WORDS.has(name)) {
      throw new ExpressionFault(`'${name}' is not allowed at position ${token.position}`);
    }

    if (this.isOp('(')) {
      if (!isBuiltinName(name)) {
        throw new ExpressionFault(`function '${name}' is not allowed`);
      }
      this.advance();
      return { type: 'call', callee: name, args: this.parseElements(')') };
    }

    return { type: 'variable', name };
  }

  private parseParenthesized(): ExpressionNode {
    this.expectOp('(');
    if (this.isOp(')')) {
      this.advance();
      return { type: 'tuple', elements: [] };
    }

    const first = this.parseOr();
    if (this.isOp(')')) {
      this.advance();
      return first;
    }

    this.expectOp(',');
    return { type: 'tuple', elements: [first, ...this.parseElements(')')] };
  }

  /**
   * Comma separated expressions up to and including `closing`.
   * A trailing comma is allowed.
   */
  private parseElements(closing: string): ExpressionNode[] {
    const nodes: ExpressionNode[] = [];

    while (!this.isOp(closing)) {
      nodes.push(this.parseOr());
      if (this.isOp(',')) {
        this.advance();
        continue;
      }
      if (!this.isOp(closing)) {
        throw this.unexpected(this.peek(), `expected ',' or '${closing}'`);
      }
    }

    this.expectOp(closing);
    return nodes;
  }
}
