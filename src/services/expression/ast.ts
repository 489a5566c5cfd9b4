/**
 * Expression AST
 *
 * Node shapes produced by the parser. Anything the parser cannot express as
 * one of these nodes is rejected before evaluation.
 */

import type { VariableValue } from '../../types/index.js';

export const BUILTIN_FUNCTIONS = ['abs', 'min', 'max', 'round', 'int', 'float', 'str', 'len'] as const;

export type BuiltinName = (typeof BUILTIN_FUNCTIONS)[number];

export type UnaryOperator = '+' | '-' | 'not';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';

export type ComparisonOperator = '<' | '>' | '<=' | '>=' | '==' | '!=';

export type ExpressionNode =
  | { type: 'literal'; value: VariableValue }
  | { type: 'variable'; name: string }
  | { type: 'list'; elements: ExpressionNode[] }
  | { type: 'tuple'; elements: ExpressionNode[] }
  | { type: 'unary'; operator: UnaryOperator; operand: ExpressionNode }
  | { type: 'binary'; operator: ArithmeticOperator; left: ExpressionNode; right: ExpressionNode }
  | {
      type: 'compare';
      first: ExpressionNode;
      rest: Array<{ operator: ComparisonOperator; operand: ExpressionNode }>;
    }
  | { type: 'logical'; operator: 'and' | 'or'; operands: ExpressionNode[] }
  | { type: 'call'; callee: BuiltinName; args: ExpressionNode[] };

/**
 * Raised inside the tokenizer, parser and interpreter. The evaluator turns it
 * into an EvaluationError carrying the expression text.
 */
export class ExpressionFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionFault';
  }
}

export function isBuiltinName(name: string): name is BuiltinName {
  return BUILTIN_FUNCTIONS.some((builtin) => builtin === name);
}
