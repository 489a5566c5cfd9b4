/**
 * Bench Sequencer - Expression Evaluator
 *
 * Sandboxed formula interpreter used by condition and value blocks. Text is
 * parsed into a whitelisted AST once and cached; evaluation only walks that
 * AST against a variable scope, so nothing outside the grammar can run.
 */

import type { VariableValue } from '../../types/index.js';
import { EvaluationError, errorMessage } from '../../utils/errors.js';
import { ExpressionFault, type ExpressionNode } from './ast.js';
import { callBuiltin } from './builtins.js';
import {
  applyArithmetic,
  applyComparison,
  makeTuple,
  toNumber,
  truthy,
} from './operators.js';
import { parseExpression } from './parser.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Variable lookup the evaluator resolves identifiers against
 */
export interface VariableScope {
  hasVariable(name: string): boolean;
  getVariable(name: string): VariableValue | undefined;
}

export interface CompiledExpression {
  readonly source: string;
  evaluate(scope: VariableScope): VariableValue;
}

const MAX_CACHED_EXPRESSIONS = 500;

// ============================================================================
// Interpreter
// ============================================================================

function interpret(node: ExpressionNode, scope: VariableScope): VariableValue {
  switch (node.type) {
    case 'literal':
      return node.value;

    case 'variable': {
      if (!scope.hasVariable(node.name)) {
        throw new ExpressionFault(`name '${node.name}' is not defined`);
      }
      return scope.getVariable(node.name) ?? null;
    }

    case 'list':
      return node.elements.map((element) => interpret(element, scope));

    case 'tuple':
      return makeTuple(node.elements.map((element) => interpret(element, scope)));

    case 'unary': {
      const operand = interpret(node.operand, scope);
      if (node.operator === 'not') return !truthy(operand);
      const value = toNumber(operand, `unary ${node.operator}`);
      return node.operator === '-' ? -value : value;
    }

    case 'binary':
      return applyArithmetic(node.operator, interpret(node.left, scope), interpret(node.right, scope));

    case 'compare': {
      let left = interpret(node.first, scope);
      for (const { operator, operand } of node.rest) {
        const right = interpret(operand, scope);
        if (!applyComparison(operator, left, right)) {
          return false;
        }
        left = right;
      }
      return true;
    }

    case 'logical': {
      for (const operand of node.operands) {
        const value = truthy(interpret(operand, scope));
        if (node.operator === 'and' && !value) return false;
        if (node.operator === 'or' && value) return true;
      }
      return node.operator === 'and';
    }

    case 'call':
      return callBuiltin(
        node.callee,
        node.args.map((arg) => interpret(arg, scope))
      );
  }
}

function describeFault(error: unknown): string {
  if (error instanceof RangeError) {
    return 'expression is nested too deeply';
  }
  return errorMessage(error);
}

// ============================================================================
// Evaluator
// ============================================================================

export class ExpressionEvaluator {
  private readonly cache = new Map<string, ExpressionNode>();

  /**
   * Parse `expression` (or fetch it from the cache).
   * @throws EvaluationError when the text falls outside the grammar
   */
  compile(expression: string): CompiledExpression {
    const ast = this.parse(expression);
    return {
      source: expression,
      evaluate: (scope) => this.run(expression, ast, scope),
    };
  }

  evaluate(expression: string, scope: VariableScope): VariableValue {
    return this.run(expression, this.parse(expression), scope);
  }

  /**
   * Syntax check without evaluating. Returns the problem, or null when the
   * expression parses.
   */
  validate(expression: string): string | null {
    try {
      this.parse(expression);
      return null;
    } catch (error) {
      return errorMessage(error);
    }
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private parse(expression: string): ExpressionNode {
    const cached = this.cache.get(expression);
    if (cached) {
      return cached;
    }

    let ast: ExpressionNode;
    try {
      ast = parseExpression(expression.trim());
    } catch (error) {
      throw new EvaluationError(expression, describeFault(error), { operation: 'parse' });
    }

    if (this.cache.size >= MAX_CACHED_EXPRESSIONS) {
      // drop the oldest entry; Map iterates in insertion order
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(expression, ast);
    return ast;
  }

  private run(expression: string, ast: ExpressionNode, scope: VariableScope): VariableValue {
    try {
      return interpret(ast, scope);
    } catch (error) {
      throw new EvaluationError(expression, describeFault(error));
    }
  }
}

// Shared instance used by the blocks
export const expressionEvaluator = new ExpressionEvaluator();

export function evaluate(expression: string, scope: VariableScope): VariableValue {
  return expressionEvaluator.evaluate(expression, scope);
}

export function compileExpression(expression: string): CompiledExpression {
  return expressionEvaluator.compile(expression);
}

export function validateExpression(expression: string): string | null {
  return expressionEvaluator.validate(expression);
}
