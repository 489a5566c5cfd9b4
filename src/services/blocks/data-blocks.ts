/**
 * Data Blocks
 *
 * Variable assignment, arithmetic and list transforms. Inputs are
 * expressions evaluated against the execution context.
 */

import type { BlockCategory, BlockOutcome, VariableValue } from '../../types/index.js';
import { BlockExecutionError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import { roundHalfEven } from '../../utils/numeric.js';
import {
  compareValues,
  evaluate,
  formatValue,
  isSequenceValue,
  truthy,
  typeName,
} from '../expression/index.js';
import type { ExecutionContext } from '../execution/execution-context.js';
import { BaseBlock } from './base-block.js';

const logger = log.child({ service: 'data-blocks' });

export const MATH_OPERATIONS = [
  'add',
  'subtract',
  'multiply',
  'divide',
  'power',
  'sqrt',
  'abs',
  'round',
] as const;

export type MathOperation = (typeof MATH_OPERATIONS)[number];

const UNARY_OPERATIONS: ReadonlySet<MathOperation> = new Set(['sqrt', 'abs', 'round']);

export const TRANSFORM_OPERATIONS = ['filter', 'map', 'slice', 'sort', 'reverse'] as const;

export type TransformOperation = (typeof TRANSFORM_OPERATIONS)[number];

const SLICE_BOUND = /^-?\d+$/;

export class SetVariableBlock extends BaseBlock {
  readonly kind = 'set_variable';
  readonly name = 'Set Variable';
  readonly category: BlockCategory = 'Variables';
  readonly description = 'Set variable to value or expression result';

  protected defineParameters(): void {
    this.addParameter('variable', 'string', 'result', 'Variable Name');
    this.addParameter('expression', 'string', '0', 'Expression');
  }

  protected validateConfiguration(): string[] {
    return [this.checkRequired('variable'), this.checkExpression('expression')].filter(
      (problem): problem is string => problem !== null
    );
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const variable = this.getString('variable');
    const value = evaluate(this.getString('expression'), context);

    context.setVariable(variable, value);
    logger.info(`Set ${variable} = ${formatValue(value)}`, { blockId: this.id });

    return this.success({ variable, value });
  }
}

// ============================================================================
// Math
// ============================================================================

/**
 * Division that never raises: x/0 is signed infinity, 0/0 is NaN
 */
export function safeDivide(dividend: number, divisor: number): number {
  if (divisor !== 0) {
    return dividend / divisor;
  }
  if (dividend === 0) {
    return NaN;
  }
  return dividend > 0 ? Infinity : -Infinity;
}

export class MathBlock extends BaseBlock {
  readonly kind = 'math';
  readonly name = 'Math Operation';
  readonly category: BlockCategory = 'Data';
  readonly description = 'Perform mathematical calculations';

  protected defineParameters(): void {
    this.addParameter('operation', 'choice', 'add', 'Operation', { choices: MATH_OPERATIONS });
    this.addParameter('input1', 'string', 'a', 'Input 1 (variable or value)');
    this.addParameter('input2', 'string', 'b', 'Input 2 (variable or value)');
    this.addParameter('output', 'string', 'result', 'Output Variable');
  }

  protected validateConfiguration(): string[] {
    const problems = [this.checkRequired('output'), this.checkExpression('input1')];
    const operation = this.operation;
    if (operation && !UNARY_OPERATIONS.has(operation)) {
      problems.push(this.checkExpression('input2'));
    }
    return problems.filter((problem): problem is string => problem !== null);
  }

  private get operation(): MathOperation | undefined {
    const value = this.getParameter('operation');
    return MATH_OPERATIONS.find((operation) => operation === value);
  }

  private numericInput(name: string, context: ExecutionContext): number {
    const value = evaluate(this.getString(name), context);
    if (typeof value === 'number') return value;
    if (typeof value === 'boolean') return value ? 1 : 0;
    throw new BlockExecutionError(`Math input '${this.getString(name)}' is not a number (${typeName(value)})`, {
      operation: 'math',
      blockId: this.id,
    });
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const operation = this.operation;
    if (!operation) {
      throw new BlockExecutionError(`Unsupported math operation: ${String(this.getParameter('operation'))}`, {
        operation: 'math',
        blockId: this.id,
      });
    }
    const output = this.getString('output');

    const a = this.numericInput('input1', context);
    const b = UNARY_OPERATIONS.has(operation) ? null : this.numericInput('input2', context);
    const result = this.compute(operation, a, b ?? 0);

    context.setVariable(output, result);
    logger.info(`Math: ${operation}(${a}, ${b}) = ${result}`, { blockId: this.id });

    return this.success({ operation, result, output });
  }

  private compute(operation: MathOperation, a: number, b: number): number {
    switch (operation) {
      case 'add':
        return a + b;
      case 'subtract':
        return a - b;
      case 'multiply':
        return a * b;
      case 'divide':
        return safeDivide(a, b);
      case 'power': {
        const result = Math.pow(a, b);
        if (Number.isNaN(result)) {
          throw new BlockExecutionError(`${a} ** ${b} is not a real number`, {
            operation: 'math',
            blockId: this.id,
          });
        }
        return result;
      }
      case 'sqrt':
        if (a < 0) {
          throw new BlockExecutionError(`Cannot take the square root of ${a}`, {
            operation: 'math',
            blockId: this.id,
          });
        }
        return Math.sqrt(a);
      case 'abs':
        return Math.abs(a);
      case 'round':
        return roundHalfEven(a);
    }
  }
}

// ============================================================================
// Data Transform
// ============================================================================

export class DataTransformBlock extends BaseBlock {
  readonly kind = 'data_transform';
  readonly name = 'Data Transform';
  readonly category: BlockCategory = 'Data';
  readonly description = 'Transform data arrays (filter, map, slice, sort, reverse)';

  protected defineParameters(): void {
    this.addParameter('input_variable', 'string', 'data', 'Input Variable');
    this.addParameter('operation', 'choice', 'filter', 'Operation', { choices: TRANSFORM_OPERATIONS });
    this.addParameter('expression', 'string', 'x > 0', 'Expression/Condition');
    this.addParameter('output_variable', 'string', 'filtered', 'Output Variable');
    this.addParameter('element_variable', 'string', 'x', 'Element Variable');
  }

  protected validateConfiguration(): string[] {
    const operation = this.getParameter('operation');
    const problems = [this.checkRequired('input_variable'), this.checkRequired('output_variable')];
    if (operation === 'filter' || operation === 'map') {
      problems.push(this.checkRequired('element_variable'), this.checkExpression('expression'));
    }
    return problems.filter((problem): problem is string => problem !== null);
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const inputVariable = this.getString('input_variable');
    const outputVariable = this.getString('output_variable');
    const operation = TRANSFORM_OPERATIONS.find((op) => op === this.getParameter('operation'));
    if (!operation) {
      throw new BlockExecutionError(`Unsupported transform: ${String(this.getParameter('operation'))}`, {
        operation: 'transform',
        blockId: this.id,
      });
    }

    const data = context.getVariable(inputVariable, null);
    if (!isSequenceValue(data)) {
      throw new BlockExecutionError(`Input must be a list, got ${typeName(data)}`, {
        operation: 'transform',
        blockId: this.id,
        variable: inputVariable,
      });
    }

    const result = this.transform(operation, data, context);
    context.setVariable(outputVariable, result);
    logger.info(`Transform: ${operation} on ${data.length} items -> ${result.length} items`, {
      blockId: this.id,
    });

    return this.success({
      operation,
      inputSize: data.length,
      outputSize: result.length,
      output: outputVariable,
    });
  }

  private transform(
    operation: TransformOperation,
    data: readonly VariableValue[],
    context: ExecutionContext
  ): VariableValue[] {
    const expression = this.getString('expression');
    const element = this.getString('element_variable');

    switch (operation) {
      case 'filter':
        return data.filter((item) =>
          truthy(evaluate(expression, context.derive({ [element]: item })))
        );
      case 'map':
        return data.map((item) => evaluate(expression, context.derive({ [element]: item })));
      case 'slice': {
        const [start, end] = this.parseSlice(expression);
        return data.slice(start, end);
      }
      case 'sort':
        return [...data].sort((left, right) => compareValues(left, right));
      case 'reverse':
        return [...data].reverse();
    }
  }

  /**
   * "start:end" with either bound optional and negative bounds counted from the end
   */
  private parseSlice(expression: string): [number | undefined, number | undefined] {
    const parts = expression.split(':').map((part) => part.trim());
    if (parts.length > 2 || parts.some((part) => part !== '' && !SLICE_BOUND.test(part))) {
      throw new BlockExecutionError(`Invalid slice '${expression}', expected "start:end"`, {
        operation: 'transform',
        blockId: this.id,
      });
    }

    const bound = (part: string | undefined): number | undefined =>
      part ? Number.parseInt(part, 10) : undefined;
    return [bound(parts[0]), bound(parts[1])];
  }
}
