/**
 * Value semantics for the expression interpreter: truthiness, arithmetic,
 * equality, ordering and display formatting.
 */

import type { VariableValue } from '../../types/index.js';
import { floorMod } from '../../utils/numeric.js';
import { ExpressionFault, type ArithmeticOperator, type ComparisonOperator } from './ast.js';

type NumericLike = number | boolean;

export function isNumericLike(value: VariableValue): value is NumericLike {
  return typeof value === 'number' || typeof value === 'boolean';
}

export function isSequenceValue(value: VariableValue): value is readonly VariableValue[] {
  return Array.isArray(value);
}

export function typeName(value: VariableValue): string {
  if (value === null) return 'None';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'string') return 'str';
  return isTuple(value) ? 'tuple' : 'list';
}

export function truthy(value: VariableValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  return value.length > 0;
}

export function toNumber(value: VariableValue, operation: string): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new ExpressionFault(`${operation} expects a number, got ${typeName(value)}`);
}

// Tuples are tracked by identity; a frozen list is still a list
const tuples = new WeakSet<readonly VariableValue[]>();

export function makeTuple(values: VariableValue[]): readonly VariableValue[] {
  const tuple = Object.freeze(values);
  tuples.add(tuple);
  return tuple;
}

export function isTuple(value: readonly VariableValue[]): boolean {
  return tuples.has(value);
}

/**
 * Deep copy that keeps lists as lists and tuples as tuples
 */
export function copyValue(value: VariableValue): VariableValue {
  if (!isSequenceValue(value)) {
    return value;
  }
  const items = value.map(copyValue);
  return isTuple(value) ? makeTuple(items) : items;
}

// ============================================================================
// Arithmetic
// ============================================================================

function repeat(sequence: string | readonly VariableValue[], times: number): VariableValue {
  if (!Number.isInteger(times)) {
    throw new ExpressionFault(`can't multiply sequence by non-int of type float`);
  }
  const count = Math.max(0, times);
  if (typeof sequence === 'string') {
    return sequence.repeat(count);
  }
  const result: VariableValue[] = [];
  for (let i = 0; i < count; i++) {
    result.push(...sequence);
  }
  return isTuple(sequence) ? makeTuple(result) : result;
}

function unsupported(operator: string, left: VariableValue, right: VariableValue): ExpressionFault {
  return new ExpressionFault(
    `unsupported operand types for ${operator}: '${typeName(left)}' and '${typeName(right)}'`
  );
}

export function applyArithmetic(
  operator: ArithmeticOperator,
  left: VariableValue,
  right: VariableValue
): VariableValue {
  if (operator === '+') {
    if (typeof left === 'string' && typeof right === 'string') {
      return left + right;
    }
    if (isSequenceValue(left) && isSequenceValue(right)) {
      const joined = [...left, ...right];
      return isTuple(left) && isTuple(right) ? makeTuple(joined) : joined;
    }
  }

  if (operator === '*') {
    if ((typeof left === 'string' || isSequenceValue(left)) && isNumericLike(right)) {
      return repeat(left, toNumber(right, '*'));
    }
    if (isNumericLike(left) && (typeof right === 'string' || isSequenceValue(right))) {
      return repeat(right, toNumber(left, '*'));
    }
  }

  if (!isNumericLike(left) || !isNumericLike(right)) {
    throw unsupported(operator, left, right);
  }

  const a = toNumber(left, operator);
  const b = toNumber(right, operator);

  switch (operator) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      if (b === 0) throw new ExpressionFault('division by zero');
      return a / b;
    case '//':
      if (b === 0) throw new ExpressionFault('integer division or modulo by zero');
      return Math.floor(a / b);
    case '%':
      if (b === 0) throw new ExpressionFault('integer division or modulo by zero');
      return floorMod(a, b);
    case '**': {
      if (a === 0 && b < 0) {
        throw new ExpressionFault('0.0 cannot be raised to a negative power');
      }
      const result = Math.pow(a, b);
      if (Number.isNaN(result)) {
        throw new ExpressionFault(`${a} ** ${b} has no real result`);
      }
      return result;
    }
  }
}

// ============================================================================
// Comparison
// ============================================================================

export function valuesEqual(left: VariableValue, right: VariableValue): boolean {
  if (isNumericLike(left) && isNumericLike(right)) {
    return toNumber(left, '==') === toNumber(right, '==');
  }
  if (isSequenceValue(left) && isSequenceValue(right)) {
    return left.length === right.length && left.every((item, i) => valuesEqual(item, right[i]));
  }
  return left === right;
}

/**
 * Three-way ordering for numbers, strings and sequences (lexicographic)
 */
export function compareValues(left: VariableValue, right: VariableValue, operator = '<'): number {
  if (isNumericLike(left) && isNumericLike(right)) {
    const a = toNumber(left, operator);
    const b = toNumber(right, operator);
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (isSequenceValue(left) && isSequenceValue(right)) {
    const shared = Math.min(left.length, right.length);
    for (let i = 0; i < shared; i++) {
      const order = compareValues(left[i], right[i], operator);
      if (order !== 0) return order;
    }
    return left.length - right.length;
  }
  throw new ExpressionFault(
    `'${operator}' not supported between instances of '${typeName(left)}' and '${typeName(right)}'`
  );
}

export function applyComparison(
  operator: ComparisonOperator,
  left: VariableValue,
  right: VariableValue
): boolean {
  switch (operator) {
    case '==':
      return valuesEqual(left, right);
    case '!=':
      return !valuesEqual(left, right);
    case '<':
      return compareValues(left, right, operator) < 0;
    case '>':
      return compareValues(left, right, operator) > 0;
    case '<=':
      return compareValues(left, right, operator) <= 0;
    case '>=':
      return compareValues(left, right, operator) >= 0;
  }
}

// ============================================================================
// Formatting
// ============================================================================

function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return String(value);
}

function repr(value: VariableValue): string {
  return typeof value === 'string' ? `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'` : formatValue(value);
}

/**
 * Display form used by str() and by log messages
 */
export function formatValue(value: VariableValue): string {
  if (value === null) return 'None';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'string') return value;

  const items = value.map(repr);
  if (isTuple(value)) {
    return items.length === 1 ? `(${items[0]},)` : `(${items.join(', ')})`;
  }
  return `[${items.join(', ')}]`;
}
