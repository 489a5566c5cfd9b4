/**
 * Expression Evaluator
 */

export * from './expression-evaluator.js';
export {
  BUILTIN_FUNCTIONS,
  type BuiltinName,
  type ComparisonOperator,
  type ExpressionNode,
} from './ast.js';
export {
  applyComparison,
  compareValues,
  copyValue,
  formatValue,
  isSequenceValue,
  isTuple,
  truthy,
  typeName,
  valuesEqual,
} from './operators.js';
