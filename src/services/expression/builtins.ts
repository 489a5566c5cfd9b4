/**
 * Whitelisted functions callable from expressions
 */

import type { VariableValue } from '../../types/index.js';
import { roundHalfEven } from '../../utils/numeric.js';
import { ExpressionFault, type BuiltinName } from './ast.js';
import { compareValues, formatValue, isSequenceValue, toNumber, typeName } from './operators.js';

type Builtin = (args: VariableValue[]) => VariableValue;

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function arity(name: string, args: VariableValue[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new ExpressionFault(`${name}() takes ${expected} argument(s) (${args.length} given)`);
  }
}

function extreme(name: 'min' | 'max', args: VariableValue[]): VariableValue {
  let candidates: readonly VariableValue[] = args;
  if (args.length === 1) {
    const [only] = args;
    if (!isSequenceValue(only)) {
      throw new ExpressionFault(`'${typeName(only)}' object is not iterable`);
    }
    candidates = only;
  }
  if (candidates.length === 0) {
    throw new ExpressionFault(`${name}() arg is an empty sequence`);
  }

  let best = candidates[0];
  for (const candidate of candidates.slice(1)) {
    const order = compareValues(candidate, best, name === 'min' ? '<' : '>');
    if ((name === 'min' && order < 0) || (name === 'max' && order > 0)) {
      best = candidate;
    }
  }
  return best;
}

function toInt(value: VariableValue): number {
  if (typeof value === 'string') {
    const text = value.trim();
    if (!INTEGER_TEXT.test(text)) {
      throw new ExpressionFault(`invalid literal for int(): '${value}'`);
    }
    return Number.parseInt(text, 10);
  }
  const numeric = toNumber(value, 'int()');
  if (!Number.isFinite(numeric)) {
    throw new ExpressionFault(`cannot convert ${formatValue(numeric)} to integer`);
  }
  return Math.trunc(numeric);
}

function toFloat(value: VariableValue): number {
  if (typeof value === 'string') {
    const text = value.trim();
    const lowered = text.toLowerCase();
    if (lowered === 'inf' || lowered === '+inf' || lowered === 'infinity') return Infinity;
    if (lowered === '-inf' || lowered === '-infinity') return -Infinity;
    if (lowered === 'nan') return NaN;
    if (!FLOAT_TEXT.test(text)) {
      throw new ExpressionFault(`could not convert string to float: '${value}'`);
    }
    return Number(text);
  }
  return toNumber(value, 'float()');
}

const BUILTINS: Record<BuiltinName, Builtin> = {
  abs: (args) => {
    arity('abs', args, 1);
    return Math.abs(toNumber(args[0], 'abs()'));
  },
  min: (args) => extreme('min', args),
  max: (args) => extreme('max', args),
  round: (args) => {
    arity('round', args, 1, 2);
    const digits = args.length === 2 ? toInt(args[1]) : 0;
    return roundHalfEven(toNumber(args[0], 'round()'), digits);
  },
  int: (args) => {
    arity('int', args, 1);
    return toInt(args[0]);
  },
  float: (args) => {
    arity('float', args, 1);
    return toFloat(args[0]);
  },
  str: (args) => {
    arity('str', args, 1);
    return formatValue(args[0]);
  },
  len: (args) => {
    arity('len', args, 1);
    const [value] = args;
    if (typeof value === 'string' || isSequenceValue(value)) {
      return value.length;
    }
    throw new ExpressionFault(`object of type '${typeName(value)}' has no len()`);
  },
};

export function callBuiltin(name: BuiltinName, args: VariableValue[]): VariableValue {
  return BUILTINS[name](args);
}
