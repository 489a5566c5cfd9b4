import { describe, it, expect } from 'vitest';
import type { VariableMap } from '../../../types/index.js';
import { EvaluationError } from '../../../utils/errors.js';
import {
  ExpressionEvaluator,
  evaluate,
  validateExpression,
  type VariableScope,
} from '../expression-evaluator.js';

function scopeOf(variables: VariableMap = {}): VariableScope & { lookups: string[] } {
  const values = new Map(Object.entries(variables));
  const lookups: string[] = [];
  return {
    lookups,
    hasVariable: (name) => values.has(name),
    getVariable: (name) => {
      lookups.push(name);
      return values.get(name);
    },
  };
}

describe('evaluate', () => {
  describe('arithmetic', () => {
    it('respects operator precedence', () => {
      expect(evaluate('2 + 3 * 4', scopeOf())).toBe(14);
      expect(evaluate('(2 + 3) * 4', scopeOf())).toBe(20);
    });

    it('binds power tighter than a leading minus and associates right', () => {
      expect(evaluate('-2 ** 2', scopeOf())).toBe(-4);
      expect(evaluate('2 ** 3 ** 2', scopeOf())).toBe(512);
      expect(evaluate('2 ** -1', scopeOf())).toBe(0.5);
    });

    it('floors integer division and takes the divisor sign for modulo', () => {
      expect(evaluate('7 // 2', scopeOf())).toBe(3);
      expect(evaluate('-7 // 2', scopeOf())).toBe(-4);
      expect(evaluate('-7 % 3', scopeOf())).toBe(2);
      expect(evaluate('7 / 2', scopeOf())).toBe(3.5);
    });

    it('treats booleans as 0 and 1', () => {
      expect(evaluate('True + True', scopeOf())).toBe(2);
    });

    it('concatenates and repeats strings and lists', () => {
      expect(evaluate("'a' + 'b'", scopeOf())).toBe('ab');
      expect(evaluate("'ab' * 2", scopeOf())).toBe('abab');
      expect(evaluate('[1] + [2, 3]', scopeOf())).toEqual([1, 2, 3]);
    });

    it.each(['1 / 0', '1 // 0', '1 % 0'])('raises on division by zero in %s', (expression) => {
      expect(() => evaluate(expression, scopeOf())).toThrow(EvaluationError);
    });

    it('raises on results with no real value', () => {
      expect(() => evaluate('0 ** -1', scopeOf())).toThrow(EvaluationError);
      expect(() => evaluate('(-8) ** 0.5', scopeOf())).toThrow(EvaluationError);
    });

    it('rejects arithmetic across incompatible types', () => {
      expect(() => evaluate("'a' - 1", scopeOf())).toThrow(
        "Invalid expression ''a' - 1': unsupported operand types for -: 'str' and 'int'"
      );
    });
  });

  describe('comparisons and logic', () => {
    it('chains comparisons', () => {
      expect(evaluate('1 < 2 < 3', scopeOf())).toBe(true);
      expect(evaluate('1 < 3 < 2', scopeOf())).toBe(false);
    });

    it('short-circuits a chain without resolving later operands', () => {
      const scope = scopeOf();
      expect(evaluate('3 < 2 < missing', scope)).toBe(false);
      expect(scope.lookups).toEqual([]);
    });

    it('evaluates the middle operand of a chain once', () => {
      const scope = scopeOf({ x: 2 });
      expect(evaluate('1 < x < 3', scope)).toBe(true);
      expect(scope.lookups).toEqual(['x']);
    });

    it('returns booleans from and/or/not', () => {
      expect(evaluate('True and 0', scopeOf())).toBe(false);
      expect(evaluate("0 or 'a'", scopeOf())).toBe(true);
      expect(evaluate('not []', scopeOf())).toBe(true);
    });

    it('short-circuits and/or', () => {
      expect(evaluate('x > 3 and y', scopeOf({ x: 1 }))).toBe(false);
      expect(evaluate('x < 3 or y', scopeOf({ x: 1 }))).toBe(true);
    });

    it('compares numbers and booleans by value and lists element-wise', () => {
      expect(evaluate('1 == True', scopeOf())).toBe(true);
      expect(evaluate('[1, 2] == [1, 2]', scopeOf())).toBe(true);
      expect(evaluate('[1, 2] < [1, 3]', scopeOf())).toBe(true);
      expect(evaluate("'abc' < 'abd'", scopeOf())).toBe(true);
    });

    it('refuses to order unrelated types', () => {
      expect(() => evaluate("'a' < 1", scopeOf())).toThrow(EvaluationError);
    });
  });

  describe('literals and variables', () => {
    it('resolves variables from the scope', () => {
      expect(evaluate('x', scopeOf({ x: 5 }))).toBe(5);
      expect(evaluate('voltage * 2', scopeOf({ voltage: 1.5 }))).toBe(3);
    });

    it('reads boolean, None, list and tuple literals', () => {
      expect(evaluate('true', scopeOf())).toBe(true);
      expect(evaluate('False', scopeOf())).toBe(false);
      expect(evaluate('None', scopeOf())).toBeNull();
      expect(evaluate('[1, 2,]', scopeOf())).toEqual([1, 2]);

      const tuple = evaluate('(1, 2)', scopeOf());
      expect(tuple).toEqual([1, 2]);
      expect(Object.isFrozen(tuple)).toBe(true);
    });

    it('reads numbers in exponent notation', () => {
      expect(evaluate('1e-3 * 1000', scopeOf())).toBe(1);
      expect(evaluate('.5 + 1.', scopeOf())).toBe(1.5);
    });

    it('fails on an undefined identifier', () => {
      expect(() => evaluate('os', scopeOf())).toThrow(EvaluationError);
      expect(() => evaluate('os', scopeOf())).toThrow(
        "Invalid expression 'os': name 'os' is not defined"
      );
    });

    it('carries the expression text on the error', () => {
      try {
        evaluate('missing + 1', scopeOf());
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(EvaluationError);
        if (error instanceof EvaluationError) {
          expect(error.expression).toBe('missing + 1');
          expect(error.code).toBe('EVALUATION_ERROR');
        }
      }
    });
  });

  describe('builtins', () => {
    it('rounds half to even', () => {
      expect(evaluate('round(2.5)', scopeOf())).toBe(2);
      expect(evaluate('round(3.5)', scopeOf())).toBe(4);
      expect(evaluate('round(1.25, 1)', scopeOf())).toBe(1.2);
    });

    it('takes min/max over arguments or a single list', () => {
      expect(evaluate('min(3, 1, 2)', scopeOf())).toBe(1);
      expect(evaluate('max([4, 9, 2])', scopeOf())).toBe(9);
      expect(() => evaluate('max([])', scopeOf())).toThrow(EvaluationError);
    });

    it('converts with int, float and str', () => {
      expect(evaluate("int('42')", scopeOf())).toBe(42);
      expect(evaluate('int(-3.9)', scopeOf())).toBe(-3);
      expect(evaluate("float('2.5')", scopeOf())).toBe(2.5);
      expect(evaluate('str(True)', scopeOf())).toBe('True');
      expect(evaluate("str([1, 'a'])", scopeOf())).toBe("[1, 'a']");
      expect(evaluate('str((1,))', scopeOf())).toBe('(1,)');
      expect(() => evaluate("float('abc')", scopeOf())).toThrow(EvaluationError);
    });

    it('measures strings and lists with len and abs', () => {
      expect(evaluate("len('abcd')", scopeOf())).toBe(4);
      expect(evaluate('len(values)', scopeOf({ values: [1, 2, 3] }))).toBe(3);
      expect(evaluate('abs(-4.5)', scopeOf())).toBe(4.5);
    });
  });

  describe('rejected constructs', () => {
    it.each([
      ["__import__('os')", "function '__import__' is not allowed"],
      ['open("f")', "function 'open' is not allowed"],
      ['x.y', "unexpected character '.' at position 1"],
      ['x = 1', "unexpected character '=' at position 2"],
      ['lambda x', "'lambda' is not allowed at position 0"],
      ['lambda: 1', "unexpected character ':' at position 6"],
      ['1; 2', "unexpected character ';' at position 1"],
    ])('rejects %s', (expression, reason) => {
      expect(() => evaluate(expression, scopeOf({ x: 1 }))).toThrow(
        `Invalid expression '${expression}': ${reason}`
      );
    });

    it('rejects comprehensions and subscripts', () => {
      expect(() => evaluate('[x for x in y]', scopeOf())).toThrow(EvaluationError);
      expect(() => evaluate('values[0]', scopeOf({ values: [1] }))).toThrow(EvaluationError);
    });
  });
});

describe('validateExpression', () => {
  it('returns null for well-formed text', () => {
    expect(validateExpression('voltage > 4.5 and current < 1')).toBeNull();
  });

  it('describes the syntax problem', () => {
    expect(validateExpression('1 +')).toBe(
      "Invalid expression '1 +': unexpected end of expression at position 3"
    );
    expect(validateExpression('')).toBe("Invalid expression '': empty expression");
  });
});

describe('ExpressionEvaluator', () => {
  it('caches parsed expressions by text', () => {
    const evaluator = new ExpressionEvaluator();
    const first = evaluator.compile('x + 1');
    evaluator.compile('x + 1');

    expect(evaluator.cacheSize).toBe(1);
    expect(first.evaluate(scopeOf({ x: 1 }))).toBe(2);
    expect(first.evaluate(scopeOf({ x: 41 }))).toBe(42);

    evaluator.clearCache();
    expect(evaluator.cacheSize).toBe(0);
  });
});
