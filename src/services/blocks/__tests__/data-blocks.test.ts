import { describe, it, expect } from 'vitest';
import { EvaluationError } from '../../../utils/errors.js';
import { ExecutionContext } from '../../execution/execution-context.js';
import { DataTransformBlock, MathBlock, SetVariableBlock, safeDivide } from '../data-blocks.js';

describe('SetVariableBlock', () => {
  it('stores the evaluated expression', async () => {
    const context = new ExecutionContext({ variables: { x: 21 } });
    const block = new SetVariableBlock().setParameters({ variable: 'answer', expression: 'x * 2' });

    await expect(block.execute(context)).resolves.toEqual({
      status: 'success',
      variable: 'answer',
      value: 42,
    });
    expect(context.getVariable('answer')).toBe(42);
  });

  it('propagates evaluation errors', async () => {
    const block = new SetVariableBlock().setParameters({ expression: 'os' });
    await expect(block.execute(new ExecutionContext())).rejects.toThrow(EvaluationError);
  });
});

describe('MathBlock', () => {
  async function compute(operation: string, input1: string, input2 = '0'): Promise<unknown> {
    const context = new ExecutionContext();
    const block = new MathBlock().setParameters({ operation, input1, input2, output: 'out' });
    await block.execute(context);
    return context.getVariable('out');
  }

  it.each([
    ['add', '2', '3', 5],
    ['subtract', '2', '3', -1],
    ['multiply', '2', '3', 6],
    ['divide', '3', '2', 1.5],
    ['power', '2', '10', 1024],
    ['sqrt', '16', '0', 4],
    ['abs', '-4', '0', 4],
    ['round', '2.5', '0', 2],
  ])('%s(%s, %s) = %s', async (operation, input1, input2, expected) => {
    await expect(compute(operation, input1, input2)).resolves.toBe(expected);
  });

  it('returns signed infinity when dividing by zero', async () => {
    await expect(compute('divide', '1', '0')).resolves.toBe(Infinity);
    await expect(compute('divide', '-1', '0')).resolves.toBe(-Infinity);
    await expect(compute('divide', '0', '0')).resolves.toBeNaN();
  });

  it('evaluates inputs against context variables', async () => {
    const context = new ExecutionContext({ variables: { a: 10, b: 4 } });
    const block = new MathBlock().setParameters({ operation: 'subtract' });

    await expect(block.execute(context)).resolves.toEqual({
      status: 'success',
      operation: 'subtract',
      result: 6,
      output: 'result',
    });
  });

  it('does not evaluate the second input for unary operations', async () => {
    await expect(compute('abs', '-2', 'undefined_name')).resolves.toBe(2);
  });

  it('fails on the square root of a negative value', async () => {
    await expect(compute('sqrt', '-4')).rejects.toThrow('Cannot take the square root of -4');
  });

  it('fails on non-numeric inputs', async () => {
    await expect(compute('add', "'abc'", '1')).rejects.toThrow(
      "Math input ''abc'' is not a number (str)"
    );
  });

  it('validates both inputs of binary operations', () => {
    const block = new MathBlock().setParameters({ input2: '1 +' });
    expect(block.validate()).toEqual([
      "Input 2 (variable or value): Invalid expression '1 +': unexpected end of expression at position 3",
    ]);
  });
});

describe('safeDivide', () => {
  it('divides normally for a non-zero divisor', () => {
    expect(safeDivide(9, 3)).toBe(3);
  });
});

describe('DataTransformBlock', () => {
  const data = [3, -1, 4, -2];

  async function transform(
    operation: string,
    expression: string,
    extra: Record<string, string> = {}
  ): Promise<{ context: ExecutionContext; result: unknown }> {
    const context = new ExecutionContext({ variables: { data } });
    const block = new DataTransformBlock().setParameters({
      operation,
      expression,
      output_variable: 'out',
      ...extra,
    });
    await block.execute(context);
    return { context, result: context.getVariable('out') };
  }

  it('filters elements through the condition', async () => {
    const { context, result } = await transform('filter', 'x > 0');
    expect(result).toEqual([3, 4]);
    expect(context.hasVariable('x')).toBe(false);
  });

  it('maps each element', async () => {
    const { result } = await transform('map', 'x * 2');
    expect(result).toEqual([6, -2, 8, -4]);
  });

  it('binds a custom element variable', async () => {
    const { result } = await transform('filter', 'v >= 3', { element_variable: 'v' });
    expect(result).toEqual([3, 4]);
  });

  it('sees parent variables in element expressions', async () => {
    const context = new ExecutionContext({ variables: { data, limit: 0 } });
    const block = new DataTransformBlock().setParameters({ expression: 'x < limit' });

    await block.execute(context);
    expect(context.getVariable('filtered')).toEqual([-1, -2]);
  });

  it.each([
    ['1:3', [-1, 4]],
    ['-2:', [4, -2]],
    [':1', [3]],
  ])('slices with %s', async (expression, expected) => {
    const { result } = await transform('slice', expression);
    expect(result).toEqual(expected);
  });

  it('rejects malformed slices', async () => {
    await expect(transform('slice', 'a:b')).rejects.toThrow(
      `Invalid slice 'a:b', expected "start:end"`
    );
  });

  it('sorts and reverses', async () => {
    expect((await transform('sort', '')).result).toEqual([-2, -1, 3, 4]);
    expect((await transform('reverse', '')).result).toEqual([-2, 4, -1, 3]);
  });

  it('requires a list input', async () => {
    const context = new ExecutionContext({ variables: { data: 5 } });
    await expect(new DataTransformBlock().execute(context)).rejects.toThrow(
      'Input must be a list, got int'
    );
  });

  it('reports its sizes', async () => {
    const context = new ExecutionContext({ variables: { data } });
    await expect(new DataTransformBlock().execute(context)).resolves.toEqual({
      status: 'success',
      operation: 'filter',
      inputSize: 4,
      outputSize: 2,
      output: 'filtered',
    });
  });
});
