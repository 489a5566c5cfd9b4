import { describe, it, expect } from 'vitest';
import { BlockExecutionError, TimeoutError } from '../../../utils/errors.js';
import { ExecutionContext } from '../../execution/execution-context.js';
import {
  IfBlock,
  LoopBlock,
  ParallelBlock,
  SweepBlock,
  TryBlock,
  WaitForBlock,
  WhileBlock,
} from '../control-blocks.js';

describe('scope markers', () => {
  it('reports the loop configuration', async () => {
    await expect(new LoopBlock().execute()).resolves.toEqual({
      status: 'loop_start',
      iterations: 10,
      variable: 'i',
      sweep: null,
    });
  });

  it('reports the while configuration', async () => {
    await expect(new WhileBlock().execute()).resolves.toEqual({
      status: 'while_start',
      condition: 'i < 10',
      maxIterations: 1000,
    });
  });

  it('reports the try configuration', async () => {
    const block = new TryBlock().setParameters({ error_variable: 'last_error' });
    await expect(block.execute()).resolves.toEqual({
      status: 'try_start',
      continueOnError: true,
      errorVariable: 'last_error',
    });
  });

  it('bounds parallel workers by the pool cap', async () => {
    const block = new ParallelBlock();
    expect(block.maxWorkers).toBe(4);

    block.setParameter('max_workers', 16);
    await expect(block.execute()).resolves.toEqual({
      status: 'parallel_start',
      maxWorkers: 16,
      waitAll: true,
    });
  });

  it('opens scopes', () => {
    expect(new LoopBlock().structure).toBe('opens_scope');
    expect(new SweepBlock().structure).toBe('simple');
  });
});

describe('IfBlock', () => {
  it('evaluates its condition against the context', async () => {
    const context = new ExecutionContext({ variables: { v: 2 } });
    const block = new IfBlock().setParameters({ condition: 'v > 1' });

    await expect(block.execute(context)).resolves.toEqual({
      status: 'condition_evaluated',
      condition: 'v > 1',
      conditionMet: true,
    });
  });

  it('treats an evaluation error as false', async () => {
    const block = new IfBlock().setParameters({ condition: 'missing > 1' });

    await expect(block.execute(new ExecutionContext())).resolves.toEqual({
      status: 'condition_evaluated',
      condition: 'missing > 1',
      conditionMet: false,
      error: "Invalid expression 'missing > 1': name 'missing' is not defined",
    });
  });
});

describe('WaitForBlock', () => {
  it('returns once the condition becomes true', async () => {
    const context = new ExecutionContext({ variables: { ready: false } });
    const block = new WaitForBlock().setParameters({
      condition: 'ready',
      timeout: 2,
      check_interval: 0.01,
    });
    setTimeout(() => context.setVariable('ready', true), 50);

    const outcome = await block.execute(context);
    expect(outcome.status).toBe('success');
    expect(outcome.conditionMet).toBe(true);
    expect(outcome.elapsedTime).toBeGreaterThanOrEqual(0.04);
    expect(outcome.elapsedTime).toBeLessThan(2);
  });

  it('times out without raising', async () => {
    const block = new WaitForBlock().setParameters({
      condition: 'False',
      timeout: 0.1,
      check_interval: 0.02,
    });

    const outcome = await block.execute(new ExecutionContext());
    expect(outcome.status).toBe('timeout');
    expect(outcome.conditionMet).toBe(false);
    expect(outcome.elapsedTime).toBeGreaterThanOrEqual(0.1);
    expect(outcome.elapsedTime).toBeLessThan(0.5);
  });

  it('keeps polling through evaluation errors', async () => {
    const context = new ExecutionContext();
    const block = new WaitForBlock().setParameters({
      condition: 'late > 0',
      timeout: 2,
      check_interval: 0.01,
    });
    setTimeout(() => context.setVariable('late', 1), 30);

    const outcome = await block.execute(context);
    expect(outcome.conditionMet).toBe(true);
  });

  it('raises on timeout when configured to fail', async () => {
    const block = new WaitForBlock().setParameters({
      condition: 'False',
      timeout: 0.1,
      check_interval: 0.05,
      fail_on_timeout: true,
    });

    await expect(block.execute(new ExecutionContext())).rejects.toThrow(TimeoutError);
  });
});

describe('SweepBlock', () => {
  it('materializes a linear sweep including the stop value', async () => {
    const context = new ExecutionContext();
    const block = new SweepBlock().setParameters({ variable: 'v', start: 0, stop: 1, step: 0.5 });

    const outcome = await block.execute(context);
    expect(outcome).toEqual({ status: 'sweep_start', variable: 'v', numValues: 3, values: [0, 0.5, 1] });
    expect(context.getVariable('v_sweep_values')).toEqual([0, 0.5, 1]);
    expect(context.getVariable('v_sweep_index')).toBe(0);
  });

  it('spaces logarithmic points evenly in decades', () => {
    const block = new SweepBlock().setParameters({
      mode: 'logarithmic',
      start: 1,
      stop: 100,
      step: 49.5,
    });
    expect(block.computeValues()).toEqual([1, 10, 100]);
  });

  it('rejects a logarithmic sweep whose stop is below its start', () => {
    const block = new SweepBlock().setParameters({ mode: 'logarithmic', start: 100, stop: 1, step: 1 });

    expect(block.validate()).toEqual(['Logarithmic sweep requires a stop value >= start']);
    expect(() => block.computeValues()).toThrow(BlockExecutionError);
    expect(() => block.computeValues()).toThrow('Logarithmic sweep requires a stop value >= start');
  });

  it('parses an explicit list', () => {
    const block = new SweepBlock().setParameters({ mode: 'list', values_list: '3, 1,, 2.5' });
    expect(block.computeValues()).toEqual([3, 1, 2.5]);
  });

  it('rejects malformed list entries', () => {
    const block = new SweepBlock().setParameters({ mode: 'list', values_list: '1, x' });
    expect(() => block.computeValues()).toThrow("Invalid sweep value 'x'");
  });

  it('refuses sweeps beyond the point limit', () => {
    const block = new SweepBlock().setParameters({ start: 0, stop: 1000000, step: 1 });
    expect(() => block.computeValues()).toThrow(BlockExecutionError);
    expect(() => block.computeValues()).toThrow(
      'Sweep produces 1000001 values, more than the limit of 100000'
    );
  });

  it('validates mode-specific settings', () => {
    const logarithmic = new SweepBlock().setParameters({ mode: 'logarithmic', start: 0 });
    expect(logarithmic.validate()).toEqual([
      'Logarithmic sweep requires positive start and stop values',
    ]);

    const list = new SweepBlock().setParameters({ mode: 'list' });
    expect(list.validate()).toEqual(['Custom Values (comma-separated) is required for list mode']);
  });
});
