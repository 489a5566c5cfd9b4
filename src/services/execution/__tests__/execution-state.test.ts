import { describe, it, expect } from 'vitest';
import type { ExecutionLogEntry } from '../../../types/index.js';
import { ExecutionState } from '../execution-state.js';

function entry(index: number, success = true): ExecutionLogEntry {
  return {
    timestamp: 0,
    blockName: 'Delay',
    blockId: `b${index}`,
    kind: 'delay',
    index,
    success,
  };
}

describe('ExecutionState', () => {
  it('starts idle and only pauses a running state', () => {
    const state = new ExecutionState();
    expect(state.name).toBe('idle');
    expect(state.pause()).toBe(false);
    expect(state.resume()).toBe(false);

    state.begin(3);
    expect(state.name).toBe('running');
    expect(state.pause()).toBe(true);
    expect(state.pause()).toBe(false);
    expect(state.name).toBe('paused');
    expect(state.resume()).toBe(true);
    expect(state.name).toBe('running');
  });

  it('holds checkpoints at the pause gate until resumed', async () => {
    const state = new ExecutionState();
    state.begin(1);
    state.pause();

    let released = false;
    const waiting = state.checkpoint().then((halt) => {
      released = true;
      return halt;
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(released).toBe(false);

    state.resume();
    await expect(waiting).resolves.toBe(false);
  });

  it('releases a paused checkpoint on stop and reports the halt', async () => {
    const state = new ExecutionState();
    state.begin(1);
    state.pause();

    const waiting = state.checkpoint();
    expect(state.requestStop()).toBe(true);
    expect(state.name).toBe('running');

    await expect(waiting).resolves.toBe(true);
    expect(state.wasStopped).toBe(true);
    expect(state.requestStop()).toBe(false);
  });

  it('counts a stop only once a checkpoint acts on it', async () => {
    const state = new ExecutionState();
    state.begin(1);
    state.requestStop();

    expect(state.wasStopped).toBe(false);
    expect(state.hasFatalFailure).toBe(false);
    await expect(state.checkpoint()).resolves.toBe(true);
    expect(state.wasStopped).toBe(true);
  });

  it('counts successes, errors and handled failures separately', () => {
    const state = new ExecutionState();
    state.begin(4);

    state.recordSuccess(entry(0));
    state.recordFailure(entry(1, false), 'Block 1 (Delay) failed: boom', false);
    state.recordHandled(entry(2, false));

    expect(state.blocksExecuted).toBe(1);
    expect(state.errors).toEqual(['Block 1 (Delay) failed: boom']);
    expect(state.log.map((item) => item.handled)).toEqual([undefined, undefined, true]);
    expect(state.cursor).toBe(3);
    expect(state.shouldHalt).toBe(false);

    state.recordFailure(entry(3, false), 'Block 3 (Delay) failed: boom', true);
    expect(state.shouldHalt).toBe(true);
  });

  it('moves the cursor to the end on completion and clears on begin', () => {
    const state = new ExecutionState();
    state.begin(5);
    state.recordSuccess(entry(1));
    state.finish('completed');
    expect(state.cursor).toBe(5);
    expect(state.isActive).toBe(false);

    state.begin(2);
    expect(state.cursor).toBe(0);
    expect(state.log).toEqual([]);
    expect(state.blocksExecuted).toBe(0);
  });
});
