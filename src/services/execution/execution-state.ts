/**
 * Execution State
 *
 * All mutable run state in one place: lifecycle, cursor, log, errors and the
 * pause gate. The executor and the control methods (pause/resume/stop) only
 * touch a run through these transitions.
 */

import type {
  ExecutionLogEntry,
  ExecutionStateName,
  TerminalState,
} from '../../types/index.js';
import { createDeferred, type Deferred } from '../../utils/async.js';

export class ExecutionState {
  private current: ExecutionStateName = 'idle';
  private stopRequested = false;
  private interrupted = false;
  private halted = false;
  private pauseGate: Deferred<void> | null = null;
  private logEntries: ExecutionLogEntry[] = [];
  private errorList: string[] = [];

  cursor = 0;
  total = 0;
  blocksExecuted = 0;
  currentIndex: number | null = null;

  get name(): ExecutionStateName {
    return this.current;
  }

  get isActive(): boolean {
    return this.current === 'running' || this.current === 'paused';
  }

  get log(): readonly ExecutionLogEntry[] {
    return this.logEntries;
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  /** True when a stop request actually kept a block from running */
  get wasStopped(): boolean {
    return this.interrupted;
  }

  /** A failure under stop-on-error ended the run */
  get hasFatalFailure(): boolean {
    return this.halted;
  }

  /** True once a run should not start any further block */
  get shouldHalt(): boolean {
    return this.stopRequested || this.halted;
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  begin(total: number): void {
    this.current = 'running';
    this.stopRequested = false;
    this.interrupted = false;
    this.halted = false;
    this.pauseGate = null;
    this.logEntries = [];
    this.errorList = [];
    this.cursor = 0;
    this.total = total;
    this.blocksExecuted = 0;
    this.currentIndex = null;
  }

  pause(): boolean {
    if (this.current !== 'running') {
      return false;
    }
    this.current = 'paused';
    this.pauseGate = createDeferred<void>();
    return true;
  }

  resume(): boolean {
    if (this.current !== 'paused') {
      return false;
    }
    this.current = 'running';
    this.releaseGate();
    return true;
  }

  /**
   * Flag the run for stopping. A paused run goes back to running so the walk
   * can reach its next checkpoint and terminate.
   */
  requestStop(): boolean {
    if (!this.isActive || this.stopRequested) {
      return false;
    }
    this.stopRequested = true;
    if (this.current === 'paused') {
      this.current = 'running';
      this.releaseGate();
    }
    return true;
  }

  finish(state: TerminalState): void {
    this.current = state;
    this.currentIndex = null;
    if (state === 'completed') {
      this.cursor = this.total;
    }
    this.releaseGate();
  }

  /**
   * Wait at a block boundary.
   * @returns true when the walk must not continue
   */
  async checkpoint(): Promise<boolean> {
    if (!this.shouldHalt) {
      await this.waitWhilePaused();
    }
    if (this.stopRequested) {
      this.interrupted = true;
    }
    return this.shouldHalt;
  }

  async waitWhilePaused(): Promise<void> {
    while (this.pauseGate) {
      await this.pauseGate.promise;
    }
  }

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  recordSuccess(entry: ExecutionLogEntry): void {
    this.logEntries.push(entry);
    this.blocksExecuted++;
    this.advance(entry.index);
  }

  /**
   * @param fatal the failure terminates the run
   */
  recordFailure(entry: ExecutionLogEntry, message: string, fatal: boolean): void {
    this.logEntries.push(entry);
    this.errorList.push(message);
    if (fatal) {
      this.halted = true;
    }
    this.advance(entry.index);
  }

  /** Failure captured by a Try scope: logged, not counted as an error */
  recordHandled(entry: ExecutionLogEntry): void {
    this.logEntries.push({ ...entry, handled: true });
    this.advance(entry.index);
  }

  recordError(message: string, fatal: boolean): void {
    this.errorList.push(message);
    if (fatal) {
      this.halted = true;
    }
  }

  private advance(index: number): void {
    this.cursor = Math.max(this.cursor, index + 1);
  }

  private releaseGate(): void {
    const gate = this.pauseGate;
    this.pauseGate = null;
    gate?.resolve();
  }
}
