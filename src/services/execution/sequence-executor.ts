/**
 * Sequence Executor
 *
 * Drives one run of a sequence over its scope tree:
 * - checkpoint (stop flag, pause gate) before every block
 * - Loop/While repetition bounded by iteration caps
 * - If/Else routing and Try error boundaries
 * - Parallel regions on a bounded worker pool, awaited or detached
 *
 * Emits 'state', 'progress' and 'completed' events alongside the registered
 * callbacks.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config.js';
import type {
  BlockOutcome,
  ExecutionLogDocument,
  ExecutionLogEntry,
  ExecutionResult,
  ExecutionStateName,
  TerminalState,
  VariableMap,
  VariableValue,
} from '../../types/index.js';
import { runWithConcurrency } from '../../utils/async.js';
import {
  BlockExecutionError,
  EvaluationError,
  errorMessage,
  toBlockExecutionError,
} from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import {
  IfBlock,
  LoopBlock,
  ParallelBlock,
  TryBlock,
  WhileBlock,
  sweepIndexVariable,
  sweepValuesVariable,
  type BaseBlock,
} from '../blocks/index.js';
import { copyValue, evaluate, isSequenceValue, truthy } from '../expression/index.js';
import type { BlockNode, Sequence } from '../sequence/index.js';
import { ExecutionContext } from './execution-context.js';
import { ExecutionState } from './execution-state.js';

const logger = log.child({ service: 'sequence-executor' });

// ============================================================================
// Types
// ============================================================================

export interface SequenceExecutorOptions {
  /** Terminate the run on the first uncaptured block failure */
  stopOnError?: boolean;
}

export type ProgressCallback = (
  block: BaseBlock,
  index: number,
  outcome: BlockOutcome | null,
  state: ExecutionStateName
) => void;

export type CompletionCallback = (result: ExecutionResult) => void;

export interface ProgressEvent {
  blockId: string;
  index: number;
  outcome: BlockOutcome | null;
  state: ExecutionStateName;
  progress: number;
}

/**
 * continue: move to the next node
 * halt: stop requested or a fatal failure
 * unwind: a failure was captured; leave everything up to the nearest Try
 */
type WalkSignal = 'continue' | 'halt' | 'unwind';

interface ErrorBoundary {
  blockId: string;
  variable: string;
}

interface StepResult {
  signal: WalkSignal;
  outcome: BlockOutcome | null;
}

function mergeSignals(signals: WalkSignal[]): WalkSignal {
  if (signals.includes('halt')) return 'halt';
  if (signals.includes('unwind')) return 'unwind';
  return 'continue';
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/** Outcomes can hold the same list a block stored in the context */
function copyOutcome(outcome: BlockOutcome): BlockOutcome {
  const lists = Object.entries(outcome).flatMap(([key, value]): [string, VariableValue][] =>
    Array.isArray(value) ? [[key, copyValue(value)]] : []
  );
  return { ...outcome, ...Object.fromEntries(lists) };
}

// ============================================================================
// Sequence Executor
// ============================================================================

export class SequenceExecutor extends EventEmitter {
  readonly id = uuidv4();
  readonly stopOnError: boolean;

  private readonly state = new ExecutionState();
  private readonly progressCallbacks: ProgressCallback[] = [];
  private readonly completionCallbacks: CompletionCallback[] = [];
  private detached: Promise<void>[] = [];
  private result: ExecutionResult | null = null;

  constructor(
    readonly sequence: Sequence,
    readonly context: ExecutionContext = new ExecutionContext(),
    options: SequenceExecutorOptions = {}
  ) {
    super();
    this.stopOnError = options.stopOnError ?? config.automation.stopOnError;
  }

  // ==========================================================================
  // Callbacks
  // ==========================================================================

  registerProgressCallback(callback: ProgressCallback): void {
    this.progressCallbacks.push(callback);
  }

  registerCompletionCallback(callback: CompletionCallback): void {
    this.completionCallbacks.push(callback);
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  /**
   * Run the sequence to a terminal state. Never rejects: refusals and
   * failures come back as a failed result.
   */
  async start(): Promise<ExecutionResult> {
    if (this.state.isActive) {
      logger.warn('Start refused, sequence already running', { executorId: this.id });
      return this.refusal(['Sequence is already running']);
    }

    const problems = this.sequence.validate();
    if (problems.length > 0) {
      logger.warn('Sequence validation failed', {
        sequence: this.sequence.name,
        errors: problems,
      });
      return this.refusal(problems);
    }

    const tree = this.sequence.buildTree();
    const blocks = [...this.sequence.blocks];

    this.context.reset();
    this.state.begin(blocks.length);
    this.detached = [];
    this.result = null;
    blocks.forEach((block) => block.lock());
    this.emitState();

    logger.info('Starting sequence', {
      executorId: this.id,
      sequence: this.sequence.name,
      blocks: blocks.length,
      stopOnError: this.stopOnError,
    });

    try {
      await this.runNodes(tree.nodes, null);
      await this.drainDetached();
      await this.state.waitWhilePaused();
    } catch (error) {
      logger.error('Sequence execution aborted', error instanceof Error ? error : undefined, {
        executorId: this.id,
      });
      this.state.recordError(`Execution aborted: ${errorMessage(error)}`, true);
    } finally {
      blocks.forEach((block) => block.unlock());
    }

    const terminal: TerminalState = this.state.wasStopped
      ? 'stopped'
      : this.state.hasFatalFailure
        ? 'failed'
        : 'completed';
    this.state.finish(terminal);
    this.emitState();

    const result = this.buildResult(terminal);
    this.result = result;

    logger.info('Sequence finished', {
      executorId: this.id,
      sequence: this.sequence.name,
      state: terminal,
      blocksExecuted: result.blocksExecuted,
      errors: result.errors.length,
      duration: result.duration,
    });

    this.notifyCompletion(result);
    return result;
  }

  private async runNodes(nodes: BlockNode[], boundary: ErrorBoundary | null): Promise<WalkSignal> {
    for (const node of nodes) {
      if (await this.state.checkpoint()) {
        return 'halt';
      }
      const signal = await this.runNode(node, boundary);
      if (signal !== 'continue') {
        return signal;
      }
    }
    return 'continue';
  }

  private async runNode(node: BlockNode, boundary: ErrorBoundary | null): Promise<WalkSignal> {
    const { block } = node;

    if (block instanceof LoopBlock) return this.runLoop(node, block, boundary);
    if (block instanceof WhileBlock) return this.runWhile(node, block, boundary);
    if (block instanceof IfBlock) return this.runIf(node, block, boundary);
    if (block instanceof TryBlock) return this.runTry(node, block, boundary);
    if (block instanceof ParallelBlock) return this.runParallel(node, block, boundary);

    const step = await this.runStep(node, boundary, () => block.execute(this.context));
    return step.signal;
  }

  /**
   * Execute one block and record it. A failure is captured by `boundary`
   * when there is one, otherwise it follows the stop-on-error policy.
   */
  private async runStep(
    node: BlockNode,
    boundary: ErrorBoundary | null,
    action: () => Promise<BlockOutcome>
  ): Promise<StepResult> {
    const { block, index } = node;
    this.state.currentIndex = index;

    try {
      const outcome = await action();
      this.state.recordSuccess({ ...this.entryFor(block, index), success: true, outcome });
      logger.debug('Block executed', { blockId: block.id, index, status: outcome.status });
      this.notifyProgress(block, index, outcome);
      return { signal: 'continue', outcome };
    } catch (error) {
      const failure = toBlockExecutionError(error, 'execute');
      const entry: ExecutionLogEntry = {
        ...this.entryFor(block, index),
        success: false,
        error: failure.message,
      };

      if (boundary) {
        this.context.setVariable(boundary.variable, failure.message);
        this.state.recordHandled(entry);
        logger.warn('Block failure captured by Try scope', {
          blockId: block.id,
          index,
          tryBlockId: boundary.blockId,
          error: failure.message,
        });
        this.notifyProgress(block, index, null);
        return { signal: 'unwind', outcome: null };
      }

      const message = `Block ${index} (${block.name}) failed: ${failure.message}`;
      this.state.recordFailure(entry, message, this.stopOnError);
      logger.error(message, failure, { blockId: block.id, code: failure.code });
      this.notifyProgress(block, index, null);
      return { signal: this.stopOnError ? 'halt' : 'continue', outcome: null };
    }
  }

  private entryFor(
    block: BaseBlock,
    index: number
  ): Pick<ExecutionLogEntry, 'timestamp' | 'blockName' | 'blockId' | 'kind' | 'index'> {
    return {
      timestamp: this.context.getElapsedTime(),
      blockName: block.name,
      blockId: block.id,
      kind: block.kind,
      index,
    };
  }

  // ==========================================================================
  // Control Flow
  // ==========================================================================

  private async runLoop(
    node: BlockNode,
    block: LoopBlock,
    boundary: ErrorBoundary | null
  ): Promise<WalkSignal> {
    const plan: { values: readonly VariableValue[] | null } = { values: null };
    const step = await this.runStep(node, boundary, async () => {
      const outcome = await block.execute();
      if (block.sweepVariable) {
        plan.values = this.sweepValues(block);
      }
      return outcome;
    });
    if (!step.outcome) {
      return step.signal;
    }

    const sweep = block.sweepVariable;
    const requested = plan.values ? plan.values.length : block.iterations;
    const count = Math.min(requested, config.automation.maxIterations);
    if (count < requested) {
      logger.warn('Loop iterations capped', { blockId: block.id, requested, cap: count });
    }

    for (let iteration = 0; iteration < count; iteration++) {
      this.context.setVariable(block.counterVariable, iteration);
      if (plan.values) {
        this.context.setVariable(sweep, plan.values[iteration]);
        this.context.setVariable(sweepIndexVariable(sweep), iteration);
      }
      const signal = await this.runNodes(node.body, boundary);
      if (signal !== 'continue') {
        return signal;
      }
    }
    return 'continue';
  }

  private sweepValues(block: LoopBlock): readonly VariableValue[] {
    const values = this.context.getVariable(sweepValuesVariable(block.sweepVariable));
    if (values === undefined || !isSequenceValue(values)) {
      throw new BlockExecutionError(
        `No sweep values for '${block.sweepVariable}', run a Parameter Sweep block first`,
        { operation: 'loop', blockId: block.id }
      );
    }
    return values;
  }

  private async runWhile(
    node: BlockNode,
    block: WhileBlock,
    boundary: ErrorBoundary | null
  ): Promise<WalkSignal> {
    const step = await this.runStep(node, boundary, () => block.execute());
    if (!step.outcome) {
      return step.signal;
    }

    const cap = block.maxIterations;
    let iteration = 0;
    while (iteration < cap) {
      let proceed: boolean;
      try {
        proceed = truthy(evaluate(block.condition, this.context));
      } catch (error) {
        if (!(error instanceof EvaluationError)) {
          throw error;
        }
        logger.warn('While condition could not be evaluated, leaving loop', {
          blockId: block.id,
          error: error.message,
        });
        return 'continue';
      }
      if (!proceed) {
        return 'continue';
      }

      const signal = await this.runNodes(node.body, boundary);
      if (signal !== 'continue') {
        return signal;
      }
      iteration++;
    }

    logger.warn('While loop reached its iteration cap', { blockId: block.id, cap });
    return 'continue';
  }

  private async runIf(
    node: BlockNode,
    block: IfBlock,
    boundary: ErrorBoundary | null
  ): Promise<WalkSignal> {
    const step = await this.runStep(node, boundary, () => block.execute(this.context));
    if (!step.outcome) {
      return step.signal;
    }
    const branch = step.outcome.conditionMet === true ? node.body : (node.elseBody ?? []);
    return this.runNodes(branch, boundary);
  }

  private async runTry(
    node: BlockNode,
    block: TryBlock,
    boundary: ErrorBoundary | null
  ): Promise<WalkSignal> {
    const step = await this.runStep(node, boundary, () => block.execute());
    if (!step.outcome) {
      return step.signal;
    }
    if (!block.continueOnError) {
      return this.runNodes(node.body, boundary);
    }

    const signal = await this.runNodes(node.body, {
      blockId: block.id,
      variable: block.errorVariable,
    });
    return signal === 'unwind' ? 'continue' : signal;
  }

  private async runParallel(
    node: BlockNode,
    block: ParallelBlock,
    boundary: ErrorBoundary | null
  ): Promise<WalkSignal> {
    const step = await this.runStep(node, boundary, () => block.execute());
    if (!step.outcome) {
      return step.signal;
    }

    const tasks = node.body.map((child) => () => this.runNodes([child], boundary));
    const region = runWithConcurrency(tasks, block.maxWorkers).then(mergeSignals);

    if (block.waitAll) {
      return region;
    }

    logger.debug('Parallel region detached', { blockId: block.id, tasks: tasks.length });
    this.detached.push(
      region.then(
        (signal) => {
          logger.debug('Detached parallel region finished', { blockId: block.id, signal });
        },
        (error: unknown) => {
          logger.error('Detached parallel region failed', error instanceof Error ? error : undefined, {
            blockId: block.id,
          });
          this.state.recordError(`Block ${node.index} (${block.name}) failed: ${errorMessage(error)}`, true);
        }
      )
    );
    return 'continue';
  }

  private async drainDetached(): Promise<void> {
    while (this.detached.length > 0) {
      const pending = this.detached;
      this.detached = [];
      await Promise.all(pending);
    }
  }

  // ==========================================================================
  // Control
  // ==========================================================================

  pause(): boolean {
    const changed = this.state.pause();
    if (changed) {
      logger.info('Execution paused', { executorId: this.id });
      this.emitState();
    }
    return changed;
  }

  resume(): boolean {
    const changed = this.state.resume();
    if (changed) {
      logger.info('Execution resumed', { executorId: this.id });
      this.emitState();
    }
    return changed;
  }

  /**
   * Request a stop at the next block boundary; releases a pending pause
   */
  stop(): boolean {
    const changed = this.state.requestStop();
    if (changed) {
      logger.info('Execution stop requested', { executorId: this.id });
      this.emitState();
    }
    return changed;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getState(): ExecutionStateName {
    return this.state.name;
  }

  isRunning(): boolean {
    return this.state.isActive;
  }

  isPaused(): boolean {
    return this.state.name === 'paused';
  }

  getCurrentBlock(): BaseBlock | null {
    const index = this.state.currentIndex;
    return index === null ? null : (this.sequence.blocks[index] ?? null);
  }

  /** Percentage of the block list the cursor has passed */
  getProgress(): number {
    if (this.state.total === 0) {
      return 100;
    }
    return Math.min(100, (this.state.cursor / this.state.total) * 100);
  }

  getLastResult(): ExecutionResult | null {
    return this.result;
  }

  /**
   * Write the execution log as JSON. Relative paths resolve against
   * storage.logsDir.
   * @returns the absolute path written
   */
  async exportLog(filePath: string): Promise<string> {
    const fullPath = path.resolve(config.storage.logsDir, filePath);
    const document: ExecutionLogDocument = {
      sequenceName: this.sequence.name,
      executionState: this.state.name,
      blocksExecuted: this.state.blocksExecuted,
      errors: this.state.errors,
      variables: this.context.snapshot(),
      logEntries: this.state.log,
    };

    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, JSON.stringify(document, null, 2), 'utf-8');

    logger.info('Execution log exported', { path: fullPath, entries: document.logEntries.length });
    return fullPath;
  }

  // ==========================================================================
  // Results & Notifications
  // ==========================================================================

  private buildResult(state: TerminalState): ExecutionResult {
    return deepFreeze<ExecutionResult>({
      success: state === 'completed',
      state,
      blocksExecuted: this.state.blocksExecuted,
      duration: this.context.getElapsedTime(),
      errors: [...this.state.errors],
      variables: this.copyVariables(),
      logs: this.state.log.map((entry) =>
        entry.outcome ? { ...entry, outcome: copyOutcome(entry.outcome) } : { ...entry }
      ),
    });
  }

  /** Detached from the live context so freezing a result never touches it */
  private copyVariables(): VariableMap {
    return Object.fromEntries(
      Object.entries(this.context.snapshot()).map(([name, value]) => [name, copyValue(value)])
    );
  }

  private refusal(errors: string[]): ExecutionResult {
    return deepFreeze<ExecutionResult>({
      success: false,
      state: 'failed',
      blocksExecuted: 0,
      duration: 0,
      errors,
      variables: this.copyVariables(),
      logs: [],
    });
  }

  private notifyProgress(block: BaseBlock, index: number, outcome: BlockOutcome | null): void {
    const state = this.state.name;
    for (const callback of this.progressCallbacks) {
      try {
        callback(block, index, outcome, state);
      } catch (error) {
        logger.error('Progress callback failed', error instanceof Error ? error : undefined, {
          blockId: block.id,
        });
      }
    }
    this.safeEmit('progress', {
      blockId: block.id,
      index,
      outcome,
      state,
      progress: this.getProgress(),
    } satisfies ProgressEvent);
  }

  private notifyCompletion(result: ExecutionResult): void {
    for (const callback of this.completionCallbacks) {
      try {
        callback(result);
      } catch (error) {
        logger.error('Completion callback failed', error instanceof Error ? error : undefined, {
          executorId: this.id,
        });
      }
    }
    this.safeEmit('completed', result);
  }

  private emitState(): void {
    this.safeEmit('state', this.state.name);
  }

  private safeEmit(event: string, payload: unknown): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      logger.error(`Listener for '${event}' failed`, error instanceof Error ? error : undefined, {
        executorId: this.id,
      });
    }
  }
}
