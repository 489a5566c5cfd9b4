/**
 * Control-Flow Blocks
 *
 * Loop, While, If, Try and Parallel open a scope that a matching End closes;
 * Else splits an If scope. Their execute() only reports the configuration,
 * the executor walks the bodies. WaitFor and Sweep do their own work.
 */

import { config } from '../../config.js';
import type { BlockCategory, BlockOutcome, BlockStructure } from '../../types/index.js';
import { delay } from '../../utils/async.js';
import { BlockExecutionError, EvaluationError, TimeoutError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import { linearCount, linearRange, logSpace } from '../../utils/numeric.js';
import { evaluate, truthy } from '../expression/index.js';
import type { ExecutionContext } from '../execution/execution-context.js';
import { BaseBlock } from './base-block.js';

const logger = log.child({ service: 'control-blocks' });

export const SWEEP_MODES = ['linear', 'logarithmic', 'list'] as const;

export type SweepMode = (typeof SWEEP_MODES)[number];

export function sweepValuesVariable(variable: string): string {
  return `${variable}_sweep_values`;
}

export function sweepIndexVariable(variable: string): string {
  return `${variable}_sweep_index`;
}

function collect(...problems: Array<string | null>): string[] {
  return problems.filter((problem): problem is string => problem !== null);
}

// ============================================================================
// Scope Markers
// ============================================================================

export class LoopBlock extends BaseBlock {
  readonly kind = 'loop';
  readonly name = 'Loop';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Repeat actions multiple times';
  readonly structure: BlockStructure = 'opens_scope';

  protected defineParameters(): void {
    this.addParameter('iterations', 'int', 10, 'Iterations', { min: 1, max: 10000 });
    this.addParameter('variable', 'string', 'i', 'Counter Variable');
    this.addParameter('sweep', 'string', '', 'Sweep Variable (optional)', {
      description: 'Iterate over the values prepared by a Parameter Sweep of this name',
    });
  }

  get iterations(): number {
    return this.getNumber('iterations');
  }

  get counterVariable(): string {
    return this.getString('variable');
  }

  get sweepVariable(): string {
    return this.getString('sweep').trim();
  }

  async execute(): Promise<BlockOutcome> {
    return {
      status: 'loop_start',
      iterations: this.iterations,
      variable: this.counterVariable,
      sweep: this.sweepVariable || null,
    };
  }
}

export class WhileBlock extends BaseBlock {
  readonly kind = 'while';
  readonly name = 'While Loop';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Repeat while condition is true';
  readonly structure: BlockStructure = 'opens_scope';

  protected defineParameters(): void {
    this.addParameter('condition', 'string', 'i < 10', 'Condition Expression');
    this.addParameter('max_iterations', 'int', 1000, 'Max Iterations (safety)', {
      min: 1,
      max: 100000,
    });
  }

  protected validateConfiguration(): string[] {
    return collect(this.checkExpression('condition'));
  }

  get condition(): string {
    return this.getString('condition');
  }

  /** Iteration cap, bounded by the configured engine-wide cap */
  get maxIterations(): number {
    return Math.min(this.getNumber('max_iterations'), config.automation.maxIterations);
  }

  async execute(): Promise<BlockOutcome> {
    return {
      status: 'while_start',
      condition: this.condition,
      maxIterations: this.maxIterations,
    };
  }
}

export class IfBlock extends BaseBlock {
  readonly kind = 'if';
  readonly name = 'If Condition';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Execute actions only if condition is true';
  readonly structure: BlockStructure = 'opens_scope';

  protected defineParameters(): void {
    this.addParameter('condition', 'string', 'measurement > 0', 'Condition');
  }

  protected validateConfiguration(): string[] {
    return collect(this.checkExpression('condition'));
  }

  /**
   * Evaluates the condition. An expression that cannot be evaluated counts as
   * false; the outcome carries the reason.
   */
  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const condition = this.getString('condition');

    try {
      const conditionMet = truthy(evaluate(condition, context));
      logger.info(`Condition: ${condition} = ${conditionMet}`, { blockId: this.id });
      return { status: 'condition_evaluated', condition, conditionMet };
    } catch (error) {
      if (!(error instanceof EvaluationError)) {
        throw error;
      }
      logger.warn('Condition evaluation failed, treating as false', {
        blockId: this.id,
        error: error.message,
      });
      return { status: 'condition_evaluated', condition, conditionMet: false, error: error.message };
    }
  }
}

export class ElseBlock extends BaseBlock {
  readonly kind = 'else';
  readonly name = 'Else';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Actions to run when the If condition is false';
  readonly structure: BlockStructure = 'branch';

  protected defineParameters(): void {}

  async execute(): Promise<BlockOutcome> {
    return this.success();
  }
}

export class EndBlock extends BaseBlock {
  readonly kind = 'end';
  readonly name = 'End';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Close the innermost Loop, While, If, Try or Parallel';
  readonly structure: BlockStructure = 'closes_scope';

  protected defineParameters(): void {}

  async execute(): Promise<BlockOutcome> {
    return this.success();
  }
}

export class TryBlock extends BaseBlock {
  readonly kind = 'try';
  readonly name = 'Try-Except';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Handle errors gracefully';
  readonly structure: BlockStructure = 'opens_scope';

  protected defineParameters(): void {
    this.addParameter('continue_on_error', 'bool', true, 'Continue on Error');
    this.addParameter('error_variable', 'string', 'error', 'Error Variable');
  }

  protected validateConfiguration(): string[] {
    return this.continueOnError ? collect(this.checkRequired('error_variable')) : [];
  }

  get continueOnError(): boolean {
    return this.getBoolean('continue_on_error');
  }

  get errorVariable(): string {
    return this.getString('error_variable');
  }

  async execute(): Promise<BlockOutcome> {
    return {
      status: 'try_start',
      continueOnError: this.continueOnError,
      errorVariable: this.errorVariable,
    };
  }
}

export class ParallelBlock extends BaseBlock {
  readonly kind = 'parallel';
  readonly name = 'Parallel Execution';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Run multiple operations simultaneously';
  readonly structure: BlockStructure = 'opens_scope';

  protected defineParameters(): void {
    this.addParameter('max_workers', 'int', config.automation.defaultParallelWorkers, 'Max Parallel Workers', {
      min: 1,
      max: 16,
    });
    this.addParameter('wait_all', 'bool', true, 'Wait for All to Complete');
  }

  /** Worker count, bounded by the configured pool cap */
  get maxWorkers(): number {
    return Math.min(this.getNumber('max_workers'), config.automation.maxParallelWorkers);
  }

  get waitAll(): boolean {
    return this.getBoolean('wait_all');
  }

  async execute(): Promise<BlockOutcome> {
    return {
      status: 'parallel_start',
      maxWorkers: this.maxWorkers,
      waitAll: this.waitAll,
    };
  }
}

// ============================================================================
// Timed and Sweep Blocks
// ============================================================================

export class WaitForBlock extends BaseBlock {
  readonly kind = 'wait_for';
  readonly name = 'Wait For Condition';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Wait until condition is met';

  protected defineParameters(): void {
    this.addParameter('condition', 'string', 'voltage > 5.0', 'Condition');
    this.addParameter('timeout', 'float', 10.0, 'Timeout (seconds)', { min: 0.1, max: 3600 });
    this.addParameter('check_interval', 'float', 0.1, 'Check Interval (seconds)', {
      min: 0.01,
      max: 10,
    });
    this.addParameter('fail_on_timeout', 'bool', false, 'Fail on Timeout');
  }

  protected validateConfiguration(): string[] {
    return collect(this.checkExpression('condition'));
  }

  /**
   * Polls the condition until it holds or the timeout elapses. Evaluation
   * errors are logged and polling goes on.
   */
  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const condition = this.getString('condition');
    const timeoutMs = this.getNumber('timeout') * 1000;
    const intervalMs = this.getNumber('check_interval') * 1000;
    const startedAt = Date.now();

    while (Date.now() - startedAt < timeoutMs) {
      try {
        if (truthy(evaluate(condition, context))) {
          const elapsedTime = (Date.now() - startedAt) / 1000;
          logger.info(`Condition met after ${elapsedTime.toFixed(2)}s`, { blockId: this.id });
          return { status: 'success', conditionMet: true, elapsedTime };
        }
      } catch (error) {
        if (!(error instanceof EvaluationError)) {
          throw error;
        }
        logger.warn(`Condition evaluation error: ${error.message}`, { blockId: this.id });
      }

      await delay(intervalMs);
    }

    const elapsedTime = (Date.now() - startedAt) / 1000;
    logger.warn(`Wait timeout after ${elapsedTime.toFixed(2)}s`, { blockId: this.id, condition });

    if (this.getBoolean('fail_on_timeout')) {
      throw new TimeoutError(`wait for '${condition}'`, timeoutMs, { blockId: this.id });
    }
    return { status: 'timeout', conditionMet: false, elapsedTime };
  }
}

export class SweepBlock extends BaseBlock {
  readonly kind = 'sweep';
  readonly name = 'Parameter Sweep';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Sweep parameter through range of values';

  protected defineParameters(): void {
    this.addParameter('variable', 'string', 'voltage', 'Variable Name');
    this.addParameter('start', 'float', 0.0, 'Start Value');
    this.addParameter('stop', 'float', 10.0, 'Stop Value');
    this.addParameter('step', 'float', 1.0, 'Step Size', { min: 0.001 });
    this.addParameter('mode', 'choice', 'linear', 'Sweep Mode', { choices: SWEEP_MODES });
    this.addParameter('values_list', 'string', '', 'Custom Values (comma-separated)');
  }

  protected validateConfiguration(): string[] {
    const problems = collect(this.checkRequired('variable'));
    const mode = this.getParameter('mode');

    if (mode === 'list') {
      const missing = this.checkRequired('values_list');
      if (missing) problems.push(`${missing} for list mode`);
    }
    if (mode === 'logarithmic') {
      if (this.getNumber('start') <= 0 || this.getNumber('stop') <= 0) {
        problems.push('Logarithmic sweep requires positive start and stop values');
      } else if (this.logarithmicCount() < 1) {
        problems.push('Logarithmic sweep requires a stop value >= start');
      }
    }
    return problems;
  }

  private logarithmicCount(): number {
    const start = this.getNumber('start');
    const stop = this.getNumber('stop');
    return Math.floor((stop - start) / this.getNumber('step')) + 1;
  }

  /**
   * Materialize every sweep value up front
   */
  computeValues(): number[] {
    const start = this.getNumber('start');
    const stop = this.getNumber('stop');
    const step = this.getNumber('step');
    const limit = config.automation.maxSweepPoints;

    const ensureWithinLimit = (count: number): void => {
      if (count > limit) {
        throw new BlockExecutionError(
          `Sweep produces ${count} values, more than the limit of ${limit}`,
          { operation: 'sweep', blockId: this.id }
        );
      }
    };

    switch (this.getParameter('mode')) {
      case 'linear': {
        ensureWithinLimit(linearCount(start, stop, step));
        return linearRange(start, stop, step);
      }

      case 'logarithmic': {
        if (start <= 0 || stop <= 0) {
          throw new BlockExecutionError('Logarithmic sweep requires positive start and stop values', {
            operation: 'sweep',
            blockId: this.id,
          });
        }
        const count = this.logarithmicCount();
        if (count < 1) {
          throw new BlockExecutionError('Logarithmic sweep requires a stop value >= start', {
            operation: 'sweep',
            blockId: this.id,
          });
        }
        ensureWithinLimit(count);
        return logSpace(start, stop, count);
      }

      case 'list': {
        const entries = this.getString('values_list')
          .split(',')
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0);
        ensureWithinLimit(entries.length);
        return entries.map((entry) => {
          const value = Number(entry);
          if (Number.isNaN(value)) {
            throw new BlockExecutionError(`Invalid sweep value '${entry}'`, {
              operation: 'sweep',
              blockId: this.id,
            });
          }
          return value;
        });
      }

      default:
        return [start];
    }
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const variable = this.getString('variable');
    const values = this.computeValues();

    context.setVariable(sweepValuesVariable(variable), values);
    context.setVariable(sweepIndexVariable(variable), 0);
    logger.info(`Sweep setup: ${variable} with ${values.length} values`, { blockId: this.id });

    return {
      status: 'sweep_start',
      variable,
      numValues: values.length,
      values: values.slice(0, 10),
    };
  }
}
