/**
 * Action Blocks
 *
 * Blocks that act on instruments, the data sink, or the log.
 */

import { config } from '../../config.js';
import type { BlockCategory, BlockOutcome, VariableValue } from '../../types/index.js';
import { delay } from '../../utils/async.js';
import {
  AssertionFailedError,
  BlockExecutionError,
  InstrumentCapabilityError,
} from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import { applyComparison, formatValue, type ComparisonOperator } from '../expression/index.js';
import type { ExecutionContext } from '../execution/execution-context.js';
import { BaseBlock } from './base-block.js';

const logger = log.child({ service: 'action-blocks' });

export const COMPARISON_CHOICES: readonly ComparisonOperator[] = ['>', '<', '>=', '<=', '==', '!='];

function requireVariable(context: ExecutionContext, name: string, blockId: string): VariableValue {
  if (!context.hasVariable(name)) {
    throw new BlockExecutionError(`Variable '${name}' not found`, {
      operation: 'getVariable',
      blockId,
      variable: name,
    });
  }
  return context.getVariable(name, null);
}

function capabilityError(instrument: string, capability: string, blockId: string): InstrumentCapabilityError {
  return new InstrumentCapabilityError(instrument, capability, { operation: 'execute', blockId });
}

// ============================================================================
// General
// ============================================================================

export class DelayBlock extends BaseBlock {
  readonly kind = 'delay';
  readonly name = 'Delay';
  readonly category: BlockCategory = 'Control';
  readonly description = 'Wait for specified duration';

  protected defineParameters(): void {
    this.addParameter('duration', 'float', 1.0, 'Duration (seconds)', { min: 0.001 });
  }

  async execute(): Promise<BlockOutcome> {
    const requested = this.getNumber('duration');
    const duration = Math.min(requested, config.automation.maxDelaySeconds);
    if (duration < requested) {
      logger.warn('Delay capped', { requested, duration, blockId: this.id });
    }

    logger.info(`Delaying for ${duration}s`, { blockId: this.id });
    await delay(duration * 1000);
    return this.success({ duration });
  }
}

export class CommentBlock extends BaseBlock {
  readonly kind = 'comment';
  readonly name = 'Comment';
  readonly category: BlockCategory = 'General';
  readonly description = 'Add comment or note to sequence';

  protected defineParameters(): void {
    this.addParameter('text', 'string', '', 'Comment Text');
  }

  async execute(_context?: ExecutionContext): Promise<BlockOutcome> {
    const text = this.getString('text');
    logger.info(`Comment: ${text}`, { blockId: this.id });
    return this.success({ text });
  }
}

// ============================================================================
// Power Supply
// ============================================================================

export class SetVoltageBlock extends BaseBlock {
  readonly kind = 'set_voltage';
  readonly name = 'Set Voltage';
  readonly category: BlockCategory = 'Power Supply';
  readonly description = 'Set output voltage on power supply';

  protected defineParameters(): void {
    this.addParameter('instrument', 'instrument', null, 'Power Supply');
    this.addParameter('channel', 'int', 1, 'Channel', { min: 1 });
    this.addParameter('voltage', 'float', 5.0, 'Voltage (V)', { min: 0.0 });
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const name = this.getInstrumentName();
    const channel = this.getNumber('channel');
    const voltage = this.getNumber('voltage');

    const instrument = context.getInstrument(name);
    if (!instrument.setVoltage) {
      throw capabilityError(name, 'setVoltage', this.id);
    }
    await instrument.setVoltage(channel, voltage);
    logger.info(`Set ${name} CH${channel} to ${voltage}V`, { blockId: this.id });

    return this.success({ voltage });
  }
}

export class SetCurrentBlock extends BaseBlock {
  readonly kind = 'set_current';
  readonly name = 'Set Current';
  readonly category: BlockCategory = 'Power Supply';
  readonly description = 'Set current limit on power supply';

  protected defineParameters(): void {
    this.addParameter('instrument', 'instrument', null, 'Power Supply');
    this.addParameter('channel', 'int', 1, 'Channel', { min: 1 });
    this.addParameter('current', 'float', 1.0, 'Current (A)', { min: 0.0 });
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const name = this.getInstrumentName();
    const channel = this.getNumber('channel');
    const current = this.getNumber('current');

    const instrument = context.getInstrument(name);
    if (!instrument.setCurrent) {
      throw capabilityError(name, 'setCurrent', this.id);
    }
    await instrument.setCurrent(channel, current);
    logger.info(`Set ${name} CH${channel} current to ${current}A`, { blockId: this.id });

    return this.success({ current });
  }
}

export class OutputEnableBlock extends BaseBlock {
  readonly kind = 'output_enable';
  readonly name = 'Output Enable';
  readonly category: BlockCategory = 'Power Supply';
  readonly description = 'Enable or disable instrument output';

  protected defineParameters(): void {
    this.addParameter('instrument', 'instrument', null, 'Instrument');
    this.addParameter('channel', 'int', 1, 'Channel', { min: 1 });
    this.addParameter('enable', 'bool', true, 'Enable Output');
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const name = this.getInstrumentName();
    const channel = this.getNumber('channel');
    const enable = this.getBoolean('enable');

    const instrument = context.getInstrument(name);
    if (!instrument.setOutput) {
      throw capabilityError(name, 'setOutput', this.id);
    }
    await instrument.setOutput(channel, enable);
    logger.info(`Output ${enable ? 'enabled' : 'disabled'} on ${name} CH${channel}`, {
      blockId: this.id,
    });

    return this.success({ enabled: enable });
  }
}

// ============================================================================
// Measurement
// ============================================================================

export class MeasureBlock extends BaseBlock {
  readonly kind = 'measure';
  readonly name = 'Measure';
  readonly category: BlockCategory = 'Measurement';
  readonly description = 'Perform measurement and store result';

  protected defineParameters(): void {
    this.addParameter('instrument', 'instrument', null, 'Instrument');
    this.addParameter('variable', 'string', 'measurement', 'Store in Variable');
  }

  protected validateConfiguration(): string[] {
    const problem = this.checkRequired('variable');
    return problem ? [problem] : [];
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const name = this.getInstrumentName();
    const variable = this.getString('variable');

    const instrument = context.getInstrument(name);
    if (!instrument.measure) {
      throw capabilityError(name, 'measure', this.id);
    }
    const value = await instrument.measure();

    context.setVariable(variable, value);
    logger.info(`Measured ${value} on ${name}, stored in ${variable}`, { blockId: this.id });

    return this.success({ value, variable });
  }
}

export class InstrumentCommandBlock extends BaseBlock {
  readonly kind = 'instrument_command';
  readonly name = 'Instrument Command';
  readonly category: BlockCategory = 'Instrument';
  readonly description = 'Send a raw command, optionally reading the reply';

  protected defineParameters(): void {
    this.addParameter('instrument', 'instrument', null, 'Instrument');
    this.addParameter('command', 'string', '*IDN?', 'Command');
    this.addParameter('query', 'bool', false, 'Read Response');
    this.addParameter('variable', 'string', 'response', 'Store Response in Variable');
  }

  protected validateConfiguration(): string[] {
    const problem = this.checkRequired('command');
    return problem ? [problem] : [];
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const name = this.getInstrumentName();
    const command = this.getString('command');
    const instrument = context.getInstrument(name);

    if (!this.getBoolean('query')) {
      if (!instrument.write) {
        throw capabilityError(name, 'write', this.id);
      }
      await instrument.write(command);
      logger.info(`Wrote '${command}' to ${name}`, { blockId: this.id });
      return this.success({ command });
    }

    if (!instrument.query) {
      throw capabilityError(name, 'query', this.id);
    }
    const variable = this.getString('variable');
    const response = await instrument.query(command);
    context.setVariable(variable, response);
    logger.info(`Queried '${command}' on ${name}`, { blockId: this.id, response });

    return this.success({ command, response, variable });
  }
}

// ============================================================================
// Data and Validation
// ============================================================================

export class LogDataBlock extends BaseBlock {
  readonly kind = 'log_data';
  readonly name = 'Log Data';
  readonly category: BlockCategory = 'Data';
  readonly description = 'Log data to file or memory';

  protected defineParameters(): void {
    this.addParameter('variable', 'string', 'measurement', 'Variable to Log');
    this.addParameter('label', 'string', '', 'Label (optional)');
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const variable = this.getString('variable');
    const label = this.getString('label') || variable;

    const value = requireVariable(context, variable, this.id);
    const logged = await context.logData({ [label]: value });
    logger.info(`Logged: ${label} = ${formatValue(value)}`, { blockId: this.id, logged });

    return this.success({ variable, label, value, logged });
  }
}

export class AssertBlock extends BaseBlock {
  readonly kind = 'assert';
  readonly name = 'Assert';
  readonly category: BlockCategory = 'Validation';
  readonly description = 'Assert condition is true (fail test if false)';

  protected defineParameters(): void {
    this.addParameter('variable', 'string', 'measurement', 'Variable');
    this.addParameter('operator', 'choice', '>', 'Operator', { choices: COMPARISON_CHOICES });
    this.addParameter('value', 'float', 0.0, 'Expected Value');
    this.addParameter('message', 'string', 'Assertion failed', 'Error Message');
  }

  async execute(context: ExecutionContext): Promise<BlockOutcome> {
    const variable = this.getString('variable');
    const expected = this.getNumber('value');
    const message = this.getString('message');
    const operator = COMPARISON_CHOICES.find((choice) => choice === this.getParameter('operator'));
    if (!operator) {
      throw new BlockExecutionError(`Unsupported operator: ${String(this.getParameter('operator'))}`, {
        operation: 'assert',
        blockId: this.id,
      });
    }

    const actual = requireVariable(context, variable, this.id);
    const description = `${variable}(${formatValue(actual)}) ${operator} ${expected}`;

    if (!applyComparison(operator, actual, expected)) {
      logger.error(`${message}: ${description}`, undefined, { blockId: this.id });
      throw new AssertionFailedError(`${message}: ${description}`, {
        operation: 'assert',
        blockId: this.id,
        variable,
        actual,
        expected,
      });
    }

    logger.info(`Assertion passed: ${description}`, { blockId: this.id });
    return this.success({ passed: true, variable, actual, expected });
  }
}
