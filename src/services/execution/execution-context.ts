/**
 * Execution Context
 *
 * Per-run variable store plus the instrument and data sink handles blocks
 * talk to. Filter/map transforms evaluate against derived copies so one
 * element's bindings never leak into another's.
 */

import type {
  DataSink,
  InstrumentHandle,
  VariableMap,
  VariableValue,
} from '../../types/index.js';
import { InstrumentNotFoundError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import type { VariableScope } from '../expression/index.js';

const logger = log.child({ service: 'execution-context' });

export interface ExecutionContextOptions {
  instruments?: Record<string, InstrumentHandle> | Map<string, InstrumentHandle>;
  dataSink?: DataSink | null;
  variables?: VariableMap;
}

export interface ContextSummary {
  instruments: string[];
  variables: VariableMap;
  elapsedTime: number;
}

export class ExecutionContext implements VariableScope {
  private readonly instruments: Map<string, InstrumentHandle>;
  private readonly variables = new Map<string, VariableValue>();
  private dataSink: DataSink | null;
  private startTime = Date.now();

  constructor(options: ExecutionContextOptions = {}) {
    const { instruments = {}, dataSink = null, variables = {} } = options;
    this.instruments = new Map(
      instruments instanceof Map ? instruments : Object.entries(instruments)
    );
    this.dataSink = dataSink;
    for (const [name, value] of Object.entries(variables)) {
      this.variables.set(name, value);
    }
  }

  // ==========================================================================
  // Instruments
  // ==========================================================================

  registerInstrument(name: string, instrument: InstrumentHandle): void {
    this.instruments.set(name, instrument);
    logger.debug('Instrument registered', { instrument: name });
  }

  unregisterInstrument(name: string): boolean {
    return this.instruments.delete(name);
  }

  hasInstrument(name: string): boolean {
    return this.instruments.has(name);
  }

  instrumentNames(): string[] {
    return Array.from(this.instruments.keys());
  }

  /**
   * @throws InstrumentNotFoundError listing the registered names
   */
  getInstrument(name: string): InstrumentHandle {
    const instrument = this.instruments.get(name);
    if (!instrument) {
      throw new InstrumentNotFoundError(name, this.instrumentNames(), {
        operation: 'getInstrument',
      });
    }
    return instrument;
  }

  // ==========================================================================
  // Data sink
  // ==========================================================================

  setDataSink(sink: DataSink | null): void {
    this.dataSink = sink;
  }

  get hasDataSink(): boolean {
    return this.dataSink !== null;
  }

  /**
   * Forward a record to the data sink. Returns false when none is attached.
   */
  async logData(record: Record<string, VariableValue>): Promise<boolean> {
    if (!this.dataSink) {
      return false;
    }
    await this.dataSink.logData(record);
    return true;
  }

  // ==========================================================================
  // Variables
  // ==========================================================================

  setVariable(name: string, value: VariableValue): void {
    this.variables.set(name, value);
    logger.debug('Variable set', { variable: name, value });
  }

  /**
   * Missing names yield `defaultValue` (undefined when omitted), never an error
   */
  getVariable(name: string): VariableValue | undefined;
  getVariable(name: string, defaultValue: VariableValue): VariableValue;
  getVariable(name: string, defaultValue?: VariableValue): VariableValue | undefined {
    const value = this.variables.get(name);
    return value === undefined ? defaultValue : value;
  }

  hasVariable(name: string): boolean {
    return this.variables.has(name);
  }

  deleteVariable(name: string): boolean {
    return this.variables.delete(name);
  }

  snapshot(): VariableMap {
    return Object.fromEntries(this.variables);
  }

  clearVariables(): void {
    this.variables.clear();
  }

  /**
   * Clear variables and restart the run clock
   */
  reset(): void {
    this.clearVariables();
    this.startTime = Date.now();
  }

  /** Seconds since the context was created or last reset */
  getElapsedTime(): number {
    return (Date.now() - this.startTime) / 1000;
  }

  /**
   * Fresh context with the same instruments and data sink, a copy of this
   * context's variables, and `bindings` on top
   */
  derive(bindings: VariableMap = {}): ExecutionContext {
    const derived = new ExecutionContext({
      instruments: this.instruments,
      dataSink: this.dataSink,
      variables: { ...this.snapshot(), ...bindings },
    });
    derived.startTime = this.startTime;
    return derived;
  }

  toJSON(): ContextSummary {
    return {
      instruments: this.instrumentNames(),
      variables: this.snapshot(),
      elapsedTime: this.getElapsedTime(),
    };
  }
}
