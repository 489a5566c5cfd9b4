/**
 * Sequence Automation Type Definitions
 *
 * Shared types for blocks, sequences, instruments, execution state and
 * execution results.
 */

// ============================================================================
// VALUE TYPES
// ============================================================================

/**
 * A value a block parameter may hold
 */
export type ParameterValue = number | string | boolean | null;

/**
 * A value stored in the execution context or produced by an expression.
 * Tuples are represented as frozen arrays.
 */
export type VariableValue = number | string | boolean | null | readonly VariableValue[];

export type VariableMap = Record<string, VariableValue>;

// ============================================================================
// BLOCK TYPES
// ============================================================================

/**
 * Parameter type tags understood by the palette and the validators
 */
export type ParameterType = 'int' | 'float' | 'string' | 'bool' | 'choice' | 'instrument';

/**
 * Parameter definition for a block
 */
export interface BlockParameter {
  name: string;
  type: ParameterType;
  default: ParameterValue;
  /** Human readable label, used in validation messages */
  label: string;
  description?: string;
  /** Inclusive lower bound for int/float parameters */
  min?: number;
  /** Inclusive upper bound for int/float parameters */
  max?: number;
  /** Allowed values for choice parameters */
  choices?: readonly ParameterValue[];
}

/**
 * Closed set of block kind tags
 */
export type BlockKind =
  // Actions
  | 'delay'
  | 'set_voltage'
  | 'set_current'
  | 'output_enable'
  | 'measure'
  | 'log_data'
  | 'comment'
  | 'assert'
  | 'instrument_command'
  // Control flow
  | 'loop'
  | 'while'
  | 'if'
  | 'else'
  | 'try'
  | 'parallel'
  | 'end'
  | 'wait_for'
  | 'sweep'
  // Data
  | 'set_variable'
  | 'math'
  | 'data_transform';

export type BlockCategory =
  | 'General'
  | 'Control'
  | 'Power Supply'
  | 'Measurement'
  | 'Instrument'
  | 'Validation'
  | 'Data'
  | 'Variables';

/**
 * How a block takes part in the scope structure of a sequence
 */
export type BlockStructure = 'simple' | 'opens_scope' | 'branch' | 'closes_scope';

/**
 * Status tags reported by block outcomes
 */
export type BlockStatus =
  | 'success'
  | 'timeout'
  | 'loop_start'
  | 'while_start'
  | 'condition_evaluated'
  | 'try_start'
  | 'parallel_start'
  | 'sweep_start';

/**
 * Result of a single block execution
 */
export interface BlockOutcome {
  readonly status: BlockStatus;
  readonly [detail: string]: unknown;
}

/**
 * Persisted block record
 */
export interface SerializedBlock {
  kind: BlockKind;
  id: string;
  parameters: Record<string, ParameterValue>;
}

/**
 * Palette description of a block kind
 */
export interface BlockDescriptor {
  kind: BlockKind;
  name: string;
  category: BlockCategory;
  description: string;
  parameters: BlockParameter[];
}

// ============================================================================
// SEQUENCE TYPES
// ============================================================================

/**
 * Persisted sequence document
 */
export interface SequenceDocument {
  name: string;
  description: string;
  metadata: Record<string, unknown>;
  blocks: SerializedBlock[];
}

export type SequenceFormat = 'json' | 'yaml';

// ============================================================================
// INSTRUMENT TYPES
// ============================================================================

type MaybePromise<T> = T | Promise<T>;

/**
 * Capability surface the engine needs from an instrument driver.
 * Drivers implement the subset their hardware supports.
 */
export interface InstrumentHandle {
  setVoltage?(channel: number, voltage: number): MaybePromise<void>;
  setCurrent?(channel: number, current: number): MaybePromise<void>;
  setOutput?(channel: number, enabled: boolean): MaybePromise<void>;
  measure?(): MaybePromise<number>;
  write?(command: string): MaybePromise<void>;
  query?(command: string): MaybePromise<string>;
}

/**
 * Destination for data points produced by Log Data blocks
 */
export interface DataSink {
  logData(record: Record<string, VariableValue>): MaybePromise<void>;
}

// ============================================================================
// EXECUTION TYPES
// ============================================================================

export type ExecutionStateName =
  | 'idle'
  | 'running'
  | 'paused'
  | 'completed'
  | 'failed'
  | 'stopped';

export type TerminalState = Extract<ExecutionStateName, 'completed' | 'failed' | 'stopped'>;

/**
 * One entry of the execution log
 */
export interface ExecutionLogEntry {
  /** Seconds since the run started */
  timestamp: number;
  blockName: string;
  blockId: string;
  kind: BlockKind;
  index: number;
  success: boolean;
  outcome?: BlockOutcome;
  error?: string;
  /** Set when a Try scope captured the error */
  handled?: boolean;
}

export interface ExecutionResult {
  readonly success: boolean;
  readonly state: ExecutionStateName;
  readonly blocksExecuted: number;
  /** Seconds */
  readonly duration: number;
  readonly errors: readonly string[];
  readonly variables: Readonly<VariableMap>;
  readonly logs: readonly ExecutionLogEntry[];
}

/**
 * Exported execution log document
 */
export interface ExecutionLogDocument {
  sequenceName: string;
  executionState: ExecutionStateName;
  blocksExecuted: number;
  errors: readonly string[];
  variables: Readonly<VariableMap>;
  logEntries: readonly ExecutionLogEntry[];
}
