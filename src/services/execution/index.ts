/**
 * Sequence Execution
 */

export * from './execution-context.js';
export * from './execution-state.js';
export * from './sequence-executor.js';
