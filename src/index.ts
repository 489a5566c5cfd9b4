/**
 * Bench Sequencer
 *
 * Block-based automation engine for bench instruments: sequences of blocks,
 * a sandboxed expression language and an executor with pause/resume/stop.
 */

export * from './types/index.js';
export * from './services/index.js';
export { config, getConfig, type Config } from './config.js';
export { log, type Logger, type LogMetadata } from './utils/logger.js';
export * from './utils/errors.js';
