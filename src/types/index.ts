/**
 * Bench Sequencer - Core Type Definitions
 */

export * from './automation-types.js';
