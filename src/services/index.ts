/**
 * Bench Sequencer Services
 */

export * from './expression/index.js';
export * from './blocks/index.js';
export * from './sequence/index.js';
export * from './execution/index.js';
