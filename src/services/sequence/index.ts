/**
 * Sequence Model
 */

export * from './sequence.js';
export * from './sequence-structure.js';
export * from './sequence-loader.js';
