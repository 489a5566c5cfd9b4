/**
 * Sequence Blocks
 */

export * from './base-block.js';
export * from './action-blocks.js';
export * from './control-blocks.js';
export * from './data-blocks.js';
export * from './block-registry.js';
