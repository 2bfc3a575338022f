/**
 * @mnemo/shared — entity model, vector primitives, Node Store, event bus,
 * errors, configuration and logging used by every Mnemo package.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './vector/index.js';
export * from './node-store/index.js';
export * from './event-bus/index.js';
export * from './config/index.js';
export * from './log/index.js';
