/**
 * Library entry: the stores, the feedback pipeline and the runtime that wires them
 */

export * from './errors.js';
export * from './logging/index.js';
export * from './config/index.js';
export * from './adapters/index.js';
export * from './memory/index.js';
export * from './recommendations/index.js';
export * from './feedback/index.js';
export * from './knowledge/index.js';
export * from './statistics/index.js';
export * from './core/context-builder.js';
export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
