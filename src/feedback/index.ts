export * from './types.js';
export * from './validation.js';
export * from './pool.js';
export * from './processor.js';
export * from './service.js';
