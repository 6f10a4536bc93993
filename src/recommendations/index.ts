export * from './types.js';
export * from './performance.js';
export * from './store.js';
export * from './migrate.js';
