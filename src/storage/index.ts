export * from './atomic.js';
export * from './mutex.js';
export * from './timestamp.js';
