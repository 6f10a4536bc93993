/**
 * Memory system: a bank of distilled lessons searchable by embedding
 * similarity, fed by extraction from agent runs and experiment outcomes.
 */

export * from './types.js';
export * from './store.js';
export * from './eviction.js';
export * from './embeddings.js';
export * from './retriever.js';
export * from './extractor.js';
export * from './learning.js';
