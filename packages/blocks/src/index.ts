// src/index.ts
// Main entry point for @tickflow/blocks

export * from './producers/index.js';
export * from './math/index.js';
export * from './siso/index.js';
export * from './consumers/index.js';
