// Shared types for the loop arbitrage engine.
// Definitions live in src/; this file only re-exports them.

export * from './src/index';
