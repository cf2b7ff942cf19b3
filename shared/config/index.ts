/**
 * Shared Configuration for the Loop Arbitrage Engine
 *
 * Re-exports everything from src/index.ts. Add new configuration to a
 * submodule in src/ and export it from there.
 *
 * Module Structure:
 * - src/engine-config.ts: Optimizer and search defaults, env loading
 * - src/schemas/: Zod schemas for every caller-supplied input
 */

export * from './src/index';
