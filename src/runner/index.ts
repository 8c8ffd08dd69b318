/**
 * Runner module exports.
 */

export {
  curateCommit,
  decideTransition,
  hintsFor,
  initialState,
  transition,
  startIteration,
  appendIteration,
  abandon,
} from './controller.js';
export type { CurateDeps, CurationOutcome, Decision, Describer, Verifier } from './controller.js';
export { runPool } from './pool.js';
export type { PoolOptions } from './pool.js';
export { runBatch, effectiveConfig } from './batch.js';
export type { BatchOptions, BatchSummary } from './batch.js';
