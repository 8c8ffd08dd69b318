/**
 * Terminal artifacts: accepted task records and rejection log entries.
 */

import type { CommitMetadata } from './commit.js';
import type { Requirement } from './description.js';
import type { MaskSpan } from './mask.js';
import type { CurationPhase, IterationEntry } from './state.js';
import type { VerdictStatus } from './verdict.js';

/**
 * Provenance of an accepted task.
 */
export interface TaskProvenance {
  commit_id: string;
  iterations_used: number;
  final_verdict: VerdictStatus;
  /** Every iteration that led to acceptance, oldest first */
  history: IterationEntry[];
}

/**
 * One accepted task, persisted as one JSON line.
 */
export interface TaskRecord {
  instance_id: string;
  repo_id: string;
  commit_hash: string;
  problem_statement: string;
  requirements: Requirement[];
  masked_repository_diff: string;
  golden_diff: string;
  mask_spans: MaskSpan[];
  provenance: TaskProvenance;
  metadata?: CommitMetadata;
  /** ISO timestamp of assembly */
  created_at: string;
}

/**
 * Why a commit was abandoned.
 */
export type RejectionReason =
  | 'MalformedDiffError'
  | 'UnresolvableMaskError'
  | 'DescriptionGenerationError'
  | 'VerificationOutputError'
  | 'CapabilityUnavailableError'
  | 'CapabilityTimeoutError'
  | 'CommitRecordError'
  | 'TaskAssemblyError'
  | 'AMBIGUOUS'
  | 'MAX_ITERS'
  | 'TRANSIENT_FAILURE_LIMIT'
  | 'UNEXPECTED_ERROR';

/**
 * One rejection log line.
 */
export interface RejectionRecord {
  commit_id: string;
  final_state: CurationPhase;
  reason: RejectionReason;
  detail: string;
  iterations_used: number;
  history: IterationEntry[];
}
