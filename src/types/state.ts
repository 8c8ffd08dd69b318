/**
 * State machine types for curating one commit.
 *
 * INIT → MASKED → DESCRIBED → VERIFIED → {ACCEPTED, RETRYING, ABANDONED}
 */

import type { MaskSpan } from './mask.js';
import type { VerificationVerdict } from './verdict.js';

/**
 * Phases of the curation state machine.
 */
export enum CurationPhase {
  INIT = 'INIT',
  MASKED = 'MASKED',
  DESCRIBED = 'DESCRIBED',
  VERIFIED = 'VERIFIED',
  RETRYING = 'RETRYING',
  ACCEPTED = 'ACCEPTED',
  ABANDONED = 'ABANDONED',
}

/**
 * Failure recorded for an iteration that produced no verdict.
 */
export interface IterationFailure {
  /** Error class name, e.g. CapabilityTimeoutError */
  name: string;
  message: string;
  /** Whether the failure consumed an iteration and allowed a retry */
  transient: boolean;
}

/**
 * One completed iteration: the spans it used and what came of them.
 */
export interface IterationEntry {
  /** 1-based iteration index */
  iteration: number;
  spans: MaskSpan[];
  verdict: VerificationVerdict | null;
  failure: IterationFailure | null;
}

/**
 * Phase transition, for the audit trail.
 */
export interface PhaseTransition {
  iteration: number;
  from: CurationPhase;
  to: CurationPhase;
}

/**
 * Per-commit iteration state. Append-only: every update returns a new
 * object and never rewrites earlier history.
 */
export interface IterationState {
  readonly commit_id: string;
  /** Number of iterations started so far */
  readonly iteration_index: number;
  readonly phase: CurationPhase;
  /** Span set for the current (or next) iteration */
  readonly spans: readonly MaskSpan[];
  readonly history: readonly IterationEntry[];
  readonly transitions: readonly PhaseTransition[];
}
