/**
 * Adaptive controller: drives one commit through
 * INIT → MASKED → DESCRIBED → VERIFIED → {ACCEPTED, RETRYING, ABANDONED}.
 *
 * Every per-commit error is caught here and turned into a rejection.
 * Only InterruptedError escapes, so an aborted batch writes nothing for the
 * commit in flight.
 */

import type { CommitRecord, Hunk } from '../types/commit.js';
import { instanceIdFor } from '../types/commit.js';
import type { CurateConfig, LoopConfig } from '../types/config.js';
import type { TaskDescription } from '../types/description.js';
import type { MaskSpan, MaskedArtifact, RemovedContent } from '../types/mask.js';
import { sameSpans, spanLength } from '../types/mask.js';
import { CurationPhase } from '../types/state.js';
import type { IterationEntry, IterationState } from '../types/state.js';
import type { RejectionReason, RejectionRecord, TaskRecord } from '../types/task.js';
import type { VerificationVerdict } from '../types/verdict.js';
import {
  CapabilityTimeoutError,
  CapabilityUnavailableError,
  DescriptionGenerationError,
  InterruptedError,
  MalformedDiffError,
  TaskAssemblyError,
  UnresolvableMaskError,
  VerificationOutputError,
  isInterruptedError,
  isTransientError,
} from '../types/errors.js';
import { parseUnifiedDiff } from '../lib/diff.js';
import { applyMask, computeMask, type MaskHint } from '../lib/mask.js';
import type { DescribeOptions, DescriptionFeedback } from '../lib/describe.js';
import type { VerifyOptions } from '../lib/verify.js';
import { assembleTask } from '../lib/assemble.js';

/**
 * What the controller needs from the description agent.
 */
export interface Describer {
  describe(artifact: MaskedArtifact, diffContext: string, options?: DescribeOptions): Promise<TaskDescription>;
}

/**
 * What the controller needs from the verification agent.
 */
export interface Verifier {
  verify(
    artifact: MaskedArtifact,
    description: TaskDescription,
    removedContent?: readonly RemovedContent[],
    options?: VerifyOptions
  ): Promise<VerificationVerdict>;
}

export interface CurateDeps {
  describer: Describer;
  verifier: Verifier;
  config: CurateConfig;
  signal?: AbortSignal;
  /** Clock for `created_at`; injectable for tests */
  now?: () => Date;
}

export type CurationOutcome =
  | { outcome: 'accepted'; task: TaskRecord; state: IterationState }
  | { outcome: 'abandoned'; rejection: RejectionRecord; state: IterationState };

/**
 * Next step after a verdict.
 */
export type Decision =
  | { next: CurationPhase.ACCEPTED }
  | { next: CurationPhase.ABANDONED; reason: RejectionReason; detail: string }
  | { next: CurationPhase.RETRYING; hints: MaskHint[] };

// ---------------------------------------------------------------------------
// State helpers. Each returns a new state; history is only ever appended.
// ---------------------------------------------------------------------------

export function initialState(commitId: string): IterationState {
  return {
    commit_id: commitId,
    iteration_index: 0,
    phase: CurationPhase.INIT,
    spans: [],
    history: [],
    transitions: [],
  };
}

export function transition(state: IterationState, to: CurationPhase): IterationState {
  return {
    ...state,
    phase: to,
    transitions: [...state.transitions, { iteration: state.iteration_index, from: state.phase, to }],
  };
}

export function startIteration(state: IterationState, spans: readonly MaskSpan[]): IterationState {
  return { ...state, iteration_index: state.iteration_index + 1, spans: spans.map((span) => ({ ...span })) };
}

export function appendIteration(state: IterationState, entry: IterationEntry): IterationState {
  return { ...state, history: [...state.history, entry] };
}

/**
 * Mask hints for the next iteration.
 *
 * `grow_first` grows only while any under flag remains; `combined` hands
 * both directions to one recomputation.
 */
export function hintsFor(verdict: VerificationVerdict, loop: Pick<LoopConfig, 'flag_resolution'>): MaskHint[] {
  const under: MaskHint[] = verdict.under_specified.map((ref) => ({ kind: 'under', ref }));
  const over: MaskHint[] = verdict.over_specified.map((ref) => ({ kind: 'over', ref }));
  if (loop.flag_resolution === 'combined') {
    return [...under, ...over];
  }
  return under.length > 0 ? under : over;
}

/**
 * Pure transition logic for a verified iteration.
 */
export function decideTransition(
  state: IterationState,
  verdict: VerificationVerdict,
  loop: Pick<LoopConfig, 'max_iters' | 'flag_resolution'>
): Decision {
  switch (verdict.status) {
    case 'MATCH':
      return { next: CurationPhase.ACCEPTED };
    case 'AMBIGUOUS':
      return {
        next: CurationPhase.ABANDONED,
        reason: 'AMBIGUOUS',
        detail: verdict.rationale || `Verifier confidence ${verdict.confidence}`,
      };
    case 'UNDER_SPECIFIED':
    case 'OVER_SPECIFIED':
      if (state.iteration_index >= loop.max_iters) {
        return {
          next: CurationPhase.ABANDONED,
          reason: 'MAX_ITERS',
          detail: `No MATCH after ${state.iteration_index} iteration(s); last verdict ${verdict.status}`,
        };
      }
      return { next: CurationPhase.RETRYING, hints: hintsFor(verdict, loop) };
  }
}

function feedbackFrom(verdict: VerificationVerdict): DescriptionFeedback {
  return {
    status: verdict.status,
    rationale: verdict.rationale,
    uncovered_lines: verdict.under_specified,
    unsupported_requirements: verdict.unsupported_requirements,
  };
}

function reasonFor(error: unknown): RejectionReason {
  if (error instanceof MalformedDiffError) return 'MalformedDiffError';
  if (error instanceof UnresolvableMaskError) return 'UnresolvableMaskError';
  if (error instanceof DescriptionGenerationError) return 'DescriptionGenerationError';
  if (error instanceof VerificationOutputError) return 'VerificationOutputError';
  if (error instanceof CapabilityUnavailableError) return 'CapabilityUnavailableError';
  if (error instanceof CapabilityTimeoutError) return 'CapabilityTimeoutError';
  if (error instanceof TaskAssemblyError) return 'TaskAssemblyError';
  return 'UNEXPECTED_ERROR';
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new InterruptedError('Curation aborted by signal');
  }
}

/**
 * Ends the commit in ABANDONED and builds its rejection log entry.
 */
export function abandon(state: IterationState, reason: RejectionReason, detail: string): CurationOutcome {
  const final = transition(state, CurationPhase.ABANDONED);
  console.log(`[CURATE] ${final.commit_id} abandoned after ${final.iteration_index} iteration(s): ${reason}`);
  return {
    outcome: 'abandoned',
    state: final,
    rejection: {
      commit_id: final.commit_id,
      final_state: CurationPhase.ABANDONED,
      reason,
      detail,
      iterations_used: final.iteration_index,
      history: [...final.history],
    },
  };
}

/**
 * Transient failure carried out of the loop body with the state it left.
 */
class IterationAbort extends Error {
  constructor(
    public readonly state: IterationState,
    public readonly reason: RejectionReason,
    public readonly detail: string
  ) {
    super(detail);
    this.name = 'IterationAbort';
  }
}

async function runIterations(
  commit: CommitRecord,
  hunks: readonly Hunk[],
  deps: CurateDeps,
  start: IterationState,
  track: (state: IterationState) => void
): Promise<CurationOutcome> {
  const { config, signal } = deps;
  const now = deps.now ?? (() => new Date());
  const maxIters = Math.max(1, config.loop.max_iters);

  let state = start;
  let base: MaskSpan[] | undefined;
  let hints: MaskHint[] = [];
  let feedback: DescriptionFeedback | null = null;
  let transientStreak = 0;

  const update = (next: IterationState) => {
    state = next;
    track(state);
  };

  while (state.iteration_index < maxIters) {
    throwIfAborted(signal);

    const spans = computeMask(commit, hunks, config.mask, base ? { base, hints } : {});
    const artifact = applyMask(commit, spans);
    update(transition(startIteration(state, spans), CurationPhase.MASKED));
    const masked = spans.reduce((sum, span) => sum + spanLength(span), 0);
    const unchanged = base !== undefined && sameSpans(base, spans) ? ' (unchanged)' : '';
    console.log(
      `[MASK] ${state.commit_id} iteration ${state.iteration_index}: ${spans.length} span(s), ${masked} line(s)${unchanged}`
    );

    let description: TaskDescription;
    let verdict: VerificationVerdict;
    try {
      description = await deps.describer.describe(artifact, commit.unified_diff, { feedback, signal });
      update(transition(state, CurationPhase.DESCRIBED));
      verdict = await deps.verifier.verify(artifact, description, artifact.removed_content, {
        hunks,
        indentExtensions: config.mask.indent_extensions,
        signal,
      });
    } catch (error) {
      if (isInterruptedError(error) || !isTransientError(error)) throw error;

      transientStreak++;
      update(
        appendIteration(state, {
          iteration: state.iteration_index,
          spans,
          verdict: null,
          failure: { name: errorName(error), message: errorMessage(error), transient: true },
        })
      );
      console.warn(`[CURATE] ${state.commit_id} iteration ${state.iteration_index} failed: ${errorMessage(error)}`);
      if (transientStreak > config.loop.max_transient_failures) {
        throw new IterationAbort(
          state,
          'TRANSIENT_FAILURE_LIMIT',
          `${transientStreak} consecutive transient failures; last: ${errorMessage(error)}`
        );
      }
      if (state.iteration_index >= maxIters) {
        throw new IterationAbort(state, reasonFor(error), `Iteration budget spent; last: ${errorMessage(error)}`);
      }
      update(transition(state, CurationPhase.RETRYING));
      base = spans;
      hints = [];
      continue;
    }

    transientStreak = 0;
    update(transition(state, CurationPhase.VERIFIED));
    update(appendIteration(state, { iteration: state.iteration_index, spans, verdict, failure: null }));
    console.log(`[CURATE] ${state.commit_id} iteration ${state.iteration_index}: ${verdict.status}`);

    const decision = decideTransition(state, verdict, { ...config.loop, max_iters: maxIters });
    if (decision.next === CurationPhase.ACCEPTED) {
      update(transition(state, CurationPhase.ACCEPTED));
      const task = assembleTask(commit, artifact, description, state, now().toISOString());
      console.log(`[CURATE] ${state.commit_id} accepted after ${state.iteration_index} iteration(s)`);
      return { outcome: 'accepted', task, state };
    }
    if (decision.next === CurationPhase.ABANDONED) {
      return abandon(state, decision.reason, decision.detail);
    }

    update(transition(state, CurationPhase.RETRYING));
    base = spans;
    hints = decision.hints;
    feedback = feedbackFrom(verdict);
  }

  return abandon(state, 'MAX_ITERS', `No MATCH after ${state.iteration_index} iteration(s)`);
}

/**
 * Curates one commit into a task record or a rejection.
 *
 * @throws {InterruptedError} When `deps.signal` aborts; nothing is recorded
 *   for the commit
 */
export async function curateCommit(commit: CommitRecord, deps: CurateDeps): Promise<CurationOutcome> {
  let state = initialState(instanceIdFor(commit));
  const track = (next: IterationState) => {
    state = next;
  };

  try {
    throwIfAborted(deps.signal);
    const hunks = parseUnifiedDiff(commit.unified_diff);
    console.log(`[CURATE] ${state.commit_id}: ${hunks.length} hunk(s)`);
    return await runIterations(commit, hunks, deps, state, track);
  } catch (error) {
    if (isInterruptedError(error)) throw error;
    if (error instanceof IterationAbort) {
      return abandon(error.state, error.reason, error.detail);
    }
    return abandon(state, reasonFor(error), errorMessage(error));
  }
}
