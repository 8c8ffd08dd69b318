/**
 * Adaptive controller: state machine scenarios driven by scripted verdicts.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  curateCommit,
  decideTransition,
  hintsFor,
  initialState,
  appendIteration,
  type CurationOutcome,
  type Describer,
  type Verifier,
} from '@/runner/controller.js';
import { CurationPhase } from '@/types/state.js';
import type { TaskDescription } from '@/types/description.js';
import type { VerificationVerdict } from '@/types/verdict.js';
import {
  CapabilityTimeoutError,
  CapabilityUnavailableError,
  InterruptedError,
} from '@/types/errors.js';
import { AUTH_DIFF, AUTH_SOURCE, createCommit, createMockConfig, makeVerdict } from '../helpers/mocks.js';

const INSTANCE_ID = 'acme__webapp_abc1234def5678';
const NOW = () => new Date('2026-01-01T00:00:00.000Z');

const DESCRIPTION: TaskDescription = {
  problem_statement: 'Compare tokens in constant time.',
  requirements: [{ id: 'R1', text: 'checkToken compares every character.' }],
};

function scriptedAgents(script: Array<VerificationVerdict | Error>) {
  const queue = [...script];
  const describeFn = vi.fn<Describer['describe']>(async () => DESCRIPTION);
  const verifyFn = vi.fn<Verifier['verify']>(async () => {
    const next = queue.shift();
    if (!next) throw new Error('verdict script exhausted');
    if (next instanceof Error) throw next;
    return next;
  });
  return {
    describer: { describe: describeFn },
    verifier: { verify: verifyFn },
    describeFn,
    verifyFn,
  };
}

function accepted(result: CurationOutcome) {
  if (result.outcome !== 'accepted') {
    throw new Error(`expected acceptance, got ${result.rejection.reason}: ${result.rejection.detail}`);
  }
  return result;
}

function abandoned(result: CurationOutcome) {
  if (result.outcome !== 'abandoned') {
    throw new Error('expected abandonment');
  }
  return result;
}

function lineRefs(start: number, end: number) {
  const refs: Array<{ file_path: string; line: number }> = [];
  for (let line = start; line <= end; line++) refs.push({ file_path: 'src/auth.js', line });
  return refs;
}

function sourceLines(start: number, end: number): string {
  return AUTH_SOURCE.split('\n').slice(start - 1, end).join('\n') + '\n';
}

describe('curateCommit', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('accepts after one cycle when the first verdict is MATCH', async () => {
    const agents = scriptedAgents([makeVerdict('MATCH')]);
    const result = accepted(
      await curateCommit(createCommit(), { ...agents, config: createMockConfig(), now: NOW })
    );

    expect(result.task.instance_id).toBe(INSTANCE_ID);
    expect(result.task.mask_spans).toEqual([{ file_path: 'src/auth.js', start_line: 3, end_line: 22 }]);
    expect(result.task.provenance).toMatchObject({ commit_id: INSTANCE_ID, iterations_used: 1, final_verdict: 'MATCH' });
    expect(result.task.provenance.history.map((entry) => entry.verdict?.status)).toEqual(['MATCH']);
    expect(result.task.golden_diff).toBe(AUTH_DIFF);
    expect(result.task.created_at).toBe('2026-01-01T00:00:00.000Z');
    expect(agents.describeFn).toHaveBeenCalledTimes(1);

    const artifact = agents.describeFn.mock.calls[0][0];
    expect(artifact.removed_content).toEqual([
      { span: { file_path: 'src/auth.js', start_line: 3, end_line: 22 }, text: sourceLines(3, 22) },
    ]);

    expect(result.state.transitions.map((t) => `${t.from}>${t.to}`)).toEqual([
      'INIT>MASKED',
      'MASKED>DESCRIBED',
      'DESCRIBED>VERIFIED',
      'VERIFIED>ACCEPTED',
    ]);
  });

  it('grows into the caller on an UNDER_SPECIFIED flag and accepts on iteration 2', async () => {
    const under = [{ file_path: 'src/auth.js', line: 28 }];
    const agents = scriptedAgents([
      makeVerdict('UNDER_SPECIFIED', { under_specified: under, flagged_lines: under }),
      makeVerdict('MATCH'),
    ]);
    const result = accepted(
      await curateCommit(createCommit(), { ...agents, config: createMockConfig(), now: NOW })
    );

    expect(result.task.provenance.iterations_used).toBe(2);
    expect(result.task.provenance.history.map((entry) => entry.verdict?.status)).toEqual(['UNDER_SPECIFIED', 'MATCH']);
    expect(result.task.mask_spans).toEqual([{ file_path: 'src/auth.js', start_line: 3, end_line: 33 }]);
    expect(agents.describeFn.mock.calls[1][2]?.feedback).toEqual({
      status: 'UNDER_SPECIFIED',
      rationale: 'verdict UNDER_SPECIFIED',
      uncovered_lines: under,
      unsupported_requirements: [],
    });
    expect(result.state.history.map((entry) => entry.spans)).toEqual([
      [{ file_path: 'src/auth.js', start_line: 3, end_line: 22 }],
      [{ file_path: 'src/auth.js', start_line: 3, end_line: 33 }],
    ]);
  });

  it('shrinks on an OVER_SPECIFIED flag and accepts the smaller mask', async () => {
    const under = [{ file_path: 'src/auth.js', line: 28 }];
    const over = lineRefs(24, 33);
    const agents = scriptedAgents([
      makeVerdict('UNDER_SPECIFIED', { under_specified: under, flagged_lines: under }),
      makeVerdict('OVER_SPECIFIED', { over_specified: over, flagged_lines: over }),
      makeVerdict('MATCH'),
    ]);
    const result = accepted(
      await curateCommit(createCommit(), { ...agents, config: createMockConfig(), now: NOW })
    );

    expect(result.task.provenance.iterations_used).toBe(3);
    expect(result.task.mask_spans).toEqual([{ file_path: 'src/auth.js', start_line: 3, end_line: 22 }]);
    expect(result.state.history.map((entry) => entry.spans[0].end_line)).toEqual([22, 33, 22]);
  });

  it('grows only while under flags remain, unless flags are combined', async () => {
    const under = [{ file_path: 'src/auth.js', line: 28 }];
    const inside = [{ file_path: 'src/auth.js', line: 12 }];
    const over = lineRefs(24, 33);
    const script = () => [
      makeVerdict('UNDER_SPECIFIED', { under_specified: under, flagged_lines: under }),
      makeVerdict('UNDER_SPECIFIED', {
        under_specified: inside,
        over_specified: over,
        flagged_lines: [...inside, ...over],
      }),
      makeVerdict('MATCH'),
    ];

    const growFirst = scriptedAgents(script());
    const grown = accepted(
      await curateCommit(createCommit(), { ...growFirst, config: createMockConfig(), now: NOW })
    );
    expect(grown.state.history.map((entry) => entry.spans[0].end_line)).toEqual([22, 33, 33]);

    const combined = scriptedAgents(script());
    const both = accepted(
      await curateCommit(createCommit(), {
        ...combined,
        config: createMockConfig({ loop: { flag_resolution: 'combined' } }),
        now: NOW,
      })
    );
    expect(both.state.history.map((entry) => entry.spans[0].end_line)).toEqual([22, 33, 22]);
    expect(both.task.mask_spans).toEqual([{ file_path: 'src/auth.js', start_line: 3, end_line: 22 }]);
  });

  it('abandons on AMBIGUOUS after one iteration', async () => {
    const agents = scriptedAgents([makeVerdict('AMBIGUOUS', { confidence: 0.2 })]);
    const result = abandoned(
      await curateCommit(createCommit(), { ...agents, config: createMockConfig() })
    );

    expect(result.rejection.commit_id).toBe(INSTANCE_ID);
    expect(result.rejection.final_state).toBe(CurationPhase.ABANDONED);
    expect(result.rejection.reason).toBe('AMBIGUOUS');
    expect(result.rejection.detail).toBe('verdict AMBIGUOUS');
    expect(result.rejection.iterations_used).toBe(1);
    expect(result.rejection.history).toHaveLength(1);
    expect(agents.describeFn).toHaveBeenCalledTimes(1);
  });

  it('abandons a malformed diff before masking', async () => {
    const commit = createCommit({
      unified_diff: ['--- a/src/auth.js', '+++ b/src/auth.js', '@@ -1,3 +1,3 @@', '-a', '+b', ''].join('\n'),
    });
    const agents = scriptedAgents([]);
    const result = abandoned(await curateCommit(commit, { ...agents, config: createMockConfig() }));

    expect(result.rejection.reason).toBe('MalformedDiffError');
    expect(result.rejection.detail).toBe('Hunk at line 3 is truncated (expected -3/+3, got -1/+1)');
    expect(result.rejection.iterations_used).toBe(0);
    expect(result.rejection.history).toEqual([]);
    expect(result.state.transitions).toEqual([{ iteration: 0, from: CurationPhase.INIT, to: CurationPhase.ABANDONED }]);
    expect(agents.describeFn).not.toHaveBeenCalled();
  });

  it('never runs more than max_iters iterations', async () => {
    const inside = [{ file_path: 'src/auth.js', line: 12 }];
    const flag = () => makeVerdict('UNDER_SPECIFIED', { under_specified: inside, flagged_lines: inside });
    const agents = scriptedAgents([flag(), flag(), flag(), flag()]);
    const config = createMockConfig({ loop: { max_iters: 3 } });
    const result = abandoned(await curateCommit(createCommit(), { ...agents, config }));

    expect(result.rejection.reason).toBe('MAX_ITERS');
    expect(result.rejection.detail).toBe('No MATCH after 3 iteration(s); last verdict UNDER_SPECIFIED');
    expect(result.rejection.iterations_used).toBe(3);
    expect(agents.verifyFn).toHaveBeenCalledTimes(3);
  });

  it('counts a transient failure as one iteration and retries', async () => {
    const agents = scriptedAgents([makeVerdict('MATCH')]);
    agents.describeFn.mockRejectedValueOnce(new CapabilityTimeoutError(1000));
    const result = accepted(
      await curateCommit(createCommit(), { ...agents, config: createMockConfig(), now: NOW })
    );

    expect(result.task.provenance.iterations_used).toBe(2);
    expect(result.state.history[0]).toEqual({
      iteration: 1,
      spans: [{ file_path: 'src/auth.js', start_line: 3, end_line: 22 }],
      verdict: null,
      failure: { name: 'CapabilityTimeoutError', message: 'Capability call timed out after 1000ms', transient: true },
    });
  });

  it('abandons after more than max_transient_failures consecutive failures', async () => {
    const agents = scriptedAgents([]);
    agents.describeFn.mockRejectedValue(new CapabilityUnavailableError('claude exited with code 1', 1));
    const result = abandoned(
      await curateCommit(createCommit(), { ...agents, config: createMockConfig() })
    );

    expect(result.rejection.reason).toBe('TRANSIENT_FAILURE_LIMIT');
    expect(result.rejection.detail).toBe('3 consecutive transient failures; last: claude exited with code 1');
    expect(result.rejection.iterations_used).toBe(3);
    expect(result.rejection.history).toHaveLength(3);
  });

  it('abandons when growth would leave the touched files', async () => {
    const outside = [{ file_path: 'src/other.js', line: 4 }];
    const agents = scriptedAgents([makeVerdict('UNDER_SPECIFIED', { under_specified: outside, flagged_lines: outside })]);
    const result = abandoned(
      await curateCommit(createCommit(), { ...agents, config: createMockConfig() })
    );

    expect(result.rejection.reason).toBe('UnresolvableMaskError');
    expect(result.rejection.detail).toBe('Cannot grow into "src/other.js": not a maskable file of this commit');
    expect(result.rejection.iterations_used).toBe(1);
  });

  it('abandons a commit that only touches test files', async () => {
    const commit = createCommit({
      unified_diff: AUTH_DIFF.replaceAll('src/auth.js', 'tests/auth.test.js'),
      file_snapshots: { 'tests/auth.test.js': AUTH_SOURCE },
    });
    const agents = scriptedAgents([]);
    const result = abandoned(await curateCommit(commit, { ...agents, config: createMockConfig() }));

    expect(result.rejection.reason).toBe('UnresolvableMaskError');
    expect(result.rejection.iterations_used).toBe(0);
    expect(agents.describeFn).not.toHaveBeenCalled();
  });

  it('propagates an interrupt without a rejection', async () => {
    const controller = new AbortController();
    const agents = scriptedAgents([]);
    agents.describeFn.mockImplementationOnce(async () => {
      controller.abort();
      throw new InterruptedError();
    });

    await expect(
      curateCommit(createCommit(), { ...agents, config: createMockConfig(), signal: controller.signal })
    ).rejects.toBeInstanceOf(InterruptedError);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const agents = scriptedAgents([]);

    await expect(
      curateCommit(createCommit(), { ...agents, config: createMockConfig(), signal: controller.signal })
    ).rejects.toBeInstanceOf(InterruptedError);
    expect(agents.describeFn).not.toHaveBeenCalled();
  });
});

describe('hintsFor', () => {
  const under = [{ file_path: 'a.c', line: 3 }];
  const over = [{ file_path: 'a.c', line: 40 }];
  const both = makeVerdict('UNDER_SPECIFIED', { under_specified: under, over_specified: over });

  it('grows only while under flags remain under grow_first', () => {
    expect(hintsFor(both, { flag_resolution: 'grow_first' })).toEqual([{ kind: 'under', ref: under[0] }]);
  });

  it('shrinks when only over flags remain', () => {
    const onlyOver = makeVerdict('OVER_SPECIFIED', { over_specified: over });
    expect(hintsFor(onlyOver, { flag_resolution: 'grow_first' })).toEqual([{ kind: 'over', ref: over[0] }]);
  });

  it('passes both directions under combined', () => {
    expect(hintsFor(both, { flag_resolution: 'combined' })).toEqual([
      { kind: 'under', ref: under[0] },
      { kind: 'over', ref: over[0] },
    ]);
  });
});

describe('decideTransition', () => {
  const loop = { max_iters: 3, flag_resolution: 'grow_first' as const };
  const at = (iteration: number) => ({ ...initialState('c'), iteration_index: iteration });

  it('accepts a MATCH', () => {
    expect(decideTransition(at(1), makeVerdict('MATCH'), loop)).toEqual({ next: CurationPhase.ACCEPTED });
  });

  it('retries a flagged verdict below the bound', () => {
    const decision = decideTransition(at(2), makeVerdict('OVER_SPECIFIED'), loop);
    expect(decision).toEqual({ next: CurationPhase.RETRYING, hints: [] });
  });

  it('abandons a flagged verdict at the bound', () => {
    const decision = decideTransition(at(3), makeVerdict('OVER_SPECIFIED'), loop);
    expect(decision).toEqual({
      next: CurationPhase.ABANDONED,
      reason: 'MAX_ITERS',
      detail: 'No MATCH after 3 iteration(s); last verdict OVER_SPECIFIED',
    });
  });

  it('abandons AMBIGUOUS regardless of remaining budget', () => {
    const decision = decideTransition(at(1), makeVerdict('AMBIGUOUS', { rationale: '' , confidence: 0.3 }), loop);
    expect(decision).toEqual({ next: CurationPhase.ABANDONED, reason: 'AMBIGUOUS', detail: 'Verifier confidence 0.3' });
  });
});

describe('iteration state', () => {
  it('appends history without touching the previous state', () => {
    const before = initialState('c');
    const after = appendIteration(before, { iteration: 1, spans: [], verdict: null, failure: null });
    expect(before.history).toEqual([]);
    expect(after.history).toHaveLength(1);
  });
});
