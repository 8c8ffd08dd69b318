import { describe, it, expect } from 'vitest';
import { assembleTask } from '@/lib/assemble.js';
import { applyMask } from '@/lib/mask.js';
import { appendIteration, initialState, startIteration } from '@/runner/controller.js';
import { TaskAssemblyError } from '@/types/errors.js';
import type { IterationState } from '@/types/state.js';
import { createCommit, makeVerdict } from '../helpers/mocks.js';

const SPANS = [{ file_path: 'src/auth.js', start_line: 3, end_line: 22 }];
const CREATED_AT = '2099-01-01T00:00:00.000Z';

const commit = createCommit();
const artifact = applyMask(commit, SPANS);
const description = {
  problem_statement: 'Compare tokens in constant time.',
  requirements: [{ id: 'R1', text: 'Equal tokens are accepted.' }],
};

function acceptedState(): IterationState {
  const started = startIteration(initialState('acme__webapp_abc1234def5678'), SPANS);
  return appendIteration(started, { iteration: 1, spans: SPANS, verdict: makeVerdict('MATCH'), failure: null });
}

describe('assembleTask', () => {
  it('builds the task record', () => {
    const task = assembleTask(commit, artifact, description, acceptedState(), CREATED_AT);

    expect(task.instance_id).toBe('acme__webapp_abc1234def5678');
    expect(task.golden_diff).toBe(commit.unified_diff);
    expect(task.mask_spans).toEqual(SPANS);
    expect(task.provenance).toEqual({
      commit_id: 'acme__webapp_abc1234def5678',
      iterations_used: 1,
      final_verdict: 'MATCH',
      history: [{ iteration: 1, spans: SPANS, verdict: makeVerdict('MATCH'), failure: null }],
    });
    expect(task.metadata).toEqual(commit.metadata);
    expect(task.masked_repository_diff.startsWith('diff --git a/src/auth.js b/src/auth.js\n')).toBe(true);
    expect(task.created_at).toBe(CREATED_AT);
  });

  it('is idempotent for the same inputs', () => {
    const first = assembleTask(commit, artifact, description, acceptedState(), CREATED_AT);
    const second = assembleTask(commit, artifact, description, acceptedState(), CREATED_AT);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('omits metadata the commit does not carry', () => {
    const bare = createCommit({ metadata: undefined });
    const task = assembleTask(bare, applyMask(bare, SPANS), description, acceptedState(), CREATED_AT);
    expect('metadata' in task).toBe(false);
  });

  it('names the missing field', () => {
    expect(() =>
      assembleTask(commit, artifact, { ...description, requirements: [] }, acceptedState(), CREATED_AT)
    ).toThrow('Cannot assemble task record: missing requirements');

    const noVerdict = startIteration(initialState('x'), SPANS);
    try {
      assembleTask(commit, artifact, description, noVerdict, CREATED_AT);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TaskAssemblyError);
      if (error instanceof TaskAssemblyError) {
        expect(error.field).toBe('final_verdict');
      }
    }
  });
});
