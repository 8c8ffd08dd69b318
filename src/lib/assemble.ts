/**
 * Task assembler: turns an accepted curation into a task record.
 *
 * Pure. Two calls with the same inputs and the same `createdAt` produce
 * identical records.
 */

import type { CommitRecord } from '../types/commit.js';
import { instanceIdFor } from '../types/commit.js';
import type { TaskDescription } from '../types/description.js';
import type { MaskedArtifact } from '../types/mask.js';
import type { IterationState } from '../types/state.js';
import type { TaskRecord } from '../types/task.js';
import { TaskAssemblyError } from '../types/errors.js';
import { renderRemovalDiff } from './patch.js';

/**
 * Builds the task record.
 *
 * @throws {TaskAssemblyError} When a required field is absent
 */
export function assembleTask(
  commit: CommitRecord,
  artifact: MaskedArtifact,
  description: TaskDescription,
  state: IterationState,
  createdAt: string = new Date().toISOString()
): TaskRecord {
  if (!commit.repo_id) throw new TaskAssemblyError('repo_id');
  if (!commit.commit_hash) throw new TaskAssemblyError('commit_hash');
  if (!commit.unified_diff) throw new TaskAssemblyError('golden_diff');
  if (!description.problem_statement.trim()) throw new TaskAssemblyError('problem_statement');
  if (description.requirements.length === 0) throw new TaskAssemblyError('requirements');
  if (artifact.removed_spans.length === 0) throw new TaskAssemblyError('mask_spans');

  const last = state.history[state.history.length - 1];
  if (!last || !last.verdict) throw new TaskAssemblyError('final_verdict');

  const record: TaskRecord = {
    instance_id: instanceIdFor(commit),
    repo_id: commit.repo_id,
    commit_hash: commit.commit_hash,
    problem_statement: description.problem_statement,
    requirements: description.requirements.map((requirement) => ({ ...requirement })),
    masked_repository_diff: renderRemovalDiff(commit.file_snapshots, artifact.removed_spans),
    golden_diff: commit.unified_diff,
    mask_spans: artifact.removed_spans.map((span) => ({ ...span })),
    provenance: {
      commit_id: state.commit_id,
      iterations_used: state.iteration_index,
      final_verdict: last.verdict.status,
      history: state.history.map((entry) => ({ ...entry, spans: entry.spans.map((span) => ({ ...span })) })),
    },
    created_at: createdAt,
  };
  if (commit.metadata) {
    record.metadata = { ...commit.metadata };
  }
  return record;
}
