/**
 * Batch runner: curates every pending commit of the input dataset.
 *
 * Commits are independent; each worker owns one commit at a time and
 * shares nothing with the others but the two append-only sinks.
 */

import type { CommitRecord } from '../types/commit.js';
import { instanceIdFor } from '../types/commit.js';
import type { LlmCapability } from '../types/capability.js';
import type { CurateConfig } from '../types/config.js';
import { CurationPhase } from '../types/state.js';
import type { RejectionRecord, TaskRecord } from '../types/task.js';
import { isInterruptedError } from '../types/errors.js';
import type { LoadedConfig } from '../lib/config.js';
import { ClaudeCliCapability } from '../lib/capability.js';
import { DescriptionAgent } from '../lib/describe.js';
import { VerificationAgent } from '../lib/verify.js';
import { JsonlSink, loadCommits, readProcessedIds } from '../lib/dataset.js';
import { resolveDataPath } from '../lib/paths.js';
import { writeTaskRendering } from '../lib/render.js';
import { curateCommit } from './controller.js';
import { runPool } from './pool.js';

export interface BatchOptions {
  /** Overrides loop.max_iters */
  maxIters?: number;
  /** Overrides loop.concurrency */
  concurrency?: number;
  /** Skip commits already in the task dataset or rejection log */
  resume?: boolean;
  /** Overrides render.enabled */
  render?: boolean;
  signal?: AbortSignal;
  /** Capability used by both agents; defaults to the Claude Code CLI */
  capability?: LlmCapability;
  now?: () => Date;
}

export interface BatchSummary {
  total: number;
  skipped: number;
  invalid: number;
  accepted: number;
  abandoned: number;
  interrupted: boolean;
}

/**
 * Applies command-line overrides to the loaded configuration.
 */
export function effectiveConfig(config: CurateConfig, options: BatchOptions): CurateConfig {
  return {
    ...config,
    loop: {
      ...config.loop,
      max_iters: options.maxIters ?? config.loop.max_iters,
      concurrency: options.concurrency ?? config.loop.concurrency,
    },
    render: { ...config.render, enabled: options.render ?? config.render.enabled },
  };
}

/**
 * Runs the curation loop over the configured commit dataset.
 *
 * An abort stops new commits from starting; commits in flight end with
 * InterruptedError and leave no record. Every finished record is flushed
 * before this resolves.
 */
export async function runBatch(loaded: LoadedConfig, options: BatchOptions = {}): Promise<BatchSummary> {
  const config = effectiveConfig(loaded.config, options);
  const commitsPath = resolveDataPath(loaded.baseDir, config.dataset.commits_path);
  const tasksPath = resolveDataPath(loaded.baseDir, config.dataset.tasks_path);
  const rejectionsPath = resolveDataPath(loaded.baseDir, config.dataset.rejections_path);
  const renderDir = resolveDataPath(loaded.baseDir, config.dataset.render_dir);

  const tasks = new JsonlSink<TaskRecord>(tasksPath);
  const rejections = new JsonlSink<RejectionRecord>(rejectionsPath);
  const resume = options.resume ?? true;
  const processed = resume ? await readProcessedIds(tasksPath, rejectionsPath) : new Set<string>();

  const { commits, invalid } = await loadCommits(commitsPath);
  console.log(`[BATCH] ${commits.length} commit(s) loaded from ${commitsPath}, ${invalid.length} invalid`);

  const summary: BatchSummary = {
    total: commits.length + invalid.length,
    skipped: 0,
    invalid: invalid.length,
    accepted: 0,
    abandoned: 0,
    interrupted: false,
  };

  for (const entry of invalid) {
    if (processed.has(entry.commit_id)) continue;
    console.warn(`[BATCH] ${commitsPath}:${entry.line} rejected: ${entry.errors.join('; ')}`);
    await rejections.append({
      commit_id: entry.commit_id,
      final_state: CurationPhase.INIT,
      reason: 'CommitRecordError',
      detail: entry.errors.join('; '),
      iterations_used: 0,
      history: [],
    });
    processed.add(entry.commit_id);
  }

  const pending: CommitRecord[] = [];
  const queued = new Set<string>();
  for (const commit of commits) {
    const id = instanceIdFor(commit);
    if (processed.has(id) || queued.has(id)) {
      summary.skipped++;
      continue;
    }
    queued.add(id);
    pending.push(commit);
  }
  if (summary.skipped > 0) {
    console.log(`[BATCH] skipping ${summary.skipped} commit(s) already processed or repeated`);
  }

  const capability = options.capability ?? new ClaudeCliCapability(config.capability);
  const describer = new DescriptionAgent(capability, config.description);
  const verifier = new VerificationAgent(capability, config.verification);

  try {
    await runPool(
      pending,
      async (commit, index) => {
        console.log(`[BATCH] (${index + 1}/${pending.length}) ${instanceIdFor(commit)}`);
        const result = await curateCommit(commit, {
          describer,
          verifier,
          config,
          signal: options.signal,
          now: options.now,
        });
        if (result.outcome === 'accepted') {
          await tasks.append(result.task);
          summary.accepted++;
          if (config.render.enabled) {
            try {
              await writeTaskRendering(renderDir, result.task);
            } catch (error) {
              const message = error instanceof Error ? error.message : String(error);
              console.warn(`[BATCH] ${result.task.instance_id} rendering failed: ${message}`);
            }
          }
        } else {
          await rejections.append(result.rejection);
          summary.abandoned++;
        }
      },
      { concurrency: config.loop.concurrency, signal: options.signal }
    );
  } catch (error) {
    if (!isInterruptedError(error)) throw error;
    summary.interrupted = true;
  } finally {
    await tasks.flush();
    await rejections.flush();
  }
  if (options.signal?.aborted) {
    summary.interrupted = true;
  }

  console.log(
    `[BATCH] done: ${summary.accepted} accepted, ${summary.abandoned} abandoned, ` +
      `${summary.skipped} skipped, ${summary.invalid} invalid${summary.interrupted ? ' (interrupted)' : ''}`
  );
  return summary;
}
