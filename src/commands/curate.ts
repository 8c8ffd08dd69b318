/**
 * `seccurate curate`: run the curation loop over the commit dataset.
 */

import type { LoadedConfig } from '../lib/config.js';
import type { BatchOptions, BatchSummary } from '../runner/batch.js';
import { runBatch } from '../runner/batch.js';

export interface CurateCommandOptions {
  maxIters?: number;
  concurrency?: number;
  resume: boolean;
  render?: boolean;
}

/**
 * Runs the batch with SIGINT/SIGTERM wired to an AbortController.
 *
 * The first signal stops new commits and aborts those in flight; a second
 * one exits immediately.
 */
export async function curateCommand(loaded: LoadedConfig, options: CurateCommandOptions): Promise<BatchSummary> {
  const abortController = new AbortController();
  let signalCount = 0;

  const signalHandler = (signal: string) => {
    signalCount++;
    if (signalCount === 1) {
      console.log(`\n${signal} received, aborting in-flight commits...`);
      abortController.abort();
    } else {
      console.log('\nForce exit');
      process.exit(130);
    }
  };
  const sigintHandler = () => signalHandler('SIGINT');
  const sigtermHandler = () => signalHandler('SIGTERM');
  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  const batchOptions: BatchOptions = {
    maxIters: options.maxIters,
    concurrency: options.concurrency,
    resume: options.resume,
    render: options.render,
    signal: abortController.signal,
  };

  try {
    const summary = await runBatch(loaded, batchOptions);
    console.log('\n--- Curation Complete ---');
    console.log(`Commits: ${summary.total}`);
    console.log(`Accepted: ${summary.accepted}`);
    console.log(`Abandoned: ${summary.abandoned}`);
    console.log(`Skipped: ${summary.skipped}`);
    console.log(`Invalid: ${summary.invalid}`);
    if (summary.interrupted) {
      process.exitCode = 130;
    }
    return summary;
  } finally {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  }
}
