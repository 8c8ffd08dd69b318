/**
 * `seccurate stats`: per-task edit sizes of the task dataset.
 */

import type { LoadedConfig } from '../lib/config.js';
import { readTasks } from '../lib/dataset.js';
import { resolveDataPath } from '../lib/paths.js';
import { computeStats, writeStats, type DatasetStats } from '../lib/stats.js';

export async function statsCommand(loaded: LoadedConfig): Promise<DatasetStats> {
  const tasksPath = resolveDataPath(loaded.baseDir, loaded.config.dataset.tasks_path);
  const statsPath = resolveDataPath(loaded.baseDir, loaded.config.dataset.stats_path);

  const stats = computeStats(await readTasks(tasksPath));
  await writeStats(statsPath, stats);

  const entries = Object.values(stats);
  const lines = entries.reduce((sum, entry) => sum + entry.num_lines_edited, 0);
  console.log(`[STATS] ${entries.length} task(s), ${lines} masked line(s) in total`);
  console.log(`[STATS] written to ${statsPath}`);
  return stats;
}
