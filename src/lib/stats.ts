/**
 * Dataset statistics: files and lines each task asks an agent to restore.
 */

import type { TaskRecord } from '../types/task.js';
import { lenPatch } from './diff.js';
import { atomicWriteJson } from './fs.js';

export interface TaskStats {
  num_files_edited: number;
  num_lines_edited: number;
}

export type DatasetStats = Record<string, TaskStats>;

/**
 * Stats keyed by instance id, measured on each task's masked diff.
 * A later record for the same instance id replaces an earlier one.
 */
export function computeStats(tasks: readonly TaskRecord[]): DatasetStats {
  const stats: DatasetStats = {};
  for (const task of tasks) {
    const { num_files, num_lines } = lenPatch(task.masked_repository_diff);
    stats[task.instance_id] = { num_files_edited: num_files, num_lines_edited: num_lines };
  }
  return stats;
}

export async function writeStats(statsPath: string, stats: DatasetStats): Promise<void> {
  await atomicWriteJson(statsPath, stats);
}
