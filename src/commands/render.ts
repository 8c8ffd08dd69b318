/**
 * `seccurate render`: rewrite the companion rendering of every task.
 */

import type { LoadedConfig } from '../lib/config.js';
import { readTasks } from '../lib/dataset.js';
import { resolveDataPath } from '../lib/paths.js';
import { writeTaskRendering } from '../lib/render.js';

/**
 * @returns Number of tasks rendered
 */
export async function renderCommand(loaded: LoadedConfig): Promise<number> {
  const tasksPath = resolveDataPath(loaded.baseDir, loaded.config.dataset.tasks_path);
  const renderDir = resolveDataPath(loaded.baseDir, loaded.config.dataset.render_dir);

  const tasks = await readTasks(tasksPath);
  for (const task of tasks) {
    await writeTaskRendering(renderDir, task);
  }
  console.log(`[RENDER] ${tasks.length} task(s) rendered under ${renderDir}`);
  return tasks.length;
}
