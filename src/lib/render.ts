/**
 * Companion renderings of accepted tasks, for human inspection.
 *
 * One directory per task under the render dir:
 * problem_statement.md, mask.md, golden.md and meta_info.md.
 */

import { join } from 'node:path';
import type { TaskRecord } from '../types/task.js';
import { atomicWriteText } from './fs.js';

export const RENDER_FILES = ['problem_statement.md', 'mask.md', 'golden.md', 'meta_info.md'] as const;

export type RenderFileName = (typeof RENDER_FILES)[number];

function diffBlock(patch: string): string {
  const body = patch.endsWith('\n') ? patch : `${patch}\n`;
  return '```diff\n' + body + '```\n';
}

function renderProblemStatement(task: TaskRecord): string {
  const requirements = task.requirements.map((requirement) => `- **${requirement.id}**: ${requirement.text}`);
  return `${task.problem_statement}\n\n## Requirements\n\n${requirements.join('\n')}\n`;
}

function renderMetaInfo(task: TaskRecord): string {
  const metadata = task.metadata ?? {};
  const lines = [
    '# Meta Information',
    '',
    `Project: ${task.repo_id}`,
    `Commit: ${task.commit_hash}`,
  ];
  if (metadata.info_page) lines.push(`Vulnerability fix commit: [Web page](${metadata.info_page})`);
  if (metadata.cve_id) lines.push(`Security issue identifier: ${metadata.cve_id}`);
  if (metadata.cwe_ids && metadata.cwe_ids.length > 0) lines.push(`Vulnerability type: ${metadata.cwe_ids.join(', ')}`);
  if (metadata.language) lines.push(`Language: ${metadata.language}`);
  lines.push(
    `Iterations: ${task.provenance.iterations_used}`,
    `Masked spans: ${task.mask_spans.map((span) => `${span.file_path}:${span.start_line}-${span.end_line}`).join(', ')}`
  );
  return lines.join('\n') + '\n';
}

/**
 * File name → content for one task.
 */
export function renderTaskFiles(task: TaskRecord): Record<RenderFileName, string> {
  return {
    'problem_statement.md': renderProblemStatement(task),
    'mask.md': diffBlock(task.masked_repository_diff),
    'golden.md': diffBlock(task.golden_diff),
    'meta_info.md': renderMetaInfo(task),
  };
}

/**
 * Writes the renderings of one task.
 *
 * @returns The task's render directory
 */
export async function writeTaskRendering(renderDir: string, task: TaskRecord): Promise<string> {
  const taskDir = join(renderDir, task.instance_id);
  const files = renderTaskFiles(task);
  for (const name of RENDER_FILES) {
    await atomicWriteText(join(taskDir, name), files[name]);
  }
  return taskDir;
}
