/**
 * `seccurate check-config`: validate and print the effective configuration.
 */

import { loadConfig } from '../lib/config.js';
import { resolveAsset, resolveDataPath } from '../lib/paths.js';
import type { CurateConfig } from '../types/config.js';

export interface CheckConfigOptions {
  json?: boolean;
}

/**
 * Loads the configuration the way `curate` would.
 *
 * @throws {ConfigError} When the file is unreadable or invalid
 */
export async function checkConfigCommand(configPath: string | undefined, options: CheckConfigOptions = {}): Promise<CurateConfig> {
  const { config, configPath: source, baseDir } = await loadConfig(configPath);

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return config;
  }

  console.log(`[OK] ${source ? `Config file: ${source}` : 'No config file found, using defaults'}`);
  console.log(`  commits:    ${resolveDataPath(baseDir, config.dataset.commits_path)}`);
  console.log(`  tasks:      ${resolveDataPath(baseDir, config.dataset.tasks_path)}`);
  console.log(`  rejections: ${resolveDataPath(baseDir, config.dataset.rejections_path)}`);
  console.log(`  loop:       max_iters=${config.loop.max_iters} concurrency=${config.loop.concurrency} flag_resolution=${config.loop.flag_resolution}`);
  console.log(`  mask:       min_ratio=${config.mask.min_ratio} max_lines=${config.mask.max_lines}`);
  console.log(`  capability: ${config.capability.command} --model ${config.capability.model} (timeout ${config.capability.timeout_seconds}s)`);
  console.log(`  prompts:    ${resolveAsset(config.description.prompt_file)}, ${resolveAsset(config.verification.prompt_file)}`);
  return config;
}
