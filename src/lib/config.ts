/**
 * Configuration loading and validation utilities.
 *
 * The config file is optional per section: every field has a default, and
 * a section present in the file overrides the defaults field by field.
 */

import { access } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { readJsonFile, AtomicFsError } from './fs.js';
import { loadSchema, validateWithSchema } from './schema.js';
import { resolveAsset } from './paths.js';
import { CONFIG_FILE_NAME } from './branding.js';
import type { CurateConfig } from '../types/config.js';

export { CONFIG_FILE_NAME };

/** Schema the config file is validated against */
export const CONFIG_SCHEMA_FILE = 'schemas/config.schema.json';

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Built-in defaults.
 */
export const DEFAULT_CONFIG: CurateConfig = {
  version: '1',
  dataset: {
    commits_path: 'data/commits.jsonl',
    tasks_path: 'data/tasks.jsonl',
    rejections_path: 'data/rejections.jsonl',
    render_dir: 'data/tasks',
    stats_path: 'data/stats.json',
  },
  loop: {
    max_iters: 5,
    max_transient_failures: 2,
    flag_resolution: 'grow_first',
    concurrency: 4,
  },
  mask: {
    min_ratio: 2,
    max_lines: 1500,
    exclude_globs: ['**/test/**', '**/tests/**', '**/test_*.*', '**/*_test.*', '**/*.test.*', '**/*.spec.*'],
    indent_extensions: ['.py', '.pyi'],
  },
  capability: {
    command: 'claude',
    model: 'sonnet',
    max_turns: 1,
    timeout_seconds: 300,
    max_attempts: 3,
    context_file_max_chars: 60000,
  },
  description: {
    prompt_file: 'prompts/describe.txt',
    schema_file: 'schemas/description_output.schema.json',
    max_attempts: 3,
    forbid_test_mentions: true,
  },
  verification: {
    prompt_file: 'prompts/verify.txt',
    schema_file: 'schemas/verification_output.schema.json',
    min_confidence: 0.6,
    max_attempts: 2,
  },
  render: {
    enabled: false,
  },
};

/**
 * Searches for the config file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  for (;;) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      if (currentDir === dirname(currentDir)) {
        return null;
      }
      currentDir = dirname(currentDir);
    }
  }
}

/**
 * Shape of a config file: every section and field optional.
 */
export type PartialConfig = {
  version?: string;
} & {
  [K in Exclude<keyof CurateConfig, 'version'>]?: Partial<CurateConfig[K]>;
};

/**
 * Overlays a partial config onto the defaults, section by section.
 */
export function mergeConfig(partial: PartialConfig, base: CurateConfig = DEFAULT_CONFIG): CurateConfig {
  return {
    version: partial.version ?? base.version,
    dataset: { ...base.dataset, ...partial.dataset },
    loop: { ...base.loop, ...partial.loop },
    mask: { ...base.mask, ...partial.mask },
    capability: { ...base.capability, ...partial.capability },
    description: { ...base.description, ...partial.description },
    verification: { ...base.verification, ...partial.verification },
    render: { ...base.render, ...partial.render },
  };
}

/**
 * Validates raw config data against the config schema.
 *
 * @throws {ConfigError} If the data does not match
 */
export async function validateConfig(raw: unknown, configPath?: string): Promise<PartialConfig> {
  const schema = await loadSchema(resolveAsset(CONFIG_SCHEMA_FILE));
  const result = validateWithSchema<PartialConfig>(raw, schema);
  if (!result.valid || result.data === null) {
    throw new ConfigError(`Invalid configuration file: ${result.errors.join('; ')}`, configPath);
  }
  return result.data;
}

/**
 * A loaded configuration and where it came from.
 */
export interface LoadedConfig {
  config: CurateConfig;
  /** Config file path, or null when running on defaults */
  configPath: string | null;
  /** Directory dataset paths are resolved against */
  baseDir: string;
}

/**
 * Loads, validates and merges the configuration.
 *
 * With an explicit path the file must exist. Without one, the nearest
 * config file upward is used, or the defaults when there is none.
 *
 * @throws {ConfigError} If the file cannot be read or is invalid
 *
 * @example
 * ```typescript
 * const { config, baseDir } = await loadConfig();
 * const { config } = await loadConfig('/path/to/seccurate.config.json');
 * ```
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const resolvedPath = configPath ? resolve(configPath) : await findConfigFile();
  if (!resolvedPath) {
    return { config: DEFAULT_CONFIG, configPath: null, baseDir: process.cwd() };
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(`Failed to read configuration file: ${error.message}`, resolvedPath, error);
    }
    throw error;
  }

  const partial = await validateConfig(raw, resolvedPath);
  return { config: mergeConfig(partial), configPath: resolvedPath, baseDir: dirname(resolvedPath) };
}
