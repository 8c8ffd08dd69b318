import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, DEFAULT_CONFIG, loadConfig, mergeConfig, validateConfig } from '@/lib/config.js';

describe('mergeConfig', () => {
  it('overrides field by field within a section', () => {
    const config = mergeConfig({ loop: { max_iters: 2 }, mask: { min_ratio: 3 } });
    expect(config.loop).toEqual({ ...DEFAULT_CONFIG.loop, max_iters: 2 });
    expect(config.mask.min_ratio).toBe(3);
    expect(config.mask.exclude_globs).toEqual(DEFAULT_CONFIG.mask.exclude_globs);
    expect(config.dataset).toEqual(DEFAULT_CONFIG.dataset);
  });
});

describe('validateConfig', () => {
  it('rejects unknown sections and out-of-range values', async () => {
    await expect(validateConfig({ logging: {} })).rejects.toBeInstanceOf(ConfigError);
    await expect(validateConfig({ loop: { max_iters: 0 } })).rejects.toThrow(/^Invalid configuration file: /);
    await expect(validateConfig({ loop: { flag_resolution: 'shrink_first' } })).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('loadConfig', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `seccurate-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('loads a partial file over the defaults', async () => {
    const configPath = join(testDir, 'seccurate.config.json');
    await writeFile(configPath, JSON.stringify({ loop: { concurrency: 1 }, render: { enabled: true } }), 'utf-8');

    const loaded = await loadConfig(configPath);

    expect(loaded.configPath).toBe(configPath);
    expect(loaded.baseDir).toBe(testDir);
    expect(loaded.config.loop.concurrency).toBe(1);
    expect(loaded.config.loop.max_iters).toBe(5);
    expect(loaded.config.render.enabled).toBe(true);
  });

  it('fails on a missing explicit path', async () => {
    await expect(loadConfig(join(testDir, 'absent.json'))).rejects.toThrow(/^Failed to read configuration file: /);
  });

  it('fails on invalid JSON', async () => {
    const configPath = join(testDir, 'broken.json');
    await writeFile(configPath, '{ "loop": ', 'utf-8');
    await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
  });
});
