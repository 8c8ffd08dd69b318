import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonlSink, loadCommits, readProcessedIds, readTasks } from '@/lib/dataset.js';
import { createCommit } from '../helpers/mocks.js';

describe('dataset', () => {
  let testDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    testDir = join(tmpdir(), `seccurate-dataset-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('loadCommits', () => {
    it('separates valid records from invalid lines', async () => {
      const filePath = join(testDir, 'commits.jsonl');
      const lines = [
        JSON.stringify(createCommit()),
        '',
        '{not json',
        JSON.stringify({ repo_id: 'acme/api', commit_hash: 'not-a-hash', unified_diff: '', file_snapshots: {} }),
        JSON.stringify({ commit_hash: 'abc1234' }),
      ];
      await writeFile(filePath, lines.join('\n') + '\n', 'utf-8');

      const { commits, invalid } = await loadCommits(filePath);

      expect(commits).toHaveLength(1);
      expect(commits[0].repo_id).toBe('acme/webapp');
      expect(invalid.map((entry) => [entry.line, entry.commit_id])).toEqual([
        [3, 'line:3'],
        [4, 'acme__api_not-a-hash'],
        [5, 'line:5'],
      ]);
      expect(invalid[0].errors[0]).toMatch(/^Invalid JSON: /);
    });

    it('reads a missing file as empty', async () => {
      expect(await loadCommits(join(testDir, 'absent.jsonl'))).toEqual({ commits: [], invalid: [] });
    });
  });

  describe('readProcessedIds', () => {
    it('collects task and rejection ids', async () => {
      const tasksPath = join(testDir, 'tasks.jsonl');
      const rejectionsPath = join(testDir, 'rejections.jsonl');
      const task = { instance_id: 'acme__webapp_1111111', masked_repository_diff: '', problem_statement: 'p' };
      await writeFile(tasksPath, JSON.stringify(task) + '\n{"other": 1}\n', 'utf-8');
      await writeFile(rejectionsPath, JSON.stringify({ commit_id: 'acme__webapp_2222222' }) + '\n', 'utf-8');

      const ids = await readProcessedIds(tasksPath, rejectionsPath);
      expect([...ids].sort()).toEqual(['acme__webapp_1111111', 'acme__webapp_2222222']);
    });
  });

  describe('readTasks', () => {
    it('skips lines that are not task records', async () => {
      const tasksPath = join(testDir, 'tasks.jsonl');
      const task = { instance_id: 'acme__webapp_1111111', masked_repository_diff: 'd', problem_statement: 'p' };
      await writeFile(tasksPath, `${JSON.stringify(task)}\n[1, 2]\n`, 'utf-8');

      const tasks = await readTasks(tasksPath);
      expect(tasks.map((entry) => entry.instance_id)).toEqual(['acme__webapp_1111111']);
      expect(console.warn).toHaveBeenCalledWith(`[DATASET] ${tasksPath}:2 is not a task record, skipped`);
    });
  });

  describe('JsonlSink', () => {
    it('writes concurrent appends as whole lines in call order', async () => {
      const sink = new JsonlSink<{ n: number }>(join(testDir, 'out', 'records.jsonl'));

      await Promise.all([1, 2, 3, 4, 5].map((n) => sink.append({ n })));
      await sink.flush();

      const content = await readFile(sink.filePath, 'utf-8');
      expect(content).toBe('{"n":1}\n{"n":2}\n{"n":3}\n{"n":4}\n{"n":5}\n');
      expect(sink.count).toBe(5);
    });

    it('keeps writing after a failed append', async () => {
      const blocker = join(testDir, 'blocked');
      await writeFile(blocker, 'a file, not a directory', 'utf-8');
      const broken = new JsonlSink<{ n: number }>(join(blocker, 'records.jsonl'));

      await expect(broken.append({ n: 1 })).rejects.toThrow('Failed to append to');
      await broken.flush();
      expect(broken.count).toBe(0);
    });
  });
});
