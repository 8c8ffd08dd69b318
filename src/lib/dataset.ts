/**
 * Dataset I/O: commit records in, task records and rejections out.
 *
 * Output files are append-only JSONL. Each sink serialises its writes
 * through one queue, so records from concurrent workers never interleave.
 */

import type { CommitRecord } from '../types/commit.js';
import { instanceIdFor } from '../types/commit.js';
import type { TaskRecord } from '../types/task.js';
import { appendJsonLine, readJsonLines } from './fs.js';
import { loadSchema, validateWithSchema } from './schema.js';
import { resolveAsset } from './paths.js';

export const COMMIT_SCHEMA_FILE = 'schemas/commit_record.schema.json';

/**
 * A commit line that failed to parse or validate.
 */
export interface InvalidCommitLine {
  line: number;
  /** Instance id when the line carries repo_id and commit_hash, else `line:<n>` */
  commit_id: string;
  errors: string[];
}

export interface LoadedCommits {
  commits: CommitRecord[];
  invalid: InvalidCommitLine[];
}

function fallbackId(value: unknown, line: number): string {
  if (typeof value === 'object' && value !== null && 'repo_id' in value && 'commit_hash' in value) {
    const { repo_id, commit_hash } = value;
    if (typeof repo_id === 'string' && typeof commit_hash === 'string') {
      return instanceIdFor({ repo_id, commit_hash });
    }
  }
  return `line:${line}`;
}

/**
 * Reads and validates a JSONL file of commit records.
 *
 * Invalid lines are returned separately; they never abort the load.
 */
export async function loadCommits(filePath: string): Promise<LoadedCommits> {
  const schema = await loadSchema(resolveAsset(COMMIT_SCHEMA_FILE));
  const commits: CommitRecord[] = [];
  const invalid: InvalidCommitLine[] = [];

  for (const entry of await readJsonLines(filePath)) {
    if (!entry.ok) {
      invalid.push({ line: entry.line, commit_id: `line:${entry.line}`, errors: [`Invalid JSON: ${entry.error}`] });
      continue;
    }
    const result = validateWithSchema<CommitRecord>(entry.value, schema);
    if (!result.valid || result.data === null) {
      invalid.push({ line: entry.line, commit_id: fallbackId(entry.value, entry.line), errors: result.errors });
      continue;
    }
    commits.push(result.data);
  }
  return { commits, invalid };
}

function isTaskRecord(value: unknown): value is TaskRecord {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'instance_id' in value &&
    typeof value.instance_id === 'string' &&
    'masked_repository_diff' in value &&
    typeof value.masked_repository_diff === 'string' &&
    'problem_statement' in value &&
    typeof value.problem_statement === 'string'
  );
}

/**
 * Reads the task dataset. Lines that are not task records are skipped with
 * a warning.
 */
export async function readTasks(filePath: string): Promise<TaskRecord[]> {
  const tasks: TaskRecord[] = [];
  for (const entry of await readJsonLines(filePath)) {
    if (entry.ok && isTaskRecord(entry.value)) {
      tasks.push(entry.value);
    } else {
      console.warn(`[DATASET] ${filePath}:${entry.line} is not a task record, skipped`);
    }
  }
  return tasks;
}

/**
 * Instance ids already present in the task dataset or the rejection log.
 */
export async function readProcessedIds(tasksPath: string, rejectionsPath: string): Promise<Set<string>> {
  const ids = new Set<string>();
  for (const entry of await readJsonLines(tasksPath)) {
    if (entry.ok && isTaskRecord(entry.value)) ids.add(entry.value.instance_id);
  }
  for (const entry of await readJsonLines(rejectionsPath)) {
    if (!entry.ok || typeof entry.value !== 'object' || entry.value === null) continue;
    if ('commit_id' in entry.value && typeof entry.value.commit_id === 'string') {
      ids.add(entry.value.commit_id);
    }
  }
  return ids;
}

/**
 * Append-only JSONL sink with a single writer.
 */
export class JsonlSink<T> {
  private tail: Promise<void> = Promise.resolve();
  private written = 0;

  constructor(public readonly filePath: string) {}

  /**
   * Queues one record. Resolves once it is on disk; rejects with the
   * AtomicFsError of this record's write.
   */
  append(record: T): Promise<void> {
    const write = this.tail.then(() => appendJsonLine(this.filePath, record));
    // The queue continues past a failed write; the failure reaches this caller
    this.tail = write.catch(() => undefined);
    return write.then(() => {
      this.written++;
    });
  }

  /** Waits for every queued write. */
  async flush(): Promise<void> {
    await this.tail;
  }

  /** Records written so far */
  get count(): number {
    return this.written;
  }
}

