/**
 * File system utilities for crash-safe dataset writes.
 *
 * Whole-file outputs (statistics, renderings) use the write-tmp-fsync-rename
 * pattern. Dataset sinks are append-only JSONL: one appendFile per record.
 */

import { appendFile, mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Error thrown when a file operation fails.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Atomically writes text to a file, creating parent directories.
 *
 * @throws {AtomicFsError} If the write operation fails
 */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    await mkdir(dirname(filePath), { recursive: true });
    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;
    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch((closeError: unknown) => {
        console.warn(`Failed to close ${tmpPath}: ${describe(closeError)}`);
      });
    }
    await unlink(tmpPath).catch(() => undefined);

    throw new AtomicFsError(
      `Failed to atomically write ${filePath}: ${describe(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Atomically writes JSON (2-space indent, trailing newline).
 *
 * @example
 * ```typescript
 * await atomicWriteJson('out/stats.json', { total: 3 });
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  await atomicWriteText(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Reads and parses a JSON file. The result is unvalidated.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${describe(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Appends one record as a single JSON line.
 *
 * @throws {AtomicFsError} If the append fails
 */
export async function appendJsonLine(filePath: string, record: unknown): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await appendFile(filePath, JSON.stringify(record) + '\n', 'utf-8');
  } catch (error) {
    throw new AtomicFsError(
      `Failed to append to ${filePath}: ${describe(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * One line of a JSONL file.
 */
export type JsonLine =
  | { line: number; ok: true; value: unknown }
  | { line: number; ok: false; error: string };

/**
 * Reads a JSONL file. Blank lines are skipped; unparseable lines are
 * reported, not thrown. A missing file reads as empty.
 *
 * @throws {AtomicFsError} If the file exists but cannot be read
 */
export async function readJsonLines(filePath: string): Promise<JsonLine[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw new AtomicFsError(
      `Failed to read ${filePath}: ${describe(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  const result: JsonLine[] = [];
  content.split('\n').forEach((text, index) => {
    if (text.trim() === '') return;
    try {
      result.push({ line: index + 1, ok: true, value: JSON.parse(text) });
    } catch (error) {
      result.push({ line: index + 1, ok: false, error: describe(error) });
    }
  });
  return result;
}
