/**
 * Mask scope: decides which touched files may carry mask spans.
 *
 * A hunk is outside the mask scope when:
 * - its file matches one of mask.exclude_globs (test files by default)
 * - the fix deletes the file (nothing is left to mask)
 * - no fix-side snapshot exists for the file
 */

import micromatch from 'micromatch';
import type { CommitRecord, Hunk } from '../types/commit.js';
import type { MaskConfig } from '../types/config.js';

/**
 * Exclusion reason identifiers.
 */
export const EXCLUDED_BY_GLOB = 'EXCLUDED_BY_GLOB';
export const FILE_DELETED = 'FILE_DELETED';
export const SNAPSHOT_MISSING = 'SNAPSHOT_MISSING';

/**
 * A hunk left out of the mask scope.
 */
export interface ExcludedHunk {
  /** Reason identifier */
  type: string;
  hunk: Hunk;
  detail: string;
}

/**
 * Split of a commit's hunks into maskable and excluded ones.
 */
export interface MaskScope {
  maskable: Hunk[];
  excluded: ExcludedHunk[];
  /** Files with at least one maskable hunk, sorted */
  files: string[];
}

/**
 * Checks if a path matches any of the given glob patterns.
 *
 * @example
 * ```typescript
 * matchesGlob('tests/test_parser.py', ['**\/test_*.py']); // true
 * matchesGlob('src/parser.c', ['**\/test_*.py']); // false
 * ```
 */
export function matchesGlob(path: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) {
    return false;
  }
  return micromatch.isMatch(path, [...patterns], { dot: true });
}

/**
 * Partitions hunks into the mask scope and the rest.
 */
export function resolveMaskScope(commit: CommitRecord, hunks: readonly Hunk[], config: MaskConfig): MaskScope {
  const maskable: Hunk[] = [];
  const excluded: ExcludedHunk[] = [];

  for (const hunk of hunks) {
    if (matchesGlob(hunk.file_path, config.exclude_globs)) {
      excluded.push({
        type: EXCLUDED_BY_GLOB,
        hunk,
        detail: `"${hunk.file_path}" matches mask.exclude_globs`,
      });
      continue;
    }
    if (hunk.file_status === 'deleted') {
      excluded.push({ type: FILE_DELETED, hunk, detail: `"${hunk.file_path}" is deleted by the fix` });
      continue;
    }
    if (!(hunk.file_path in commit.file_snapshots)) {
      excluded.push({
        type: SNAPSHOT_MISSING,
        hunk,
        detail: `No fix-side snapshot for "${hunk.file_path}"`,
      });
      continue;
    }
    maskable.push(hunk);
  }

  const files = [...new Set(maskable.map((hunk) => hunk.file_path))].sort();
  return { maskable, excluded, files };
}
