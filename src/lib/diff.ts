/**
 * Unified diff model.
 *
 * Parses unified diff text into ordered hunks and provides the small
 * patch utilities used for dataset statistics.
 */

import { MalformedDiffError } from '../types/errors.js';
import type { FileStatus, Hunk, LineRange } from '../types/commit.js';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const DEV_NULL = '/dev/null';

/**
 * File section currently being parsed.
 */
interface FileSection {
  oldPath: string;
  newPath: string;
}

/**
 * Normalizes a `---`/`+++` header path: drops the timestamp suffix and the
 * `a/` or `b/` prefix.
 */
export function normalizeDiffPath(raw: string): string {
  let path = raw.split('\t', 1)[0].trim();
  if (path.startsWith('"') && path.endsWith('"') && path.length >= 2) {
    path = path.slice(1, -1);
  }
  if (path === DEV_NULL) return path;
  if (path.startsWith('a/') || path.startsWith('b/')) {
    return path.slice(2);
  }
  return path;
}

function fileStatus(section: FileSection): FileStatus {
  if (section.oldPath === DEV_NULL) return 'added';
  if (section.newPath === DEV_NULL) return 'deleted';
  return 'modified';
}

function changedRange(lines: number[], insertionPoint: number): LineRange {
  if (lines.length === 0) {
    return { start: insertionPoint, end: insertionPoint - 1 };
  }
  return { start: lines[0], end: lines[lines.length - 1] };
}

/**
 * Parses a unified diff into hunks ordered by file path, then start line.
 *
 * Accepts `git diff` output (with `diff --git` and extended headers) as
 * well as plain `diff -u` output. Header counts must match the hunk body.
 *
 * @throws {MalformedDiffError} On a header that does not match the grammar,
 *   a hunk whose body disagrees with its counts, a truncated hunk,
 *   overlapping hunks, or a diff with no hunks at all
 */
export function parseUnifiedDiff(diff: string): Hunk[] {
  const lines = diff.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const hunks: Hunk[] = [];
  let section: FileSection | null = null;
  let i = 0;

  while (i < lines.length) {
    const line = lines[i].replace(/\r$/, '');
    const lineNo = i + 1;

    if (line.startsWith('diff ')) {
      section = null;
      i++;
      continue;
    }

    if (line.startsWith('--- ')) {
      const next = lines[i + 1]?.replace(/\r$/, '');
      if (next === undefined || !next.startsWith('+++ ')) {
        throw new MalformedDiffError(`File header at line ${lineNo} is missing its "+++" line`, lineNo);
      }
      section = {
        oldPath: normalizeDiffPath(line.slice(4)),
        newPath: normalizeDiffPath(next.slice(4)),
      };
      i += 2;
      continue;
    }

    if (line.startsWith('@@')) {
      const match = HUNK_HEADER.exec(line);
      if (!match) {
        throw new MalformedDiffError(`Invalid hunk header at line ${lineNo}: ${line}`, lineNo);
      }
      if (!section) {
        throw new MalformedDiffError(`Hunk at line ${lineNo} has no file header`, lineNo);
      }
      const parsed = parseHunkBody(lines, i, section, match);
      hunks.push(parsed.hunk);
      i = parsed.next;
      continue;
    }

    if (section && (line.startsWith('+') || line.startsWith('-') || line.startsWith(' '))) {
      throw new MalformedDiffError(
        `Line ${lineNo} lies outside any hunk; hunk line counts do not match the body`,
        lineNo
      );
    }

    // Preamble, extended git headers, binary notices
    i++;
  }

  if (hunks.length === 0) {
    throw new MalformedDiffError('Diff contains no hunks', lines.length);
  }

  return orderHunks(hunks);
}

function parseHunkBody(
  lines: string[],
  headerIndex: number,
  section: FileSection,
  match: RegExpExecArray
): { hunk: Hunk; next: number } {
  const oldStart = Number(match[1]);
  const oldCount = match[2] === undefined ? 1 : Number(match[2]);
  const newStart = Number(match[3]);
  const newCount = match[4] === undefined ? 1 : Number(match[4]);

  // A zero count puts the start on the line before the insertion point
  let oldLine = oldCount === 0 ? oldStart + 1 : oldStart;
  let newLine = newCount === 0 ? newStart + 1 : newStart;
  let oldSeen = 0;
  let newSeen = 0;

  const removedLines: number[] = [];
  const addedLines: number[] = [];
  const removedText: string[] = [];
  const addedText: string[] = [];
  let oldInsertion: number | null = null;
  let newInsertion: number | null = null;

  let i = headerIndex + 1;
  while (oldSeen < oldCount || newSeen < newCount) {
    if (i >= lines.length) {
      throw new MalformedDiffError(
        `Hunk at line ${headerIndex + 1} is truncated (expected -${oldCount}/+${newCount}, got -${oldSeen}/+${newSeen})`,
        headerIndex + 1
      );
    }
    const raw = lines[i].replace(/\r$/, '');
    const marker = raw.length === 0 ? ' ' : raw[0];
    const content = raw.slice(1);

    if (marker === '\\') {
      i++;
      continue;
    }

    if (marker === ' ') {
      oldSeen++;
      newSeen++;
      oldLine++;
      newLine++;
    } else if (marker === '-') {
      if (newInsertion === null) newInsertion = newLine;
      removedLines.push(oldLine);
      removedText.push(content);
      oldSeen++;
      oldLine++;
    } else if (marker === '+') {
      if (oldInsertion === null) oldInsertion = oldLine;
      addedLines.push(newLine);
      addedText.push(content);
      newSeen++;
      newLine++;
    } else {
      throw new MalformedDiffError(
        `Hunk at line ${headerIndex + 1} ends early at line ${i + 1} (expected -${oldCount}/+${newCount}, got -${oldSeen}/+${newSeen})`,
        i + 1
      );
    }

    if (oldSeen > oldCount || newSeen > newCount) {
      throw new MalformedDiffError(
        `Hunk at line ${headerIndex + 1} has more lines than its header declares`,
        i + 1
      );
    }
    i++;
  }

  // Trailing "\ No newline at end of file"
  while (i < lines.length && lines[i].startsWith('\\')) {
    i++;
  }

  if (removedLines.length === 0 && addedLines.length === 0) {
    throw new MalformedDiffError(`Hunk at line ${headerIndex + 1} contains no changes`, headerIndex + 1);
  }

  const status = fileStatus(section);
  const hunk: Hunk = {
    file_path: status === 'deleted' ? section.oldPath : section.newPath,
    file_status: status,
    original_line_range: changedRange(removedLines, oldInsertion ?? oldLine),
    modified_line_range: changedRange(addedLines, newInsertion ?? newLine),
    original_text: removedText.join('\n'),
    modified_text: addedText.join('\n'),
    header: {
      old_start: oldStart,
      old_count: oldCount,
      new_start: newStart,
      new_count: newCount,
    },
  };

  return { hunk, next: i };
}

/**
 * Sorts hunks by file then new-side start and checks that hunks within a
 * file neither overlap nor go backwards.
 */
function orderHunks(hunks: Hunk[]): Hunk[] {
  const ordered = hunks
    .map((hunk, index) => ({ hunk, index }))
    .sort((a, b) => {
      if (a.hunk.file_path !== b.hunk.file_path) {
        return a.hunk.file_path < b.hunk.file_path ? -1 : 1;
      }
      return a.hunk.header.new_start - b.hunk.header.new_start || a.index - b.index;
    })
    .map((entry) => entry.hunk);

  for (let k = 1; k < ordered.length; k++) {
    const prev = ordered[k - 1];
    const cur = ordered[k];
    if (prev.file_path !== cur.file_path) continue;
    const prevOldEnd = prev.header.old_start + prev.header.old_count - 1;
    const prevNewEnd = prev.header.new_start + prev.header.new_count - 1;
    if (cur.header.old_start <= prevOldEnd || cur.header.new_start <= prevNewEnd) {
      throw new MalformedDiffError(
        `Overlapping hunks in ${cur.file_path} (@@ +${prev.header.new_start},${prev.header.new_count} and +${cur.header.new_start},${cur.header.new_count})`,
        0
      );
    }
  }

  return ordered;
}

/**
 * Files touched by a patch (fix-side paths).
 */
export function touchedFiles(patch: string): string[] {
  const paths = new Set<string>();
  for (const line of patch.split('\n')) {
    if (line.startsWith('+++ ')) {
      const path = normalizeDiffPath(line.slice(4));
      if (path !== DEV_NULL) paths.add(path);
    }
  }
  return [...paths].sort();
}

/**
 * Counts changed files and changed (added or removed) lines of a patch.
 */
export function lenPatch(patch: string): { num_files: number; num_lines: number } {
  let numLines = 0;
  for (const line of patch.split('\n')) {
    if (line.startsWith('+++ ') || line.startsWith('--- ')) continue;
    if (line.startsWith('+') || line.startsWith('-')) numLines++;
  }
  return { num_files: touchedFiles(patch).length, num_lines: numLines };
}
