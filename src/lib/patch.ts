/**
 * Renders the masked repository diff: a removal-only unified diff that
 * takes the fix-side snapshots to their masked form.
 */

import type { MaskSpan } from '../types/mask.js';
import { compareSpans } from '../types/mask.js';
import { splitLines, stripEol } from './lines.js';

/** Context lines around each removed span */
export const DIFF_CONTEXT_LINES = 3;

const NO_NEWLINE_MARKER = '\\ No newline at end of file\n';

interface RemovalHunk {
  /** First line shown (1-based, original side) */
  first: number;
  /** Last line shown */
  last: number;
  spans: MaskSpan[];
}

function groupHunks(spans: readonly MaskSpan[], lineCount: number, context: number): RemovalHunk[] {
  const hunks: RemovalHunk[] = [];
  for (const span of spans) {
    const first = Math.max(1, span.start_line - context);
    const last = Math.min(lineCount, span.end_line + context);
    const previous = hunks[hunks.length - 1];
    if (previous && first <= previous.last + 1) {
      previous.last = Math.max(previous.last, last);
      previous.spans.push(span);
    } else {
      hunks.push({ first, last, spans: [span] });
    }
  }
  return hunks;
}

function renderLine(prefix: string, line: string): string {
  const body = `${prefix}${stripEol(line)}\n`;
  return line.endsWith('\n') ? body : body + NO_NEWLINE_MARKER;
}

function rangeHeader(start: number, count: number): string {
  if (count === 0) {
    return `${start - 1},0`;
  }
  return count === 1 ? `${start}` : `${start},${count}`;
}

/**
 * Renders the removal diff for one file.
 */
export function renderFileRemoval(
  filePath: string,
  source: string,
  spans: readonly MaskSpan[],
  context: number = DIFF_CONTEXT_LINES
): string {
  const ordered = spans.filter((span) => span.file_path === filePath).sort(compareSpans);
  if (ordered.length === 0) return '';

  const lines = splitLines(source);
  let out = `diff --git a/${filePath} b/${filePath}\n--- a/${filePath}\n+++ b/${filePath}\n`;
  let removedBefore = 0;

  for (const hunk of groupHunks(ordered, lines.length, context)) {
    const removedHere = hunk.spans.reduce((sum, span) => sum + span.end_line - span.start_line + 1, 0);
    const oldCount = hunk.last - hunk.first + 1;
    const newCount = oldCount - removedHere;
    const newStart = hunk.first - removedBefore;
    out += `@@ -${rangeHeader(hunk.first, oldCount)} +${rangeHeader(newStart, newCount)} @@\n`;

    let spanIndex = 0;
    for (let line = hunk.first; line <= hunk.last; line++) {
      const span = hunk.spans[spanIndex];
      const removed = span !== undefined && line >= span.start_line && line <= span.end_line;
      out += renderLine(removed ? '-' : ' ', lines[line - 1]);
      if (span !== undefined && line === span.end_line) spanIndex++;
    }
    removedBefore += removedHere;
  }
  return out;
}

/**
 * Renders the removal diff across all files with spans, ordered by path.
 */
export function renderRemovalDiff(
  snapshots: Readonly<Record<string, string>>,
  spans: readonly MaskSpan[],
  context: number = DIFF_CONTEXT_LINES
): string {
  const files = [...new Set(spans.map((span) => span.file_path))].sort();
  return files
    .map((filePath) => renderFileRemoval(filePath, snapshots[filePath] ?? '', spans, context))
    .join('');
}
