/**
 * Mask types: the removed spans and the artifact derived from them.
 */

/**
 * A contiguous region removed from one file.
 */
export interface MaskSpan {
  file_path: string;
  start_line: number;
  end_line: number;
}

/**
 * Removed text for one span. Kept as a list (not a map keyed by span
 * objects) so the artifact serializes cleanly.
 */
export interface RemovedContent {
  span: MaskSpan;
  /** Original text of the span, each line with its terminator */
  text: string;
}

/**
 * Result of applying a span set to a commit's snapshots.
 *
 * Regenerated on every iteration; never edited in place.
 */
export interface MaskedArtifact {
  /** File path → source with every span of that file removed */
  masked_files: Record<string, string>;
  /** Spans ordered by file, then start line */
  removed_spans: MaskSpan[];
  /** One entry per removed span, same order as removed_spans */
  removed_content: RemovedContent[];
}

/**
 * Stable string key for a span.
 */
export function spanKey(span: MaskSpan): string {
  return `${span.file_path}:${span.start_line}-${span.end_line}`;
}

/**
 * Number of lines covered by a span.
 */
export function spanLength(span: MaskSpan): number {
  return span.end_line - span.start_line + 1;
}

/**
 * Orders spans by file path, then start line.
 */
export function compareSpans(a: MaskSpan, b: MaskSpan): number {
  if (a.file_path !== b.file_path) {
    return a.file_path < b.file_path ? -1 : 1;
  }
  return a.start_line - b.start_line || a.end_line - b.end_line;
}

/**
 * Whether two span sets cover exactly the same lines.
 */
export function sameSpans(a: readonly MaskSpan[], b: readonly MaskSpan[]): boolean {
  if (a.length !== b.length) return false;
  const left = [...a].sort(compareSpans);
  const right = [...b].sort(compareSpans);
  return left.every((span, i) => spanKey(span) === spanKey(right[i]));
}
