/**
 * Commit and diff types for the curation pipeline.
 *
 * A CommitRecord is the immutable input produced by the dataset
 * normalization step. Hunks are derived from its unified diff.
 */

/**
 * Inclusive, 1-based line range.
 *
 * An empty range is encoded as `{ start: p, end: p - 1 }`, meaning the
 * insertion point just before line `p`.
 */
export interface LineRange {
  start: number;
  end: number;
}

/**
 * A single line in a file snapshot.
 */
export interface LineRef {
  file_path: string;
  line: number;
}

/**
 * Optional provenance carried along with a commit.
 */
export interface CommitMetadata {
  /** Security advisory identifier (e.g. a CVE id) */
  cve_id?: string;
  /** Weakness classifications */
  cwe_ids?: string[];
  /** Web page describing the fix */
  info_page?: string;
  /** Primary language of the repository */
  language?: string;
}

/**
 * A historical vulnerability-fixing commit.
 */
export interface CommitRecord {
  /** Repository identifier, usually `owner/name` */
  repo_id: string;
  /** Full hash of the fix commit */
  commit_hash: string;
  /** Unified diff of the fix commit (the golden diff) */
  unified_diff: string;
  /** File path → full source at the fix commit */
  file_snapshots: Record<string, string>;
  metadata?: CommitMetadata;
}

/**
 * How the fix commit treats a file.
 */
export type FileStatus = 'modified' | 'added' | 'deleted';

/**
 * One hunk of a unified diff.
 *
 * Ranges cover changed lines only; context lines are trimmed.
 */
export interface Hunk {
  /** Fix-side path (pre-fix path when the file is deleted) */
  file_path: string;
  file_status: FileStatus;
  /** Changed lines on the pre-fix side */
  original_line_range: LineRange;
  /** Changed lines on the fix side (the side that gets masked) */
  modified_line_range: LineRange;
  /** Removed lines, newline-joined */
  original_text: string;
  /** Added lines, newline-joined */
  modified_text: string;
  /** Raw header counts from `@@ -a,b +c,d @@` */
  header: {
    old_start: number;
    old_count: number;
    new_start: number;
    new_count: number;
  };
}

/**
 * Number of lines in a range (0 for an empty range).
 */
export function rangeLength(range: LineRange): number {
  return Math.max(0, range.end - range.start + 1);
}

/**
 * Whether `outer` fully contains `inner`. Works for empty `inner` ranges.
 */
export function rangeContains(outer: LineRange, inner: LineRange): boolean {
  return outer.start <= inner.start && outer.end >= inner.end;
}

/**
 * Instance id used throughout the dataset: `owner__repo_<commit_hash>`.
 */
export function instanceIdFor(commit: Pick<CommitRecord, 'repo_id' | 'commit_hash'>): string {
  return `${commit.repo_id.replace(/\//g, '__')}_${commit.commit_hash}`;
}
