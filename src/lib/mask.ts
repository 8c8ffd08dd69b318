/**
 * Mask engine: chooses which regions of the fix-side snapshots to remove,
 * and produces the masked artifact for a span set.
 *
 * Spans always:
 * - contain every maskable hunk's fix-side changed range
 * - begin and end on unit or statement boundaries (never split a block)
 * - leave at least part of the touched files visible
 */

import type { CommitRecord, Hunk, LineRange, LineRef } from '../types/commit.js';
import { rangeContains, rangeLength } from '../types/commit.js';
import type { MaskConfig } from '../types/config.js';
import type { MaskSpan, MaskedArtifact, RemovedContent } from '../types/mask.js';
import { compareSpans, spanLength } from '../types/mask.js';
import { UnresolvableMaskError } from '../types/errors.js';
import { isBlank, splitLines } from './lines.js';
import { resolveMaskScope } from './scope.js';
import {
  analyzeStructure,
  coverRange,
  enclosingContainer,
  isWellFormedRegion,
  probeRange,
  structureModeFor,
  widenToWellFormed,
  type FileStructure,
} from './structure.js';

/**
 * Direction of a verifier hint.
 */
export type MaskHintKind = 'under' | 'over';

/**
 * A line the verifier flagged, and which way the mask should move.
 */
export interface MaskHint {
  kind: MaskHintKind;
  ref: LineRef;
}

/**
 * Inputs beyond the commit itself.
 */
export interface MaskRequest {
  /** Spans of the previous iteration; absent for the initial mask */
  base?: readonly MaskSpan[];
  hints?: readonly MaskHint[];
}

/**
 * Lazily analysed snapshots of one commit.
 */
class StructureCache {
  private readonly cache = new Map<string, FileStructure>();

  constructor(
    private readonly commit: CommitRecord,
    private readonly config: MaskConfig
  ) {}

  get(filePath: string): FileStructure {
    const cached = this.cache.get(filePath);
    if (cached) return cached;
    const source = this.commit.file_snapshots[filePath];
    if (source === undefined) {
      throw new UnresolvableMaskError(`No snapshot for "${filePath}"`, filePath);
    }
    const structure = analyzeStructure(source, structureModeFor(filePath, this.config.indent_extensions));
    this.cache.set(filePath, structure);
    return structure;
  }
}

function toSpan(filePath: string, range: LineRange): MaskSpan {
  return { file_path: filePath, start_line: range.start, end_line: range.end };
}

function spanRange(span: MaskSpan): LineRange {
  return { start: span.start_line, end: span.end_line };
}

function totalLines(spans: readonly MaskSpan[]): number {
  return spans.reduce((sum, span) => sum + spanLength(span), 0);
}

/**
 * Merges spans of the same file that overlap, touch, or are separated
 * only by blank lines.
 */
export function mergeSpans(spans: readonly MaskSpan[], structures: (path: string) => FileStructure): MaskSpan[] {
  const sorted = [...spans].sort(compareSpans);
  const merged: MaskSpan[] = [];

  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && last.file_path === span.file_path && span.start_line <= last.end_line + 1) {
      last.end_line = Math.max(last.end_line, span.end_line);
      continue;
    }
    if (last && last.file_path === span.file_path) {
      const lines = structures(span.file_path).lines;
      let gapBlank = true;
      for (let k = last.end_line + 1; k < span.start_line; k++) {
        if (!isBlank(lines[k - 1])) {
          gapBlank = false;
          break;
        }
      }
      if (gapBlank) {
        last.end_line = Math.max(last.end_line, span.end_line);
        continue;
      }
    }
    merged.push({ ...span });
  }
  return merged;
}

function changedLineCount(hunks: readonly Hunk[]): number {
  return hunks.reduce((sum, hunk) => sum + Math.max(1, rangeLength(hunk.modified_line_range)), 0);
}

/**
 * Initial mask: the smallest enclosing unit of each maskable hunk.
 */
function initialSpans(hunks: readonly Hunk[], structures: StructureCache): MaskSpan[] {
  return hunks.map((hunk) => {
    const structure = structures.get(hunk.file_path);
    const region = coverRange(structure, hunk.modified_line_range);
    if (!region) {
      throw new UnresolvableMaskError(
        `No well-formed region encloses ${hunk.file_path}:${hunk.modified_line_range.start}`,
        hunk.file_path
      );
    }
    return toSpan(hunk.file_path, region);
  });
}

/**
 * Grows spans to their parent units until the mask reaches
 * `min_ratio` times the changed lines. Top-level containers (classes,
 * namespaces) are never taken whole.
 */
function growToRatio(
  spans: MaskSpan[],
  changedLines: number,
  config: MaskConfig,
  structures: StructureCache
): MaskSpan[] {
  const target = Math.ceil(config.min_ratio * changedLines);
  let current = spans;

  while (totalLines(current) < target) {
    const bySize = [...current].sort((a, b) => spanLength(a) - spanLength(b));
    let grown = false;

    for (const span of bySize) {
      const structure = structures.get(span.file_path);
      const parent = enclosingContainer(structure, { start: span.start_line, end: span.end_line });
      if (!parent) continue;
      if (parent.parent === null && parent.kind !== 'function') continue;
      if (!isWellFormedRegion(structure, parent.start, parent.end)) continue;

      const added = parent.end - parent.start + 1 - spanLength(span);
      if (totalLines(current) + added > config.max_lines) continue;

      current = mergeSpans(
        current.map((candidate) => (candidate === span ? toSpan(span.file_path, parent) : candidate)),
        (path) => structures.get(path)
      );
      grown = true;
      break;
    }
    if (!grown) break;
  }
  return current;
}

function levelOf(structure: FileStructure, line: number): number {
  const info = structure.info[line - 1];
  return structure.mode === 'brackets' ? info.depthBefore : info.indent;
}

/**
 * Rejects growth that would sweep in sibling code belonging to neither
 * the existing span nor the unit being added.
 */
function assertNoUnrelatedCode(
  structure: FileStructure,
  filePath: string,
  region: LineRange,
  related: readonly LineRange[]
): void {
  const level = levelOf(structure, region.start);
  const covered = (line: number) => related.some((range) => range.start <= line && range.end >= line);

  for (let line = region.start; line <= region.end; line++) {
    if (covered(line)) continue;
    const info = structure.info[line - 1];
    if (info.blank || info.continuation) continue;
    if (levelOf(structure, line) <= level) {
      throw new UnresolvableMaskError(
        `Growing the mask in "${filePath}" would remove unrelated code at line ${line}`,
        filePath
      );
    }
  }
}

function nearestSpan(spans: readonly MaskSpan[], filePath: string, line: number): MaskSpan | null {
  let best: MaskSpan | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const span of spans) {
    if (span.file_path !== filePath) continue;
    const distance = line < span.start_line ? span.start_line - line : line > span.end_line ? line - span.end_line : 0;
    if (distance < bestDistance) {
      best = span;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Grows the mask to include the unit containing each hinted line.
 */
function growToHints(
  spans: MaskSpan[],
  hints: readonly LineRef[],
  maskableFiles: ReadonlySet<string>,
  structures: StructureCache
): MaskSpan[] {
  let current = spans;

  for (const ref of hints) {
    if (!maskableFiles.has(ref.file_path)) {
      throw new UnresolvableMaskError(
        `Cannot grow into "${ref.file_path}": not a maskable file of this commit`,
        ref.file_path
      );
    }
    const structure = structures.get(ref.file_path);
    if (ref.line < 1 || ref.line > structure.lines.length) {
      throw new UnresolvableMaskError(`Line ${ref.line} is outside "${ref.file_path}"`, ref.file_path);
    }
    if (current.some((span) => span.file_path === ref.file_path && span.start_line <= ref.line && span.end_line >= ref.line)) {
      continue;
    }

    const unit = coverRange(structure, { start: ref.line, end: ref.line });
    const span = nearestSpan(current, ref.file_path, ref.line);
    if (!unit || !span) {
      throw new UnresolvableMaskError(`No unit to grow into at ${ref.file_path}:${ref.line}`, ref.file_path);
    }

    const nearRange = spanRange(span);
    const hull = { start: Math.min(nearRange.start, unit.start), end: Math.max(nearRange.end, unit.end) };
    const region = widenToWellFormed(structure, hull);
    if (!region) {
      throw new UnresolvableMaskError(`No well-formed region joins ${ref.file_path}:${ref.line} to the mask`, ref.file_path);
    }
    assertNoUnrelatedCode(structure, ref.file_path, region, [nearRange, unit]);

    current = mergeSpans(
      current.map((candidate) => (candidate === span ? toSpan(ref.file_path, region) : candidate)),
      (path) => structures.get(path)
    );
  }
  return current;
}

function isBlankLine(structure: FileStructure, line: number): boolean {
  return isBlank(structure.lines[line - 1]);
}

/**
 * Removes flagged leading and trailing lines from one span. Cuts only land
 * where both the dropped part and the remainder are well-formed, and never
 * inside a hunk's changed range.
 */
function shrinkSpan(
  structure: FileStructure,
  span: MaskSpan,
  flagged: ReadonlySet<number>,
  protectedRanges: readonly LineRange[]
): MaskSpan | null {
  const keep: number[] = [];
  for (const range of protectedRanges) {
    keep.push(range.start, range.end);
  }
  for (let line = span.start_line; line <= span.end_line; line++) {
    if (!flagged.has(line) && !isBlankLine(structure, line)) keep.push(line);
  }
  if (keep.length === 0) {
    return null;
  }
  const keepStart = Math.max(span.start_line, Math.min(...keep));
  const keepEnd = Math.min(span.end_line, Math.max(...keep));

  let start = span.start_line;
  for (let cut = keepStart; cut > span.start_line; cut--) {
    if (isBlankLine(structure, cut)) continue;
    if (
      isWellFormedRegion(structure, span.start_line, cut - 1) &&
      isWellFormedRegion(structure, cut, span.end_line)
    ) {
      start = cut;
      break;
    }
  }

  let end = span.end_line;
  for (let cut = keepEnd; cut < span.end_line; cut++) {
    if (isBlankLine(structure, cut)) continue;
    if (
      isWellFormedRegion(structure, cut + 1, span.end_line) &&
      isWellFormedRegion(structure, start, cut)
    ) {
      end = cut;
      break;
    }
  }

  return { file_path: span.file_path, start_line: start, end_line: end };
}

function shrinkToHints(
  spans: MaskSpan[],
  hints: readonly LineRef[],
  hunks: readonly Hunk[],
  structures: StructureCache
): MaskSpan[] {
  const result: MaskSpan[] = [];

  for (const span of spans) {
    const flagged = new Set(
      hints
        .filter((ref) => ref.file_path === span.file_path && ref.line >= span.start_line && ref.line <= span.end_line)
        .map((ref) => ref.line)
    );
    if (flagged.size === 0) {
      result.push(span);
      continue;
    }
    const structure = structures.get(span.file_path);
    const protectedRanges = hunks
      .filter((hunk) => hunk.file_path === span.file_path)
      .map((hunk) => probeRange(structure, hunk.modified_line_range))
      .filter((range) => rangeContains(spanRange(span), range));

    const shrunk = shrinkSpan(structure, span, flagged, protectedRanges);
    if (shrunk) result.push(shrunk);
  }
  return result;
}

function assertCoversHunks(spans: readonly MaskSpan[], hunks: readonly Hunk[], structures: StructureCache): void {
  for (const hunk of hunks) {
    const probe = probeRange(structures.get(hunk.file_path), hunk.modified_line_range);
    const covered = spans.some((span) => span.file_path === hunk.file_path && rangeContains(spanRange(span), probe));
    if (!covered) {
      throw new UnresolvableMaskError(
        `Mask does not cover ${hunk.file_path}:${hunk.modified_line_range.start}-${hunk.modified_line_range.end}`,
        hunk.file_path
      );
    }
  }
}

/**
 * Computes the span set for a commit.
 *
 * Without `request.base` this is the initial mask. With a base, `under`
 * hints grow the mask to the unit containing each hinted line and `over`
 * hints shrink the flagged leading or trailing lines; growth runs first
 * when both are given.
 *
 * @throws UnresolvableMaskError when no structurally valid mask satisfies
 *   the request
 */
export function computeMask(
  commit: CommitRecord,
  seed: readonly Hunk[],
  config: MaskConfig,
  request: MaskRequest = {}
): MaskSpan[] {
  const scope = resolveMaskScope(commit, seed, config);
  if (scope.maskable.length === 0) {
    throw new UnresolvableMaskError('No maskable hunks: every touched file is excluded or deleted');
  }
  const structures = new StructureCache(commit, config);
  const merge = (spans: readonly MaskSpan[]) => mergeSpans(spans, (path) => structures.get(path));

  let spans: MaskSpan[];
  if (!request.base) {
    spans = merge(initialSpans(scope.maskable, structures));
    if (totalLines(spans) > config.max_lines) {
      throw new UnresolvableMaskError(`Initial mask covers ${totalLines(spans)} lines, above mask.max_lines`);
    }
    spans = growToRatio(spans, changedLineCount(scope.maskable), config, structures);
  } else {
    spans = merge(request.base);
  }

  const hints = request.hints ?? [];
  const under = hints.filter((hint) => hint.kind === 'under').map((hint) => hint.ref);
  const over = hints.filter((hint) => hint.kind === 'over').map((hint) => hint.ref);
  if (under.length > 0) {
    spans = growToHints(spans, under, new Set(scope.files), structures);
  }
  if (over.length > 0) {
    spans = merge(shrinkToHints(spans, over, scope.maskable, structures));
  }

  assertCoversHunks(spans, scope.maskable, structures);
  if (totalLines(spans) > config.max_lines) {
    throw new UnresolvableMaskError(`Mask covers ${totalLines(spans)} lines, above mask.max_lines`);
  }
  const visible = scope.files.reduce((sum, path) => sum + structures.get(path).lines.length, 0);
  if (totalLines(spans) >= visible) {
    throw new UnresolvableMaskError('Mask would remove every line of the touched files');
  }
  return spans;
}

/**
 * Removes every span from the snapshots.
 *
 * Files without spans are carried over unchanged so the artifact shows the
 * whole fix-side view of the commit.
 */
export function applyMask(commit: CommitRecord, spans: readonly MaskSpan[]): MaskedArtifact {
  const ordered = [...spans].sort(compareSpans);
  const masked_files: Record<string, string> = { ...commit.file_snapshots };
  const removed_content: RemovedContent[] = [];

  const byFile = new Map<string, MaskSpan[]>();
  for (const span of ordered) {
    const list = byFile.get(span.file_path) ?? [];
    list.push(span);
    byFile.set(span.file_path, list);
  }

  for (const [filePath, fileSpans] of byFile) {
    const source = commit.file_snapshots[filePath];
    if (source === undefined) {
      throw new UnresolvableMaskError(`No snapshot for "${filePath}"`, filePath);
    }
    const lines = splitLines(source);
    const kept: string[] = [];
    let next = 1;

    for (const span of fileSpans) {
      if (span.start_line < next || span.end_line > lines.length || span.start_line > span.end_line) {
        throw new UnresolvableMaskError(
          `Span ${filePath}:${span.start_line}-${span.end_line} is out of range or overlaps another`,
          filePath
        );
      }
      kept.push(...lines.slice(next - 1, span.start_line - 1));
      removed_content.push({ span: { ...span }, text: lines.slice(span.start_line - 1, span.end_line).join('') });
      next = span.end_line + 1;
    }
    kept.push(...lines.slice(next - 1));
    masked_files[filePath] = kept.join('');
  }

  return {
    masked_files,
    removed_spans: ordered.map((span) => ({ ...span })),
    removed_content,
  };
}

/**
 * Re-inserts removed text, reconstructing the fix-side snapshots.
 */
export function unmask(artifact: MaskedArtifact): Record<string, string> {
  const restored: Record<string, string> = { ...artifact.masked_files };
  const byFile = new Map<string, RemovedContent[]>();
  for (const entry of artifact.removed_content) {
    const list = byFile.get(entry.span.file_path) ?? [];
    list.push(entry);
    byFile.set(entry.span.file_path, list);
  }

  for (const [filePath, entries] of byFile) {
    const masked = splitLines(artifact.masked_files[filePath] ?? '');
    const output: string[] = [];
    let taken = 0;
    let next = 1;
    for (const entry of [...entries].sort((a, b) => compareSpans(a.span, b.span))) {
      const keptCount = entry.span.start_line - next;
      output.push(...masked.slice(taken, taken + keptCount));
      taken += keptCount;
      output.push(entry.text);
      next = entry.span.end_line + 1;
    }
    output.push(...masked.slice(taken));
    restored[filePath] = output.join('');
  }
  return restored;
}
