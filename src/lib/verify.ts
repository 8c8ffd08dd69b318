/**
 * Verification agent.
 *
 * The capability only maps requirements to lines. Turning that mapping into
 * a verdict (which lines are unexplained, which requirements are
 * unsupported) happens here, in {@link compareMapping}.
 */

import type { Hunk, LineRange, LineRef } from '../types/commit.js';
import type { LlmCapability } from '../types/capability.js';
import type { VerificationConfig } from '../types/config.js';
import type { TaskDescription } from '../types/description.js';
import type { MaskedArtifact, RemovedContent } from '../types/mask.js';
import type { VerdictStatus, VerificationOutput, VerificationVerdict } from '../types/verdict.js';
import { VerificationOutputError } from '../types/errors.js';
import { extractJson } from './json-extract.js';
import { loadSchema, validateWithSchema } from './schema.js';
import { resolveAsset } from './paths.js';
import { interpolate, loadTemplate } from './template.js';
import { splitLines, stripEol } from './lines.js';
import { unmask } from './mask.js';
import { analyzeStructure, structureModeFor, type LineInfo } from './structure.js';
import { DEFAULT_CONFIG } from './config.js';

export interface VerifyOptions {
  /** Hunks of the commit; their changed lines anchor each span */
  hunks?: readonly Hunk[];
  /** Extensions lexed by indentation; defaults to `mask.indent_extensions` */
  indentExtensions?: readonly string[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

function refKey(filePath: string, line: number): string {
  return `${filePath}\u0000${line}`;
}

function compareRefs(a: LineRef, b: LineRef): number {
  if (a.file_path !== b.file_path) return a.file_path < b.file_path ? -1 : 1;
  return a.line - b.line;
}

function uniqueSorted(refs: readonly LineRef[]): LineRef[] {
  const seen = new Map<string, LineRef>();
  for (const ref of refs) {
    seen.set(refKey(ref.file_path, ref.line), { file_path: ref.file_path, line: ref.line });
  }
  return [...seen.values()].sort(compareRefs);
}

/**
 * Lexes each file once and answers, per 1-based line, whether the line
 * carries behaviour (a letter or digit outside comments).
 */
export function substantiveLines(
  sources: Record<string, string>,
  indentExtensions: readonly string[]
): (filePath: string, line: number) => boolean {
  const lexed = new Map<string, LineInfo[]>();
  return (filePath, line) => {
    let info = lexed.get(filePath);
    if (info === undefined) {
      const source = sources[filePath] ?? '';
      info = analyzeStructure(source, structureModeFor(filePath, indentExtensions)).info;
      lexed.set(filePath, info);
    }
    return info[line - 1]?.substantive ?? false;
  };
}

function hunkProbe(range: LineRange, lineCount: number): LineRange {
  if (range.end >= range.start) return range;
  const p = range.start;
  return { start: Math.max(1, Math.min(lineCount, p - 1)), end: Math.max(1, Math.min(lineCount, p)) };
}

/**
 * Compares a requirement-to-line mapping against the removed content.
 *
 * - References outside the removed content, and unclaimed substantive lines
 *   between the first and last anchor of a span, are under-specified.
 * - Unclaimed substantive lines before the first or after the last anchor
 *   of a span are over-specified.
 * - Requirements without a removed line are unsupported.
 *
 * Anchors are claimed removed lines and the hunks' changed lines.
 */
export function compareMapping(
  artifact: MaskedArtifact,
  description: TaskDescription,
  output: VerificationOutput,
  minConfidence: number,
  hunks: readonly Hunk[] = [],
  indentExtensions: readonly string[] = DEFAULT_CONFIG.mask.indent_extensions
): VerificationVerdict {
  const originals = unmask(artifact);
  const isSubstantive = substantiveLines(originals, indentExtensions);
  const lineCounts = new Map<string, number>(
    Object.entries(originals).map(([path, source]) => [path, splitLines(source).length])
  );
  const isKnownRef = (ref: LineRef) => {
    const count = lineCounts.get(ref.file_path);
    return count !== undefined && ref.line >= 1 && ref.line <= count;
  };

  const removed = new Set<string>();
  for (const entry of artifact.removed_content) {
    for (let line = entry.span.start_line; line <= entry.span.end_line; line++) {
      removed.add(refKey(entry.span.file_path, line));
    }
  }

  const requirementIds = new Set(description.requirements.map((requirement) => requirement.id));
  const supported = new Set<string>();
  const claimed: LineRef[] = [];
  const outside: LineRef[] = [];

  for (const mapping of output.mappings) {
    if (!requirementIds.has(mapping.requirement_id)) continue;
    for (const ref of mapping.lines) {
      if (!isKnownRef(ref)) continue;
      claimed.push(ref);
      if (removed.has(refKey(ref.file_path, ref.line))) {
        supported.add(mapping.requirement_id);
      } else {
        outside.push(ref);
      }
    }
  }
  const claimedKeys = new Set(claimed.map((ref) => refKey(ref.file_path, ref.line)));

  const under: LineRef[] = [...outside];
  const over: LineRef[] = [];

  for (const entry of artifact.removed_content) {
    const { file_path, start_line, end_line } = entry.span;
    const anchors: number[] = [];
    for (let line = start_line; line <= end_line; line++) {
      if (claimedKeys.has(refKey(file_path, line))) anchors.push(line);
    }
    const lineCount = lineCounts.get(file_path) ?? end_line;
    for (const hunk of hunks) {
      if (hunk.file_path !== file_path) continue;
      const probe = hunkProbe(hunk.modified_line_range, lineCount);
      for (let line = Math.max(probe.start, start_line); line <= Math.min(probe.end, end_line); line++) {
        anchors.push(line);
      }
    }
    const firstAnchor = anchors.length > 0 ? Math.min(...anchors) : Number.POSITIVE_INFINITY;
    const lastAnchor = anchors.length > 0 ? Math.max(...anchors) : Number.NEGATIVE_INFINITY;

    for (let line = start_line; line <= end_line; line++) {
      if (claimedKeys.has(refKey(file_path, line)) || !isSubstantive(file_path, line)) continue;
      const ref = { file_path, line };
      if (line < firstAnchor || line > lastAnchor) {
        over.push(ref);
      } else {
        under.push(ref);
      }
    }
  }

  const unsupported = description.requirements
    .map((requirement) => requirement.id)
    .filter((id) => !supported.has(id));

  const underSorted = uniqueSorted(under);
  const overSorted = uniqueSorted(over);

  let status: VerdictStatus;
  if (output.ambiguous || output.confidence < minConfidence) {
    status = 'AMBIGUOUS';
  } else if (underSorted.length > 0) {
    status = 'UNDER_SPECIFIED';
  } else if (overSorted.length > 0 || unsupported.length > 0) {
    status = 'OVER_SPECIFIED';
  } else {
    status = 'MATCH';
  }

  return {
    status,
    flagged_lines: uniqueSorted([...underSorted, ...overSorted]),
    rationale: output.rationale,
    under_specified: underSorted,
    over_specified: overSorted,
    unsupported_requirements: unsupported,
    claimed_lines: uniqueSorted(claimed),
    confidence: output.confidence,
  };
}

/**
 * Renders removed content with absolute line numbers.
 */
export function formatRemovedCode(removedContent: readonly RemovedContent[]): string {
  return removedContent
    .map((entry) => {
      const numbered = splitLines(entry.text).map((text, offset) => `${entry.span.start_line + offset}: ${stripEol(text)}`);
      return `=== ${entry.span.file_path} (lines ${entry.span.start_line}-${entry.span.end_line}) ===\n${numbered.join('\n')}`;
    })
    .join('\n\n');
}

/**
 * Parses raw capability text into a verification output.
 */
export function parseVerification(
  raw: string,
  schema: object
): { ok: true; output: VerificationOutput } | { ok: false; reason: string } {
  const extracted = extractJson(raw);
  if (!extracted.success) {
    return { ok: false, reason: extracted.error };
  }
  const validation = validateWithSchema<VerificationOutput>(extracted.data, schema);
  if (!validation.valid || validation.data === null) {
    return { ok: false, reason: `Schema validation failed: ${validation.errors.join('; ')}` };
  }
  return { ok: true, output: validation.data };
}

/**
 * Verification agent.
 */
export class VerificationAgent {
  constructor(
    private readonly capability: LlmCapability,
    private readonly config: VerificationConfig
  ) {}

  /**
   * Checks a description against the removed implementation.
   *
   * @throws {VerificationOutputError} When every attempt returned unusable
   *   output
   */
  async verify(
    artifact: MaskedArtifact,
    description: TaskDescription,
    removedContent: readonly RemovedContent[] = artifact.removed_content,
    options: VerifyOptions = {}
  ): Promise<VerificationVerdict> {
    const template = await loadTemplate(this.config.prompt_file);
    const schema = await loadSchema(resolveAsset(this.config.schema_file));
    const basePrompt = interpolate(template, {
      PROBLEM_STATEMENT: description.problem_statement,
      REQUIREMENTS: description.requirements.map((requirement) => `${requirement.id}: ${requirement.text}`).join('\n'),
      REMOVED_CODE: formatRemovedCode(removedContent),
    });
    const contextFiles = unmask(artifact);

    const attempts = Math.max(1, this.config.max_attempts);
    let retryReason: string | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const prompt = retryReason
        ? `${basePrompt}\n\n=== RETRY ===\nYour previous output was invalid: ${retryReason}\nPlease output ONLY valid JSON matching the format above.`
        : basePrompt;

      const raw = await this.capability.invoke(prompt, contextFiles, {
        timeoutMs: options.timeoutMs,
        signal: options.signal,
      });
      const parsed = parseVerification(raw, schema);
      if (parsed.ok) {
        return compareMapping(
          { ...artifact, removed_content: [...removedContent] },
          description,
          parsed.output,
          this.config.min_confidence,
          options.hunks,
          options.indentExtensions
        );
      }
      retryReason = parsed.reason;
      console.warn(`[VERIFY] attempt ${attempt}/${attempts} unusable: ${parsed.reason}`);
    }

    throw new VerificationOutputError(
      `No usable verification output after ${attempts} attempt(s)`,
      attempts,
      retryReason ?? undefined
    );
  }
}
