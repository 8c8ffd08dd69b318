/**
 * Structural analysis of source files for mask placement.
 *
 * Units come from bracket nesting (C-family languages) or, for files
 * listed in mask.indent_extensions, from indentation; never from raw line
 * counts. A region is well-formed when removing it leaves every bracket
 * pair and every block body intact.
 */

import { extname } from 'node:path';
import type { LineRange } from '../types/commit.js';
import { splitLines, stripEol } from './lines.js';

/**
 * How block structure is recognised.
 */
export type StructureMode = 'brackets' | 'indent';

/**
 * Lexical facts about one line.
 */
export interface LineInfo {
  /** Bracket depth at the start of the line */
  depthBefore: number;
  /** Bracket depth at the end of the line */
  depthAfter: number;
  /** Lowest depth reached on the line, including depthBefore */
  minDepth: number;
  /** Code with comments removed and string bodies blanked, trimmed */
  code: string;
  /** Leading whitespace width (tabs to multiples of 8) */
  indent: number;
  /** No code on the line (blank, comment, or directive) */
  blank: boolean;
  /**
   * A letter or digit outside comments. String contents and preprocessor
   * directives count.
   */
  substantive: boolean;
  /** Line begins inside a multi-line string or comment */
  startsInString: boolean;
  /** Line ends inside a multi-line string or comment */
  endsInString: boolean;
  /** Line continues a statement begun on an earlier line */
  continuation: boolean;
}

/**
 * A syntactic unit: a block together with its header.
 */
export interface SyntaxUnit {
  /** First header line (1-based) */
  start: number;
  /** Last line of the block (1-based) */
  end: number;
  kind: 'function' | 'block';
  parent: SyntaxUnit | null;
  children: SyntaxUnit[];
}

/**
 * Analysed file.
 */
export interface FileStructure {
  mode: StructureMode;
  lines: string[];
  info: LineInfo[];
  /** All units, ordered by start line then by size (outermost first) */
  units: SyntaxUnit[];
  /** Units without a parent */
  roots: SyntaxUnit[];
}

const CONTROL_KEYWORDS = new Set([
  'if', 'else', 'for', 'while', 'do', 'switch', 'catch', 'try', 'finally',
  'synchronized', 'using', 'lock', 'foreach', 'with', 'when', 'match', 'loop',
  'unsafe', 'defer', 'go', 'select', 'case', 'default', 'elif', 'except',
]);

const CONTINUATION_CHARS = new Set(['=', '+', '-', '*', '/', '%', '&', '|', '^', '!', '<', '?', ',', '.', '(', '[', '\\']);

/**
 * Picks the structure mode for a file path.
 */
export function structureModeFor(filePath: string, indentExtensions: readonly string[]): StructureMode {
  return indentExtensions.includes(extname(filePath).toLowerCase()) ? 'indent' : 'brackets';
}

function measureIndent(raw: string): number {
  let width = 0;
  for (const ch of raw) {
    if (ch === ' ') width++;
    else if (ch === '\t') width = width + 8 - (width % 8);
    else break;
  }
  return width;
}

const ALNUM = /[A-Za-z0-9]/;
const PREPROCESSOR = /^#\s*(include|define|undef|if|ifdef|ifndef|elif|else|endif|pragma|error|warning|line|import)\b/;

interface LexState {
  blockComment: boolean;
  template: boolean;
  tripleQuote: string | null;
  depth: number;
  /** Open bracket characters, innermost last */
  open: string[];
  pendingBackslash: boolean;
}

interface OpenBrace {
  line: number;
  depth: number;
  codeBefore: string;
}

interface RawBlock {
  openLine: number;
  closeLine: number;
  depth: number;
  codeBefore: string;
}

function findClosingQuote(text: string, from: number, quote: string): number {
  for (let j = from + 1; j < text.length; j++) {
    if (text[j] === '\\') {
      j++;
      continue;
    }
    if (text[j] === quote) return j;
  }
  return -1;
}

/**
 * Lexes every line, tracking strings, comments and bracket depth, and
 * collects brace blocks for bracket-mode files.
 */
function lex(lines: string[], mode: StructureMode): { info: LineInfo[]; blocks: RawBlock[] } {
  const state: LexState = {
    blockComment: false,
    template: false,
    tripleQuote: null,
    depth: 0,
    open: [],
    pendingBackslash: false,
  };
  const info: LineInfo[] = [];
  const blocks: RawBlock[] = [];
  const braces: OpenBrace[] = [];

  lines.forEach((rawLine, index) => {
    const text = stripEol(rawLine);
    const startsInString = state.blockComment || state.template || state.tripleQuote !== null;
    const depthBefore = state.depth;
    const innermost = state.open[state.open.length - 1];
    // Brace bodies hold statements; only parentheses and brackets continue one
    const insideExpression =
      innermost !== undefined && (mode === 'indent' || innermost !== '{');
    const continuation = startsInString || insideExpression || state.pendingBackslash;
    let minDepth = depthBefore;
    let code = '';
    let substantive = false;
    let i = 0;

    while (i < text.length) {
      const ch = text[i];

      if (state.blockComment) {
        if (text.startsWith('*/', i)) {
          state.blockComment = false;
          i += 2;
        } else {
          i++;
        }
        continue;
      }
      if (state.template) {
        if (ALNUM.test(ch)) substantive = true;
        if (ch === '\\') {
          i += 2;
          continue;
        }
        if (ch === '`') {
          state.template = false;
          code += '`';
        }
        i++;
        continue;
      }
      if (state.tripleQuote !== null) {
        if (text.startsWith(state.tripleQuote, i)) {
          code += state.tripleQuote;
          state.tripleQuote = null;
          i += 3;
        } else {
          if (ALNUM.test(ch)) substantive = true;
          i += ch === '\\' ? 2 : 1;
        }
        continue;
      }

      if (mode === 'brackets') {
        if (text.startsWith('//', i)) break;
        if (text.startsWith('/*', i)) {
          state.blockComment = true;
          i += 2;
          continue;
        }
        if (ch === '#' && code.trim() === '') {
          if (PREPROCESSOR.test(text.slice(i))) substantive = true;
          break;
        }
        if (ch === '`') {
          state.template = true;
          code += '`';
          i++;
          continue;
        }
      } else {
        if (ch === '#') break;
        if (text.startsWith('"""', i) || text.startsWith("'''", i)) {
          state.tripleQuote = text.slice(i, i + 3);
          code += state.tripleQuote;
          i += 3;
          continue;
        }
      }

      if (ch === '"' || ch === "'") {
        const close = findClosingQuote(text, i, ch);
        if (close !== -1) {
          if (ALNUM.test(text.slice(i + 1, close))) substantive = true;
          code += ch + ch;
          i = close + 1;
          continue;
        }
        if (ch === '"') {
          // Unterminated string: the rest of the line is string content
          if (ALNUM.test(text.slice(i + 1))) substantive = true;
          code += '""';
          break;
        }
        // Lone apostrophe (lifetimes, labels): ordinary character
      }

      if (ch === '(' || ch === '[' || ch === '{') {
        if (ch === '{' && mode === 'brackets') {
          braces.push({ line: index + 1, depth: state.depth, codeBefore: code });
        }
        state.depth++;
        state.open.push(ch);
      } else if (ch === ')' || ch === ']' || ch === '}') {
        state.depth--;
        state.open.pop();
        minDepth = Math.min(minDepth, state.depth);
        if (ch === '}' && mode === 'brackets') {
          const open = braces.pop();
          if (open) {
            blocks.push({
              openLine: open.line,
              closeLine: index + 1,
              depth: open.depth,
              codeBefore: open.codeBefore,
            });
          }
        }
      }
      if (ALNUM.test(ch)) substantive = true;
      code += ch;
      i++;
    }

    const trimmed = code.trim();
    state.pendingBackslash = trimmed.endsWith('\\');
    info.push({
      depthBefore,
      depthAfter: state.depth,
      minDepth,
      code: trimmed,
      indent: measureIndent(text),
      blank: trimmed.length === 0,
      substantive,
      startsInString,
      endsInString: state.blockComment || state.template || state.tripleQuote !== null,
      continuation,
    });
  });

  return { info, blocks };
}

/**
 * Whether a code line can end a statement (nothing forces the statement to
 * continue on the next line).
 */
export function endsStatement(code: string): boolean {
  if (code.length === 0) return true;
  return !CONTINUATION_CHARS.has(code[code.length - 1]);
}

function firstWord(header: string): string {
  const match = /^[}\s]*([A-Za-z_$][\w$]*)/.exec(header);
  return match ? match[1] : '';
}

function isFunctionHeader(header: string): boolean {
  const trimmed = header.trim();
  if (!trimmed.includes('(')) return false;
  if (CONTROL_KEYWORDS.has(firstWord(trimmed))) return false;
  const lastChar = trimmed[trimmed.length - 1];
  return lastChar !== undefined && !'(,=[:?'.includes(lastChar);
}

/**
 * Finds the first header line of a brace block: walks back over the lines
 * of the same statement (multi-line signatures, annotations, return types).
 */
function braceHeaderStart(info: LineInfo[], block: RawBlock): number {
  if (block.codeBefore.trim().startsWith('}')) {
    return block.openLine;
  }
  let s = block.openLine;
  while (s > 1) {
    // Line s begins inside the header's parentheses
    if (info[s - 1].depthBefore > block.depth) {
      s--;
      continue;
    }
    const prev = info[s - 2];
    if (prev.blank || prev.depthAfter !== block.depth || prev.depthBefore < block.depth) break;
    const last = prev.code[prev.code.length - 1];
    if (last === ';' || last === '{' || last === '}' || last === ':') break;
    s--;
  }
  return s;
}

function braceUnits(info: LineInfo[], blocks: RawBlock[]): SyntaxUnit[] {
  return blocks.map((block) => {
    const start = braceHeaderStart(info, block);
    const headerCode = [
      ...info.slice(start - 1, block.openLine - 1).map((entry) => entry.code),
      block.codeBefore,
    ].join(' ');
    return {
      start,
      end: block.closeLine,
      kind: isFunctionHeader(headerCode) ? 'function' : 'block',
      parent: null,
      children: [],
    } satisfies SyntaxUnit;
  });
}

function indentUnits(info: LineInfo[]): SyntaxUnit[] {
  const units: SyntaxUnit[] = [];
  const n = info.length;

  for (let h = 0; h < n; h++) {
    const header = info[h];
    if (header.blank || header.endsInString || header.depthAfter !== 0) continue;
    if (!header.code.endsWith(':')) continue;

    // Header may span several lines; find its first line
    let s = h;
    while (s > 0 && info[s].continuation) s--;
    const headerIndent = info[s].indent;
    const isFunction = /^(async\s+)?def\s/.test(info[s].code);

    // Decorators directly above
    while (s > 0) {
      let d = s - 1;
      while (d > 0 && info[d].continuation) d--;
      if (!info[d].blank && info[d].indent === headerIndent && info[d].code.startsWith('@')) {
        s = d;
      } else {
        break;
      }
    }

    let end = h;
    for (let k = h + 1; k < n; k++) {
      const line = info[k];
      if (!line.blank && !line.continuation && line.indent <= headerIndent) break;
      if (!line.blank || line.continuation) end = k;
    }
    if (end === h) continue;

    units.push({
      start: s + 1,
      end: end + 1,
      kind: isFunction ? 'function' : 'block',
      parent: null,
      children: [],
    });
  }

  return units;
}

function linkUnits(units: SyntaxUnit[]): { ordered: SyntaxUnit[]; roots: SyntaxUnit[] } {
  const ordered = [...units].sort((a, b) => a.start - b.start || b.end - a.end);
  const roots: SyntaxUnit[] = [];
  const stack: SyntaxUnit[] = [];

  for (const unit of ordered) {
    while (stack.length > 0 && stack[stack.length - 1].end < unit.start) {
      stack.pop();
    }
    const parent = stack.length > 0 ? stack[stack.length - 1] : null;
    if (parent && unit.end <= parent.end) {
      unit.parent = parent;
      parent.children.push(unit);
    } else {
      roots.push(unit);
    }
    stack.push(unit);
  }

  return { ordered, roots };
}

/**
 * Analyses a source file.
 */
export function analyzeStructure(source: string, mode: StructureMode): FileStructure {
  const lines = splitLines(source);
  const { info, blocks } = lex(lines, mode);
  const units = mode === 'brackets' ? braceUnits(info, blocks) : indentUnits(info);
  const { ordered, roots } = linkUnits(units);
  return { mode, lines, info, units: ordered, roots };
}

function lineAt(structure: FileStructure, line: number): LineInfo {
  return structure.info[line - 1];
}

function previousCodeLine(structure: FileStructure, line: number): number | null {
  for (let k = line - 1; k >= 1; k--) {
    if (!lineAt(structure, k).blank) return k;
  }
  return null;
}

function nextCodeLine(structure: FileStructure, line: number): number | null {
  for (let k = line + 1; k <= structure.lines.length; k++) {
    const entry = lineAt(structure, k);
    if (!entry.blank && !entry.continuation) return k;
  }
  return null;
}

function lastCodeLineIn(structure: FileStructure, start: number, end: number): number | null {
  for (let k = end; k >= start; k--) {
    if (!lineAt(structure, k).blank) return k;
  }
  return null;
}

function isWellFormedBrackets(structure: FileStructure, start: number, end: number): boolean {
  const first = lineAt(structure, start);
  const last = lineAt(structure, end);
  if (first.startsInString || last.endsInString) return false;

  const base = first.depthBefore;
  for (let k = start; k <= end; k++) {
    if (lineAt(structure, k).minDepth < base) return false;
  }
  if (last.depthAfter !== base) return false;

  const before = previousCodeLine(structure, start);
  if (before !== null && !endsStatement(lineAt(structure, before).code)) return false;
  const lastCode = lastCodeLineIn(structure, start, end);
  if (lastCode !== null && !endsStatement(lineAt(structure, lastCode).code)) return false;
  return true;
}

function isWellFormedIndent(structure: FileStructure, start: number, end: number): boolean {
  const first = lineAt(structure, start);
  const last = lineAt(structure, end);
  if (first.blank || first.continuation || last.endsInString || last.depthAfter !== 0) return false;

  const base = first.indent;
  for (let k = start; k <= end; k++) {
    const entry = lineAt(structure, k);
    if (!entry.blank && !entry.continuation && entry.indent < base) return false;
  }

  const lastCode = lastCodeLineIn(structure, start, end);
  if (lastCode !== null && lineAt(structure, lastCode).code.endsWith(':')) return false;

  const after = nextCodeLine(structure, end);
  if (after !== null && lineAt(structure, after).indent > base) return false;

  // Removing the whole body of a compound statement leaves it empty
  const before = previousCodeLine(structure, start);
  if (before !== null && lineAt(structure, before).code.endsWith(':')) {
    if (after === null || lineAt(structure, after).indent < base) return false;
  }
  return true;
}

/**
 * Whether removing lines `start..end` keeps the file structurally valid.
 */
export function isWellFormedRegion(structure: FileStructure, start: number, end: number): boolean {
  if (start < 1 || end > structure.lines.length || start > end) return false;
  return structure.mode === 'brackets'
    ? isWellFormedBrackets(structure, start, end)
    : isWellFormedIndent(structure, start, end);
}

/**
 * Clamps a possibly empty range into a non-empty probe inside the file.
 */
export function probeRange(structure: FileStructure, range: LineRange): LineRange {
  const n = structure.lines.length;
  if (range.end >= range.start) {
    return { start: Math.max(1, range.start), end: Math.min(n, range.end) };
  }
  const before = Math.max(1, Math.min(n, range.start - 1));
  const after = Math.max(1, Math.min(n, range.start));
  return { start: Math.min(before, after), end: Math.max(before, after) };
}

/**
 * Smallest unit containing the whole range, optionally functions only.
 */
export function smallestUnitContaining(
  structure: FileStructure,
  range: LineRange,
  kind?: SyntaxUnit['kind']
): SyntaxUnit | null {
  let best: SyntaxUnit | null = null;
  for (const unit of structure.units) {
    if (unit.start > range.start) break;
    if (unit.end < range.end) continue;
    if (kind && unit.kind !== kind) continue;
    if (!best || unit.end - unit.start < best.end - best.start) {
      best = unit;
    }
  }
  return best;
}

/**
 * Statement lines around `line` among the siblings of `container`: from the
 * first line of the statement to the line where it ends.
 */
function statementAround(structure: FileStructure, line: number): LineRange {
  const n = structure.lines.length;
  let start = line;
  while (start > 1 && lineAt(structure, start).continuation) start--;
  while (start > 1) {
    const prev = previousCodeLine(structure, start);
    if (prev === null || endsStatement(lineAt(structure, prev).code)) break;
    start = prev;
  }
  let end = line;
  while (end < n) {
    const entry = lineAt(structure, end);
    const next = end + 1 <= n ? lineAt(structure, end + 1) : null;
    const closed =
      !entry.endsInString &&
      entry.depthAfter === lineAt(structure, start).depthBefore &&
      endsStatement(entry.code) &&
      !(next !== null && next.continuation);
    if (closed) break;
    end++;
  }
  return { start, end };
}

/**
 * The child of `container` (or top-level item when null) covering `line`:
 * a child unit, or the statement the line belongs to.
 */
function childAt(structure: FileStructure, container: SyntaxUnit | null, line: number): LineRange {
  const siblings = container ? container.children : structure.roots;
  const unit = siblings.find((candidate) => candidate.start <= line && candidate.end >= line);
  if (unit) return { start: unit.start, end: unit.end };
  return statementAround(structure, line);
}

/**
 * Smallest unit strictly containing a range, any kind.
 */
export function enclosingContainer(structure: FileStructure, range: LineRange): SyntaxUnit | null {
  let best: SyntaxUnit | null = null;
  for (const unit of structure.units) {
    if (unit.start > range.start) break;
    if (unit.end < range.end) continue;
    if (unit.start === range.start && unit.end === range.end) continue;
    if (!best || unit.end - unit.start < best.end - best.start) best = unit;
  }
  return best;
}

/**
 * Widens a range to a well-formed region made of whole sibling items of
 * their common container, climbing containers until one works.
 */
export function widenToWellFormed(structure: FileStructure, range: LineRange): LineRange | null {
  if (isWellFormedRegion(structure, range.start, range.end)) {
    return range;
  }
  let container = enclosingContainer(structure, range);
  for (;;) {
    const first = childAt(structure, container, range.start);
    const last = childAt(structure, container, range.end);
    const hull = { start: Math.min(first.start, range.start), end: Math.max(last.end, range.end) };
    if (isWellFormedRegion(structure, hull.start, hull.end)) {
      return hull;
    }
    if (!container) return null;
    if (isWellFormedRegion(structure, container.start, container.end)) {
      return { start: container.start, end: container.end };
    }
    container = container.parent;
  }
}

/**
 * Minimal well-formed region of whole units covering a range: the smallest
 * enclosing function when there is one, otherwise whole sibling items.
 */
export function coverRange(structure: FileStructure, range: LineRange): LineRange | null {
  if (structure.lines.length === 0) return null;
  const probe = probeRange(structure, range);
  const fn = smallestUnitContaining(structure, probe, 'function');
  if (fn && isWellFormedRegion(structure, fn.start, fn.end)) {
    return { start: fn.start, end: fn.end };
  }
  return widenToWellFormed(structure, probe);
}
