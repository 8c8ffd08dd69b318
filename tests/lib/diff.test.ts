import { describe, it, expect } from 'vitest';
import { lenPatch, normalizeDiffPath, parseUnifiedDiff, touchedFiles } from '@/lib/diff.js';
import { MalformedDiffError } from '@/types/errors.js';
import { AUTH_DIFF } from '../helpers/mocks.js';

const TWO_FILES = [
  'diff --git a/src/b.c b/src/b.c',
  '--- a/src/b.c',
  '+++ b/src/b.c',
  '@@ -10,2 +10,3 @@',
  ' int x;',
  '+check(x);',
  ' return x;',
  '@@ -40,3 +41,2 @@',
  ' a();',
  '-b();',
  ' c();',
  'diff --git a/src/a.c b/src/a.c',
  'new file mode 100644',
  '--- /dev/null',
  '+++ b/src/a.c',
  '@@ -0,0 +1,2 @@',
  '+int one;',
  '+int two;',
  '',
].join('\n');

describe('parseUnifiedDiff', () => {
  it('trims context from the changed ranges', () => {
    const [hunk] = parseUnifiedDiff(AUTH_DIFF);
    expect(hunk.file_path).toBe('src/auth.js');
    expect(hunk.file_status).toBe('modified');
    expect(hunk.original_line_range).toEqual({ start: 10, end: 10 });
    expect(hunk.modified_line_range).toEqual({ start: 10, end: 14 });
    expect(hunk.original_text).toBe('  const ok = token === expected;');
    expect(hunk.header).toEqual({ old_start: 7, old_count: 7, new_start: 7, new_count: 11 });
  });

  it('orders hunks by file then line', () => {
    const hunks = parseUnifiedDiff(TWO_FILES);
    expect(hunks.map((hunk) => `${hunk.file_path}@${hunk.header.new_start}`)).toEqual([
      'src/a.c@1',
      'src/b.c@10',
      'src/b.c@41',
    ]);
  });

  it('encodes a side without changes as an empty range at the insertion point', () => {
    const hunks = parseUnifiedDiff(TWO_FILES);
    expect(hunks[0].file_status).toBe('added');
    expect(hunks[0].original_line_range).toEqual({ start: 1, end: 0 });
    expect(hunks[1].modified_line_range).toEqual({ start: 11, end: 11 });
    expect(hunks[1].original_line_range).toEqual({ start: 11, end: 10 });
    expect(hunks[2].original_line_range).toEqual({ start: 41, end: 41 });
    expect(hunks[2].modified_line_range).toEqual({ start: 42, end: 41 });
  });

  it('marks deleted files with their old path', () => {
    const diff = ['--- a/src/old.c', '+++ /dev/null', '@@ -1,1 +0,0 @@', '-gone();', ''].join('\n');
    const [hunk] = parseUnifiedDiff(diff);
    expect(hunk.file_path).toBe('src/old.c');
    expect(hunk.file_status).toBe('deleted');
  });

  it('rejects a hunk whose body is longer than its header', () => {
    const diff = ['--- a/x.c', '+++ b/x.c', '@@ -1,1 +1,1 @@', '-a', '+b', '+c', ''].join('\n');
    expect(() => parseUnifiedDiff(diff)).toThrow(MalformedDiffError);
  });

  it('rejects an invalid header with its line number', () => {
    const diff = ['--- a/x.c', '+++ b/x.c', '@@ -1 +1 @', '-a', '+b', ''].join('\n');
    try {
      parseUnifiedDiff(diff);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedDiffError);
      if (error instanceof MalformedDiffError) {
        expect(error.diffLine).toBe(3);
      }
    }
  });

  it('rejects text without hunks', () => {
    expect(() => parseUnifiedDiff('just some text\n')).toThrow('Diff contains no hunks');
  });

  it('rejects overlapping hunks', () => {
    const diff = [
      '--- a/x.c', '+++ b/x.c',
      '@@ -1,2 +1,2 @@', ' a', '-b', '+B',
      '@@ -2,1 +2,1 @@', '-b', '+B',
      '',
    ].join('\n');
    expect(() => parseUnifiedDiff(diff)).toThrow(/Overlapping hunks/);
  });
});

describe('normalizeDiffPath', () => {
  it('drops prefixes and timestamps', () => {
    expect(normalizeDiffPath('b/src/a.c\t2024-01-01 00:00:00')).toBe('src/a.c');
    expect(normalizeDiffPath('"a/with space.c"')).toBe('with space.c');
    expect(normalizeDiffPath('/dev/null')).toBe('/dev/null');
  });
});

describe('patch utilities', () => {
  it('lists touched files', () => {
    expect(touchedFiles(TWO_FILES)).toEqual(['src/a.c', 'src/b.c']);
  });

  it('counts files and changed lines', () => {
    expect(lenPatch(TWO_FILES)).toEqual({ num_files: 2, num_lines: 4 });
  });
});
