/**
 * Line helpers shared by the diff model and the mask engine.
 *
 * Lines keep their terminators so that joining them reproduces the
 * original text byte for byte.
 */

/**
 * Splits text into lines, each keeping its `\n` or `\r\n` terminator.
 * A final line without terminator is kept as is; an empty string yields [].
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines: string[] = [];
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      lines.push(text.slice(start, i + 1));
      start = i + 1;
    }
  }
  if (start < text.length) {
    lines.push(text.slice(start));
  }
  return lines;
}

/**
 * Strips the line terminator.
 */
export function stripEol(line: string): string {
  if (line.endsWith('\r\n')) return line.slice(0, -2);
  if (line.endsWith('\n')) return line.slice(0, -1);
  return line;
}

/**
 * Whether a line has no visible content.
 */
export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}
