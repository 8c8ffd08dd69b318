/**
 * Prompt budgeting: keeps inlined context files bounded and deterministic.
 */

export interface TruncateResult {
  text: string;
  truncated: boolean;
  originalChars: number;
}

/**
 * Truncates a section to `maxChars`, keeping its head and tail around a
 * fixed marker. Output depends only on the inputs.
 */
export function truncateSection(name: string, value: string, maxChars: number): TruncateResult {
  const limit = Math.max(0, maxChars);
  if (value.length <= limit) {
    return { text: value, truncated: false, originalChars: value.length };
  }

  const marker = `\n\n[TRUNCATED ${name}: ${limit} of ${value.length} chars kept]\n\n`;
  const keep = Math.max(0, limit - marker.length);
  if (keep === 0) {
    return { text: marker.slice(0, limit), truncated: true, originalChars: value.length };
  }

  const headKeep = Math.max(1, Math.floor(keep * 0.7));
  const tailKeep = keep - headKeep;
  return {
    text: value.slice(0, headKeep) + marker + (tailKeep > 0 ? value.slice(value.length - tailKeep) : ''),
    truncated: true,
    originalChars: value.length,
  };
}

/**
 * Renders context files as fenced sections appended to a prompt, sorted by
 * path, each capped at `maxCharsPerFile`.
 */
export function renderContextFiles(files: Readonly<Record<string, string>>, maxCharsPerFile: number): string {
  const paths = Object.keys(files).sort();
  if (paths.length === 0) return '';

  const sections = paths.map((path) => {
    const { text } = truncateSection(path, files[path], maxCharsPerFile);
    return `=== FILE: ${path} ===\n${text}${text.endsWith('\n') ? '' : '\n'}=== END FILE ===`;
  });
  return `\n\n## Context files\n\n${sections.join('\n\n')}\n`;
}
