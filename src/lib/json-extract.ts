/**
 * JSON extraction from LLM output.
 *
 * Handles common output patterns:
 * - Preamble text before JSON
 * - Markdown code fences (```json ... ```)
 * - Several fences (takes the first that parses)
 *
 * The extracted value is unvalidated; callers check it against a schema.
 */

/**
 * Result of an extraction attempt.
 */
export type JsonExtractResult =
  | { success: true; data: unknown; method: 'direct' | 'fence' | 'search' }
  | { success: false; error: string };

function tryParse(text: string): { ok: true; data: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, data: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Extracts a JSON value from text.
 *
 * Strategies, in order:
 * 1. Direct parse of the whole text
 * 2. First code fence whose body parses
 * 3. First balanced `{...}` or `[...]`
 */
export function extractJson(text: string): JsonExtractResult {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return { success: false, error: 'Empty output' };
  }

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return { success: true, data: direct.data, method: 'direct' };
  }

  const fenceRegex = /```(?:json)?\s*\n?([\s\S]*?)\n?```/g;
  let match: RegExpExecArray | null;
  while ((match = fenceRegex.exec(trimmed)) !== null) {
    const content = match[1].trim();
    if (!content) continue;
    const fenced = tryParse(content);
    if (fenced.ok) {
      return { success: true, data: fenced.data, method: 'fence' };
    }
  }

  return extractByBraceSearch(trimmed);
}

/**
 * Finds the first `{` or `[` and its matching close, respecting strings.
 */
function extractByBraceSearch(text: string): JsonExtractResult {
  const objectStart = text.indexOf('{');
  const arrayStart = text.indexOf('[');
  if (objectStart === -1 && arrayStart === -1) {
    return { success: false, error: 'No JSON object or array found' };
  }

  const start = arrayStart === -1 || (objectStart !== -1 && objectStart < arrayStart) ? objectStart : arrayStart;
  const openChar = text[start];
  const closeChar = openChar === '{' ? '}' : ']';

  let depth = 0;
  let inString = false;
  let escapeNext = false;
  let end = -1;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (char === '\\' && inString) {
      escapeNext = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === openChar) {
      depth++;
    } else if (char === closeChar) {
      depth--;
      if (depth === 0) {
        end = i;
        break;
      }
    }
  }

  if (end === -1) {
    return { success: false, error: 'Unbalanced braces in JSON' };
  }

  const parsed = tryParse(text.slice(start, end + 1));
  if (!parsed.ok) {
    return { success: false, error: `Found JSON-like structure but parse failed: ${parsed.error}` };
  }
  return { success: true, data: parsed.data, method: 'search' };
}
