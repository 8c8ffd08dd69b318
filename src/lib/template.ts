/**
 * Prompt templates with `{{KEY}}` placeholders.
 */

import { readFile } from 'node:fs/promises';
import { resolveAsset } from './paths.js';

const templateCache = new Map<string, string>();

/**
 * Loads a prompt template (asset-relative unless absolute), cached by path.
 *
 * @throws Error if the template cannot be read
 */
export async function loadTemplate(promptFile: string): Promise<string> {
  const path = resolveAsset(promptFile);
  const cached = templateCache.get(path);
  if (cached !== undefined) return cached;
  try {
    const template = await readFile(path, 'utf-8');
    templateCache.set(path, template);
    return template;
  } catch (error) {
    throw new Error(
      `Failed to read prompt template from ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Replaces every `{{KEY}}` with `values[KEY]`. Unknown placeholders stay.
 */
export function interpolate(template: string, values: Readonly<Record<string, string>>): string {
  let prompt = template;
  for (const [key, value] of Object.entries(values)) {
    // Function replacer: `$` in values is literal
    prompt = prompt.replace(new RegExp(`\\{\\{${key}\\}\\}`, 'g'), () => value);
  }
  return prompt;
}
