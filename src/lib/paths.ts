/**
 * Path helpers for configured files.
 *
 * Prompt and schema paths in the config may be:
 * - absolute
 * - relative to the bundled asset dir (e.g. "prompts/describe.txt")
 * - already prefixed with the asset dir name (e.g. "seccurate/prompts/describe.txt")
 */

import { isAbsolute, join, resolve } from 'node:path';
import { ASSET_DIR_NAME, assetRoot } from './branding.js';

/**
 * Resolves a configured asset path.
 */
export function resolveAsset(p: string, root: string = assetRoot()): string {
  if (isAbsolute(p)) return p;
  const normalized = p.replace(/^[.][/]/, '');
  if (normalized === ASSET_DIR_NAME || normalized.startsWith(`${ASSET_DIR_NAME}/`)) {
    return join(root, normalized.slice(ASSET_DIR_NAME.length + 1));
  }
  return join(root, normalized);
}

/**
 * Resolves a dataset path against the directory holding the config file.
 */
export function resolveDataPath(baseDir: string, p: string): string {
  return isAbsolute(p) ? p : resolve(baseDir, p);
}
