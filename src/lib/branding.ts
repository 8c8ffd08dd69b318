import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const CLI_NAME = 'seccurate';
export const PACKAGE_VERSION = '0.1.0';

export const CONFIG_FILE_NAME = 'seccurate.config.json';

/** Directory of bundled prompts and schemas, at the package root */
export const ASSET_DIR_NAME = 'seccurate';

/**
 * Absolute path of the bundled asset directory. Resolves the same from
 * src/lib (tests) and dist/lib (built CLI).
 */
export function assetRoot(): string {
  return join(dirname(fileURLToPath(import.meta.url)), '..', '..', ASSET_DIR_NAME);
}
