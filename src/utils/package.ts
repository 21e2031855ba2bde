import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { describeError } from './errors.js';
import { logger } from './logger.js';

const FALLBACK_VERSION = '0.0.0';

/**
 * Version of this CLI, read from the package.json two levels above this module
 * (`src/utils` when run from source, `dist/utils` when built).
 */
export function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug(`Unable to read ${packageJsonPath}: ${describeError(error)}`);
  }
  return FALLBACK_VERSION;
}
