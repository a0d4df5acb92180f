import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';

/**
 * Version of the running packstead, read from its package.json
 * (two levels up from both src/utils and dist/utils).
 */
export function getVersion(): string {
  const manifestPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch (error) {
    logger.debug(`Could not read ${manifestPath}`, error);
  }
  return '0.0.0';
}
