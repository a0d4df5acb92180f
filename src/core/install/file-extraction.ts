import { dirname } from 'path';

import type { FileEntry } from '../../types/index.js';
import { ExtractionIOError } from '../../utils/errors.js';
import { ensureDir, writeFileWithMode } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { resolveWithin } from '../../utils/path-resolution.js';

/**
 * Write every archive entry under the package directory, creating parent
 * directories as needed and applying each entry's declared mode.
 *
 * Paths are resolved against `packageDir` explicitly; the process working
 * directory is never changed, so a failure part-way leaves it as it was.
 *
 * @returns absolute paths of the files written, in archive order
 * @throws ExtractionIOError on the first entry that cannot be written
 */
export async function extractFiles(packageDir: string, files: readonly FileEntry[]): Promise<string[]> {
  const written: string[] = [];

  for (const entry of files) {
    const target = resolveWithin(packageDir, entry.relativePath);
    if (target === null) {
      throw new ExtractionIOError(entry.relativePath, new Error('path escapes the package directory'));
    }

    try {
      await ensureDir(dirname(target));
      await writeFileWithMode(target, entry.content, entry.mode);
    } catch (error) {
      throw new ExtractionIOError(entry.relativePath, error);
    }

    written.push(target);
  }

  logger.debug(`Extracted ${written.length} files into ${packageDir}`);
  return written;
}
