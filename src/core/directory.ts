import * as os from 'os';
import * as path from 'path';

import type { Specification } from '../types/index.js';
import { DIR_PATTERNS, FILE_PATTERNS, INSTALL_DIRS } from '../constants/index.js';
import { ensureDir, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { getDescriptorPath, getFullName } from './specification.js';

/**
 * Directory layout of an install root:
 *
 *   <root>/gems/<name>-<version>/...             extracted package files
 *   <root>/specifications/<name>-<version>.yml   persisted specification
 *   <root>/cache/<archive-filename>              verbatim copy of the archive
 *   <root>/doc/                                  generated documentation
 */
export interface InstallLayout {
  root: string;
  gems: string;
  specifications: string;
  cache: string;
  doc: string;
}

/**
 * Default install root, ~/.packstead (same dotfile convention on every platform)
 */
export function getDefaultInstallDir(): string {
  return path.join(os.homedir(), DIR_PATTERNS.PACKSTEAD);
}

export function getInstallLayout(installDir: string): InstallLayout {
  const root = path.resolve(installDir);
  return {
    root,
    gems: path.join(root, INSTALL_DIRS.GEMS),
    specifications: path.join(root, INSTALL_DIRS.SPECIFICATIONS),
    cache: path.join(root, INSTALL_DIRS.CACHE),
    doc: path.join(root, INSTALL_DIRS.DOC)
  };
}

export function getPackageDir(layout: InstallLayout, spec: Pick<Specification, 'name' | 'version'>): string {
  return path.join(layout.gems, getFullName(spec));
}

export function getSpecificationPath(layout: InstallLayout, spec: Pick<Specification, 'name' | 'version'>): string {
  return getDescriptorPath(layout.specifications, spec);
}

/**
 * Cached archive of an installed package. Descriptors written before the
 * archive name was recorded fall back to `<fullName>.pkg`.
 */
export function getCachedArchivePath(layout: InstallLayout, spec: Specification): string {
  const fileName = spec.archiveFileName ?? `${getFullName(spec)}${FILE_PATTERNS.ARCHIVE_EXT}`;
  return path.join(layout.cache, fileName);
}

export function getDocDir(layout: InstallLayout, spec: Pick<Specification, 'name' | 'version'>): string {
  return path.join(layout.doc, getFullName(spec));
}

/**
 * Create the package directory and whichever of specifications/, cache/ and doc/
 * are missing. Existing directories are left untouched.
 *
 * @returns the directories that were created
 */
export async function ensureInstallLayout(layout: InstallLayout, packageDir: string): Promise<string[]> {
  const created: string[] = [];

  for (const dir of [packageDir, layout.specifications, layout.cache, layout.doc]) {
    if (!(await exists(dir))) {
      await ensureDir(dir);
      created.push(dir);
    }
  }

  logger.debug('Install layout ensured', { root: layout.root, created });
  return created;
}
