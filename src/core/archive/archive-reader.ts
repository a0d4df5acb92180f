import { basename, resolve } from 'path';
import * as yaml from 'js-yaml';

import type { FileEntry, PackageArchive, Specification } from '../../types/index.js';
import { FILE_MODES } from '../../constants/index.js';
import { InvalidPackageError } from '../../utils/errors.js';
import { readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isContainedRelativePath } from '../../utils/path-resolution.js';
import { normalizeSpecification, toSerializableSpecification } from '../specification.js';

/**
 * Archive Reader Port
 *
 * The installer consumes archives only through this interface. The default
 * implementation reads the `.pkg` format: one YAML document holding the
 * specification and the file entries, contents base64-encoded.
 *
 *   specification:
 *     name: hello
 *     version: 1.0.0
 *     ...
 *   files:
 *     - path: lib/hello.js
 *       mode: 420
 *       content: Y29uc29sZS5sb2coJ2hpJyk7Cg==
 */
export interface ArchiveReader {
  read(archivePath: string): Promise<PackageArchive>;
}

const BASE64_REGEX = /^[A-Za-z0-9+/]*={0,2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeFileEntry(raw: unknown, index: number, source: string): FileEntry {
  if (!isRecord(raw) || typeof raw.path !== 'string') {
    throw new InvalidPackageError(`file entry #${index + 1} in ${source} has no path`, { source });
  }
  const relativePath = raw.path;
  if (!isContainedRelativePath(relativePath)) {
    throw new InvalidPackageError(`file entry '${relativePath}' in ${source} escapes the package directory`, { source });
  }

  const mode = raw.mode ?? FILE_MODES.DEFAULT;
  if (typeof mode !== 'number' || !Number.isInteger(mode) || mode < 0 || mode > 0o7777) {
    throw new InvalidPackageError(`file entry '${relativePath}' in ${source} has an invalid mode`, { source });
  }

  const content = raw.content ?? '';
  if (typeof content !== 'string' || !BASE64_REGEX.test(content.replace(/\s+/g, ''))) {
    throw new InvalidPackageError(`file entry '${relativePath}' in ${source} has malformed content`, { source });
  }

  return { relativePath, mode, content: Buffer.from(content, 'base64') };
}

/**
 * Decode archive text into a PackageArchive
 */
export function parseArchive(text: string, archivePath: string): PackageArchive {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new InvalidPackageError(
      `failed to parse ${archivePath}: ${error instanceof Error ? error.message : String(error)}`,
      { source: archivePath }
    );
  }

  if (!isRecord(raw)) {
    throw new InvalidPackageError(`${archivePath} is not a package archive`, { source: archivePath });
  }

  const specification = normalizeSpecification(raw.specification, archivePath);
  const rawFiles = raw.files ?? [];
  if (!Array.isArray(rawFiles)) {
    throw new InvalidPackageError(`'files' must be a list in ${archivePath}`, { source: archivePath });
  }

  const files = rawFiles.map((entry: unknown, index) => decodeFileEntry(entry, index, archivePath));
  const seen = new Set<string>();
  for (const file of files) {
    if (seen.has(file.relativePath)) {
      throw new InvalidPackageError(`duplicate file entry '${file.relativePath}' in ${archivePath}`, { source: archivePath });
    }
    seen.add(file.relativePath);
  }

  return { path: archivePath, specification, files };
}

/**
 * Encode a specification and its files in the `.pkg` format
 */
export function serializeArchive(specification: Specification, files: readonly FileEntry[]): string {
  const doc = {
    specification: toSerializableSpecification(specification),
    files: files.map(file => ({
      path: file.relativePath,
      mode: file.mode,
      content: file.content.toString('base64')
    }))
  };
  return yaml.dump(doc, { indent: 2, noArrayIndent: true, sortKeys: false, lineWidth: -1 });
}

/**
 * Write an archive to disk
 */
export async function writeArchive(
  archivePath: string,
  specification: Specification,
  files: readonly FileEntry[]
): Promise<void> {
  await writeTextFile(archivePath, serializeArchive(specification, files));
  logger.debug(`Wrote archive ${basename(archivePath)} (${files.length} files)`);
}

export const yamlArchiveReader: ArchiveReader = {
  async read(archivePath: string): Promise<PackageArchive> {
    const absolutePath = resolve(archivePath);
    const text = await readTextFile(absolutePath);
    const archive = parseArchive(text, absolutePath);
    logger.debug(`Read archive ${absolutePath}`, {
      name: archive.specification.name,
      version: archive.specification.version,
      files: archive.files.length
    });
    return archive;
  }
};
