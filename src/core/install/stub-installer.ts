import { basename, join } from 'path';

import type { PackageConfig, Specification } from '../../types/index.js';
import { FILE_MODES, FILE_PATTERNS } from '../../constants/index.js';
import { StubWritePermissionError } from '../../utils/errors.js';
import { ensureDir, exists, isWritableDirectory, readTextFileIfExists, writeFileWithMode } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { appScriptText, libraryStubText, parseStubOwner } from './stub-generator.js';

export type StubConfig = Pick<PackageConfig, 'bindir' | 'sitelibdir' | 'interpreter' | 'loaderModule'>;

export interface StubGenerationResult {
  written: string[];
  /** Non-fatal: the stub was not written */
  warnings: StubWritePermissionError[];
}

export interface BinScriptOptions {
  /**
   * Leave existing files alone unless they are launchers generated for the
   * same package. Used when regenerating launchers after an uninstall.
   */
  onlyOwned?: boolean;
}

export function getLauncherPath(config: Pick<PackageConfig, 'bindir'>, executable: string): string {
  return join(config.bindir, basename(executable));
}

export function getLibraryStubPath(config: Pick<PackageConfig, 'sitelibdir'>, library: string): string {
  return join(config.sitelibdir, `${library}${FILE_PATTERNS.LIBRARY_STUB_EXT}`);
}

/**
 * Whether a file is a stub generated for the named package
 */
export async function isStubOwnedBy(path: string, packageName: string): Promise<boolean> {
  const text = await readTextFileIfExists(path);
  return text !== null && parseStubOwner(text)?.name === packageName;
}

/**
 * Write one executable launcher per declared executable into the bindir.
 */
export async function generateBinScripts(
  spec: Specification,
  config: StubConfig,
  options: BinScriptOptions = {}
): Promise<string[]> {
  if (spec.executables.length === 0) {
    return [];
  }

  await ensureDir(config.bindir);
  const written: string[] = [];

  for (const executable of spec.executables) {
    const target = getLauncherPath(config, executable);
    if (options.onlyOwned && (await exists(target)) && !(await isStubOwnedBy(target, spec.name))) {
      logger.debug(`Leaving foreign file in place: ${target}`);
      continue;
    }
    await writeFileWithMode(
      target,
      appScriptText(spec.name, spec.version, executable, config),
      FILE_MODES.EXECUTABLE
    );
    written.push(target);
  }

  return written;
}

/**
 * Create the shared library directory when missing, then check write access.
 */
async function prepareSiteLibDir(sitelibdir: string): Promise<boolean> {
  if (!(await exists(sitelibdir))) {
    try {
      await ensureDir(sitelibdir);
    } catch (error) {
      logger.debug(`Could not create ${sitelibdir}`, error);
      return false;
    }
  }
  return isWritableDirectory(sitelibdir);
}

/**
 * Write the library stub for the specification's `autorequire` library.
 *
 * An existing file is never overwritten and an unwritable shared library
 * directory is skipped; both come back as warnings.
 */
export async function generateLibraryStubs(spec: Specification, config: StubConfig): Promise<StubGenerationResult> {
  const result: StubGenerationResult = { written: [], warnings: [] };
  if (!spec.autorequire) {
    return result;
  }

  const target = getLibraryStubPath(config, spec.autorequire);

  if (!(await prepareSiteLibDir(config.sitelibdir))) {
    result.warnings.push(new StubWritePermissionError(
      `Can't install library stub for package '${spec.name}' (no write permission on '${config.sitelibdir}').`,
      target
    ));
    return result;
  }

  if (await exists(target)) {
    result.warnings.push(new StubWritePermissionError(
      `Library file '${target}' already exists; not overwriting. ` +
      `If you want to force a library stub, delete the file and reinstall.`,
      target
    ));
    return result;
  }

  await writeFileWithMode(target, libraryStubText(spec.name, config), FILE_MODES.LIBRARY_STUB);
  result.written.push(target);
  return result;
}
