import type { Specification } from '../../types/index.js';
import type { StubWritePermissionError } from '../../utils/errors.js';
import { exists, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { latestSpecification } from '../specification.js';
import {
  generateBinScripts,
  generateLibraryStubs,
  getLauncherPath,
  getLibraryStubPath,
  isStubOwnedBy,
  type StubConfig
} from '../install/stub-installer.js';

export interface StubCleanupResult {
  removed: string[];
  written: string[];
  warnings: StubWritePermissionError[];
}

/**
 * Bring launchers and the library stub in line with what is left installed
 * after `removed` is gone.
 *
 * Only files generated for the same package name are deleted or replaced.
 * Launchers are regenerated for the highest remaining version. A library
 * stub stays while a remaining version declares the same library.
 */
export async function cleanupStubs(
  removed: Specification,
  remaining: readonly Specification[],
  config: StubConfig
): Promise<StubCleanupResult> {
  const result: StubCleanupResult = { removed: [], written: [], warnings: [] };
  const latest = latestSpecification(remaining);

  for (const executable of removed.executables) {
    const launcher = getLauncherPath(config, executable);
    if (!(await isStubOwnedBy(launcher, removed.name))) {
      logger.debug(`Not removing ${launcher}: not a launcher for ${removed.name}`);
      continue;
    }
    if (await remove(launcher)) {
      result.removed.push(launcher);
    }
  }

  if (latest) {
    result.written.push(...await generateBinScripts(latest, config, { onlyOwned: true }));
  }

  if (!removed.autorequire) {
    return result;
  }

  const libraryStub = getLibraryStubPath(config, removed.autorequire);
  if (!(await isStubOwnedBy(libraryStub, removed.name))) {
    return result;
  }
  if (remaining.some(spec => spec.autorequire === removed.autorequire)) {
    logger.debug(`Keeping ${libraryStub}: still provided by another installed version`);
    return result;
  }

  if (await remove(libraryStub)) {
    result.removed.push(libraryStub);
  }

  if (latest?.autorequire && !(await exists(getLibraryStubPath(config, latest.autorequire)))) {
    const stubs = await generateLibraryStubs(latest, config);
    result.written.push(...stubs.written);
    result.warnings.push(...stubs.warnings);
  }

  return result;
}
