import { basename, join } from 'path';

import type { InstallOptions, PackageConfig, Specification } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from '../ports/output.js';
import type { CommandRunner } from '../ports/command-runner.js';
import { resolveOutput, resolveRunner } from '../ports/resolve.js';
import { yamlArchiveReader } from '../archive/archive-reader.js';
import { InstalledPackageIndex, isDependencySatisfied, type PackageIndex } from '../index/installed-index.js';
import { ensureInstallLayout, getInstallLayout, getPackageDir } from '../directory.js';
import { getFullName, writeSpecificationFile } from '../specification.js';
import { extractFiles } from './file-extraction.js';
import { generateBinScripts, generateLibraryStubs } from './stub-installer.js';
import { buildExtensions, type ExtensionBuildResult } from './extension-builder.js';
import { displayInstallationResults } from './install-reporting.js';
import { MissingDependencyError } from '../../utils/errors.js';
import { copyFile, exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { resolveUserPath } from '../../utils/path-resolution.js';

/**
 * Fail on the first dependency no installed package satisfies.
 */
export async function checkDependencies(spec: Specification, index: PackageIndex): Promise<void> {
  for (const dependency of spec.dependencies) {
    if (!(await isDependencySatisfied(index, dependency))) {
      throw new MissingDependencyError(spec.name, dependency);
    }
  }
}

async function runExtensionBuilds(
  packageDir: string,
  spec: Specification,
  config: PackageConfig,
  buildArgs: string[] | undefined,
  runner: CommandRunner,
  output: OutputPort
): Promise<ExtensionBuildResult[]> {
  if (spec.extensions.length === 0) {
    return [];
  }

  const spinner = output.spinner();
  spinner.start(`Building native extensions for ${getFullName(spec)}`);
  const results = await buildExtensions(packageDir, spec, {
    interpreter: config.interpreter,
    makeProgram: config.makeProgram,
    installPathMode: config.installPathMode,
    buildArgs,
    runner
  });
  const failed = results.filter(r => !r.success).length;
  spinner.stop(failed === 0
    ? `Built ${results.length} native extension${results.length === 1 ? '' : 's'}`
    : `Native extension build finished with ${failed} failure${failed === 1 ? '' : 's'}`);

  for (const result of results) {
    if (result.error) {
      logger.warn(`Extension build failed for ${result.extension}`, { logPath: result.logPath });
      output.error(result.error.message);
    }
  }
  return results;
}

/**
 * Install a package archive into an install root.
 *
 * Order: read archive, dependency preflight (skipped with `force`), layout,
 * extraction, launchers, library stub, extension builds, descriptor, cache.
 * A missing dependency fails before anything is written. Stub and extension
 * problems are reported and the install carries on.
 *
 * @returns the installed specification, with `loadedFrom` pointing at its descriptor
 */
export async function runInstallPipeline(
  archivePath: string,
  options: InstallOptions,
  ctx: ExecutionContext
): Promise<Specification> {
  const output = resolveOutput(ctx);
  const installDir = options.installDir
    ? resolveUserPath(options.installDir, ctx.sourceCwd)
    : ctx.config.installDir;
  const config: PackageConfig = { ...ctx.config, installDir };

  const reader = ctx.archiveReader ?? yamlArchiveReader;
  const archive = await reader.read(resolveUserPath(archivePath, ctx.sourceCwd));
  const spec = archive.specification;
  logger.info(`Installing ${getFullName(spec)} into ${installDir}`);

  if (options.force) {
    logger.debug('Skipping dependency check (--force)');
  } else {
    await checkDependencies(spec, ctx.index ?? new InstalledPackageIndex(installDir));
  }

  const layout = getInstallLayout(installDir);
  const packageDir = getPackageDir(layout, spec);
  await ensureInstallLayout(layout, packageDir);

  const extractedFiles = await extractFiles(packageDir, archive.files);
  const launchers = await generateBinScripts(spec, config);

  const libraryStubs: string[] = [];
  if (options.installStub === false) {
    logger.debug('Library stub disabled for this install');
  } else {
    const stubs = await generateLibraryStubs(spec, config);
    libraryStubs.push(...stubs.written);
    for (const warning of stubs.warnings) {
      output.warn(warning.message);
    }
  }

  const extensionResults = await runExtensionBuilds(
    packageDir, spec, config, options.buildArgs, resolveRunner(ctx), output
  );

  const archiveFileName = basename(archive.path);
  const installed: Specification = { ...spec, archiveFileName, installationPath: layout.root };
  installed.loadedFrom = await writeSpecificationFile(installed, layout.specifications);

  const cachePath = join(layout.cache, archiveFileName);
  let cachedArchive: string | null = null;
  if (await exists(cachePath)) {
    logger.debug(`Archive already cached: ${cachePath}`);
  } else {
    await copyFile(archive.path, cachePath);
    cachedArchive = cachePath;
  }

  displayInstallationResults({
    specification: installed,
    extractedFiles,
    launchers,
    libraryStubs,
    extensionResults,
    cachedArchive
  }, output);

  return installed;
}
