import type { Specification, UninstallOptions } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { PromptChoice } from '../ports/prompt.js';
import { ANY_VERSION } from '../../constants/index.js';
import { resolveOutput, resolvePrompt } from '../ports/resolve.js';
import { InstalledPackageIndex, type PackageIndex } from '../index/installed-index.js';
import {
  getCachedArchivePath,
  getDocDir,
  getInstallLayout,
  getPackageDir,
  getSpecificationPath
} from '../directory.js';
import { getFullName, isSameSpecification } from '../specification.js';
import { confirmDependents } from './dependents.js';
import { cleanupStubs } from './stub-cleanup.js';
import { reportUninstallResult } from './uninstall-reporter.js';
import { AmbiguousSelectionError, ValidationError } from '../../utils/errors.js';
import { remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { resolveUserPath } from '../../utils/path-resolution.js';
import { validateRequirement } from '../../utils/validation/version.js';

export interface UninstallResult {
  /** Versions removed, in removal order */
  removed: Specification[];
}

function resolveInstallDir(options: UninstallOptions, ctx: ExecutionContext): string {
  return options.installDir ? resolveUserPath(options.installDir, ctx.sourceCwd) : ctx.config.installDir;
}

function resolveIndex(installDir: string, ctx: ExecutionContext): PackageIndex {
  return ctx.index ?? new InstalledPackageIndex(installDir);
}

/**
 * Remove one installed version: dependents check, package files, descriptor,
 * cached archive, docs, then stub cleanup.
 *
 * @param list - The candidate versions the caller is working through
 * @returns `list` without `spec`; the argument is not modified
 * @throws DependentExistsError when removal is declined because of dependents
 */
export async function removeInstalledPackage(
  spec: Specification,
  list: readonly Specification[],
  options: UninstallOptions,
  ctx: ExecutionContext
): Promise<Specification[]> {
  const output = resolveOutput(ctx);
  const installDir = spec.installationPath ?? resolveInstallDir(options, ctx);
  const index = resolveIndex(installDir, ctx);

  await confirmDependents(spec, index, resolvePrompt(ctx), output);

  const layout = getInstallLayout(installDir);
  const removedPaths: string[] = [];
  const targets = [
    getPackageDir(layout, spec),
    spec.loadedFrom ?? getSpecificationPath(layout, spec),
    getDocDir(layout, spec)
  ];
  const cachePath = getCachedArchivePath(layout, spec);
  const sharedWith = (await index.list()).find(
    other => !isSameSpecification(other, spec) && getCachedArchivePath(layout, other) === cachePath
  );
  if (sharedWith) {
    logger.debug(`Keeping ${cachePath}, still cached for ${getFullName(sharedWith)}`);
  } else {
    targets.push(cachePath);
  }
  for (const target of targets) {
    if (await remove(target)) {
      removedPaths.push(target);
    }
  }
  logger.info(`Removed ${getFullName(spec)} from ${installDir}`, { removedPaths });

  const remaining = (await index.search(spec.name)).filter(s => !isSameSpecification(s, spec));
  const stubs = await cleanupStubs(spec, remaining, ctx.config);
  removedPaths.push(...stubs.removed);
  for (const warning of stubs.warnings) {
    output.warn(warning.message);
  }

  reportUninstallResult({ specification: spec, removedPaths, regeneratedStubs: stubs.written }, output);

  return list.filter(s => !isSameSpecification(s, spec));
}

async function selectVersions(matches: Specification[], ctx: ExecutionContext): Promise<Specification[] | null> {
  const choices: Array<PromptChoice<number>> = [
    ...matches.map((spec, i) => ({ title: getFullName(spec), value: i })),
    { title: 'All versions', value: matches.length }
  ];

  let selection: number;
  try {
    selection = await resolvePrompt(ctx).select('Select package to uninstall:', choices);
  } catch (error) {
    if (error instanceof AmbiguousSelectionError) {
      resolveOutput(ctx).error(error.message);
      return null;
    }
    throw error;
  }

  if (!Number.isInteger(selection) || selection < 0 || selection > matches.length) {
    resolveOutput(ctx).error(new AmbiguousSelectionError(choices.length, String(selection)).message);
    return null;
  }

  return selection === matches.length ? matches : [matches[selection]];
}

/**
 * Uninstall the installed versions of `name` matching `versionConstraint`.
 *
 * No match is reported and is not an error. Several matches are offered for
 * selection, with an extra choice removing all of them.
 */
export async function runUninstallPipeline(
  name: string,
  versionConstraint: string = ANY_VERSION,
  options: UninstallOptions,
  ctx: ExecutionContext
): Promise<UninstallResult> {
  const requirementError = validateRequirement(versionConstraint, name);
  if (requirementError) {
    throw new ValidationError(requirementError.message, { name, versionConstraint });
  }

  const installDir = resolveInstallDir(options, ctx);
  const matches = await resolveIndex(installDir, ctx).search(name, versionConstraint);

  if (matches.length === 0) {
    resolveOutput(ctx).info(`Unknown package: ${name} (${versionConstraint})`);
    return { removed: [] };
  }

  const selected = matches.length === 1 ? matches : await selectVersions(matches, ctx);
  if (selected === null) {
    return { removed: [] };
  }

  const removed: Specification[] = [];
  let list: Specification[] = matches;
  for (const spec of selected) {
    list = await removeInstalledPackage(spec, list, { ...options, installDir }, ctx);
    removed.push(spec);
  }
  return { removed };
}
