import { basename, dirname, join } from 'path';

import type { InstallPathMode, Specification } from '../../types/index.js';
import { FILE_PATTERNS, INSTALL_PATH_VARIABLES } from '../../constants/index.js';
import type { CommandInvocation, CommandOutcome, CommandRunner } from '../ports/command-runner.js';
import { formatInvocation } from '../ports/command-runner.js';
import { ExtensionBuildError, FileSystemError } from '../../utils/errors.js';
import { exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface ExtensionBuildOptions {
  /** Runs the extension build scripts */
  interpreter: string;
  makeProgram: string;
  installPathMode: InstallPathMode;
  /** Forwarded to every build script */
  buildArgs?: readonly string[];
  runner: CommandRunner;
}

export interface ExtensionBuildResult {
  extension: string;
  success: boolean;
  /** Log of every command issued and its output */
  logPath: string;
  error?: ExtensionBuildError;
}

/**
 * Point the install-path variables of a generated build file at `destPath`.
 * Only assignments derived from another variable (`VAR = $(...)`) are rewritten.
 */
export function patchInstallPaths(buildFile: string, destPath: string): string {
  return INSTALL_PATH_VARIABLES.reduce(
    (content, variable) => content.replace(
      new RegExp(`^${variable}\\s*=\\s*\\$.*`, 'gm'),
      () => `${variable} = ${destPath}`
    ),
    buildFile
  );
}

/**
 * Install-path overrides passed on the build tool command line
 */
export function installPathArguments(destPath: string): string[] {
  return INSTALL_PATH_VARIABLES.map(variable => `${variable}=${destPath}`);
}

class BuildLog {
  private readonly lines: string[] = [];

  async run(runner: CommandRunner, invocation: CommandInvocation): Promise<CommandOutcome> {
    this.lines.push(formatInvocation(invocation));
    const outcome = await runner.run(invocation);
    if (outcome.output.length > 0) {
      this.lines.push(outcome.output.replace(/\n$/, ''));
    }
    if (outcome.error) {
      this.lines.push(outcome.error.message);
    }
    return outcome;
  }

  note(line: string): void {
    this.lines.push(line);
  }

  toString(): string {
    return `${this.lines.join('\n')}\n`;
  }
}

function describeFailure(invocation: CommandInvocation, outcome: CommandOutcome): string | null {
  if (outcome.error) {
    return `could not run '${invocation.command}': ${outcome.error.message}`;
  }
  if (outcome.exitCode !== 0) {
    return `'${formatInvocation(invocation)}' exited with ${outcome.exitCode === null ? 'a signal' : `status ${outcome.exitCode}`}`;
  }
  return null;
}

async function buildExtension(
  packageDir: string,
  spec: Specification,
  extension: string,
  options: ExtensionBuildOptions
): Promise<ExtensionBuildResult> {
  const extensionDir = join(packageDir, dirname(extension));
  const destPath = join(packageDir, spec.requirePaths[0]);
  const logPath = join(extensionDir, FILE_PATTERNS.BUILD_LOG);
  const buildFile = join(extensionDir, FILE_PATTERNS.BUILD_FILE);
  const log = new BuildLog();
  let failure: string | null = null;

  const configure: CommandInvocation = {
    command: options.interpreter,
    args: [basename(extension), ...(options.buildArgs ?? [])],
    cwd: extensionDir
  };
  const configured = await log.run(options.runner, configure);

  if (configured.error) {
    failure = describeFailure(configure, configured);
  } else if (!(await exists(buildFile))) {
    failure = `no ${FILE_PATTERNS.BUILD_FILE} was generated`;
  } else {
    let overrides: string[] = [];
    if (options.installPathMode === 'patch') {
      await writeTextFile(buildFile, patchInstallPaths(await readTextFile(buildFile), destPath));
      log.note(`# patched install paths in ${FILE_PATTERNS.BUILD_FILE} -> ${destPath}`);
    } else {
      overrides = installPathArguments(destPath);
    }

    for (const target of [[], ['install']]) {
      const invocation: CommandInvocation = {
        command: options.makeProgram,
        args: [...target, ...overrides],
        cwd: extensionDir
      };
      failure = describeFailure(invocation, await log.run(options.runner, invocation));
      if (failure !== null) {
        break;
      }
    }
  }

  try {
    await writeTextFile(logPath, log.toString());
  } catch (error) {
    if (!(error instanceof FileSystemError)) {
      throw error;
    }
    logger.warn(`Could not write build log ${logPath}`, { error: error.message });
  }

  if (failure !== null) {
    return { extension, success: false, logPath, error: new ExtensionBuildError(extension, logPath, failure) };
  }
  logger.debug(`Built extension ${extension}`, { output: log.toString() });
  return { extension, success: true, logPath };
}

/**
 * Build every native extension a specification declares.
 *
 * Each build script runs in its own directory (passed as the command's cwd;
 * the process working directory is never changed). When it generates a
 * build file, the build tool runs twice: once to build, once to install
 * into `<packageDir>/<first require path>`. A failing extension does not
 * stop the following ones.
 *
 * No-op, and no process spawned, when the specification declares no extensions.
 */
export async function buildExtensions(
  packageDir: string,
  spec: Specification,
  options: ExtensionBuildOptions
): Promise<ExtensionBuildResult[]> {
  const results: ExtensionBuildResult[] = [];
  for (const extension of spec.extensions) {
    results.push(await buildExtension(packageDir, spec, extension, options));
  }
  return results;
}
