import { Command } from 'commander';

import type { InstallOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runInstallPipeline } from '../core/install/install-pipeline.js';
import { readGlobalOptions } from './global-options.js';

interface InstallCommandOptions {
  force?: boolean;
  installDir?: string;
  /** false with --no-stub */
  stub: boolean;
}

/**
 * Map parsed command-line flags onto pipeline options
 */
export function toInstallOptions(options: InstallCommandOptions, buildArgs: string[]): InstallOptions {
  return {
    force: options.force ?? false,
    installDir: options.installDir,
    installStub: options.stub,
    buildArgs
  };
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Install a package archive. Arguments after -- go to native extension build scripts.')
    .argument('<archive>', 'path to a .pkg archive')
    .argument('[build-args...]', 'arguments for extension build scripts (after --)')
    .option('-f, --force', 'install even if dependencies are not installed')
    .option('-i, --install-dir <dir>', 'install root (default: $PACKSTEAD_HOME or ~/.packstead)')
    .option('--no-stub', 'do not write a library stub into the shared library directory')
    .action(withErrorHandling(async (archive: string, buildArgs: string[], options: InstallCommandOptions) => {
      const ctx = await createCliExecutionContext({
        installDir: options.installDir,
        outputMode: readGlobalOptions(program).outputMode
      });
      await runInstallPipeline(archive, toInstallOptions(options, buildArgs), ctx);
    }));
}
