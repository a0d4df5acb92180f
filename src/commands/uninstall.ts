import { Command } from 'commander';

import type { UninstallOptions } from '../types/index.js';
import { ANY_VERSION } from '../constants/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runUninstallPipeline } from '../core/uninstall/uninstall-pipeline.js';
import { readGlobalOptions } from './global-options.js';

export function setupUninstallCommand(program: Command): void {
  program
    .command('uninstall')
    .alias('un')
    .description('Remove an installed package')
    .argument('<name>', 'package name')
    .argument('[version-constraint]', 'semver range selecting the versions to remove', ANY_VERSION)
    .option('-i, --install-dir <dir>', 'install root (default: $PACKSTEAD_HOME or ~/.packstead)')
    .action(withErrorHandling(async (name: string, constraint: string, options: UninstallOptions) => {
      const ctx = await createCliExecutionContext({
        installDir: options.installDir,
        outputMode: readGlobalOptions(program).outputMode
      });
      await runUninstallPipeline(name, constraint, { installDir: options.installDir }, ctx);
    }));
}
