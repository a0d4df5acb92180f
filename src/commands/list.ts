import { Command } from 'commander';

import type { Specification } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { InstalledPackageIndex } from '../core/index/installed-index.js';
import { formatPackageTable } from '../utils/formatters.js';
import { readGlobalOptions } from './global-options.js';

interface ListCommandOptions {
  installDir?: string;
}

/**
 * Installed specifications whose name starts with `prefix` (all when omitted)
 */
export function filterByNamePrefix(specs: readonly Specification[], prefix?: string): Specification[] {
  return prefix ? specs.filter(spec => spec.name.startsWith(prefix)) : [...specs];
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed packages')
    .argument('[name]', 'only packages whose name starts with this')
    .option('-i, --install-dir <dir>', 'install root (default: $PACKSTEAD_HOME or ~/.packstead)')
    .action(withErrorHandling(async (name: string | undefined, options: ListCommandOptions) => {
      const ctx = await createCliExecutionContext({
        installDir: options.installDir,
        outputMode: readGlobalOptions(program).outputMode
      });
      const index = ctx.index ?? new InstalledPackageIndex(ctx.config.installDir);
      const specs = filterByNamePrefix(await index.list(), name);

      const output = resolveOutput(ctx);
      for (const line of formatPackageTable(specs)) {
        output.message(line);
      }
    }));
}
