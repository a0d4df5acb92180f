#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { setupInstallCommand } from './commands/install.js';
import { setupUninstallCommand } from './commands/uninstall.js';
import { setupListCommand } from './commands/list.js';
import { readGlobalOptions } from './commands/global-options.js';

/**
 * packstead CLI - Main entry point
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('packstead')
    .description('Install and uninstall packages, with launchers, library stubs and native extensions')
    .version(getVersion())
    .option('--plain', 'plain console output and prompts, even on a terminal')
    .option('--verbose', 'log debug details')
    .configureHelp({ sortSubcommands: true });

  setupInstallCommand(program);
  setupUninstallCommand(program);
  setupListCommand(program);

  program.hook('preAction', () => {
    if (readGlobalOptions(program).verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
  });

  return program;
}

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

function isEntryPoint(): boolean {
  if (!process.argv[1]) {
    return false;
  }
  try {
    return realpathSync(process.argv[1]) === realpathSync(fileURLToPath(import.meta.url));
  } catch (error) {
    logger.debug('Could not resolve entry point', error);
    return false;
  }
}

if (isEntryPoint()) {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', { reason });
    console.error('An unexpected error occurred. Run with --verbose for details.');
    process.exit(1);
  });

  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', error);
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
