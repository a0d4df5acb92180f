/**
 * Execution Context Module
 *
 * Creates the ExecutionContext commands hand to the install and uninstall
 * pipelines: the resolved configuration plus whatever ports the caller injects.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { resolveConfig, type ResolveConfigOptions } from './config.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * sourceCwd is always process.cwd() (original working directory); ports are
 * left unset so that core/ports/resolve.ts supplies the defaults.
 */
export async function createExecutionContext(
  options: ExecutionOptions = {},
  configOptions: Omit<ResolveConfigOptions, 'installDir'> = {}
): Promise<ExecutionContext> {
  const config = await resolveConfig({ ...configOptions, installDir: options.installDir });

  const context: ExecutionContext = {
    sourceCwd: process.cwd(),
    config,
    interactive: options.interactive
  };

  logger.debug('Created execution context', {
    sourceCwd: context.sourceCwd,
    installDir: config.installDir
  });

  return context;
}
