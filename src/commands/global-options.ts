import type { Command } from 'commander';

import type { OutputMode } from '../types/execution-context.js';

export interface GlobalOptions {
  outputMode?: OutputMode;
  verbose: boolean;
}

/**
 * Program-level flags shared by every command
 */
export function readGlobalOptions(program: Command): GlobalOptions {
  const opts = program.opts<{ plain?: boolean; verbose?: boolean }>();
  return {
    outputMode: opts.plain ? 'plain' : undefined,
    verbose: opts.verbose ?? false
  };
}
