import { spawn } from 'child_process';

import type { CommandInvocation, CommandOutcome, CommandRunner } from './command-runner.js';
import { formatInvocation } from './command-runner.js';
import { logger } from '../../utils/logger.js';

/**
 * CommandRunner backed by child_process.spawn.
 *
 * There is no timeout: a hung build blocks the install until the process exits.
 */
export const childProcessRunner: CommandRunner = {
  run(invocation: CommandInvocation): Promise<CommandOutcome> {
    logger.debug(`Running: ${formatInvocation(invocation)}`, { cwd: invocation.cwd });

    return new Promise<CommandOutcome>((resolve) => {
      const chunks: Buffer[] = [];
      let settled = false;

      const settle = (outcome: CommandOutcome): void => {
        if (!settled) {
          settled = true;
          resolve(outcome);
        }
      };

      const child = spawn(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        env: invocation.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe']
      });

      child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

      child.on('error', (error) => {
        logger.debug(`Failed to start ${invocation.command}`, error);
        settle({ exitCode: null, output: Buffer.concat(chunks).toString('utf8'), error });
      });

      child.on('close', (code) => {
        settle({ exitCode: code, output: Buffer.concat(chunks).toString('utf8') });
      });
    });
  }
};
