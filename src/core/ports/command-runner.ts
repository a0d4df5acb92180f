/**
 * Command Runner Port
 *
 * Boundary for every external process packstead starts: extension build
 * scripts and the build tool. Invocations carry their working directory
 * explicitly; the process-wide working directory is never changed.
 *
 * Implementations:
 *   - childProcessRunner (default): spawns the command with node:child_process
 *   - recording runners in tests
 */

export interface CommandInvocation {
  command: string;
  args: string[];
  /** Absolute directory the command runs in */
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandOutcome {
  /** null when the process could not be started or was killed by a signal */
  exitCode: number | null;
  /** stdout and stderr, interleaved in arrival order */
  output: string;
  /** Set when the process could not be started */
  error?: Error;
}

export interface CommandRunner {
  /**
   * Run a command to completion. Never rejects for a failing command;
   * failures are reported through the outcome.
   */
  run(invocation: CommandInvocation): Promise<CommandOutcome>;
}

/**
 * Render an invocation the way it would be typed in a shell, for logs.
 */
export function formatInvocation(invocation: Pick<CommandInvocation, 'command' | 'args'>): string {
  return [invocation.command, ...invocation.args].join(' ');
}
