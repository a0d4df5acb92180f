/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations.
 * Command handlers use this instead of createExecutionContext() so that the
 * output and prompt ports match the terminal they run in.
 */

import type { ExecutionContext, ExecutionOptions, OutputMode } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';
import { createPlainPrompt } from './plain-prompt-adapter.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Defaults to `rich` in an interactive session, `plain` otherwise */
  outputMode?: OutputMode;
}

let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;
let cachedPlainPrompt: PromptPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdin.isTTY === true && process.env.CI !== 'true';
}

function applyOutputMode(ctx: ExecutionContext, mode: OutputMode, interactive: boolean): void {
  ctx.outputMode = mode;

  if (mode === 'rich') {
    ctx.output = cachedClackOutput ??= createClackOutput();
    ctx.prompt = interactive ? (cachedClackPrompt ??= createClackPrompt()) : nonInteractivePrompt;
  } else {
    ctx.output = cachedPlainOutput ??= createPlainOutput();
    ctx.prompt = interactive ? (cachedPlainPrompt ??= createPlainPrompt()) : nonInteractivePrompt;
  }
}

/**
 * Create an ExecutionContext with CLI-specific ports injected.
 *
 * Without a TTY (or under CI) prompts throw, so an ambiguous uninstall fails
 * instead of waiting for input.
 */
export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const interactive = detectInteractive(options.interactive);
  const ctx = await createExecutionContext({ ...options, interactive });
  applyOutputMode(ctx, options.outputMode ?? (interactive ? 'rich' : 'plain'), interactive);
  return ctx;
}
