/**
 * Port Resolution Helpers
 *
 * Utilities for resolving ports from an ExecutionContext,
 * falling back to safe defaults when ports are not explicitly provided.
 */

import type { OutputPort } from './output.js';
import type { PromptPort } from './prompt.js';
import type { CommandRunner } from './command-runner.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './console-prompt.js';
import { childProcessRunner } from './child-process-runner.js';

/**
 * Resolve the OutputPort from an ExecutionContext.
 * Falls back to consoleOutput if not provided.
 */
export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}

/**
 * Resolve the PromptPort from an ExecutionContext.
 * Falls back to nonInteractivePrompt (throws on any prompt) if not provided.
 */
export function resolvePrompt(ctx?: { prompt?: PromptPort }): PromptPort {
  return ctx?.prompt ?? nonInteractivePrompt;
}

/**
 * Resolve the CommandRunner from an ExecutionContext.
 * Falls back to childProcessRunner (spawns real processes) if not provided.
 */
export function resolveRunner(ctx?: { runner?: CommandRunner }): CommandRunner {
  return ctx?.runner ?? childProcessRunner;
}
