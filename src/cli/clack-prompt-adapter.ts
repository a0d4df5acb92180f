/**
 * Clack Prompt Adapter
 *
 * CLI-specific PromptPort implementation that routes to @clack/prompts
 * for rich interactive terminal prompts.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, PromptChoice } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

function cancelled(): UserCancellationError {
  clack.cancel('Operation cancelled.');
  return new UserCancellationError('Operation cancelled by user');
}

/**
 * Create a Clack-based PromptPort for interactive terminal sessions.
 */
export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false,
      });
      if (clack.isCancel(result)) {
        throw cancelled();
      }
      return result;
    },

    async select<T>(
      message: string,
      choices: Array<PromptChoice<T>>,
      hint?: string
    ): Promise<T> {
      // Clack selects by index; the choice values themselves never reach it
      const result = await clack.select<Array<{ value: number; label: string; hint?: string }>, number>({
        message: hint ? `${message} (${hint})` : message,
        options: choices.map((c, index) => ({
          label: c.title,
          value: index,
          ...(c.description ? { hint: c.description } : {}),
        })),
      });
      if (clack.isCancel(result)) {
        throw cancelled();
      }
      return choices[result].value;
    },
  };
}
