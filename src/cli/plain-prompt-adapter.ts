/**
 * Plain Prompt Adapter
 *
 * PromptPort implementation on Node's readline module: numbered choices,
 * one answer per question. Prompts go to stderr so stdout stays clean for
 * piping.
 */

import { createInterface, type Interface as ReadlineInterface } from 'node:readline';
import type { PromptPort, PromptChoice } from '../core/ports/prompt.js';
import { AmbiguousSelectionError, UserCancellationError } from '../utils/errors.js';

export interface PlainPromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/** Read a single line, handling Ctrl-C / EOF as cancellation. */
function askLine(rl: ReadlineInterface, query: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    rl.question(query, (answer) => {
      resolve(answer);
    });
    rl.once('close', () => {
      reject(new UserCancellationError('Prompt cancelled'));
    });
    rl.once('SIGINT', () => {
      rl.close();
      reject(new UserCancellationError('Prompt cancelled'));
    });
  });
}

export function createPlainPrompt(streams: PlainPromptStreams = {}): PromptPort {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stderr;

  const createRl = (): ReadlineInterface =>
    createInterface({ input, output, terminal: streams.input === undefined });

  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const hint = initial ? '[Yn]' : '[yN]';
      const rl = createRl();
      try {
        const answer = (await askLine(rl, `${message} ${hint} `)).trim().toLowerCase();
        if (answer === '') return initial ?? false;
        return /^y/i.test(answer);
      } finally {
        rl.close();
      }
    },

    /**
     * One attempt only: anything but a number in range throws
     * AmbiguousSelectionError.
     */
    async select<T>(
      message: string,
      choices: Array<PromptChoice<T>>,
      _hint?: string
    ): Promise<T> {
      const rl = createRl();
      try {
        output.write(`${message}\n`);
        choices.forEach((choice, i) => {
          const desc = choice.description ? ` - ${choice.description}` : '';
          output.write(` ${i + 1}. ${choice.title}${desc}\n`);
        });

        const answer = (await askLine(rl, '> ')).trim();
        const num = /^\d+$/.test(answer) ? Number.parseInt(answer, 10) : NaN;
        if (num >= 1 && num <= choices.length) {
          return choices[num - 1].value;
        }
        throw new AmbiguousSelectionError(choices.length, answer);
      } finally {
        rl.close();
      }
    },
  };
}
