/**
 * Console Output Adapter
 *
 * Default OutputPort: one console line per report. Errors and warnings go to
 * stderr with an alert prefix so they stand out in build logs.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

function printNote(content: string, title?: string): void {
  console.log(title ? `\n${title}\n${content}` : `\n${content}`);
}

export const consoleOutput: OutputPort = {
  info: (message) => console.log(message),
  step: (message) => console.log(message),
  message: (message) => console.log(message),
  success: (message) => console.log(message),
  error: (message) => console.error(`ERROR:  ${message}`),
  warn: (message) => console.error(`WARNING:  ${message}`),
  note: printNote,

  spinner(): UnifiedSpinner {
    let current = '';
    return {
      start(message: string) {
        current = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(finalMessage ?? current);
      },
      message(text: string) {
        current = text;
      },
    };
  },
};
