/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementations: @clack/prompts for rich
 * interactive sessions, plain console lines otherwise.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import { Spinner } from '../utils/spinner.js';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        },
      };
    },
  };
}

/**
 * Plain OutputPort for non-interactive sessions (CI, piped output): the
 * console adapter with a terminal-aware spinner.
 */
export function createPlainOutput(): OutputPort {
  return {
    ...consoleOutput,
    spinner(): UnifiedSpinner {
      let active: Spinner | null = null;
      return {
        start(message: string) {
          active = new Spinner(message);
          active.start();
        },
        stop(finalMessage?: string) {
          active?.stop();
          if (active && finalMessage) {
            console.log(finalMessage);
          }
          active = null;
        },
        message(text: string) {
          active?.update(text);
        },
      };
    },
  };
}
