/**
 * Execution Context Types
 *
 * Type definitions for the context threaded through the install and
 * uninstall pipelines.
 */

import type { PackageConfig } from './index.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import type { CommandRunner } from '../core/ports/command-runner.js';
import type { ArchiveReader } from '../core/archive/archive-reader.js';
import type { PackageIndex } from '../core/index/installed-index.js';

/**
 * How the CLI renders output and asks questions.
 * - `rich`: @clack/prompts
 * - `plain`: console lines and readline prompts
 */
export type OutputMode = 'rich' | 'plain';

/**
 * ExecutionContext - resolved configuration plus the ports core logic talks through.
 *
 * Every port is optional; `core/ports/resolve.ts` supplies the defaults so the
 * same pipelines can be driven by the CLI, by tests or by another program.
 */
export interface ExecutionContext {
  /**
   * Absolute path to the original working directory.
   * Used for resolving input arguments (e.g., ./foo-1.0.0.pkg).
   */
  sourceCwd: string;

  /** Resolved paths and toolchain settings */
  config: PackageConfig;

  /**
   * Indicates an interactive session (TTY, not CI).
   */
  interactive?: boolean;

  /** Set by the CLI once it has chosen its ports */
  outputMode?: OutputMode;

  /**
   * Output port for all user-facing messages (info, success, error, warn, etc.).
   * When not provided, defaults to consoleOutput.
   */
  output?: OutputPort;

  /**
   * Prompt port for disambiguation and dependent confirmation.
   * When not provided, defaults to nonInteractivePrompt (throws on prompt).
   */
  prompt?: PromptPort;

  /**
   * Runs extension build scripts and the build tool.
   * When not provided, defaults to childProcessRunner.
   */
  runner?: CommandRunner;

  /**
   * Reads package archives. Defaults to the YAML archive reader.
   */
  archiveReader?: ArchiveReader;

  /**
   * Lookup of installed specifications. Defaults to an index over
   * `<installDir>/specifications`.
   */
  index?: PackageIndex;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** --install-dir flag */
  installDir?: string;

  /** Override interactive mode detection */
  interactive?: boolean;
}
