/**
 * Common types and interfaces for the packstead library and CLI
 */

export * from './execution-context.js';

// Package types

export interface PackageDependency {
  name: string;
  /** semver range the installed dependency must satisfy */
  requirement: string;
}

/**
 * Package metadata as carried by an archive and persisted as a descriptor.
 */
export interface Specification {
  name: string;
  version: string;
  summary?: string;
  dependencies: PackageDependency[];

  /** Entry-point files relative to the package directory; launchers are named by basename */
  executables: string[];

  /** Library name that gets a stub in the shared library directory */
  autorequire?: string;

  /** Extension build scripts relative to the package directory */
  extensions: string[];

  /** Require-path prefixes; the first one receives built extensions */
  requirePaths: string[];

  /**
   * Install root this specification lives under.
   * Set once installed or loaded from a descriptor; never serialized.
   */
  installationPath?: string;

  /**
   * Path of the descriptor file this specification was read from or written to.
   * Never serialized.
   */
  loadedFrom?: string;

  /** Basename of the archive copied into the cache for this package */
  archiveFileName?: string;
}

export interface FileEntry {
  relativePath: string;
  mode: number;
  content: Buffer;
}

export interface PackageArchive {
  /** Absolute path of the archive file */
  path: string;
  specification: Specification;
  files: FileEntry[];
}

/**
 * An installed package whose dependency is met by a package being removed.
 */
export interface DependencyEdge {
  dependent: Specification;
  requirement: PackageDependency;
  /** Every installed specification that currently satisfies the requirement */
  satisfiedBy: Specification[];
}

// Configuration types

/**
 * How install-path overrides reach the external build tool.
 * - `arguments`: passed as VAR=value arguments on the build tool command line
 * - `patch`: rewritten into the generated build file
 */
export type InstallPathMode = 'arguments' | 'patch';

export interface PackageConfig {
  installDir: string;
  bindir: string;
  sitelibdir: string;
  /** Interpreter that runs launchers and extension build scripts */
  interpreter: string;
  /** Module the generated stubs load packages through */
  loaderModule: string;
  makeProgram: string;
  installPathMode: InstallPathMode;
}

/**
 * Shape of the optional config.jsonc file. Every key is optional.
 */
export interface PackageConfigFile {
  installDir?: string;
  bindir?: string;
  sitelibdir?: string;
  loaderModule?: string;
  makeProgram?: string;
  installPathMode?: InstallPathMode;
}

// Command option types

export interface InstallOptions {
  force?: boolean;
  installDir?: string;
  /** Write the library stub for `autorequire` (default true) */
  installStub?: boolean;
  /** Arguments forwarded to every extension build script */
  buildArgs?: string[];
}

export interface UninstallOptions {
  installDir?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class PackageError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PackageError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_PACKAGE = 'INVALID_PACKAGE',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  MISSING_DEPENDENCY = 'MISSING_DEPENDENCY',
  EXTRACTION_IO = 'EXTRACTION_IO',
  EXTENSION_BUILD = 'EXTENSION_BUILD',
  STUB_WRITE_PERMISSION = 'STUB_WRITE_PERMISSION',
  DEPENDENT_EXISTS = 'DEPENDENT_EXISTS',
  AMBIGUOUS_SELECTION = 'AMBIGUOUS_SELECTION'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
