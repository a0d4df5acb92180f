import { PackageError, ErrorCodes, CommandResult, PackageDependency, Specification } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the install and uninstall pipelines
 */

export class InvalidPackageError extends PackageError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid package: ${reason}`, ErrorCodes.INVALID_PACKAGE, details);
    this.name = 'InvalidPackageError';
  }
}

export class FileSystemError extends PackageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends PackageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends PackageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class MissingDependencyError extends PackageError {
  constructor(packageName: string, dependency: PackageDependency) {
    super(
      `'${packageName}' requires ${dependency.name} (${dependency.requirement}), which is not installed`,
      ErrorCodes.MISSING_DEPENDENCY,
      { packageName, dependency }
    );
    this.name = 'MissingDependencyError';
  }
}

export class ExtractionIOError extends PackageError {
  constructor(relativePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to extract '${relativePath}': ${reason}`, ErrorCodes.EXTRACTION_IO, { relativePath, cause });
    this.name = 'ExtractionIOError';
  }
}

export class ExtensionBuildError extends PackageError {
  public readonly logPath: string;

  constructor(extension: string, logPath: string, reason: string) {
    super(
      `Failed to build native extension '${extension}': ${reason}\n  See ${logPath}`,
      ErrorCodes.EXTENSION_BUILD,
      { extension, logPath }
    );
    this.name = 'ExtensionBuildError';
    this.logPath = logPath;
  }
}

export class StubWritePermissionError extends PackageError {
  public readonly stubPath: string;

  constructor(message: string, stubPath: string) {
    super(message, ErrorCodes.STUB_WRITE_PERMISSION, { stubPath });
    this.name = 'StubWritePermissionError';
    this.stubPath = stubPath;
  }
}

export class DependentExistsError extends PackageError {
  constructor(spec: Specification, dependent: Specification) {
    super(
      `Uninstallation of ${spec.name} version ${spec.version} aborted: ${dependent.name} version ${dependent.version} depends on it`,
      ErrorCodes.DEPENDENT_EXISTS,
      { packageName: spec.name, version: spec.version, dependent: dependent.name }
    );
    this.name = 'DependentExistsError';
  }
}

export class AmbiguousSelectionError extends PackageError {
  constructor(choiceCount: number, received?: string) {
    super(
      `Error: must enter a number [1-${choiceCount}]`,
      ErrorCodes.AMBIGUOUS_SELECTION,
      { choiceCount, received }
    );
    this.name = 'AmbiguousSelectionError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PackageError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
        return;
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
