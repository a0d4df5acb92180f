import * as semver from 'semver';

export interface VersionValidationError {
  code: 'MISSING_VERSION' | 'INVALID_VERSION' | 'INVALID_REQUIREMENT';
  message: string;
}

/**
 * Validate version string against semver rules
 * Returns error object if invalid, null if valid
 */
export function validateVersion(version: unknown, context?: string): VersionValidationError | null {
  if (typeof version !== 'string' || version.length === 0) {
    return {
      code: 'MISSING_VERSION',
      message: `Version field is required${context ? ` for ${context}` : ''}`
    };
  }

  if (!semver.valid(version)) {
    return {
      code: 'INVALID_VERSION',
      message: `Invalid version: ${version}. Must be valid semver (e.g., 1.0.0)`
    };
  }

  return null;
}

/**
 * Canonical form of a valid version (`v1.0.0` and ` 1.0.0` become `1.0.0`), or null
 */
export function normalizeVersion(version: string): string | null {
  return semver.valid(version);
}

/**
 * Validate a dependency requirement (a semver range such as ">= 1.2", "~2.0.1" or "*")
 */
export function validateRequirement(requirement: string, context?: string): VersionValidationError | null {
  if (semver.validRange(requirement) === null) {
    return {
      code: 'INVALID_REQUIREMENT',
      message: `Invalid version requirement${context ? ` for ${context}` : ''}: ${requirement}`
    };
  }
  return null;
}

/**
 * Check whether a version satisfies a requirement. Pre-release versions take part.
 */
export function satisfiesRequirement(version: string, requirement: string): boolean {
  return semver.satisfies(version, requirement, { includePrerelease: true });
}

/**
 * Sort comparator: ascending by semantic version
 */
export function compareVersions(a: string, b: string): number {
  return semver.compare(a, b);
}
