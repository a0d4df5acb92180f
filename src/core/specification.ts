import { join } from 'path';
import * as yaml from 'js-yaml';

import type { PackageDependency, Specification } from '../types/index.js';
import { DEFAULT_REQUIRE_PATHS, FILE_PATTERNS } from '../constants/index.js';
import { InvalidPackageError, ValidationError } from '../utils/errors.js';
import { readTextFile, writeTextFile } from '../utils/fs.js';
import { validatePackageName } from '../utils/package-name.js';
import { isContainedRelativePath } from '../utils/path-resolution.js';
import { compareVersions, normalizeVersion, validateRequirement, validateVersion } from '../utils/validation/version.js';

const DESCRIPTOR_HEADER = '# This file is managed by packstead. Do not edit manually.\n\n';

/**
 * The `name-version` identifier of a package; unique within one install directory.
 */
export function getFullName(spec: Pick<Specification, 'name' | 'version'>): string {
  return `${spec.name}-${spec.version}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptionalString(raw: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidPackageError(`'${key}' must be a string in ${source}`, { source, key });
  }
  return value;
}

function readStringArray(raw: Record<string, unknown>, key: string, source: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidPackageError(`'${key}' must be a list of strings in ${source}`, { source, key });
  }
  return value;
}

function readRelativePaths(raw: Record<string, unknown>, key: string, source: string): string[] | undefined {
  const paths = readStringArray(raw, key, source);
  const escaping = paths?.find(p => !isContainedRelativePath(p));
  if (escaping !== undefined) {
    throw new InvalidPackageError(`'${key}' entry '${escaping}' must be a relative path inside the package`, { source, key });
  }
  return paths;
}

function readDependencies(raw: Record<string, unknown>, source: string): PackageDependency[] {
  const value = raw.dependencies;
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InvalidPackageError(`'dependencies' must be a list in ${source}`, { source });
  }

  return value.map((entry: unknown): PackageDependency => {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      throw new InvalidPackageError(`every dependency needs a name in ${source}`, { source });
    }
    const name = entry.name;
    const requirement = entry.requirement === undefined ? '*' : entry.requirement;
    if (typeof requirement !== 'string') {
      throw new InvalidPackageError(`dependency '${name}' has a non-string requirement in ${source}`, { source });
    }
    const requirementError = validateRequirement(requirement, name);
    if (requirementError) {
      throw new InvalidPackageError(requirementError.message, { source });
    }
    return { name, requirement };
  });
}

/**
 * Validate a parsed specification document and fill in defaults.
 *
 * @param raw - Parsed YAML value
 * @param source - File the value came from, for error messages
 */
export function normalizeSpecification(raw: unknown, source: string): Specification {
  if (!isRecord(raw)) {
    throw new InvalidPackageError(`specification in ${source} is not a mapping`, { source });
  }

  const name = raw.name;
  if (typeof name !== 'string') {
    throw new InvalidPackageError(`specification in ${source} must contain a name field`, { source });
  }
  try {
    validatePackageName(name);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new InvalidPackageError(error.message, { source });
    }
    throw error;
  }

  const versionError = validateVersion(raw.version, name);
  const version = typeof raw.version === 'string' ? normalizeVersion(raw.version) : null;
  if (versionError || version === null) {
    throw new InvalidPackageError(versionError?.message ?? `version of ${name} must be a string`, { source });
  }

  const autorequire = readOptionalString(raw, 'autorequire', source);
  if (autorequire !== undefined) {
    try {
      validatePackageName(autorequire, 'Library name');
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new InvalidPackageError(error.message, { source });
      }
      throw error;
    }
  }

  const requirePaths = readRelativePaths(raw, 'requirePaths', source);

  return {
    name,
    version,
    summary: readOptionalString(raw, 'summary', source),
    dependencies: readDependencies(raw, source),
    executables: readRelativePaths(raw, 'executables', source) ?? [],
    autorequire,
    extensions: readRelativePaths(raw, 'extensions', source) ?? [],
    requirePaths: requirePaths && requirePaths.length > 0 ? requirePaths : [...DEFAULT_REQUIRE_PATHS],
    archiveFileName: readOptionalString(raw, 'archiveFileName', source)
  };
}

/**
 * The persisted subset of a specification, in a stable key order.
 * Back-references (installationPath, loadedFrom) are runtime-only.
 */
export function toSerializableSpecification(spec: Specification): Record<string, unknown> {
  const doc: Record<string, unknown> = {
    name: spec.name,
    version: spec.version
  };
  if (spec.summary !== undefined) doc.summary = spec.summary;
  doc.dependencies = spec.dependencies.map(dep => ({ name: dep.name, requirement: dep.requirement }));
  doc.executables = [...spec.executables];
  if (spec.autorequire !== undefined) doc.autorequire = spec.autorequire;
  doc.extensions = [...spec.extensions];
  doc.requirePaths = [...spec.requirePaths];
  if (spec.archiveFileName !== undefined) doc.archiveFileName = spec.archiveFileName;
  return doc;
}

/**
 * Serialize a specification descriptor with consistent formatting
 */
export function serializeSpecification(spec: Specification): string {
  return DESCRIPTOR_HEADER + yaml.dump(toSerializableSpecification(spec), {
    indent: 2,
    noArrayIndent: true,
    sortKeys: false,
    quotingType: '"'
  });
}

/**
 * Parse descriptor text into a specification
 */
export function parseSpecification(content: string, source: string): Specification {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new InvalidPackageError(`failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`, { source });
  }
  return normalizeSpecification(raw, source);
}

/**
 * Load a persisted descriptor, attaching its back-references.
 */
export async function readSpecificationFile(descriptorPath: string, installDir: string): Promise<Specification> {
  const content = await readTextFile(descriptorPath);
  const spec = parseSpecification(content, descriptorPath);
  return {
    ...spec,
    installationPath: installDir,
    loadedFrom: descriptorPath
  };
}

/**
 * Path of the descriptor for a specification inside a specifications directory
 */
export function getDescriptorPath(specificationsDir: string, spec: Pick<Specification, 'name' | 'version'>): string {
  return join(specificationsDir, `${getFullName(spec)}${FILE_PATTERNS.DESCRIPTOR_EXT}`);
}

/**
 * Write the descriptor for a specification and return its path.
 */
export async function writeSpecificationFile(spec: Specification, specificationsDir: string): Promise<string> {
  const descriptorPath = getDescriptorPath(specificationsDir, spec);
  await writeTextFile(descriptorPath, serializeSpecification(spec));
  return descriptorPath;
}

/**
 * Specifications sorted ascending by version (name first, for mixed lists)
 */
export function sortSpecifications(specs: readonly Specification[]): Specification[] {
  return [...specs].sort((a, b) => a.name.localeCompare(b.name) || compareVersions(a.version, b.version));
}

/**
 * The highest version among specifications, if any
 */
export function latestSpecification(specs: readonly Specification[]): Specification | undefined {
  return specs.reduce<Specification | undefined>(
    (latest, spec) => (latest === undefined || compareVersions(spec.version, latest.version) > 0 ? spec : latest),
    undefined
  );
}

/**
 * Two specifications denote the same installed package
 */
export function isSameSpecification(a: Specification, b: Specification): boolean {
  return a.name === b.name && a.version === b.version;
}
