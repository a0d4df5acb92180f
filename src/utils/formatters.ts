import { relative, isAbsolute } from 'path';
import { toTildePath } from './path-resolution.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Uses tilde notation (~) for paths under the home directory
 * - Uses relative paths from cwd for paths below it
 * - Falls back to the absolute path otherwise
 *
 * @example
 * formatPathForDisplay('/home/user/.packstead/bin/hello') // => '~/.packstead/bin/hello'
 * formatPathForDisplay('/work/out/file.txt', '/work') // => 'out/file.txt'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (path.startsWith('~') || !isAbsolute(path)) {
    return path;
  }

  const tildePath = toTildePath(path);
  if (tildePath.startsWith('~')) {
    return tildePath;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return path;
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Render items as tree lines under a heading
 */
export function formatTreeList(items: readonly string[], indent: string = '  '): string[] {
  return items.map((item, i) => `${indent}${getTreeConnector(i === items.length - 1)}${item}`);
}

/**
 * Format a count with its noun, pluralized
 */
export function formatFileCount(count: number, type: string = 'files'): string {
  return `${count} ${count === 1 ? type.replace(/s$/, '') : type}`;
}

export interface PackageTableEntry {
  name: string;
  version: string;
  summary?: string;
}

/**
 * Render installed packages as aligned `NAME  VERSION  SUMMARY` rows
 */
export function formatPackageTable(packages: readonly PackageTableEntry[]): string[] {
  if (packages.length === 0) {
    return ['No packages installed.'];
  }

  const nameWidth = Math.max('NAME'.length, ...packages.map(p => p.name.length));
  const versionWidth = Math.max('VERSION'.length, ...packages.map(p => p.version.length));
  const row = (name: string, version: string, summary: string): string =>
    `${name.padEnd(nameWidth)}  ${version.padEnd(versionWidth)}  ${summary}`.trimEnd();

  return [
    row('NAME', 'VERSION', 'SUMMARY'),
    row('-'.repeat(nameWidth), '-'.repeat(versionWidth), '-------'),
    ...packages.map(p => row(p.name, p.version, p.summary ?? '')),
    '',
    `Total: ${packages.length} ${packages.length === 1 ? 'package' : 'packages'}`
  ];
}
