import os from 'os';
import path from 'path';

/**
 * Expand leading tilde to the provided home directory.
 * Leaves non-tilde inputs unchanged.
 */
export function expandTildePath(input: string, homeDir: string = os.homedir()): string {
  if (!input.startsWith('~')) {
    return input;
  }

  if (input === '~') {
    return homeDir;
  }

  if (input.startsWith('~/')) {
    return path.join(homeDir, input.slice(2));
  }

  // ~user/project forms are returned as-is
  return input;
}

/**
 * Resolve a user-supplied path (CLI flag, env var, config value) to an absolute path.
 */
export function resolveUserPath(input: string, baseDir: string = process.cwd()): string {
  return path.resolve(baseDir, expandTildePath(input));
}

/**
 * True when a relative path stays inside the directory it is resolved against:
 * not absolute, and no `..` segment climbs out of it.
 */
export function isContainedRelativePath(relativePath: string): boolean {
  if (relativePath.length === 0 || path.isAbsolute(relativePath) || path.win32.isAbsolute(relativePath)) {
    return false;
  }
  const normalized = path.posix.normalize(relativePath.replace(/\\/g, '/'));
  return normalized !== '..' && !normalized.startsWith('../') && normalized !== '.';
}

/**
 * Join a contained relative path onto a root, or return null when it would escape the root.
 */
export function resolveWithin(root: string, relativePath: string): string | null {
  if (!isContainedRelativePath(relativePath)) {
    return null;
  }
  return path.join(root, relativePath);
}

/**
 * Replace a leading home directory with `~`. Other paths are returned unchanged.
 */
export function toTildePath(input: string, homeDir: string = os.homedir()): string {
  if (input === homeDir) {
    return '~';
  }
  if (input.startsWith(homeDir + path.sep)) {
    return path.join('~', input.slice(homeDir.length + 1));
  }
  return input;
}
