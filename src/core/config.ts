import { join } from 'path';

import type { InstallPathMode, PackageConfig, PackageConfigFile } from '../types/index.js';
import { DEFAULT_LOADER_MODULE, ENV_VARS, FILE_PATTERNS, INSTALL_DIRS } from '../constants/index.js';
import { exists, readJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { resolveUserPath } from '../utils/path-resolution.js';
import { getDefaultInstallDir } from './directory.js';

/**
 * Configuration resolution for packstead.
 *
 * Precedence, highest first: explicit option (CLI flag), environment variable,
 * config file (~/.packstead/config.jsonc), built-in default.
 */

const INSTALL_PATH_MODES: readonly InstallPathMode[] = ['arguments', 'patch'];

const STRING_KEYS = ['installDir', 'bindir', 'sitelibdir', 'loaderModule', 'makeProgram'] as const;

export interface ResolveConfigOptions {
  installDir?: string;
  /** Defaults to ~/.packstead/config.jsonc */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  /** Defaults to the Node.js binary running packstead */
  interpreter?: string;
}

export function getDefaultConfigPath(): string {
  return join(getDefaultInstallDir(), FILE_PATTERNS.CONFIG_JSONC);
}

/**
 * Build tool used for extension builds when neither MAKE nor the config names one
 */
export function getDefaultMakeProgram(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'nmake' : 'make';
}

function isInstallPathMode(value: unknown): value is InstallPathMode {
  return INSTALL_PATH_MODES.some(mode => mode === value);
}

/**
 * Validate the parsed content of a config file
 */
export function validateConfigFile(raw: unknown, source: string): PackageConfigFile {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Configuration in ${source} must be an object`, { source });
  }

  const entries = new Map(Object.entries(raw));
  const config: PackageConfigFile = {};

  for (const key of STRING_KEYS) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`'${key}' in ${source} must be a non-empty string`, { source, key });
    }
    config[key] = value;
  }

  const mode = entries.get('installPathMode');
  if (mode !== undefined) {
    if (!isInstallPathMode(mode)) {
      throw new ConfigError(
        `'installPathMode' in ${source} must be one of: ${INSTALL_PATH_MODES.join(', ')}`,
        { source, value: mode }
      );
    }
    config.installPathMode = mode;
  }

  return config;
}

/**
 * Load the config file, or an empty configuration when it does not exist
 */
export async function loadConfigFile(configPath: string): Promise<PackageConfigFile> {
  if (!(await exists(configPath))) {
    logger.debug(`Config file not found, using defaults: ${configPath}`);
    return {};
  }

  logger.debug(`Loading config from: ${configPath}`);
  let raw: unknown;
  try {
    raw = await readJsoncFile(configPath);
  } catch (error) {
    throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`, { configPath });
  }
  return validateConfigFile(raw, configPath);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

/**
 * Resolve the effective configuration
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<PackageConfig> {
  const env = options.env ?? process.env;
  const fileConfig = await loadConfigFile(options.configPath ?? getDefaultConfigPath());

  const installDir = resolveUserPath(
    nonEmpty(options.installDir) ?? nonEmpty(env[ENV_VARS.HOME]) ?? fileConfig.installDir ?? getDefaultInstallDir()
  );

  const bindir = resolveUserPath(
    nonEmpty(env[ENV_VARS.BINDIR]) ?? fileConfig.bindir ?? join(installDir, INSTALL_DIRS.BIN)
  );
  const sitelibdir = resolveUserPath(
    nonEmpty(env[ENV_VARS.SITELIBDIR]) ?? fileConfig.sitelibdir ?? join(installDir, INSTALL_DIRS.SITE_LIB)
  );

  const config: PackageConfig = {
    installDir,
    bindir,
    sitelibdir,
    interpreter: options.interpreter ?? process.execPath,
    loaderModule: fileConfig.loaderModule ?? DEFAULT_LOADER_MODULE,
    makeProgram: nonEmpty(env[ENV_VARS.MAKE]) ?? fileConfig.makeProgram ?? getDefaultMakeProgram(options.platform),
    installPathMode: fileConfig.installPathMode ?? 'arguments'
  };

  logger.debug('Resolved configuration', config);
  return config;
}
