/**
 * Shared constants for packstead.
 * Single source of truth for directory names, file patterns and defaults.
 */

export const DIR_PATTERNS = {
  PACKSTEAD: '.packstead'
} as const;

/**
 * Subdirectories of an install root.
 */
export const INSTALL_DIRS = {
  GEMS: 'gems',
  SPECIFICATIONS: 'specifications',
  CACHE: 'cache',
  DOC: 'doc',
  BIN: 'bin',
  SITE_LIB: 'site_lib'
} as const;

export const FILE_PATTERNS = {
  DESCRIPTOR_EXT: '.yml',
  ARCHIVE_EXT: '.pkg',
  LIBRARY_STUB_EXT: '.js',
  BUILD_FILE: 'Makefile',
  BUILD_LOG: 'packstead_make.out',
  CONFIG_JSONC: 'config.jsonc'
} as const;

export const ENV_VARS = {
  HOME: 'PACKSTEAD_HOME',
  BINDIR: 'PACKSTEAD_BINDIR',
  SITELIBDIR: 'PACKSTEAD_SITELIBDIR',
  MAKE: 'MAKE',
  VERBOSE: 'PACKSTEAD_VERBOSE'
} as const;

/**
 * Variables in the generated build file that control where built extensions land.
 */
export const INSTALL_PATH_VARIABLES = ['PKG_ARCHDIR', 'PKG_LIBDIR'] as const;

export const FILE_MODES = {
  EXECUTABLE: 0o755,
  LIBRARY_STUB: 0o644,
  DEFAULT: 0o644
} as const;

/** Line every generated launcher and library stub carries */
export const GENERATED_MARKER = 'This file was generated by packstead.';

export const DEFAULT_LOADER_MODULE = 'packstead/loader';

/** Matches every installed version */
export const ANY_VERSION = '*';

export const DEFAULT_REQUIRE_PATHS: readonly string[] = ['lib'];
