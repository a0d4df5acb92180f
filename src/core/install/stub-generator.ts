import { GENERATED_MARKER } from '../../constants/index.js';

/**
 * Text of the launcher and library stubs. Pure: callers write the text
 * with the permissions it needs.
 */

export interface StubTextOptions {
  /** Interpreter the launcher shebang points at */
  interpreter: string;
  /** Module exposing activatePackage() */
  loaderModule: string;
}

export interface StubOwner {
  name: string;
  /** Present for launchers, which pin the version they were generated for */
  version?: string;
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function unquote(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

const ACTIVATE_CALL = /activatePackage\('((?:[^'\\]|\\.)*)'(?:,\s*'((?:[^'\\]|\\.)*)')?\)/;

/**
 * Launcher for an executable: activates the exact package version, then loads the file.
 */
export function appScriptText(name: string, version: string, filename: string, options: StubTextOptions): string {
  return `#!${options.interpreter}
//
// ${GENERATED_MARKER}
//
// The application ${quote(name)} is installed as part of a package, and
// this file is here to facilitate running it.
//

require(${quote(options.loaderModule)}).activatePackage(${quote(name)}, ${quote(version)}).load(${quote(filename)});
`;
}

/**
 * Library stub: activates the latest installed version of a package, no version pin.
 */
export function libraryStubText(name: string, options: Pick<StubTextOptions, 'loaderModule'>): string {
  return `//
// ${GENERATED_MARKER}
//
// The library ${quote(name)} is installed as part of a package, and
// this file is here so you can require it easily (i.e.
// without having to know it's a package).
//

require(${quote(options.loaderModule)}).activatePackage(${quote(name)});
`;
}

/**
 * The package a generated stub belongs to, or null for any other file.
 */
export function parseStubOwner(text: string): StubOwner | null {
  if (!text.includes(GENERATED_MARKER)) {
    return null;
  }
  const match = ACTIVATE_CALL.exec(text);
  if (!match) {
    return null;
  }
  const owner: StubOwner = { name: unquote(match[1]) };
  if (match[2] !== undefined) {
    owner.version = unquote(match[2]);
  }
  return owner;
}
