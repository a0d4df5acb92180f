import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  generateBinScripts,
  generateLibraryStubs,
  isStubOwnedBy
} from '../../../src/core/install/stub-installer.js';
import { appScriptText, libraryStubText } from '../../../src/core/install/stub-generator.js';
import { exists } from '../../../src/utils/fs.js';
import type { PackageConfig } from '../../../src/types/index.js';
import { makeConfig, makeSpec, makeTempDir, removeTempDir } from '../../test-helpers.js';

describe('generateBinScripts', () => {
  let root: string;
  let config: PackageConfig;

  beforeEach(async () => {
    root = await makeTempDir('bin');
    config = makeConfig(root);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('writes one executable launcher per executable, named by basename', async () => {
    const spec = makeSpec({ name: 'hello', version: '1.0.0', executables: ['bin/hello', 'tools/hello-admin'] });
    const written = await generateBinScripts(spec, config);

    assert.deepEqual(written, [join(root, 'bin', 'hello'), join(root, 'bin', 'hello-admin')]);
    assert.equal(await readFile(written[0], 'utf8'), appScriptText('hello', '1.0.0', 'bin/hello', config));
    assert.equal((await stat(written[1])).mode & 0o777, 0o755);
    assert.equal(await isStubOwnedBy(written[1], 'hello'), true);
    assert.equal(await isStubOwnedBy(written[1], 'other'), false);
  });

  it('does nothing without executables', async () => {
    assert.deepEqual(await generateBinScripts(makeSpec({ name: 'quiet', version: '1.0.0' }), config), []);
    assert.equal(await exists(config.bindir), false);
  });

  it('leaves foreign files alone when only owned launchers may be replaced', async () => {
    await mkdir(config.bindir, { recursive: true });
    await writeFile(join(config.bindir, 'hello'), '#!/bin/sh\necho mine\n');
    await writeFile(join(config.bindir, 'helper'), appScriptText('hello', '0.9.0', 'bin/helper', config));

    const spec = makeSpec({ name: 'hello', version: '1.0.0', executables: ['bin/hello', 'bin/helper'] });
    const written = await generateBinScripts(spec, config, { onlyOwned: true });

    assert.deepEqual(written, [join(config.bindir, 'helper')]);
    assert.equal(await readFile(join(config.bindir, 'hello'), 'utf8'), '#!/bin/sh\necho mine\n');
    assert.equal(await readFile(join(config.bindir, 'helper'), 'utf8'), appScriptText('hello', '1.0.0', 'bin/helper', config));
  });
});

describe('generateLibraryStubs', () => {
  let root: string;
  let config: PackageConfig;
  const spec = makeSpec({ name: 'hello', version: '1.0.0', autorequire: 'greeting' });

  beforeEach(async () => {
    root = await makeTempDir('sitelib');
    config = makeConfig(root);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('creates the shared library directory and writes the stub', async () => {
    const result = await generateLibraryStubs(spec, config);
    const target = join(root, 'site_lib', 'greeting.js');

    assert.deepEqual(result, { written: [target], warnings: [] });
    assert.equal(await readFile(target, 'utf8'), libraryStubText('hello', config));
    assert.equal((await stat(target)).mode & 0o777, 0o644);
  });

  it('never overwrites an existing library file', async () => {
    const target = join(root, 'site_lib', 'greeting.js');
    await mkdir(config.sitelibdir, { recursive: true });
    await writeFile(target, 'module.exports = 42;\n');

    const result = await generateLibraryStubs(spec, config);
    assert.deepEqual(result.written, []);
    assert.equal(result.warnings.length, 1);
    assert.equal(
      result.warnings[0].message,
      `Library file '${target}' already exists; not overwriting. If you want to force a library stub, delete the file and reinstall.`
    );
    assert.equal(await readFile(target, 'utf8'), 'module.exports = 42;\n');
  });

  it('skips with a warning when the shared library directory is not writable', async () => {
    // a regular file cannot hold stubs
    await writeFile(config.sitelibdir, '');
    const result = await generateLibraryStubs(spec, config);

    assert.deepEqual(result.written, []);
    assert.equal(
      result.warnings[0].message,
      `Can't install library stub for package 'hello' (no write permission on '${config.sitelibdir}').`
    );
    assert.equal(result.warnings[0].code, 'STUB_WRITE_PERMISSION');
  });

  it('does nothing without autorequire', async () => {
    const result = await generateLibraryStubs(makeSpec({ name: 'plain', version: '1.0.0' }), config);
    assert.deepEqual(result, { written: [], warnings: [] });
  });
});
