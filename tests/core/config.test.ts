import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';

import { resolveConfig, validateConfigFile } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

describe('resolveConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('config');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('falls back to built-in defaults', async () => {
    const config = await resolveConfig({
      configPath: join(root, 'missing.jsonc'),
      env: {},
      platform: 'linux',
      interpreter: '/opt/node'
    });

    const home = join(os.homedir(), '.packstead');
    assert.deepEqual(config, {
      installDir: home,
      bindir: join(home, 'bin'),
      sitelibdir: join(home, 'site_lib'),
      interpreter: '/opt/node',
      loaderModule: 'packstead/loader',
      makeProgram: 'make',
      installPathMode: 'arguments'
    });
  });

  it('uses nmake on Windows when MAKE is unset', async () => {
    const config = await resolveConfig({ configPath: join(root, 'missing.jsonc'), env: {}, platform: 'win32' });
    assert.equal(config.makeProgram, 'nmake');
  });

  it('ranks flag over environment over config file', async () => {
    const configPath = join(root, 'config.jsonc');
    await writeFile(configPath, `{
      // comments and trailing commas are allowed
      "installDir": "${join(root, 'from-file')}",
      "bindir": "${join(root, 'file-bin')}",
      "makeProgram": "gmake",
      "installPathMode": "patch",
    }`);
    const env = { PACKSTEAD_HOME: join(root, 'from-env'), MAKE: 'bsdmake' };

    const flagged = await resolveConfig({ configPath, env, installDir: join(root, 'from-flag') });
    assert.equal(flagged.installDir, join(root, 'from-flag'));
    assert.equal(flagged.bindir, join(root, 'file-bin'));
    assert.equal(flagged.sitelibdir, join(root, 'from-flag', 'site_lib'));
    assert.equal(flagged.makeProgram, 'bsdmake');
    assert.equal(flagged.installPathMode, 'patch');

    const fromEnv = await resolveConfig({ configPath, env });
    assert.equal(fromEnv.installDir, join(root, 'from-env'));

    const fromFile = await resolveConfig({ configPath, env: {} });
    assert.equal(fromFile.installDir, join(root, 'from-file'));
    assert.equal(fromFile.makeProgram, 'gmake');
  });

  it('rejects a malformed config file', async () => {
    const configPath = join(root, 'config.jsonc');
    await writeFile(configPath, '{ "installDir": ');
    await assert.rejects(resolveConfig({ configPath, env: {} }), ConfigError);
  });
});

describe('validateConfigFile', () => {
  it('rejects unknown install path modes and empty strings', () => {
    assert.throws(() => validateConfigFile({ installPathMode: 'copy' }, 'cfg'), ConfigError);
    assert.throws(() => validateConfigFile({ bindir: '' }, 'cfg'), ConfigError);
    assert.throws(() => validateConfigFile(['x'], 'cfg'), ConfigError);
  });

  it('keeps only known keys', () => {
    assert.deepEqual(validateConfigFile({ loaderModule: 'my-loader', extra: true }, 'cfg'), { loaderModule: 'my-loader' });
    assert.deepEqual(validateConfigFile(null, 'cfg'), {});
  });
});
