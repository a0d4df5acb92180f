import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';

import {
  getFullName,
  latestSpecification,
  normalizeSpecification,
  parseSpecification,
  readSpecificationFile,
  serializeSpecification,
  sortSpecifications,
  toSerializableSpecification,
  writeSpecificationFile
} from '../../src/core/specification.js';
import { InvalidPackageError } from '../../src/utils/errors.js';
import { makeSpec, makeTempDir, removeTempDir } from '../test-helpers.js';

const hello = makeSpec({
  name: 'hello',
  version: '1.0.0',
  summary: 'Says hi',
  dependencies: [{ name: 'base', requirement: '>=1.0.0' }],
  executables: ['bin/hello'],
  autorequire: 'hello',
  archiveFileName: 'hello-1.0.0.pkg'
});

describe('normalizeSpecification', () => {
  it('fills in defaults', () => {
    const spec = normalizeSpecification({
      name: 'tiny',
      version: '0.1.0',
      dependencies: [{ name: 'base' }]
    }, 'tiny.yml');

    assert.deepEqual(spec, {
      name: 'tiny',
      version: '0.1.0',
      summary: undefined,
      dependencies: [{ name: 'base', requirement: '*' }],
      executables: [],
      autorequire: undefined,
      extensions: [],
      requirePaths: ['lib'],
      archiveFileName: undefined
    });
  });

  it('rejects a specification without a name', () => {
    assert.throws(
      () => normalizeSpecification({ version: '1.0.0' }, 'x.yml'),
      { message: 'Invalid package: specification in x.yml must contain a name field' }
    );
  });

  it('rejects non-semver versions', () => {
    assert.throws(() => normalizeSpecification({ name: 'a', version: '1.0' }, 'a.yml'), InvalidPackageError);
  });

  it('stores versions in canonical form', () => {
    assert.equal(normalizeSpecification({ name: 'a', version: 'v1.0.0' }, 'a.yml').version, '1.0.0');
    assert.equal(normalizeSpecification({ name: 'a', version: ' 1.0.0 ' }, 'a.yml').version, '1.0.0');
  });

  it('rejects paths that leave the package directory', () => {
    assert.throws(
      () => normalizeSpecification({ name: 'a', version: '1.0.0', executables: ['../evil'] }, 'a.yml'),
      { message: "Invalid package: 'executables' entry '../evil' must be a relative path inside the package" }
    );
    assert.throws(
      () => normalizeSpecification({ name: 'a', version: '1.0.0', extensions: ['/abs/extconf.js'] }, 'a.yml'),
      InvalidPackageError
    );
  });

  it('rejects library names that are not plain names', () => {
    assert.throws(
      () => normalizeSpecification({ name: 'a', version: '1.0.0', autorequire: 'x/y' }, 'a.yml'),
      InvalidPackageError
    );
  });

  it('rejects malformed dependency requirements', () => {
    assert.throws(
      () => normalizeSpecification({ name: 'a', version: '1.0.0', dependencies: [{ name: 'b', requirement: 'abc' }] }, 'a.yml'),
      InvalidPackageError
    );
  });
});

describe('descriptor serialization', () => {
  it('writes a header and the fields in a stable order', () => {
    const text = serializeSpecification(hello);
    assert.ok(text.startsWith('# This file is managed by packstead. Do not edit manually.\n\nname: hello\nversion: 1.0.0\n'));
    assert.deepEqual(parseSpecification(text, 'hello.yml'), hello);
  });

  it('never persists back-references', () => {
    const doc = toSerializableSpecification({ ...hello, installationPath: '/x', loadedFrom: '/x/specifications/hello-1.0.0.yml' });
    assert.deepEqual(Object.keys(doc), [
      'name', 'version', 'summary', 'dependencies', 'executables',
      'autorequire', 'extensions', 'requirePaths', 'archiveFileName'
    ]);
  });

  it('rejects descriptor text that is not YAML', () => {
    assert.throws(() => parseSpecification('name: [unclosed', 'bad.yml'), InvalidPackageError);
  });
});

describe('descriptor files', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('spec');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('round-trips through the specifications directory with back-references attached', async () => {
    const specsDir = join(root, 'specifications');
    const descriptorPath = await writeSpecificationFile(hello, specsDir);
    assert.equal(descriptorPath, join(specsDir, 'hello-1.0.0.yml'));

    const loaded = await readSpecificationFile(descriptorPath, root);
    assert.deepEqual(loaded, { ...hello, installationPath: root, loadedFrom: descriptorPath });
  });
});

describe('specification ordering', () => {
  const versions = ['1.2.0', '1.10.0', '1.9.9'].map(version => makeSpec({ name: 'hello', version }));

  it('picks the highest version', () => {
    assert.equal(latestSpecification(versions)?.version, '1.10.0');
    assert.equal(latestSpecification([]), undefined);
  });

  it('sorts by name, then version', () => {
    const sorted = sortSpecifications([...versions, makeSpec({ name: 'abc', version: '9.0.0' })]);
    assert.deepEqual(sorted.map(getFullName), ['abc-9.0.0', 'hello-1.2.0', 'hello-1.9.9', 'hello-1.10.0']);
  });
});
