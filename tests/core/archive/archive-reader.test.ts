import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { parseArchive, serializeArchive, yamlArchiveReader } from '../../../src/core/archive/archive-reader.js';
import { InvalidPackageError } from '../../../src/utils/errors.js';
import { fileEntry, makeSpec, makeTempDir, removeTempDir, writeTestArchive } from '../../test-helpers.js';

const spec = makeSpec({ name: 'hello', version: '1.0.0', executables: ['bin/hello'] });

function archiveText(files: unknown): string {
  return `specification:\n  name: hello\n  version: 1.0.0\nfiles: ${JSON.stringify(files)}\n`;
}

describe('parseArchive', () => {
  it('decodes entries written by serializeArchive', () => {
    const files = [fileEntry('bin/hello', '#!/bin/sh\necho hi\n', 0o755), fileEntry('lib/hello.js', 'exports.hi = 1;\n')];
    const archive = parseArchive(serializeArchive(spec, files), '/tmp/hello-1.0.0.pkg');

    assert.equal(archive.path, '/tmp/hello-1.0.0.pkg');
    assert.equal(archive.specification.name, 'hello');
    assert.deepEqual(archive.specification.executables, ['bin/hello']);
    assert.deepEqual(archive.files.map(f => [f.relativePath, f.mode, f.content.toString('utf8')]), [
      ['bin/hello', 0o755, '#!/bin/sh\necho hi\n'],
      ['lib/hello.js', 0o644, 'exports.hi = 1;\n']
    ]);
  });

  it('defaults the mode and content of an entry', () => {
    const archive = parseArchive(archiveText([{ path: 'README' }]), 'a.pkg');
    assert.equal(archive.files[0].mode, 0o644);
    assert.equal(archive.files[0].content.length, 0);
  });

  it('rejects entries escaping the package directory', () => {
    assert.throws(
      () => parseArchive(archiveText([{ path: '../../etc/profile', content: '' }]), 'a.pkg'),
      { message: "Invalid package: file entry '../../etc/profile' in a.pkg escapes the package directory" }
    );
  });

  it('rejects duplicate entries, bad modes and malformed content', () => {
    assert.throws(() => parseArchive(archiveText([{ path: 'a' }, { path: 'a' }]), 'a.pkg'), InvalidPackageError);
    assert.throws(() => parseArchive(archiveText([{ path: 'a', mode: 70000 }]), 'a.pkg'), InvalidPackageError);
    assert.throws(() => parseArchive(archiveText([{ path: 'a', content: '@@@' }]), 'a.pkg'), InvalidPackageError);
  });

  it('rejects documents that are not archives', () => {
    assert.throws(() => parseArchive('just a string', 'a.pkg'), { message: 'Invalid package: a.pkg is not a package archive' });
    assert.throws(() => parseArchive('files: []\n', 'a.pkg'), InvalidPackageError);
  });
});

describe('yamlArchiveReader', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('archive');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('reads an archive from disk', async () => {
    const archivePath = await writeTestArchive(root, spec, [fileEntry('bin/hello', 'hi', 0o755)]);
    const archive = await yamlArchiveReader.read(archivePath);
    assert.equal(archive.path, archivePath);
    assert.equal(archive.files.length, 1);
  });

  it('fails on a file that is not YAML', async () => {
    const archivePath = join(root, 'broken.pkg');
    await writeFile(archivePath, 'specification: [');
    await assert.rejects(yamlArchiveReader.read(archivePath), InvalidPackageError);
  });
});
