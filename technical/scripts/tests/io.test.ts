import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import {
  getRunOptions,
  listFiles,
  stableJson,
  stableText,
  toPosixRelative,
  writeJsonFile,
  writeTextFile
} from '../lib/io.js';
import { withTempCwd, writeFixtureFile } from './test_fs.js';

test('getRunOptions reads the --check flag', () => {
  assert.deepEqual(getRunOptions(['node', 'script.ts']), { check: false });
  assert.deepEqual(getRunOptions(['node', 'script.ts', '--check']), { check: true });
});

test('stable serializers end with exactly one newline', () => {
  assert.equal(stableJson({ a: [1] }), '{\n  "a": [\n    1\n  ]\n}\n');
  assert.equal(stableText('line'), 'line\n');
  assert.equal(stableText('line\n'), 'line\n');
});

test('writeTextFile only writes when content changes and never in check mode', async () => {
  await withTempCwd('taxonomy-io-', async (root) => {
    const target = path.join(root, 'out', 'nested', 'file.txt');

    assert.deepEqual(await writeTextFile(target, 'first', { check: true }), { changed: true, wrote: false });
    assert.equal(await fs.pathExists(target), false);

    assert.deepEqual(await writeTextFile(target, 'first', { check: false }), { changed: true, wrote: true });
    assert.equal(await fs.readFile(target, 'utf8'), 'first\n');

    assert.deepEqual(await writeTextFile(target, 'first\n', { check: false }), { changed: false, wrote: false });
    assert.deepEqual(await writeTextFile(target, 'second', { check: true }), { changed: true, wrote: false });
    assert.equal(await fs.readFile(target, 'utf8'), 'first\n');
    assert.equal(toPosixRelative(target), 'out/nested/file.txt');
  });
});

test('writeJsonFile compares the serialized document', async () => {
  await withTempCwd('taxonomy-io-', async (root) => {
    const target = path.join(root, 'artifact.json');

    assert.deepEqual(await writeJsonFile(target, { kind: 'data_use' }, { check: false }), {
      changed: true,
      wrote: true
    });
    assert.deepEqual(await writeJsonFile(target, { kind: 'data_use' }, { check: true }), {
      changed: false,
      wrote: false
    });
    assert.equal(await fs.readFile(target, 'utf8'), '{\n  "kind": "data_use"\n}\n');
  });
});

test('listFiles returns sorted top-level matches and nothing for a missing root', async () => {
  await withTempCwd('taxonomy-io-', async (root) => {
    await writeFixtureFile(root, 'taxonomy/b.yml', 'data_use:');
    await writeFixtureFile(root, 'taxonomy/a.yaml', 'data_use:');
    await writeFixtureFile(root, 'taxonomy/readme.md', '# notes');
    await writeFixtureFile(root, 'taxonomy/custom/c.yml', 'data_use:');

    assert.deepEqual(await listFiles(path.join(root, 'taxonomy'), ['*.yml', '*.yaml']), ['a.yaml', 'b.yml']);
    assert.deepEqual(await listFiles(path.join(root, 'missing'), ['*.yml']), []);
  });
});
