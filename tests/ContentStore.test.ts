import test, { describe, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { ContentStore, buildArtifactFilename, formatTimestamp } from '../src/generation/ContentStore.js';
import { makeTempDir, removeDir } from './helpers/fakes.js';

test('formatTimestamp renders local time as YYYYMMDD_HHMMSS', () => {
  assert.equal(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5)), '20240102_030405');
  assert.equal(formatTimestamp(new Date(2023, 11, 31, 23, 59, 58)), '20231231_235958');
});

test('buildArtifactFilename joins stage, timestamp and token', () => {
  const name = buildArtifactFilename('image', 'png', new Date(2024, 5, 7, 8, 9, 10), 'abcd1234');

  assert.equal(name, 'image_20240607_080910_abcd1234.png');
});

describe('ContentStore', () => {
  let dir: string;
  let store: ContentStore;

  beforeEach(() => {
    dir = makeTempDir('content');
    store = new ContentStore({ basePath: path.join(dir, 'outputs') });
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('save writes the bytes under a stage-prefixed name', async () => {
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
    const saved = await store.save('image', 'png', bytes, new Date(2024, 0, 2, 3, 4, 5));

    assert.match(saved.filename, /^image_20240102_030405_[0-9a-f]{8}\.png$/);
    assert.equal(saved.relativePath, path.join(dir, 'outputs', saved.filename));
    assert.equal(saved.absolutePath, path.resolve(saved.relativePath));
    assert.equal(saved.sizeBytes, 4);
    assert.deepEqual(fs.readFileSync(saved.absolutePath), bytes);
  });

  test('two saves in the same second get distinct files', async () => {
    const date = new Date(2024, 0, 2, 3, 4, 5);
    const first = await store.save('model', 'obj', Buffer.from('first'), date);
    const second = await store.save('model', 'obj', Buffer.from('second'), date);

    assert.notEqual(first.relativePath, second.relativePath);
    assert.equal(fs.readFileSync(first.absolutePath, 'utf8'), 'first');
    assert.equal(fs.readFileSync(second.absolutePath, 'utf8'), 'second');
  });

  test('read returns bytes and a mime type', async () => {
    const saved = await store.save('image', 'png', Buffer.from('pixels'));
    const artifact = await store.read(saved.relativePath);

    assert.ok(artifact);
    assert.equal(artifact.bytes.toString('utf8'), 'pixels');
    assert.equal(artifact.mimeType, 'image/png');
    assert.equal(artifact.sizeBytes, 6);
  });

  test('read of a missing file is null', async () => {
    assert.equal(await store.read(path.join(dir, 'outputs', 'gone.png')), null);
  });

  test('exists reflects the file system', async () => {
    const saved = await store.save('image', 'png', Buffer.from('x'));

    assert.equal(await store.exists(saved.relativePath), true);
    fs.unlinkSync(saved.absolutePath);
    assert.equal(await store.exists(saved.relativePath), false);
  });

  test('getStats counts files per extension', async () => {
    await store.save('image', 'png', Buffer.from('abc'));
    await store.save('image', 'png', Buffer.from('de'));
    await store.save('model', 'obj', Buffer.from('f'));

    assert.deepEqual(await store.getStats(), {
      totalFiles: 3,
      totalSizeBytes: 6,
      filesPerExtension: { png: 2, obj: 1 }
    });
  });

  test('getStats on a directory that does not exist yet is empty', async () => {
    assert.deepEqual(await store.getStats(), {
      totalFiles: 0,
      totalSizeBytes: 0,
      filesPerExtension: {}
    });
  });
});
