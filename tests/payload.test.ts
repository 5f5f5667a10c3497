import test from 'node:test';
import assert from 'node:assert/strict';

import { decodeBase64Strict, decodeResultPayload, isEmptyResult } from '../src/generation/payload.js';

test('decodeBase64Strict decodes well-formed base64', () => {
  assert.equal(decodeBase64Strict('aGVsbG8=')?.toString('utf8'), 'hello');
});

test('decodeBase64Strict ignores a data URL prefix and line breaks', () => {
  assert.equal(decodeBase64Strict('data:image/png;base64,aGVs\nbG8=')?.toString('utf8'), 'hello');
});

test('decodeBase64Strict rejects malformed input', () => {
  assert.equal(decodeBase64Strict('not base64!'), null);
  assert.equal(decodeBase64Strict('abc'), null);
  assert.equal(decodeBase64Strict('ab=c'), null);
  assert.equal(decodeBase64Strict(''), null);
});

test('decodeResultPayload decodes base64 text to the original bytes', () => {
  const bytes = Buffer.from([0, 1, 2, 250, 255]);

  assert.deepEqual(decodeResultPayload(bytes.toString('base64')), bytes);
});

test('decodeResultPayload keeps non-base64 text as UTF-8', () => {
  const text = '# obj file\nv 0.0 1.0 2.0';

  assert.equal(decodeResultPayload(text).toString('utf8'), text);
});

test('decodeResultPayload passes binary values through', () => {
  const buffer = Buffer.from('raw');
  assert.equal(decodeResultPayload(buffer), buffer);

  const view = new Uint8Array([7, 8, 9]);
  assert.deepEqual(decodeResultPayload(view), Buffer.from([7, 8, 9]));

  assert.deepEqual(decodeResultPayload(new Uint8Array([4, 5]).buffer), Buffer.from([4, 5]));
});

test('decodeResultPayload serializes structured values as JSON', () => {
  assert.equal(decodeResultPayload({ vertices: 8 }).toString('utf8'), '{"vertices":8}');
});

test('isEmptyResult recognises values that carry no data', () => {
  for (const value of [undefined, null, false, '', 0, [], {}, Buffer.alloc(0)]) {
    assert.equal(isEmptyResult(value), true, `expected ${String(value)} to be empty`);
  }
  for (const value of ['x', 1, [0], { a: 1 }, Buffer.from('a'), true]) {
    assert.equal(isEmptyResult(value), false, `expected ${String(value)} to carry data`);
  }
});
