import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  chunkId,
  collectionName,
  computeFingerprint,
  normalizeToProjectPath,
  validatePathSafety
} from '../indexer/fingerprint.js';

test('fingerprint depends only on the text', async () => {
  const first = await computeFingerprint('def a():\n    return 1\n');
  const again = await computeFingerprint(Buffer.from('def a():\n    return 1\n', 'utf8'));
  const edited = await computeFingerprint('def a():\n    return 2\n');

  assert.equal(first, again);
  assert.notEqual(first, edited);
  assert.match(first, /^[0-9a-f]{16}$/);
});

test('chunk ids are a path digest plus the ordinal', () => {
  assert.equal(chunkId('src/a.py', 0), 'a3d7bfbdc581_0');
  assert.equal(chunkId('src/a.py', 7), 'a3d7bfbdc581_7');
  assert.notEqual(chunkId('src/b.py', 0), chunkId('src/a.py', 0));
});

test('collection names join the directory name and a digest of the path', () => {
  assert.equal(collectionName('/tmp/my project'), 'my_project_935e3ce8f951');
  assert.equal(collectionName('/tmp/my project/'), 'my_project_935e3ce8f951');
});

test('paths are normalized against the project root', async (t) => {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'codesift-paths-')));
  const outside = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'codesift-outside-')));
  t.after(() => {
    fs.rmSync(root, { recursive: true, force: true });
    fs.rmSync(outside, { recursive: true, force: true });
  });
  fs.mkdirSync(path.join(root, 'src'));
  fs.writeFileSync(path.join(root, 'src', 'a.py'), 'x = 1\n');
  fs.writeFileSync(path.join(outside, 'secret.py'), 'x = 2\n');
  fs.symlinkSync(path.join(outside, 'secret.py'), path.join(root, 'link.py'));

  assert.equal(normalizeToProjectPath(root, 'src/a.py'), 'src/a.py');
  assert.equal(normalizeToProjectPath(root, path.join(root, 'src', 'a.py')), 'src/a.py');
  assert.equal(normalizeToProjectPath(root, 'src/gone.py'), 'src/gone.py');
  assert.equal(normalizeToProjectPath(root, '../elsewhere.py'), null);
  assert.equal(normalizeToProjectPath(root, path.join(outside, 'secret.py')), null);
  assert.equal(normalizeToProjectPath(root, 'link.py'), null);
  assert.equal(normalizeToProjectPath(root, root), null);
  assert.equal(normalizeToProjectPath(root, ''), null);

  assert.deepStrictEqual(validatePathSafety(root, 'link.py'), { safe: false, reason: 'symlink_escape' });
  assert.deepStrictEqual(validatePathSafety(root, '../x.py'), { safe: false, reason: 'path_outside_base' });
});
