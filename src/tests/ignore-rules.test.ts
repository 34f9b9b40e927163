import test from 'node:test';
import assert from 'node:assert/strict';
import { IgnoreRules } from '../indexer/ignore-rules.js';
import { createTempRepo } from './helpers/test-repo.js';

test('default directories and extensions are excluded', async (t) => {
  const repo = await createTempRepo({});
  t.after(repo.cleanup);
  const rules = IgnoreRules.load(repo.root);

  assert.equal(rules.check('node_modules/pkg/index.js'), 'ignored_directory');
  assert.equal(rules.check('src/__pycache__/mod.py'), 'ignored_directory');
  assert.equal(rules.check('.git/config'), 'ignored_directory');
  assert.equal(rules.check('assets/logo.PNG'), 'ignored_extension');
  assert.equal(rules.check('web/app.min.js'), 'ignored_extension');
  assert.equal(rules.check('src/main.py'), null);
  assert.equal(rules.check('build.py'), null);
  assert.equal(rules.isIgnoredDirectoryName('dist'), true);
  assert.equal(rules.isIgnoredDirectoryName('src'), false);
});

test('.gitignore and configured patterns apply', async (t) => {
  const repo = await createTempRepo({ '.gitignore': 'generated/\n*.log\n' });
  t.after(repo.cleanup);
  const rules = IgnoreRules.load(repo.root, { patterns: ['fixtures/**'] });

  assert.equal(rules.check('generated/schema.ts'), 'ignore_file');
  assert.equal(rules.check('server.log'), 'ignore_file');
  assert.equal(rules.check('fixtures/data/a.json'), 'ignore_file');
  assert.equal(rules.isIgnored('src/schema.ts'), false);
});

test('the size ceiling only applies when a size is given', async (t) => {
  const repo = await createTempRepo({});
  t.after(repo.cleanup);
  const rules = IgnoreRules.load(repo.root, { maxFileSize: 100 });

  assert.equal(rules.maxFileSize, 100);
  assert.equal(rules.check('src/big.py', 101), 'too_large');
  assert.equal(rules.check('src/big.py', 100), null);
  assert.equal(rules.check('src/big.py'), null);
  assert.equal(rules.check('vendor/big.py', 101), 'ignored_directory');
});

test('paths outside the project are always excluded', async (t) => {
  const repo = await createTempRepo({});
  t.after(repo.cleanup);
  const rules = IgnoreRules.load(repo.root);

  assert.equal(rules.check(''), 'ignored_directory');
  assert.equal(rules.check('../other/a.py'), 'ignored_directory');
});
