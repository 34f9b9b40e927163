import test from 'node:test';
import assert from 'node:assert/strict';
import { TreeSitterDetector } from '../chunking/detectors/tree-sitter.js';
import { TreeSitterRuntime } from '../languages/tree-sitter-loader.js';
import { numberedLines, sourceWithLines } from './helpers/source-fixtures.js';

const runtime = await TreeSitterRuntime.load(['python', 'typescript']);

test('the python and typescript grammars load', () => {
  assert.equal(runtime?.has('python'), true);
  assert.equal(runtime?.has('typescript'), true);
});

test('header and trailing spans surround the parsed declarations', () => {
  assert.ok(runtime);
  const source = [
    'import os',
    '',
    'def alpha():',
    ...Array.from({ length: 5 }, () => '    return 1'),
    '',
    '@cache',
    'def beta():',
    ...Array.from({ length: 19 }, () => '    x = 1'),
    '',
    'print(beta())',
    ...Array.from({ length: 8 }, () => '# done')
  ].join('\n');

  const detector = new TreeSitterDetector(runtime, 'python');
  assert.deepStrictEqual(detector.detect(source), [
    { startLine: 1, endLine: 2, name: '(imports)' },
    { startLine: 3, endLine: 8, name: 'alpha' },
    { startLine: 10, endLine: 30, name: 'beta' },
    { startLine: 31, endLine: 40, name: '(trailing)' }
  ]);
});

test('typescript exports are named through their wrappers', () => {
  assert.ok(runtime);
  const source = sourceWithLines(
    40,
    {
      1: "import { readFile } from 'fs';",
      2: '',
      3: 'export interface Options {',
      4: '  path: string;',
      5: '}',
      6: '',
      7: 'export default function () {',
      8: '  return 1;',
      9: '}',
      10: '',
      11: 'const limit = 10;'
    },
    '// filler'
  );

  const detector = new TreeSitterDetector(runtime, 'typescript');
  assert.equal(detector.language, 'typescript');
  assert.equal(detector.strategy, 'ast:typescript');
  assert.deepStrictEqual(detector.detect(source), [
    { startLine: 1, endLine: 2, name: '(imports)' },
    { startLine: 3, endLine: 5, name: 'Options' },
    { startLine: 7, endLine: 9, name: 'default' },
    { startLine: 11, endLine: 11, name: 'limit' },
    { startLine: 12, endLine: 40, name: '(trailing)' }
  ]);
});

test('adjacent declarations merge into one span', () => {
  assert.ok(runtime);
  const source = sourceWithLines(35, { 1: 'def a():', 2: '    pass', 3: 'def b():' }, '    pass');

  const detector = new TreeSitterDetector(runtime, 'python');
  assert.deepStrictEqual(detector.detect(source), [{ startLine: 1, endLine: 35, name: 'a' }]);
});

test('a parsed file without declarations falls back to windows', () => {
  assert.ok(runtime);
  const detector = new TreeSitterDetector(runtime, 'python');
  assert.deepStrictEqual(detector.detect(numberedLines(60, 'x =')), [
    { startLine: 1, endLine: 50 },
    { startLine: 41, endLine: 60 }
  ]);
});

test('detectors only claim extensions of loaded grammars', () => {
  assert.ok(runtime);
  const python = new TreeSitterDetector(runtime, 'python');
  assert.equal(python.supports('.py'), true);
  assert.equal(python.supports('.PY'), true);
  assert.equal(python.supports('.ts'), false);
  assert.equal(new TreeSitterDetector(runtime, 'java').supports('.java'), false);
});
