import test from 'node:test';
import assert from 'node:assert/strict';
import { SlidingWindowDetector, slidingWindowSpans } from '../chunking/sliding-window.js';
import { numberedLines } from './helpers/source-fixtures.js';

test('windows of 50 lines every 40 lines stop at the first window reaching the end', () => {
  assert.deepStrictEqual(slidingWindowSpans(100), [
    { startLine: 1, endLine: 50 },
    { startLine: 41, endLine: 90 },
    { startLine: 81, endLine: 100 }
  ]);
});

test('a file one line past a window boundary gets one more window', () => {
  assert.deepStrictEqual(slidingWindowSpans(131), [
    { startLine: 1, endLine: 50 },
    { startLine: 41, endLine: 90 },
    { startLine: 81, endLine: 130 },
    { startLine: 121, endLine: 131 }
  ]);
});

test('consecutive windows overlap by 10 lines', () => {
  const spans = slidingWindowSpans(250);
  for (let i = 1; i < spans.length; i++) {
    assert.equal(spans[i - 1].endLine - spans[i].startLine + 1, 10);
  }
});

test('empty input has no windows and bad sizes are rejected', () => {
  assert.deepStrictEqual(slidingWindowSpans(0), []);
  assert.throws(() => slidingWindowSpans(10, 0, 5), RangeError);
});

test('files up to one window long become one span', () => {
  const detector = new SlidingWindowDetector();
  assert.deepStrictEqual(detector.detect(numberedLines(30)), [{ startLine: 1, endLine: 30 }]);
  assert.deepStrictEqual(detector.detect(numberedLines(31)), [{ startLine: 1, endLine: 31 }]);
});

test('window detector accepts any extension', () => {
  const detector = new SlidingWindowDetector();
  assert.equal(detector.supports(), true);
  assert.equal(detector.strategy, 'window');
  assert.equal(detector.language, '');
});
