import { CHUNKING_CONSTANTS } from '../config/constants.js';
import type { BoundaryDetector, DeclarationSpan } from './types.js';

export function splitLines(content: string): string[] {
  return content.split('\n');
}

/**
 * Fixed windows of `window` lines every `stride` lines, stopping at the first
 * window that reaches the last line.
 */
export function slidingWindowSpans(
  lineCount: number,
  window: number = CHUNKING_CONSTANTS.WINDOW_LINES,
  stride: number = CHUNKING_CONSTANTS.STRIDE_LINES
): DeclarationSpan[] {
  if (lineCount <= 0) return [];
  if (window <= 0 || stride <= 0) {
    throw new RangeError(`window and stride must be positive (got ${window}/${stride})`);
  }

  const spans: DeclarationSpan[] = [];
  for (let start = 0; ; start += stride) {
    const end = Math.min(start + window, lineCount);
    spans.push({ startLine: start + 1, endLine: end });
    if (end >= lineCount) break;
  }
  return spans;
}

/**
 * Last tier of the cascade. Accepts every extension.
 */
export class SlidingWindowDetector implements BoundaryDetector {
  readonly strategy = 'window';

  constructor(readonly language: string = '') {}

  supports(): boolean {
    return true;
  }

  detect(content: string, smallFileThreshold: number = CHUNKING_CONSTANTS.SMALL_FILE_LINES): DeclarationSpan[] {
    const lineCount = splitLines(content).length;
    if (lineCount <= smallFileThreshold) {
      return [{ startLine: 1, endLine: lineCount }];
    }
    return slidingWindowSpans(lineCount);
  }
}
