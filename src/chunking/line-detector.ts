import { CHUNKING_CONSTANTS } from '../config/constants.js';
import { slidingWindowSpans, splitLines } from './sliding-window.js';
import type { BoundaryDetector, DeclarationSpan } from './types.js';

export interface DeclarationStart {
  /** 0-based index of the first line of the span, prefix lines included */
  line: number;
  /** 0-based index of the line the declaration itself matched on */
  declarationLine: number;
  name?: string;
}

export function hasContent(lines: readonly string[], from: number, to: number): boolean {
  for (let i = from; i <= to; i++) {
    if (lines[i].trim().length > 0) return true;
  }
  return false;
}

/**
 * 0-based index of the line closing the block opened at `start`, or `limit` when
 * the braces never balance within it. Brace characters inside strings and comments
 * are counted too.
 */
export function findBlockEnd(lines: readonly string[], start: number, limit: number): number {
  let depth = 0;
  let opened = false;

  for (let i = start; i <= limit; i++) {
    for (const ch of lines[i]) {
      if (ch === '{') {
        depth++;
        opened = true;
      } else if (ch === '}') {
        depth--;
      }
    }
    if (opened && depth <= 0) {
      return i;
    }
  }

  return limit;
}

/**
 * Turns declaration starts into spans: an `(imports)` span for a non-blank
 * header, then one span per declaration ending before the next one starts.
 * Brace counting begins on the declaration line, not on its prefix lines.
 */
export function buildDeclarationSpans(
  lines: readonly string[],
  starts: readonly DeclarationStart[],
  braceDelimited: boolean
): DeclarationSpan[] {
  const spans: DeclarationSpan[] = [];
  const first = starts[0].line;

  if (first > 0 && hasContent(lines, 0, first - 1)) {
    spans.push({ startLine: 1, endLine: first, name: CHUNKING_CONSTANTS.HEADER_SYMBOL });
  }

  starts.forEach((start, index) => {
    const limit = index + 1 < starts.length ? starts[index + 1].line - 1 : lines.length - 1;
    const end = braceDelimited ? findBlockEnd(lines, start.declarationLine, limit) : limit;
    spans.push({ startLine: start.line + 1, endLine: end + 1, name: start.name });
  });

  return spans;
}

/**
 * Base for the regex-driven detectors: small-file shortcut, column-zero
 * declaration scan, optional brace refinement and sliding-window fallback.
 */
export abstract class LineDetector implements BoundaryDetector {
  abstract readonly language: string;
  protected abstract readonly extensions: readonly string[];
  protected readonly braceDelimited: boolean = true;

  get strategy(): string {
    return `pattern:${this.language}`;
  }

  supports(extension: string): boolean {
    return this.extensions.includes(extension.toLowerCase());
  }

  detect(content: string, smallFileThreshold: number = CHUNKING_CONSTANTS.SMALL_FILE_LINES): DeclarationSpan[] {
    const lines = splitLines(content);
    if (lines.length <= smallFileThreshold) {
      return [{ startLine: 1, endLine: lines.length }];
    }

    const starts: DeclarationStart[] = [];
    let floor = 0;
    lines.forEach((line, index) => {
      const name = this.matchDeclaration(line);
      if (name === null) return;
      starts.push({ line: this.extendOverPrefixLines(lines, index, floor), declarationLine: index, name });
      floor = index + 1;
    });

    if (starts.length === 0) {
      return slidingWindowSpans(lines.length);
    }
    return buildDeclarationSpans(lines, starts, this.braceDelimited);
  }

  /**
   * Declaration name when `line` opens a top-level declaration, `undefined` for an
   * anonymous one, null otherwise.
   */
  protected abstract matchDeclaration(line: string): string | undefined | null;

  /**
   * Lines such as decorators or annotations that belong to the declaration below
   */
  protected isPrefixLine(_line: string): boolean {
    return false;
  }

  private extendOverPrefixLines(lines: readonly string[], index: number, floor: number): number {
    let start = index;
    while (start - 1 >= floor && this.isPrefixLine(lines[start - 1])) {
      start--;
    }
    return start;
  }
}
