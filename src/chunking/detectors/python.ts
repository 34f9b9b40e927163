import { LineDetector } from '../line-detector.js';

const DECLARATION = /^(?:async\s+)?(?:def|class)\s+([A-Za-z_]\w*)/;

/**
 * Indentation-scoped: a declaration runs until the next column-zero `def` or `class`.
 */
export class PythonDetector extends LineDetector {
  readonly language = 'python';
  protected readonly extensions = ['.py', '.pyi'] as const;
  protected readonly braceDelimited = false;

  protected matchDeclaration(line: string): string | null {
    return DECLARATION.exec(line)?.[1] ?? null;
  }

  protected isPrefixLine(line: string): boolean {
    return line.startsWith('@');
  }
}
