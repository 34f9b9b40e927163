import { LineDetector } from '../line-detector.js';

const DECLARATION =
  /^(?:(?:public|protected|private|abstract|final|static|sealed|non-sealed|strictfp)\s+)*(?:class|interface|enum|record|@interface)\s+([A-Za-z_$][\w$]*)/;

/**
 * Top-level types only; members stay inside their enclosing type.
 */
export class JavaDetector extends LineDetector {
  readonly language = 'java';
  protected readonly extensions = ['.java'] as const;

  protected matchDeclaration(line: string): string | null {
    return DECLARATION.exec(line)?.[1] ?? null;
  }

  protected isPrefixLine(line: string): boolean {
    return /^@(?!interface\b)\w/.test(line);
  }
}
