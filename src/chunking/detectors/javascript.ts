import { LineDetector } from '../line-detector.js';

const IDENT = String.raw`[A-Za-z_$][\w$]*`;

const DECLARATION = new RegExp(
  String.raw`^(?:export\s+)?(default\s+)?(?:declare\s+)?(?:abstract\s+)?(?:async\s+)?` +
    '(?:' +
    [
      String.raw`function\b\s*\*?\s*(${IDENT})?`,
      String.raw`class\b(?:\s+(${IDENT}))?`,
      String.raw`interface\s+(${IDENT})`,
      String.raw`type\s+(${IDENT})\s*(?:<[^=]*>)?\s*=`,
      String.raw`(?:const\s+)?enum\s+(${IDENT})`,
      String.raw`(?:const|let|var)\s+(${IDENT})\s*(?::[^=]+)?=`
    ].join('|') +
    ')'
);

/**
 * JavaScript and TypeScript top-level functions, classes, type declarations and
 * bindings.
 */
export class JavaScriptDetector extends LineDetector {
  protected readonly extensions: readonly string[];

  constructor(readonly language: 'javascript' | 'typescript') {
    super();
    this.extensions = language === 'typescript' ? ['.ts', '.tsx', '.mts', '.cts'] : ['.js', '.jsx', '.mjs', '.cjs'];
  }

  protected matchDeclaration(line: string): string | undefined | null {
    const match = DECLARATION.exec(line);
    if (!match) return null;

    const name = match.slice(2).find(group => group !== undefined);
    if (name) return name;
    return match[1] ? 'default' : undefined;
  }
}
