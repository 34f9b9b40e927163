import { LineDetector } from '../line-detector.js';

const MODIFIERS = [
  'public', 'private', 'protected', 'internal', 'abstract', 'open', 'final', 'sealed',
  'data', 'enum', 'annotation', 'inline', 'value', 'inner', 'override', 'suspend',
  'tailrec', 'operator', 'infix', 'external', 'const', 'lateinit', 'expect', 'actual'
];

const DECLARATION = new RegExp(
  String.raw`^(?:(?:@[\w.]+(?:\([^)]*\))?|${MODIFIERS.join('|')})\s+)*` +
    String.raw`(class|interface|object|fun|val|var)\s+(.*)$`
);

function extractName(keyword: string, rest: string): string | undefined {
  let remainder = rest;
  if (keyword === 'fun') {
    remainder = remainder.replace(/^interface\s+/, '').replace(/^<[^>]*>\s*/, '');
  }
  // Extension receivers: `fun String.trimAll()` is named after the function
  const qualified = /^[A-Za-z_][\w.]*/.exec(remainder)?.[0];
  if (!qualified) return undefined;
  const segments = qualified.split('.').filter(Boolean);
  return segments[segments.length - 1];
}

export class KotlinDetector extends LineDetector {
  readonly language = 'kotlin';
  protected readonly extensions = ['.kt', '.kts'] as const;

  protected matchDeclaration(line: string): string | undefined | null {
    const match = DECLARATION.exec(line);
    if (!match) return null;
    return extractName(match[1], match[2]);
  }

  protected isPrefixLine(line: string): boolean {
    return /^@\w/.test(line);
  }
}
