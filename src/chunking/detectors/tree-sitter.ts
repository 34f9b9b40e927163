import { CHUNKING_CONSTANTS } from '../../config/constants.js';
import {
  LANG_RULES,
  NAME_NODE_TYPES,
  WRAPPER_NODE_TYPES,
  type GrammarKey,
  type LanguageRule
} from '../../languages/rules.js';
import type { SyntaxNode, TreeSitterRuntime } from '../../languages/tree-sitter-loader.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { log } from '../../utils/logger.js';
import { hasContent } from '../line-detector.js';
import { slidingWindowSpans, splitLines } from '../sliding-window.js';
import type { BoundaryDetector, DeclarationSpan } from '../types.js';

const SKIPPED_CHILD_TYPES = new Set(['decorator', 'comment', 'marker_annotation', 'annotation', 'modifiers']);

/**
 * Name of a top-level declaration: the `name` field, else the first name-like
 * child, looking through wrappers such as `export_statement`.
 */
export function declarationName(node: SyntaxNode): string | undefined {
  const field = node.childForFieldName('name');
  if (field && NAME_NODE_TYPES.has(field.type)) {
    return field.text;
  }

  if (WRAPPER_NODE_TYPES.has(node.type)) {
    for (const child of node.namedChildren) {
      if (SKIPPED_CHILD_TYPES.has(child.type)) continue;
      const inner = declarationName(child);
      if (inner) return inner;
    }
    if (node.type === 'export_statement' && node.children.some((child) => child.type === 'default')) {
      return 'default';
    }
    return undefined;
  }

  for (const child of node.namedChildren) {
    if (NAME_NODE_TYPES.has(child.type)) {
      return child.text;
    }
  }
  return undefined;
}

/**
 * Declarations found by parsing. Grammars are shared through a `TreeSitterRuntime`;
 * one detector instance serves one grammar.
 */
export class TreeSitterDetector implements BoundaryDetector {
  readonly language: string;
  private readonly extensions: readonly string[];
  private readonly nodeTypes: ReadonlySet<string>;

  constructor(
    private readonly runtime: TreeSitterRuntime,
    private readonly grammar: GrammarKey
  ) {
    const rules: Array<[string, LanguageRule]> = Object.entries(LANG_RULES).filter(([, rule]) => rule.lang === grammar);
    this.extensions = rules.map(([extension]) => extension);
    this.nodeTypes = new Set(rules.flatMap(([, rule]) => rule.nodeTypes));
    this.language = grammar === 'tsx' ? 'typescript' : grammar;
  }

  get strategy(): string {
    return `ast:${this.grammar}`;
  }

  supports(extension: string): boolean {
    return this.runtime.has(this.grammar) && this.extensions.includes(extension.toLowerCase());
  }

  detect(content: string, smallFileThreshold: number = CHUNKING_CONSTANTS.SMALL_FILE_LINES): DeclarationSpan[] | null {
    const lines = splitLines(content);
    if (lines.length <= smallFileThreshold) {
      return [{ startLine: 1, endLine: lines.length }];
    }

    let declarations: DeclarationSpan[];
    try {
      const tree = this.runtime.parse(this.grammar, content);
      if (!tree) return null;
      declarations = this.collectDeclarations(tree.rootNode);
    } catch (error) {
      log.debug('Parse failed, falling back', { grammar: this.grammar, error: getErrorMessage(error) });
      return null;
    }

    if (declarations.length === 0) {
      return slidingWindowSpans(lines.length);
    }

    const spans: DeclarationSpan[] = [];
    const firstStart = declarations[0].startLine;
    if (firstStart > 1 && hasContent(lines, 0, firstStart - 2)) {
      spans.push({ startLine: 1, endLine: firstStart - 1, name: CHUNKING_CONSTANTS.HEADER_SYMBOL });
    }

    spans.push(...declarations);

    const lastEnd = declarations[declarations.length - 1].endLine;
    if (lastEnd < lines.length && hasContent(lines, lastEnd, lines.length - 1)) {
      spans.push({ startLine: lastEnd + 1, endLine: lines.length, name: CHUNKING_CONSTANTS.TRAILING_SYMBOL });
    }

    return spans;
  }

  private collectDeclarations(root: SyntaxNode): DeclarationSpan[] {
    const found = root.children
      .filter((node) => this.nodeTypes.has(node.type))
      .map((node) => ({
        startLine: node.startPosition.row + 1,
        endLine: node.endPosition.row + 1,
        name: declarationName(node) ?? node.type
      }))
      .sort((a, b) => a.startLine - b.startLine);

    const merged: DeclarationSpan[] = [];
    for (const span of found) {
      const previous = merged[merged.length - 1];
      if (previous && span.startLine <= previous.endLine + 1) {
        previous.endLine = Math.max(previous.endLine, span.endLine);
        if (!previous.name && span.name) previous.name = span.name;
      } else {
        merged.push({ ...span });
      }
    }
    return merged;
  }
}
