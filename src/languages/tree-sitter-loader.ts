import type Parser from 'tree-sitter';
import { PARSING_CONSTANTS } from '../config/constants.js';
import { getErrorMessage, safeGetProperty } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import type { GrammarKey } from './rules.js';

export type SyntaxTree = Parser.Tree;
export type SyntaxNode = Parser.SyntaxNode;
type ParserConstructor = typeof Parser;

/** Native binding exported by a grammar package */
interface Grammar {
  language: object;
}

interface GrammarModule {
  specifier: string;
  /** Export holding the grammar when a package ships several */
  key: string | null;
}

const GRAMMAR_MODULES: Record<GrammarKey, GrammarModule> = {
  python: { specifier: 'tree-sitter-python', key: null },
  javascript: { specifier: 'tree-sitter-javascript', key: 'javascript' },
  typescript: { specifier: 'tree-sitter-typescript', key: 'typescript' },
  tsx: { specifier: 'tree-sitter-typescript', key: 'tsx' },
  java: { specifier: 'tree-sitter-java', key: null }
};

export function resolveTreeSitterLanguage(module: unknown, preferredKey: string | null = null): unknown {
  if (!module) {
    return null;
  }

  const defaultProp = safeGetProperty(module, 'default');
  if (defaultProp) {
    return resolveTreeSitterLanguage(defaultProp, preferredKey);
  }

  if (preferredKey) {
    const preferredProp = safeGetProperty(module, preferredKey);
    if (preferredProp) {
      return resolveTreeSitterLanguage(preferredProp, null);
    }
  }

  return module;
}

function isGrammar(value: unknown): value is Grammar {
  return typeof value === 'object' && value !== null && typeof safeGetProperty(value, 'language') === 'object';
}

/**
 * One parser per grammar that loaded. Grammars that fail to load are left out,
 * which sends their files to the pattern detectors.
 */
export class TreeSitterRuntime {
  private constructor(private readonly parsers: ReadonlyMap<GrammarKey, Parser>) {}

  static async load(grammars: readonly GrammarKey[] = Object.keys(GRAMMAR_MODULES).filter(isGrammarKey)): Promise<TreeSitterRuntime | null> {
    let ParserCtor: ParserConstructor;
    try {
      ParserCtor = (await import('tree-sitter')).default;
    } catch (error) {
      log.debug('tree-sitter unavailable, using pattern detectors', { error: getErrorMessage(error) });
      return null;
    }

    const parsers = new Map<GrammarKey, Parser>();
    for (const key of grammars) {
      const { specifier, key: exportKey } = GRAMMAR_MODULES[key];
      try {
        const loaded: unknown = await import(specifier);
        const grammar = resolveTreeSitterLanguage(loaded, exportKey);
        if (!isGrammar(grammar)) {
          log.debug('Grammar module has no language binding', { grammar: key, specifier });
          continue;
        }
        const parser = new ParserCtor();
        parser.setLanguage(grammar);
        parsers.set(key, parser);
      } catch (error) {
        log.debug('Grammar failed to load', { grammar: key, specifier, error: getErrorMessage(error) });
      }
    }

    return parsers.size > 0 ? new TreeSitterRuntime(parsers) : null;
  }

  has(grammar: GrammarKey): boolean {
    return this.parsers.has(grammar);
  }

  loadedGrammars(): GrammarKey[] {
    return [...this.parsers.keys()];
  }

  /**
   * Parse `source`, or null when the grammar is not loaded
   */
  parse(grammar: GrammarKey, source: string): SyntaxTree | null {
    const parser = this.parsers.get(grammar);
    if (!parser) return null;

    if (source.length > PARSING_CONSTANTS.SIZE_THRESHOLD) {
      return parser.parse((index: number) => {
        if (index < source.length) {
          return source.slice(index, Math.min(index + PARSING_CONSTANTS.CHUNK_SIZE, source.length));
        }
        return null;
      });
    }
    return parser.parse(source);
  }
}

function isGrammarKey(value: string): value is GrammarKey {
  return value in GRAMMAR_MODULES;
}

let runtimePromise: Promise<TreeSitterRuntime | null> | null = null;

/**
 * Shared runtime, loaded once per process
 */
export function getTreeSitterRuntime(): Promise<TreeSitterRuntime | null> {
  if (!runtimePromise) {
    runtimePromise = TreeSitterRuntime.load();
  }
  return runtimePromise;
}
