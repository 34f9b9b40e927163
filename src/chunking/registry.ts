import path from 'path';
import { getTreeSitterRuntime, type TreeSitterRuntime } from '../languages/tree-sitter-loader.js';
import type { GrammarKey } from '../languages/rules.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { JavaDetector } from './detectors/java.js';
import { JavaScriptDetector } from './detectors/javascript.js';
import { KotlinDetector } from './detectors/kotlin.js';
import { PythonDetector } from './detectors/python.js';
import { SqlDetector } from './detectors/sql.js';
import { TreeSitterDetector } from './detectors/tree-sitter.js';
import { SlidingWindowDetector, splitLines } from './sliding-window.js';
import type { BoundaryDetector, Chunk, DeclarationSpan } from './types.js';

const AST_GRAMMARS: readonly GrammarKey[] = ['python', 'javascript', 'typescript', 'tsx', 'java'];

/**
 * Ordered detector tiers: parsed, then regex, then fixed windows
 */
export class ChunkerRegistry {
  private readonly fallback: BoundaryDetector = new SlidingWindowDetector('');

  constructor(
    private readonly astDetectors: readonly BoundaryDetector[],
    private readonly patternDetectors: readonly BoundaryDetector[]
  ) {}

  get usesTreeSitter(): boolean {
    return this.astDetectors.length > 0;
  }

  candidates(extension: string): BoundaryDetector[] {
    const ext = extension.toLowerCase();
    return [
      ...this.astDetectors.filter((detector) => detector.supports(ext)),
      ...this.patternDetectors.filter((detector) => detector.supports(ext)),
      this.fallback
    ];
  }

  select(extension: string): BoundaryDetector {
    return this.candidates(extension)[0];
  }

  /**
   * Split one file into chunks. Detector failures move on to the next tier;
   * the sliding window always answers.
   */
  chunkFile(content: string, relativePath: string): Chunk[] {
    const extension = path.extname(relativePath);
    const lines = splitLines(content);

    for (const detector of this.candidates(extension)) {
      let spans: DeclarationSpan[] | null;
      try {
        spans = detector.detect(content);
      } catch (error) {
        log.debug('Detector threw, trying next tier', {
          file: relativePath,
          strategy: detector.strategy,
          error: getErrorMessage(error)
        });
        continue;
      }
      if (spans === null) continue;

      return spans.map((span) => ({
        content: lines.slice(span.startLine - 1, span.endLine).join('\n'),
        filePath: relativePath,
        startLine: span.startLine,
        endLine: span.endLine,
        symbolName: span.name,
        language: detector.language
      }));
    }

    return [];
  }
}

export function createPatternDetectors(): BoundaryDetector[] {
  return [
    new PythonDetector(),
    new JavaScriptDetector('javascript'),
    new JavaScriptDetector('typescript'),
    new KotlinDetector(),
    new JavaDetector(),
    new SqlDetector()
  ];
}

export function createAstDetectors(runtime: TreeSitterRuntime): BoundaryDetector[] {
  return AST_GRAMMARS.filter((grammar) => runtime.has(grammar)).map((grammar) => new TreeSitterDetector(runtime, grammar));
}

export interface ChunkerRegistryOptions {
  useTreeSitter?: boolean;
}

export async function createChunkerRegistry(options: ChunkerRegistryOptions = {}): Promise<ChunkerRegistry> {
  const { useTreeSitter = true } = options;

  let astDetectors: BoundaryDetector[] = [];
  if (useTreeSitter) {
    const runtime = await getTreeSitterRuntime();
    if (runtime) {
      astDetectors = createAstDetectors(runtime);
      log.debug('Parsed chunking enabled', { grammars: runtime.loadedGrammars().join(',') });
    }
  }

  return new ChunkerRegistry(astDetectors, createPatternDetectors());
}
