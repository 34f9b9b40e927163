import path from 'path';
import { EMBEDDING_CONSTANTS, INDEXING_CONSTANTS, WATCHER_CONSTANTS } from './constants.js';
import { getCodesiftHome, loadConfig } from './loader.js';
import type { CodesiftConfig, ProviderSelection } from './types.js';

export interface OpenAIOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  dimensions: number;
}

export interface OllamaOptions {
  host: string;
  model: string;
  dimensions: number;
}

export interface EmbeddingOptions {
  provider: ProviderSelection;
  openai: OpenAIOptions;
  ollama: OllamaOptions;
  rpm?: number;
  tpm?: number;
}

export interface IndexingOptions {
  batchSize: number;
  maxFileSize: number;
  useTreeSitter: boolean;
  ignorePatterns: string[];
}

export interface RuntimeOptions {
  embedding: EmbeddingOptions;
  indexing: IndexingOptions;
  storePath: string;
  debounceMs: number;
}

export function resolveEmbeddingOptions(config: CodesiftConfig): EmbeddingOptions {
  const openai = config.providers?.openai;
  const ollama = config.providers?.ollama;

  return {
    provider: config.defaultProvider ?? 'auto',
    openai: {
      apiKey: openai?.apiKey,
      baseUrl: openai?.baseUrl,
      model: openai?.model ?? EMBEDDING_CONSTANTS.OPENAI_DEFAULT_MODEL,
      dimensions: openai?.dimensions ?? EMBEDDING_CONSTANTS.OPENAI_DEFAULT_DIMENSIONS
    },
    ollama: {
      host: ollama?.host ?? EMBEDDING_CONSTANTS.OLLAMA_DEFAULT_HOST,
      model: ollama?.model ?? EMBEDDING_CONSTANTS.OLLAMA_DEFAULT_MODEL,
      dimensions: ollama?.dimensions ?? EMBEDDING_CONSTANTS.OLLAMA_DEFAULT_DIMENSIONS
    },
    rpm: config.rateLimit?.rpm,
    tpm: config.rateLimit?.tpm
  };
}

export function resolveIndexingOptions(config: CodesiftConfig): IndexingOptions {
  return {
    batchSize: config.indexing?.batchSize ?? INDEXING_CONSTANTS.EMBED_BATCH_SIZE,
    maxFileSize: config.indexing?.maxFileSize ?? INDEXING_CONSTANTS.MAX_FILE_SIZE_BYTES,
    useTreeSitter: config.indexing?.useTreeSitter ?? true,
    ignorePatterns: config.indexing?.ignore ?? []
  };
}

export function resolveStorePath(config: CodesiftConfig, env: NodeJS.ProcessEnv = process.env): string {
  return config.storePath ? path.resolve(config.storePath) : path.join(getCodesiftHome(env), 'index.db');
}

export function resolveDebounceMs(config: CodesiftConfig, override?: number): number {
  const requested = override ?? config.watch?.debounceMs ?? WATCHER_CONSTANTS.DEFAULT_DEBOUNCE_MS;
  return Math.max(WATCHER_CONSTANTS.MIN_DEBOUNCE_MS, requested);
}

/**
 * Everything a command needs, resolved once from the merged config of `basePath`
 */
export function resolveRuntimeOptions(basePath = '.'): RuntimeOptions {
  const config = loadConfig(basePath);
  return {
    embedding: resolveEmbeddingOptions(config),
    indexing: resolveIndexingOptions(config),
    storePath: resolveStorePath(config),
    debounceMs: resolveDebounceMs(config)
  };
}
