import fs from 'fs';
import path from 'path';
import { createChunkerRegistry, type ChunkerRegistry } from '../../chunking/registry.js';
import { resolveRuntimeOptions, type RuntimeOptions } from '../../config/resolver.js';
import { openDefaultStore } from '../../database/db.js';
import type { CollectionMetadata, VectorStore } from '../../database/vector-store.js';
import { collectionName } from '../../indexer/fingerprint.js';
import { IgnoreRules } from '../../indexer/ignore-rules.js';
import { resolveEmbeddingProvider, type EmbeddingProvider } from '../../providers/index.js';
import {
  NotADirectoryError,
  ProviderUnavailableError,
  getErrorMessage,
  type ProviderIdentity
} from '../../utils/error-utils.js';
import { log } from '../../utils/logger.js';
import type { IndexServices } from '../types.js';

export type ProviderComparison = 'same' | 'model_changed' | 'mismatch';

/**
 * Provider identity is name plus dimensions; a different model with the same
 * dimensions still produces comparable vectors.
 */
export function compareProvider(metadata: CollectionMetadata, active: ProviderIdentity): ProviderComparison {
  if (metadata.embedding_provider !== active.name || metadata.embedding_dimensions !== active.dimensions) {
    return 'mismatch';
  }
  return metadata.embedding_model === active.model ? 'same' : 'model_changed';
}

export function indexedIdentity(metadata: CollectionMetadata): ProviderIdentity {
  return {
    name: metadata.embedding_provider,
    model: metadata.embedding_model,
    dimensions: metadata.embedding_dimensions
  };
}

export function collectionMetadataFor(projectPath: string, provider: EmbeddingProvider): CollectionMetadata {
  return {
    project_path: projectPath,
    embedding_provider: provider.getName(),
    embedding_model: provider.getModelName(),
    embedding_dimensions: provider.getDimensions()
  };
}

/**
 * Absolute project root; anything but an existing directory is fatal
 */
export async function resolveProjectRoot(repoPath: string): Promise<string> {
  const repo = path.resolve(repoPath);
  // Missing roots are reported the same way as files
  const stats = await fs.promises.stat(repo).catch(() => null);
  if (stats?.isDirectory()) return repo;
  throw new NotADirectoryError(repo);
}

/**
 * IndexContext resolves what one indexing call needs: configuration, the vector
 * store, the chunker cascade and the ignore rules. The embedding provider is
 * resolved on first use.
 */
export class IndexContext {
  private providerPromise: Promise<EmbeddingProvider> | null = null;

  private constructor(
    readonly repo: string,
    readonly collectionName: string,
    readonly runtime: RuntimeOptions,
    readonly store: VectorStore,
    readonly chunker: ChunkerRegistry,
    readonly rules: IgnoreRules,
    private readonly services: IndexServices
  ) {}

  static async prepare(repo: string, services: IndexServices = {}): Promise<IndexContext> {
    const runtime = resolveRuntimeOptions(repo);
    const store = services.store ?? openDefaultStore(runtime.storePath);
    const chunker = services.chunker ?? (await createChunkerRegistry({ useTreeSitter: runtime.indexing.useTreeSitter }));
    const rules = IgnoreRules.load(repo, {
      maxFileSize: services.maxFileSize ?? runtime.indexing.maxFileSize,
      patterns: runtime.indexing.ignorePatterns
    });

    return new IndexContext(repo, collectionName(repo), runtime, store, chunker, rules, services);
  }

  /**
   * The active embedding provider, initialized. Throws ProviderUnavailableError.
   */
  provider(): Promise<EmbeddingProvider> {
    if (!this.providerPromise) {
      this.providerPromise = this.loadProvider();
    }
    return this.providerPromise;
  }

  private async loadProvider(): Promise<EmbeddingProvider> {
    try {
      const provider =
        this.services.embeddingProvider ??
        (await resolveEmbeddingProvider(this.services.provider, this.runtime.embedding));
      await provider.init();
      const identity = provider.getIdentity();
      log.debug('Embedding provider ready', {
        provider: identity.name,
        model: identity.model,
        dimensions: identity.dimensions
      });
      return provider;
    } catch (error) {
      if (error instanceof ProviderUnavailableError) throw error;
      throw new ProviderUnavailableError(`Embedding provider could not be initialized: ${getErrorMessage(error)}`, {
        cause: error
      });
    }
  }
}
