import type { VectorCollection } from '../database/vector-store.js';
import type { EmbeddingProvider } from '../providers/base.js';
import { ProviderMismatchError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { BatchEmbeddingProcessor } from './batch-indexer.js';
import { FileProcessor } from './indexing/FileProcessor.js';
import {
  IndexContext,
  collectionMetadataFor,
  compareProvider,
  indexedIdentity,
  resolveProjectRoot
} from './indexing/IndexContext.js';
import { IndexState } from './indexing/IndexState.js';
import { FileScanner } from './indexing/file-scanner.js';
import type { IndexProjectOptions, IndexProjectSuccess } from './types.js';

/**
 * IndexerEngine orchestrates a full project scan using a stage-based architecture:
 * - IndexContext: Setup and initialization
 * - IndexState: Counters and per-file errors
 * - FileProcessor: Individual file processing
 * - BatchEmbeddingProcessor: Embedding and upserting whole files
 *
 * Configuration problems surface as CodesiftError; per-file problems land in
 * `state.errors` and the scan continues.
 */
export class IndexerEngine {
  readonly state: IndexState;
  private projectPath: string | null = null;

  constructor(private readonly options: IndexProjectOptions = {}) {
    this.state = new IndexState(options.onProgress ?? null);
  }

  get resolvedProjectPath(): string | null {
    return this.projectPath;
  }

  public async index(): Promise<IndexProjectSuccess> {
    const { repoPath = '.', forceFullRebuild = false } = this.options;

    // Stage 1: Setup and initialization
    const repo = await resolveProjectRoot(repoPath);
    this.projectPath = repo;
    const context = await IndexContext.prepare(repo, this.options);
    const provider = await context.provider();
    const collection = await this.openCollection(context, provider, forceFullRebuild);
    const storedHashes = forceFullRebuild ? new Map<string, string>() : await collection.fileHashes();

    // Stage 2: Scan
    const scanner = new FileScanner(context.rules);
    const { files, excluded } = await scanner.scan(repo);
    this.state.setScanned(files.length);
    log.debug('Scan complete', { files: files.length, ...excluded });

    // Stage 3: Process files in path order
    const batch = new BatchEmbeddingProcessor(
      provider,
      collection,
      {
        onIndexed: (file, chunks) => this.state.markIndexed(file, chunks),
        onFailed: (file, stage, error) => this.state.markFailed(file, stage, error)
      },
      this.options.batchSize ?? context.runtime.indexing.batchSize
    );
    const processor = new FileProcessor(context, this.state, collection, batch, storedHashes, forceFullRebuild);

    for (const file of files) {
      await processor.processFile(file);
    }
    await batch.flush();

    // Stage 4: Drop files that disappeared since the last run
    const present = new Set(files.map(file => file.relativePath));
    for (const rel of storedHashes.keys()) {
      if (!present.has(rel)) {
        await processor.removeFileArtifacts(rel);
      }
    }

    const { stats, errors } = this.state;
    log.info('Indexing complete', { project: repo, collection: collection.name, ...stats, errors: errors.length });

    return {
      success: true,
      projectPath: repo,
      collection: collection.name,
      provider: provider.getName(),
      stats: { ...stats },
      errors: [...errors]
    };
  }

  private async openCollection(
    context: IndexContext,
    provider: EmbeddingProvider,
    forceFullRebuild: boolean
  ): Promise<VectorCollection> {
    const { store, collectionName, repo } = context;

    if (forceFullRebuild && (await store.deleteCollection(collectionName))) {
      log.info('Dropped collection for full rebuild', { collection: collectionName });
    }

    const metadata = collectionMetadataFor(repo, provider);
    const collection = await store.getOrCreateCollection(collectionName, metadata);
    const active = provider.getIdentity();

    switch (compareProvider(collection.metadata, active)) {
      case 'same':
        return collection;
      case 'mismatch':
        if ((await collection.count()) > 0) {
          throw new ProviderMismatchError(indexedIdentity(collection.metadata), active);
        }
        break;
      case 'model_changed':
        log.warn('Embedding model changed; existing vectors were produced by another model', {
          collection: collectionName,
          indexedModel: collection.metadata.embedding_model,
          activeModel: active.model
        });
        break;
    }

    await collection.modifyMetadata(metadata);
    return collection;
  }
}
