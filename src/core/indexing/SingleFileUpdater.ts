import fs from 'fs';
import path from 'path';
import type { Chunk } from '../../chunking/types.js';
import type { ChunkRecord, VectorCollection } from '../../database/vector-store.js';
import { computeFingerprint, normalizeToProjectPath } from '../../indexer/fingerprint.js';
import type { EmbeddingProvider } from '../../providers/base.js';
import { StoreError, getErrorMessage } from '../../utils/error-utils.js';
import { log } from '../../utils/logger.js';
import { embedRecords } from '../batch-indexer.js';
import type { IndexFileOptions, IndexFileResult, RemoveFileResult } from '../types.js';
import { buildPendingRecords } from './FileProcessor.js';
import { IndexContext, compareProvider } from './IndexContext.js';

/**
 * Opens the run context; a store that cannot be opened becomes a `store_error`
 */
async function prepareContext(
  repo: string,
  rel: string,
  options: IndexFileOptions
): Promise<IndexContext | { status: 'store_error'; filePath: string; message: string }> {
  try {
    return await IndexContext.prepare(repo, options);
  } catch (error) {
    if (!(error instanceof StoreError)) throw error;
    return { status: 'store_error', filePath: rel, message: error.message };
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Brings the records of one file in line with its current content. Every
 * outcome is a status; nothing here throws for a bad file.
 */
export class SingleFileUpdater {
  constructor(private readonly options: IndexFileOptions) {}

  async index(): Promise<IndexFileResult> {
    const repo = path.resolve(this.options.projectPath);
    const rel = normalizeToProjectPath(repo, this.options.filePath);
    if (rel === null) {
      return { status: 'not_in_project', filePath: this.options.filePath };
    }
    const absolute = path.join(repo, rel);

    let size: number;
    try {
      const stats = await fs.promises.stat(absolute);
      if (!stats.isFile()) {
        return { status: 'not_a_file', filePath: rel };
      }
      size = stats.size;
    } catch (error) {
      if (isMissing(error)) {
        return { status: 'file_deleted', filePath: rel };
      }
      return { status: 'read_error', filePath: rel, message: getErrorMessage(error) };
    }

    const context = await prepareContext(repo, rel, this.options);
    if (!(context instanceof IndexContext)) {
      return context;
    }

    const reason = context.rules.check(rel);
    if (reason) {
      return { status: 'ignored', filePath: rel, message: reason };
    }
    if (size > context.rules.maxFileSize) {
      return { status: 'too_large', filePath: rel, message: `${size} bytes exceeds ${context.rules.maxFileSize}` };
    }

    let source: string;
    try {
      source = await fs.promises.readFile(absolute, 'utf8');
    } catch (error) {
      return { status: 'read_error', filePath: rel, message: getErrorMessage(error) };
    }

    let collection: VectorCollection | null;
    try {
      collection = await context.store.getCollection(context.collectionName);
    } catch (error) {
      return { status: 'store_error', filePath: rel, message: getErrorMessage(error) };
    }
    if (!collection) {
      return { status: 'project_not_indexed', filePath: rel };
    }

    let provider: EmbeddingProvider;
    try {
      provider = await context.provider();
    } catch (error) {
      return { status: 'embed_error', filePath: rel, message: getErrorMessage(error) };
    }

    const active = provider.getIdentity();
    const comparison = compareProvider(collection.metadata, active);
    if (comparison === 'mismatch') {
      const message =
        `indexed with ${collection.metadata.embedding_provider} (${collection.metadata.embedding_dimensions} dims), ` +
        `active provider is ${active.name} (${active.dimensions} dims)`;
      log.warn('Skipping file: provider mismatch', { file: rel, detail: message });
      return { status: 'provider_mismatch', filePath: rel, message };
    }
    if (comparison === 'model_changed') {
      log.warn('Embedding model differs from the indexed one', {
        file: rel,
        indexedModel: collection.metadata.embedding_model,
        activeModel: active.model
      });
    }

    const fileHash = await computeFingerprint(source);
    try {
      if ((await collection.count({ file_path: rel, file_hash: fileHash })) > 0) {
        return { status: 'unchanged', filePath: rel };
      }
    } catch (error) {
      return { status: 'store_error', filePath: rel, message: getErrorMessage(error) };
    }

    let chunks: Chunk[];
    try {
      chunks = context.chunker.chunkFile(source, rel);
    } catch (error) {
      return { status: 'chunk_error', filePath: rel, message: getErrorMessage(error) };
    }

    try {
      await collection.deleteWhere({ file_path: rel });
    } catch (error) {
      return { status: 'store_error', filePath: rel, message: getErrorMessage(error) };
    }

    const pending = buildPendingRecords(chunks, fileHash, repo);
    let records: ChunkRecord[];
    try {
      records = await embedRecords(provider, pending);
    } catch (error) {
      log.warn('Embedding failed', { file: rel, error: getErrorMessage(error) });
      return { status: 'embed_error', filePath: rel, message: getErrorMessage(error) };
    }

    try {
      await collection.upsert(records);
    } catch (error) {
      return { status: 'store_error', filePath: rel, message: getErrorMessage(error) };
    }

    log.debug('File reindexed', { file: rel, chunks: records.length });
    return { status: 'success', filePath: rel, chunksIndexed: records.length };
  }

  async remove(): Promise<RemoveFileResult> {
    const repo = path.resolve(this.options.projectPath);
    const rel = normalizeToProjectPath(repo, this.options.filePath);
    if (rel === null) {
      return { status: 'not_in_project', filePath: this.options.filePath };
    }

    const context = await prepareContext(repo, rel, this.options);
    if (!(context instanceof IndexContext)) {
      return context;
    }
    try {
      const collection = await context.store.getCollection(context.collectionName);
      if (!collection) {
        return { status: 'project_not_indexed', filePath: rel };
      }
      const removedChunks = await collection.deleteWhere({ file_path: rel });
      log.debug('File records removed', { file: rel, removed: removedChunks });
      return { status: 'removed', filePath: rel, removedChunks };
    } catch (error) {
      return { status: 'store_error', filePath: rel, message: getErrorMessage(error) };
    }
  }
}
