import { INDEXING_CONSTANTS } from '../config/constants.js';
import type { ChunkMetadata, ChunkRecord, VectorCollection } from '../database/vector-store.js';
import type { EmbeddingProvider } from '../providers/base.js';
import { ProviderUnavailableError, getErrorMessage, getErrorStatus } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

/**
 * A chunk record before its embedding exists
 */
export interface PendingRecord {
  id: string;
  document: string;
  metadata: ChunkMetadata;
}

export interface PendingFile {
  file: string;
  records: PendingRecord[];
}

export type BatchFailureStage = 'embed' | 'store';

export interface BatchCallbacks {
  onIndexed(file: string, chunks: number): void;
  onFailed(file: string, stage: BatchFailureStage, error: string): void;
}

export async function embedRecords(provider: EmbeddingProvider, records: readonly PendingRecord[]): Promise<ChunkRecord[]> {
  if (records.length === 0) return [];
  const vectors = await provider.generateEmbeddings(records.map(record => record.document));
  if (vectors.length !== records.length) {
    throw new Error(`Provider returned ${vectors.length} embeddings for ${records.length} chunks`);
  }
  return records.map((record, index) => ({ ...record, embedding: vectors[index] }));
}

/**
 * Batches whole files for embedding and writes them to the collection.
 *
 * Use `addFile` to enqueue work and `flush` to force processing of remaining items.
 * A failed batch fails every file in it; ProviderUnavailableError aborts the run.
 */
export class BatchEmbeddingProcessor {
  private batch: PendingFile[] = [];
  private batchChunks = 0;

  constructor(
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly collection: VectorCollection,
    private readonly callbacks: BatchCallbacks,
    private readonly batchSize: number = INDEXING_CONSTANTS.EMBED_BATCH_SIZE
  ) {}

  async addFile(file: PendingFile): Promise<void> {
    this.batch.push(file);
    this.batchChunks += file.records.length;

    if (this.batchChunks >= this.batchSize) {
      await this.flush();
    }
  }

  /**
   * Process any remaining files in the batch
   */
  async flush(): Promise<void> {
    if (this.batch.length === 0) return;

    const currentBatch = this.batch;
    const chunkCount = this.batchChunks;
    this.batch = [];
    this.batchChunks = 0;

    const pending = currentBatch.flatMap(file => file.records);

    let records: ChunkRecord[];
    try {
      records = await embedRecords(this.embeddingProvider, pending);
    } catch (error) {
      if (error instanceof ProviderUnavailableError) throw error;
      log.warn('Embedding batch failed', {
        files: currentBatch.length,
        chunks: chunkCount,
        status: getErrorStatus(error),
        error: getErrorMessage(error)
      });
      this.failAll(currentBatch, 'embed', error);
      return;
    }

    try {
      await this.collection.upsert(records);
    } catch (error) {
      log.warn('Upserting batch failed', { files: currentBatch.length, chunks: chunkCount, error: getErrorMessage(error) });
      this.failAll(currentBatch, 'store', error);
      return;
    }

    log.debug('Batch stored', { files: currentBatch.length, chunks: chunkCount });
    for (const file of currentBatch) {
      this.callbacks.onIndexed(file.file, file.records.length);
    }
  }

  private failAll(batch: readonly PendingFile[], stage: BatchFailureStage, error: unknown): void {
    const message = getErrorMessage(error);
    for (const file of batch) {
      this.callbacks.onFailed(file.file, stage, message);
    }
  }
}
