import fs from 'fs';
import type { Chunk } from '../../chunking/types.js';
import type { VectorCollection } from '../../database/vector-store.js';
import { chunkId, computeFingerprint } from '../../indexer/fingerprint.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { log } from '../../utils/logger.js';
import type { BatchEmbeddingProcessor, PendingRecord } from '../batch-indexer.js';
import type { IndexContext } from './IndexContext.js';
import type { IndexState } from './IndexState.js';
import type { ScannedFile } from './file-scanner.js';

/**
 * Records for one file's chunks, ids by position in the chunk list
 */
export function buildPendingRecords(chunks: readonly Chunk[], fileHash: string, projectPath: string): PendingRecord[] {
  return chunks.map((chunk, index) => ({
    id: chunkId(chunk.filePath, index),
    document: chunk.content,
    metadata: {
      file_path: chunk.filePath,
      start_line: chunk.startLine,
      end_line: chunk.endLine,
      language: chunk.language,
      symbol_name: chunk.symbolName ?? '',
      file_hash: fileHash,
      project_path: projectPath
    }
  }));
}

/**
 * FileProcessor handles one file of a full scan:
 * - Change detection via the stored fingerprint
 * - Chunking through the detector cascade
 * - Replacing prior records and queueing the file for embedding
 */
export class FileProcessor {
  constructor(
    private readonly context: IndexContext,
    private readonly state: IndexState,
    private readonly collection: VectorCollection,
    private readonly batch: BatchEmbeddingProcessor,
    private readonly storedHashes: ReadonlyMap<string, string>,
    private readonly forceFullRebuild: boolean
  ) {}

  async processFile(file: ScannedFile): Promise<void> {
    const rel = file.relativePath;

    let source: string;
    try {
      source = await fs.promises.readFile(file.absolutePath, 'utf8');
    } catch (error) {
      this.state.markFailed(rel, 'read', getErrorMessage(error));
      return;
    }

    const fileHash = await computeFingerprint(source);
    if (!this.forceFullRebuild && this.storedHashes.get(rel) === fileHash) {
      this.state.markSkipped(rel);
      return;
    }

    let chunks: Chunk[];
    try {
      chunks = this.context.chunker.chunkFile(source, rel);
    } catch (error) {
      this.state.markFailed(rel, 'chunk', getErrorMessage(error));
      return;
    }

    if (this.storedHashes.has(rel)) {
      try {
        const removed = await this.collection.deleteWhere({ file_path: rel });
        log.debug('Replaced prior records', { file: rel, removed });
      } catch (error) {
        this.state.markFailed(rel, 'store', getErrorMessage(error));
        return;
      }
    }

    await this.batch.addFile({
      file: rel,
      records: buildPendingRecords(chunks, fileHash, this.context.repo)
    });
  }

  /**
   * Drop every record of a file that no longer exists
   */
  async removeFileArtifacts(rel: string): Promise<void> {
    try {
      const removed = await this.collection.deleteWhere({ file_path: rel });
      log.debug('Removed stale file', { file: rel, removed });
      this.state.markRemoved(rel);
    } catch (error) {
      this.state.markFailed(rel, 'store', getErrorMessage(error));
    }
  }
}
