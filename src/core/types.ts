import type { ChunkerRegistry } from '../chunking/registry.js';
import type { VectorStore } from '../database/vector-store.js';
import type { EmbeddingProvider } from '../providers/base.js';
import type { CodesiftErrorCode } from '../utils/error-utils.js';

export type IndexErrorStage = 'read' | 'chunk' | 'embed' | 'store';

export interface IndexError {
  /** Project-relative path */
  file: string;
  stage: IndexErrorStage;
  error: string;
}

export interface IndexStats {
  /** Files that survived the ignore rules */
  scanned: number;
  /** Files whose chunks were upserted */
  indexed: number;
  /** Files whose fingerprint matched the stored one */
  skipped: number;
  failed: number;
  /** Files no longer on disk whose records were dropped */
  removed: number;
  chunksCreated: number;
}

export type ProgressEvent =
  | { type: 'scan_complete'; fileCount: number }
  | { type: 'file_indexed'; file: string; chunks: number }
  | { type: 'file_skipped'; file: string }
  | { type: 'file_failed'; file: string; stage: IndexErrorStage }
  | { type: 'file_removed'; file: string };

/**
 * Collaborators shared by every indexing entry point. Anything left out is
 * resolved from configuration.
 */
export interface IndexServices {
  /** Provider name: 'auto' | 'openai' | 'ollama' | 'mock' */
  provider?: string;
  /** Injected provider instance; takes precedence over `provider` */
  embeddingProvider?: EmbeddingProvider;
  store?: VectorStore;
  chunker?: ChunkerRegistry;
  maxFileSize?: number;
}

export interface IndexProjectOptions extends IndexServices {
  repoPath?: string;
  /** Drop the collection and re-embed every file */
  forceFullRebuild?: boolean;
  batchSize?: number;
  onProgress?: ((event: ProgressEvent) => void) | null;
}

export interface IndexProjectSuccess {
  success: true;
  projectPath: string;
  collection: string;
  provider: string;
  stats: IndexStats;
  errors: IndexError[];
}

export interface IndexProjectFailure {
  success: false;
  projectPath: string;
  stats: IndexStats;
  errors: IndexError[];
  error: {
    code: CodesiftErrorCode;
    message: string;
  };
}

export type IndexProjectResult = IndexProjectSuccess | IndexProjectFailure;

export interface IndexFileOptions extends IndexServices {
  projectPath: string;
  /** Absolute, or relative to `projectPath` */
  filePath: string;
}

export type IndexFileStatus =
  | 'success'
  | 'unchanged'
  | 'not_in_project'
  | 'file_deleted'
  | 'not_a_file'
  | 'ignored'
  | 'too_large'
  | 'read_error'
  | 'project_not_indexed'
  | 'provider_mismatch'
  | 'chunk_error'
  | 'store_error'
  | 'embed_error';

export interface IndexFileResult {
  status: IndexFileStatus;
  /** Project-relative when the path is inside the project, as given otherwise */
  filePath: string;
  chunksIndexed?: number;
  message?: string;
}

export type RemoveFileStatus = 'removed' | 'not_in_project' | 'project_not_indexed' | 'store_error';

export interface RemoveFileResult {
  status: RemoveFileStatus;
  filePath: string;
  removedChunks?: number;
  message?: string;
}

export interface ListProjectsOptions {
  store?: VectorStore;
}

export interface IndexedProjectSummary {
  collection: string;
  projectPath: string;
  chunks: number;
  provider: string;
  model: string;
  dimensions: number;
}
