import { z } from 'zod';

/**
 * Metadata persisted with every chunk record. Keys are snake_case on disk.
 */
export interface ChunkMetadata {
  file_path: string;
  start_line: number;
  end_line: number;
  language: string;
  /** Empty string when the chunk has no symbol */
  symbol_name: string;
  file_hash: string;
  project_path: string;
}

export interface ChunkRecord {
  id: string;
  document: string;
  metadata: ChunkMetadata;
  embedding: ArrayLike<number>;
}

export interface StoredChunkRecord extends ChunkRecord {
  embedding: Float32Array;
}

export const CollectionMetadataSchema = z.object({
  project_path: z.string(),
  embedding_provider: z.string(),
  embedding_model: z.string(),
  embedding_dimensions: z.number().int().positive()
});

export type CollectionMetadata = z.infer<typeof CollectionMetadataSchema>;

/**
 * Equality filter over the indexed metadata columns
 */
export type MetadataFilter = Partial<Pick<ChunkMetadata, 'file_path' | 'language' | 'file_hash' | 'symbol_name'>>;

export const FILTERABLE_KEYS = ['file_path', 'language', 'file_hash', 'symbol_name'] as const satisfies ReadonlyArray<
  keyof MetadataFilter
>;

export interface CollectionSummary {
  name: string;
  metadata: CollectionMetadata;
  count: number;
}

export interface VectorCollection {
  readonly name: string;
  readonly metadata: CollectionMetadata;
  upsert(records: readonly ChunkRecord[]): Promise<void>;
  /** Returns the number of records removed */
  deleteWhere(filter: MetadataFilter): Promise<number>;
  get(filter?: MetadataFilter): Promise<StoredChunkRecord[]>;
  count(filter?: MetadataFilter): Promise<number>;
  modifyMetadata(metadata: CollectionMetadata): Promise<void>;
  /** `file_path` to `file_hash` for every file with records */
  fileHashes(): Promise<Map<string, string>>;
}

export interface VectorStore {
  getOrCreateCollection(name: string, metadata: CollectionMetadata): Promise<VectorCollection>;
  getCollection(name: string): Promise<VectorCollection | null>;
  /** Returns false when there was no such collection */
  deleteCollection(name: string): Promise<boolean>;
  listCollections(): Promise<CollectionSummary[]>;
  close(): Promise<void>;
}
