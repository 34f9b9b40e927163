import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StoreError, getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import {
  CollectionMetadataSchema,
  FILTERABLE_KEYS,
  type ChunkRecord,
  type CollectionMetadata,
  type CollectionSummary,
  type MetadataFilter,
  type StoredChunkRecord,
  type VectorCollection,
  type VectorStore
} from './vector-store.js';

const DB_SCHEMA_VERSION = 1;

export function encodeEmbedding(embedding: ArrayLike<number>): Buffer {
  const buffer = Buffer.allocUnsafe(embedding.length * 4);
  for (let i = 0; i < embedding.length; i++) {
    buffer.writeFloatLE(Number(embedding[i]) || 0, i * 4);
  }
  return buffer;
}

export function decodeEmbedding(buffer: Buffer | null): Float32Array {
  if (!buffer || buffer.length < 4 || buffer.length % 4 !== 0) {
    return new Float32Array();
  }
  // Copy: the blob's offset is not guaranteed to be 4-byte aligned
  const vector = new Float32Array(buffer.length / 4);
  for (let i = 0; i < vector.length; i++) {
    vector[i] = buffer.readFloatLE(i * 4);
  }
  return vector;
}

interface CollectionRow {
  name: string;
  metadata: string;
}

interface ChunkRow {
  id: string;
  document: string;
  file_path: string;
  start_line: number;
  end_line: number;
  language: string;
  symbol_name: string;
  file_hash: string;
  project_path: string;
  embedding: Buffer | null;
}

interface ChunkParams {
  collection: string;
  id: string;
  document: string;
  file_path: string;
  start_line: number;
  end_line: number;
  language: string;
  symbol_name: string;
  file_hash: string;
  project_path: string;
  embedding: Buffer;
}

function parseCollectionMetadata(row: CollectionRow): CollectionMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(row.metadata);
  } catch (error) {
    throw new StoreError(`Collection ${row.name} has unreadable metadata`, { cause: error });
  }
  const parsed = CollectionMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreError(`Collection ${row.name} has invalid metadata: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

function whereClause(filter: MetadataFilter | undefined): { sql: string; values: string[] } {
  const clauses = ['collection = ?'];
  const values: string[] = [];
  if (filter) {
    for (const key of FILTERABLE_KEYS) {
      const value = filter[key];
      if (value !== undefined) {
        clauses.push(`${key} = ?`);
        values.push(value);
      }
    }
  }
  return { sql: clauses.join(' AND '), values };
}

/**
 * Wraps driver failures in StoreError so callers can tell them apart from
 * provider and chunking errors.
 */
function guard<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StoreError) throw error;
    log.error(`Vector store: failed to ${action}`, error);
    throw new StoreError(`Failed to ${action}: ${getErrorMessage(error)}`, { cause: error });
  }
}

class SqliteCollection implements VectorCollection {
  constructor(
    private readonly db: Database.Database,
    readonly name: string,
    private currentMetadata: CollectionMetadata
  ) {}

  get metadata(): CollectionMetadata {
    return this.currentMetadata;
  }

  async upsert(records: readonly ChunkRecord[]): Promise<void> {
    if (records.length === 0) return;

    guard('upsert records', () => {
      const stmt = this.db.prepare<ChunkParams>(`
        INSERT INTO chunk_records
          (collection, id, document, file_path, start_line, end_line, language, symbol_name,
           file_hash, project_path, embedding, updated_at)
        VALUES
          (@collection, @id, @document, @file_path, @start_line, @end_line, @language, @symbol_name,
           @file_hash, @project_path, @embedding, CURRENT_TIMESTAMP)
        ON CONFLICT(collection, id) DO UPDATE SET
          document = excluded.document,
          file_path = excluded.file_path,
          start_line = excluded.start_line,
          end_line = excluded.end_line,
          language = excluded.language,
          symbol_name = excluded.symbol_name,
          file_hash = excluded.file_hash,
          project_path = excluded.project_path,
          embedding = excluded.embedding,
          updated_at = CURRENT_TIMESTAMP
      `);

      const insertMany = this.db.transaction((batch: readonly ChunkRecord[]) => {
        for (const record of batch) {
          stmt.run({
            collection: this.name,
            id: record.id,
            document: record.document,
            ...record.metadata,
            embedding: encodeEmbedding(record.embedding)
          });
        }
      });
      insertMany(records);
    });
  }

  async deleteWhere(filter: MetadataFilter): Promise<number> {
    const { sql, values } = whereClause(filter);
    return guard('delete records', () => {
      const result = this.db.prepare<string[]>(`DELETE FROM chunk_records WHERE ${sql}`).run(this.name, ...values);
      return result.changes;
    });
  }

  async get(filter?: MetadataFilter): Promise<StoredChunkRecord[]> {
    const { sql, values } = whereClause(filter);
    const rows = guard('read records', () =>
      this.db
        .prepare<string[], ChunkRow>(`
          SELECT id, document, file_path, start_line, end_line, language, symbol_name,
                 file_hash, project_path, embedding
          FROM chunk_records
          WHERE ${sql}
          ORDER BY file_path, start_line, id
        `)
        .all(this.name, ...values)
    );

    return rows.map(row => ({
      id: row.id,
      document: row.document,
      metadata: {
        file_path: row.file_path,
        start_line: row.start_line,
        end_line: row.end_line,
        language: row.language,
        symbol_name: row.symbol_name,
        file_hash: row.file_hash,
        project_path: row.project_path
      },
      embedding: decodeEmbedding(row.embedding)
    }));
  }

  async count(filter?: MetadataFilter): Promise<number> {
    const { sql, values } = whereClause(filter);
    const row = guard('count records', () =>
      this.db.prepare<string[], { total: number }>(`SELECT COUNT(*) AS total FROM chunk_records WHERE ${sql}`).get(this.name, ...values)
    );
    return row?.total ?? 0;
  }

  async modifyMetadata(metadata: CollectionMetadata): Promise<void> {
    guard('update collection metadata', () => {
      this.db
        .prepare<[string, string]>('UPDATE collections SET metadata = ? WHERE name = ?')
        .run(JSON.stringify(metadata), this.name);
    });
    this.currentMetadata = metadata;
  }

  async fileHashes(): Promise<Map<string, string>> {
    const rows = guard('read file hashes', () =>
      this.db
        .prepare<[string], { file_path: string; file_hash: string }>(
          'SELECT file_path, MAX(file_hash) AS file_hash FROM chunk_records WHERE collection = ? GROUP BY file_path'
        )
        .all(this.name)
    );
    return new Map(rows.map(row => [row.file_path, row.file_hash]));
  }
}

/**
 * Thin wrapper around better-sqlite3 holding one collection per project.
 *
 * Embeddings are stored as little-endian Float32 blobs. Call `close()` when
 * finished to avoid leaking file handles.
 */
export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;

  constructor(readonly dbPath: string) {
    this.db = guard('open database', () => {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      return new Database(dbPath);
    });

    // WAL mode
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.ensureTablesExist();
  }

  private ensureTablesExist(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name TEXT PRIMARY KEY,
        metadata TEXT NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunk_records (
        collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
        id TEXT NOT NULL,
        document TEXT NOT NULL,
        file_path TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        end_line INTEGER NOT NULL,
        language TEXT NOT NULL,
        symbol_name TEXT NOT NULL DEFAULT '',
        file_hash TEXT NOT NULL,
        project_path TEXT NOT NULL,
        embedding BLOB,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (collection, id)
      )
    `);

    this.db.exec('CREATE INDEX IF NOT EXISTS idx_chunk_records_file ON chunk_records(collection, file_path)');
    this.db.pragma(`user_version = ${DB_SCHEMA_VERSION}`);
  }

  async getOrCreateCollection(name: string, metadata: CollectionMetadata): Promise<VectorCollection> {
    const existing = await this.getCollection(name);
    if (existing) {
      return existing;
    }

    guard('create collection', () => {
      this.db
        .prepare<[string, string]>('INSERT INTO collections (name, metadata) VALUES (?, ?)')
        .run(name, JSON.stringify(CollectionMetadataSchema.parse(metadata)));
    });
    log.debug('Created collection', { collection: name, provider: metadata.embedding_provider });
    return new SqliteCollection(this.db, name, metadata);
  }

  async getCollection(name: string): Promise<VectorCollection | null> {
    const row = guard('read collection', () =>
      this.db.prepare<[string], CollectionRow>('SELECT name, metadata FROM collections WHERE name = ?').get(name)
    );
    return row ? new SqliteCollection(this.db, row.name, parseCollectionMetadata(row)) : null;
  }

  async deleteCollection(name: string): Promise<boolean> {
    return guard('delete collection', () => {
      const drop = this.db.transaction((collection: string) => {
        this.db.prepare<[string]>('DELETE FROM chunk_records WHERE collection = ?').run(collection);
        return this.db.prepare<[string]>('DELETE FROM collections WHERE name = ?').run(collection).changes > 0;
      });
      return drop(name);
    });
  }

  async listCollections(): Promise<CollectionSummary[]> {
    const rows = guard('list collections', () =>
      this.db
        .prepare<[], CollectionRow & { total: number }>(`
          SELECT c.name AS name, c.metadata AS metadata, COUNT(r.id) AS total
          FROM collections c
          LEFT JOIN chunk_records r ON r.collection = c.name
          GROUP BY c.name
          ORDER BY c.name
        `)
        .all()
    );

    return rows.map(row => ({
      name: row.name,
      metadata: parseCollectionMetadata(row),
      count: row.total
    }));
  }

  async close(): Promise<void> {
    if (!this.db.open) return;
    try {
      this.db.close();
      log.debug('Database connection closed', { path: this.dbPath });
    } catch (error) {
      log.error('Failed to close database', error);
    }
  }
}

const openStores = new Map<string, SqliteVectorStore>();

/**
 * Shared store per database file, so the CLI and the watcher reuse one connection
 */
export function openDefaultStore(storePath: string): SqliteVectorStore {
  const resolved = storePath === ':memory:' ? storePath : path.resolve(storePath);
  let store = openStores.get(resolved);
  if (!store) {
    store = new SqliteVectorStore(resolved);
    openStores.set(resolved, store);
  }
  return store;
}

export async function closeDefaultStores(): Promise<void> {
  const stores = [...openStores.values()];
  openStores.clear();
  await Promise.all(stores.map(store => store.close()));
}
