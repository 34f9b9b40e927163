import test from 'node:test';
import assert from 'node:assert/strict';
import { SqliteVectorStore, decodeEmbedding, encodeEmbedding } from '../database/db.js';
import type { ChunkRecord, CollectionMetadata } from '../database/vector-store.js';

const metadata: CollectionMetadata = {
  project_path: '/work/demo',
  embedding_provider: 'mock',
  embedding_model: 'mock-embedding',
  embedding_dimensions: 2
};

function record(id: string, filePath: string, fileHash: string, startLine = 1): ChunkRecord {
  return {
    id,
    document: `contents of ${id}`,
    metadata: {
      file_path: filePath,
      start_line: startLine,
      end_line: startLine + 9,
      language: 'python',
      symbol_name: '',
      file_hash: fileHash,
      project_path: '/work/demo'
    },
    embedding: [0.5, -0.25]
  };
}

test('records round-trip with their embeddings', async (t) => {
  const store = new SqliteVectorStore(':memory:');
  t.after(() => store.close());

  const collection = await store.getOrCreateCollection('demo_1', metadata);
  await collection.upsert([record('a_0', 'a.py', 'h1'), record('a_1', 'a.py', 'h1', 11), record('b_0', 'b.py', 'h2')]);

  const stored = await collection.get({ file_path: 'a.py' });
  assert.deepStrictEqual(
    stored.map((entry) => entry.id),
    ['a_0', 'a_1']
  );
  assert.deepStrictEqual(Array.from(stored[0].embedding), [0.5, -0.25]);
  assert.equal(stored[1].metadata.start_line, 11);
  assert.equal(await collection.count(), 3);
  assert.equal(await collection.count({ file_path: 'a.py', file_hash: 'h1' }), 2);
  assert.equal(await collection.count({ file_path: 'a.py', file_hash: 'h9' }), 0);
});

test('upserting an existing id replaces the record', async (t) => {
  const store = new SqliteVectorStore(':memory:');
  t.after(() => store.close());
  const collection = await store.getOrCreateCollection('demo_1', metadata);

  await collection.upsert([record('a_0', 'a.py', 'h1')]);
  await collection.upsert([{ ...record('a_0', 'a.py', 'h2'), document: 'new text' }]);

  const [stored] = await collection.get();
  assert.equal(await collection.count(), 1);
  assert.equal(stored.document, 'new text');
  assert.equal(stored.metadata.file_hash, 'h2');
});

test('deleteWhere reports how many records went', async (t) => {
  const store = new SqliteVectorStore(':memory:');
  t.after(() => store.close());
  const collection = await store.getOrCreateCollection('demo_1', metadata);
  await collection.upsert([record('a_0', 'a.py', 'h1'), record('a_1', 'a.py', 'h1', 11), record('b_0', 'b.py', 'h2')]);

  assert.equal(await collection.deleteWhere({ file_path: 'a.py' }), 2);
  assert.equal(await collection.deleteWhere({ file_path: 'a.py' }), 0);
  assert.deepStrictEqual(await collection.fileHashes(), new Map([['b.py', 'h2']]));
});

test('collections keep their metadata and are listed with counts', async (t) => {
  const store = new SqliteVectorStore(':memory:');
  t.after(() => store.close());

  const first = await store.getOrCreateCollection('beta_2', metadata);
  await first.upsert([record('x_0', 'x.py', 'h')]);
  await store.getOrCreateCollection('alpha_1', { ...metadata, project_path: '/work/alpha' });

  const reopened = await store.getOrCreateCollection('beta_2', { ...metadata, embedding_dimensions: 99 });
  assert.equal(reopened.metadata.embedding_dimensions, 2);

  await reopened.modifyMetadata({ ...metadata, embedding_model: 'mock-embedding-v2' });
  const fetched = await store.getCollection('beta_2');
  assert.equal(fetched?.metadata.embedding_model, 'mock-embedding-v2');

  assert.deepStrictEqual(
    (await store.listCollections()).map(({ name, count }) => ({ name, count })),
    [
      { name: 'alpha_1', count: 0 },
      { name: 'beta_2', count: 1 }
    ]
  );

  assert.equal(await store.deleteCollection('beta_2'), true);
  assert.equal(await store.deleteCollection('beta_2'), false);
  assert.equal(await store.getCollection('beta_2'), null);
});

test('embeddings are encoded as little-endian float32', () => {
  const buffer = encodeEmbedding([1, -2]);
  assert.equal(buffer.length, 8);
  assert.equal(buffer.readFloatLE(0), 1);
  assert.equal(buffer.readFloatLE(4), -2);
  assert.deepStrictEqual(Array.from(decodeEmbedding(buffer)), [1, -2]);
  assert.equal(decodeEmbedding(null).length, 0);
  assert.equal(decodeEmbedding(Buffer.from([1, 2, 3])).length, 0);
});
