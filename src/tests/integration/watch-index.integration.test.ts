import assert from 'node:assert/strict';
import { afterEach, beforeEach, test } from 'node:test';
import { indexFile, indexProject, removeFile } from '../../core/indexer.js';
import { SqliteVectorStore } from '../../database/db.js';
import { collectionName } from '../../indexer/fingerprint.js';
import { createWatchCoordinator, type WatchCoordinator, type WatchIndexOperations } from '../../indexer/WatchCoordinator.js';
import { MockEmbeddingProvider } from '../../providers/mock.js';
import { createFakeSources, type FakeWatchSource } from '../helpers/fake-watch-source.js';
import { ManualScheduler } from '../helpers/manual-scheduler.js';
import {
  createTempRepo,
  isolateEnvironment,
  removeRepoFile,
  settle,
  writeRepoFile,
  type TempRepo
} from '../helpers/test-repo.js';

let repo: TempRepo;
let store: SqliteVectorStore;
let scheduler: ManualScheduler;
let coordinator: WatchCoordinator;
let source: FakeWatchSource;
let restoreEnv: () => Promise<void>;

async function documents(): Promise<Array<[string, string]>> {
  const collection = await store.getCollection(collectionName(repo.root));
  assert.ok(collection);
  return (await collection.get()).map((record) => [record.metadata.file_path, record.document]);
}

beforeEach(async () => {
  restoreEnv = await isolateEnvironment();
  repo = await createTempRepo({
    'a.py': 'def a():\n    return 1\n',
    'b.py': 'def b():\n    return 2\n'
  });
  store = new SqliteVectorStore(':memory:');
  const indexed = await indexProject({ repoPath: repo.root, provider: 'mock', store });
  assert.equal(indexed.success, true);

  scheduler = new ManualScheduler();
  const fakes = createFakeSources();
  coordinator = createWatchCoordinator({
    debounceMs: 100,
    scheduler,
    clock: scheduler.clock,
    sourceFactory: fakes.factory,
    provider: 'mock',
    store
  });
  assert.deepStrictEqual(await coordinator.startWatch(repo.root), { status: 'watching', projectPath: repo.root });
  const created = fakes.sources.get(repo.root);
  assert.ok(created);
  source = created;
});

afterEach(async () => {
  await coordinator.stopAll();
  await store.close();
  await repo.cleanup();
  await restoreEnv();
});

test('a saved file is reindexed once the writes settle', async () => {
  await writeRepoFile(repo.root, 'a.py', 'def a():\n    return 100\n');
  source.emit('modified', 'a.py');
  source.emit('modified', 'a.py');
  await settle();

  scheduler.advance(100);
  await coordinator.whenIdle();

  assert.deepStrictEqual(await documents(), [
    ['a.py', 'def a():\n    return 100\n'],
    ['b.py', 'def b():\n    return 2\n']
  ]);
});

test('a deleted file loses its records right away', async () => {
  await removeRepoFile(repo.root, 'b.py');
  source.emit('deleted', 'b.py');
  await coordinator.whenIdle();

  assert.deepStrictEqual(await documents(), [['a.py', 'def a():\n    return 1\n']]);
  assert.equal(scheduler.scheduledCount, 0);
});

test('a new file is indexed on flush', async () => {
  await writeRepoFile(repo.root, 'pkg/c.py', 'def c():\n    return 3\n');
  source.emit('created', 'pkg/c.py');
  await settle();
  assert.equal(coordinator.getState(repo.root), 'pending');

  await coordinator.flush();

  assert.deepStrictEqual(await documents(), [
    ['a.py', 'def a():\n    return 1\n'],
    ['b.py', 'def b():\n    return 2\n'],
    ['pkg/c.py', 'def c():\n    return 3\n']
  ]);
  assert.equal(coordinator.getState(repo.root), 'watching');
});

/**
 * Mock provider whose embedding calls wait until `release` is called
 */
class HeldProvider extends MockEmbeddingProvider {
  private resolveEntered: () => void = () => {};
  private resolveRelease: () => void = () => {};
  readonly entered = new Promise<void>(resolve => {
    this.resolveEntered = resolve;
  });
  private readonly released = new Promise<void>(resolve => {
    this.resolveRelease = resolve;
  });

  release(): void {
    this.resolveRelease();
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    this.resolveEntered();
    await this.released;
    return super.generateEmbeddings(texts);
  }
}

test('a file deleted while it is being reindexed ends with no records', async () => {
  const provider = new HeldProvider();
  const operations: WatchIndexOperations = {
    indexFile: (projectPath, filePath) => indexFile({ projectPath, filePath, store, embeddingProvider: provider }),
    removeFile: (projectPath, filePath) => removeFile({ projectPath, filePath, store })
  };
  const fakes = createFakeSources();
  const held = createWatchCoordinator({
    debounceMs: 100,
    scheduler,
    clock: scheduler.clock,
    sourceFactory: fakes.factory,
    operations
  });
  await coordinator.stopAll();
  await held.startWatch(repo.root);
  const heldSource = fakes.sources.get(repo.root);
  assert.ok(heldSource);

  await writeRepoFile(repo.root, 'a.py', 'def a():\n    return 100\n');
  heldSource.emit('modified', 'a.py');
  await settle();
  scheduler.advance(100);
  await provider.entered;

  await removeRepoFile(repo.root, 'a.py');
  heldSource.emit('deleted', 'a.py');
  await settle();
  provider.release();
  await held.whenIdle();
  await held.stopAll();

  assert.deepStrictEqual(await documents(), [['b.py', 'def b():\n    return 2\n']]);
});
