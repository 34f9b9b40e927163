export { indexProject, indexFile, removeFile, listIndexedProjects } from './core/indexer.js';
export type * from './core/types.js';

export {
  WatchCoordinator,
  DefaultWatchOperations,
  createWatchCoordinator,
  type WatchCoordinatorOptions,
  type WatchIndexOperations,
  type WatchStartResult,
  type WatchStopResult,
  type WatchState
} from './indexer/WatchCoordinator.js';
export { ChangeQueue, timerScheduler, type Clock, type Scheduler, type ScheduledTask } from './indexer/ChangeQueue.js';
export {
  createChokidarSource,
  type FileChangeEvent,
  type FileChangeKind,
  type WatchSource,
  type WatchSourceFactory
} from './indexer/WatchService.js';
export { computeFingerprint, collectionName, chunkId } from './indexer/fingerprint.js';
export { IgnoreRules, type IgnoreReason } from './indexer/ignore-rules.js';

export { ChunkerRegistry, createChunkerRegistry, createPatternDetectors, createAstDetectors } from './chunking/registry.js';
export { SlidingWindowDetector, slidingWindowSpans } from './chunking/sliding-window.js';
export { PythonDetector } from './chunking/detectors/python.js';
export { JavaScriptDetector } from './chunking/detectors/javascript.js';
export { KotlinDetector } from './chunking/detectors/kotlin.js';
export { JavaDetector } from './chunking/detectors/java.js';
export { SqlDetector } from './chunking/detectors/sql.js';
export { TreeSitterDetector } from './chunking/detectors/tree-sitter.js';
export type { BoundaryDetector, Chunk, DeclarationSpan } from './chunking/types.js';

export { SqliteVectorStore } from './database/db.js';
export type * from './database/vector-store.js';

export {
  EmbeddingProvider,
  MockEmbeddingProvider,
  OllamaProvider,
  OpenAIProvider,
  createEmbeddingProvider,
  resolveEmbeddingProvider
} from './providers/index.js';

export {
  CodesiftError,
  NotADirectoryError,
  ProviderMismatchError,
  ProviderUnavailableError,
  StoreError,
  type CodesiftErrorCode
} from './utils/error-utils.js';
