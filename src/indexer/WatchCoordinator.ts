import path from 'path';
import { resolveEmbeddingOptions, resolveIndexingOptions } from '../config/resolver.js';
import { loadConfig } from '../config/loader.js';
import { indexFile, removeFile } from '../core/indexer.js';
import { resolveProjectRoot } from '../core/indexing/IndexContext.js';
import type { IndexFileResult, RemoveFileResult } from '../core/types.js';
import type { VectorStore } from '../database/vector-store.js';
import type { EmbeddingProvider } from '../providers/base.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { ChangeQueue, type Clock, type PendingChange, type Scheduler } from './ChangeQueue.js';
import { normalizeToProjectPath } from './fingerprint.js';
import { IgnoreRules } from './ignore-rules.js';
import { ProviderManager } from './ProviderManager.js';
import { createChokidarSource, type FileChangeEvent, type WatchSource, type WatchSourceFactory } from './WatchService.js';

/**
 * What the coordinator does with a settled write or a deletion
 */
export interface WatchIndexOperations {
  indexFile(projectPath: string, filePath: string): Promise<IndexFileResult>;
  removeFile(projectPath: string, filePath: string): Promise<RemoveFileResult>;
}

export interface WatchCoordinatorOptions {
  debounceMs?: number;
  scheduler?: Scheduler;
  clock?: Clock;
  sourceFactory?: WatchSourceFactory;
  operations?: WatchIndexOperations;
  /** Used by the default operations */
  provider?: string;
  store?: VectorStore;
}

export type WatchStartResult =
  | { status: 'watching' | 'already_watching'; projectPath: string }
  | { status: 'error'; projectPath: string; message: string };

export interface WatchStopResult {
  status: 'stopped' | 'not_watching';
  projectPath: string;
}

export type WatchState = 'idle' | 'watching' | 'pending' | 'flushing';

interface WatchedProject {
  root: string;
  rules: IgnoreRules;
  source: WatchSource;
}

/**
 * Index operations backed by the real indexer, one provider per project config
 */
export class DefaultWatchOperations implements WatchIndexOperations {
  private readonly managers = new Map<string, ProviderManager>();

  constructor(
    private readonly providerName?: string,
    private readonly store?: VectorStore
  ) {}

  async indexFile(projectPath: string, filePath: string): Promise<IndexFileResult> {
    let manager = this.managers.get(projectPath);
    if (!manager) {
      manager = new ProviderManager(this.providerName, resolveEmbeddingOptions(loadConfig(projectPath)));
      this.managers.set(projectPath, manager);
    }

    let embeddingProvider: EmbeddingProvider;
    try {
      embeddingProvider = await manager.getProvider();
    } catch (error) {
      return { status: 'embed_error', filePath, message: getErrorMessage(error) };
    }
    return indexFile({ projectPath, filePath, store: this.store, embeddingProvider });
  }

  removeFile(projectPath: string, filePath: string): Promise<RemoveFileResult> {
    return removeFile({ projectPath, filePath, store: this.store });
  }

  release(projectPath: string): void {
    this.managers.get(projectPath)?.cleanup();
    this.managers.delete(projectPath);
  }
}

/**
 * Keeps the indexes of watched projects current.
 *
 * Writes from every project go into one shared ChangeQueue, so a burst of events
 * on a file produces a single `indexFile` call once the debounce delay passes.
 * Deletions skip the queue and remove the file's records right away, after any
 * flush that is still updating the same file.
 */
export class WatchCoordinator {
  private readonly projects = new Map<string, WatchedProject>();
  private readonly deletions = new Set<Promise<void>>();
  private readonly queue: ChangeQueue;
  private readonly sourceFactory: WatchSourceFactory;
  private readonly operations: WatchIndexOperations;

  constructor(options: WatchCoordinatorOptions = {}) {
    this.sourceFactory = options.sourceFactory ?? createChokidarSource;
    this.operations = options.operations ?? new DefaultWatchOperations(options.provider, options.store);
    this.queue = new ChangeQueue({
      debounceMs: options.debounceMs,
      scheduler: options.scheduler,
      clock: options.clock,
      onChange: (filePath, change) => this.applyChange(filePath, change)
    });
  }

  async startWatch(projectPath: string): Promise<WatchStartResult> {
    const requested = path.resolve(projectPath);
    if (this.projects.has(requested)) {
      return { status: 'already_watching', projectPath: requested };
    }

    let root: string;
    let rules: IgnoreRules;
    try {
      root = await resolveProjectRoot(requested);
      const indexing = resolveIndexingOptions(loadConfig(root));
      rules = IgnoreRules.load(root, { maxFileSize: indexing.maxFileSize, patterns: indexing.ignorePatterns });
    } catch (error) {
      return { status: 'error', projectPath: requested, message: getErrorMessage(error) };
    }

    let source: WatchSource;
    try {
      source = this.sourceFactory(
        root,
        event => this.handleEvent(root, event),
        error => log.error('Watch error', error, { project: root })
      );
    } catch (error) {
      return { status: 'error', projectPath: root, message: getErrorMessage(error) };
    }
    const project: WatchedProject = { root, rules, source };
    this.projects.set(root, project);

    try {
      await source.ready;
    } catch (error) {
      this.projects.delete(root);
      await this.closeSource(project);
      return { status: 'error', projectPath: root, message: getErrorMessage(error) };
    }

    log.info('Watching project', { project: root, debounceMs: this.queue.delayMs });
    return { status: 'watching', projectPath: root };
  }

  async stopWatch(projectPath: string): Promise<WatchStopResult> {
    const root = path.resolve(projectPath);
    const project = this.projects.get(root);
    if (!project) {
      return { status: 'not_watching', projectPath: root };
    }

    this.projects.delete(root);
    await this.closeSource(project);
    const dropped = await this.queue.discardProject(root);
    if (this.projects.size === 0) {
      this.queue.cancel();
    }
    if (this.operations instanceof DefaultWatchOperations) {
      this.operations.release(root);
    }

    log.info('Stopped watching project', { project: root, droppedChanges: dropped });
    return { status: 'stopped', projectPath: root };
  }

  async stopAll(): Promise<number> {
    let stopped = 0;
    for (const root of [...this.projects.keys()]) {
      const result = await this.stopWatch(root);
      if (result.status === 'stopped') stopped++;
    }
    return stopped;
  }

  listWatched(): string[] {
    return [...this.projects.keys()].sort();
  }

  getState(projectPath: string): WatchState {
    const root = path.resolve(projectPath);
    if (!this.projects.has(root)) return 'idle';
    if (this.queue.isFlushing(root)) return 'flushing';
    if (this.queue.hasPending(root)) return 'pending';
    return 'watching';
  }

  /**
   * Index everything pending now instead of waiting for the timer
   */
  async flush(): Promise<void> {
    await this.queue.flush();
    await this.whenIdle();
  }

  async whenIdle(): Promise<void> {
    await this.queue.whenIdle();
    while (this.deletions.size > 0) {
      await Promise.all(this.deletions);
    }
  }

  private handleEvent(root: string, event: FileChangeEvent): void {
    const project = this.projects.get(root);
    if (!project || event.isDirectory) return;

    const rel = normalizeToProjectPath(root, event.path);
    if (rel === null || project.rules.isIgnored(rel)) return;
    const absolute = path.join(root, rel);

    if (event.kind === 'deleted') {
      this.startDeletion(root, absolute, rel);
      return;
    }

    this.queue.enqueue(root, absolute).catch(error => {
      log.error('Could not queue change', error, { file: rel });
    });
  }

  private startDeletion(root: string, absolute: string, rel: string): void {
    // A flush already updating this file has to finish first, or its upsert
    // would restore the records removed here
    const task = this.queue
      .discardFile(absolute)
      .then(() => this.queue.whenSettled(absolute))
      .then(() => this.operations.removeFile(root, absolute))
      .then(
        result => {
          if (result.status === 'store_error') {
            log.error('Could not remove deleted file', result.message, { file: rel });
          } else {
            log.debug('Deleted file handled', { file: rel, status: result.status });
          }
        },
        error => {
          log.error('Could not remove deleted file', error, { file: rel });
        }
      )
      .finally(() => {
        this.deletions.delete(task);
      });
    this.deletions.add(task);
  }

  private async applyChange(filePath: string, change: PendingChange): Promise<void> {
    const result = await this.operations.indexFile(change.projectPath, filePath);
    switch (result.status) {
      case 'success':
        log.info('Reindexed file', { file: result.filePath, chunks: result.chunksIndexed ?? 0 });
        break;
      case 'provider_mismatch':
        log.warn('Skipped file: provider mismatch', { file: result.filePath, detail: result.message ?? '' });
        break;
      case 'read_error':
      case 'chunk_error':
      case 'store_error':
      case 'embed_error':
        log.error('Could not reindex file', result.message, { file: result.filePath, status: result.status });
        break;
      default:
        log.debug('Watched file not indexed', { file: result.filePath, status: result.status });
    }
  }

  private async closeSource(project: WatchedProject): Promise<void> {
    try {
      await project.source.close();
    } catch (error) {
      log.warn('Could not close watcher', { project: project.root, error: getErrorMessage(error) });
    }
  }
}

export function createWatchCoordinator(options: WatchCoordinatorOptions = {}): WatchCoordinator {
  return new WatchCoordinator(options);
}
