import chokidar from 'chokidar';
import path from 'path';
import { WATCHER_CONSTANTS } from '../config/constants.js';
import { getIgnoredDirectoryNames } from '../utils/scan-patterns.js';

export type FileChangeKind = 'created' | 'modified' | 'deleted';

export interface FileChangeEvent {
  kind: FileChangeKind;
  /** Absolute path */
  path: string;
  isDirectory: boolean;
}

export interface WatchSource {
  /** Resolves once the initial crawl is done */
  ready: Promise<void>;
  close(): Promise<void>;
}

export type WatchSourceFactory = (
  root: string,
  onEvent: (event: FileChangeEvent) => void,
  onError: (error: Error) => void
) => WatchSource;

/**
 * Recursive chokidar subscription on `root`. Existing files are not reported and
 * writes are reported once they settle.
 */
export const createChokidarSource: WatchSourceFactory = (root, onEvent, onError) => {
  const ignoredNames = getIgnoredDirectoryNames();
  const isIgnored = (candidate: string): boolean => {
    const rel = path.relative(root, candidate);
    if (!rel || rel.startsWith('..')) return false;
    return rel.split(path.sep).some(segment => ignoredNames.has(segment));
  };

  const watcher = chokidar.watch(root, {
    ignoreInitial: true,
    ignored: isIgnored,
    persistent: true,
    awaitWriteFinish: {
      stabilityThreshold: WATCHER_CONSTANTS.STABILITY_THRESHOLD_MS,
      pollInterval: WATCHER_CONSTANTS.POLL_INTERVAL_MS
    }
  });

  const emit = (kind: FileChangeKind, isDirectory: boolean) => (file: string) => {
    onEvent({ kind, path: path.resolve(root, file), isDirectory });
  };

  watcher.on('add', emit('created', false));
  watcher.on('change', emit('modified', false));
  watcher.on('unlink', emit('deleted', false));
  watcher.on('addDir', emit('created', true));
  watcher.on('unlinkDir', emit('deleted', true));
  watcher.on('error', error => onError(error instanceof Error ? error : new Error(String(error))));

  const ready = new Promise<void>(resolve => {
    watcher.once('ready', () => resolve());
  });

  return {
    ready,
    close: () => watcher.close()
  };
};
