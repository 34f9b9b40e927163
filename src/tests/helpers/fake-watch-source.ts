import path from 'path';
import type { FileChangeEvent, FileChangeKind, WatchSource, WatchSourceFactory } from '../../indexer/WatchService.js';

export class FakeWatchSource implements WatchSource {
  readonly ready = Promise.resolve();
  closed = false;

  constructor(
    readonly root: string,
    private readonly onEvent: (event: FileChangeEvent) => void
  ) {}

  emit(kind: FileChangeKind, relativePath: string, isDirectory = false): void {
    if (this.closed) return;
    this.onEvent({ kind, path: path.join(this.root, relativePath), isDirectory });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Factory that records the source it creates for each root
 */
export function createFakeSources(): { factory: WatchSourceFactory; sources: Map<string, FakeWatchSource> } {
  const sources = new Map<string, FakeWatchSource>();
  const factory: WatchSourceFactory = (root, onEvent) => {
    const source = new FakeWatchSource(root, onEvent);
    sources.set(root, source);
    return source;
  };
  return { factory, sources };
}
