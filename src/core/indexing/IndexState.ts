import type { IndexError, IndexErrorStage, IndexStats, ProgressEvent } from '../types.js';

/**
 * IndexState tracks mutable state during the indexing process
 */
export class IndexState {
  readonly stats: IndexStats = {
    scanned: 0,
    indexed: 0,
    skipped: 0,
    failed: 0,
    removed: 0,
    chunksCreated: 0
  };
  readonly errors: IndexError[] = [];

  constructor(private readonly onProgress: ((event: ProgressEvent) => void) | null = null) {}

  setScanned(count: number): void {
    this.stats.scanned = count;
    this.emit({ type: 'scan_complete', fileCount: count });
  }

  markSkipped(file: string): void {
    this.stats.skipped++;
    this.emit({ type: 'file_skipped', file });
  }

  markIndexed(file: string, chunks: number): void {
    this.stats.indexed++;
    this.stats.chunksCreated += chunks;
    this.emit({ type: 'file_indexed', file, chunks });
  }

  /**
   * Record a per-file failure; the scan carries on
   */
  markFailed(file: string, stage: IndexErrorStage, error: string): void {
    this.stats.failed++;
    this.errors.push({ file, stage, error });
    this.emit({ type: 'file_failed', file, stage });
  }

  markRemoved(file: string): void {
    this.stats.removed++;
    this.emit({ type: 'file_removed', file });
  }

  private emit(event: ProgressEvent): void {
    this.onProgress?.(event);
  }
}
