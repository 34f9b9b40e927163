import fg from 'fast-glob';
import fs from 'fs';
import path from 'path';
import type { IgnoreReason, IgnoreRules } from '../../indexer/ignore-rules.js';
import { getDefaultScanIgnores } from '../../utils/scan-patterns.js';

export interface ScannedFile {
  /** Project-relative, POSIX separators */
  relativePath: string;
  absolutePath: string;
  size: number;
}

export interface ScanResult {
  files: ScannedFile[];
  excluded: Record<IgnoreReason, number>;
}

/**
 * Lightweight helper responsible only for discovering files eligible for indexing.
 */
export class FileScanner {
  constructor(private readonly rules: IgnoreRules) {}

  async scan(repo: string): Promise<ScanResult> {
    const entries = await fg('**/*', {
      cwd: repo,
      absolute: false,
      followSymbolicLinks: false,
      ignore: getDefaultScanIgnores(),
      onlyFiles: true,
      dot: true
    });
    entries.sort();

    const files: ScannedFile[] = [];
    const excluded: Record<IgnoreReason, number> = {
      ignored_directory: 0,
      ignored_extension: 0,
      ignore_file: 0,
      too_large: 0
    };

    for (const rel of entries) {
      const absolutePath = path.join(repo, rel);
      let size: number;
      try {
        const stats = await fs.promises.stat(absolutePath);
        if (!stats.isFile()) continue;
        size = stats.size;
      } catch {
        // Removed between listing and stat
        continue;
      }

      const reason = this.rules.check(rel, size);
      if (reason) {
        excluded[reason]++;
        continue;
      }
      files.push({ relativePath: rel, absolutePath, size });
    }

    return { files, excluded };
  }
}
