import fs from 'fs';
import ignore from 'ignore';
import path from 'path';
import { INDEXING_CONSTANTS } from '../config/constants.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { getIgnoreDefaults } from '../utils/scan-patterns.js';

export type IgnoreReason = 'ignored_directory' | 'ignored_extension' | 'ignore_file' | 'too_large';

type IgnorePredicate = (relativePath: string, size: number | undefined) => IgnoreReason | null;

export interface IgnoreRulesOptions {
  maxFileSize?: number;
  /** Extra .gitignore-style patterns */
  patterns?: string[];
}

/**
 * Ordered exclusion predicates for one project. The first predicate that matches
 * decides the reason.
 */
export class IgnoreRules {
  private readonly predicates: IgnorePredicate[];

  constructor(
    private readonly directories: ReadonlySet<string>,
    private readonly extensions: readonly string[],
    private readonly matcher: ReturnType<typeof ignore>,
    readonly maxFileSize: number
  ) {
    this.predicates = [
      rel => (this.inIgnoredDirectory(rel) ? 'ignored_directory' : null),
      rel => (this.hasIgnoredExtension(rel) ? 'ignored_extension' : null),
      rel => (this.matcher.ignores(rel) ? 'ignore_file' : null),
      (_rel, size) => (size !== undefined && size > this.maxFileSize ? 'too_large' : null)
    ];
  }

  static load(projectRoot: string, options: IgnoreRulesOptions = {}): IgnoreRules {
    const defaults = getIgnoreDefaults();
    const matcher = ignore();

    const gitignorePath = path.join(projectRoot, '.gitignore');
    try {
      if (fs.existsSync(gitignorePath)) {
        matcher.add(fs.readFileSync(gitignorePath, 'utf8'));
      }
    } catch (error) {
      log.warn('Could not read .gitignore', { path: gitignorePath, error: getErrorMessage(error) });
    }
    if (options.patterns?.length) {
      matcher.add(options.patterns);
    }

    return new IgnoreRules(
      new Set(defaults.directories),
      defaults.extensions.map(ext => ext.toLowerCase()),
      matcher,
      options.maxFileSize ?? INDEXING_CONSTANTS.MAX_FILE_SIZE_BYTES
    );
  }

  /**
   * Reason `relativePath` (POSIX, project-relative) is excluded, or null. The size
   * ceiling only applies when `size` is given.
   */
  check(relativePath: string, size?: number): IgnoreReason | null {
    if (relativePath === '' || relativePath.startsWith('../')) {
      return 'ignored_directory';
    }
    for (const predicate of this.predicates) {
      const reason = predicate(relativePath, size);
      if (reason) return reason;
    }
    return null;
  }

  isIgnored(relativePath: string, size?: number): boolean {
    return this.check(relativePath, size) !== null;
  }

  inIgnoredDirectory(relativePath: string): boolean {
    const segments = relativePath.split('/');
    return segments.slice(0, -1).some(segment => this.directories.has(segment));
  }

  isIgnoredDirectoryName(name: string): boolean {
    return this.directories.has(name);
  }

  private hasIgnoredExtension(relativePath: string): boolean {
    const lower = relativePath.toLowerCase();
    return this.extensions.some(ext => lower.endsWith(ext));
  }
}
