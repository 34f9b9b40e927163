import path from 'path';
import { resolveRuntimeOptions } from '../config/resolver.js';
import { openDefaultStore } from '../database/db.js';
import { CodesiftError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { IndexerEngine } from './IndexerEngine.js';
import { SingleFileUpdater } from './indexing/SingleFileUpdater.js';
import type {
  IndexFileOptions,
  IndexFileResult,
  IndexProjectOptions,
  IndexProjectResult,
  IndexedProjectSummary,
  ListProjectsOptions,
  RemoveFileResult
} from './types.js';

/**
 * Indexes every eligible file of a project into its vector collection.
 *
 * Unchanged files are skipped by fingerprint, files gone from disk lose their
 * records, and per-file problems are collected in `errors` without stopping
 * the scan. A missing root, an unreachable provider or a provider that differs
 * from the one the collection was built with yields `success: false`.
 *
 * @example
 * await indexProject({ repoPath: '/path/to/repo', provider: 'ollama' });
 */
export async function indexProject(options: IndexProjectOptions = {}): Promise<IndexProjectResult> {
  const engine = new IndexerEngine(options);
  try {
    return await engine.index();
  } catch (error) {
    if (!(error instanceof CodesiftError)) throw error;
    log.error('Indexing failed', error, { code: error.code });
    return {
      success: false,
      projectPath: engine.resolvedProjectPath ?? path.resolve(options.repoPath ?? '.'),
      stats: { ...engine.state.stats },
      errors: [...engine.state.errors],
      error: { code: error.code, message: error.message }
    };
  }
}

/**
 * Re-chunks and re-embeds a single file of an indexed project.
 */
export async function indexFile(options: IndexFileOptions): Promise<IndexFileResult> {
  return new SingleFileUpdater(options).index();
}

/**
 * Drops every record of a single file.
 */
export async function removeFile(options: IndexFileOptions): Promise<RemoveFileResult> {
  return new SingleFileUpdater(options).remove();
}

export async function listIndexedProjects(options: ListProjectsOptions = {}): Promise<IndexedProjectSummary[]> {
  const store = options.store ?? openDefaultStore(resolveRuntimeOptions(process.cwd()).storePath);
  const collections = await store.listCollections();
  return collections
    .map(({ name, metadata, count }) => ({
      collection: name,
      projectPath: metadata.project_path,
      chunks: count,
      provider: metadata.embedding_provider,
      model: metadata.embedding_model,
      dimensions: metadata.embedding_dimensions
    }))
    .sort((a, b) => a.projectPath.localeCompare(b.projectPath));
}
