import chalk from 'chalk';
import { Command } from 'commander';
import { closeDefaultStores } from '../../database/db.js';
import { indexFile } from '../../core/indexer.js';
import type { IndexFileStatus } from '../../core/types.js';
import { print } from '../../utils/logger.js';

interface IndexFileCommandOptions {
  project: string;
  provider?: string;
}

const FAILURES: ReadonlySet<IndexFileStatus> = new Set<IndexFileStatus>([
  'read_error',
  'project_not_indexed',
  'provider_mismatch',
  'chunk_error',
  'store_error',
  'embed_error'
]);

export function registerIndexFileCommand(program: Command): void {
  program
    .command('index-file <file>')
    .description('Re-chunk and re-embed a single file of an indexed project')
    .option('--project <path>', 'project root', '.')
    .option('-p, --provider <provider>', 'embedding provider (auto|openai|ollama|mock)')
    .action(async (file: string, options: IndexFileCommandOptions): Promise<void> => {
      try {
        const result = await indexFile({ projectPath: options.project, filePath: file, provider: options.provider });
        const detail = result.message ? `: ${result.message}` : '';

        if (result.status === 'success') {
          print(chalk.green(`${result.filePath}: ${result.chunksIndexed ?? 0} chunks indexed`));
        } else if (FAILURES.has(result.status)) {
          print(chalk.red(`${result.filePath}: ${result.status}${detail}`));
          process.exitCode = 1;
        } else {
          print(chalk.yellow(`${result.filePath}: ${result.status}${detail}`));
        }
      } finally {
        await closeDefaultStores();
      }
    });
}
