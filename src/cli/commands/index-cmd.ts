import chalk from 'chalk';
import { Command } from 'commander';
import { closeDefaultStores } from '../../database/db.js';
import { indexProject } from '../../core/indexer.js';
import type { ProgressEvent } from '../../core/types.js';
import { print } from '../../utils/logger.js';

interface IndexCommandOptions {
  provider?: string;
  reindex?: boolean;
  verbose?: boolean;
}

export function registerIndexCommand(program: Command): void {
  program
    .command('index [path]')
    .description('Index every eligible file of a project')
    .option('-p, --provider <provider>', 'embedding provider (auto|openai|ollama|mock)')
    .option('--reindex', 'drop the collection and embed every file again')
    .option('--verbose', 'print every file as it is processed')
    .action(async (projectPath: string = '.', options: IndexCommandOptions): Promise<void> => {
      const onProgress = options.verbose
        ? (event: ProgressEvent): void => {
            switch (event.type) {
              case 'scan_complete':
                print(chalk.gray(`Found ${event.fileCount} files`));
                break;
              case 'file_indexed':
                print(`${chalk.green('+')} ${event.file} (${event.chunks} chunks)`);
                break;
              case 'file_failed':
                print(`${chalk.red('!')} ${event.file} [${event.stage}]`);
                break;
              case 'file_removed':
                print(`${chalk.yellow('-')} ${event.file}`);
                break;
              case 'file_skipped':
                break;
            }
          }
        : null;

      try {
        const result = await indexProject({
          repoPath: projectPath,
          provider: options.provider,
          forceFullRebuild: options.reindex === true,
          onProgress
        });

        if (!result.success) {
          print(chalk.red(`Indexing failed [${result.error.code}]: ${result.error.message}`));
          process.exitCode = 1;
          return;
        }

        const { stats } = result;
        print(chalk.bold(`Indexed ${result.projectPath}`));
        print(`  collection: ${result.collection} (${result.provider})`);
        print(
          `  scanned ${stats.scanned}, indexed ${chalk.green(stats.indexed)}, unchanged ${stats.skipped}, ` +
            `removed ${stats.removed}, failed ${stats.failed > 0 ? chalk.red(stats.failed) : 0}`
        );
        print(`  chunks written: ${stats.chunksCreated}`);
        for (const error of result.errors) {
          print(chalk.red(`  ${error.file} [${error.stage}]: ${error.error}`));
        }
        if (stats.failed > 0) process.exitCode = 1;
      } finally {
        await closeDefaultStores();
      }
    });
}
