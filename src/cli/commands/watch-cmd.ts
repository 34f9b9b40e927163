import chalk from 'chalk';
import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { resolveDebounceMs } from '../../config/resolver.js';
import { closeDefaultStores } from '../../database/db.js';
import { createWatchCoordinator } from '../../indexer/WatchCoordinator.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';

interface WatchCommandOptions {
  provider?: string;
  debounce?: string;
}

export function registerWatchCommand(program: Command): void {
  program
    .command('watch [paths...]')
    .description('Watch projects and reindex files as they change')
    .option('-p, --provider <provider>', 'embedding provider (auto|openai|ollama|mock)')
    .option('-d, --debounce <ms>', 'delay after the last change before reindexing')
    .action(async (paths: string[], options: WatchCommandOptions): Promise<void> => {
      const roots = paths.length > 0 ? paths : ['.'];
      const requested = options.debounce === undefined ? undefined : Number.parseInt(options.debounce, 10);
      const debounceMs = resolveDebounceMs(
        loadConfig(roots[0]),
        requested !== undefined && Number.isFinite(requested) ? requested : undefined
      );

      const coordinator = createWatchCoordinator({ debounceMs, provider: options.provider });

      for (const root of roots) {
        const result = await coordinator.startWatch(root);
        if (result.status === 'error') {
          print(chalk.red(`Cannot watch ${result.projectPath}: ${result.message}`));
        } else {
          print(`${chalk.green('Watching')} ${result.projectPath}`);
        }
      }

      if (coordinator.listWatched().length === 0) {
        process.exitCode = 1;
        return;
      }
      print(chalk.gray(`Debounce: ${debounceMs}ms. Press Ctrl+C to stop.`));

      await new Promise<void>(resolve => {
        const shutdown = (): void => {
          process.off('SIGINT', shutdown);
          process.off('SIGTERM', shutdown);
          print('\nStopping watchers...');
          coordinator
            .flush()
            .then(() => coordinator.stopAll())
            .then(stopped => print(`Stopped ${stopped} watcher(s)`))
            .catch((error: unknown) => print(chalk.red(`Shutdown failed: ${getErrorMessage(error)}`)))
            .finally(() => resolve());
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
      });

      await closeDefaultStores();
    });
}
