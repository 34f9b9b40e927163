import chalk from 'chalk';
import { Command } from 'commander';
import { closeDefaultStores } from '../../database/db.js';
import { listIndexedProjects } from '../../core/indexer.js';
import { print } from '../../utils/logger.js';

export function registerProjectsCommand(program: Command): void {
  program
    .command('projects')
    .description('List indexed projects')
    .action(async (): Promise<void> => {
      try {
        const projects = await listIndexedProjects();
        if (projects.length === 0) {
          print('No indexed projects');
          print(chalk.gray('TIP: Run "codesift index" in a project to index it'));
          return;
        }

        for (const project of projects) {
          print(chalk.bold(project.projectPath));
          print(`  ${project.collection}: ${project.chunks} chunks, ${project.provider}/${project.model} (${project.dimensions} dims)`);
        }
      } finally {
        await closeDefaultStores();
      }
    });
}
