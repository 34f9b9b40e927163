import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { z } from 'zod';
import { registerIndexCommand } from './commands/index-cmd.js';
import { registerIndexFileCommand } from './commands/index-file-cmd.js';
import { registerProjectsCommand } from './commands/projects-cmd.js';
import { registerWatchCommand } from './commands/watch-cmd.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const raw: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  return PackageJsonSchema.parse(raw).version;
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();

  program
    .name('codesift')
    .description('Chunk source files and keep their embeddings current in a local vector store')
    .version(readPackageVersion());

  registerIndexCommand(program);
  registerIndexFileCommand(program);
  registerWatchCommand(program);
  registerProjectsCommand(program);

  if (!argv || argv.length <= 2) {
    program.help();
    return;
  }

  await program.parseAsync(argv);
}
