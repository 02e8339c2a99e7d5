#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { MineCommand } from './commands/mine';
import { SearchCommand } from './commands/search';

function createProgram(): Command {
  const program = new Command();

  program
    .name('lint-miner')
    .description('Mine the history of linter violations across the commits of Git repositories')
    .version('1.0.0');

  new MineCommand(program).register();
  new SearchCommand(program).register();

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
}

export { createProgram };
