#!/usr/bin/env node

// Точка входа CLI.
import { Command } from 'commander';
import { indexCommand } from './commands/index-cmd.js';
import { initCommand } from './commands/init.js';
import { resetCommand } from './commands/reset-cmd.js';
import { searchCommand } from './commands/search-cmd.js';
import { serveCommand } from './commands/serve-cmd.js';
import { statsCommand } from './commands/stats-cmd.js';
import { VERSION } from './version.js';

const program = new Command()
  .name('code-index')
  .description('Semantic code search over C#, JavaScript, TypeScript and Python sources')
  .version(VERSION);

program.addCommand(initCommand);
program.addCommand(indexCommand);
program.addCommand(searchCommand);
program.addCommand(statsCommand);
program.addCommand(resetCommand);
program.addCommand(serveCommand);

await program.parseAsync();
