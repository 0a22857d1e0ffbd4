#!/usr/bin/env node

import { Command } from 'commander';
import { startCommand } from './commands/start.js';
import { taskCommand } from './commands/task.js';

const program = new Command();

program
  .name('cadence')
  .description('Cadence - task scheduler')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: ~/.cadence/cadence.json)')
  .option('--db <path>', 'SQLite database path, overrides storage.path');

program.addCommand(startCommand);
program.addCommand(taskCommand);

await program.parseAsync();
