#!/usr/bin/env node

import { Command } from 'commander';

import { createCurrentCommand, createLastCommand } from './commands/session.js';
import { createTemplateCommand } from './commands/template.js';
import { createUsersCommand } from './commands/users.js';
import { createStatsCommand } from './commands/stats.js';
import { createUpdateCommand } from './commands/update.js';
import { createEditCommand } from './commands/edit.js';

// Build the CLI program
const program = new Command()
  .name('brag')
  .description('Keep a team progress log: goals and dated sessions of checklist tasks')
  .version('0.1.0')
  .option('-f, --file <path>', 'Path to the brag file (default: $BRAG_FILE)')
  .option('-u, --users <names>', 'Only show these users, comma separated')
  .option('--editor <command>', 'Editor for `brag edit` (default: $VISUAL, $EDITOR or vi)');

// Register commands
program.addCommand(createCurrentCommand());
program.addCommand(createLastCommand());
program.addCommand(createTemplateCommand());
program.addCommand(createUsersCommand());
program.addCommand(createStatsCommand());
program.addCommand(createUpdateCommand());
program.addCommand(createEditCommand());

await program.parseAsync();
