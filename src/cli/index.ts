#!/usr/bin/env node
import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createDbInitCommand } from './commands/db-init.js';
import { createAddCommand } from './commands/add.js';
import { createQueryCommand } from './commands/query.js';
import { createRebuildIndexCommand } from './commands/rebuild-index.js';
import { createStatsCommand, createHistoryCommand } from './commands/stats.js';
import { createClearCommand } from './commands/clear.js';

const program = new Command();

program
  .name('scriptorium')
  .description('Ingest a document library and query it by meaning, scripture reference and theological concept')
  .version('0.1.0');

program.addCommand(createInitCommand());
program.addCommand(createDbInitCommand());
program.addCommand(createAddCommand());
program.addCommand(createQueryCommand());
program.addCommand(createRebuildIndexCommand());
program.addCommand(createStatsCommand());
program.addCommand(createHistoryCommand());
program.addCommand(createClearCommand());

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Command failed:', String(error));
  process.exit(1);
});
