#!/usr/bin/env node
import { Command } from 'commander';
import { statsCommand } from '../src/commands/stats.js';
import { lookupCommand } from '../src/commands/lookup.js';
import { recordCommand } from '../src/commands/record.js';
import { feedbackCommand } from '../src/commands/feedback.js';
import { relateCommand } from '../src/commands/relate.js';
import { listCommand } from '../src/commands/list.js';
import { logCommand } from '../src/commands/log.js';
import { migrateCommand } from '../src/commands/migrate.js';
import { resetStatsCommand } from '../src/commands/reset-stats.js';
import { serveCommand } from '../src/commands/serve.js';
import { VERSION } from '../src/version.js';

const program = new Command();

program
  .name('qmem')
  .description('qmem - feedback-gated query memory cache')
  .version(VERSION)
  .option('--config <path>', 'Path to a qmem config file')
  .option('--format <format>', 'Output format: json, pretty', 'pretty');

program.addCommand(statsCommand);
program.addCommand(lookupCommand);
program.addCommand(recordCommand);
program.addCommand(feedbackCommand);
program.addCommand(relateCommand);
program.addCommand(listCommand);
program.addCommand(logCommand);
program.addCommand(migrateCommand);
program.addCommand(resetStatsCommand);
program.addCommand(serveCommand);

await program.parseAsync();
