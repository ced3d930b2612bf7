#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { checkCommand } from './commands/check.js';
import { listenCommand } from './commands/listen.js';
import { recentCommand } from './commands/recent.js';
import { resolveCommand } from './commands/resolve.js';

const program = new Command();

program
  .name('wahapedia-scraper')
  .description('Scrape Wahapedia rules data and publish it to Redis channels')
  .version('1.0.0')
  .enablePositionalOptions(); // Allow subcommands to define their own options

// Extraction
program.addCommand(runCommand);

// Diagnostics
program.addCommand(checkCommand);
program.addCommand(resolveCommand);

// Message bus inspection
program.addCommand(listenCommand);
program.addCommand(recentCommand);

process.on('unhandledRejection', (err) => {
  console.error('Unhandled rejection:', err);
  process.exit(1);
});

program.parseAsync().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
