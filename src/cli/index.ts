#!/usr/bin/env node

import { Command } from 'commander';
import { loadEnvironmentFile } from '../services/configuration-service.js';
import { logger, loggerConfigFromEnvironment } from '../lib/logger.js';
import { createEmbedCommand } from './commands/embed.js';
import { createUpsertCommand } from './commands/upsert.js';
import { createDeleteCommand } from './commands/delete.js';
import { createBatchUpdateCommand } from './commands/batch-update.js';
import { createSearchCommand } from './commands/search.js';
import { createConfigCommand } from './commands/config.js';
import { OutputFormatter } from './utils/output.js';

// Modules are evaluated before this point, so the logger picks up .env here
const envResult = loadEnvironmentFile();
logger.configure(loggerConfigFromEnvironment());

const program = new Command();
const output = new OutputFormatter();

program
  .name('vector-pipeline')
  .description('Embed tabular records, maintain a vector index and search it')
  .version('1.0.0')
  .option('--config <path>', 'Path to config.json (defaults to .vector-pipeline/config.json)')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      logger.setConsoleLevel('debug');
    }
    if (opts.quiet) {
      logger.setConsoleLevel('error');
    }
  });

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

// Register commands
program.addCommand(createEmbedCommand());
program.addCommand(createUpsertCommand());
program.addCommand(createDeleteCommand());
program.addCommand(createBatchUpdateCommand());
program.addCommand(createSearchCommand());
program.addCommand(createConfigCommand());

if (envResult.isErr()) {
  output.warning(envResult.error.message);
}

program.parseAsync(process.argv).catch((error: unknown) => {
  output.error(error instanceof Error ? error.message : String(error), error);
  process.exit(1);
});
