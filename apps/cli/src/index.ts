#!/usr/bin/env node
/**
 * sheetreplica CLI entry point
 *
 *   sheetreplica sync [tables...]   - Replicate the spreadsheet into the store
 *   sheetreplica inspect <sheet>    - Header diagnostics for one tab
 *   sheetreplica check              - Connectivity check for both ends
 *   sheetreplica schema             - Print the DDL for the registered tables
 */

import 'dotenv/config';
import { Command } from 'commander';
import { getErrorMessage, getErrorStack, logger } from '@sheetreplica/data-ingestion';
import { syncCommand } from './commands/sync';
import { inspectCommand } from './commands/inspect';
import { checkCommand } from './commands/check';
import { schemaCommand } from './commands/schema';

export const program = new Command()
  .name('sheetreplica')
  .description('One-way replication of spreadsheet tabs into a relational store')
  .version('0.1.0', '-v, --version', 'Show version number')
  .option('--schema <file>', 'Table schema file (default: the bundled e-commerce tables)');

program.addCommand(syncCommand);
program.addCommand(inspectCommand);
program.addCommand(checkCommand);
program.addCommand(schemaCommand);

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error(getErrorMessage(error));
    logger.debug('Stack trace', { stack: getErrorStack(error) });
    process.exitCode = 1;
  });
}
