#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

import { setupListCommand } from './commands/list.js';
import { setupStatusCommand } from './commands/status.js';

/**
 * cabal-inventory CLI - Main entry point
 *
 * Lists the transitive cabal dependencies of a project with the metadata
 * needed for a license report.
 */

const program = new Command();

program
  .name('cabal-inventory')
  .description('Inventory the transitive cabal dependencies of a Haskell project')
  .version(getVersion())
  .option('--verbose', 'print debug logs')
  .configureHelp({ sortSubcommands: true });

setupListCommand(program);
setupStatusCommand(program);

program.hook('preAction', () => {
  if (program.opts<{ verbose?: boolean }>().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason: String(reason) });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('cabal-inventory')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
