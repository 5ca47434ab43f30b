#!/usr/bin/env node

import { constants } from 'fs';
import fs from 'fs/promises';
import * as path from 'path';
import { Command } from 'commander';
import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupInstallCommand } from './commands/install.js';
import { setupListCommand } from './commands/list.js';
import { setupOutdatedCommand } from './commands/outdated.js';
import { setupReconcileCommand } from './commands/reconcile.js';
import { setupRestoreCommand } from './commands/restore.js';
import { setupSearchCommand } from './commands/search.js';
import { setupUninstallCommand } from './commands/uninstall.js';
import { setupUpdateCommand } from './commands/update.js';

/**
 * nuforge CLI - Main entry point
 */

const program = new Command();

program
  .name('nuforge')
  .description('Resolve and install NuGet packages into a project folder')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'log debug output')
  // Global options must precede the command name
  .enablePositionalOptions()
  .configureHelp({ sortSubcommands: true });

// === PACKAGE LIFECYCLE ===
setupInstallCommand(program);
setupUninstallCommand(program);
setupUpdateCommand(program);
setupRestoreCommand(program);

// === DISCOVERY ===
setupSearchCommand(program);
setupListCommand(program);
setupOutdatedCommand(program);

// === MAINTENANCE ===
setupReconcileCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts();

  if (opts.verbose === true) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (typeof opts.cwd === 'string') {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      await fs.access(resolvedCwd, constants.R_OK | constants.W_OK);
      logger.debug(`Working directory: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': directory must exist and be writable. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
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
export async function run(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync();
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] && (process.argv[1].endsWith('index.js') || process.argv[1].endsWith('index.ts'))) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', error instanceof Error ? error : { error: String(error) });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
