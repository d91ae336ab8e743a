#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupDumpCommand } from './commands/dump.js';
import { setupSetCommand } from './commands/set.js';
import { setupListCommand } from './commands/list.js';
import { setupResolveCommand } from './commands/resolve.js';
import { setupCheckCommand } from './commands/check.js';

/**
 * volcano-installer CLI - Main entry point
 *
 * Keeps vendor/volcano-packages.php (namespace -> package path) in step with
 * the plugin packages the host package manager installed.
 */

const program = new Command();

program
  .name('volcano-installer')
  .description('Maintain the plugin package map for the host package manager')
  .version(getVersion())
  .option('--cwd <dir>', 'project root (default: current directory)')
  .option('--vendor-dir <dir>', 'vendor directory, relative to the project root')
  .configureHelp({ sortSubcommands: true });

// === PACKAGE MAP ===
setupDumpCommand(program);
setupSetCommand(program);
setupListCommand(program);

// === DIAGNOSTICS ===
setupResolveCommand(program);
setupCheckCommand(program);

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    if (process.argv.length <= 2) {
      program.outputHelp();
      return;
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('✗ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('volcano-installer')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('✗ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
