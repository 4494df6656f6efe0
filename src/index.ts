#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';

import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { getVersion } from './utils/package.js';
import { setupRootAction } from './commands/setup.js';

/**
 * rosws CLI - Main entry point
 *
 * Installs the official packages listed in ros-config.yml, resolves
 * workspace dependencies with rosdep and builds with colcon.
 */

const program = new Command();

program
  .name('rosws')
  .description('ROS workspace manager: install packages and build the workspace')
  .version(getVersion());

setupRootAction(program);

program.hook('preAction', async (thisCommand) => {
  const opts = thisCommand.opts<{ workspace?: string; verbose?: boolean }>();

  // Must precede the workspace check's debug line
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (opts.workspace) {
    const resolvedWorkspace = path.resolve(process.cwd(), opts.workspace);
    try {
      const stats = await fs.stat(resolvedWorkspace);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.workspace}' is not a directory`);
      }
      logger.debug(`Workspace directory: ${resolvedWorkspace}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error(`Invalid --workspace '${opts.workspace}': ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Workspace directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

/**
 * Ctrl+C aborts the whole run; children in the same process group get it too
 */
process.on('SIGINT', () => {
  logger.info('Operation cancelled by user');
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error(`Unexpected error: ${error.message}`, { stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  logger.error(`Unexpected error: ${message}`);
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('rosws')
  )) {
  run().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Unexpected error: ${message}`);
    process.exit(1);
  });
}

export { program };
