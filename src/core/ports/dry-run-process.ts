/**
 * Dry-run Adapter
 *
 * Logs each command instead of running it. Every command "succeeds".
 */

import type { ProcessRunner, RunOptions } from './process.js';
import { formatCommandLine } from './process.js';
import { logger } from '../../utils/logger.js';

export const dryRunProcessRunner: ProcessRunner = {
  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<void> {
    const where = options.cwd ? ` (in ${options.cwd})` : '';
    logger.info(`[dry-run] ${formatCommandLine(command, args)}${where}`);
  }
};
