import { APT_COMMANDS } from '../constants/index.js';
import type { ProcessRunner } from './ports/process.js';
import { CommandFailedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

function splitCommand(parts: readonly string[]): { command: string; args: string[] } {
  const [command, ...args] = parts;
  return { command, args };
}

/**
 * Install official ROS packages with apt.
 * One `apt update`, then a single `apt install -y` carrying every name in
 * config order. A failing apt command is logged and reported, not thrown.
 */
export async function installOfficialPackages(
  packages: readonly string[],
  runner: ProcessRunner
): Promise<boolean> {
  if (packages.length === 0) {
    logger.info('No official packages to install');
    return true;
  }

  logger.info(`Installing ${packages.length} official packages...`);
  try {
    const update = splitCommand(APT_COMMANDS.UPDATE);
    await runner.run(update.command, update.args);

    const install = splitCommand(APT_COMMANDS.INSTALL);
    await runner.run(install.command, [...install.args, ...packages]);

    logger.info('Official packages installed successfully');
    return true;
  } catch (error) {
    if (error instanceof CommandFailedError) {
      logger.error(`Failed to install official packages: ${error.message}`);
      return false;
    }
    throw error;
  }
}
