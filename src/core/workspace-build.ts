import { FILE_PATTERNS, SOURCED_COMMANDS } from '../constants/index.js';
import type { ProcessRunner } from './ports/process.js';
import { CommandFailedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface WorkspaceBuildResult {
  dependenciesInstalled: boolean;
  built: boolean;
}

/**
 * Run a command in a fresh bash that has sourced prepare.sh first.
 * The environment is sourced again on every call, never cached.
 */
export function runSourced(runner: ProcessRunner, workspaceDir: string, command: string): Promise<void> {
  return runner.run('bash', ['-c', `source ${FILE_PATTERNS.PREPARE_SH} && ${command}`], {
    cwd: workspaceDir
  });
}

async function installDependencies(runner: ProcessRunner, workspaceDir: string): Promise<boolean> {
  logger.info('Installing workspace dependencies...');
  try {
    await runSourced(runner, workspaceDir, SOURCED_COMMANDS.ROSDEP_UPDATE);
    await runSourced(runner, workspaceDir, SOURCED_COMMANDS.ROSDEP_INSTALL);
    logger.info('Dependencies installed successfully');
    return true;
  } catch (error) {
    if (error instanceof CommandFailedError) {
      logger.warn(`Failed to install some dependencies: ${error.message}`);
      return false;
    }
    throw error;
  }
}

/**
 * Resolve dependencies with rosdep, then build with colcon.
 * Dependency failures only warn; a build failure is the result that counts.
 */
export async function buildWorkspace(runner: ProcessRunner, workspaceDir: string): Promise<WorkspaceBuildResult> {
  const dependenciesInstalled = await installDependencies(runner, workspaceDir);

  logger.info('Building ROS workspace...');
  try {
    await runSourced(runner, workspaceDir, SOURCED_COMMANDS.COLCON_BUILD);
    logger.info('Workspace built successfully');
    return { dependenciesInstalled, built: true };
  } catch (error) {
    if (error instanceof CommandFailedError) {
      logger.error(`Failed to build workspace: ${error.message}`);
      return { dependenciesInstalled, built: false };
    }
    throw error;
  }
}
