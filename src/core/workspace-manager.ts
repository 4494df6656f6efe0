import { join, resolve } from 'path';

import type { CommandResult, SetupSummary, WorkspaceOptions } from '../types/index.js';
import { DIR_PATTERNS, FILE_PATTERNS } from '../constants/index.js';
import type { ProcessRunner } from './ports/process.js';
import { resolveProcessRunner } from './ports/resolve.js';
import { checkEnvironment } from './environment-check.js';
import { installOfficialPackages } from './package-installer.js';
import { buildWorkspace } from './workspace-build.js';
import { loadRosConfig } from '../utils/ros-config-yml.js';
import { logger } from '../utils/logger.js';

export interface WorkspaceManagerOptions extends WorkspaceOptions {
  /** Overrides the runner picked from `dryRun` */
  runner?: ProcessRunner;
}

/**
 * Sets up a local ROS workspace: environment check, config load,
 * apt install of official packages, then rosdep and colcon.
 */
export class RosWorkspaceManager {
  readonly workspaceDir: string;
  readonly packagesFile: string;
  readonly srcDir: string;
  readonly prepareScript: string;
  private readonly runner: ProcessRunner;

  constructor(workspaceDir?: string, options: WorkspaceManagerOptions = {}) {
    this.workspaceDir = workspaceDir ? resolve(workspaceDir) : process.cwd();
    this.packagesFile = join(this.workspaceDir, FILE_PATTERNS.ROS_CONFIG_YML);
    this.srcDir = join(this.workspaceDir, DIR_PATTERNS.SRC);
    this.prepareScript = join(this.workspaceDir, FILE_PATTERNS.PREPARE_SH);
    this.runner = resolveProcessRunner(options);
  }

  /**
   * Setup/update the ROS workspace.
   * Config errors are thrown; every other outcome is in the result.
   */
  async setupWorkspace(): Promise<CommandResult<SetupSummary>> {
    logger.info('Setting up ROS workspace...');
    logger.debug('Workspace paths', {
      workspaceDir: this.workspaceDir,
      packagesFile: this.packagesFile,
      srcDir: this.srcDir,
      prepareScript: this.prepareScript
    });

    const environment = await checkEnvironment(this.workspaceDir);
    if (!environment.ok) {
      logger.error('Environment check failed!');
      return { success: false, error: 'Environment check failed' };
    }

    const { officialPackages } = await loadRosConfig(this.packagesFile);

    const warnings: string[] = [];
    const packagesInstalled = await installOfficialPackages(officialPackages, this.runner);
    if (!packagesInstalled) {
      warnings.push('Failed to install official packages');
    }

    const { dependenciesInstalled, built } = await buildWorkspace(this.runner, this.workspaceDir);
    if (!dependenciesInstalled) {
      warnings.push('Failed to install some dependencies');
    }

    const data: SetupSummary = { officialPackages, packagesInstalled, dependenciesInstalled, built };

    if (!built) {
      return { success: false, data, error: 'Failed to build workspace', warnings };
    }

    logger.info('Workspace setup completed successfully!');
    logger.info('Custom packages are managed via git submodules');
    logger.info(`To use the workspace, run: source ${FILE_PATTERNS.PREPARE_SH}`);
    return { success: true, data, warnings };
  }
}
