import { Command } from 'commander';
import pc from 'picocolors';

import { CommandResult, SetupSummary } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { RosWorkspaceManager } from '../core/workspace-manager.js';
import { logger } from '../utils/logger.js';

export interface CommandOptions {
  workspace?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

function mark(ok: boolean): string {
  return ok ? pc.green('✓') : pc.red('✗');
}

/**
 * Summary lines for the end of a run, one per step plus any warnings.
 * Empty when the run stopped before the config was loaded.
 */
export function formatSummary(result: CommandResult<SetupSummary>): string[] {
  const data = result.data;
  if (!data) {
    return [];
  }
  return [
    pc.bold('Summary'),
    `${mark(data.packagesInstalled)} official packages (${data.officialPackages.length})`,
    `${mark(data.dependenciesInstalled)} workspace dependencies`,
    `${mark(data.built)} colcon build`,
    ...(result.warnings ?? []).map(warning => `${pc.yellow('⚠')} ${warning}`)
  ];
}

function printSummary(result: CommandResult<SetupSummary>): void {
  const lines = formatSummary(result);
  if (lines.length === 0) {
    return;
  }
  console.log('');
  for (const line of lines) {
    console.log(line);
  }
}

export async function setupCommand(options: CommandOptions = {}): Promise<CommandResult<SetupSummary>> {
  if (options.dryRun) {
    logger.info('Dry run: external commands will be logged, not executed');
  }

  const manager = new RosWorkspaceManager(options.workspace, { dryRun: options.dryRun });
  const result = await manager.setupWorkspace();
  printSummary(result);
  return result;
}

export function setupRootAction(program: Command): void {
  program
    .option('-w, --workspace <dir>', 'workspace directory (default: current directory)')
    .option('--verbose', 'enable debug logging')
    .option('--dry-run', 'log external commands instead of running them')
    .action(withErrorHandling(async (options: CommandOptions) => {
      const result = await setupCommand(options);
      if (!result.success) {
        process.exit(1);
      }
    }));
}
