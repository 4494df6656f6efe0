/**
 * Child Process Adapter (Default)
 *
 * ProcessRunner backed by child_process.spawn. The child shares the
 * terminal, so apt, rosdep and colcon output reaches the user directly.
 */

import { spawn } from 'child_process';

import type { ProcessRunner, RunOptions } from './process.js';
import { formatCommandLine } from './process.js';
import { CommandFailedError, ProcessSpawnError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const childProcessRunner: ProcessRunner = {
  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<void> {
    const commandLine = formatCommandLine(command, args);
    logger.debug(`Running: ${commandLine}`, options.cwd ? { cwd: options.cwd } : undefined);

    return new Promise<void>((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: 'inherit'
      });

      child.once('error', (error) => {
        reject(new ProcessSpawnError(commandLine, error));
      });

      child.once('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new CommandFailedError(commandLine, code, signal));
      });
    });
  }
};
