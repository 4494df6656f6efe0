/**
 * Process Port Interface
 *
 * Defines the contract for running external commands.
 * Core logic uses this interface instead of child_process directly.
 *
 * Implementations:
 *   - childProcessRunner: spawns the command with inherited stdio
 *   - dryRunProcessRunner: logs the command line and does nothing
 */

export interface RunOptions {
  /** Working directory for the command */
  cwd?: string;
}

export interface ProcessRunner {
  /**
   * Run a command to completion.
   * Resolves on exit code 0, rejects with CommandFailedError otherwise
   * and with ProcessSpawnError when the executable cannot be started.
   */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<void>;
}

/**
 * Render a command and its arguments the way a user would type them.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(part => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}
