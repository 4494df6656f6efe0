import { RosWorkspaceError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the rosws CLI
 */

export class ConfigError extends RosWorkspaceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends RosWorkspaceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class FileSystemError extends RosWorkspaceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

/**
 * An external command ran and ended with a nonzero exit code or a signal.
 */
export class CommandFailedError extends RosWorkspaceError {
  public readonly commandLine: string;
  public readonly exitCode: number | null;
  public readonly signal: string | null;

  constructor(commandLine: string, exitCode: number | null, signal: string | null = null) {
    const outcome = signal ? `was terminated by ${signal}` : `exited with code ${exitCode}`;
    super(`Command '${commandLine}' ${outcome}`, ErrorCodes.COMMAND_FAILED, {
      commandLine,
      exitCode,
      signal
    });
    this.name = 'CommandFailedError';
    this.commandLine = commandLine;
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/**
 * The executable could not be started at all.
 */
export class ProcessSpawnError extends RosWorkspaceError {
  constructor(commandLine: string, cause: Error) {
    super(`Failed to start '${commandLine}': ${cause.message}`, ErrorCodes.SPAWN_FAILED, {
      commandLine
    });
    this.name = 'ProcessSpawnError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof RosWorkspaceError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    // A tool that never started is not one of the expected failure modes
    const unexpected = error.code === ErrorCodes.SPAWN_FAILED;
    return {
      success: false,
      error: unexpected ? `Unexpected error: ${error.message}` : error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: `Unexpected error: ${error.message}`
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      logger.error(result.error ?? 'An unknown error occurred');
      process.exit(1);
    }
  };
}
