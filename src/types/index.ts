/**
 * Shared types for the rosws CLI
 */

export interface RosConfig {
  officialPackages: string[];
}

export interface SetupSummary {
  officialPackages: string[];
  packagesInstalled: boolean;
  dependenciesInstalled: boolean;
  built: boolean;
}

export interface WorkspaceOptions {
  dryRun?: boolean;
}

// Command result types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class RosWorkspaceError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RosWorkspaceError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  CONFIG_ERROR = 'CONFIG_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  COMMAND_FAILED = 'COMMAND_FAILED',
  SPAWN_FAILED = 'SPAWN_FAILED'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
