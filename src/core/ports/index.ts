/**
 * Core Ports
 *
 * Re-exports the process port and its implementations.
 * These ports define the boundary between the workspace steps
 * and the external tools they drive.
 */

export type { ProcessRunner, RunOptions } from './process.js';
export { formatCommandLine } from './process.js';
export { childProcessRunner } from './child-process.js';
export { dryRunProcessRunner } from './dry-run-process.js';
export { resolveProcessRunner } from './resolve.js';
