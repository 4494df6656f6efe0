/**
 * Port Resolution Helpers
 *
 * Picks the ProcessRunner for a run, falling back to the real
 * child process runner when none is given.
 */

import type { ProcessRunner } from './process.js';
import { childProcessRunner } from './child-process.js';
import { dryRunProcessRunner } from './dry-run-process.js';

export function resolveProcessRunner(ctx?: { runner?: ProcessRunner; dryRun?: boolean }): ProcessRunner {
  if (ctx?.runner) {
    return ctx.runner;
  }
  return ctx?.dryRun ? dryRunProcessRunner : childProcessRunner;
}
