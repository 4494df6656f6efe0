import { join } from 'path';

import { EXECUTE_BITS, FILE_PATTERNS, PREPARE_SH_MODE } from '../constants/index.js';
import { exists, hasModeBits, setMode } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

export interface EnvironmentCheckResult {
  ok: boolean;
  prepareScriptMadeExecutable: boolean;
  dotenvFound: boolean;
}

/**
 * Check that prepare.sh exists (making it executable when needed) and
 * report whether a .env file is present. File contents are never read.
 */
export async function checkEnvironment(workspaceDir: string): Promise<EnvironmentCheckResult> {
  const prepareScript = join(workspaceDir, FILE_PATTERNS.PREPARE_SH);

  if (!(await exists(prepareScript))) {
    logger.error(`${FILE_PATTERNS.PREPARE_SH} not found! This script is required for environment setup.`);
    return { ok: false, prepareScriptMadeExecutable: false, dotenvFound: false };
  }

  let prepareScriptMadeExecutable = false;
  if (!(await hasModeBits(prepareScript, EXECUTE_BITS))) {
    logger.info(`Making ${FILE_PATTERNS.PREPARE_SH} executable...`);
    await setMode(prepareScript, PREPARE_SH_MODE);
    prepareScriptMadeExecutable = true;
  }

  const dotenvFound = await exists(join(workspaceDir, FILE_PATTERNS.DOTENV));
  if (!dotenvFound) {
    logger.warn(`${FILE_PATTERNS.DOTENV} file not found!`);
    logger.info(`Please copy ${FILE_PATTERNS.EXAMPLE_ENV} to ${FILE_PATTERNS.DOTENV} and configure it.`);
    logger.info(`Using default environment from ${FILE_PATTERNS.PREPARE_SH}...`);
  } else {
    logger.info(`Found ${FILE_PATTERNS.DOTENV} file for environment configuration`);
  }

  return { ok: true, prepareScriptMadeExecutable, dotenvFound };
}
