import * as yaml from 'js-yaml';
import type { RosConfig } from '../types/index.js';
import { CONFIG_KEYS, FILE_PATTERNS } from '../constants/index.js';
import { ConfigError, ValidationError } from './errors.js';
import { exists, readTextFile } from './fs.js';
import { logger } from './logger.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the parsed ros-config.yml document and pull out the official packages.
 * A missing `official-packages` key is an empty list.
 */
export function parseRosConfig(content: string, source: string = FILE_PATTERNS.ROS_CONFIG_YML): RosConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: source });
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new ConfigError(`Error parsing ${source}: ${reason}`, { source });
  }

  if (!isPlainObject(parsed)) {
    throw new ValidationError(`${source} must contain a mapping at the top level`, { source });
  }

  const raw = parsed[CONFIG_KEYS.OFFICIAL_PACKAGES];
  if (raw === undefined || raw === null) {
    return { officialPackages: [] };
  }

  if (!Array.isArray(raw)) {
    throw new ValidationError(
      `${source}: '${CONFIG_KEYS.OFFICIAL_PACKAGES}' must be a list of package names`,
      { source }
    );
  }

  const officialPackages: string[] = [];
  raw.forEach((entry: unknown, index: number) => {
    if (typeof entry !== 'string') {
      throw new ValidationError(
        `${source}: '${CONFIG_KEYS.OFFICIAL_PACKAGES}' entry ${index} must be a string, got ${JSON.stringify(entry)}`,
        { source, index }
      );
    }
    officialPackages.push(entry);
  });

  return { officialPackages };
}

/**
 * Read and validate ros-config.yml
 */
export async function loadRosConfig(configPath: string): Promise<RosConfig> {
  if (!(await exists(configPath))) {
    throw new ConfigError(`Error: ${configPath} not found!`, { configPath });
  }

  const content = await readTextFile(configPath);
  const config = parseRosConfig(content, configPath);

  logger.info(`Loaded ${config.officialPackages.length} official packages from config`);
  return config;
}
