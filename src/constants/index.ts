/**
 * Shared constants for the rosws CLI.
 * File names, config keys and the external command lines live here.
 */

export const FILE_PATTERNS = {
  ROS_CONFIG_YML: 'ros-config.yml',
  PREPARE_SH: 'prepare.sh',
  DOTENV: '.env',
  EXAMPLE_ENV: '.templates/example.env'
} as const;

export const DIR_PATTERNS = {
  SRC: 'src'
} as const;

export const CONFIG_KEYS = {
  OFFICIAL_PACKAGES: 'official-packages'
} as const;

export const ENV_VARS = {
  VERBOSE: 'ROSWS_VERBOSE'
} as const;

// Owner/group/other execute bits
export const EXECUTE_BITS = 0o111;
export const PREPARE_SH_MODE = 0o755;

export const APT_COMMANDS = {
  UPDATE: ['sudo', 'apt', 'update'],
  INSTALL: ['sudo', 'apt', 'install', '-y']
} as const;

/**
 * Commands that need the workspace environment. Each one is run through
 * `bash -c "source prepare.sh && <command>"`.
 */
export const SOURCED_COMMANDS = {
  ROSDEP_UPDATE: 'rosdep update',
  ROSDEP_INSTALL: `rosdep install --from-paths ${DIR_PATTERNS.SRC} --ignore-src -r -y`,
  COLCON_BUILD: 'colcon build --symlink-install'
} as const;
