import { promises as fs, constants as fsConstants } from 'fs';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * True when any of the given permission bits are set on the file mode
 */
export async function hasModeBits(path: string, bits: number): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return (stats.mode & bits) !== 0;
  } catch (error) {
    throw new FileSystemError(`Failed to stat file: ${path}`, { path, error: String(error) });
  }
}

export async function setMode(path: string, mode: number): Promise<void> {
  try {
    await fs.chmod(path, mode);
    logger.debug(`Changed mode of ${path} to ${mode.toString(8)}`);
  } catch (error) {
    throw new FileSystemError(`Failed to change mode of ${path}`, { path, error: String(error) });
  }
}

/**
 * Read a text file
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error: String(error) });
  }
}
