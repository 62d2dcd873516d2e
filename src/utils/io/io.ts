import { existsSync, readdirSync, readFileSync } from 'fs';
import path from 'path';

// Point to data directory at repository root (CommonJS)
export const BASE_DATA_DIR = path.join(__dirname, '../../../data');

/**
 * Data directory in use; DATA_DIR overrides the bundled one
 */
export function getDataDir(): string {
  return process.env.DATA_DIR ? path.resolve(process.env.DATA_DIR) : BASE_DATA_DIR;
}

/**
 * Loads and parses JSON data from a file
 * @param fn - Filename relative to the data directory
 * @returns Parsed data, still to be validated by the caller
 * @throws Error if file cannot be read or parsed
 */
export function load(fn: string): unknown {
  const data = readFileSync(path.join(getDataDir(), fn), 'utf8');
  return JSON.parse(data);
}

/**
 * Checks if a file exists in the data directory
 * @param fn - Filename to check
 * @returns True if file exists, false otherwise
 */
export function checkExists(fn: string) {
  return existsSync(path.join(getDataDir(), fn));
}

/**
 * Lists the JSON files of a data subdirectory, without their extension
 * @param dir - Directory relative to the data directory
 */
export function listJsonFiles(dir: string): string[] {
  if (!checkExists(dir)) {
    return [];
  }
  return readdirSync(path.join(getDataDir(), dir))
    .filter((file) => file.endsWith('.json'))
    .map((file) => file.slice(0, -'.json'.length))
    .sort((a, b) => a.localeCompare(b));
}
