/**
 * Filesystem helpers for the file sink.
 *
 * Both run synchronously during logger construction, so that the log file exists
 * (and is truncated in overwrite mode) by the time the constructor returns, and so
 * that a permission problem surfaces as a thrown error instead of a late stream event.
 */

import fs from 'fs';

export type FileMode = 'append' | 'overwrite';

export const FILE_MODE_FLAGS: Record<FileMode, 'a' | 'w'> = {
  append: 'a',
  overwrite: 'w',
};

/**
 * Ensures the specified directory exists; creates it recursively if missing.
 * Returns true when something was created.
 */
export function ensureDirExists(dirPath: string): boolean {
  if (fs.existsSync(dirPath)) return false;
  fs.mkdirSync(dirPath, { recursive: true });
  return true;
}

/** Creates the log file, or truncates it in overwrite mode, and closes the handle again. */
export function openLogFile(filePath: string, mode: FileMode): void {
  fs.closeSync(fs.openSync(filePath, FILE_MODE_FLAGS[mode]));
}
