/**
 * Real OS implementation of the {@link ProfileFs} capability.
 *
 * @packageDocumentation
 */

import { safeExistsSync, safeReadTextFileSync, safeReaddirEntriesSync } from '../utils/safe-fs.js';
import type { ProfileFs } from './types.js';

/**
 * Creates a {@link ProfileFs} backed by Node's synchronous fs calls.
 *
 * @returns A file system capability reading from disk.
 */
export function createNodeProfileFs(): ProfileFs {
  return {
    readDir: (dirPath) => safeReaddirEntriesSync(dirPath),
    readFile: (filePath) => safeReadTextFileSync(filePath),
    exists: (targetPath) => safeExistsSync(targetPath),
  };
}
