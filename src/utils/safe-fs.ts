/**
 * Read-only file system helpers with path validation.
 *
 * Every path is resolved to an absolute path and checked before the
 * underlying `node:fs` call is made. Empty paths and paths with null bytes
 * raise {@link PathValidationError}.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export function safeReadTextFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fs.readFileSync(validatedPath, 'utf-8');
}

/**
 * Synchronously lists a directory, with file types, after validating the path.
 *
 * @param dirPath - The directory to list.
 * @returns The directory entries.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be read.
 */
export function safeReaddirEntriesSync(dirPath: string): fs.Dirent[] {
  const validatedPath = validatePath(dirPath);
  return fs.readdirSync(validatedPath, { withFileTypes: true });
}

/**
 * Synchronously checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists, false otherwise.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fs.existsSync(validatedPath);
}
