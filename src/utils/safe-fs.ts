/**
 * Path-validated file system helpers.
 *
 * Every helper resolves its path to an absolute one and rejects empty paths
 * and paths containing null bytes before touching the disk. Artifact titles
 * come from model output, so nothing reaches `node:fs` unchecked.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
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

  return path.resolve(filePath);
}

/**
 * Resolves `child` inside `root` and rejects results that escape it.
 *
 * @param root - Directory that must contain the result.
 * @param child - Relative path to join onto the root.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the joined path leaves `root`.
 */
export function resolveWithin(root: string, child: string): string {
  const resolvedRoot = validatePath(root);
  const resolved = validatePath(path.join(resolvedRoot, child));
  const relative = path.relative(resolvedRoot, resolved);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathValidationError(`Path escapes ${resolvedRoot}`, child);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Renames a file after validating both paths.
 *
 * @param fromPath - Existing path.
 * @param toPath - Destination path; replaced if it exists.
 * @throws {PathValidationError} If either path is invalid.
 */
export async function safeRename(fromPath: string, toPath: string): Promise<void> {
  await fs.rename(validatePath(fromPath), validatePath(toPath));
}

/**
 * Removes a file after validating the path. A missing file is not an error.
 *
 * @param filePath - The file to remove.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeRemove(filePath: string): Promise<void> {
  await fs.rm(validatePath(filePath), { force: true });
}

/**
 * Creates a directory (and its parents) after validating the path.
 *
 * @param dirPath - The directory to create.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Checks whether a path exists after validating it.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
