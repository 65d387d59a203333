/**
 * File system helpers that validate every path before use.
 *
 * Paths are resolved to absolute form and rejected when empty or when they
 * contain null bytes. Durable writes go through {@link writeFileAtomic}, which
 * writes a sibling temporary file and renames it into place so a crash never
 * leaves a half-written state file behind.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

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
 * Reads a UTF-8 text file after validating the path.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  return fs.readFile(validatePath(filePath), 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating the path.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  await fs.writeFile(validatePath(filePath), data, 'utf-8');
}

/**
 * Checks whether a path exists.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(validatePath(filePath));
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory (recursively) after validating the path.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  await fs.mkdir(validatePath(dirPath), { recursive: true });
}

/**
 * Lists the entries of a directory.
 */
export async function safeReaddir(dirPath: string): Promise<string[]> {
  return fs.readdir(validatePath(dirPath));
}

/**
 * Renames a file after validating both paths.
 */
export async function safeRename(oldPath: string, newPath: string): Promise<void> {
  await fs.rename(validatePath(oldPath), validatePath(newPath));
}

/**
 * Deletes a file after validating the path.
 */
export async function safeUnlink(filePath: string): Promise<void> {
  await fs.unlink(validatePath(filePath));
}

/**
 * Writes a file atomically: temp file in the same directory, then rename.
 *
 * The parent directory is created when missing. On failure the temporary
 * file is removed and the original error is rethrown.
 *
 * @param filePath - Destination path.
 * @param data - File contents.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const target = validatePath(filePath);
  const dir = path.dirname(target);
  await safeMkdir(dir);

  const tempPath = path.join(dir, `.${path.basename(target)}-${randomUUID()}.tmp`);
  try {
    await safeWriteFile(tempPath, data);
    await safeRename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Returns true when an unknown error is a Node.js "file not found" error.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
