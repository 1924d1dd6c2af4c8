/**
 * File system helpers with path validation.
 *
 * Paths are validated and resolved to absolute paths before any file system
 * call, so an empty path or one containing null bytes fails with a clear
 * error instead of an opaque `ENOENT`.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
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
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., permission denied).
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Gets file status after validating the path.
 *
 * @param filePath - The path to stat.
 * @returns File stats, or `undefined` if nothing exists at the path.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} For failures other than a missing entry (e.g., permission denied).
 */
export async function safeStat(filePath: string): Promise<Stats | undefined> {
  const validatedPath = validatePath(filePath);
  try {
    return await fs.stat(validatedPath);
  } catch (error) {
    if (isMissingEntryError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Canonicalizes a path, following symlinks.
 *
 * Falls back to the resolved absolute path when the entry does not exist.
 *
 * @param filePath - The path to canonicalize.
 * @returns The canonical absolute path.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeRealpath(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  try {
    return await fs.realpath(validatedPath);
  } catch (error) {
    if (isMissingEntryError(error)) {
      return validatedPath;
    }
    throw error;
  }
}

/**
 * Checks whether an error is a Node.js "no such file or directory" error.
 */
export function isMissingEntryError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
