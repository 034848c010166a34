/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Thrown when an input file does not exist.
 */
export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`File not found: ${filePath}`, options);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Write text to a file atomically.
 *
 * Creates the parent directory, writes to a temp file, then renames it
 * over the target so readers never see a partial file.
 *
 * @param filePath - Target path
 * @param content - File content
 * @throws Error with the target path if any step fails
 */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    // Clean up temp file if it exists
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Write JSON to a file atomically (2-space indent).
 *
 * @param filePath - Target path
 * @param data - Data to serialize
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWriteText(filePath, JSON.stringify(data, null, 2));
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data
 * @throws FileNotFoundError if the file doesn't exist
 * @throws Error if the JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new FileNotFoundError(filePath, { cause: error });
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
  }
}

/**
 * Check whether an error is a missing-file error.
 *
 * @param error - Caught error
 * @returns True for ENOENT
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
