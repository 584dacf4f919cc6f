/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Write a file atomically: the content goes to a temp file in the same
 * directory, which is then renamed over the target. Readers see either the old
 * file or the complete new one. Parent directories are created as needed.
 *
 * @throws Error naming the target file, with the underlying error as `cause`
 */
export async function atomicWriteFile(filePath: string, content: string | Buffer): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    try {
      await fs.unlink(tempPath);
    } catch {
      // The temp file may never have been created
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, { cause: error });
  }
}

/**
 * Write several files that belong together. Every temp file is written before
 * any rename, so a failed write leaves all targets as they were. Renames run in
 * the order given.
 *
 * @throws Error naming the target being written, with the underlying error as `cause`
 */
export async function atomicWriteFiles(
  files: ReadonlyArray<{ path: string; content: string | Buffer }>
): Promise<void> {
  const stamp = `${process.pid}.${Date.now()}`;
  const staged = files.map((file) => ({ ...file, tempPath: `${file.path}.tmp.${stamp}` }));
  let current = '';

  try {
    for (const file of staged) {
      current = file.path;
      await fs.mkdir(path.dirname(file.path), { recursive: true });
      await fs.writeFile(file.tempPath, file.content);
    }
    for (const file of staged) {
      current = file.path;
      await fs.rename(file.tempPath, file.path);
    }
  } catch (error) {
    for (const file of staged) {
      try {
        await fs.unlink(file.tempPath);
      } catch {
        // Already renamed, or never created
      }
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${current}: ${message}`, { cause: error });
  }
}

/**
 * Atomically write a value as pretty-printed JSON (2-space indentation).
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2));
}

/**
 * Read and parse a JSON file
 *
 * The result is unvalidated; callers parse it with the matching zod schema.
 *
 * @param filePath - Path to the JSON file
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoError(error, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`, { cause: error });
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
  }
}

/**
 * Check if a file exists (not a directory)
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isErrnoError(error, 'ENOENT') || isErrnoError(error, 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * 64-character lowercase hex SHA-256 of some content.
 */
export function sha256(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Whether a thrown value is a Node.js system error with the given code.
 */
export function isErrnoError(error: unknown, code: string): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && error.code === code;
}
