// src/fileSystem.ts

import { promises as fs } from 'node:fs';
import * as crypto from 'node:crypto';
import * as path from 'node:path';
import { ApplyError, errorMessage } from './errors';
import { getOutputChannel } from './logger';

/**
 * Options for file modification check
 */
export interface FileModificationOptions {
  /** Whether to check file modification time */
  mtimeCheck: boolean;
}

/**
 * Result of a file modification check
 */
export interface FileModificationResult {
  /** Whether the file has been modified */
  modified: boolean;

  /** Whether the operation should proceed */
  proceed: boolean;

  originalMtimeMs?: number;
  currentMtimeMs?: number;
}

/**
 * File bytes together with the stats they were read under.
 */
export interface FileSnapshot {
  content: Buffer;
  mtimeMs: number;
}

export async function readSnapshot(filePath: string): Promise<FileSnapshot> {
  const stats = await fs.stat(filePath);
  const content = await fs.readFile(filePath);
  return { content, mtimeMs: stats.mtimeMs };
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Checks if a file has been modified since the given stats were collected
 * @param filePath The file to check
 * @param originalMtimeMs Modification time observed when the file was read
 * @param options Options for the check
 */
export async function checkFileModification(
  filePath: string,
  originalMtimeMs: number,
  options: FileModificationOptions
): Promise<FileModificationResult> {
  if (!options.mtimeCheck) {
    return { modified: false, proceed: true, originalMtimeMs };
  }

  try {
    const current = await fs.stat(filePath);
    const modified = current.mtimeMs !== originalMtimeMs;
    return { modified, proceed: !modified, originalMtimeMs, currentMtimeMs: current.mtimeMs };
  } catch (error) {
    // Gone since it was read: nothing sensible to overwrite
    getOutputChannel().warn(`Error checking file modification for ${filePath}: ${errorMessage(error)}`);
    return { modified: true, proceed: false, originalMtimeMs };
  }
}

/**
 * Writes `data` to a temporary file beside `filePath` and renames it into
 * place, so readers never observe a half-written file.
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`,
  );

  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      getOutputChannel().warn(`Could not remove temporary file ${tempPath}: ${errorMessage(cleanupError)}`);
    });
    throw error;
  }
}

/**
 * Wrapper for writes that must not clobber concurrent edits
 * @param filePath The file about to be written
 * @param originalMtimeMs Modification time observed when the file was read
 * @param operation The write to perform
 * @param options Options for the modification check
 * @throws ApplyError (WriteFailure) when the file changed on disk or the write fails
 */
export async function withModificationCheck<T>(
  filePath: string,
  originalMtimeMs: number | undefined,
  operation: () => Promise<T>,
  options: FileModificationOptions
): Promise<T> {
  if (originalMtimeMs !== undefined) {
    const check = await checkFileModification(filePath, originalMtimeMs, options);
    if (!check.proceed) {
      throw new ApplyError(`File ${filePath} has been modified since it was read`, 'WriteFailure');
    }
  }

  try {
    return await operation();
  } catch (error) {
    if (error instanceof ApplyError) {
      throw error;
    }
    getOutputChannel().error(`Error writing ${filePath}: ${errorMessage(error)}`);
    throw new ApplyError(`Failed to write ${filePath}: ${errorMessage(error)}`, 'WriteFailure');
  }
}
