/* --------------------------------------------------------------------------
 *  PatchDrift — Path Sanitization and Validation
 * ----------------------------------------------------------------------- */

import * as path from 'node:path';

/**
 * Sanitizes a file path by removing control characters and normalizing separators.
 * Useful for cleaning paths extracted from diffs or user input.
 *
 * @param rawPath The raw path string to sanitize
 * @returns The sanitized path string
 */
export function sanitizePath(rawPath: string): string {
  if (!rawPath) {return '';}

  return rawPath
    // Remove actual control characters (0-31 and 127)
    .replaceAll(/[\x00-\x1F\x7F]+/g, '')
    // Remove escaped control sequences often found in diffs (\r, \n)
    .replaceAll(/\\r|\\n/g, '')
    .replaceAll(/\\/g, '/')
    .trim();
}

/**
 * Validates if a path is safe to use within a working tree.
 * Rejects absolute paths, drive letters, UNC paths and `..` segments.
 *
 * @param filePath The path to validate
 * @returns True if the path is safe
 */
export function isSafePath(filePath: string): boolean {
  if (!filePath) {
    return false;
  }

  if (filePath.includes('\0') || filePath.length > 1000) {
    return false;
  }

  if (path.isAbsolute(filePath) || path.posix.isAbsolute(filePath)) {
    return false;
  }

  if (/^([a-zA-Z]:|[\\/]{2})/.test(filePath)) {
    return false;
  }

  const segments = path.posix.normalize(filePath.replaceAll('\\', '/')).split('/');
  if (segments.some(s => s === '..')) {
    return false;
  }

  return !/[\x00-\x1F\x7F]/.test(filePath);
}

/**
 * Joins a relative path onto `root`, refusing anything that escapes it.
 * @returns The absolute path, or undefined when the path is unsafe
 */
export function resolveInsideRoot(root: string, relPath: string): string | undefined {
  if (!isSafePath(relPath)) {
    return undefined;
  }
  const absRoot = path.resolve(root);
  const target = path.resolve(absRoot, relPath);
  const relative = path.relative(absRoot, target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return undefined;
  }
  return target;
}

/**
 * Converts an absolute path under `root` to a forward-slash relative path.
 */
export function toRelativePosix(root: string, absPath: string): string {
  return path.relative(root, absPath).split(path.sep).join('/');
}
