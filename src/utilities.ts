/* --------------------------------------------------------------------------
 *  PatchDrift — Utility functions
 * ----------------------------------------------------------------------- */

import { sanitizePath } from './security/pathSanitizer';

export type LineEnding = '\n' | '\r\n';

/**
 * A text file split into lines, with the properties needed to write it back.
 */
export interface SplitContent {
  lines: string[];
  eol: LineEnding;
  trailingNewline: boolean;
}

/**
 * Normalizes line endings to LF
 * @param text The text to normalize
 * @returns Text with normalized line endings
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n|\r/g, '\n');
}

/**
 * Detects the file's line ending. A single CRLF anywhere makes it a CRLF file.
 */
export function detectLineEnding(text: string): LineEnding {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Splits file text on LF and CRLF. A lone CR is line content, not a break.
 */
export function splitContent(text: string): SplitContent {
  const eol = detectLineEnding(text);
  if (text === '') {
    return { lines: [], eol, trailingNewline: false };
  }
  const trailingNewline = text.endsWith('\n');
  const body = trailingNewline ? text.slice(0, text.endsWith('\r\n') ? -2 : -1) : text;
  return { lines: body.split(/\r?\n/), eol, trailingNewline };
}

export function joinContent(content: SplitContent): string {
  if (content.lines.length === 0) {
    return '';
  }
  const text = content.lines.join(content.eol);
  return content.trailingNewline ? text + content.eol : text;
}

/**
 * Strips `a/`, `b/` and `./` prefixes and cleans control characters.
 */
export function stripDiffPrefix(rawPath: string): string {
  return sanitizePath(rawPath).replace(/^(?:[ab]\/|\.\/)/, '');
}

/**
 * Extracts file names from a diff header
 * @param diffHeader The diff header line
 * @returns Object with old and new file names
 */
export function extractFileNamesFromHeader(diffHeader: string): { oldFile?: string; newFile?: string } {
  // diff --git a/path/to/file.txt b/path/to/file.txt
  const gitHeaderMatch = diffHeader.match(/^diff --git a\/(.*) b\/(.*)$/);
  if (gitHeaderMatch) {
    return { oldFile: sanitizePath(gitHeaderMatch[1]), newFile: sanitizePath(gitHeaderMatch[2]) };
  }

  // diff --git with unprefixed paths (git diff --no-prefix)
  const plainMatch = diffHeader.match(/^diff --git (\S+) (\S+)$/);
  if (plainMatch) {
    return { oldFile: sanitizePath(plainMatch[1]), newFile: sanitizePath(plainMatch[2]) };
  }

  return { oldFile: undefined, newFile: undefined };
}

/**
 * Session token with millisecond resolution: `YYYYMMDD-HHMMSS-mmm` (local time).
 */
export function formatSessionTimestamp(date: Date = new Date()): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}-${pad(date.getMilliseconds(), 3)}`;
}

export const SESSION_ID_PATTERN = /^\d{8}-\d{6}-\d{3}(?:-\d+)?$/;

/**
 * Parses a session token back into a local date.
 */
export function parseSessionTimestamp(sessionId: string): Date | undefined {
  const match = sessionId.match(/^(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})-(\d{3})/);
  if (!match) {
    return undefined;
  }
  const [year, month, day, hours, minutes, seconds, millis] = match.slice(1).map(Number);
  return new Date(year, month - 1, day, hours, minutes, seconds, millis);
}
