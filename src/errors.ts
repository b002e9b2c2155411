/* --------------------------------------------------------------------------
 *  PatchDrift — Error taxonomy
 * ----------------------------------------------------------------------- */

/**
 * Base class for every error the engine raises or records.
 */
export class PatchDriftError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = 'PatchDriftError';
  }
}

/**
 * Malformed diff input. Fatal for the whole patch set.
 */
export class ParseError extends PatchDriftError {
  constructor(message: string, readonly lineNumber?: number) {
    super(lineNumber === undefined ? message : `${message} (line ${lineNumber})`, 'ParseError');
    this.name = 'ParseError';
  }
}

export type FileResolutionReason = 'NotFound' | 'Ambiguous';

export class FileResolutionError extends PatchDriftError {
  constructor(
    message: string,
    readonly reason: FileResolutionReason,
    readonly candidates: readonly string[] = [],
  ) {
    super(message, `FileResolutionError.${reason}`);
    this.name = 'FileResolutionError';
  }
}

export type MatchFailureReason = 'NoCandidate' | 'LowConfidence';

export class MatchError extends PatchDriftError {
  constructor(message: string, readonly reason: MatchFailureReason, readonly bestScore = 0) {
    super(message, `MatchError.${reason}`);
    this.name = 'MatchError';
  }
}

export type ApplyFailureReason = 'ConflictUnresolved' | 'WriteFailure';

export class ApplyError extends PatchDriftError {
  constructor(message: string, readonly reason: ApplyFailureReason) {
    super(message, `ApplyError.${reason}`);
    this.name = 'ApplyError';
  }
}

export class BackupError extends PatchDriftError {
  constructor(message: string) {
    super(message, 'BackupError');
    this.name = 'BackupError';
  }
}

export class BinaryPatchError extends PatchDriftError {
  constructor(message: string) {
    super(message, 'BinaryPatchError');
    this.name = 'BinaryPatchError';
  }
}

export class ConfigurationError extends PatchDriftError {
  constructor(message: string) {
    super(message, 'ConfigurationError');
    this.name = 'ConfigurationError';
  }
}

/**
 * Git-related failures (auto-staging).
 */
export class GitError extends PatchDriftError {
  constructor(message: string) {
    super(message, 'GitError');
    this.name = 'GitError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
