/* --------------------------------------------------------------------------
 *  PatchDrift — Types for patch operations
 * ----------------------------------------------------------------------- */

import type { PatchDriftError } from '../errors';

export type HunkLineKind = 'context' | 'added' | 'removed';

/**
 * One body line of a hunk, without its prefix character.
 */
export interface HunkLine {
  readonly kind: HunkLineKind;
  readonly text: string;
  /** Followed by `\ No newline at end of file` in the diff */
  readonly noNewline: boolean;
}

/**
 * Represents a hunk in a diff
 */
export interface Hunk {
  /** The `@@ ... @@` line as written, or a synthetic one for bracketed patches */
  readonly header: string;
  /** 1-based line recorded in the diff; 0 when the diff carries no position */
  readonly oldStart: number;
  readonly oldLines: number;
  readonly newStart: number;
  readonly newLines: number;
  readonly lines: readonly HunkLine[];
  /** Context and removed lines, in order */
  readonly preImage: readonly string[];
  /** Context and added lines, in order */
  readonly postImage: readonly string[];
  /** The last pre-image line has no trailing newline */
  readonly noNewlineBefore: boolean;
  /** The last post-image line has no trailing newline */
  readonly noNewlineAfter: boolean;
}

export type FileOperation = 'modify' | 'add' | 'delete' | 'rename';

export type PatchDialect = 'unified' | 'bracketed';

export type BinaryHunkMethod = 'literal' | 'delta';

/**
 * One encoded block of a `GIT binary patch`.
 */
export interface BinaryHunk {
  readonly method: BinaryHunkMethod;
  /** Inflated size declared in the block header */
  readonly size: number;
  /** Raw base85 data lines, length prefix included */
  readonly lines: readonly string[];
}

export interface BinaryPatchPayload {
  readonly forward: BinaryHunk;
  readonly reverse?: BinaryHunk;
}

/**
 * All edits for one file.
 */
export interface FileDiff {
  readonly sourcePath: string;
  readonly targetPath: string;
  readonly operation: FileOperation;
  readonly hunks: readonly Hunk[];
  readonly binary: boolean;
  readonly binaryPayload?: BinaryPatchPayload;
}

/**
 * Immutable parse result of one diff text.
 */
export interface PatchSet {
  readonly dialect: PatchDialect;
  readonly files: readonly FileDiff[];
}

/**
 * A possible location for a hunk's pre-image.
 */
export interface MatchCandidate {
  /** 0-based line in the current file */
  readonly line: number;
  readonly score: number;
  readonly exact: boolean;
  /** How many of the pre-image's first/last lines match exactly (0-2) */
  readonly anchorHits: number;
  /** Distance in lines from the recorded position */
  readonly distance: number;
}

export type ResolutionSource =
  | 'exact'
  | 'fuzzy'
  | 'metadata'
  | 'auto'
  | 'suggestion'
  | 'interactive'
  | 'none';

export type HunkStatus = 'applied' | 'already-applied' | 'skipped' | 'failed' | 'pending';

/**
 * Free-text help produced for a hunk that could not be placed. Never applied.
 */
export interface ConflictSuggestion {
  readonly summary: string;
  readonly excerpt?: string;
  readonly fragment?: string;
}

export interface HunkDecision {
  readonly index: number;
  readonly header: string;
  status: HunkStatus;
  /** Location strategy that produced the candidates */
  strategy?: string;
  /** 0-based line the hunk was placed at */
  chosenLine?: number;
  confidence?: number;
  source: ResolutionSource;
  candidates: readonly MatchCandidate[];
  rationale?: string;
  error?: PatchDriftError;
  suggestion?: ConflictSuggestion;
}

export type FileStatus = 'applied' | 'skipped' | 'failed';

/**
 * Result of applying a patch to a file
 */
export interface ApplyResult {
  /** Resolved path relative to the root (the diff's path when unresolved) */
  filePath: string;
  /** Path as written in the diff */
  sourcePath: string;
  operation: FileOperation;
  status: FileStatus;
  hunks: HunkDecision[];
  /** Whether the file was (or in dry-run, would be) rewritten */
  changed: boolean;
  /** File-level resolution source when the path needed a decision */
  resolution?: ResolutionSource;
  fileCandidates?: readonly string[];
  error?: PatchDriftError;
  /** Free-form note, e.g. why the file was not processed */
  message?: string;
}

export interface ApplyProgress {
  filesProcessed: number;
  filesTotal: number;
  currentFile?: string;
  hunksProcessed: number;
  hunksTotal: number;
}

export type ProgressCallback = (progress: ApplyProgress) => void;
