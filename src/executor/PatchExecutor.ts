/* --------------------------------------------------------------------------
 *  PatchDrift — Per-file patch execution
 * ----------------------------------------------------------------------- */

import { promises as fs } from 'node:fs';
import { BackupSession } from '../backup/BackupManager';
import { BinaryPatchHandler } from '../binary/BinaryPatchHandler';
import type { PatchDriftConfig } from '../config';
import { ConflictResolution, ConflictResolutionProtocol, ConflictState } from '../conflict/ConflictResolutionProtocol';
import { buildConflictSuggestion } from '../conflict/conflictSuggestion';
import {
  ApplyError,
  errorMessage,
  FileResolutionError,
  MatchError,
  PatchDriftError,
} from '../errors';
import { decodeText, encodeText } from '../encoding';
import { FileSnapshot, pathExists, readSnapshot, withModificationCheck, writeFileAtomic } from '../fileSystem';
import { getOutputChannel } from '../logger';
import { HunkManager, HunkPlacement } from '../patch/HunkManager';
import { isSafePath, resolveInsideRoot } from '../security/pathSanitizer';
import { FuzzyLocationMatcher } from '../strategies/FuzzyLocationMatcher';
import { MatchResult, PlacedStatus } from '../strategies/locationStrategy';
import { windowText } from '../strategies/similarity';
import {
  ApplyResult,
  FileDiff,
  FileStatus,
  Hunk,
  HunkDecision,
  HunkStatus,
  MatchCandidate,
  ResolutionSource,
} from '../types/patchTypes';
import { joinContent, splitContent, SplitContent } from '../utilities';
import { ProjectFileIndex } from '../workspace/ProjectFileIndex';

export interface PatchExecutorOptions {
  root: string;
  config: Pick<PatchDriftConfig, 'dryRun' | 'partialApply' | 'mtimeCheck'>;
  index: ProjectFileIndex;
  matcher: FuzzyLocationMatcher;
  protocol: ConflictResolutionProtocol;
  backups: BackupSession;
  hunkManager?: HunkManager;
  binaryHandler?: BinaryPatchHandler;
}

export interface ExecuteFileOptions {
  signal?: AbortSignal;
  /** Called after each hunk has been decided */
  onHunk?: () => void;
}

interface ResolvedTarget {
  relPath: string;
  resolution?: ResolutionSource;
  fileCandidates?: string[];
}

type TargetOutcome =
  | { kind: 'resolved'; target: ResolvedTarget }
  | { kind: 'unresolved'; result: ApplyResult };

/** What to write once every hunk of a file has been decided */
interface WritePlan {
  relPath: string;
  /** Destination; differs from relPath for renames */
  targetRel: string;
  /** Undefined removes the file */
  content: Buffer | undefined;
  /** mtime observed when the source was read; undefined for new files */
  mtimeMs?: number;
}

const PLACED_SOURCE: Record<PlacedStatus, ResolutionSource> = {
  'exact': 'exact',
  'fuzzy': 'fuzzy',
  'insertion': 'metadata',
  'already-applied': 'exact',
};

function fileStatusOf(hunks: readonly HunkDecision[]): FileStatus {
  if (hunks.some(h => h.status === 'failed')) {
    return 'failed';
  }
  if (hunks.some(h => h.status === 'skipped' || h.status === 'pending')) {
    return 'skipped';
  }
  return 'applied';
}

function hunkStatusOf(state: ConflictState): HunkStatus {
  switch (state) {
    case 'pending':
      return 'pending';
    case 'failed':
      return 'failed';
    default:
      return 'skipped';
  }
}

function undecided(hunks: readonly Hunk[], status: HunkStatus): HunkDecision[] {
  return hunks.map((hunk, index) => ({ index, header: hunk.header, status, source: 'none', candidates: [] }));
}

/**
 * Applies one {@link FileDiff} to the working tree: resolves its target,
 * places every hunk, folds the accepted ones into the original lines and
 * writes the result atomically behind a backup.
 */
export class PatchExecutor {
  private readonly hunkManager: HunkManager;
  private readonly binaryHandler: BinaryPatchHandler;
  /** Dry-run writes (null for removals), read back by later file diffs */
  private readonly overlay = new Map<string, FileSnapshot | null>();

  constructor(private readonly options: PatchExecutorOptions) {
    this.hunkManager = options.hunkManager ?? new HunkManager();
    this.binaryHandler = options.binaryHandler ?? new BinaryPatchHandler();
  }

  private get dryRun(): boolean {
    return this.options.config.dryRun;
  }

  async applyFile(fileDiff: FileDiff, run: ExecuteFileOptions = {}): Promise<ApplyResult> {
    const sourcePath = fileDiff.operation === 'add' ? fileDiff.targetPath : fileDiff.sourcePath;
    getOutputChannel().info(`${this.dryRun ? '[dry-run] ' : ''}${fileDiff.operation} ${sourcePath}`);

    const unsafe = [fileDiff.sourcePath, fileDiff.targetPath].find(p => !isSafePath(p));
    if (unsafe !== undefined) {
      return this.failed(fileDiff, sourcePath, new FileResolutionError(`Refusing unsafe path: ${unsafe}`, 'NotFound'));
    }

    try {
      if (fileDiff.operation === 'add') {
        return await this.applyAdd(fileDiff, run);
      }

      const outcome = await this.resolveTarget(fileDiff, sourcePath);
      if (outcome.kind === 'unresolved') {
        return outcome.result;
      }
      return await this.applyExisting(fileDiff, outcome.target, run);
    } catch (error) {
      if (error instanceof PatchDriftError) {
        return this.failed(fileDiff, sourcePath, error);
      }
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Target resolution
  // ---------------------------------------------------------------------------

  private async resolveTarget(fileDiff: FileDiff, sourcePath: string): Promise<TargetOutcome> {
    const resolution = await this.options.index.resolve(sourcePath);

    if (resolution.kind === 'found') {
      return {
        kind: 'resolved',
        target: { relPath: resolution.path, resolution: resolution.via === 'name' ? 'fuzzy' : undefined },
      };
    }

    if (resolution.kind === 'not-found') {
      if (fileDiff.operation === 'delete') {
        return {
          kind: 'unresolved',
          result: {
            filePath: sourcePath,
            sourcePath,
            operation: fileDiff.operation,
            status: 'applied',
            hunks: undecided(fileDiff.hunks, 'already-applied'),
            changed: false,
            message: 'File is already absent',
          },
        };
      }
      // Nothing to choose from, but an interactive source still gets to see it
      const decision = await this.options.protocol.resolve({
        kind: 'file',
        filePath: sourcePath,
        candidates: [],
        decisive: false,
        reason: 'not-found',
      });
      return {
        kind: 'unresolved',
        result: {
          filePath: sourcePath,
          sourcePath,
          operation: fileDiff.operation,
          status: 'skipped',
          hunks: undecided(fileDiff.hunks, hunkStatusOf(decision.state) === 'pending' ? 'pending' : 'skipped'),
          changed: false,
          error: new FileResolutionError(`No file matches ${sourcePath}`, 'NotFound'),
          message: decision.skipReason,
        },
      };
    }

    const paths = resolution.candidates.map(c => c.path);
    const decision = await this.options.protocol.resolve({
      kind: 'file',
      filePath: sourcePath,
      candidates: resolution.candidates,
      decisive: resolution.decisive,
      reason: 'ambiguous',
    });

    if (decision.index !== undefined) {
      const chosen = paths[decision.index];
      getOutputChannel().info(`Resolved ${sourcePath} → ${chosen} (${decision.source})`);
      return { kind: 'resolved', target: { relPath: chosen, resolution: decision.source, fileCandidates: paths } };
    }

    const status = hunkStatusOf(decision.state);
    return {
      kind: 'unresolved',
      result: {
        filePath: sourcePath,
        sourcePath,
        operation: fileDiff.operation,
        status: 'skipped',
        hunks: undecided(fileDiff.hunks, status === 'pending' ? 'pending' : 'skipped'),
        changed: false,
        fileCandidates: paths,
        error: new FileResolutionError(`${paths.length} files match ${sourcePath}`, 'Ambiguous', paths),
        message: decision.skipReason ?? (status === 'pending' ? 'Awaiting a decision' : undefined),
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  private async applyAdd(fileDiff: FileDiff, run: ExecuteFileOptions): Promise<ApplyResult> {
    const relPath = fileDiff.targetPath;

    let content: Buffer;
    let text: string | undefined;
    if (fileDiff.binary) {
      content = this.binaryHandler.apply(fileDiff, undefined) ?? Buffer.alloc(0);
    } else {
      const lines = fileDiff.hunks.flatMap(h => h.postImage);
      const last = fileDiff.hunks.at(-1);
      text = joinContent({ lines, eol: '\n', trailingNewline: !(last?.noNewlineAfter ?? false) });
      content = encodeText(text, 'utf8');
    }

    let newLine = 0;
    const hunks: HunkDecision[] = fileDiff.hunks.map((hunk, index) => {
      const decision: HunkDecision = {
        index,
        header: hunk.header,
        status: 'applied',
        strategy: 'metadata',
        chosenLine: newLine,
        confidence: 1,
        source: 'metadata',
        candidates: [],
      };
      newLine += hunk.postImage.length;
      run.onHunk?.();
      return decision;
    });

    if (await this.exists(relPath)) {
      const existing = (await this.read(relPath)).content;
      const same = text === undefined ? content.equals(existing) : decodeText(existing).text === text;
      if (same) {
        hunks.forEach(h => (h.status = 'already-applied'));
        return this.result(fileDiff, relPath, hunks, false, { message: 'File already exists with the added content' });
      }
      return this.failed(fileDiff, relPath, new ApplyError(`Cannot add ${relPath}: file already exists`, 'ConflictUnresolved'));
    }

    await this.commit({ relPath, targetRel: relPath, content });
    return this.result(fileDiff, relPath, hunks, true);
  }

  private async applyExisting(fileDiff: FileDiff, target: ResolvedTarget, run: ExecuteFileOptions): Promise<ApplyResult> {
    const { relPath } = target;
    const snapshot = await this.read(relPath);
    const targetRel = fileDiff.operation === 'rename' ? fileDiff.targetPath : relPath;

    if (targetRel !== relPath && (await this.exists(targetRel))) {
      throw new ApplyError(`Cannot rename ${relPath} to ${targetRel}: target exists`, 'ConflictUnresolved');
    }

    if (fileDiff.binary) {
      const content = this.binaryHandler.apply(fileDiff, snapshot.content);
      run.onHunk?.();
      if (content !== undefined && targetRel === relPath && content.equals(snapshot.content)) {
        return this.result(fileDiff, relPath, [], false, { target, message: 'Binary content already up to date' });
      }
      await this.commit({ relPath, targetRel, content, mtimeMs: snapshot.mtimeMs });
      return this.result(fileDiff, targetRel, [], true, { target });
    }

    const decoded = decodeText(snapshot.content);
    const original = splitContent(decoded.text);

    if (fileDiff.operation === 'delete') {
      return this.applyDelete(fileDiff, target, original, snapshot.mtimeMs, run);
    }

    const { hunks, placements } = await this.placeHunks(fileDiff, relPath, original.lines, run);

    const incomplete = hunks.some(h => h.status !== 'applied' && h.status !== 'already-applied');
    if (incomplete && !this.options.config.partialApply) {
      for (const hunk of hunks) {
        if (hunk.status === 'applied') {
          hunk.status = 'skipped';
          hunk.rationale = 'Not written: other hunks in this file did not apply';
        }
      }
      return this.result(fileDiff, relPath, hunks, false, { target });
    }

    let next: SplitContent;
    try {
      next = this.fold(original, placements);
    } catch (error) {
      if (error instanceof ApplyError) {
        const placed = new Set(placements.map(p => p.index));
        for (const hunk of hunks) {
          if (placed.has(hunk.index)) {
            hunk.status = 'failed';
            hunk.error = error;
          }
        }
        return this.result(fileDiff, relPath, hunks, false, { target, error });
      }
      throw error;
    }

    const text = joinContent(next);
    const changed = targetRel !== relPath || text !== decoded.text;
    if (changed) {
      const content = encodeText(text, decoded.encoding, decoded.bom);
      await this.commit({ relPath, targetRel, content, mtimeMs: snapshot.mtimeMs });
    }
    return this.result(fileDiff, targetRel, hunks, changed, { target });
  }

  private async applyDelete(
    fileDiff: FileDiff,
    target: ResolvedTarget,
    original: SplitContent,
    mtimeMs: number,
    run: ExecuteFileOptions,
  ): Promise<ApplyResult> {
    const expected = fileDiff.hunks.flatMap(h => h.preImage);
    const hunks: HunkDecision[] = fileDiff.hunks.map((hunk, index) => ({
      index,
      header: hunk.header,
      status: 'applied',
      strategy: 'exact',
      chosenLine: Math.max(hunk.oldStart - 1, 0),
      confidence: 1,
      source: 'exact',
      candidates: [],
    }));
    hunks.forEach(() => run.onHunk?.());

    const matches = expected.length === original.lines.length && expected.every((line, i) => line === original.lines[i]);
    if (fileDiff.hunks.length > 0 && !matches) {
      const error = new ApplyError(`Content of ${target.relPath} differs from the deleted content`, 'ConflictUnresolved');
      hunks.forEach(h => {
        h.status = 'failed';
        h.error = error;
        h.chosenLine = undefined;
        h.confidence = undefined;
        h.source = 'none';
      });
      return this.result(fileDiff, target.relPath, hunks, false, { target, error });
    }

    await this.commit({ relPath: target.relPath, targetRel: target.relPath, content: undefined, mtimeMs });
    return this.result(fileDiff, target.relPath, hunks, true, { target });
  }

  // ---------------------------------------------------------------------------
  // Hunk placement
  // ---------------------------------------------------------------------------

  private async placeHunks(
    fileDiff: FileDiff,
    relPath: string,
    lines: readonly string[],
    run: ExecuteFileOptions,
  ): Promise<{ hunks: HunkDecision[]; placements: HunkPlacement[] }> {
    const hunks: HunkDecision[] = [];
    const placements: HunkPlacement[] = [];

    for (const [index, hunk] of fileDiff.hunks.entries()) {
      if (run.signal?.aborted) {
        hunks.push({ index, header: hunk.header, status: 'skipped', source: 'none', candidates: [], rationale: 'Cancelled' });
        continue;
      }

      const match = this.options.matcher.match(lines, hunk);
      const decision = await this.decideHunk(relPath, lines, hunk, index, match);
      hunks.push(decision);
      if (decision.status === 'applied' && decision.chosenLine !== undefined) {
        const line = decision.chosenLine;
        const matched = decision.source === 'exact' || decision.source === 'metadata'
          ? undefined
          : lines.slice(line, line + hunk.preImage.length);
        placements.push({ index, hunk, line, matched });
      }
      run.onHunk?.();
    }

    return { hunks, placements };
  }

  private async decideHunk(
    relPath: string,
    lines: readonly string[],
    hunk: Hunk,
    index: number,
    match: MatchResult,
  ): Promise<HunkDecision> {
    const base = { index, header: hunk.header, strategy: match.strategy, candidates: match.candidates };

    switch (match.status) {
      case 'exact':
      case 'fuzzy':
      case 'insertion':
        return {
          ...base,
          status: 'applied',
          chosenLine: match.candidate.line,
          confidence: match.candidate.score,
          source: PLACED_SOURCE[match.status],
        };

      case 'already-applied':
        getOutputChannel().info(`Hunk ${index + 1} of ${relPath} is already applied`);
        return { ...base, status: 'already-applied', chosenLine: match.candidate.line, confidence: 1, source: 'exact' };

      case 'ambiguous': {
        const resolution = await this.options.protocol.resolve({
          kind: 'hunk',
          filePath: relPath,
          hunk,
          hunkIndex: index,
          candidates: match.candidates,
          excerpts: this.excerpts(lines, hunk, match.candidates),
          reason: 'ambiguous',
        });
        return this.fromResolution(base, resolution, match.candidates);
      }

      case 'unmatched': {
        const resolution = await this.options.protocol.resolve({
          kind: 'hunk',
          filePath: relPath,
          hunk,
          hunkIndex: index,
          candidates: match.candidates,
          excerpts: this.excerpts(lines, hunk, match.candidates),
          reason: match.error.reason === 'LowConfidence' ? 'low-confidence' : 'no-candidate',
        });
        const decision = this.fromResolution(base, resolution, match.candidates, match.error);
        if (decision.status === 'failed') {
          decision.suggestion ??= buildConflictSuggestion(relPath, lines, hunk, match.candidates);
        }
        return decision;
      }
    }
  }

  private fromResolution(
    base: Pick<HunkDecision, 'index' | 'header' | 'strategy' | 'candidates'>,
    resolution: ConflictResolution,
    candidates: readonly MatchCandidate[],
    matchError?: MatchError,
  ): HunkDecision {
    const chosen = resolution.index === undefined ? undefined : candidates[resolution.index];
    if (chosen) {
      return {
        ...base,
        status: 'applied',
        chosenLine: chosen.line,
        confidence: resolution.confidence ?? chosen.score,
        source: resolution.source,
        rationale: resolution.rationale,
        suggestion: resolution.suggestion,
      };
    }

    const status = hunkStatusOf(resolution.state);
    return {
      ...base,
      status,
      source: 'none',
      rationale: resolution.skipReason,
      suggestion: resolution.suggestion,
      error: status === 'failed' ? matchError : undefined,
    };
  }

  private excerpts(lines: readonly string[], hunk: Hunk, candidates: readonly MatchCandidate[]): string[] {
    return candidates.map(c => windowText(lines, c.line, hunk.preImage.length));
  }

  /**
   * Folds placements and settles the trailing newline: kept as it was unless
   * a hunk reaching the end of the file changes it.
   */
  private fold(original: SplitContent, placements: readonly HunkPlacement[]): SplitContent {
    const folded = this.hunkManager.fold(original.lines, placements);
    let trailingNewline = original.trailingNewline;

    const last = folded.lastPlacement?.hunk;
    if (folded.touchesEnd && last) {
      if (original.lines.length === 0) {
        trailingNewline = !last.noNewlineAfter;
      } else if (last.noNewlineBefore !== last.noNewlineAfter) {
        trailingNewline = !last.noNewlineAfter;
      }
    }

    return { lines: folded.lines, eol: original.eol, trailingNewline };
  }

  // ---------------------------------------------------------------------------
  // Disk access
  // ---------------------------------------------------------------------------

  private absolute(relPath: string): string {
    const absPath = resolveInsideRoot(this.options.root, relPath);
    if (!absPath) {
      throw new ApplyError(`Refusing to touch path outside the root: ${relPath}`, 'WriteFailure');
    }
    return absPath;
  }

  private async exists(relPath: string): Promise<boolean> {
    const staged = this.overlay.get(relPath);
    if (staged !== undefined) {
      return staged !== null;
    }
    return pathExists(this.absolute(relPath));
  }

  private async read(relPath: string): Promise<FileSnapshot> {
    const staged = this.overlay.get(relPath);
    if (staged === null) {
      throw new ApplyError(`Could not read ${relPath}: removed earlier in this session`, 'WriteFailure');
    }
    if (staged) {
      return staged;
    }
    try {
      return await readSnapshot(this.absolute(relPath));
    } catch (error) {
      if (error instanceof PatchDriftError) {
        throw error;
      }
      throw new ApplyError(`Could not read ${relPath}: ${errorMessage(error)}`, 'WriteFailure');
    }
  }

  /**
   * Backs up, then writes, moves or removes. In dry-run the change only goes
   * to the overlay and the index.
   */
  private async commit(plan: WritePlan): Promise<void> {
    const { backups, index, config } = this.options;
    if (this.dryRun) {
      const mtimeMs = plan.mtimeMs ?? 0;
      if (plan.content === undefined) {
        this.overlay.set(plan.relPath, null);
        index.remove(plan.relPath);
        return;
      }
      if (plan.targetRel !== plan.relPath) {
        this.overlay.set(plan.relPath, null);
        index.remove(plan.relPath);
      }
      this.overlay.set(plan.targetRel, { content: plan.content, mtimeMs });
      index.add(plan.targetRel);
      return;
    }

    const check = { mtimeCheck: config.mtimeCheck };
    const sourceAbs = this.absolute(plan.relPath);
    const existed = plan.mtimeMs !== undefined;

    if (existed) {
      await backups.ensureBackup(plan.relPath);
    }

    if (plan.content === undefined) {
      await withModificationCheck(sourceAbs, plan.mtimeMs, () => fs.rm(sourceAbs), check);
      index.remove(plan.relPath);
      return;
    }

    const content = plan.content;
    if (plan.targetRel === plan.relPath) {
      if (!existed) {
        await backups.recordCreated(plan.relPath);
      }
      await withModificationCheck(sourceAbs, plan.mtimeMs, () => writeFileAtomic(sourceAbs, content), check);
      index.add(plan.relPath);
      return;
    }

    const targetAbs = this.absolute(plan.targetRel);
    await backups.recordCreated(plan.targetRel);
    await withModificationCheck(sourceAbs, plan.mtimeMs, async () => {
      await writeFileAtomic(targetAbs, content);
      await fs.rm(sourceAbs);
    }, check);
    index.remove(plan.relPath);
    index.add(plan.targetRel);
  }

  // ---------------------------------------------------------------------------
  // Results
  // ---------------------------------------------------------------------------

  private result(
    fileDiff: FileDiff,
    filePath: string,
    hunks: HunkDecision[],
    changed: boolean,
    extra: { target?: ResolvedTarget; error?: PatchDriftError; message?: string } = {},
  ): ApplyResult {
    const status = extra.error ? 'failed' : fileStatusOf(hunks);
    return {
      filePath,
      sourcePath: fileDiff.operation === 'add' ? fileDiff.targetPath : fileDiff.sourcePath,
      operation: fileDiff.operation,
      status,
      hunks,
      changed: changed && !extra.error,
      resolution: extra.target?.resolution,
      fileCandidates: extra.target?.fileCandidates,
      error: extra.error,
      message: extra.message,
    };
  }

  private failed(fileDiff: FileDiff, filePath: string, error: PatchDriftError): ApplyResult {
    getOutputChannel().error(`${filePath}: ${error.message}`);
    return this.result(fileDiff, filePath, undecided(fileDiff.hunks, 'failed'), false, { error });
  }
}
