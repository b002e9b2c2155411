/* --------------------------------------------------------------------------
 *  PatchDrift — Drift-tolerant patch application
 * ----------------------------------------------------------------------- */

import * as path from 'node:path';
import { BackupManager, RestoreOptions, RestoreResult, SessionInfo } from './backup/BackupManager';
import {
  effectiveExcludes,
  loadConfiguration,
  PatchDriftConfig,
  PatchDriftConfigInput,
  resolveBackupBase,
} from './config';
import { ConflictResolutionProtocol } from './conflict/ConflictResolutionProtocol';
import { createDecisionSources, InteractiveCallback } from './conflict/decisionSources';
import { SuggestionService } from './conflict/SuggestionService';
import { GitError } from './errors';
import { PatchExecutor } from './executor/PatchExecutor';
import { autoStageFiles } from './git';
import { getOutputChannel, withLogLevel } from './logger';
import { parsePatchSet } from './patch/PatchParser';
import { ApplySession } from './patch/PatchSession';
import { ReportGenerator, SessionReport, WrittenReport } from './report/ReportGenerator';
import { isSafePath, toRelativePosix } from './security/pathSanitizer';
import { FuzzyLocationMatcher } from './strategies/FuzzyLocationMatcher';
import { ApplyResult, FileDiff, PatchSet, ProgressCallback } from './types/patchTypes';
import { ProjectFileIndex } from './workspace/ProjectFileIndex';

export interface ApplyPatchOptions {
  /** Working tree the diff applies to */
  root: string;
  /** Overrides merged over `.patchdrift.json` */
  config?: PatchDriftConfigInput;
  /** Explicit configuration file instead of `<root>/.patchdrift.json` */
  configPath?: string;
  interactive?: InteractiveCallback;
  suggestionService?: SuggestionService;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  /** Session start time; also names the session */
  now?: Date;
}

export interface ApplyPatchOutcome {
  session: ApplySession;
  patchSet: PatchSet;
  config: PatchDriftConfig;
  report: SessionReport;
  reportText: string;
  reportFiles?: WrittenReport;
  staged: string[];
  stagingError?: GitError;
  pruned: string[];
  cancelled: boolean;
}

function cancelledResult(fileDiff: FileDiff): ApplyResult {
  const sourcePath = fileDiff.operation === 'add' ? fileDiff.targetPath : fileDiff.sourcePath;
  return {
    filePath: sourcePath,
    sourcePath,
    operation: fileDiff.operation,
    status: 'skipped',
    hunks: fileDiff.hunks.map((hunk, index) => ({
      index,
      header: hunk.header,
      status: 'skipped',
      source: 'none',
      candidates: [],
      rationale: 'Cancelled',
    })),
    changed: false,
    message: 'Cancelled before this file was processed',
  };
}

/** Paths a session wrote, as git sees them. */
function touchedPaths(results: readonly ApplyResult[]): string[] {
  const paths = new Set<string>();
  for (const result of results) {
    if (!result.changed) {
      continue;
    }
    paths.add(result.filePath);
    if (result.operation === 'rename' && isSafePath(result.sourcePath)) {
      paths.add(result.sourcePath);
    }
  }
  return [...paths].sort();
}

async function createManager(root: string, options: Pick<ApplyPatchOptions, 'config' | 'configPath'>) {
  const { config } = await loadConfiguration(root, options.config ?? {}, options.configPath);
  return { config, manager: new BackupManager(root, resolveBackupBase(root, config)) };
}

/**
 * Parses `patchInput` and applies every file diff to `options.root`.
 * Malformed input throws a ParseError before anything is touched; problems
 * with individual files are recorded in the session and its report.
 */
export async function applyPatch(patchInput: string | PatchSet, options: ApplyPatchOptions): Promise<ApplyPatchOutcome> {
  const root = path.resolve(options.root);
  const { config, manager } = await createManager(root, options);
  return withLogLevel(config.logLevel, () => runSession(patchInput, options, root, config, manager));
}

async function runSession(
  patchInput: string | PatchSet,
  options: ApplyPatchOptions,
  root: string,
  config: PatchDriftConfig,
  manager: BackupManager,
): Promise<ApplyPatchOutcome> {
  const log = getOutputChannel();

  const patchSet = typeof patchInput === 'string'
    ? parsePatchSet(patchInput, { strict: config.strictParsing })
    : patchInput;

  const startedAt = options.now ?? new Date();
  const session = new ApplySession(await manager.createSessionId(startedAt), root, config.dryRun, startedAt);
  const backups = manager.openSession(session.id, config.dryRun);

  const excludes = effectiveExcludes(config);
  const backupRel = toRelativePosix(root, manager.backupBase);
  if (isSafePath(backupRel)) {
    excludes.push(backupRel);
  }
  const index = await ProjectFileIndex.build(root, { excludes });

  const executor = new PatchExecutor({
    root,
    config,
    index,
    matcher: FuzzyLocationMatcher.fromConfig(config),
    protocol: new ConflictResolutionProtocol(
      createDecisionSources(config, { interactive: options.interactive, suggestionService: options.suggestionService }),
      { suggestionMinConfidence: config.suggestionMinConfidence },
    ),
    backups,
  });

  log.info(`Session ${session.id}: ${patchSet.files.length} file diff(s)${config.dryRun ? ' (dry-run)' : ''}`);

  const filesTotal = patchSet.files.length;
  const hunksTotal = patchSet.files.reduce((sum, f) => sum + f.hunks.length, 0);
  let hunksProcessed = 0;

  for (const [position, fileDiff] of patchSet.files.entries()) {
    if (options.signal?.aborted) {
      session.addResult(cancelledResult(fileDiff));
      continue;
    }

    const hunksBefore = hunksProcessed;
    const currentFile = fileDiff.operation === 'add' ? fileDiff.targetPath : fileDiff.sourcePath;
    const result = await executor.applyFile(fileDiff, {
      signal: options.signal,
      onHunk: () => {
        hunksProcessed++;
        options.onProgress?.({ filesProcessed: position, filesTotal, currentFile, hunksProcessed, hunksTotal });
      },
    });
    session.addResult(result);

    hunksProcessed = hunksBefore + fileDiff.hunks.length;
    options.onProgress?.({ filesProcessed: position + 1, filesTotal, currentFile, hunksProcessed, hunksTotal });
  }
  const cancelled = options.signal?.aborted ?? false;
  if (cancelled) {
    log.warn(`Session ${session.id} cancelled`);
  }

  session.close(new Date());

  let staged: string[] = [];
  let stagingError: GitError | undefined;
  if (config.autoStage && !config.dryRun) {
    try {
      staged = await autoStageFiles(root, touchedPaths(session.results));
    } catch (error) {
      if (!(error instanceof GitError)) {
        throw error;
      }
      log.error(`Auto-stage failed: ${error.message}`);
      stagingError = error;
    }
  }

  const generator = new ReportGenerator();
  const report = generator.build(session);
  const reportText = generator.render(report);
  const reportFiles = config.writeReports
    ? await generator.write(report, manager.reportsDirectory(session.id))
    : undefined;

  const pruned = config.dryRun ? [] : await manager.prune(config.retention, startedAt);

  const { summary } = report;
  log.info(`Session ${session.id} finished: ${summary.applied} applied, ${summary.skipped} skipped, ${summary.failed} failed`);

  return { session, patchSet, config, report, reportText, reportFiles, staged, stagingError, pruned, cancelled };
}

/**
 * Restores the files a session changed and removes the ones it created.
 */
export async function restoreSession(
  sessionId: string,
  options: Pick<ApplyPatchOptions, 'root' | 'config' | 'configPath'> & RestoreOptions,
): Promise<RestoreResult> {
  const { config, manager } = await createManager(path.resolve(options.root), options);
  return withLogLevel(config.logLevel, () => manager.restore(sessionId, options));
}

/**
 * Backup sessions of a working tree, newest first.
 */
export async function listSessions(
  options: Pick<ApplyPatchOptions, 'root' | 'config' | 'configPath'>,
): Promise<SessionInfo[]> {
  const { config, manager } = await createManager(path.resolve(options.root), options);
  return withLogLevel(config.logLevel, () => manager.listSessions());
}
