/* --------------------------------------------------------------------------
 *  PatchDrift — Public API
 * ----------------------------------------------------------------------- */

export { applyPatch, listSessions, restoreSession } from './applyPatch';
export type { ApplyPatchOptions, ApplyPatchOutcome } from './applyPatch';

export { parsePatchSet, extractFilePath, DEV_NULL } from './patch/PatchParser';
export type { ParseOptions } from './patch/PatchParser';
export { HunkManager } from './patch/HunkManager';
export type { FoldResult, HunkPlacement } from './patch/HunkManager';
export { ApplySession } from './patch/PatchSession';

export { ProjectFileIndex } from './workspace/ProjectFileIndex';
export type { FileCandidate, FileResolution } from './workspace/ProjectFileIndex';

export { FuzzyLocationMatcher } from './strategies/FuzzyLocationMatcher';
export { LocationStrategyFactory } from './strategies/locationStrategy';
export type { LocateOptions, LocationStrategy, MatchResult } from './strategies/locationStrategy';
export { AnchorTieBreak, ProximityTieBreak, createTieBreak } from './strategies/tieBreak';
export type { TieBreakStrategy } from './strategies/tieBreak';
export { similarity } from './strategies/similarity';

export { ConflictResolutionProtocol } from './conflict/ConflictResolutionProtocol';
export type {
  ConflictResolution,
  ConflictState,
  Decision,
  DecisionRequest,
  DecisionSource,
  FileDecisionRequest,
  HunkDecisionRequest,
} from './conflict/ConflictResolutionProtocol';
export {
  AutoDecisionSource,
  InteractiveDecisionSource,
  SuggestionDecisionSource,
  createDecisionSources,
} from './conflict/decisionSources';
export type { InteractiveCallback } from './conflict/decisionSources';
export { HttpSuggestionService, SuggestionTimeoutError } from './conflict/SuggestionService';
export type { HttpClient, SuggestionResponse, SuggestionService } from './conflict/SuggestionService';

export { PatchExecutor } from './executor/PatchExecutor';
export { BackupManager } from './backup/BackupManager';
export type { RestoreOptions, RestoreResult, SessionInfo } from './backup/BackupManager';
export { ReportGenerator } from './report/ReportGenerator';
export type { SessionReport } from './report/ReportGenerator';
export { BinaryPatchHandler } from './binary/BinaryPatchHandler';
export { autoStageFiles, isGitAvailable } from './git';

export {
  DEFAULT_CONFIG,
  PatchDriftConfigSchema,
  loadConfiguration,
  resolveConfiguration,
} from './config';
export type { PatchDriftConfig, PatchDriftConfigInput } from './config';
export * from './errors';
export { setLogLevel, setLogSink, withLogLevel } from './logger';
export type { LogLevel } from './logger';
export * from './types/patchTypes';
