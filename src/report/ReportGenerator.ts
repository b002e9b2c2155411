/* --------------------------------------------------------------------------
 *  PatchDrift — Session reports (structured record + plain text)
 * ----------------------------------------------------------------------- */

import * as path from 'node:path';
import { REPORT_JSON, REPORT_TXT } from '../config';
import { errorMessage, PatchDriftError } from '../errors';
import { writeFileAtomic } from '../fileSystem';
import { getOutputChannel } from '../logger';
import { ApplySession } from '../patch/PatchSession';
import {
  ApplyResult,
  ConflictSuggestion,
  FileOperation,
  FileStatus,
  HunkDecision,
  HunkStatus,
  MatchCandidate,
  ResolutionSource,
} from '../types/patchTypes';

const MAX_LISTED_CANDIDATES = 5;

export interface ErrorReport {
  name: string;
  code: string;
  message: string;
}

export interface CandidateReport {
  /** 1-based */
  line: number;
  score: number;
  exact: boolean;
  anchorHits: number;
}

export interface HunkReport {
  /** 1-based hunk number within the file */
  index: number;
  header: string;
  status: HunkStatus;
  strategy: string | null;
  /** 1-based line the hunk was placed at */
  chosenLine: number | null;
  confidence: number | null;
  source: ResolutionSource;
  candidates: CandidateReport[];
  rationale: string | null;
  error: ErrorReport | null;
  suggestion: ConflictSuggestion | null;
}

export interface FileReport {
  filePath: string;
  sourcePath: string;
  operation: FileOperation;
  status: FileStatus;
  changed: boolean;
  resolution: ResolutionSource | null;
  fileCandidates: string[];
  message: string | null;
  error: ErrorReport | null;
  hunks: HunkReport[];
}

export interface ReportSummary {
  files: number;
  applied: number;
  skipped: number;
  failed: number;
  hunks: Record<HunkStatus, number>;
}

export interface SessionReport {
  sessionId: string;
  root: string;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string | null;
  success: boolean;
  summary: ReportSummary;
  files: FileReport[];
}

export interface WrittenReport {
  json: string;
  txt: string;
}

function roundScore(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}

function toErrorReport(error: PatchDriftError | undefined): ErrorReport | null {
  return error ? { name: error.name, code: error.code, message: error.message } : null;
}

function toCandidateReport(candidate: MatchCandidate): CandidateReport {
  return {
    line: candidate.line + 1,
    score: roundScore(candidate.score),
    exact: candidate.exact,
    anchorHits: candidate.anchorHits,
  };
}

function toHunkReport(decision: HunkDecision): HunkReport {
  return {
    index: decision.index + 1,
    header: decision.header,
    status: decision.status,
    strategy: decision.strategy ?? null,
    chosenLine: decision.chosenLine === undefined ? null : decision.chosenLine + 1,
    confidence: decision.confidence === undefined ? null : roundScore(decision.confidence),
    source: decision.source,
    candidates: decision.candidates.map(toCandidateReport),
    rationale: decision.rationale ?? null,
    error: toErrorReport(decision.error),
    suggestion: decision.suggestion ?? null,
  };
}

function toFileReport(result: ApplyResult): FileReport {
  return {
    filePath: result.filePath,
    sourcePath: result.sourcePath,
    operation: result.operation,
    status: result.status,
    changed: result.changed,
    resolution: result.resolution ?? null,
    fileCandidates: [...(result.fileCandidates ?? [])],
    message: result.message ?? null,
    error: toErrorReport(result.error),
    hunks: result.hunks.map(toHunkReport),
  };
}

function summarize(files: readonly FileReport[]): ReportSummary {
  const hunks: Record<HunkStatus, number> = {
    'applied': 0,
    'already-applied': 0,
    'skipped': 0,
    'failed': 0,
    'pending': 0,
  };
  for (const file of files) {
    for (const hunk of file.hunks) {
      hunks[hunk.status]++;
    }
  }
  return {
    files: files.length,
    applied: files.filter(f => f.status === 'applied').length,
    skipped: files.filter(f => f.status === 'skipped').length,
    failed: files.filter(f => f.status === 'failed').length,
    hunks,
  };
}

/**
 * Builds, renders and persists session reports.
 */
export class ReportGenerator {
  build(session: ApplySession): SessionReport {
    const files = session.results.map(toFileReport);
    return {
      sessionId: session.id,
      root: session.root,
      dryRun: session.dryRun,
      startedAt: session.startedAt.toISOString(),
      finishedAt: session.finishedAt?.toISOString() ?? null,
      success: session.success,
      summary: summarize(files),
      files,
    };
  }

  render(report: SessionReport): string {
    const { summary } = report;
    const out: string[] = [
      'PatchDrift apply report',
      `Session: ${report.sessionId}`,
      `Root: ${report.root}`,
      `Mode: ${report.dryRun ? 'dry-run' : 'apply'}`,
      `Result: ${report.success ? 'success' : 'incomplete'}`,
      `Files: ${summary.files} total, ${summary.applied} applied, ${summary.skipped} skipped, ${summary.failed} failed`,
    ];

    for (const file of report.files) {
      out.push('');
      out.push(`[${file.status}] ${file.filePath} (${file.operation})`);
      if (file.filePath !== file.sourcePath) {
        out.push(`  From: ${file.sourcePath}`);
      }
      if (file.resolution) {
        out.push(`  Resolved by: ${file.resolution}`);
      }
      if (file.fileCandidates.length > 0) {
        out.push(`  File candidates: ${this.listWithOverflow(file.fileCandidates)}`);
      }
      if (file.message) {
        out.push(`  Note: ${file.message}`);
      }
      if (file.error) {
        out.push(`  Error: ${file.error.code}: ${file.error.message}`);
      }
      for (const hunk of file.hunks) {
        out.push(...this.renderHunk(hunk));
      }
    }

    return out.join('\n') + '\n';
  }

  /**
   * Writes `apply-report.json` and `apply-report.txt` into `directory`.
   */
  async write(report: SessionReport, directory: string): Promise<WrittenReport> {
    const json = path.join(directory, REPORT_JSON);
    const txt = path.join(directory, REPORT_TXT);
    try {
      await writeFileAtomic(json, JSON.stringify(report, null, 2) + '\n');
      await writeFileAtomic(txt, this.render(report));
    } catch (error) {
      getOutputChannel().error(`Could not write reports to ${directory}: ${errorMessage(error)}`);
      throw error;
    }
    getOutputChannel().info(`Reports written to ${directory}`);
    return { json, txt };
  }

  private renderHunk(hunk: HunkReport): string[] {
    let line = `  Hunk ${hunk.index} ${hunk.header}: ${hunk.status}`;
    if (hunk.chosenLine !== null) {
      line += ` at line ${hunk.chosenLine}`;
    }
    if (hunk.source !== 'none') {
      line += hunk.confidence === null
        ? ` (${hunk.source})`
        : ` (${hunk.source}, confidence ${hunk.confidence.toFixed(2)})`;
    }

    const out = [line];
    if (hunk.candidates.length > 0 && hunk.status !== 'applied' && hunk.status !== 'already-applied') {
      const rendered = hunk.candidates.map(c => `line ${c.line} (${c.score.toFixed(2)})`);
      out.push(`    Candidates: ${this.listWithOverflow(rendered)}`);
    }
    if (hunk.rationale) {
      out.push(`    Rationale: ${hunk.rationale}`);
    }
    if (hunk.error) {
      out.push(`    Error: ${hunk.error.code}: ${hunk.error.message}`);
    }
    if (hunk.suggestion) {
      out.push(`    Suggestion: ${hunk.suggestion.summary}`);
      if (hunk.suggestion.fragment) {
        out.push(...hunk.suggestion.fragment.split('\n').filter(Boolean).map(l => `      ${l}`));
      }
    }
    return out;
  }

  private listWithOverflow(items: readonly string[]): string {
    const shown = items.slice(0, MAX_LISTED_CANDIDATES).join(', ');
    const hidden = items.length - MAX_LISTED_CANDIDATES;
    return hidden > 0 ? `${shown}, … (+${hidden} more)` : shown;
  }
}
