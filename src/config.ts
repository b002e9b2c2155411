/* --------------------------------------------------------------------------
 *  PatchDrift — Configuration schema and loading
 * ----------------------------------------------------------------------- */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors';

export const CONFIG_FILE_NAME = '.patchdrift.json';
export const BACKUP_DIR_NAME = '.diff_backups';
export const REPORTS_DIR_NAME = 'reports';
export const REPORT_JSON = 'apply-report.json';
export const REPORT_TXT = 'apply-report.txt';

/** Directories never indexed unless `useDefaultExcludes` is turned off. */
export const DEFAULT_EXCLUDES: readonly string[] = ['.git', '.venv', 'node_modules', BACKUP_DIR_NAME];

export const DecisionSourceKindSchema = z.enum(['auto', 'suggestion', 'interactive']);

export const RetentionConfigSchema = z.object({
  maxSessions: z.number().int().positive().optional(),
  maxAgeDays: z.number().positive().optional(),
  keepRecent: z.number().int().min(0).default(1),
});

export const PatchDriftConfigSchema = z.object({
  // Matching
  threshold: z.number().min(0).max(1).default(0.85),
  tieMargin: z.number().min(0).max(1).default(0.05),
  lowConfidenceBand: z.number().min(0).max(1).default(0.1),
  searchRadius: z.number().int().min(0).default(100),
  maxCandidates: z.number().int().positive().default(10),
  tieBreak: z.enum(['anchors', 'proximity']).default('anchors'),

  // File discovery
  excludeDirs: z.array(z.string()).default([]),
  useDefaultExcludes: z.boolean().default(true),

  // Backups & reports
  backupBase: z.string().optional(),
  retention: RetentionConfigSchema.default({}),
  writeReports: z.boolean().default(true),

  // Conflict resolution
  autoAccept: z.boolean().default(true),
  interactive: z.boolean().default(false),
  decisionOrder: z.array(DecisionSourceKindSchema).default(['auto', 'suggestion', 'interactive']),
  suggestionEndpoint: z.string().url().optional(),
  suggestionTimeoutMs: z.number().int().positive().default(10_000),
  suggestionMinConfidence: z.number().min(0).max(1).default(0.5),

  // Application
  dryRun: z.boolean().default(false),
  partialApply: z.boolean().default(true),
  mtimeCheck: z.boolean().default(true),
  autoStage: z.boolean().default(false),
  strictParsing: z.boolean().default(false),

  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type DecisionSourceKind = z.infer<typeof DecisionSourceKindSchema>;
export type RetentionConfig = z.infer<typeof RetentionConfigSchema>;
export type PatchDriftConfig = z.infer<typeof PatchDriftConfigSchema>;
export type PatchDriftConfigInput = z.input<typeof PatchDriftConfigSchema>;

export const DEFAULT_CONFIG: PatchDriftConfig = PatchDriftConfigSchema.parse({});

/**
 * Validates `input` and fills in defaults.
 * @throws ConfigurationError listing every invalid field
 */
export function resolveConfiguration(input: PatchDriftConfigInput = {}): PatchDriftConfig {
  const result = PatchDriftConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Loads `.patchdrift.json` from `root` (or an explicit path), merged with
 * `overrides`. A missing file yields the defaults.
 */
export async function loadConfiguration(
  root: string,
  overrides: PatchDriftConfigInput = {},
  configPath?: string,
): Promise<{ config: PatchDriftConfig; path: string; loaded: boolean }> {
  const resolvedPath = configPath ?? path.join(root, CONFIG_FILE_NAME);

  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { config: resolveConfiguration(overrides), path: resolvedPath, loaded: false };
    }
    throw new ConfigurationError(`Failed to read ${resolvedPath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${resolvedPath}: ${errorMessage(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`${resolvedPath} must contain a JSON object`);
  }

  return {
    config: resolveConfiguration({ ...parsed, ...overrides }),
    path: resolvedPath,
    loaded: true,
  };
}

/** Absolute backup root for a working tree. */
export function resolveBackupBase(root: string, config: Pick<PatchDriftConfig, 'backupBase'>): string {
  if (!config.backupBase) {
    return path.join(root, BACKUP_DIR_NAME);
  }
  return path.isAbsolute(config.backupBase) ? config.backupBase : path.join(root, config.backupBase);
}

export function effectiveExcludes(config: Pick<PatchDriftConfig, 'excludeDirs' | 'useDefaultExcludes'>): string[] {
  const base = config.useDefaultExcludes ? [...DEFAULT_EXCLUDES] : [];
  return [...new Set([...base, ...config.excludeDirs])];
}

/**
 * Errors from `fs` may come from another realm (Jest's module sandbox), so
 * this checks the shape rather than `instanceof Error`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
