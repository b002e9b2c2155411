/* --------------------------------------------------------------------------
 *  PatchDrift — Session backups, restore and retention
 * ----------------------------------------------------------------------- */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { isErrnoException, REPORTS_DIR_NAME, RetentionConfig } from '../config';
import { BackupError, errorMessage } from '../errors';
import { writeFileAtomic } from '../fileSystem';
import { getOutputChannel } from '../logger';
import { isSafePath, resolveInsideRoot } from '../security/pathSanitizer';
import { formatSessionTimestamp, parseSessionTimestamp, SESSION_ID_PATTERN } from '../utilities';

const MANIFEST_SUFFIX = '.manifest.json';

/**
 * On-disk record of one session's snapshots.
 */
export interface BackupRecord {
  sessionId: string;
  directory: string;
  /** Relative path → snapshot path */
  files: Map<string, string>;
  /** Files that did not exist before the session wrote them */
  created: Set<string>;
}

interface SessionManifest {
  sessionId: string;
  root: string;
  created: string[];
}

export interface SessionInfo {
  id: string;
  directory: string;
  startedAt?: Date;
}

export interface RestoreOptions {
  dryRun?: boolean;
  /** Restrict the restore to these relative paths */
  paths?: readonly string[];
  /** Delete the session's backups and reports afterwards */
  purge?: boolean;
}

export interface RestoreResult {
  sessionId: string;
  restored: string[];
  removed: string[];
  dryRun: boolean;
  purged: boolean;
}

function isManifest(value: unknown): value is SessionManifest {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'created' in value && Array.isArray(value.created) && value.created.every((c: unknown) => typeof c === 'string');
}

/**
 * Snapshots for a single apply session. Each file is copied at most once,
 * right before its first real write. Dry-run sessions never touch disk.
 */
export class BackupSession {
  private readonly record: BackupRecord;

  constructor(
    private readonly manager: BackupManager,
    readonly sessionId: string,
    readonly dryRun: boolean,
  ) {
    this.record = {
      sessionId,
      directory: manager.sessionDirectory(sessionId),
      files: new Map(),
      created: new Set(),
    };
  }

  get directory(): string {
    return this.record.directory;
  }

  /**
   * Copies the current bytes of `relPath` into the session directory.
   * @returns The snapshot path, or undefined in dry-run
   * @throws BackupError when the copy fails
   */
  async ensureBackup(relPath: string): Promise<string | undefined> {
    if (this.dryRun) {
      return undefined;
    }
    const existing = this.record.files.get(relPath);
    if (existing) {
      return existing;
    }

    const source = resolveInsideRoot(this.manager.root, relPath);
    const snapshot = resolveInsideRoot(this.record.directory, relPath);
    if (!source || !snapshot) {
      throw new BackupError(`Refusing to back up unsafe path: ${relPath}`);
    }

    try {
      await fs.mkdir(path.dirname(snapshot), { recursive: true });
      await fs.copyFile(source, snapshot);
    } catch (error) {
      throw new BackupError(`Could not back up ${relPath}: ${errorMessage(error)}`);
    }
    this.record.files.set(relPath, snapshot);
    getOutputChannel().debug(`Backed up ${relPath} → ${snapshot}`);
    return snapshot;
  }

  /**
   * Remembers that `relPath` is new so a restore removes it.
   */
  async recordCreated(relPath: string): Promise<void> {
    if (this.dryRun || this.record.created.has(relPath)) {
      return;
    }
    this.record.created.add(relPath);
    const manifest: SessionManifest = {
      sessionId: this.sessionId,
      root: this.manager.root,
      created: [...this.record.created].sort(),
    };
    try {
      await fs.mkdir(this.record.directory, { recursive: true });
      await writeFileAtomic(this.manager.manifestPath(this.sessionId), JSON.stringify(manifest, null, 2));
    } catch (error) {
      throw new BackupError(`Could not record created file ${relPath}: ${errorMessage(error)}`);
    }
  }

  hasBackup(relPath: string): boolean {
    return this.record.files.has(relPath);
  }
}

/**
 * Owns `<backupBase>/<sessionId>/<relative path>` snapshots and the
 * `<backupBase>/reports/<sessionId>/` report directories.
 */
export class BackupManager {
  readonly root: string;
  readonly backupBase: string;

  constructor(root: string, backupBase: string) {
    this.root = path.resolve(root);
    this.backupBase = path.resolve(backupBase);
  }

  sessionDirectory(sessionId: string): string {
    return path.join(this.backupBase, sessionId);
  }

  manifestPath(sessionId: string): string {
    return path.join(this.backupBase, `${sessionId}${MANIFEST_SUFFIX}`);
  }

  reportsDirectory(sessionId: string): string {
    return path.join(this.backupBase, REPORTS_DIR_NAME, sessionId);
  }

  /**
   * A timestamp id not yet used under the backup base.
   */
  async createSessionId(now: Date = new Date()): Promise<string> {
    const base = formatSessionTimestamp(now);
    let candidate = base;
    for (let n = 1; await this.sessionExists(candidate); n++) {
      candidate = `${base}-${n}`;
    }
    return candidate;
  }

  openSession(sessionId: string, dryRun: boolean): BackupSession {
    return new BackupSession(this, sessionId, dryRun);
  }

  /**
   * Sessions on disk, newest first.
   */
  async listSessions(): Promise<SessionInfo[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.backupBase);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new BackupError(`Could not list backups in ${this.backupBase}: ${errorMessage(error)}`);
    }

    // Dry-run sessions leave only a report directory
    const reportEntries = entries.includes(REPORTS_DIR_NAME)
      ? await fs.readdir(path.join(this.backupBase, REPORTS_DIR_NAME))
      : [];

    const ids = new Set<string>();
    for (const entry of [...entries, ...reportEntries]) {
      const id = entry.endsWith(MANIFEST_SUFFIX) ? entry.slice(0, -MANIFEST_SUFFIX.length) : entry;
      if (id !== REPORTS_DIR_NAME && SESSION_ID_PATTERN.test(id)) {
        ids.add(id);
      }
    }

    return [...ids]
      .sort(compareSessionIds)
      .reverse()
      .map(id => ({ id, directory: this.sessionDirectory(id), startedAt: parseSessionTimestamp(id) }));
  }

  /**
   * Reads a session's backup record back from disk.
   * @throws BackupError when the session does not exist
   */
  async loadRecord(sessionId: string): Promise<BackupRecord> {
    if (!SESSION_ID_PATTERN.test(sessionId) || !(await this.sessionExists(sessionId))) {
      throw new BackupError(`Backup session not found: ${sessionId}`);
    }

    const directory = this.sessionDirectory(sessionId);
    const files = new Map<string, string>();
    const snapshots = await glob('**/*', { cwd: directory, nodir: true, dot: true, posix: true });
    for (const relPath of snapshots.sort()) {
      files.set(relPath, path.join(directory, relPath));
    }

    const created = new Set<string>();
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.manifestPath(sessionId), 'utf8'));
      if (isManifest(parsed)) {
        parsed.created.forEach(c => created.add(c));
      }
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw new BackupError(`Could not read manifest for ${sessionId}: ${errorMessage(error)}`);
      }
    }

    return { sessionId, directory, files, created };
  }

  /**
   * Copies a session's snapshots back over the working tree and removes the
   * files the session created.
   */
  async restore(sessionId: string, options: RestoreOptions = {}): Promise<RestoreResult> {
    const dryRun = options.dryRun ?? false;
    const record = await this.loadRecord(sessionId);
    const wanted = options.paths ? new Set(options.paths.map(p => path.posix.normalize(p))) : undefined;
    const selected = (relPath: string) => !wanted || wanted.has(relPath);

    const restored: string[] = [];
    const removed: string[] = [];
    const log = getOutputChannel();

    for (const [relPath, snapshot] of record.files) {
      if (!selected(relPath)) {
        continue;
      }
      const target = resolveInsideRoot(this.root, relPath);
      if (!target) {
        throw new BackupError(`Refusing to restore unsafe path: ${relPath}`);
      }
      if (!dryRun) {
        try {
          await writeFileAtomic(target, await fs.readFile(snapshot));
        } catch (error) {
          throw new BackupError(`Could not restore ${relPath}: ${errorMessage(error)}`);
        }
      }
      restored.push(relPath);
      log.info(`${dryRun ? '[dry-run] would restore' : 'Restored'} ${relPath}`);
    }

    for (const relPath of [...record.created].sort()) {
      if (!selected(relPath) || record.files.has(relPath) || !isSafePath(relPath)) {
        continue;
      }
      const target = resolveInsideRoot(this.root, relPath);
      if (!target) {
        continue;
      }
      if (!dryRun) {
        await fs.rm(target, { force: true });
      }
      removed.push(relPath);
      log.info(`${dryRun ? '[dry-run] would remove' : 'Removed'} ${relPath}`);
    }

    const purge = (options.purge ?? false) && !dryRun;
    if (purge) {
      await this.removeSession(sessionId);
    }

    return { sessionId, restored, removed, dryRun, purged: purge };
  }

  /**
   * Applies the retention policy. The `keepRecent` newest sessions always
   * survive; beyond them a session goes when it exceeds `maxSessions` or is
   * older than `maxAgeDays`.
   * @returns Ids of the removed sessions
   */
  async prune(retention: RetentionConfig, now: Date = new Date()): Promise<string[]> {
    const sessions = await this.listSessions();
    const removed: string[] = [];
    const maxAgeMs = retention.maxAgeDays === undefined ? undefined : retention.maxAgeDays * 24 * 60 * 60 * 1000;

    for (const [position, session] of sessions.entries()) {
      if (position < retention.keepRecent) {
        continue;
      }
      const tooMany = retention.maxSessions !== undefined && position >= retention.maxSessions;
      const tooOld = maxAgeMs !== undefined && session.startedAt !== undefined &&
        now.getTime() - session.startedAt.getTime() > maxAgeMs;
      if (tooMany || tooOld) {
        await this.removeSession(session.id);
        removed.push(session.id);
      }
    }

    if (removed.length > 0) {
      getOutputChannel().info(`Pruned ${removed.length} backup session(s)`);
    }
    return removed;
  }

  async removeSession(sessionId: string): Promise<void> {
    try {
      await fs.rm(this.sessionDirectory(sessionId), { recursive: true, force: true });
      await fs.rm(this.manifestPath(sessionId), { force: true });
      await fs.rm(this.reportsDirectory(sessionId), { recursive: true, force: true });
    } catch (error) {
      throw new BackupError(`Could not remove session ${sessionId}: ${errorMessage(error)}`);
    }
  }

  private async sessionExists(sessionId: string): Promise<boolean> {
    const probes = [this.sessionDirectory(sessionId), this.manifestPath(sessionId), this.reportsDirectory(sessionId)];
    for (const probe of probes) {
      try {
        await fs.access(probe);
        return true;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'ENOENT') {
          throw new BackupError(`Could not inspect ${probe}: ${errorMessage(error)}`);
        }
      }
    }
    return false;
  }
}

/**
 * Orders ids chronologically; a `-N` collision suffix sorts after its base.
 */
function compareSessionIds(a: string, b: string): number {
  const [baseA, suffixA = '0'] = splitSessionId(a);
  const [baseB, suffixB = '0'] = splitSessionId(b);
  return baseA.localeCompare(baseB) || Number(suffixA) - Number(suffixB);
}

function splitSessionId(id: string): [string, string?] {
  const match = /^(\d{8}-\d{6}-\d{3})(?:-(\d+))?$/.exec(id);
  return match ? [match[1], match[2]] : [id];
}
