/* --------------------------------------------------------------------------
 *  PatchDrift — Project file index (path resolution for diff targets)
 * ----------------------------------------------------------------------- */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { isErrnoException } from '../config';
import { getOutputChannel } from '../logger';
import { resolveInsideRoot, sanitizePath } from '../security/pathSanitizer';
import { stripDiffPrefix } from '../utilities';

/**
 * A file that could be the target of a diff path.
 */
export interface FileCandidate {
  /** Relative to the root, forward slashes */
  path: string;
  /** Number of trailing path segments shared with the diff path */
  depth: number;
}

export type FileResolution =
  | { kind: 'found'; path: string; via: 'exact' | 'name' }
  | { kind: 'ambiguous'; candidates: FileCandidate[]; decisive: boolean }
  | { kind: 'not-found' };

export interface IndexMetrics {
  files: number;
  lookups: number;
  candidatesConsidered: number;
}

export interface ProjectFileIndexOptions {
  /** Directory names or multi-segment paths (`build/cache`) never indexed */
  excludes: readonly string[];
}

function splitSegments(value: string): string[] {
  return value.split('/').filter(Boolean);
}

function sharedSuffixDepth(a: readonly string[], b: readonly string[]): number {
  let depth = 0;
  while (depth < a.length && depth < b.length && a[a.length - 1 - depth] === b[b.length - 1 - depth]) {
    depth++;
  }
  return depth;
}

/**
 * Snapshot of the files under a root, built once per apply invocation.
 */
export class ProjectFileIndex {
  private readonly byName = new Map<string, Set<string>>();
  /** Changes made during the session; they win over what is on disk */
  private readonly created = new Set<string>();
  private readonly removed = new Set<string>();
  private readonly excludePatterns: string[][];
  private lookups = 0;
  private candidatesConsidered = 0;

  private constructor(readonly root: string, files: readonly string[], options: ProjectFileIndexOptions) {
    this.excludePatterns = options.excludes.map(e => splitSegments(sanitizePath(e)));
    for (const file of files) {
      this.register(file);
    }
  }

  /**
   * Walks `root` once, skipping excluded directories.
   */
  static async build(root: string, options: ProjectFileIndexOptions): Promise<ProjectFileIndex> {
    const absRoot = path.resolve(root);
    const ignore = options.excludes.flatMap(e => {
      const clean = splitSegments(sanitizePath(e)).join('/');
      return clean ? [`**/${clean}/**`, `${clean}/**`] : [];
    });

    const files = await glob('**/*', {
      cwd: absRoot,
      nodir: true,
      dot: true,
      posix: true,
      ignore,
    });

    const index = new ProjectFileIndex(absRoot, files.sort(), options);
    getOutputChannel().debug(`Indexed ${index.size} file(s) under ${absRoot}`);
    return index;
  }

  get size(): number {
    let total = 0;
    for (const paths of this.byName.values()) {
      total += paths.size;
    }
    return total;
  }

  get metrics(): IndexMetrics {
    return { files: this.size, lookups: this.lookups, candidatesConsidered: this.candidatesConsidered };
  }

  isExcluded(relPath: string): boolean {
    const segments = splitSegments(relPath);
    return this.excludePatterns.some(pattern => {
      if (pattern.length === 0) {
        return false;
      }
      for (let i = 0; i + pattern.length <= segments.length - 1; i++) {
        if (pattern.every((p, j) => segments[i + j] === p)) {
          return true;
        }
      }
      return false;
    });
  }

  /** Registers a file created during the session. */
  add(relPath: string): void {
    this.removed.delete(relPath);
    this.created.add(relPath);
    this.register(relPath);
  }

  /** Forgets a file removed during the session. */
  remove(relPath: string): void {
    this.created.delete(relPath);
    this.removed.add(relPath);
    this.byName.get(path.posix.basename(relPath))?.delete(relPath);
  }

  private register(relPath: string): void {
    if (this.isExcluded(relPath)) {
      return;
    }
    const name = path.posix.basename(relPath);
    let paths = this.byName.get(name);
    if (!paths) {
      paths = new Set();
      this.byName.set(name, paths);
    }
    paths.add(relPath);
  }

  /**
   * Checks the path as written in the diff (prefixes stripped) relative to
   * the root. Excluded paths never resolve.
   * @returns The relative path when it names an existing file
   */
  async resolveExact(diffPath: string): Promise<string | undefined> {
    const cleaned = sanitizePath(diffPath);
    const stripped = stripDiffPrefix(cleaned);
    const attempts = stripped === cleaned ? [stripped] : [stripped, cleaned];

    for (const attempt of attempts) {
      const relPath = path.posix.normalize(attempt);
      const abs = resolveInsideRoot(this.root, attempt);
      if (!abs || this.isExcluded(relPath) || this.removed.has(relPath)) {
        continue;
      }
      if (this.created.has(relPath)) {
        return relPath;
      }
      try {
        const stats = await fs.stat(abs);
        if (stats.isFile()) {
          return relPath;
        }
      } catch (error) {
        if (!isErrnoException(error) || (error.code !== 'ENOENT' && error.code !== 'ENOTDIR')) {
          throw error;
        }
      }
    }
    return undefined;
  }

  /**
   * Every indexed file with the given basename.
   */
  resolveByName(filename: string): string[] {
    return [...(this.byName.get(path.posix.basename(filename)) ?? [])].sort();
  }

  /**
   * Exact path first, then files sharing the basename ranked by how many
   * trailing path segments they share with the diff path.
   */
  async resolve(diffPath: string): Promise<FileResolution> {
    this.lookups++;
    const exact = await this.resolveExact(diffPath);
    if (exact) {
      return { kind: 'found', path: exact, via: 'exact' };
    }

    const wanted = splitSegments(stripDiffPrefix(diffPath));
    const name = wanted.at(-1);
    if (!name) {
      return { kind: 'not-found' };
    }

    const candidates = this.resolveByName(name)
      .map(candidatePath => ({ path: candidatePath, depth: sharedSuffixDepth(splitSegments(candidatePath), wanted) }))
      .sort((a, b) => b.depth - a.depth || a.path.localeCompare(b.path));
    this.candidatesConsidered += candidates.length;

    if (candidates.length === 0) {
      return { kind: 'not-found' };
    }
    if (candidates.length === 1) {
      return { kind: 'found', path: candidates[0].path, via: 'name' };
    }
    return { kind: 'ambiguous', candidates, decisive: candidates[0].depth > candidates[1].depth };
  }
}
