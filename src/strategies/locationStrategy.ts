/* --------------------------------------------------------------------------
 *  PatchDrift — Strategy pattern for hunk location
 * ----------------------------------------------------------------------- */

import { MatchError } from '../errors';
import { recordedLine } from '../patch/hunkBuilder';
import { Hunk, MatchCandidate } from '../types/patchTypes';
import { similarity, similarityUpperBound, windowText } from './similarity';
import { AnchorTieBreak, TieBreakStrategy } from './tieBreak';

/**
 * Thresholds shared by every location strategy
 */
export interface LocateOptions {
  threshold: number;
  tieMargin: number;
  lowConfidenceBand: number;
  searchRadius: number;
  maxCandidates: number;
  tieBreak: TieBreakStrategy;
}

export const DEFAULT_LOCATE_OPTIONS: LocateOptions = {
  threshold: 0.85,
  tieMargin: 0.05,
  lowConfidenceBand: 0.1,
  searchRadius: 100,
  maxCandidates: 10,
  tieBreak: new AnchorTieBreak(),
};

export type PlacedStatus = 'exact' | 'fuzzy' | 'insertion' | 'already-applied';

export type MatchResult =
  | {
    readonly status: PlacedStatus;
    readonly strategy: string;
    readonly candidate: MatchCandidate;
    readonly candidates: readonly MatchCandidate[];
  }
  | {
    readonly status: 'ambiguous';
    readonly strategy: string;
    /** Tied candidates first, in tie-break order */
    readonly candidates: readonly MatchCandidate[];
  }
  | {
    readonly status: 'unmatched';
    readonly strategy: string;
    readonly candidates: readonly MatchCandidate[];
    readonly error: MatchError;
  };

/**
 * Interface for hunk location strategies
 */
export interface LocationStrategy {
  /**
   * Locate the hunk's pre-image in the file
   * @returns A result, or undefined to let the next strategy try
   */
  locate(lines: readonly string[], hunk: Hunk, options: LocateOptions): MatchResult | undefined;

  readonly name: string;
}

const SCORE_EPSILON = 1e-9;

function equalsAt(lines: readonly string[], at: number, expected: readonly string[]): boolean {
  if (at < 0 || at + expected.length > lines.length) {
    return false;
  }
  for (let i = 0; i < expected.length; i++) {
    if (lines[at + i] !== expected[i]) {
      return false;
    }
  }
  return true;
}

function countAnchorHits(lines: readonly string[], at: number, pre: readonly string[]): number {
  if (pre.length === 0) {
    return 0;
  }
  let hits = lines[at] === pre[0] ? 1 : 0;
  if (lines[at + pre.length - 1] === pre[pre.length - 1]) {
    hits++;
  }
  return hits;
}

function makeCandidate(lines: readonly string[], hunk: Hunk, at: number, score: number, exact: boolean): MatchCandidate {
  const recorded = recordedLine(hunk);
  return {
    line: at,
    score,
    exact,
    anchorHits: countAnchorHits(lines, at, hunk.preImage),
    distance: recorded === undefined ? 0 : Math.abs(at - recorded),
  };
}

/**
 * Every position where `expected` occurs, searching the neighbourhood of the
 * recorded line first and the whole file only when that finds nothing.
 */
function findExact(lines: readonly string[], expected: readonly string[], around: number | undefined, radius: number): number[] {
  const last = lines.length - expected.length;
  const scan = (from: number, to: number) => {
    const hits: number[] = [];
    for (let i = Math.max(0, from); i <= Math.min(last, to); i++) {
      if (equalsAt(lines, i, expected)) {
        hits.push(i);
      }
    }
    return hits;
  };

  if (around !== undefined) {
    const near = scan(around - radius, around + radius);
    if (near.length > 0) {
      return near;
    }
  }
  return scan(0, last);
}

function byProximity(a: MatchCandidate, b: MatchCandidate): number {
  return a.distance - b.distance || a.line - b.line;
}

/**
 * Hunks without a pre-image are placed from their recorded line.
 */
export class InsertionStrategy implements LocationStrategy {
  readonly name = 'metadata';

  locate(lines: readonly string[], hunk: Hunk): MatchResult | undefined {
    if (hunk.preImage.length > 0) {
      return undefined;
    }

    const recorded = recordedLine(hunk);
    const at = Math.min(Math.max(recorded ?? lines.length, 0), lines.length);

    // Already inserted: the added lines sit where the diff's new side puts them
    if (hunk.postImage.length > 0 && recorded !== undefined) {
      const applied = [hunk.newStart - 1, at].find(line => equalsAt(lines, line, hunk.postImage));
      if (applied !== undefined) {
        const candidate = makeCandidate(lines, hunk, applied, 1, true);
        return { status: 'already-applied', strategy: this.name, candidate, candidates: [candidate] };
      }
    }

    const candidate: MatchCandidate = { line: at, score: 1, exact: true, anchorHits: 0, distance: 0 };
    return { status: 'insertion', strategy: this.name, candidate, candidates: [candidate] };
  }
}

/**
 * Line-for-line equality, nearest to the recorded line.
 */
export class ExactStrategy implements LocationStrategy {
  readonly name = 'exact';

  locate(lines: readonly string[], hunk: Hunk, options: LocateOptions): MatchResult | undefined {
    const recorded = recordedLine(hunk);
    const candidates = findExact(lines, hunk.preImage, recorded, options.searchRadius)
      .map(line => makeCandidate(lines, hunk, line, 1, true))
      .sort(byProximity);

    if (candidates.length === 0) {
      return undefined;
    }
    // Without a recorded position several exact hits cannot be told apart
    if (recorded === undefined && candidates.length > 1) {
      return { status: 'ambiguous', strategy: this.name, candidates };
    }
    return { status: 'exact', strategy: this.name, candidate: candidates[0], candidates };
  }
}

/**
 * The post-image is already present while the pre-image is not.
 */
export class AlreadyAppliedStrategy implements LocationStrategy {
  readonly name = 'already-applied';

  locate(lines: readonly string[], hunk: Hunk, options: LocateOptions): MatchResult | undefined {
    if (hunk.postImage.length === 0) {
      return undefined;
    }
    const recorded = recordedLine(hunk);
    const candidates = findExact(lines, hunk.postImage, recorded, options.searchRadius)
      .map(line => makeCandidate(lines, hunk, line, 1, true))
      .sort(byProximity);

    if (candidates.length === 0) {
      return undefined;
    }
    return { status: 'already-applied', strategy: this.name, candidate: candidates[0], candidates };
  }
}

/**
 * Sliding-window similarity over the whole file.
 */
export class SimilarityStrategy implements LocationStrategy {
  readonly name = 'fuzzy';

  locate(lines: readonly string[], hunk: Hunk, options: LocateOptions): MatchResult {
    const pre = hunk.preImage;
    const size = pre.length;
    const target = pre.join('\n');
    const floor = Math.max(0, options.threshold - options.lowConfidenceBand);
    const scored: MatchCandidate[] = [];

    for (let i = 0; i + size <= lines.length; i++) {
      const text = windowText(lines, i, size);
      if (similarityUpperBound(text.length, target.length) < floor) {
        continue;
      }
      const score = similarity(text, target);
      if (score >= floor) {
        scored.push(makeCandidate(lines, hunk, i, score, false));
      }
    }

    const passing = scored.filter(c => c.score >= options.threshold);
    if (passing.length === 0) {
      const nearMisses = this.suppressOverlaps(this.rank(scored, options), size).slice(0, options.maxCandidates);
      const best = nearMisses.at(0);
      const error = best
        ? new MatchError(
          `Best context match scores ${best.score.toFixed(2)}, below threshold ${options.threshold}`,
          'LowConfidence',
          best.score,
        )
        : new MatchError('No location matches the hunk context', 'NoCandidate');
      return { status: 'unmatched', strategy: this.name, candidates: nearMisses, error };
    }

    const ranked = this.suppressOverlaps(this.rank(passing, options), size);
    const [best, second] = ranked;
    if (second === undefined || best.score - second.score >= options.tieMargin - SCORE_EPSILON) {
      return {
        status: 'fuzzy',
        strategy: this.name,
        candidate: best,
        candidates: ranked.slice(0, options.maxCandidates),
      };
    }

    const tied = ranked
      .filter(c => best.score - c.score < options.tieMargin - SCORE_EPSILON)
      .sort((a, b) => options.tieBreak.compare(a, b));
    const rest = ranked.filter(c => !tied.includes(c));
    return {
      status: 'ambiguous',
      strategy: this.name,
      candidates: [...tied, ...rest].slice(0, options.maxCandidates),
    };
  }

  private rank(candidates: readonly MatchCandidate[], options: LocateOptions): MatchCandidate[] {
    return [...candidates].sort((a, b) => b.score - a.score || options.tieBreak.compare(a, b));
  }

  /** Drops windows overlapping a better-ranked window. */
  private suppressOverlaps(ranked: readonly MatchCandidate[], size: number): MatchCandidate[] {
    const kept: MatchCandidate[] = [];
    for (const candidate of ranked) {
      if (!kept.some(k => Math.abs(k.line - candidate.line) < Math.max(size, 1))) {
        kept.push(candidate);
      }
    }
    return kept;
  }
}

/**
 * Last resort once the whole pre-image fits nowhere: windows are scored on
 * the hunk's context lines alone. Their candidates always come back
 * ambiguous, so only a decision source can pick one.
 */
export class ContextOnlyStrategy implements LocationStrategy {
  readonly name = 'context';

  locate(lines: readonly string[], hunk: Hunk, options: LocateOptions): MatchResult | undefined {
    const offsets = contextOffsets(hunk);
    const size = hunk.preImage.length;
    if (offsets.length === 0 || offsets.length === size) {
      return undefined;
    }

    const target = offsets.map(o => hunk.preImage[o]).join('\n');
    const scored: MatchCandidate[] = [];
    for (let i = 0; i + size <= lines.length; i++) {
      const text = offsets.map(o => lines[i + o]).join('\n');
      if (similarityUpperBound(text.length, target.length) < options.threshold) {
        continue;
      }
      const score = similarity(text, target);
      if (score >= options.threshold) {
        scored.push(makeCandidate(lines, hunk, i, score, false));
      }
    }
    if (scored.length === 0) {
      return undefined;
    }

    const kept: MatchCandidate[] = [];
    for (const candidate of scored.sort((a, b) => b.score - a.score || options.tieBreak.compare(a, b))) {
      if (!kept.some(k => Math.abs(k.line - candidate.line) < size)) {
        kept.push(candidate);
      }
    }
    return { status: 'ambiguous', strategy: this.name, candidates: kept.slice(0, options.maxCandidates) };
  }
}

/** Pre-image offsets of the context lines. */
function contextOffsets(hunk: Hunk): number[] {
  const offsets: number[] = [];
  let pre = 0;
  for (const line of hunk.lines) {
    if (line.kind === 'added') {
      continue;
    }
    if (line.kind === 'context') {
      offsets.push(pre);
    }
    pre++;
  }
  return offsets;
}

/**
 * Chains multiple strategies. The first placed or ambiguous result wins; an
 * unmatched one is kept while later strategies get their turn.
 */
export class ChainedLocationStrategy implements LocationStrategy {
  readonly name = 'chained';

  constructor(private readonly strategies: readonly LocationStrategy[]) {}

  locate(lines: readonly string[], hunk: Hunk, options: LocateOptions): MatchResult {
    let unmatched: MatchResult | undefined;
    for (const strategy of this.strategies) {
      const result = strategy.locate(lines, hunk, options);
      if (result && result.status !== 'unmatched') {
        return result;
      }
      unmatched ??= result;
    }
    if (unmatched) {
      return unmatched;
    }
    return {
      status: 'unmatched',
      strategy: this.name,
      candidates: [],
      error: new MatchError('No location matches the hunk context', 'NoCandidate'),
    };
  }
}

/**
 * Factory for creating location strategies
 */
export class LocationStrategyFactory {
  /**
   * Insertion → exact → already-applied → similarity → context only
   */
  static createDefaultStrategy(): ChainedLocationStrategy {
    return new ChainedLocationStrategy([
      new InsertionStrategy(),
      new ExactStrategy(),
      new AlreadyAppliedStrategy(),
      new SimilarityStrategy(),
      new ContextOnlyStrategy(),
    ]);
  }
}
