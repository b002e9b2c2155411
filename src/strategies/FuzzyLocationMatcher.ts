/* --------------------------------------------------------------------------
 *  PatchDrift — Fuzzy hunk location
 * ----------------------------------------------------------------------- */

import type { PatchDriftConfig } from '../config';
import { Hunk } from '../types/patchTypes';
import {
  DEFAULT_LOCATE_OPTIONS,
  LocateOptions,
  LocationStrategy,
  LocationStrategyFactory,
  MatchResult,
} from './locationStrategy';
import { createTieBreak, TieBreakStrategy } from './tieBreak';

export type MatcherConfig = Pick<
  PatchDriftConfig,
  'threshold' | 'tieMargin' | 'lowConfidenceBand' | 'searchRadius' | 'maxCandidates' | 'tieBreak'
>;

/**
 * Finds where a hunk's pre-image sits in the current file content.
 * Exact matches always win with score 1.0, whatever the threshold.
 */
export class FuzzyLocationMatcher {
  private readonly options: LocateOptions;

  constructor(
    options: Partial<Omit<LocateOptions, 'tieBreak'>> & { tieBreak?: TieBreakStrategy } = {},
    private readonly strategy: LocationStrategy = LocationStrategyFactory.createDefaultStrategy(),
  ) {
    this.options = { ...DEFAULT_LOCATE_OPTIONS, ...options };
  }

  static fromConfig(config: MatcherConfig): FuzzyLocationMatcher {
    return new FuzzyLocationMatcher({
      threshold: config.threshold,
      tieMargin: config.tieMargin,
      lowConfidenceBand: config.lowConfidenceBand,
      searchRadius: config.searchRadius,
      maxCandidates: config.maxCandidates,
      tieBreak: createTieBreak(config.tieBreak),
    });
  }

  get tieBreak(): TieBreakStrategy {
    return this.options.tieBreak;
  }

  match(fileLines: readonly string[], hunk: Hunk): MatchResult {
    const result = this.strategy.locate(fileLines, hunk, this.options);
    if (!result) {
      throw new Error(`Location strategy "${this.strategy.name}" returned no result`);
    }
    return result;
  }
}
