/* --------------------------------------------------------------------------
 *  PatchDrift — Tie-break strategies for equally scored candidates
 * ----------------------------------------------------------------------- */

import { MatchCandidate } from '../types/patchTypes';

/**
 * Orders candidates whose scores are too close to call.
 */
export interface TieBreakStrategy {
  readonly name: string;

  /** Negative when `a` should rank before `b` */
  compare(a: MatchCandidate, b: MatchCandidate): number;
}

/**
 * Distance to the recorded line, then file order.
 */
export class ProximityTieBreak implements TieBreakStrategy {
  readonly name = 'proximity';

  compare(a: MatchCandidate, b: MatchCandidate): number {
    return a.distance - b.distance || a.line - b.line;
  }
}

/**
 * Candidates whose first/last lines equal the pre-image's first/last lines
 * rank first; proximity settles the rest.
 */
export class AnchorTieBreak implements TieBreakStrategy {
  readonly name = 'anchors';
  private readonly proximity = new ProximityTieBreak();

  compare(a: MatchCandidate, b: MatchCandidate): number {
    return b.anchorHits - a.anchorHits || this.proximity.compare(a, b);
  }
}

export function createTieBreak(name: 'anchors' | 'proximity'): TieBreakStrategy {
  return name === 'proximity' ? new ProximityTieBreak() : new AnchorTieBreak();
}
