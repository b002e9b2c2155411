/* --------------------------------------------------------------------------
 *  PatchDrift — Hunk Manager: ordered application with a running offset
 * ----------------------------------------------------------------------- */

import { ApplyError } from '../errors';
import { Hunk } from '../types/patchTypes';

/**
 * An accepted hunk and the 0-based line of the original content its
 * pre-image was matched at.
 */
export interface HunkPlacement {
  index: number;
  hunk: Hunk;
  line: number;
  /** Window content a fuzzy match was scored on; the pre-image otherwise */
  matched?: readonly string[];
}

export interface FoldResult {
  lines: string[];
  /** Net change in line count */
  delta: number;
  /** Some placement's pre-image ran up to the last original line */
  touchesEnd: boolean;
  /** The placement that touched the end, if any */
  lastPlacement?: HunkPlacement;
}

function sameLines(actual: readonly string[], expected: readonly string[]): boolean {
  return actual.length === expected.length && actual.every((line, i) => line === expected[i]);
}

export class HunkManager {
  /**
   * Applies placements in ascending offset order, shifting each by the line
   * delta accumulated from the ones before it. Every window is verified
   * against the buffer before it is replaced.
   * @throws ApplyError (ConflictUnresolved) on overlapping placements or a
   *   window that no longer holds the content it was matched against
   */
  public fold(original: readonly string[], placements: readonly HunkPlacement[]): FoldResult {
    const ordered = [...placements].sort(
      (a, b) => a.line - b.line || a.hunk.preImage.length - b.hunk.preImage.length || a.index - b.index,
    );
    const buffer = [...original];
    let delta = 0;
    let previousEnd = 0;
    let touchesEnd = false;
    let lastPlacement: HunkPlacement | undefined;

    for (const placement of ordered) {
      const { hunk, line } = placement;
      const pre = hunk.preImage;

      if (line < 0 || line + pre.length > original.length) {
        throw new ApplyError(`Hunk ${placement.index + 1} lies outside the file (line ${line + 1})`, 'ConflictUnresolved');
      }
      if (line < previousEnd) {
        throw new ApplyError(`Hunk ${placement.index + 1} overlaps a previous hunk at line ${line + 1}`, 'ConflictUnresolved');
      }

      const at = line + delta;
      if (!sameLines(buffer.slice(at, at + pre.length), placement.matched ?? pre)) {
        throw new ApplyError(`Hunk ${placement.index + 1} no longer matches the buffer at line ${at + 1}`, 'ConflictUnresolved');
      }

      buffer.splice(at, pre.length, ...hunk.postImage);
      delta += hunk.postImage.length - pre.length;
      previousEnd = line + pre.length;

      if (line + pre.length === original.length) {
        touchesEnd = true;
        lastPlacement = placement;
      }
    }

    return { lines: buffer, delta, touchesEnd, lastPlacement };
  }
}
