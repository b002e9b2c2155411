/* --------------------------------------------------------------------------
 *  PatchDrift — Text similarity scoring
 * ----------------------------------------------------------------------- */

import * as DiffLib from 'diff';

/**
 * Ratio of matching characters between two texts: `2·M / (|a| + |b|)`,
 * where M is the size of the common subsequence found by the diff library.
 * Returns a value in [0, 1]; identical texts score 1.
 */
export function similarity(a: string, b: string): number {
  if (a === b) {
    return 1;
  }
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }

  let common = 0;
  for (const change of DiffLib.diffChars(a, b)) {
    if (!change.added && !change.removed) {
      common += change.value.length;
    }
  }
  return Math.min(1, Math.max(0, (2 * common) / total));
}

/**
 * Upper bound of {@link similarity} from the lengths alone.
 */
export function similarityUpperBound(lengthA: number, lengthB: number): number {
  const total = lengthA + lengthB;
  return total === 0 ? 1 : (2 * Math.min(lengthA, lengthB)) / total;
}

export function windowText(lines: readonly string[], start: number, length: number): string {
  return lines.slice(start, start + length).join('\n');
}
