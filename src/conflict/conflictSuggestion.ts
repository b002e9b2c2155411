/* --------------------------------------------------------------------------
 *  PatchDrift — Local suggestions for hunks that could not be placed
 * ----------------------------------------------------------------------- */

import * as DiffLib from 'diff';
import { similarity, windowText } from '../strategies/similarity';
import { ConflictSuggestion, Hunk, MatchCandidate } from '../types/patchTypes';

interface ClosestWindow {
  line: number;
  score: number;
}

function closestWindow(lines: readonly string[], hunk: Hunk): ClosestWindow | undefined {
  const size = hunk.preImage.length;
  if (size === 0 || size > lines.length) {
    return undefined;
  }
  const target = hunk.preImage.join('\n');
  let best: ClosestWindow | undefined;
  for (let i = 0; i + size <= lines.length; i++) {
    const score = similarity(windowText(lines, i, size), target);
    if (!best || score > best.score) {
      best = { line: i, score };
    }
  }
  return best;
}

/**
 * Shows the closest context in the current file and a diff fragment that
 * rewrites it to the hunk's intended result. Only ever reported.
 */
export function buildConflictSuggestion(
  filePath: string,
  lines: readonly string[],
  hunk: Hunk,
  candidates: readonly MatchCandidate[] = [],
): ConflictSuggestion {
  const best = candidates.at(0) ?? closestWindow(lines, hunk);
  if (!best) {
    return { summary: `No similar context found for ${hunk.header}` };
  }

  const size = hunk.preImage.length;
  const current = lines.slice(best.line, best.line + size);
  const excerpt = current.join('\n');

  const patch = DiffLib.structuredPatch(
    `a/${filePath}`,
    `b/${filePath}`,
    current.map(l => l + '\n').join(''),
    hunk.postImage.map(l => l + '\n').join(''),
    undefined,
    undefined,
    { context: 3 },
  );

  const body = patch.hunks.flatMap(h => [
    `@@ -${best.line + h.oldStart},${h.oldLines} +${best.line + h.newStart},${h.newLines} @@`,
    ...h.lines,
  ]);
  const fragment = body.length > 0 ? [`--- a/${filePath}`, `+++ b/${filePath}`, ...body].join('\n') + '\n' : undefined;

  return {
    summary: `Closest context at line ${best.line + 1} (similarity ${best.score.toFixed(2)})`,
    excerpt,
    fragment,
  };
}
