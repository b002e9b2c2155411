/* --------------------------------------------------------------------------
 *  PatchDrift — Unit tests for local conflict suggestions
 * ----------------------------------------------------------------------- */

import { buildConflictSuggestion } from '../../../conflict/conflictSuggestion';
import { buildHunk } from '../../setup/test-utils';

describe('buildConflictSuggestion', () => {
  const hunk = buildHunk(1, [' a', '-B', '+X', ' c']);

  it('should point at the closest window and rewrite it', () => {
    const suggestion = buildConflictSuggestion('f.txt', ['a', 'b', 'c'], hunk);

    expect(suggestion.summary).toBe('Closest context at line 1 (similarity 0.80)');
    expect(suggestion.excerpt).toBe('a\nb\nc');
    expect(suggestion.fragment).toBe('--- a/f.txt\n+++ b/f.txt\n@@ -1,3 +1,3 @@\n a\n-b\n+X\n c\n');
  });

  it('should use the best candidate when one is given', () => {
    const suggestion = buildConflictSuggestion('f.txt', ['x', 'y', 'a', 'b', 'c'], hunk, [
      { line: 2, score: 0.9, exact: false, anchorHits: 2, distance: 2 },
    ]);

    expect(suggestion.summary).toBe('Closest context at line 3 (similarity 0.90)');
    expect(suggestion.fragment?.split('\n')[2]).toBe('@@ -3,3 +3,3 @@');
  });

  it('should say so when nothing resembles the hunk', () => {
    expect(buildConflictSuggestion('f.txt', ['only'], hunk)).toEqual({ summary: 'No similar context found for @@ test @@' });
  });
});
