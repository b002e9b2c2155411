/* --------------------------------------------------------------------------
 *  PatchDrift — Unit tests for FuzzyLocationMatcher
 * ----------------------------------------------------------------------- */

import { MatchError } from '../../../errors';
import { FuzzyLocationMatcher } from '../../../strategies/FuzzyLocationMatcher';
import { MatchResult } from '../../../strategies/locationStrategy';
import { buildHunk, numberedLines } from '../../setup/test-utils';

const EDIT_LINE_6 = [' line 5', '-line 6', '+six', ' line 7'];

function expectPlaced(result: MatchResult, status: string, line: number): void {
  expect(result.status).toBe(status);
  if (result.status === 'ambiguous' || result.status === 'unmatched') {
    throw new Error(`Expected a placed result, got ${result.status}`);
  }
  expect(result.candidate.line).toBe(line);
}

describe('FuzzyLocationMatcher', () => {
  const matcher = new FuzzyLocationMatcher();

  describe('exact matches', () => {
    it('should match at the recorded line', () => {
      const result = matcher.match(numberedLines(10), buildHunk(5, EDIT_LINE_6));

      expectPlaced(result, 'exact', 4);
      expect(result.strategy).toBe('exact');
      expect(result.candidates[0].distance).toBe(0);
      expect(result.candidates[0].score).toBe(1);
    });

    it('should follow drifted content', () => {
      const result = matcher.match(['x', 'y', 'z', ...numberedLines(10)], buildHunk(5, EDIT_LINE_6));

      expectPlaced(result, 'exact', 7);
      expect(result.candidates[0].distance).toBe(3);
    });

    it('should prefer the occurrence nearest the recorded line', () => {
      const lines = ['a', 'b', 'c', 'a', 'b', 'c', 'a', 'b', 'c'];
      const result = matcher.match(lines, buildHunk(7, [' a', '-b', '+B', ' c']));

      expectPlaced(result, 'exact', 6);
      expect(result.candidates.map(c => c.line)).toEqual([6, 3, 0]);
    });

    it('should report several exact hits without a recorded position as ambiguous', () => {
      const result = matcher.match(['a', 'b', 'a', 'b'], buildHunk(0, [' a', '-b', '+B'], 0));

      expect(result.status).toBe('ambiguous');
      expect(result.candidates.map(c => c.line)).toEqual([0, 2]);
    });
  });

  describe('already applied', () => {
    it('should detect a hunk whose post-image is present', () => {
      const lines = numberedLines(10);
      lines[5] = 'six';

      const result = matcher.match(lines, buildHunk(5, EDIT_LINE_6));
      expectPlaced(result, 'already-applied', 4);
      expect(result.strategy).toBe('already-applied');
    });
  });

  describe('insertions', () => {
    it('should place a pure insertion from the recorded line', () => {
      const result = matcher.match(numberedLines(20), buildHunk(10, ['+new'], 11));

      expectPlaced(result, 'insertion', 10);
      expect(result.strategy).toBe('metadata');
    });

    it('should detect an insertion that is already present', () => {
      const lines = numberedLines(20);
      lines.splice(10, 0, 'new');

      expectPlaced(matcher.match(lines, buildHunk(10, ['+new'], 11)), 'already-applied', 10);
    });

    it('should clamp an insertion past the end of the file', () => {
      expectPlaced(matcher.match(numberedLines(3), buildHunk(8, ['+tail'], 9)), 'insertion', 3);
    });
  });

  describe('similarity matches', () => {
    it('should accept a window above the threshold', () => {
      const lines = ['// header', 'const x = 1;', 'function total(a, b) {', '  return a + b; // sum', '}'];
      const hunk = buildHunk(3, [' function total(a, b) {', '-  return a + b;', '+  return a + b + 0;', ' }']);

      const result = matcher.match(lines, hunk);
      expectPlaced(result, 'fuzzy', 2);
      expect(result.strategy).toBe('fuzzy');
      expect(result.candidates[0].score).toBeCloseTo(80 / 87, 10);
      expect(result.candidates[0].anchorHits).toBe(2);
    });

    it('should report equally scored windows as ambiguous', () => {
      const lines = [
        'start();', '  total = 101;', 'finish();',
        '// unrelated', '// unrelated', '// unrelated',
        'start();', '  total = 109;', 'finish();',
      ];
      const hunk = buildHunk(4, [' start();', '-  total = 100;', '+  total = 200;', ' finish();']);

      const result = matcher.match(lines, hunk);
      expect(result.status).toBe('ambiguous');
      expect(result.candidates.map(c => c.line)).toEqual([0, 6]);
      expect(result.candidates.map(c => c.score)).toEqual([64 / 66, 64 / 66]);
      expect(result.candidates.map(c => c.anchorHits)).toEqual([2, 2]);
    });

    it('should keep a tie ambiguous when only the anchors differ', () => {
      const lines = [
        'start();', '  total = 101;', 'finish();',
        '// unrelated', '// unrelated', '// unrelated',
        'start();', '  total = 109;', 'finish()!',
      ];
      const hunk = buildHunk(4, [' start();', '-  total = 100;', '+  total = 200;', ' finish();']);

      const result = matcher.match(lines, hunk);
      expect(result.status).toBe('ambiguous');
      expect(result.candidates.map(c => c.line)).toEqual([0, 6]);
      expect(result.candidates.map(c => c.anchorHits)).toEqual([2, 1]);
    });

    it('should fail with NoCandidate when the pre-image is longer than the file', () => {
      const result = matcher.match(['a'], buildHunk(1, [' x', '-y', '+z']));

      expect(result.status).toBe('unmatched');
      if (result.status === 'unmatched') {
        expect(result.error).toBeInstanceOf(MatchError);
        expect(result.error.reason).toBe('NoCandidate');
        expect(result.candidates).toEqual([]);
      }
    });

    it('should fail with LowConfidence and keep the near miss', () => {
      const result = matcher.match(['abcdefghXY'], buildHunk(1, ['-abcdefghij', '+new']));

      expect(result.status).toBe('unmatched');
      if (result.status === 'unmatched') {
        expect(result.error.reason).toBe('LowConfidence');
        expect(result.error.bestScore).toBe(0.8);
        expect(result.error.message).toBe('Best context match scores 0.80, below threshold 0.85');
        expect(result.candidates.map(c => c.line)).toEqual([0]);
      }
    });

    it('should fall back to the context lines and leave the choice open', () => {
      const lines = ['// header', 'function total(a, b) {', '  throw new UnsupportedOperation();', '}'];
      const hunk = buildHunk(2, [' function total(a, b) {', '-  return a + b;', '+  return a - b;', ' }']);

      const result = matcher.match(lines, hunk);

      expect(result.status).toBe('ambiguous');
      expect(result.strategy).toBe('context');
      expect(result.candidates).toEqual([{ line: 1, score: 1, exact: false, anchorHits: 2, distance: 0 }]);
    });

    it('should not fall back to context when the hunk has none', () => {
      const result = matcher.match(['unrelated', 'text'], buildHunk(1, ['-gone', '+here']));

      expect(result.status).toBe('unmatched');
      expect(result.strategy).toBe('fuzzy');
    });

    it('should honour a lower threshold from configuration', () => {
      const lenient = FuzzyLocationMatcher.fromConfig({
        threshold: 0.75,
        tieMargin: 0.05,
        lowConfidenceBand: 0.1,
        searchRadius: 100,
        maxCandidates: 10,
        tieBreak: 'proximity',
      });

      expect(lenient.tieBreak.name).toBe('proximity');
      expectPlaced(lenient.match(['abcdefghXY'], buildHunk(1, ['-abcdefghij', '+new'])), 'fuzzy', 0);
    });
  });
});
