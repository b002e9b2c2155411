/* --------------------------------------------------------------------------
 *  PatchDrift — Unit tests for decision sources
 * ----------------------------------------------------------------------- */

import { DEFAULT_CONFIG } from '../../../config';
import { HunkDecisionRequest } from '../../../conflict/ConflictResolutionProtocol';
import {
  AutoDecisionSource,
  createDecisionSources,
  InteractiveDecisionSource,
  SuggestionDecisionSource,
} from '../../../conflict/decisionSources';
import { SuggestionResponse, SuggestionService, SuggestionTimeoutError } from '../../../conflict/SuggestionService';
import { setLogSink } from '../../../logger';
import { buildHunk } from '../../setup/test-utils';

function request(overrides: Partial<HunkDecisionRequest> = {}): HunkDecisionRequest {
  return {
    kind: 'hunk',
    filePath: 'a.txt',
    reason: 'ambiguous',
    hunkIndex: 0,
    hunk: buildHunk(1, [' a', '-b', '+B']),
    candidates: [
      { line: 0, score: 0.9, exact: false, anchorHits: 2, distance: 0 },
      { line: 5, score: 0.9, exact: false, anchorHits: 1, distance: 5 },
    ],
    excerpts: ['a\nb', 'a\nc'],
    ...overrides,
  };
}

function service(answer: () => Promise<SuggestionResponse | undefined>): SuggestionService {
  return { rank: jest.fn(answer) };
}

describe('AutoDecisionSource', () => {
  const auto = new AutoDecisionSource();

  it('should select the file with the deepest shared path', async () => {
    await expect(auto.decide({
      kind: 'file',
      filePath: 'x/util.ts',
      reason: 'ambiguous',
      decisive: true,
      candidates: [{ path: 'src/x/util.ts', depth: 2 }, { path: 'lib/util.ts', depth: 1 }],
    })).resolves.toEqual({ kind: 'select', index: 0, rationale: 'Deepest shared path suffix (2 segment(s))' });
  });

  it('should not guess between equally deep files', async () => {
    await expect(auto.decide({
      kind: 'file',
      filePath: 'util.ts',
      reason: 'ambiguous',
      decisive: false,
      candidates: [{ path: 'a/util.ts', depth: 1 }, { path: 'b/util.ts', depth: 1 }],
    })).resolves.toEqual({ kind: 'none' });
  });

  it('should never accept a hunk, even with an anchor lead', async () => {
    await expect(auto.decide(request())).resolves.toEqual({ kind: 'none' });
    await expect(auto.decide(request({ reason: 'low-confidence' }))).resolves.toEqual({ kind: 'none' });
  });
});

describe('SuggestionDecisionSource', () => {
  it('should turn a candidate answer into a selection', async () => {
    const source = new SuggestionDecisionSource(
      service(async () => ({ kind: 'candidate', index: 1, confidence: 0.75, rationale: 'naming' })),
      1000,
    );
    await expect(source.decide(request())).resolves.toEqual({ kind: 'select', index: 1, confidence: 0.75, rationale: 'naming' });
  });

  it('should pass free text along as a suggestion', async () => {
    const source = new SuggestionDecisionSource(service(async () => ({ kind: 'free-text', summary: 'Looks moved' })), 1000);
    await expect(source.decide(request())).resolves.toEqual({ kind: 'none', suggestion: { summary: 'Looks moved' } });
  });

  it('should stay out of file decisions', async () => {
    const rank = jest.fn(async () => undefined);
    const source = new SuggestionDecisionSource({ rank }, 1000);

    await expect(source.decide({ kind: 'file', filePath: 'x', reason: 'ambiguous', decisive: false, candidates: [] }))
      .resolves.toEqual({ kind: 'none' });
    expect(rank).not.toHaveBeenCalled();
  });

  it('should time out a slow service', async () => {
    const source = new SuggestionDecisionSource(service(() => new Promise(() => undefined)), 20);
    await expect(source.decide(request())).rejects.toBeInstanceOf(SuggestionTimeoutError);
  });
});

describe('InteractiveDecisionSource', () => {
  it('should forward the request to the callback', async () => {
    const callback = jest.fn(() => ({ kind: 'skip' as const, reason: 'later' }));
    const source = new InteractiveDecisionSource(callback);

    await expect(source.decide(request())).resolves.toEqual({ kind: 'skip', reason: 'later' });
    expect(callback).toHaveBeenCalledWith(request());
  });
});

describe('createDecisionSources', () => {
  it('should build only the sources that can run', () => {
    expect(createDecisionSources(DEFAULT_CONFIG).map(s => s.kind)).toEqual(['auto']);
    expect(createDecisionSources({ ...DEFAULT_CONFIG, autoAccept: false })).toEqual([]);
  });

  it('should follow the configured order without duplicates', () => {
    const sources = createDecisionSources(
      {
        ...DEFAULT_CONFIG,
        interactive: true,
        decisionOrder: ['interactive', 'suggestion', 'auto', 'interactive'],
      },
      { interactive: () => ({ kind: 'none' }), suggestionService: service(async () => undefined) },
    );
    expect(sources.map(s => s.kind)).toEqual(['interactive', 'suggestion', 'auto']);
  });

  it('should create an HTTP client for a configured endpoint', () => {
    const sources = createDecisionSources({ ...DEFAULT_CONFIG, suggestionEndpoint: 'http://suggestions.test/rank' });
    expect(sources.map(s => s.kind)).toEqual(['auto', 'suggestion']);
  });

  it('should warn when interactive mode has no prompt', () => {
    const lines: string[] = [];
    const previous = setLogSink(line => lines.push(line));
    try {
      const sources = createDecisionSources({ ...DEFAULT_CONFIG, interactive: true });
      expect(sources.map(s => s.kind)).toEqual(['auto']);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain('Interactive mode requested without a prompt callback');
    } finally {
      setLogSink(previous);
    }
  });
});
