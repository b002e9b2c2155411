/* --------------------------------------------------------------------------
 *  PatchDrift — Conflict resolution protocol
 * ----------------------------------------------------------------------- */

import type { DecisionSourceKind } from '../config';
import { errorMessage } from '../errors';
import { getOutputChannel } from '../logger';
import { ConflictSuggestion, Hunk, MatchCandidate, ResolutionSource } from '../types/patchTypes';
import type { FileCandidate } from '../workspace/ProjectFileIndex';

export type ConflictState = 'pending' | 'auto-resolved' | 'user-resolved' | 'skipped' | 'failed';

export type ConflictReason = 'ambiguous' | 'not-found' | 'no-candidate' | 'low-confidence';

/**
 * A suggestion passed along to a later (interactive) source instead of being
 * applied directly.
 */
export interface SuggestionHint {
  index: number;
  confidence: number;
  rationale?: string;
}

interface BaseDecisionRequest {
  filePath: string;
  reason: ConflictReason;
  hint?: SuggestionHint;
}

export interface FileDecisionRequest extends BaseDecisionRequest {
  kind: 'file';
  candidates: readonly FileCandidate[];
  /** The top candidate shares a deeper path suffix than any other */
  decisive: boolean;
}

export interface HunkDecisionRequest extends BaseDecisionRequest {
  kind: 'hunk';
  hunkIndex: number;
  hunk: Hunk;
  candidates: readonly MatchCandidate[];
  /** Current file text at each candidate, same order as `candidates` */
  excerpts: readonly string[];
}

export type DecisionRequest = FileDecisionRequest | HunkDecisionRequest;

export type Decision =
  | { kind: 'select'; index: number; confidence?: number; rationale?: string }
  | { kind: 'skip'; reason?: string }
  | { kind: 'none'; suggestion?: ConflictSuggestion };

/**
 * Anything that can answer an ambiguous unit: automatic acceptance, an
 * external suggestion service, or a person.
 */
export interface DecisionSource {
  readonly kind: DecisionSourceKind;
  decide(request: DecisionRequest): Promise<Decision>;
}

export interface ConflictResolution {
  state: ConflictState;
  /** Index into the request's candidates when resolved */
  index?: number;
  source: ResolutionSource;
  confidence?: number;
  rationale?: string;
  suggestion?: ConflictSuggestion;
  /** Why the unit was skipped, when a source said so */
  skipReason?: string;
}

export interface ProtocolOptions {
  /** Suggestions below this confidence are never accepted on their own */
  suggestionMinConfidence: number;
}

const RESOLVED_STATE: Record<DecisionSourceKind, ConflictState> = {
  auto: 'auto-resolved',
  suggestion: 'auto-resolved',
  interactive: 'user-resolved',
};

/**
 * Walks the decision sources in priority order until one produces a usable
 * answer. Units nobody answers end up `skipped`, or `pending` when an
 * interactive source took part; hunks with no matching context end up `failed`.
 */
export class ConflictResolutionProtocol {
  constructor(
    private readonly sources: readonly DecisionSource[],
    private readonly options: ProtocolOptions,
  ) {}

  get interactive(): boolean {
    return this.sources.some(s => s.kind === 'interactive');
  }

  async resolve(request: DecisionRequest): Promise<ConflictResolution> {
    const log = getOutputChannel();
    let hint: SuggestionHint | undefined;
    let suggestion: ConflictSuggestion | undefined;

    for (const [position, source] of this.sources.entries()) {
      let decision: Decision;
      try {
        decision = await source.decide(hint ? { ...request, hint } : request);
      } catch (error) {
        log.warn(`Decision source "${source.kind}" unavailable for ${request.filePath}: ${errorMessage(error)}`);
        continue;
      }

      if (decision.kind === 'none') {
        suggestion ??= decision.suggestion;
        continue;
      }

      if (decision.kind === 'skip') {
        if (source.kind === 'interactive') {
          return { state: 'skipped', source: 'interactive', skipReason: decision.reason, suggestion };
        }
        continue;
      }

      if (!Number.isInteger(decision.index) || decision.index < 0 || decision.index >= request.candidates.length) {
        log.warn(`Decision source "${source.kind}" chose candidate ${decision.index}, which does not exist`);
        continue;
      }

      if (source.kind === 'suggestion') {
        const confidence = decision.confidence ?? 0;
        const laterInteractive = this.sources.slice(position + 1).some(s => s.kind === 'interactive');
        if (laterInteractive) {
          // A person decides; the suggestion only informs them
          hint = { index: decision.index, confidence, rationale: decision.rationale };
          continue;
        }
        if (confidence < this.options.suggestionMinConfidence) {
          log.info(`Suggestion for ${request.filePath} below minimum confidence (${confidence.toFixed(2)})`);
          continue;
        }
      }

      return {
        state: RESOLVED_STATE[source.kind],
        index: decision.index,
        source: source.kind,
        confidence: decision.confidence,
        rationale: decision.rationale,
        suggestion,
      };
    }

    return { state: this.unresolvedState(request), source: 'none', suggestion };
  }

  private unresolvedState(request: DecisionRequest): ConflictState {
    if (request.kind === 'hunk' && request.reason !== 'ambiguous') {
      return 'failed';
    }
    return this.interactive ? 'pending' : 'skipped';
  }
}
