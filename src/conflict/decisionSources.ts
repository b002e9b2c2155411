/* --------------------------------------------------------------------------
 *  PatchDrift — Decision sources for the conflict protocol
 * ----------------------------------------------------------------------- */

import type { DecisionSourceKind, PatchDriftConfig } from '../config';
import { getOutputChannel } from '../logger';
import { Decision, DecisionRequest, DecisionSource } from './ConflictResolutionProtocol';
import { HttpSuggestionService, SuggestionService, withTimeout } from './SuggestionService';

/**
 * Accepts the file whose path shares the deepest suffix with the diff path.
 * Hunks are never accepted automatically.
 */
export class AutoDecisionSource implements DecisionSource {
  readonly kind = 'auto';

  async decide(request: DecisionRequest): Promise<Decision> {
    if (request.kind !== 'file' || request.reason !== 'ambiguous' || !request.decisive || request.candidates.length === 0) {
      return { kind: 'none' };
    }
    return {
      kind: 'select',
      index: 0,
      rationale: `Deepest shared path suffix (${request.candidates[0].depth} segment(s))`,
    };
  }
}

/**
 * Consults a {@link SuggestionService} for hunk-level conflicts, bounded by
 * a timeout.
 */
export class SuggestionDecisionSource implements DecisionSource {
  readonly kind = 'suggestion';

  constructor(private readonly service: SuggestionService, private readonly timeoutMs: number) {}

  async decide(request: DecisionRequest): Promise<Decision> {
    if (request.kind !== 'hunk') {
      return { kind: 'none' };
    }

    const response = await withTimeout(this.timeoutMs, signal => this.service.rank(request, signal));
    if (!response) {
      return { kind: 'none' };
    }
    if (response.kind === 'free-text') {
      return { kind: 'none', suggestion: { summary: response.summary, fragment: response.fragment } };
    }
    return {
      kind: 'select',
      index: response.index,
      confidence: response.confidence,
      rationale: response.rationale,
    };
  }
}

export type InteractiveCallback = (request: DecisionRequest) => Promise<Decision> | Decision;

/**
 * Hands the request to a caller-supplied prompt.
 */
export class InteractiveDecisionSource implements DecisionSource {
  readonly kind = 'interactive';

  constructor(private readonly callback: InteractiveCallback) {}

  async decide(request: DecisionRequest): Promise<Decision> {
    return this.callback(request);
  }
}

export interface DecisionSourceOptions {
  interactive?: InteractiveCallback;
  suggestionService?: SuggestionService;
}

/**
 * Instantiates the configured sources in `decisionOrder`. Sources that are
 * switched off or have nothing to talk to are left out.
 */
export function createDecisionSources(
  config: Pick<PatchDriftConfig, 'decisionOrder' | 'autoAccept' | 'interactive' | 'suggestionEndpoint' | 'suggestionTimeoutMs'>,
  options: DecisionSourceOptions = {},
): DecisionSource[] {
  const suggestionService = options.suggestionService ??
    (config.suggestionEndpoint ? new HttpSuggestionService(config.suggestionEndpoint) : undefined);

  const factories: Record<DecisionSourceKind, () => DecisionSource | undefined> = {
    auto: () => (config.autoAccept ? new AutoDecisionSource() : undefined),
    suggestion: () => (suggestionService ? new SuggestionDecisionSource(suggestionService, config.suggestionTimeoutMs) : undefined),
    interactive: () => (config.interactive && options.interactive ? new InteractiveDecisionSource(options.interactive) : undefined),
  };

  if (config.interactive && !options.interactive) {
    getOutputChannel().warn('Interactive mode requested without a prompt callback; conflicts will be skipped');
  }

  const sources: DecisionSource[] = [];
  for (const kind of new Set(config.decisionOrder)) {
    const source = factories[kind]();
    if (source) {
      sources.push(source);
    }
  }
  return sources;
}
