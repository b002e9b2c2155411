/* --------------------------------------------------------------------------
 *  PatchDrift — External suggestion service
 * ----------------------------------------------------------------------- */

import axios from 'axios';
import { z } from 'zod';
import { PatchDriftError } from '../errors';
import { getOutputChannel } from '../logger';
import type { HunkDecisionRequest } from './ConflictResolutionProtocol';

const MAX_EXCERPT_CHARS = 400;

export type SuggestionResponse =
  | { kind: 'candidate'; index: number; confidence: number; rationale?: string }
  | { kind: 'free-text'; summary: string; fragment?: string };

/**
 * Ranks the candidates of an ambiguous hunk, or proposes free text when
 * none fits. Returning undefined means "no opinion".
 */
export interface SuggestionService {
  rank(request: HunkDecisionRequest, signal: AbortSignal): Promise<SuggestionResponse | undefined>;
}

export class SuggestionTimeoutError extends PatchDriftError {
  constructor(timeoutMs: number) {
    super(`Suggestion service did not answer within ${timeoutMs}ms`, 'SuggestionTimeout');
    this.name = 'SuggestionTimeoutError';
  }
}

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs`.
 * @throws SuggestionTimeoutError when the deadline passes first
 */
export async function withTimeout<T>(timeoutMs: number, operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new SuggestionTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface SuggestionPayload {
  file: string;
  header: string;
  before: string[];
  after: string[];
  context: string;
  candidates: Array<{
    index: number;
    /** 1-based */
    position: number;
    similarity: number;
    excerpt: string;
    anchors: number;
  }>;
}

export function buildSuggestionPayload(request: HunkDecisionRequest): SuggestionPayload {
  const { hunk } = request;
  const prefix = { context: ' ', added: '+', removed: '-' } as const;
  return {
    file: request.filePath,
    header: hunk.header,
    before: [...hunk.preImage],
    after: [...hunk.postImage],
    context: hunk.lines.map(l => prefix[l.kind] + l.text).join('\n'),
    candidates: request.candidates.map((candidate, index) => ({
      index,
      position: candidate.line + 1,
      similarity: Math.round(candidate.score * 10_000) / 10_000,
      excerpt: (request.excerpts[index] ?? '').slice(0, MAX_EXCERPT_CHARS),
      anchors: candidate.anchorHits,
    })),
  };
}

const ChoiceSchema = z.object({
  candidate_index: z.number().int().optional(),
  index: z.number().int().optional(),
  position: z.number().int().optional(),
  confidence: z.number().min(0).max(1).optional(),
  explanation: z.string().optional(),
  rationale: z.string().optional(),
});

const SuggestionResponseSchema = z.object({
  choice: ChoiceSchema.optional(),
  best: ChoiceSchema.optional(),
  summary: z.string().optional(),
  fragment: z.string().optional(),
});

type SuggestionResponseBody = z.infer<typeof SuggestionResponseSchema>;

/**
 * Maps a service response onto a candidate index (or free text).
 */
export function interpretSuggestionResponse(
  body: SuggestionResponseBody,
  request: HunkDecisionRequest,
): SuggestionResponse | undefined {
  const choice = body.choice ?? body.best;
  if (choice) {
    const index = choice.candidate_index ?? choice.index ??
      (choice.position === undefined ? undefined : request.candidates.findIndex(c => c.line + 1 === choice.position));
    if (index !== undefined && index >= 0) {
      return {
        kind: 'candidate',
        index,
        confidence: choice.confidence ?? 0,
        rationale: choice.explanation ?? choice.rationale,
      };
    }
  }
  if (body.summary) {
    return { kind: 'free-text', summary: body.summary, fragment: body.fragment };
  }
  return undefined;
}

/**
 * The part of an HTTP client the service needs; an axios instance fits.
 */
export interface HttpClient {
  post(url: string, data: unknown, config: { signal: AbortSignal; headers?: Record<string, string> }): Promise<{ data: unknown }>;
}

/**
 * Posts the ambiguous hunk to a JSON endpoint.
 */
export class HttpSuggestionService implements SuggestionService {
  constructor(
    private readonly endpoint: string,
    private readonly client: HttpClient = axios.create(),
    private readonly headers: Record<string, string> = {},
  ) {}

  async rank(request: HunkDecisionRequest, signal: AbortSignal): Promise<SuggestionResponse | undefined> {
    const payload = buildSuggestionPayload(request);
    getOutputChannel().debug(`Requesting suggestion for ${request.filePath} ${request.hunk.header}`);

    const response = await this.client.post(this.endpoint, payload, {
      signal,
      headers: { 'Content-Type': 'application/json', ...this.headers },
    });

    const parsed = SuggestionResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new PatchDriftError(
        `Invalid suggestion response: ${parsed.error.issues.map(i => i.message).join('; ')}`,
        'SuggestionResponse',
      );
    }
    return interpretSuggestionResponse(parsed.data, request);
  }
}
