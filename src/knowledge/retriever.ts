import { fetch } from 'undici';
import { z } from 'zod';
import { env } from '../env';
import { RetrievalError } from '../errors';
import { bearer, previewBody, readResponseText } from '../providers/http';

export interface RetrievedPassage {
  title: string;
  text: string;
  score: number;
}

export interface SearchOptions {
  /** Query embedding, when the tenant has an embedding capability configured. */
  vector?: number[];
  signal?: AbortSignal;
}

export interface KnowledgeRetriever {
  search(query: string, tenantId: string, topK: number, opts?: SearchOptions): Promise<RetrievedPassage[]>;
}

const SearchResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default('Untitled'),
      text: z.string(),
      score: z.number(),
    }),
  ),
});

export function rankPassages(passages: RetrievedPassage[], topK: number, threshold: number): RetrievedPassage[] {
  return passages
    .filter((passage) => passage.score >= threshold && passage.text.trim() !== '')
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, topK));
}

/**
 * Client for the knowledge search service. The index itself lives outside
 * this process; only threshold filtering and ranking happen here.
 */
export class HttpKnowledgeRetriever implements KnowledgeRetriever {
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly scoreThreshold: number;

  constructor(options: { url: string; apiKey?: string; scoreThreshold?: number }) {
    this.url = options.url;
    this.apiKey = options.apiKey;
    this.scoreThreshold = options.scoreThreshold ?? env.RAG_SCORE_THRESHOLD;
  }

  public async search(
    query: string,
    tenantId: string,
    topK: number,
    opts: SearchOptions = {},
  ): Promise<RetrievedPassage[]> {
    let response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? bearer(this.apiKey) : {}),
        },
        body: JSON.stringify({
          query,
          tenantId,
          topK,
          scoreThreshold: this.scoreThreshold,
          ...(opts.vector ? { vector: opts.vector } : {}),
        }),
        signal: opts.signal,
      });
    } catch (error) {
      throw new RetrievalError('knowledge search request failed', { tenant_id: tenantId }, { cause: error });
    }

    const body = await readResponseText(response);
    if (!response.ok) {
      throw new RetrievalError(`knowledge search failed ${response.status}`, {
        tenant_id: tenantId,
        body_preview: previewBody(body),
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new RetrievalError('knowledge search returned invalid json', { tenant_id: tenantId }, { cause: error });
    }

    const parsed = SearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RetrievalError('knowledge search response invalid', { tenant_id: tenantId });
    }

    return rankPassages(parsed.data.results, topK, this.scoreThreshold);
  }
}

export function formatKnowledgeContext(passages: readonly RetrievedPassage[]): string {
  if (passages.length === 0) return '';
  const sections = passages.map((passage, index) => `[Source ${index + 1}: ${passage.title}]\n${passage.text.trim()}`);
  return `Relevant information from knowledge base:\n\n${sections.join('\n\n')}`;
}
