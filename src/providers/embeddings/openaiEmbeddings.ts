import OpenAI from 'openai';
import { ProviderError } from '../../errors';
import type { EmbeddingProvider, EmbeddingResult, ProviderCallOptions } from '../types';

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  public readonly id = 'openai';
  public readonly model: string;
  private readonly client: OpenAI;

  constructor(options: { apiKey: string; baseUrl: string; model: string; client?: OpenAI }) {
    this.model = options.model;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  public async embed(texts: string[], opts: ProviderCallOptions = {}): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { vectors: [], dimensions: 0 };
    }

    const response = await this.client.embeddings.create(
      { model: this.model, input: texts },
      { signal: opts.signal },
    );

    const vectors = response.data
      .slice()
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);

    if (vectors.length !== texts.length) {
      throw new ProviderError(this.id, 'embedding count mismatch', {
        expected: texts.length,
        received: vectors.length,
      });
    }

    return { vectors, dimensions: vectors[0]?.length ?? 0 };
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const result = await this.embed(['health check']);
      return result.dimensions > 0;
    } catch {
      return false;
    }
  }
}
