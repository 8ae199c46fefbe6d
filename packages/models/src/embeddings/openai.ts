import OpenAI from 'openai';
import { AuthenticationError, NetworkError, TimeoutError, errorMessage } from '@steward/shared';
import type { Embedder } from './embedder.js';

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai' as const;
  private client: OpenAI;

  constructor(
    apiKey: string,
    readonly model: string,
    private readonly timeoutMs: number,
    baseUrl?: string,
  ) {
    this.client = new OpenAI({ apiKey, baseURL: baseUrl, timeout: timeoutMs, maxRetries: 1 });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await this.client.embeddings.create({ model: this.model, input: texts });
      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map(item => item.embedding);
    } catch (err) {
      if (err instanceof OpenAI.APIConnectionTimeoutError) {
        throw new TimeoutError('embeddings', this.timeoutMs, { cause: err });
      }
      if (err instanceof OpenAI.AuthenticationError) {
        throw new AuthenticationError('embeddings', err.message, { cause: err });
      }
      throw new NetworkError('embeddings', errorMessage(err), { cause: err });
    }
  }
}
