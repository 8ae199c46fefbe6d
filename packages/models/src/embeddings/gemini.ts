import { GoogleGenerativeAI } from '@google/generative-ai';
import { NetworkError, errorMessage } from '@steward/shared';
import type { Embedder } from './embedder.js';

export class GeminiEmbedder implements Embedder {
  readonly name = 'gemini' as const;
  private client: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    readonly model: string,
    private readonly timeoutMs: number,
  ) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const model = this.client.getGenerativeModel({ model: this.model }, { timeout: this.timeoutMs });
    try {
      const result = await model.batchEmbedContents({
        requests: texts.map(text => ({ content: { role: 'user', parts: [{ text }] } })),
      });
      return result.embeddings.map(e => e.values);
    } catch (err) {
      throw new NetworkError('embeddings', errorMessage(err), { cause: err });
    }
  }
}
