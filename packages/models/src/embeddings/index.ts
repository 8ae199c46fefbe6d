import type { StewardConfig } from '@steward/shared';
import type { Embedder } from './embedder.js';
import { OpenAIEmbedder } from './openai.js';
import { GeminiEmbedder } from './gemini.js';

export type { Embedder } from './embedder.js';
export { OpenAIEmbedder } from './openai.js';
export { GeminiEmbedder } from './gemini.js';

export interface EmbedderSelection {
  embedder: Embedder | null;
  /** Why no embedder was chosen, when none was. */
  reason?: string;
}

/**
 * Pick an embedding backend. `auto` prefers OpenAI, then Gemini; `simple`
 * disables embeddings so the store scores by keywords.
 */
export function createEmbedder(config: StewardConfig): EmbedderSelection {
  const { embeddings, providers } = config;
  const openai = () =>
    providers.openai.apiKey
      ? new OpenAIEmbedder(providers.openai.apiKey, embeddings.openaiModel, embeddings.timeoutMs, providers.openai.baseUrl)
      : null;
  const gemini = () =>
    providers.gemini.apiKey
      ? new GeminiEmbedder(providers.gemini.apiKey, embeddings.geminiModel, embeddings.timeoutMs)
      : null;

  switch (embeddings.provider) {
    case 'simple':
      return { embedder: null, reason: 'keyword scoring selected' };
    case 'openai': {
      const embedder = openai();
      return embedder ? { embedder } : { embedder: null, reason: 'OPENAI_API_KEY is not set' };
    }
    case 'gemini': {
      const embedder = gemini();
      return embedder ? { embedder } : { embedder: null, reason: 'GEMINI_API_KEY is not set' };
    }
    case 'auto': {
      const embedder = openai() ?? gemini();
      return embedder ? { embedder } : { embedder: null, reason: 'no embedding API key available' };
    }
  }
}
