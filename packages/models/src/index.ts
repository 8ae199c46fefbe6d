export type { ModelProvider, GenerationDefaults } from './provider.js';
export { OpenAICompatibleProvider } from './providers/openai.js';
export type { OpenAICompatibleOptions } from './providers/openai.js';
export { GeminiProvider } from './providers/gemini.js';
export type { GeminiOptions } from './providers/gemini.js';
export { createModelProvider, assertProviderCredentials } from './factory.js';
export { createEmbedder, OpenAIEmbedder, GeminiEmbedder } from './embeddings/index.js';
export type { Embedder, EmbedderSelection } from './embeddings/index.js';
