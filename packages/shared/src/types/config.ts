import type { z } from 'zod';
import type {
  stewardConfigSchema,
  llmProviderNameSchema,
  embeddingProviderNameSchema,
} from '../schemas/config.schema.js';

export type LLMProviderName = z.infer<typeof llmProviderNameSchema>;
export type EmbeddingProviderName = z.infer<typeof embeddingProviderNameSchema>;

export type StewardConfig = z.infer<typeof stewardConfigSchema>;
export type LLMConfig = StewardConfig['llm'];
export type ProvidersConfig = StewardConfig['providers'];
export type EmbeddingsConfig = StewardConfig['embeddings'];
export type MemoryConfig = StewardConfig['memory'];
export type SearchConfig = StewardConfig['search'];
export type GitHubConfig = StewardConfig['github'];
export type DeliveryConfig = StewardConfig['delivery'];
export type LoggingConfig = StewardConfig['logging'];
