import type { LLMProviderName, ModelRequest, ModelResponse } from '@steward/shared';

/**
 * The single call every LLM backend is reduced to. Implementations are a
 * closed set, selected by {@link createModelProvider} from the `name` tag.
 *
 * `generate` rejects with `ToolsUnsupportedError` when tools were requested
 * from a backend that cannot call them, and with `LLMProviderError` for any
 * other failure, including an empty response.
 */
export interface ModelProvider {
  readonly name: LLMProviderName;
  readonly model: string;
  readonly supportsTools: boolean;
  generate(request: ModelRequest): Promise<ModelResponse>;
}

export interface GenerationDefaults {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}
