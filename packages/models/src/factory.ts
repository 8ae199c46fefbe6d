import { ConfigError, type StewardConfig } from '@steward/shared';
import type { ModelProvider } from './provider.js';
import { OpenAICompatibleProvider } from './providers/openai.js';
import { GeminiProvider } from './providers/gemini.js';

const API_KEY_VARS = {
  openai: 'OPENAI_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  gemini: 'GEMINI_API_KEY',
} as const;

/** Throws ConfigError when the selected provider has no API key. */
export function assertProviderCredentials(config: StewardConfig): string {
  const name = config.llm.provider;
  const apiKey = config.providers[name].apiKey;
  if (!apiKey) {
    throw new ConfigError(`${API_KEY_VARS[name]} is required when LLM_PROVIDER=${name}`);
  }
  return apiKey;
}

export function createModelProvider(config: StewardConfig): ModelProvider {
  const apiKey = assertProviderCredentials(config);
  const defaults = {
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    timeoutMs: config.llm.timeoutMs,
  };

  switch (config.llm.provider) {
    case 'openai':
      return new OpenAICompatibleProvider({
        ...defaults,
        name: 'openai',
        apiKey,
        model: config.providers.openai.model,
        baseUrl: config.providers.openai.baseUrl,
      });
    case 'deepseek':
      return new OpenAICompatibleProvider({
        ...defaults,
        name: 'deepseek',
        apiKey,
        model: config.providers.deepseek.model,
        baseUrl: config.providers.deepseek.baseUrl,
      });
    case 'gemini':
      return new GeminiProvider({
        ...defaults,
        apiKey,
        model: config.providers.gemini.model,
      });
  }
}
