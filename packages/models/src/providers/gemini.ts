import { GoogleGenerativeAI, type Content } from '@google/generative-ai';
import {
  type FinishReason,
  type ModelRequest,
  type ModelResponse,
  LLMProviderError,
  ToolsUnsupportedError,
  errorMessage,
  monotonicNow,
} from '@steward/shared';
import type { GenerationDefaults, ModelProvider } from '../provider.js';

export interface GeminiOptions extends GenerationDefaults {
  apiKey: string;
  model: string;
}

/** Native Gemini API. Function calling is not wired up, so tool requests are refused. */
export class GeminiProvider implements ModelProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  readonly supportsTools = false;

  private client: GoogleGenerativeAI;
  private defaults: GenerationDefaults;

  constructor(options: GeminiOptions) {
    this.model = options.model;
    this.client = new GoogleGenerativeAI(options.apiKey);
    this.defaults = {
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      timeoutMs: options.timeoutMs,
    };
  }

  async generate(request: ModelRequest): Promise<ModelResponse> {
    if (request.tools?.length || request.messages.some(m => m.role === 'tool' || m.toolCalls?.length)) {
      throw new ToolsUnsupportedError(this.name);
    }

    const startTime = monotonicNow();
    const systemParts = [
      request.system,
      ...request.messages.filter(m => m.role === 'system').map(m => m.content),
    ].filter((part): part is string => Boolean(part));

    const model = this.client.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: systemParts.length ? systemParts.join('\n\n') : undefined,
        generationConfig: {
          maxOutputTokens: request.maxTokens ?? this.defaults.maxTokens,
          temperature: request.temperature ?? this.defaults.temperature,
          ...(request.responseFormat === 'json' ? { responseMimeType: 'application/json' } : {}),
        },
      },
      { timeout: this.defaults.timeoutMs },
    );

    const contents: Content[] = request.messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));

    let text: string;
    let finishReason: FinishReason = 'unknown';
    let usage: { promptTokenCount?: number; candidatesTokenCount?: number; totalTokenCount?: number } | undefined;
    try {
      const result = await model.generateContent({ contents });
      text = result.response.text();
      usage = result.response.usageMetadata;
      finishReason = mapFinishReason(result.response.candidates?.[0]?.finishReason);
    } catch (err) {
      throw new LLMProviderError(this.name, errorMessage(err), { cause: err });
    }

    if (!text.trim()) {
      throw new LLMProviderError(this.name, 'returned no content');
    }

    return {
      provider: this.name,
      model: this.model,
      content: text,
      toolCalls: [],
      tokenUsage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
      latencyMs: monotonicNow() - startTime,
      finishReason,
    };
  }
}

function mapFinishReason(reason: string | undefined): FinishReason {
  switch (reason) {
    case 'STOP':
      return 'stop';
    case 'MAX_TOKENS':
      return 'length';
    case 'SAFETY':
    case 'RECITATION':
      return 'content_filter';
    default:
      return 'unknown';
  }
}
