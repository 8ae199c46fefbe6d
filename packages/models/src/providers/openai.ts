import OpenAI from 'openai';
import {
  type ChatMessage,
  type FinishReason,
  type ModelRequest,
  type ModelResponse,
  type ToolCall,
  LLMProviderError,
  ToolsUnsupportedError,
  errorMessage,
  monotonicNow,
} from '@steward/shared';
import type { GenerationDefaults, ModelProvider } from '../provider.js';

type ChatCompletionMessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ChatCompletionTool = OpenAI.Chat.ChatCompletionTool;

export interface OpenAICompatibleOptions extends GenerationDefaults {
  name: 'openai' | 'deepseek';
  apiKey: string;
  model: string;
  baseUrl?: string;
}

/** OpenAI and DeepSeek share the chat-completions wire format, so one adapter serves both. */
export class OpenAICompatibleProvider implements ModelProvider {
  readonly name: 'openai' | 'deepseek';
  readonly model: string;
  readonly supportsTools = true;

  private client: OpenAI;
  private defaults: GenerationDefaults;

  constructor(options: OpenAICompatibleOptions) {
    this.name = options.name;
    this.model = options.model;
    this.defaults = {
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      timeoutMs: options.timeoutMs,
    };
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 1,
    });
  }

  async generate(request: ModelRequest): Promise<ModelResponse> {
    const startTime = monotonicNow();
    const tools = request.tools?.map((tool): ChatCompletionTool => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: { ...tool.parameters },
      },
    }));

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: toOpenAIMessages(request),
        max_tokens: request.maxTokens ?? this.defaults.maxTokens,
        temperature: request.temperature ?? this.defaults.temperature,
        ...(tools?.length ? { tools } : {}),
        ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
      });
    } catch (err) {
      throw this.mapError(err, Boolean(tools?.length));
    }

    const latencyMs = monotonicNow() - startTime;
    const choice = response.choices[0];
    const content = choice?.message?.content ?? '';
    const toolCalls = parseToolCalls(choice?.message?.tool_calls ?? []);

    if (!content.trim() && toolCalls.length === 0) {
      throw new LLMProviderError(this.name, 'returned no content');
    }

    return {
      provider: this.name,
      model: response.model || this.model,
      content,
      toolCalls,
      tokenUsage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
      latencyMs,
      finishReason: mapFinishReason(choice?.finish_reason),
    };
  }

  private mapError(err: unknown, toolsRequested: boolean): Error {
    if (err instanceof OpenAI.APIConnectionTimeoutError) {
      return new LLMProviderError(this.name, `timed out after ${this.defaults.timeoutMs}ms`, { cause: err });
    }
    if (
      toolsRequested &&
      err instanceof OpenAI.APIError &&
      (err.status === 400 || err.status === 422) &&
      /tool|function/i.test(err.message)
    ) {
      return new ToolsUnsupportedError(this.name);
    }
    return new LLMProviderError(this.name, errorMessage(err), { cause: err });
  }
}

function toOpenAIMessages(request: ModelRequest): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];
  if (request.system) {
    messages.push({ role: 'system', content: request.system });
  }
  for (const msg of request.messages) {
    messages.push(toOpenAIMessage(msg));
  }
  return messages;
}

function toOpenAIMessage(msg: ChatMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'tool':
      return { role: 'tool', tool_call_id: msg.toolCallId ?? '', content: msg.content };
    case 'assistant':
      if (!msg.toolCalls?.length) {
        return { role: 'assistant', content: msg.content };
      }
      return {
        role: 'assistant',
        content: msg.content || null,
        tool_calls: msg.toolCalls.map(call => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: JSON.stringify(call.arguments) },
        })),
      };
  }
}

function parseToolCalls(calls: OpenAI.Chat.ChatCompletionMessageToolCall[]): ToolCall[] {
  const parsed: ToolCall[] = [];
  for (const call of calls) {
    let args: Record<string, unknown> = {};
    try {
      const value: unknown = JSON.parse(call.function.arguments || '{}');
      if (value && typeof value === 'object' && !Array.isArray(value)) {
        args = Object.fromEntries(Object.entries(value));
      }
    } catch {
      // Unparseable arguments reach the tool as {} and fail its input validation there.
      args = {};
    }
    parsed.push({ id: call.id, name: call.function.name, arguments: args });
  }
  return parsed;
}

function mapFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'length':
      return 'length';
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    case 'content_filter':
      return 'content_filter';
    default:
      return 'unknown';
  }
}
