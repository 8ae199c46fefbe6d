import type { LLMProviderName, ModelRequest, ModelResponse, ToolCall } from '@steward/shared';
import type { ModelProvider } from '@steward/models';

export interface FakeReply {
  content?: string;
  toolCalls?: ToolCall[];
}

export type FakeHandler = (request: ModelRequest, call: number) => string | FakeReply | Promise<string | FakeReply>;

/** Provider double: answers through a handler and records every request. */
export class FakeProvider implements ModelProvider {
  readonly model = 'fake-model';
  readonly requests: ModelRequest[] = [];

  constructor(
    private readonly handler: FakeHandler,
    readonly name: LLMProviderName = 'openai',
    readonly supportsTools = true,
  ) {}

  async generate(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push(request);
    const reply = await this.handler(request, this.requests.length - 1);
    const normalized: FakeReply = typeof reply === 'string' ? { content: reply } : reply;
    const content = normalized.content ?? '';
    const toolCalls = normalized.toolCalls ?? [];
    return {
      provider: this.name,
      model: this.model,
      content,
      toolCalls,
      tokenUsage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
      latencyMs: 1,
      finishReason: toolCalls.length > 0 ? 'tool_calls' : 'stop',
    };
  }
}

/** Replies in order; an Error in the script is thrown. */
export function scripted(...steps: Array<string | FakeReply | Error>): FakeHandler {
  return (_request, call) => {
    const step = steps[call];
    if (step === undefined) throw new Error(`no scripted reply for call ${call}`);
    if (step instanceof Error) throw step;
    return step;
  };
}
