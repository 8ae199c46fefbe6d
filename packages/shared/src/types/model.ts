import type { LLMProviderName } from './config.js';

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ChatMessage {
  role: MessageRole;
  content: string;
  /** Set on assistant messages that requested tools. */
  toolCalls?: ToolCall[];
  /** Set on tool messages, pointing back at the call they answer. */
  toolCallId?: string;
}

export interface JsonSchema {
  type?: string | string[];
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  enum?: Array<string | number | boolean>;
  default?: unknown;
  additionalProperties?: boolean | JsonSchema;
  anyOf?: JsonSchema[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
}

export interface ModelToolSchema {
  name: string;
  description: string;
  parameters: JsonSchema;
}

export interface ModelRequest {
  messages: ChatMessage[];
  system?: string;
  tools?: ModelToolSchema[];
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'text' | 'json';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter' | 'unknown';

export interface ModelResponse {
  provider: LLMProviderName;
  model: string;
  content: string;
  toolCalls: ToolCall[];
  tokenUsage: TokenUsage;
  latencyMs: number;
  finishReason: FinishReason;
}
