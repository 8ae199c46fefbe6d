import type { ZodType, ZodTypeDef } from 'zod';

export interface ToolDefinition<TInput = unknown, TOutput = unknown> {
  name: string;
  description: string;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(input: TInput): Promise<TOutput>;
  timeoutMs?: number;
  tags?: string[];
}

export interface ToolInvocation {
  toolName: string;
  input: unknown;
  timeoutMs?: number;
}

export interface ToolResult {
  toolName: string;
  success: boolean;
  output?: unknown;
  error?: string;
  durationMs: number;
}
