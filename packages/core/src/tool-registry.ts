import {
  type ModelToolSchema,
  type ToolDefinition,
  type ToolInvocation,
  type ToolResult,
  ToolNotFoundError,
  errorMessage,
  monotonicNow,
} from '@steward/shared';
import { toModelTool } from '@steward/tools';

const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register<TInput, TOutput>(tool: ToolDefinition<TInput, TOutput>): void {
    this.tools.set(tool.name, tool);
  }

  /** Registers the tool when present; tool factories return null when unconfigured. */
  registerIfPresent<TInput, TOutput>(tool: ToolDefinition<TInput, TOutput> | null): boolean {
    if (!tool) return false;
    this.register(tool);
    return true;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Schemas in the shape function-calling APIs expect. */
  toModelTools(names?: string[]): ModelToolSchema[] {
    return this.list()
      .filter(t => !names || names.includes(t.name))
      .map(toModelTool);
  }

  async invoke(invocation: ToolInvocation): Promise<ToolResult> {
    const tool = this.tools.get(invocation.toolName);
    if (!tool) {
      throw new ToolNotFoundError(invocation.toolName);
    }

    const startTime = monotonicNow();
    const timeoutMs = invocation.timeoutMs ?? tool.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;

    try {
      const parsedInput = tool.inputSchema.parse(invocation.input);

      const result = await Promise.race([
        tool.execute(parsedInput),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`Tool timed out after ${timeoutMs}ms`)), timeoutMs);
        }),
      ]);

      const parsedOutput = tool.outputSchema.parse(result);

      return {
        toolName: invocation.toolName,
        success: true,
        output: parsedOutput,
        durationMs: monotonicNow() - startTime,
      };
    } catch (error) {
      return {
        toolName: invocation.toolName,
        success: false,
        error: errorMessage(error),
        durationMs: monotonicNow() - startTime,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
