export type Capability = 'llm' | 'memory' | 'embeddings' | 'search' | 'github' | 'delivery';

export class StewardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StewardError';
  }
}

export class ConfigError extends StewardError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class AuthenticationError extends StewardError {
  constructor(
    public readonly capability: Capability,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Access denied (${capability}): ${message}`, options);
    this.name = 'AuthenticationError';
  }
}

export class NetworkError extends StewardError {
  constructor(
    public readonly capability: Capability,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${capability} request failed: ${message}`, options);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends NetworkError {
  constructor(
    capability: Capability,
    public readonly timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(capability, `timed out after ${timeoutMs}ms`, options);
    this.name = 'TimeoutError';
  }
}

export class MalformedResponseError extends StewardError {
  constructor(
    public readonly component: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Malformed response in ${component}: ${message}`, options);
    this.name = 'MalformedResponseError';
  }
}

export class LLMProviderError extends StewardError {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`LLM provider ${provider} failed: ${message}`, options);
    this.name = 'LLMProviderError';
  }
}

export class ToolsUnsupportedError extends StewardError {
  constructor(public readonly provider: string) {
    super(`Provider ${provider} does not support tool calling`);
    this.name = 'ToolsUnsupportedError';
  }
}

export class RepositoryError extends StewardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Memory repository error: ${message}`, options);
    this.name = 'RepositoryError';
  }
}

export class ToolNotFoundError extends StewardError {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
