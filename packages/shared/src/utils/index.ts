export { generateId, randomHex } from './id.js';
export { monotonicNow, isoNow, compactTimestamp } from './clock.js';
export { extractJson } from './json.js';
export { truncate, sliceChars, maskUrl, maskSecret } from './text.js';
export { requestJson } from './http.js';
export type { HttpRequestOptions } from './http.js';
export {
  StewardError,
  ConfigError,
  AuthenticationError,
  NetworkError,
  TimeoutError,
  MalformedResponseError,
  LLMProviderError,
  ToolsUnsupportedError,
  RepositoryError,
  ToolNotFoundError,
  errorMessage,
} from './errors.js';
export type { Capability } from './errors.js';
