export { zodToJsonSchema, toModelTool } from './schema-bridge.js';
export {
  createWebSearchTool,
  googleSearch,
  formatSearchResults,
  webSearchOutputSchema,
} from './builtin/web-search.js';
export type { SearchResult, WebSearchInput, WebSearchOutput, WebSearchOptions } from './builtin/web-search.js';
export { createGitHubTool, GitHubClient } from './builtin/github.js';
export type { GitHubInput, GitHubOutput } from './builtin/github.js';
