import { z } from 'zod';
import { requestJson, type SearchConfig, type ToolDefinition } from '@steward/shared';

const inputSchema = z.object({
  query: z.string().min(1).describe('Search query'),
});

const searchResultSchema = z.object({
  title: z.string(),
  link: z.string(),
  snippet: z.string(),
});

export const webSearchOutputSchema = z.object({
  query: z.string(),
  results: z.array(searchResultSchema),
});

// Google Custom Search JSON API response, only the fields used here.
const customSearchResponseSchema = z.object({
  items: z.array(z.object({
    title: z.string().default(''),
    link: z.string(),
    snippet: z.string().default(''),
  })).optional(),
});

export type SearchResult = z.infer<typeof searchResultSchema>;
export type WebSearchInput = z.infer<typeof inputSchema>;
export type WebSearchOutput = z.infer<typeof webSearchOutputSchema>;

export type WebSearchOptions = Pick<SearchConfig, 'endpoint' | 'maxResults' | 'timeoutMs'> & {
  apiKey: string;
  engineId: string;
};

export async function googleSearch(options: WebSearchOptions, query: string): Promise<SearchResult[]> {
  const url = new URL(options.endpoint);
  url.searchParams.set('key', options.apiKey);
  url.searchParams.set('cx', options.engineId);
  url.searchParams.set('q', query);
  url.searchParams.set('num', String(options.maxResults));

  const body = await requestJson(url.toString(), { capability: 'search', timeoutMs: options.timeoutMs });
  const parsed = customSearchResponseSchema.safeParse(body ?? {});
  if (!parsed.success) {
    return [];
  }
  return (parsed.data.items ?? []).slice(0, options.maxResults);
}

export function formatSearchResults(results: SearchResult[]): string {
  if (results.length === 0) {
    return 'No search results found.';
  }
  return results
    .map((r, i) => `${i + 1}. **${r.title}**\n   ${r.snippet}\n   Source: ${r.link}`)
    .join('\n\n');
}

/** Returns null when search credentials are not configured. */
export function createWebSearchTool(config: SearchConfig): ToolDefinition<WebSearchInput, WebSearchOutput> | null {
  const { apiKey, engineId } = config;
  if (!apiKey || !engineId) return null;
  const options: WebSearchOptions = { ...config, apiKey, engineId };

  return {
    name: 'web_search',
    description: 'Search the web for current information. Returns titles, links and snippets.',
    inputSchema,
    outputSchema: webSearchOutputSchema,
    tags: ['network', 'search'],
    timeoutMs: config.timeoutMs + 1_000,
    async execute(input) {
      const results = await googleSearch(options, input.query);
      return { query: input.query, results };
    },
  };
}
