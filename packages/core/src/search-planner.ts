import { z } from 'zod';
import { type QuestionContext, errorMessage, extractJson } from '@steward/shared';
import type { ModelProvider } from '@steward/models';
import type { Logger } from './logger.js';

const decisionSchema = z.object({
  search_needed: z.boolean(),
  search_query: z.string().nullable().optional(),
  reason: z.string().optional(),
});

export interface SearchDecision {
  needed: boolean;
  query?: string;
  reason?: string;
}

/** Asks the model whether the question needs fresh information from the web. */
export class SearchPlanner {
  private readonly logger: Logger;

  constructor(
    private readonly provider: ModelProvider,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'search-planner' });
  }

  async decide(context: QuestionContext, memoryContext: string): Promise<SearchDecision> {
    try {
      const response = await this.provider.generate({
        system: 'You decide whether a web search is needed before answering. Respond with JSON only.',
        messages: [{
          role: 'user',
          content: [
            `Question: ${context.question}`,
            `Asked at: ${context.timestamp}`,
            '',
            memoryContext ? `What the assistant already remembers:\n${memoryContext}` : 'The assistant remembers nothing relevant.',
            '',
            'Search only for current events, prices, weather, recent releases or facts that are likely missing or stale.',
            'Respond with {"search_needed": true|false, "search_query": "query or null", "reason": "short"}.',
          ].join('\n'),
        }],
        responseFormat: 'json',
        temperature: 0,
      });

      const parsed = decisionSchema.safeParse(extractJson(response.content, 'search planner'));
      if (!parsed.success) {
        this.logger.warn('Unexpected search decision, not searching');
        return { needed: false, reason: 'unparseable decision' };
      }
      const query = parsed.data.search_query?.trim() || context.question;
      return parsed.data.search_needed
        ? { needed: true, query, reason: parsed.data.reason }
        : { needed: false, reason: parsed.data.reason };
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Search decision failed, not searching');
      return { needed: false, reason: 'decision failed' };
    }
  }
}
