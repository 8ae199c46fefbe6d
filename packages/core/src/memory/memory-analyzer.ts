import { z } from 'zod';
import {
  type MemoryAnalysis,
  type MemoryDraft,
  type MemoryEntry,
  type QuestionContext,
  errorMessage,
  extractJson,
  truncate,
} from '@steward/shared';
import type { ModelProvider } from '@steward/models';
import type { Logger } from '../logger.js';

const SYSTEM_PROMPT =
  'You maintain the long-term memory of a personal assistant. ' +
  'You decide which stored memories matter for a question and what should be remembered or forgotten. ' +
  'Respond with a single JSON object and nothing else.';

const analysisResponseSchema = z.object({
  relevant: z.array(z.string()).default([]),
  to_create: z.array(z.unknown()).default([]),
  to_delete: z.array(z.string()).default([]),
  reasoning: z.string().optional(),
});

const draftSchema = z.object({ content: z.string().trim().min(1) });

export interface MemoryAnalyzerOptions {
  logger: Logger;
  maxContentLength: number;
}

export interface AnalyzeOutcome {
  analysis: MemoryAnalysis;
  /** Why the safe default was used, when it was. */
  fallbackReason?: string;
}

/** Candidate labels shown to the model; short ids are echoed back more reliably than paths. */
function labelFor(index: number): string {
  return `m${index + 1}`;
}

export function buildAnalysisPrompt(context: QuestionContext, candidates: MemoryEntry[]): string {
  const memories = candidates.length
    ? candidates
      .map((m, i) => `[${labelFor(i)}] (${m.timestamp}, user ${m.user || 'unknown'}) ${m.content}`)
      .join('\n')
    : '(none)';

  return [
    `Question from ${context.user} at ${context.timestamp}:`,
    context.question,
    '',
    'Stored memories:',
    memories,
    '',
    'Decide:',
    '1. relevant: ids of stored memories that help answer the question.',
    '2. to_create: new facts worth keeping from this question, such as preferences, personal details, ' +
      'standing instructions or ongoing projects. Skip small talk and one-off lookups. Each item is {"content": "..."}.',
    '3. to_delete: ids of stored memories the question shows are outdated or wrong.',
    '',
    'Respond with JSON only:',
    '{"relevant": ["m1"], "to_create": [{"content": "..."}], "to_delete": [], "reasoning": "one sentence"}',
  ].join('\n');
}

/**
 * Asks the model which candidates are relevant and what to create or delete.
 * Anything the model gets wrong degrades to "no changes, every candidate relevant".
 */
export class MemoryAnalyzer {
  private readonly logger: Logger;

  constructor(
    private readonly provider: ModelProvider,
    private readonly options: MemoryAnalyzerOptions,
  ) {
    this.logger = options.logger.child({ component: 'memory-analyzer' });
  }

  async analyze(context: QuestionContext, candidates: MemoryEntry[]): Promise<AnalyzeOutcome> {
    let content: string;
    try {
      const response = await this.provider.generate({
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildAnalysisPrompt(context, candidates) }],
        responseFormat: 'json',
        temperature: 0,
      });
      content = response.content;
    } catch (err) {
      return this.fallback(candidates, `model call failed: ${errorMessage(err)}`);
    }

    let parsed: z.infer<typeof analysisResponseSchema>;
    try {
      const result = analysisResponseSchema.safeParse(extractJson(content, 'memory analyzer'));
      if (!result.success) {
        return this.fallback(candidates, `unexpected response shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
      }
      parsed = result.data;
    } catch (err) {
      return this.fallback(candidates, errorMessage(err));
    }

    return { analysis: this.interpret(context, candidates, parsed) };
  }

  private interpret(
    context: QuestionContext,
    candidates: MemoryEntry[],
    parsed: z.infer<typeof analysisResponseSchema>,
  ): MemoryAnalysis {
    const byLabel = new Map(candidates.map((entry, i) => [labelFor(i), entry]));
    const byId = new Map(candidates.map(entry => [entry.id, entry]));
    const discardedIds: string[] = [];

    const resolve = (ids: string[]): MemoryEntry[] => {
      const seen = new Set<string>();
      const out: MemoryEntry[] = [];
      for (const raw of ids) {
        const entry = byLabel.get(raw.trim().toLowerCase().replace(/^\[|\]$/g, '')) ?? byId.get(raw.trim());
        if (!entry) {
          discardedIds.push(raw);
          continue;
        }
        if (!seen.has(entry.id)) {
          seen.add(entry.id);
          out.push(entry);
        }
      }
      return out;
    };

    const toDelete = resolve(parsed.to_delete);
    const deleted = new Set(toDelete.map(e => e.id));
    const relevant = resolve(parsed.relevant).filter(e => !deleted.has(e.id));

    const toCreate: MemoryDraft[] = [];
    for (const item of parsed.to_create) {
      const draft = draftSchema.safeParse(typeof item === 'string' ? { content: item } : item);
      if (!draft.success) {
        this.logger.warn('Dropping memory draft without content');
        continue;
      }
      toCreate.push({
        content: truncate(draft.data.content, this.options.maxContentLength),
        user: context.user,
        relatedQuestion: context.question,
      });
    }

    if (discardedIds.length > 0) {
      this.logger.warn({ discardedIds }, 'Model referenced memories that were not candidates; ignoring them');
    }

    return {
      relevant,
      toCreate,
      toDelete,
      degraded: false,
      discardedIds,
      ...(parsed.reasoning ? { reasoning: parsed.reasoning } : {}),
    };
  }

  private fallback(candidates: MemoryEntry[], reason: string): AnalyzeOutcome {
    this.logger.warn({ reason }, 'Memory analysis unusable, keeping all candidates and changing nothing');
    return {
      analysis: {
        relevant: [...candidates],
        toCreate: [],
        toDelete: [],
        degraded: true,
        discardedIds: [],
      },
      fallbackReason: reason,
    };
  }
}
