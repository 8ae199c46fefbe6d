import {
  type MemoryEntry,
  type ScoredMemory,
  type ScoringStrategy,
  errorMessage,
} from '@steward/shared';
import type { Embedder } from '@steward/models';
import type { Logger } from '../logger.js';
import { cosineSimilarity, overlapScore, tokenize } from './keyword-index.js';

export interface MemoryStoreOptions {
  embedder: Embedder | null;
  logger: Logger;
}

/** Builds per-request indexes over memory entries. */
export class MemoryStore {
  private readonly logger: Logger;

  constructor(private readonly options: MemoryStoreOptions) {
    this.logger = options.logger.child({ component: 'memory-store' });
  }

  /**
   * Indexes the entries, embedding those without a stored vector. An
   * unreachable embedding backend leaves the index on keyword scoring.
   */
  async build(entries: MemoryEntry[]): Promise<MemoryIndex> {
    const { embedder } = this.options;
    const vectors = new Map<string, number[]>();
    for (const entry of entries) {
      if (entry.embedding?.length) vectors.set(entry.id, entry.embedding);
    }

    if (!embedder) {
      return new MemoryIndex(entries, vectors, null, this.logger);
    }

    const missing = entries.filter(e => !vectors.has(e.id));
    if (missing.length > 0) {
      try {
        const embedded = await embedder.embed(missing.map(e => e.content));
        missing.forEach((entry, i) => {
          const vector = embedded[i];
          if (vector?.length) vectors.set(entry.id, vector);
        });
      } catch (err) {
        this.logger.warn({ err: errorMessage(err), provider: embedder.name }, 'Embedding failed, using keyword scoring');
        return new MemoryIndex(entries, vectors, null, this.logger);
      }
    }

    return new MemoryIndex(entries, vectors, embedder, this.logger);
  }

  /** Embedding for a new entry, or undefined when there is no usable backend. */
  async embed(text: string): Promise<number[] | undefined> {
    const { embedder } = this.options;
    if (!embedder) return undefined;
    try {
      const [vector] = await embedder.embed([text]);
      return vector?.length ? vector : undefined;
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Could not embed new memory, storing it without a vector');
      return undefined;
    }
  }
}

export class MemoryIndex {
  private readonly terms: Map<string, ReadonlySet<string>>;
  private embedder: Embedder | null;

  constructor(
    private readonly items: readonly MemoryEntry[],
    private readonly vectors: Map<string, number[]>,
    embedder: Embedder | null,
    private readonly logger: Logger,
  ) {
    this.embedder = embedder;
    this.terms = new Map(items.map(e => [e.id, new Set(tokenize(e.content))]));
  }

  get size(): number {
    return this.items.length;
  }

  get strategy(): ScoringStrategy {
    return this.embedder ? 'vector' : 'keyword';
  }

  entries(): readonly MemoryEntry[] {
    return this.items;
  }

  /** Top `k` entries, best first; equal scores keep insertion order. */
  async query(question: string, k: number): Promise<ScoredMemory[]> {
    if (k <= 0 || this.items.length === 0) return [];

    if (this.embedder) {
      try {
        return await this.vectorQuery(this.embedder, question, k);
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, 'Vector query failed, switching to keyword scoring');
        this.embedder = null;
      }
    }
    return this.keywordQuery(question, k);
  }

  private async vectorQuery(embedder: Embedder, question: string, k: number): Promise<ScoredMemory[]> {
    const [queryVector] = await embedder.embed([question]);
    if (!queryVector?.length) {
      throw new Error('embedding backend returned no vector for the question');
    }

    // Stored vectors from another model have a different dimension; re-embed those.
    const stale = this.items.filter(e => this.vectors.get(e.id)?.length !== queryVector.length);
    if (stale.length > 0) {
      const fresh = await embedder.embed(stale.map(e => e.content));
      stale.forEach((entry, i) => {
        const vector = fresh[i];
        if (vector?.length) this.vectors.set(entry.id, vector);
      });
    }

    const scored = this.items.map(entry => ({
      entry,
      score: cosineSimilarity(queryVector, this.vectors.get(entry.id) ?? []),
    }));
    return topK(scored, k);
  }

  private keywordQuery(question: string, k: number): ScoredMemory[] {
    const queryTerms = new Set(tokenize(question));
    const scored = this.items
      .map(entry => ({ entry, score: overlapScore(queryTerms, this.terms.get(entry.id) ?? new Set<string>()) }))
      .filter(s => s.score > 0);
    return topK(scored, k);
  }
}

function topK(scored: ScoredMemory[], k: number): ScoredMemory[] {
  // Array.prototype.sort is stable, so ties stay in insertion order.
  return [...scored].sort((a, b) => b.score - a.score).slice(0, k);
}
