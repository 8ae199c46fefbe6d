import {
  type ApplyChangesResult,
  type Capability,
  type ChatMessage,
  type DeliveryChannel,
  type ExecutionTrace,
  type MemoryAnalysis,
  type MemoryEntry,
  type MemoryNote,
  type ModelResponse,
  type ModelToolSchema,
  type QuestionContext,
  type ScoredMemory,
  type StewardConfig,
  type ToolResult,
  LLMProviderError,
  PROFILE_QUERY,
  ToolsUnsupportedError,
  errorMessage,
  generateId,
  sliceChars,
} from '@steward/shared';
import type { ModelProvider } from '@steward/models';
import { formatSearchResults, webSearchOutputSchema } from '@steward/tools';
import type { Logger } from './logger.js';
import { TraceLogger } from './trace-logger.js';
import type { ToolRegistry } from './tool-registry.js';
import type { SearchPlanner } from './search-planner.js';
import type { MemoryRepositoryManager } from './memory/repository-manager.js';
import type { MemoryStore } from './memory/memory-store.js';
import type { MemoryAnalyzer } from './memory/memory-analyzer.js';
import { formatMemoryContext } from './memory/context.js';

export type AssistantState =
  | 'init'
  | 'repository_ready'
  | 'memories_loaded'
  | 'analyzed'
  | 'tools_executed'
  | 'answered'
  | 'memories_persisted'
  | 'delivered'
  | 'failed';

export interface Degradation {
  capability: Capability;
  reason: string;
}

export interface AssistantResult {
  traceId: string;
  answer: string;
  /** States reached, in order. */
  states: AssistantState[];
  memoriesUsed: string[];
  notesUsed: string[];
  searchUsed: boolean;
  searchQuery?: string;
  toolCalls: ToolResult[];
  memoryChanges: ApplyChangesResult | null;
  degraded: Degradation[];
  delivered: boolean;
  deliveryError?: string;
  trace: ExecutionTrace;
}

export interface OrchestratorDeps {
  config: StewardConfig;
  provider: ModelProvider;
  logger: Logger;
  /** Null when no memory repository is configured. */
  repository: MemoryRepositoryManager | null;
  store: MemoryStore;
  analyzer: MemoryAnalyzer;
  searchPlanner: SearchPlanner;
  tools: ToolRegistry;
  /** Null when no webhook is configured. */
  channel: DeliveryChannel | null;
  traceLogger?: TraceLogger;
}

export interface ProcessOptions {
  /** Skip the webhook even when one is configured. */
  deliver?: boolean;
}

const SEARCH_TOOL = 'web_search';
const ERROR_TITLE = 'Error';

const SYSTEM_PROMPT = [
  'You are a helpful personal assistant.',
  'Answer the user\'s question directly and concisely.',
  'Use the provided memories, notes and search results when they are relevant, and say so when information may be outdated.',
  'Call a tool only when the question needs it.',
].join(' ');

interface MemoryContext {
  available: boolean;
  notes: MemoryNote[];
  candidates: MemoryEntry[];
  analysis: MemoryAnalysis | null;
}

/** Per-request bookkeeping; nothing here outlives one `process` call. */
class RequestRun {
  readonly states: AssistantState[] = ['init'];
  readonly degraded: Degradation[] = [];
  readonly toolCalls: ToolResult[] = [];

  constructor(
    readonly traceId: string,
    readonly context: QuestionContext,
    private readonly traceLogger: TraceLogger,
    private readonly logger: Logger,
  ) {}

  transition(to: AssistantState): void {
    const from = this.states[this.states.length - 1] ?? 'init';
    this.states.push(to);
    this.traceLogger.logStateTransition(this.traceId, from, to);
    this.logger.debug({ from, to }, 'State transition');
  }

  degrade(capability: Capability, reason: string): void {
    this.degraded.push({ capability, reason });
    this.traceLogger.logDegraded(this.traceId, capability, reason);
    this.logger.warn({ capability, reason }, 'Continuing without capability');
  }
}

/**
 * Runs one question through the pipeline: memory, analysis, search and
 * tools, answer, persistence, delivery. Optional capabilities degrade;
 * only a failure to produce the answer is fatal.
 */
export class Orchestrator {
  private readonly logger: Logger;
  private readonly traceLogger: TraceLogger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger.child({ component: 'orchestrator' });
    this.traceLogger = deps.traceLogger ?? new TraceLogger();
  }

  async process(context: QuestionContext, options: ProcessOptions = {}): Promise<AssistantResult> {
    const traceId = generateId('trace');
    this.traceLogger.createTrace(traceId, context);
    const run = new RequestRun(traceId, context, this.traceLogger, this.logger.child({ traceId }));
    const deliver = options.deliver ?? true;
    this.logger.info({ traceId, user: context.user }, 'Processing question');

    const memory = await this.prepareMemory(run);
    const memoryContext = memory.analysis
      ? formatMemoryContext(memory.analysis.relevant, memory.notes)
      : formatMemoryContext([], memory.notes);

    const search = await this.runSearch(run, memoryContext);

    let answer: string;
    try {
      answer = await this.answer(run, memoryContext, search.results);
    } catch (err) {
      run.transition('failed');
      this.traceLogger.logEvent(traceId, 'error', { error: errorMessage(err) });
      await this.finishTrace(traceId);
      if (deliver) await this.sendErrorReport(context, err);
      throw err;
    }
    run.transition('answered');

    const memoryChanges = await this.persist(run, memory);

    let delivered = false;
    let deliveryError: string | undefined;
    if (deliver && this.deps.channel) {
      const span = this.traceLogger.startSpan(traceId, 'delivery', { channel: this.deps.channel.name });
      try {
        await this.deps.channel.send({ title: this.deps.config.delivery.title, text: answer, timestamp: context.timestamp });
        delivered = true;
        run.transition('delivered');
      } catch (err) {
        deliveryError = errorMessage(err);
        run.degrade('delivery', deliveryError);
      } finally {
        this.traceLogger.endSpan(traceId, span);
      }
    }

    const trace = await this.finishTrace(traceId);
    return {
      traceId,
      answer,
      states: run.states,
      memoriesUsed: memory.analysis?.relevant.map(e => e.id) ?? [],
      notesUsed: memory.notes.map(n => n.path),
      searchUsed: search.used,
      searchQuery: search.query,
      toolCalls: run.toolCalls,
      memoryChanges,
      degraded: run.degraded,
      delivered,
      deliveryError,
      trace,
    };
  }

  private async prepareMemory(run: RequestRun): Promise<MemoryContext> {
    const { repository, store, analyzer, config } = this.deps;
    const empty: MemoryContext = { available: false, notes: [], candidates: [], analysis: null };
    if (!repository) {
      run.degrade('memory', 'MEMORY_REPO_URL is not set');
      return empty;
    }

    const span = this.traceLogger.startSpan(run.traceId, 'memory');
    try {
      let entries: MemoryEntry[];
      let notes: MemoryNote[];
      try {
        await repository.ensureReady();
        run.transition('repository_ready');
        entries = await repository.loadEntries();
        notes = await repository.loadNotes();
      } catch (err) {
        run.degrade('memory', errorMessage(err));
        return empty;
      }

      const index = await store.build(entries);
      const matches = await index.query(run.context.question, config.memory.candidateLimit);
      const profile = await index.query(PROFILE_QUERY, config.memory.profileLimit);
      const candidates = mergeCandidates(matches, profile);
      run.transition('memories_loaded');
      this.traceLogger.logEvent(run.traceId, 'memory_query', {
        strategy: index.strategy,
        indexed: index.size,
        candidates: candidates.map(e => e.id),
        notes: notes.length,
      });

      const { analysis, fallbackReason } = await analyzer.analyze(run.context, candidates);
      run.transition('analyzed');
      this.traceLogger.logEvent(run.traceId, 'memory_analysis', {
        relevant: analysis.relevant.map(e => e.id),
        toCreate: analysis.toCreate.length,
        toDelete: analysis.toDelete.map(e => e.id),
        discarded: analysis.discardedIds,
        degraded: analysis.degraded,
        fallbackReason,
      });
      return { available: true, notes, candidates, analysis };
    } finally {
      this.traceLogger.endSpan(run.traceId, span);
    }
  }

  private async runSearch(
    run: RequestRun,
    memoryContext: string,
  ): Promise<{ used: boolean; query?: string; results?: string }> {
    const { tools, searchPlanner } = this.deps;
    if (!tools.has(SEARCH_TOOL)) {
      return { used: false };
    }

    const decision = await searchPlanner.decide(run.context, memoryContext);
    this.traceLogger.logEvent(run.traceId, 'search_decision', { ...decision });
    if (!decision.needed || !decision.query) {
      return { used: false };
    }

    const invocation = { toolName: SEARCH_TOOL, input: { query: decision.query } };
    const result = await tools.invoke(invocation);
    this.traceLogger.logToolCall(run.traceId, invocation, result);
    run.toolCalls.push(result);
    if (!result.success) {
      run.degrade('search', result.error ?? 'search failed');
      return { used: false, query: decision.query };
    }

    const output = webSearchOutputSchema.safeParse(result.output);
    if (!output.success) {
      run.degrade('search', 'unexpected search tool output');
      return { used: false, query: decision.query };
    }
    return { used: true, query: decision.query, results: formatSearchResults(output.data.results) };
  }

  private async answer(run: RequestRun, memoryContext: string, searchResults?: string): Promise<string> {
    const { provider, tools, config } = this.deps;
    const offered: ModelToolSchema[] = tools.toModelTools(tools.listNames().filter(n => n !== SEARCH_TOOL));
    let toolSchemas = offered.length > 0 ? offered : undefined;

    const messages: ChatMessage[] = [
      { role: 'user', content: buildUserPrompt(run.context, memoryContext, searchResults) },
    ];
    let rounds = 0;
    const span = this.traceLogger.startSpan(run.traceId, 'answer', { provider: provider.name, model: provider.model });

    try {
      for (;;) {
        const allowTools = toolSchemas !== undefined && rounds < config.llm.maxToolRounds;
        let response: ModelResponse;
        try {
          response = await provider.generate({
            system: SYSTEM_PROMPT,
            messages,
            tools: allowTools ? toolSchemas : undefined,
            temperature: config.llm.temperature,
            maxTokens: config.llm.maxTokens,
          });
        } catch (err) {
          if (err instanceof ToolsUnsupportedError && allowTools) {
            run.degrade('github', err.message);
            toolSchemas = undefined;
            continue;
          }
          throw err;
        }
        this.traceLogger.logModelCall(run.traceId, rounds === 0 ? 'answer' : `answer_round_${rounds}`, response);

        if (!allowTools || response.toolCalls.length === 0) {
          const content = response.content.trim();
          if (!content) {
            throw new LLMProviderError(provider.name, 'returned no content');
          }
          return content;
        }

        rounds++;
        messages.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });
        for (const call of response.toolCalls) {
          const invocation = { toolName: call.name, input: call.arguments };
          const result = await this.invokeTool(invocation);
          this.traceLogger.logToolCall(run.traceId, invocation, result);
          run.toolCalls.push(result);
          messages.push({
            role: 'tool',
            toolCallId: call.id,
            content: result.success
              ? JSON.stringify(result.output ?? null)
              : JSON.stringify({ error: result.error ?? 'tool failed' }),
          });
        }
        if (!run.states.includes('tools_executed')) run.transition('tools_executed');
      }
    } finally {
      this.traceLogger.endSpan(run.traceId, span);
    }
  }

  /** Unknown tools become failed results the model can read. */
  private async invokeTool(invocation: { toolName: string; input: unknown }): Promise<ToolResult> {
    try {
      return await this.deps.tools.invoke(invocation);
    } catch (err) {
      return { toolName: invocation.toolName, success: false, error: errorMessage(err), durationMs: 0 };
    }
  }

  private async persist(run: RequestRun, memory: MemoryContext): Promise<ApplyChangesResult | null> {
    const { repository, store } = this.deps;
    if (!repository || !memory.available || !memory.analysis) {
      return null;
    }

    const { toCreate, toDelete } = memory.analysis;
    const span = this.traceLogger.startSpan(run.traceId, 'persist');
    try {
      const creates: MemoryEntry[] = [];
      for (const draft of toCreate) {
        creates.push(repository.createEntry(draft, await store.embed(draft.content)));
      }
      const result = await repository.applyChanges(creates, toDelete, {
        message: commitMessage(creates, toDelete, run.context.user),
      });
      this.traceLogger.logEvent(run.traceId, 'memory_persist', { ...result });
      run.transition('memories_persisted');
      return result;
    } catch (err) {
      run.degrade('memory', `could not persist memory changes: ${errorMessage(err)}`);
      return null;
    } finally {
      this.traceLogger.endSpan(run.traceId, span);
    }
  }

  private async sendErrorReport(context: QuestionContext, err: unknown): Promise<void> {
    const { channel, config } = this.deps;
    if (!channel || !config.delivery.sendErrorReport) return;
    try {
      await channel.send({
        title: ERROR_TITLE,
        text: `Sorry, I could not answer your question.\n\nQuestion: ${context.question}\nError: ${errorMessage(err)}`,
        timestamp: context.timestamp,
      });
    } catch (reportErr) {
      this.logger.error({ err: errorMessage(reportErr) }, 'Could not deliver error report');
    }
  }

  private async finishTrace(traceId: string): Promise<ExecutionTrace> {
    const trace = this.traceLogger.getTrace(traceId);
    const { traceOutput, traceDir } = this.deps.config.logging;
    if (traceOutput === 'file') {
      try {
        const file = await this.traceLogger.saveTrace(trace, traceDir);
        this.logger.debug({ file }, 'Trace written');
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, 'Could not write trace');
      }
    }
    return trace;
  }
}

/** Question matches first, then profile matches not already present. */
export function mergeCandidates(matches: ScoredMemory[], profile: ScoredMemory[]): MemoryEntry[] {
  const seen = new Set<string>();
  const merged: MemoryEntry[] = [];
  for (const { entry } of [...matches, ...profile]) {
    if (seen.has(entry.id)) continue;
    seen.add(entry.id);
    merged.push(entry);
  }
  return merged;
}

export function commitMessage(creates: MemoryEntry[], deletes: MemoryEntry[], user: string): string {
  const [only] = creates;
  if (only && creates.length === 1 && deletes.length === 0) {
    return `Add memory: ${sliceChars(only.content, 50)}... (user: ${user})`;
  }
  return `Update memories (+${creates.length}/-${deletes.length}) for ${user}`;
}

export function buildUserPrompt(context: QuestionContext, memoryContext: string, searchResults?: string): string {
  const sections = [
    `Question: ${context.question}`,
    `User: ${context.user}`,
    `Asked at: ${context.timestamp}`,
  ];
  if (memoryContext) sections.push(memoryContext);
  if (searchResults) sections.push(`## Search Results:\n\n${searchResults}`);
  return sections.join('\n\n');
}
