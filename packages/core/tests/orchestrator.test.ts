import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import {
  AuthenticationError,
  LLMProviderError,
  ToolsUnsupportedError,
  stewardConfigSchema,
  type DeliveryChannel,
  type MemoryEntry,
  type ModelRequest,
  type OutboundMessage,
  type StewardConfig,
} from '@steward/shared';
import { Orchestrator, commitMessage, mergeCandidates } from '../src/orchestrator.js';
import { MemoryRepositoryManager } from '../src/memory/repository-manager.js';
import { MemoryStore } from '../src/memory/memory-store.js';
import { MemoryAnalyzer } from '../src/memory/memory-analyzer.js';
import { SearchPlanner } from '../src/search-planner.js';
import { ToolRegistry } from '../src/tool-registry.js';
import { runGit, type GitRunner } from '../src/memory/git.js';
import { createSilentLogger } from '../src/logger.js';
import { FakeProvider, type FakeHandler, type FakeReply } from './helpers.js';

const TIMEOUT = 20_000;
const weather = { question: 'What is the weather today?', user: 'bob', timestamp: '2025-03-01T09:00:00Z' };

class RecordingChannel implements DeliveryChannel {
  readonly name = 'recording';
  readonly sent: OutboundMessage[] = [];
  constructor(private readonly failWith?: Error) {}

  async send(message: OutboundMessage): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
  }
}

type Role = 'analyzer' | 'planner' | 'answer';

function roleOf(request: ModelRequest): Role {
  const system = request.system ?? '';
  if (system.startsWith('You maintain the long-term memory')) return 'analyzer';
  if (system.startsWith('You decide whether a web search')) return 'planner';
  return 'answer';
}

/** Routes each call to the reply for its component. */
function model(replies: Partial<Record<Role, FakeHandler>>): FakeHandler {
  return (request, call) => {
    const handler = replies[roleOf(request)];
    if (!handler) throw new Error(`no reply for ${roleOf(request)}`);
    return handler(request, call);
  };
}

const answer = (content: string): FakeHandler => () => content;

interface Setup {
  config?: StewardConfig;
  provider: FakeProvider;
  repository?: MemoryRepositoryManager | null;
  tools?: ToolRegistry;
  channel?: DeliveryChannel | null;
}

function orchestrator(setup: Setup): Orchestrator {
  const config = setup.config ?? stewardConfigSchema.parse({});
  const logger = createSilentLogger();
  return new Orchestrator({
    config,
    provider: setup.provider,
    logger,
    repository: setup.repository ?? null,
    store: new MemoryStore({ embedder: null, logger }),
    analyzer: new MemoryAnalyzer(setup.provider, { logger, maxContentLength: config.memory.maxContentLength }),
    searchPlanner: new SearchPlanner(setup.provider, logger),
    tools: setup.tools ?? new ToolRegistry(),
    channel: setup.channel ?? null,
  });
}

const echoTool = {
  name: 'echo',
  description: 'Echo a message',
  inputSchema: z.object({ message: z.string() }),
  outputSchema: z.object({ echoed: z.string() }),
  async execute(input: { message: string }) {
    return { echoed: input.message };
  },
};

function toolCallOnce(call: FakeReply, final: string): FakeHandler {
  return request => {
    const answered = request.messages.some(m => m.role === 'tool');
    return answered ? final : call;
  };
}

describe('Orchestrator without memory', () => {
  it('answers a question with no memory repository configured', async () => {
    const provider = new FakeProvider(model({ answer: answer('Sunny, around 18°C.') }));

    const result = await orchestrator({ provider }).process(weather);

    expect(result.answer).toBe('Sunny, around 18°C.');
    expect(result.states).toEqual(['init', 'answered']);
    expect(result.memoriesUsed).toEqual([]);
    expect(result.memoryChanges).toBeNull();
    expect(result.degraded).toEqual([{ capability: 'memory', reason: 'MEMORY_REPO_URL is not set' }]);
    expect(result.delivered).toBe(false);
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0]?.messages[0]?.content).toBe(
      'Question: What is the weather today?\n\nUser: bob\n\nAsked at: 2025-03-01T09:00:00Z',
    );
    expect(result.trace.traceId).toBe(result.traceId);
  });

  it('delivers the answer through the channel', async () => {
    const channel = new RecordingChannel();
    const provider = new FakeProvider(model({ answer: answer('Sunny.') }));

    const result = await orchestrator({ provider, channel }).process(weather);

    expect(result.delivered).toBe(true);
    expect(result.states[result.states.length - 1]).toBe('delivered');
    expect(channel.sent).toEqual([{ title: 'Personal Assistant Response', text: 'Sunny.', timestamp: '2025-03-01T09:00:00Z' }]);
  });

  it('skips delivery when asked to', async () => {
    const channel = new RecordingChannel();
    const provider = new FakeProvider(model({ answer: answer('Sunny.') }));

    const result = await orchestrator({ provider, channel }).process(weather, { deliver: false });

    expect(result.delivered).toBe(false);
    expect(channel.sent).toEqual([]);
  });

  it('reports a delivery failure without failing the run', async () => {
    const channel = new RecordingChannel(new Error('webhook down'));
    const provider = new FakeProvider(model({ answer: answer('Sunny.') }));

    const result = await orchestrator({ provider, channel }).process(weather);

    expect(result.delivered).toBe(false);
    expect(result.deliveryError).toBe('webhook down');
    expect(result.degraded).toContainEqual({ capability: 'delivery', reason: 'webhook down' });
  });

  it('continues without memory when the repository denies access', async () => {
    const denied: GitRunner = async () => {
      throw new AuthenticationError('memory', 'git clone: fatal: Authentication failed');
    };
    const repository = new MemoryRepositoryManager({
      repoUrl: 'https://git.example.test/me/memory.git',
      token: 'test-token',
      localPath: join(tmpdir(), 'steward-never-created'),
      memoriesDir: 'memories',
      timeoutMs: 1000,
      maxNoteLength: 100,
      author: { name: 'Test', email: 'test@localhost' },
      logger: createSilentLogger(),
      git: denied,
    });
    const provider = new FakeProvider(model({ answer: answer('Here is an answer without memory.') }));

    const result = await orchestrator({ provider, repository }).process(weather);

    expect(result.answer).toBe('Here is an answer without memory.');
    expect(result.states).toEqual(['init', 'answered']);
    expect(result.degraded).toEqual([
      { capability: 'memory', reason: 'Access denied (memory): git clone: fatal: Authentication failed' },
    ]);
    expect(provider.requests.map(roleOf)).toEqual(['answer']);
  });

  it('fails and sends an error report when the answer cannot be generated', async () => {
    const channel = new RecordingChannel();
    const provider = new FakeProvider(model({
      answer: () => {
        throw new LLMProviderError('deepseek', 'HTTP 503');
      },
    }));

    await expect(orchestrator({ provider, channel }).process(weather)).rejects.toThrow('LLM provider deepseek failed: HTTP 503');
    expect(channel.sent).toHaveLength(1);
    expect(channel.sent[0]?.title).toBe('Error');
    expect(channel.sent[0]?.text).toContain('Error: LLM provider deepseek failed: HTTP 503');
  });

  it('does not send an error report when disabled', async () => {
    const channel = new RecordingChannel();
    const config = stewardConfigSchema.parse({ delivery: { sendErrorReport: false } });
    const provider = new FakeProvider(model({
      answer: () => {
        throw new LLMProviderError('deepseek', 'HTTP 503');
      },
    }));

    await expect(orchestrator({ provider, channel, config }).process(weather)).rejects.toBeInstanceOf(LLMProviderError);
    expect(channel.sent).toEqual([]);
  });

  it('fails on an empty answer', async () => {
    const provider = new FakeProvider(model({ answer: answer('   ') }));
    await expect(orchestrator({ provider }).process(weather)).rejects.toThrow('LLM provider openai failed: returned no content');
  });
});

describe('Orchestrator tools', () => {
  it('feeds tool results back to the model', async () => {
    const tools = new ToolRegistry();
    tools.register(echoTool);
    const provider = new FakeProvider(model({
      answer: toolCallOnce({ toolCalls: [{ id: 'call_1', name: 'echo', arguments: { message: 'hi' } }] }, 'The tool said hi.'),
    }));

    const result = await orchestrator({ provider, tools }).process(weather);

    expect(result.answer).toBe('The tool said hi.');
    expect(result.states).toEqual(['init', 'tools_executed', 'answered']);
    expect(result.toolCalls.map(c => [c.toolName, c.success])).toEqual([['echo', true]]);
    expect(provider.requests[0]?.tools?.map(t => t.name)).toEqual(['echo']);
    const followUp = provider.requests[1]?.messages ?? [];
    expect(followUp[1]).toEqual({
      role: 'assistant',
      content: '',
      toolCalls: [{ id: 'call_1', name: 'echo', arguments: { message: 'hi' } }],
    });
    expect(followUp[2]).toEqual({ role: 'tool', toolCallId: 'call_1', content: '{"echoed":"hi"}' });
  });

  it('reports unknown tools back to the model as failures', async () => {
    const tools = new ToolRegistry();
    tools.register(echoTool);
    const provider = new FakeProvider(model({
      answer: toolCallOnce({ toolCalls: [{ id: 'call_9', name: 'nope', arguments: {} }] }, 'No such tool.'),
    }));

    const result = await orchestrator({ provider, tools }).process(weather);

    expect(result.answer).toBe('No such tool.');
    expect(result.toolCalls).toEqual([{ toolName: 'nope', success: false, error: 'Tool not found: nope', durationMs: 0 }]);
    expect(provider.requests[1]?.messages[2]).toEqual({
      role: 'tool',
      toolCallId: 'call_9',
      content: '{"error":"Tool not found: nope"}',
    });
  });

  it('stops offering tools after the round limit', async () => {
    const tools = new ToolRegistry();
    tools.register(echoTool);
    const config = stewardConfigSchema.parse({ llm: { maxToolRounds: 1 } });
    const provider = new FakeProvider(model({
      answer: request => (request.tools
        ? { toolCalls: [{ id: `call_${request.messages.length}`, name: 'echo', arguments: { message: 'again' } }] }
        : 'Giving up on tools.'),
    }));

    const result = await orchestrator({ provider, tools, config }).process(weather);

    expect(result.answer).toBe('Giving up on tools.');
    expect(provider.requests).toHaveLength(2);
    expect(provider.requests[1]?.tools).toBeUndefined();
  });

  it('retries without tools when the provider cannot call them', async () => {
    const tools = new ToolRegistry();
    tools.register(echoTool);
    const provider = new FakeProvider(model({
      answer: request => {
        if (request.tools) throw new ToolsUnsupportedError('gemini');
        return 'Answered without tools.';
      },
    }), 'gemini', false);

    const result = await orchestrator({ provider, tools }).process(weather);

    expect(result.answer).toBe('Answered without tools.');
    expect(provider.requests).toHaveLength(2);
    expect(result.degraded).toContainEqual({ capability: 'github', reason: 'Provider gemini does not support tool calling' });
  });

  it('searches when the planner asks for it', async () => {
    const tools = new ToolRegistry();
    tools.register({
      name: 'web_search',
      description: 'Search the web',
      inputSchema: z.object({ query: z.string() }),
      outputSchema: z.object({
        query: z.string(),
        results: z.array(z.object({ title: z.string(), link: z.string(), snippet: z.string() })),
      }),
      async execute(input: { query: string }) {
        return {
          query: input.query,
          results: [{ title: 'Forecast', link: 'https://weather.example.test/lisbon', snippet: 'Sunny, 18°C' }],
        };
      },
    });
    const provider = new FakeProvider(model({
      planner: () => '{"search_needed": true, "search_query": "weather Lisbon today"}',
      answer: answer('Sunny in Lisbon.'),
    }));

    const result = await orchestrator({ provider, tools }).process(weather);

    expect(result.searchUsed).toBe(true);
    expect(result.searchQuery).toBe('weather Lisbon today');
    const answerRequest = provider.requests.find(r => roleOf(r) === 'answer');
    expect(answerRequest?.tools).toBeUndefined();
    expect(answerRequest?.messages[0]?.content).toContain(
      '## Search Results:\n\n1. **Forecast**\n   Sunny, 18°C\n   Source: https://weather.example.test/lisbon',
    );
  });

  it('answers without results when search fails', async () => {
    const tools = new ToolRegistry();
    tools.register({
      name: 'web_search',
      description: 'Search the web',
      inputSchema: z.object({ query: z.string() }),
      outputSchema: z.object({ query: z.string(), results: z.array(z.unknown()) }),
      async execute(): Promise<{ query: string; results: unknown[] }> {
        throw new AuthenticationError('search', 'HTTP 403 from search.example.test');
      },
    });
    const provider = new FakeProvider(model({
      planner: () => '{"search_needed": true, "search_query": "weather"}',
      answer: answer('Probably sunny.'),
    }));

    const result = await orchestrator({ provider, tools }).process(weather);

    expect(result.answer).toBe('Probably sunny.');
    expect(result.searchUsed).toBe(false);
    expect(result.degraded).toContainEqual({
      capability: 'search',
      reason: 'Access denied (search): HTTP 403 from search.example.test',
    });
  });
});

describe('Orchestrator with a memory repository', () => {
  let root: string;
  let repository: MemoryRepositoryManager;
  let tea: MemoryEntry;
  let hiking: MemoryEntry;

  const question = { question: 'Which tea should I buy?', user: 'alice', timestamp: '2025-03-02T10:00:00Z' };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'steward-orch-'));
    const remote = join(root, 'remote.git');
    await runGit(['init', '--bare', '--quiet', remote], { timeoutMs: TIMEOUT });
    repository = new MemoryRepositoryManager({
      repoUrl: remote,
      localPath: join(root, 'work'),
      memoriesDir: 'memories',
      timeoutMs: TIMEOUT,
      maxNoteLength: 4000,
      author: { name: 'Test Author', email: 'test@localhost' },
      logger: createSilentLogger(),
    });
    await repository.ensureReady();
    tea = repository.createEntry(
      { content: 'User likes green tea', user: 'alice', relatedQuestion: 'drinks' },
      undefined,
      new Date('2025-01-01T00:00:00Z'),
    );
    hiking = repository.createEntry(
      { content: 'User goes hiking on Sundays', user: 'alice', relatedQuestion: 'weekends' },
      undefined,
      new Date('2025-01-02T00:00:00Z'),
    );
    await repository.applyChanges([tea, hiking], []);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function head(): Promise<string> {
    return runGit(['rev-parse', 'HEAD'], { cwd: repository.localPath, timeoutMs: TIMEOUT });
  }

  it('ignores deletions of memories that were not candidates', async () => {
    const before = await head();
    const provider = new FakeProvider(model({
      analyzer: () => '{"relevant": ["m1"], "to_create": [], "to_delete": ["C"]}',
      answer: answer('Try a sencha.'),
    }));

    const result = await orchestrator({ provider, repository }).process(question);

    expect(result.answer).toBe('Try a sencha.');
    expect(result.states).toEqual(['init', 'repository_ready', 'memories_loaded', 'analyzed', 'answered', 'memories_persisted']);
    expect(result.memoriesUsed).toEqual([tea.id]);
    expect(result.memoryChanges).toEqual({ committed: false, created: [], deleted: [] });
    expect(result.degraded).toEqual([]);
    expect(await head()).toBe(before);
    expect(await repository.loadEntries()).toEqual([tea, hiking]);

    const analyzerPrompt = provider.requests.find(r => roleOf(r) === 'analyzer')?.messages[0]?.content ?? '';
    expect(analyzerPrompt).toContain('[m1] (2025-01-01T00:00:00.000Z, user alice) User likes green tea');
    expect(analyzerPrompt).toContain('[m2] (2025-01-02T00:00:00.000Z, user alice) User goes hiking on Sundays');
    const answerPrompt = provider.requests.find(r => roleOf(r) === 'answer')?.messages[0]?.content ?? '';
    expect(answerPrompt).toContain('## Relevant Memories:\n\n1. **interaction_20250101_000000** (from 2025-01-01T00:00:00.000Z)\n   User likes green tea');
    expect(answerPrompt).not.toContain('hiking');
  });

  it('commits new memories and deletions the analyzer proposes', async () => {
    const provider = new FakeProvider(model({
      analyzer: () => '{"relevant": ["m1"], "to_create": [{"content": "Wants to try Japanese teas"}], "to_delete": ["m2"]}',
      answer: answer('Try a sencha.'),
    }));

    const result = await orchestrator({ provider, repository }).process(question);

    expect(result.memoryChanges?.committed).toBe(true);
    expect(result.memoryChanges?.deleted).toEqual([hiking.id]);
    expect(result.memoryChanges?.created).toHaveLength(1);
    const entries = await repository.loadEntries();
    expect(entries.map(e => e.content)).toEqual(['User likes green tea', 'Wants to try Japanese teas']);
    expect(entries[1]?.user).toBe('alice');
    expect(entries[1]?.relatedQuestion).toBe('Which tea should I buy?');
    expect(await runGit(['log', '-1', '--format=%s'], { cwd: repository.localPath, timeoutMs: TIMEOUT }))
      .toBe('Update memories (+1/-1) for alice');
  });

  it('keeps every candidate and changes nothing on malformed analysis', async () => {
    const before = await head();
    const provider = new FakeProvider(model({
      analyzer: () => 'not json at all',
      answer: answer('Try a sencha.'),
    }));

    const result = await orchestrator({ provider, repository }).process(question);

    expect(result.memoriesUsed).toEqual([tea.id, hiking.id]);
    expect(result.memoryChanges).toEqual({ committed: false, created: [], deleted: [] });
    expect(await head()).toBe(before);
  });
});

describe('orchestrator helpers', () => {
  const entry = (id: string): MemoryEntry => ({
    id, content: id, source: 's', timestamp: 't', user: 'u', relatedQuestion: 'q',
  });

  it('merges profile matches after question matches without duplicates', () => {
    const a = entry('a');
    const b = entry('b');
    const c = entry('c');
    expect(mergeCandidates(
      [{ entry: a, score: 0.9 }, { entry: b, score: 0.5 }],
      [{ entry: b, score: 0.4 }, { entry: c, score: 0.3 }],
    )).toEqual([a, b, c]);
  });

  it('describes a single new memory in the commit message', () => {
    const created = { ...entry('x'), content: 'A'.repeat(60) };
    expect(commitMessage([created], [], 'alice')).toBe(`Add memory: ${'A'.repeat(50)}... (user: alice)`);
    expect(commitMessage([created, created], [entry('y')], 'alice')).toBe('Update memories (+2/-1) for alice');
  });

  it('keeps emoji whole when shortening the commit message', () => {
    const created = { ...entry('x'), content: `${'a'.repeat(49)}🍵 with honey` };
    expect(commitMessage([created], [], 'alice')).toBe(`Add memory: ${'a'.repeat(49)}🍵... (user: alice)`);
  });
});
