import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LLMProviderError, type ModelRequest } from '@steward/shared';
import { MemoryRepositoryManager } from '../src/memory/repository-manager.js';
import { MemoryMaintainer } from '../src/memory/memory-maintainer.js';
import { runGit } from '../src/memory/git.js';
import { createSilentLogger } from '../src/logger.js';
import { FakeProvider, type FakeHandler } from './helpers.js';

const TIMEOUT = 20_000;
const NOW = new Date('2025-04-01T12:00:00Z');

function promptOf(request: ModelRequest): string {
  return request.messages.map(m => m.content).join('\n');
}

/** Casual memories mention a hike or a film; everything else is an instruction. */
function maintenanceModel(overrides: { extract?: string; integrate?: string; categorize?: Error; extractError?: Error } = {}): FakeHandler {
  return request => {
    const prompt = promptOf(request);
    if (prompt.startsWith('Classify this memory.')) {
      if (overrides.categorize) throw overrides.categorize;
      return JSON.stringify({ category: /hike|film/.test(prompt) ? 'simple_talk' : 'solid_instruction' });
    }
    if (prompt.startsWith('Extract the durable information')) {
      if (overrides.extractError) throw overrides.extractError;
      return overrides.extract ?? '- Enjoys weekend hikes';
    }
    if (prompt.startsWith('Merge the new information')) {
      return overrides.integrate ?? 'merged profile';
    }
    throw new Error(`unexpected prompt: ${prompt.slice(0, 40)}`);
  };
}

describe('MemoryMaintainer', () => {
  let root: string;
  let repo: MemoryRepositoryManager;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'steward-maintain-'));
    const remote = join(root, 'remote.git');
    await runGit(['init', '--bare', '--quiet', remote], { timeoutMs: TIMEOUT });
    repo = new MemoryRepositoryManager({
      repoUrl: remote,
      localPath: join(root, 'work'),
      memoriesDir: 'memories',
      timeoutMs: TIMEOUT,
      maxNoteLength: 4000,
      author: { name: 'Test Author', email: 'test@localhost' },
      logger: createSilentLogger(),
    });
    await repo.ensureReady();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function seed(...contents: string[]) {
    const entries = contents.map((content, i) =>
      repo.createEntry({ content, user: 'alice', relatedQuestion: 'chat' }, undefined, new Date(Date.UTC(2025, 0, i + 1))),
    );
    await repo.applyChanges(entries, []);
    return entries;
  }

  function maintainer(handler: FakeHandler): MemoryMaintainer {
    return new MemoryMaintainer(new FakeProvider(handler), repo, { logger: createSilentLogger(), now: () => NOW });
  }

  it('skips an empty repository', async () => {
    const report = await maintainer(maintenanceModel()).run();
    expect(report).toEqual({
      totalMemories: 0,
      solidInstructions: 0,
      simpleTalks: 0,
      integrated: false,
      deleted: [],
      committed: false,
      skippedReason: 'no memories to maintain',
    });
  });

  it('integrates simple talk into the dynamic memory and deletes it', async () => {
    const [rule, hike] = await seed('Always answer in English', 'Talked about the weekend hike');

    const report = await maintainer(maintenanceModel()).run();

    expect(report).toEqual({
      totalMemories: 2,
      solidInstructions: 1,
      simpleTalks: 1,
      integrated: true,
      deleted: [hike?.id],
      committed: true,
    });
    expect(await repo.loadEntries()).toEqual([rule]);
    expect(await repo.readDynamicMemory()).toEqual({
      version: '1.0',
      created: '2025-04-01T12:00:00.000Z',
      last_updated: '2025-04-01T12:00:00.000Z',
      integrated_info: '- Enjoys weekend hikes',
      source_memories_count: 1,
      update_history: [{ timestamp: '2025-04-01T12:00:00.000Z', memories_processed: 1, new_info_length: 22 }],
    });
  });

  it('merges new information into an existing dynamic memory', async () => {
    await seed('Talked about the weekend hike');
    await maintainer(maintenanceModel()).run();
    await seed('Watched a film about sailing');

    const provider = new FakeProvider(maintenanceModel({ extract: '- Likes sailing films' }));
    const report = await new MemoryMaintainer(provider, repo, { logger: createSilentLogger(), now: () => NOW }).run();

    expect(report.integrated).toBe(true);
    const merge = provider.requests.find(r => promptOf(r).startsWith('Merge the new information'));
    expect(promptOf(merge ?? { messages: [] })).toContain('Existing profile:\n- Enjoys weekend hikes');
    const doc = await repo.readDynamicMemory();
    expect(doc?.integrated_info).toBe('merged profile');
    expect(doc?.source_memories_count).toBe(2);
    expect(doc?.update_history).toHaveLength(2);
    expect(await repo.loadEntries()).toEqual([]);
  });

  it('keeps memories it cannot categorize', async () => {
    const entries = await seed('Talked about the weekend hike');

    const report = await maintainer(maintenanceModel({ categorize: new LLMProviderError('openai', 'HTTP 500') })).run();

    expect(report.solidInstructions).toBe(1);
    expect(report.skippedReason).toBe('no simple talk to integrate');
    expect(await repo.loadEntries()).toEqual(entries);
  });

  it('changes nothing when extraction fails', async () => {
    const entries = await seed('Talked about the weekend hike');

    const report = await maintainer(maintenanceModel({ extractError: new LLMProviderError('openai', 'returned no content') })).run();

    expect(report.committed).toBe(false);
    expect(report.skippedReason).toBe('integration failed: LLM provider openai failed: returned no content');
    expect(await repo.loadEntries()).toEqual(entries);
    expect(await repo.readDynamicMemory()).toBeNull();
  });

  it('deletes simple talk without a document when nothing is worth keeping', async () => {
    await seed('Talked about the weekend hike');

    const report = await maintainer(maintenanceModel({ extract: 'NONE' })).run();

    expect(report.integrated).toBe(false);
    expect(report.committed).toBe(true);
    expect(await repo.loadEntries()).toEqual([]);
    expect(await repo.readDynamicMemory()).toBeNull();
  });
});
