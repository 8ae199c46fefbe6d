import {
  ConfigError,
  maskUrl,
  type DeliveryChannel,
  type StewardConfig,
} from '@steward/shared';
import { createEmbedder, createModelProvider, type ModelProvider } from '@steward/models';
import { createGitHubTool, createWebSearchTool } from '@steward/tools';
import { createDeliveryChannel } from '@steward/channels';
import {
  MemoryAnalyzer,
  MemoryMaintainer,
  MemoryRepositoryManager,
  MemoryStore,
  Orchestrator,
  SearchPlanner,
  ToolRegistry,
  TraceLogger,
  createLogger,
  type Logger,
} from '@steward/core';

export interface StewardRuntime {
  config: StewardConfig;
  logger: Logger;
  provider: ModelProvider;
  repository: MemoryRepositoryManager | null;
  tools: ToolRegistry;
  channel: DeliveryChannel | null;
  orchestrator: Orchestrator;
}

export interface RuntimeOptions {
  logger?: Logger;
}

/**
 * Wires every component from one validated config. Throws ConfigError
 * before anything touches the network when the provider key is missing.
 */
export function createRuntime(config: StewardConfig, options: RuntimeOptions = {}): StewardRuntime {
  const logger = options.logger ?? createLogger(config.logging.level);
  const provider = createModelProvider(config);

  const { embedder, reason } = createEmbedder(config);
  if (embedder) {
    logger.debug({ embedder: embedder.name, model: embedder.model }, 'Embeddings enabled');
  } else if (config.embeddings.provider === 'simple') {
    logger.debug('Using keyword scoring for memories');
  } else {
    logger.warn({ reason }, 'No embedding backend, using keyword scoring for memories');
  }

  const repository = createRepository(config, logger);
  const store = new MemoryStore({ embedder, logger });
  const analyzer = new MemoryAnalyzer(provider, { logger, maxContentLength: config.memory.maxContentLength });

  const tools = new ToolRegistry();
  if (!tools.registerIfPresent(createWebSearchTool(config.search))) {
    logger.debug('Web search disabled: GOOGLE_API_KEY or GOOGLE_CSE_ID not set');
  }
  if (!tools.registerIfPresent(createGitHubTool(config.github))) {
    logger.debug('GitHub tool disabled: GH_TOKEN not set');
  }

  const channel = createDeliveryChannel(config.delivery);

  const orchestrator = new Orchestrator({
    config,
    provider,
    logger,
    repository,
    store,
    analyzer,
    searchPlanner: new SearchPlanner(provider, logger),
    tools,
    channel,
    traceLogger: new TraceLogger(),
  });

  logger.info(
    {
      provider: provider.name,
      model: provider.model,
      memory: repository ? maskUrl(config.memory.repoUrl ?? '') : 'disabled',
      tools: tools.listNames(),
      delivery: channel ? config.delivery.format : 'disabled',
    },
    'Steward ready',
  );

  return { config, logger, provider, repository, tools, channel, orchestrator };
}

function createRepository(config: StewardConfig, logger: Logger): MemoryRepositoryManager | null {
  const { memory } = config;
  if (!memory.repoUrl) return null;
  return new MemoryRepositoryManager({
    repoUrl: memory.repoUrl,
    token: memory.token,
    localPath: memory.localPath,
    memoriesDir: memory.memoriesDir,
    timeoutMs: memory.gitTimeoutMs,
    maxNoteLength: memory.maxNoteLength,
    author: memory.author,
    logger,
  });
}

export function createMaintainer(runtime: StewardRuntime): MemoryMaintainer {
  if (!runtime.repository) {
    throw new ConfigError('MEMORY_REPO_URL is required for memory maintenance');
  }
  return new MemoryMaintainer(runtime.provider, runtime.repository, { logger: runtime.logger });
}
