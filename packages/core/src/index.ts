export { ConfigManager, loadEnvVars } from './config-manager.js';
export type { ConfigLoadOptions } from './config-manager.js';
export { createLogger, createSilentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { TraceLogger } from './trace-logger.js';
export { ToolRegistry } from './tool-registry.js';
export { SearchPlanner } from './search-planner.js';
export type { SearchDecision } from './search-planner.js';
export {
  Orchestrator,
  mergeCandidates,
  commitMessage,
  buildUserPrompt,
} from './orchestrator.js';
export type {
  AssistantResult,
  AssistantState,
  Degradation,
  OrchestratorDeps,
  ProcessOptions,
} from './orchestrator.js';
export { runGit, isAuthFailure, redactCredentials } from './memory/git.js';
export type { GitRunner } from './memory/git.js';
export {
  MemoryRepositoryManager,
  authenticatedUrl,
  sameRemote,
  toRecord,
  fromRecord,
} from './memory/repository-manager.js';
export type { MemoryRepositoryOptions, ApplyChangesOptions, RepositoryDocument } from './memory/repository-manager.js';
export { MemoryStore, MemoryIndex } from './memory/memory-store.js';
export type { MemoryStoreOptions } from './memory/memory-store.js';
export { tokenize, overlapScore, cosineSimilarity } from './memory/keyword-index.js';
export { MemoryAnalyzer, buildAnalysisPrompt } from './memory/memory-analyzer.js';
export type { MemoryAnalyzerOptions, AnalyzeOutcome } from './memory/memory-analyzer.js';
export { MemoryMaintainer } from './memory/memory-maintainer.js';
export type { MemoryMaintainerOptions } from './memory/memory-maintainer.js';
export { formatMemoryContext } from './memory/context.js';
