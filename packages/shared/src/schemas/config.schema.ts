import { z } from 'zod';
import {
  DEFAULT_DEEPSEEK_BASE_URL,
  DEFAULT_GEMINI_EMBEDDING_MODEL,
  DEFAULT_GITHUB_API_URL,
  DEFAULT_MEMORY_REPO_PATH,
  DEFAULT_MODELS,
  DEFAULT_OPENAI_EMBEDDING_MODEL,
  DEFAULT_SEARCH_ENDPOINT,
  MEMORIES_DIR,
} from '../constants.js';

export const llmProviderNameSchema = z.enum(['openai', 'deepseek', 'gemini']);
export const embeddingProviderNameSchema = z.enum(['auto', 'openai', 'gemini', 'simple']);

export const llmConfigSchema = z.object({
  provider: llmProviderNameSchema.default('deepseek'),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().positive().default(10_000),
  timeoutMs: z.number().int().positive().default(60_000),
  maxToolRounds: z.number().int().min(0).max(20).default(5),
});

export const providersConfigSchema = z.object({
  openai: z.object({
    apiKey: z.string().min(1).optional(),
    model: z.string().default(DEFAULT_MODELS.openai),
    baseUrl: z.string().url().optional(),
  }).default({}),
  deepseek: z.object({
    apiKey: z.string().min(1).optional(),
    model: z.string().default(DEFAULT_MODELS.deepseek),
    baseUrl: z.string().url().default(DEFAULT_DEEPSEEK_BASE_URL),
  }).default({}),
  gemini: z.object({
    apiKey: z.string().min(1).optional(),
    model: z.string().default(DEFAULT_MODELS.gemini),
  }).default({}),
});

export const embeddingsConfigSchema = z.object({
  provider: embeddingProviderNameSchema.default('auto'),
  openaiModel: z.string().default(DEFAULT_OPENAI_EMBEDDING_MODEL),
  geminiModel: z.string().default(DEFAULT_GEMINI_EMBEDDING_MODEL),
  timeoutMs: z.number().int().positive().default(20_000),
});

export const memoryConfigSchema = z.object({
  repoUrl: z.string().min(1).optional(),
  token: z.string().min(1).optional(),
  localPath: z.string().default(DEFAULT_MEMORY_REPO_PATH),
  memoriesDir: z.string().default(MEMORIES_DIR),
  candidateLimit: z.number().int().min(0).default(5),
  profileLimit: z.number().int().min(0).default(3),
  maxContentLength: z.number().int().positive().default(1000),
  maxNoteLength: z.number().int().positive().default(4000),
  gitTimeoutMs: z.number().int().positive().default(30_000),
  author: z.object({
    name: z.string().default('Steward Assistant'),
    email: z.string().default('steward@localhost'),
  }).default({}),
});

export const searchConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  engineId: z.string().min(1).optional(),
  endpoint: z.string().url().default(DEFAULT_SEARCH_ENDPOINT),
  maxResults: z.number().int().min(1).max(10).default(5),
  timeoutMs: z.number().int().positive().default(10_000),
});

export const githubConfigSchema = z.object({
  token: z.string().min(1).optional(),
  apiUrl: z.string().url().default(DEFAULT_GITHUB_API_URL),
  timeoutMs: z.number().int().positive().default(15_000),
});

export const deliveryConfigSchema = z.object({
  webhookUrl: z.string().url().optional(),
  format: z.enum(['feishu', 'json']).default('feishu'),
  secret: z.string().min(1).optional(),
  title: z.string().default('Personal Assistant Response'),
  timeoutMs: z.number().int().positive().default(10_000),
  sendErrorReport: z.boolean().default(true),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  traceOutput: z.enum(['memory', 'file']).default('memory'),
  traceDir: z.string().default('.steward/traces'),
});

export const stewardConfigSchema = z.object({
  llm: llmConfigSchema.default({}),
  providers: providersConfigSchema.default({}),
  embeddings: embeddingsConfigSchema.default({}),
  memory: memoryConfigSchema.default({}),
  search: searchConfigSchema.default({}),
  github: githubConfigSchema.default({}),
  delivery: deliveryConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
