import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type StewardConfig,
  CONFIG_FILE_NAMES,
  ConfigError,
  maskSecret,
  maskUrl,
  stewardConfigSchema,
} from '@steward/shared';

type Env = Record<string, string | undefined>;

export interface ConfigLoadOptions {
  configPath?: string;
  env?: Env;
  cwd?: string;
}

/** Environment variables and where they land in the config tree. */
const ENV_MAPPING: Array<{ vars: string[]; path: string[]; kind?: 'number' | 'boolean' }> = [
  { vars: ['LLM_PROVIDER'], path: ['llm', 'provider'] },
  { vars: ['TEMPERATURE'], path: ['llm', 'temperature'], kind: 'number' },
  { vars: ['MAX_TOKENS'], path: ['llm', 'maxTokens'], kind: 'number' },
  { vars: ['LLM_TIMEOUT_MS'], path: ['llm', 'timeoutMs'], kind: 'number' },
  { vars: ['OPENAI_API_KEY'], path: ['providers', 'openai', 'apiKey'] },
  { vars: ['OPENAI_MODEL'], path: ['providers', 'openai', 'model'] },
  { vars: ['OPENAI_BASE_URL'], path: ['providers', 'openai', 'baseUrl'] },
  { vars: ['DEEPSEEK_API_KEY'], path: ['providers', 'deepseek', 'apiKey'] },
  { vars: ['DEEPSEEK_MODEL'], path: ['providers', 'deepseek', 'model'] },
  { vars: ['DEEPSEEK_BASE_URL'], path: ['providers', 'deepseek', 'baseUrl'] },
  { vars: ['GEMINI_API_KEY'], path: ['providers', 'gemini', 'apiKey'] },
  { vars: ['GEMINI_MODEL'], path: ['providers', 'gemini', 'model'] },
  { vars: ['EMBEDDING_PROVIDER'], path: ['embeddings', 'provider'] },
  { vars: ['OPENAI_EMBEDDING_MODEL'], path: ['embeddings', 'openaiModel'] },
  { vars: ['GEMINI_EMBEDDING_MODEL'], path: ['embeddings', 'geminiModel'] },
  { vars: ['MEMORY_REPO_URL'], path: ['memory', 'repoUrl'] },
  { vars: ['MEMORY_REPO_TOKEN'], path: ['memory', 'token'] },
  { vars: ['MEMORY_REPO_PATH'], path: ['memory', 'localPath'] },
  { vars: ['GIT_TIMEOUT_MS'], path: ['memory', 'gitTimeoutMs'], kind: 'number' },
  { vars: ['GOOGLE_API_KEY'], path: ['search', 'apiKey'] },
  { vars: ['GOOGLE_CSE_ID'], path: ['search', 'engineId'] },
  { vars: ['SEARCH_TIMEOUT_MS'], path: ['search', 'timeoutMs'], kind: 'number' },
  { vars: ['GH_TOKEN', 'GITHUB_TOKEN'], path: ['github', 'token'] },
  { vars: ['WEBHOOK_URL', 'FEISHU_WEBHOOK_URL'], path: ['delivery', 'webhookUrl'] },
  { vars: ['WEBHOOK_FORMAT'], path: ['delivery', 'format'] },
  { vars: ['WEBHOOK_SECRET'], path: ['delivery', 'secret'] },
  { vars: ['SEND_ERROR_REPORT'], path: ['delivery', 'sendErrorReport'], kind: 'boolean' },
  { vars: ['LOG_LEVEL'], path: ['logging', 'level'] },
];

export class ConfigManager {
  /** Defaults, then the config file, then environment variables; validated as a whole. */
  async load(options: ConfigLoadOptions = {}): Promise<StewardConfig> {
    let merged: Record<string, unknown> = {};

    const fileConfig = await this.loadConfigFile(options.configPath, options.cwd);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    merged = deepMerge(merged, loadEnvVars(options.env ?? process.env));

    const result = stewardConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    return result.data;
  }

  /** A copy safe to print: keys and tokens masked, credentials stripped from URLs. */
  static describe(config: StewardConfig): StewardConfig {
    return {
      ...config,
      providers: {
        openai: { ...config.providers.openai, apiKey: maskSecret(config.providers.openai.apiKey) },
        deepseek: { ...config.providers.deepseek, apiKey: maskSecret(config.providers.deepseek.apiKey) },
        gemini: { ...config.providers.gemini, apiKey: maskSecret(config.providers.gemini.apiKey) },
      },
      memory: {
        ...config.memory,
        repoUrl: config.memory.repoUrl ? maskUrl(config.memory.repoUrl) : undefined,
        token: maskSecret(config.memory.token),
      },
      search: { ...config.search, apiKey: maskSecret(config.search.apiKey) },
      github: { ...config.github, token: maskSecret(config.github.token) },
      delivery: {
        ...config.delivery,
        webhookUrl: config.delivery.webhookUrl ? maskWebhook(config.delivery.webhookUrl) : undefined,
        secret: maskSecret(config.delivery.secret),
      },
    };
  }

  private async loadConfigFile(configPath?: string, cwd?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      if (!existsSync(configPath)) {
        throw new ConfigError(`config file not found: ${configPath}`);
      }
      return this.parseConfigFile(configPath);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd ?? process.cwd());
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`could not parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }
}

export function loadEnvVars(env: Env): Record<string, unknown> {
  let config: Record<string, unknown> = {};
  for (const { vars, path, kind } of ENV_MAPPING) {
    const name = vars.find(v => env[v] !== undefined && env[v] !== '');
    if (!name) continue;
    const raw = env[name] ?? '';
    config = deepMerge(config, nest(path, coerce(name, raw, kind)));
  }
  return config;
}

function coerce(name: string, raw: string, kind?: 'number' | 'boolean'): unknown {
  if (kind === 'number') {
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new ConfigError(`${name} must be a number, got "${raw}"`);
    }
    return value;
  }
  if (kind === 'boolean') {
    return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
  }
  return raw;
}

function nest(path: string[], value: unknown): Record<string, unknown> {
  return path.reduceRight<Record<string, unknown>>((acc, key, i) => {
    return { [key]: i === path.length - 1 ? value : acc };
  }, {});
}

function maskWebhook(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}/***`;
  } catch {
    return '***';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }
  return result;
}
