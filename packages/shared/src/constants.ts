import type { LLMProviderName } from './types/config.js';

export const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  openai: 'gpt-4o-mini',
  deepseek: 'deepseek-chat',
  gemini: 'gemini-2.5-flash',
};

export const DEFAULT_DEEPSEEK_BASE_URL = 'https://api.deepseek.com/v1';
export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_GEMINI_EMBEDDING_MODEL = 'text-embedding-004';
export const DEFAULT_SEARCH_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';
export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

export const DEFAULT_MEMORY_REPO_PATH = './memory_repo';
export const MEMORIES_DIR = 'memories';
export const DYNAMIC_MEMORY_FILE = 'dynamic_memory.json';
export const NOTE_EXTENSIONS = ['.md', '.txt'];

/** Standing query used to pull general profile facts into every request. */
export const PROFILE_QUERY = 'user profile preferences general information';

export const CONFIG_FILE_NAMES = [
  'steward.config.yaml',
  'steward.config.yml',
  'steward.config.json',
];
