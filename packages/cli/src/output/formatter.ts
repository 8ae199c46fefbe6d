import { ConfigError, CONFIG_FILE_NAMES, errorMessage, type MaintenanceReport } from '@steward/shared';
import type { AssistantResult } from '@steward/core';

export function formatRunSummary(result: AssistantResult): string {
  const lines: string[] = [];
  lines.push('--- Run Summary ---');
  lines.push(`Trace:     ${result.traceId}`);
  lines.push(`States:    ${result.states.join(' -> ')}`);
  lines.push(`Memories:  ${result.memoriesUsed.length} used, ${result.notesUsed.length} notes`);
  if (result.searchUsed) {
    lines.push(`Search:    "${result.searchQuery ?? ''}"`);
  }
  if (result.toolCalls.length > 0) {
    const calls = result.toolCalls.map(c => `${c.toolName}${c.success ? '' : ' (failed)'}`);
    lines.push(`Tools:     ${calls.join(', ')}`);
  }
  if (result.memoryChanges?.committed) {
    const { created, deleted, commit } = result.memoryChanges;
    lines.push(`Persisted: +${created.length}/-${deleted.length}${commit ? ` (${commit.slice(0, 7)})` : ''}`);
  }
  for (const { capability, reason } of result.degraded) {
    lines.push(`[degraded] ${capability}: ${reason}`);
  }
  lines.push(`Delivered: ${result.delivered ? 'yes' : 'no'}`);
  return lines.join('\n');
}

/** Non-zero when a configured webhook should have received the answer and did not. */
export function exitCodeFor(result: AssistantResult, deliveryExpected: boolean): number {
  return deliveryExpected && !result.delivered ? 1 : 0;
}

export function formatMaintenanceReport(report: MaintenanceReport): string {
  const lines: string[] = [];
  lines.push('--- Memory Maintenance ---');
  lines.push(`Memories:           ${report.totalMemories}`);
  lines.push(`Solid instructions: ${report.solidInstructions}`);
  lines.push(`Simple talk:        ${report.simpleTalks}`);
  lines.push(`Integrated:         ${report.integrated ? 'yes' : 'no'}`);
  lines.push(`Deleted:            ${report.deleted.length}`);
  lines.push(`Committed:          ${report.committed ? 'yes' : 'no'}`);
  if (report.skippedReason) {
    lines.push(`Skipped:            ${report.skippedReason}`);
  }
  return lines.join('\n');
}

export function formatError(err: unknown): string {
  const message = `Error: ${errorMessage(err)}`;
  if (err instanceof ConfigError) {
    return `${message}\nRun "steward config path" to see where settings are read from.`;
  }
  return message;
}

export function formatConfigSources(): string {
  const lines: string[] = [];
  lines.push('Config files searched from the working directory upwards (first found wins):');
  CONFIG_FILE_NAMES.forEach((name, i) => lines.push(`  ${i + 1}. ./${name}`));
  lines.push('');
  lines.push('Environment variables (override the config file):');
  for (const name of ENV_VARS) {
    lines.push(`  ${name}`);
  }
  return lines.join('\n');
}

const ENV_VARS = [
  'LLM_PROVIDER',
  'OPENAI_API_KEY, OPENAI_MODEL, OPENAI_BASE_URL',
  'DEEPSEEK_API_KEY, DEEPSEEK_MODEL, DEEPSEEK_BASE_URL',
  'GEMINI_API_KEY, GEMINI_MODEL',
  'TEMPERATURE, MAX_TOKENS, LLM_TIMEOUT_MS',
  'EMBEDDING_PROVIDER, OPENAI_EMBEDDING_MODEL, GEMINI_EMBEDDING_MODEL',
  'MEMORY_REPO_URL, MEMORY_REPO_TOKEN, MEMORY_REPO_PATH, GIT_TIMEOUT_MS',
  'GOOGLE_API_KEY, GOOGLE_CSE_ID, SEARCH_TIMEOUT_MS',
  'GH_TOKEN (or GITHUB_TOKEN)',
  'WEBHOOK_URL (or FEISHU_WEBHOOK_URL), WEBHOOK_FORMAT, WEBHOOK_SECRET, SEND_ERROR_REPORT',
  'LOG_LEVEL',
];
