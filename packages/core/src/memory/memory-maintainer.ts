import { z } from 'zod';
import {
  type DynamicMemoryDocument,
  type MaintenanceReport,
  type MemoryCategory,
  type MemoryEntry,
  DYNAMIC_MEMORY_FILE,
  errorMessage,
  extractJson,
} from '@steward/shared';
import type { ModelProvider } from '@steward/models';
import type { Logger } from '../logger.js';
import type { MemoryRepositoryManager } from './repository-manager.js';

const HISTORY_LIMIT = 10;
const NOTHING_TO_KEEP = 'NONE';

const categorySchema = z.object({
  category: z.enum(['solid_instruction', 'simple_talk']),
});

export interface MemoryMaintainerOptions {
  logger: Logger;
  now?: () => Date;
}

/**
 * Folds casual conversation memories into a single dynamic memory document
 * and deletes them, leaving standing instructions as individual entries.
 */
export class MemoryMaintainer {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly provider: ModelProvider,
    private readonly repository: MemoryRepositoryManager,
    options: MemoryMaintainerOptions,
  ) {
    this.logger = options.logger.child({ component: 'memory-maintainer' });
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<MaintenanceReport> {
    await this.repository.ensureReady();
    const entries = await this.repository.loadEntries();
    const report: MaintenanceReport = {
      totalMemories: entries.length,
      solidInstructions: 0,
      simpleTalks: 0,
      integrated: false,
      deleted: [],
      committed: false,
    };
    if (entries.length === 0) {
      return { ...report, skippedReason: 'no memories to maintain' };
    }

    const simpleTalks: MemoryEntry[] = [];
    for (const entry of entries) {
      if ((await this.categorize(entry)) === 'simple_talk') {
        simpleTalks.push(entry);
      }
    }
    report.simpleTalks = simpleTalks.length;
    report.solidInstructions = entries.length - simpleTalks.length;
    if (simpleTalks.length === 0) {
      return { ...report, skippedReason: 'no simple talk to integrate' };
    }

    let newInfo: string;
    let existing: DynamicMemoryDocument | null;
    let integratedInfo: string | null = null;
    try {
      newInfo = await this.extract(simpleTalks);
      existing = await this.repository.readDynamicMemory();
      if (newInfo !== NOTHING_TO_KEEP) {
        integratedInfo = existing?.integrated_info.trim()
          ? await this.integrate(existing.integrated_info, newInfo)
          : newInfo;
      }
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Integration failed, leaving memories untouched');
      return { ...report, skippedReason: `integration failed: ${errorMessage(err)}` };
    }

    const documents = integratedInfo === null
      ? []
      : [{ path: DYNAMIC_MEMORY_FILE, content: JSON.stringify(this.nextDocument(existing, integratedInfo, simpleTalks.length, newInfo), null, 2) + '\n' }];

    const result = await this.repository.applyChanges([], simpleTalks, {
      message: `Integrate ${simpleTalks.length} conversation memories into dynamic memory`,
      documents,
    });

    this.logger.info({ deleted: result.deleted.length, integrated: documents.length > 0 }, 'Memory maintenance finished');
    return {
      ...report,
      integrated: documents.length > 0,
      deleted: result.deleted,
      committed: result.committed,
    };
  }

  /** Unusable answers count as instructions, so nothing is deleted by mistake. */
  async categorize(entry: MemoryEntry): Promise<MemoryCategory> {
    try {
      const response = await this.provider.generate({
        system: 'You sort the memories of a personal assistant. Respond with JSON only.',
        messages: [{
          role: 'user',
          content: [
            'Classify this memory.',
            '"solid_instruction": a standing instruction, preference, rule or fact the assistant must keep as is.',
            '"simple_talk": casual conversation whose useful details can be summarized elsewhere.',
            '',
            `Memory: ${entry.content}`,
            `Original question: ${entry.relatedQuestion}`,
            '',
            'Respond with {"category": "solid_instruction"} or {"category": "simple_talk"}.',
          ].join('\n'),
        }],
        responseFormat: 'json',
        temperature: 0,
      });
      const parsed = categorySchema.safeParse(extractJson(response.content, 'memory maintainer'));
      if (parsed.success) return parsed.data.category;
      this.logger.warn({ id: entry.id }, 'Unexpected category answer, keeping memory');
    } catch (err) {
      this.logger.warn({ id: entry.id, err: errorMessage(err) }, 'Categorization failed, keeping memory');
    }
    return 'solid_instruction';
  }

  private async extract(memories: MemoryEntry[]): Promise<string> {
    const listing = memories
      .map((m, i) => `${i + 1}. (${m.timestamp}) Q: ${m.relatedQuestion}\n   Memory: ${m.content}`)
      .join('\n');
    const response = await this.provider.generate({
      system: 'You distill what a personal assistant should know about its user.',
      messages: [{
        role: 'user',
        content:
          'Extract the durable information about the user from these conversations as a concise bullet list. ' +
          `If nothing is worth keeping, answer exactly ${NOTHING_TO_KEEP}.\n\n${listing}`,
      }],
      temperature: 0.1,
    });
    return response.content.trim();
  }

  private async integrate(existing: string, newInfo: string): Promise<string> {
    const response = await this.provider.generate({
      system: 'You maintain a concise profile of a personal assistant\'s user.',
      messages: [{
        role: 'user',
        content: [
          'Merge the new information into the existing profile.',
          'Remove duplicates. When they contradict, the new information wins. Answer with the merged profile only.',
          '',
          `Existing profile:\n${existing}`,
          '',
          `New information:\n${newInfo}`,
        ].join('\n'),
      }],
      temperature: 0.1,
    });
    return response.content.trim();
  }

  private nextDocument(
    existing: DynamicMemoryDocument | null,
    integratedInfo: string,
    processed: number,
    newInfo: string,
  ): DynamicMemoryDocument {
    const now = this.now().toISOString();
    return {
      version: '1.0',
      created: existing?.created ?? now,
      last_updated: now,
      integrated_info: integratedInfo,
      source_memories_count: (existing?.source_memories_count ?? 0) + processed,
      update_history: [
        ...(existing?.update_history ?? []),
        { timestamp: now, memories_processed: processed, new_info_length: newInfo.length },
      ].slice(-HISTORY_LIMIT),
    };
  }
}
