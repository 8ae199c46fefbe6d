import { z } from 'zod';

/** On-disk shape of a memory file. Field names are snake_case to stay readable by other tools. */
export const memoryRecordSchema = z.object({
  content: z.string().min(1),
  source: z.string().min(1),
  timestamp: z.string().min(1),
  user: z.string(),
  related_question: z.string(),
  embedding: z.array(z.number()).optional(),
});

export type MemoryRecord = z.infer<typeof memoryRecordSchema>;

export const dynamicMemorySchema = z.object({
  version: z.string(),
  created: z.string(),
  last_updated: z.string(),
  integrated_info: z.string(),
  source_memories_count: z.number().int().min(0),
  update_history: z.array(z.object({
    timestamp: z.string(),
    memories_processed: z.number().int().min(0),
    new_info_length: z.number().int().min(0),
  })),
});

export type DynamicMemoryDocument = z.infer<typeof dynamicMemorySchema>;
