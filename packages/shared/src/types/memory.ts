export interface MemoryEntry {
  /** Repository-relative path of the file holding the entry. */
  id: string;
  content: string;
  source: string;
  timestamp: string;
  user: string;
  relatedQuestion: string;
  embedding?: number[];
}

export interface MemoryDraft {
  content: string;
  user: string;
  relatedQuestion: string;
}

export interface MemoryNote {
  path: string;
  content: string;
}

export interface ScoredMemory {
  entry: MemoryEntry;
  score: number;
}

export type ScoringStrategy = 'vector' | 'keyword';

export interface MemoryAnalysis {
  relevant: MemoryEntry[];
  toCreate: MemoryDraft[];
  toDelete: MemoryEntry[];
  /** True when the model output could not be used and the safe default was returned. */
  degraded: boolean;
  /** IDs the model referenced that were not among the candidates. */
  discardedIds: string[];
  reasoning?: string;
}

export interface ApplyChangesResult {
  committed: boolean;
  created: string[];
  deleted: string[];
  commit?: string;
}

export type MemoryCategory = 'solid_instruction' | 'simple_talk';

export interface MaintenanceReport {
  totalMemories: number;
  solidInstructions: number;
  simpleTalks: number;
  integrated: boolean;
  deleted: string[];
  committed: boolean;
  skippedReason?: string;
}
