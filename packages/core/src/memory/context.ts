import type { MemoryEntry, MemoryNote } from '@steward/shared';

export function formatMemoryContext(memories: MemoryEntry[], notes: MemoryNote[] = []): string {
  const sections: string[] = [];

  if (memories.length > 0) {
    const lines = memories.map(
      (m, i) => `${i + 1}. **${m.source}** (from ${m.timestamp})\n   ${m.content}`,
    );
    sections.push(`## Relevant Memories:\n\n${lines.join('\n\n')}`);
  }

  if (notes.length > 0) {
    sections.push(`## Notes:\n\n${notes.map(n => `### ${n.path}\n${n.content}`).join('\n\n')}`);
  }

  return sections.join('\n\n');
}
