/**
 * Citations in operation thoughts: `<text>[index](file_path:line)`.
 * Each citation counts as one reference to every registered chunk of the
 * file that contains the cited line.
 */

import type { ChunkId } from '@bugtrail/agent-contracts';
import type { CodeContextStore } from '../memory/code-context-store.js';

export interface Citation {
  label: string;
  filePath: string;
  line: number;
}

const CITATION_RE = /\[([^\]\n]*)\]\(([^()\s]+):(\d+)\)/g;

export function extractCitations(thoughts: string): Citation[] {
  const citations: Citation[] = [];
  for (const match of thoughts.matchAll(CITATION_RE)) {
    const line = Number(match[3]);
    const filePath = match[2];
    if (!filePath || line < 1) {continue;}
    citations.push({ label: match[1] ?? '', filePath, line });
  }
  return citations;
}

export function countReferences(store: CodeContextStore, citations: readonly Citation[]): Map<ChunkId, number> {
  const counts = new Map<ChunkId, number>();
  for (const citation of citations) {
    for (const chunk of store.findContaining(citation.filePath, citation.line)) {
      counts.set(chunk.id, (counts.get(chunk.id) ?? 0) + 1);
    }
  }
  return counts;
}
