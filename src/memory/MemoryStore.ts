// src/memory/MemoryStore.ts
import type { MemoryDocument, MemoryMatch, MemoryMetadata } from './types';

/**
 * Durable store for past exchanges.
 * Implementations: InMemoryMemoryStore (default), RedisMemoryStore (REDIS_URL set).
 */
export interface MemoryStore {
  add(id: string, document: string, metadata: MemoryMetadata): Promise<void>;
  /** Best matches for `text` among the user's documents, highest score first. */
  query(userId: string, text: string, limit: number): Promise<MemoryMatch[]>;
  /** Every document stored for the user, in no particular order. */
  get(userId: string): Promise<MemoryDocument[]>;
  delete(userId: string): Promise<void>;
}

function terms(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter((t) => t.length > 2),
  );
}

/** Fraction of query terms present in the document. */
export function termOverlapScore(query: string, document: string): number {
  const q = terms(query);
  if (q.size === 0) return 0;
  const d = terms(document);
  let shared = 0;
  for (const t of q) if (d.has(t)) shared++;
  return shared / q.size;
}

export function rankDocuments(docs: MemoryDocument[], text: string, limit: number): MemoryMatch[] {
  return docs
    .map((doc) => ({ ...doc, score: termOverlapScore(text, doc.document) }))
    .filter((m) => m.score > 0)
    .sort((a, b) => b.score - a.score || b.metadata.timestamp.localeCompare(a.metadata.timestamp))
    .slice(0, limit);
}
