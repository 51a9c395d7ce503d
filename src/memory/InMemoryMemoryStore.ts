// src/memory/InMemoryMemoryStore.ts
import { rankDocuments, type MemoryStore } from './MemoryStore';
import type { MemoryDocument, MemoryMatch, MemoryMetadata } from './types';

const MAX_DOCUMENTS_PER_USER = 500;

/** Process-local durable memory. Lost on restart. */
export class InMemoryMemoryStore implements MemoryStore {
  private readonly docs = new Map<string, MemoryDocument[]>();

  async add(id: string, document: string, metadata: MemoryMetadata): Promise<void> {
    const list = (this.docs.get(metadata.userId) ?? []).filter((d) => d.id !== id);
    list.push({ id, document, metadata });
    if (list.length > MAX_DOCUMENTS_PER_USER) list.splice(0, list.length - MAX_DOCUMENTS_PER_USER);
    this.docs.set(metadata.userId, list);
  }

  async query(userId: string, text: string, limit: number): Promise<MemoryMatch[]> {
    return rankDocuments(this.docs.get(userId) ?? [], text, limit);
  }

  async get(userId: string): Promise<MemoryDocument[]> {
    return [...(this.docs.get(userId) ?? [])];
  }

  async delete(userId: string): Promise<void> {
    this.docs.delete(userId);
  }
}
