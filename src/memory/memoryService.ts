// src/memory/memoryService.ts — bridge between the pipeline and the durable memory store
import { logger } from '@/services/logger';
import type { ChatMessage } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import type { MemoryStore } from './MemoryStore';
import type { MemoryMatch } from './types';

const QUERY_PREFIX = 'User query: ';
const RESPONSE_SEPARATOR = '\nAI response: ';

export function formatExchange(query: string, response: string): string {
  return `${QUERY_PREFIX}${query}${RESPONSE_SEPARATOR}${response}`;
}

/** Inverse of formatExchange; null when the document is not an exchange. */
export function parseExchange(document: string): { query: string; response: string } | null {
  const split = document.indexOf(RESPONSE_SEPARATOR);
  if (split === -1) return null;
  const head = document.slice(0, split);
  return {
    query: head.startsWith(QUERY_PREFIX) ? head.slice(QUERY_PREFIX.length) : head,
    response: document.slice(split + RESPONSE_SEPARATOR.length),
  };
}

export class MemoryService {
  constructor(
    private readonly store: MemoryStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async addToMemory(userId: string, query: string, response: string): Promise<void> {
    const timestamp = this.now().toISOString();
    await this.store.add(`${userId}-${timestamp}`, formatExchange(query, response), { userId, timestamp });
  }

  /** Fire-and-forget write; failures are logged, never thrown. */
  remember(userId: string, query: string, response: string): void {
    this.addToMemory(userId, query, response).catch((err: unknown) => {
      logger.warn('memory:write_failed', { userId, error: errorMessage(err) });
    });
  }

  async searchMemory(userId: string, text: string, limit = 5): Promise<MemoryMatch[]> {
    return this.store.query(userId, text, limit);
  }

  /** Last `limit` exchanges as alternating user/assistant messages, oldest first. */
  async getRecentHistory(userId: string, limit = 10): Promise<ChatMessage[]> {
    const docs = await this.store.get(userId);
    const recent = [...docs]
      .sort((a, b) => a.metadata.timestamp.localeCompare(b.metadata.timestamp))
      .slice(-limit);

    const messages: ChatMessage[] = [];
    for (const doc of recent) {
      const exchange = parseExchange(doc.document);
      if (!exchange) continue;
      messages.push({ role: 'user', content: exchange.query });
      messages.push({ role: 'assistant', content: exchange.response });
    }
    return messages;
  }

  async forget(userId: string): Promise<void> {
    await this.store.delete(userId);
  }
}
