// src/memory/RedisMemoryStore.ts
import Redis from 'ioredis';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';
import { rankDocuments, type MemoryStore } from './MemoryStore';
import type { MemoryDocument, MemoryMatch, MemoryMetadata } from './types';

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

/**
 * Redis-backed durable memory.
 * One hash per document (memory:doc:<id>) and a sorted set of ids per user
 * (memory:user:<userId>) scored by timestamp.
 */
export class RedisMemoryStore implements MemoryStore {
  private readonly client: Redis;
  private isConnected = false;
  private readonly docPrefix = 'memory:doc:';
  private readonly userPrefix = 'memory:user:';

  /** Takes a URL, or an existing client whose lifecycle the store then owns. */
  constructor(redis: string | Redis, private readonly maxDocumentsPerUser = 500) {
    this.client =
      typeof redis === 'string'
        ? new Redis(redis, {
            retryStrategy: (times) => Math.min(times * 50, 30000),
            maxRetriesPerRequest: 3,
            enableReadyCheck: true,
            lazyConnect: true,
          })
        : redis;

    this.client.on('error', (err: Error) => {
      logger.error('memory:redis_error', { error: err.message });
      this.isConnected = false;
    });
    this.client.on('ready', () => {
      logger.info('memory:redis_ready');
      this.isConnected = true;
    });
    this.client.on('close', () => {
      this.isConnected = false;
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  isAvailable(): boolean {
    return this.isConnected;
  }

  async add(id: string, document: string, metadata: MemoryMetadata): Promise<void> {
    const userKey = this.userPrefix + metadata.userId;
    await this.client
      .multi()
      .hset(this.docPrefix + id, { document, userId: metadata.userId, timestamp: metadata.timestamp })
      .zadd(userKey, Date.parse(metadata.timestamp), id)
      .exec();

    const overflow = (await this.client.zcard(userKey)) - this.maxDocumentsPerUser;
    if (overflow > 0) {
      const stale = await this.client.zrange(userKey, 0, overflow - 1);
      await this.client
        .multi()
        .zrem(userKey, ...stale)
        .del(...stale.map((s) => this.docPrefix + s))
        .exec();
    }
  }

  async query(userId: string, text: string, limit: number): Promise<MemoryMatch[]> {
    return rankDocuments(await this.get(userId), text, limit);
  }

  async get(userId: string): Promise<MemoryDocument[]> {
    const ids = await this.client.zrange(this.userPrefix + userId, 0, -1);
    if (ids.length === 0) return [];

    const batch = this.client.pipeline();
    for (const id of ids) batch.hgetall(this.docPrefix + id);
    const replies = (await batch.exec()) ?? [];

    const docs: MemoryDocument[] = [];
    replies.forEach(([err, fields], i) => {
      const id = ids[i];
      if (err) {
        logger.warn('memory:redis_read_failed', { id, error: err.message });
        return;
      }
      if (id === undefined || !isStringRecord(fields) || !fields.document || !fields.timestamp) return;
      docs.push({
        id,
        document: fields.document,
        metadata: { userId: fields.userId ?? userId, timestamp: fields.timestamp },
      });
    });
    return docs;
  }

  async delete(userId: string): Promise<void> {
    const userKey = this.userPrefix + userId;
    const ids = await this.client.zrange(userKey, 0, -1);
    await this.client
      .multi()
      .del(userKey, ...ids.map((id) => this.docPrefix + id))
      .exec();
  }

  async destroy(): Promise<void> {
    if (!this.isConnected) {
      this.client.disconnect();
      return;
    }
    try {
      await this.client.quit();
    } catch (err) {
      logger.warn('memory:redis_quit_failed', { error: errorMessage(err) });
      this.client.disconnect();
    }
    this.isConnected = false;
  }
}
