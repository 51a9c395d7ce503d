// src/services/data-streams.ts — named background pollers with explicit cancellation
import axios from 'axios';
import { createHash } from 'crypto';
import { isErrorItem, type SearchHit } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import { sleep } from '@/utils/sleep';
import { logger } from './logger';
import type { SearchBackend } from './providers/types';

export type StreamType = 'financial' | 'news' | 'web_monitor';

interface IntervalOptions {
  intervalMs?: number;
  errorIntervalMs?: number;
}

export type StreamConfig =
  | ({ type: 'financial'; symbols?: string[] } & IntervalOptions)
  | ({ type: 'news'; keywords?: string[] } & IntervalOptions)
  | ({ type: 'web_monitor'; urls: string[] } & IntervalOptions);

export interface StreamQuote {
  symbol: string;
  price: number;
  change: number;
  changePercent: number;
  volume: number;
  timestamp: string;
}

export interface StreamNewsItem extends SearchHit {
  streamTimestamp: string;
}

export interface PageChange {
  url: string;
  changeDetected: true;
  timestamp: string;
  changeType: 'content_update';
}

export type StreamSnapshot = Record<string, StreamQuote> | StreamNewsItem[] | PageChange[];

export type StreamCallback = (data: StreamSnapshot) => void | Promise<void>;

export interface LatestData {
  data: StreamSnapshot | null;
  lastUpdate: string | null;
  status: 'active' | 'inactive' | 'not_found';
}

/** One poll; null means "nothing new", which keeps the previous snapshot. */
export interface StreamSource {
  poll(signal: AbortSignal): Promise<StreamSnapshot | null>;
}

export const DEFAULT_INTERVALS: Record<StreamType, { intervalMs: number; errorIntervalMs: number }> = {
  financial: { intervalMs: 30_000, errorIntervalMs: 60_000 },
  news: { intervalMs: 300_000, errorIntervalMs: 600_000 },
  web_monitor: { intervalMs: 600_000, errorIntervalMs: 1_200_000 },
};

export interface StreamDeps {
  search: SearchBackend;
  now?: () => Date;
  random?: () => number;
  fetchPage?: (url: string, signal: AbortSignal) => Promise<string>;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Placeholder quotes around 150 with a ±5 move; no market data provider is called. */
export function syntheticQuoteSource(symbols: string[], now: () => Date, random: () => number): StreamSource {
  return {
    async poll() {
      const snapshot: Record<string, StreamQuote> = {};
      for (const symbol of symbols) {
        const price = 150 + (random() * 20 - 10);
        const change = random() * 10 - 5;
        snapshot[symbol] = {
          symbol,
          price: round2(price),
          change: round2(change),
          changePercent: round2((change / price) * 100),
          volume: 1_000_000 + Math.floor(random() * 9_000_000),
          timestamp: now().toISOString(),
        };
      }
      return snapshot;
    },
  };
}

export function newsSource(keywords: string[], search: SearchBackend, now: () => Date): StreamSource {
  return {
    async poll(signal) {
      const seen = new Set<string>();
      const items: StreamNewsItem[] = [];
      for (const keyword of keywords) {
        const results = await search.newsSearch(keyword, 3, signal);
        for (const item of results) {
          if (isErrorItem(item) || seen.has(item.url)) continue;
          seen.add(item.url);
          items.push({ ...item, streamTimestamp: now().toISOString() });
        }
      }
      return items;
    },
  };
}

export function webMonitorSource(
  urls: string[],
  fetchPage: (url: string, signal: AbortSignal) => Promise<string>,
  now: () => Date,
): StreamSource {
  const previous = new Map<string, string>();
  return {
    async poll(signal) {
      const changes: PageChange[] = [];
      for (const url of urls) {
        try {
          const hash = createHash('sha256').update(await fetchPage(url, signal)).digest('hex');
          const before = previous.get(url);
          if (before !== undefined && before !== hash) {
            changes.push({ url, changeDetected: true, timestamp: now().toISOString(), changeType: 'content_update' });
          }
          previous.set(url, hash);
        } catch (err) {
          logger.warn('streams:web_monitor_fetch_failed', { url, error: errorMessage(err) });
        }
      }
      return changes.length > 0 ? changes : null;
    },
  };
}

async function fetchPageText(url: string, signal: AbortSignal): Promise<string> {
  const res = await axios.get<string>(url, { responseType: 'text', timeout: 15_000, signal });
  return res.data;
}

interface ActiveStream {
  type: StreamType;
  createdAt: string;
  controller: AbortController;
  loop: Promise<void>;
}

export class DataStreamRegistry {
  private readonly active = new Map<string, ActiveStream>();
  private readonly latest = new Map<string, { data: StreamSnapshot; lastUpdate: string }>();
  private readonly callbacks = new Map<string, StreamCallback[]>();
  private readonly now: () => Date;
  private readonly random: () => number;
  private readonly fetchPage: (url: string, signal: AbortSignal) => Promise<string>;

  constructor(private readonly deps: StreamDeps) {
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
    this.fetchPage = deps.fetchPage ?? fetchPageText;
  }

  private sourceFor(config: StreamConfig): StreamSource {
    switch (config.type) {
      case 'financial':
        return syntheticQuoteSource(config.symbols ?? ['AAPL', 'GOOGL', 'MSFT'], this.now, this.random);
      case 'news':
        return newsSource(config.keywords ?? ['AI', 'technology'], this.deps.search, this.now);
      case 'web_monitor':
        return webMonitorSource(config.urls, this.fetchPage, this.now);
    }
  }

  /** Start a poller; an existing stream with the same id is stopped first. */
  createStream(streamId: string, config: StreamConfig): boolean {
    try {
      if (this.active.has(streamId)) this.stopStream(streamId);
      const source = this.sourceFor(config);
      const defaults = DEFAULT_INTERVALS[config.type];
      const controller = new AbortController();
      const loop = this.runLoop(
        streamId,
        source,
        controller.signal,
        config.intervalMs ?? defaults.intervalMs,
        config.errorIntervalMs ?? defaults.errorIntervalMs,
      );
      this.active.set(streamId, { type: config.type, createdAt: this.now().toISOString(), controller, loop });
      logger.info('streams:created', { streamId, type: config.type });
      return true;
    } catch (err) {
      logger.error('streams:create_failed', { streamId, error: errorMessage(err) });
      return false;
    }
  }

  stopStream(streamId: string): boolean {
    const stream = this.active.get(streamId);
    if (!stream) return false;
    stream.controller.abort();
    this.active.delete(streamId);
    logger.info('streams:stopped', { streamId });
    return true;
  }

  /** Abort every poller and wait for the loops to exit. */
  async stopAll(): Promise<void> {
    const loops = Array.from(this.active.values()).map((s) => s.loop);
    for (const id of Array.from(this.active.keys())) this.stopStream(id);
    await Promise.all(loops);
  }

  registerCallback(streamId: string, callback: StreamCallback): void {
    const list = this.callbacks.get(streamId) ?? [];
    list.push(callback);
    this.callbacks.set(streamId, list);
  }

  getLatestData(streamId: string): LatestData {
    const latest = this.latest.get(streamId);
    const isActive = this.active.has(streamId);
    if (!latest) {
      return { data: null, lastUpdate: null, status: isActive ? 'active' : 'not_found' };
    }
    return { data: latest.data, lastUpdate: latest.lastUpdate, status: isActive ? 'active' : 'inactive' };
  }

  activeCount(): number {
    return this.active.size;
  }

  listStreams(): Array<{ id: string; type: StreamType; createdAt: string }> {
    return Array.from(this.active.entries()).map(([id, s]) => ({ id, type: s.type, createdAt: s.createdAt }));
  }

  private async runLoop(
    streamId: string,
    source: StreamSource,
    signal: AbortSignal,
    intervalMs: number,
    errorIntervalMs: number,
  ): Promise<void> {
    while (!signal.aborted) {
      let delay = intervalMs;
      try {
        const data = await source.poll(signal);
        if (signal.aborted) break;
        if (data !== null) {
          this.latest.set(streamId, { data, lastUpdate: this.now().toISOString() });
          await this.notify(streamId, data);
        }
      } catch (err) {
        if (signal.aborted) break;
        logger.error('streams:poll_failed', { streamId, error: errorMessage(err) });
        delay = errorIntervalMs;
      }
      await sleep(delay, signal);
    }
  }

  private async notify(streamId: string, data: StreamSnapshot): Promise<void> {
    for (const callback of this.callbacks.get(streamId) ?? []) {
      try {
        await callback(data);
      } catch (err) {
        logger.warn('streams:callback_failed', { streamId, error: errorMessage(err) });
      }
    }
  }
}
