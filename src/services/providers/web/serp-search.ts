// src/services/providers/web/serp-search.ts — web, news and social search via SerpAPI
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '@/services/logger';
import type { SearchHit, SearchItem, SocialPlatform } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import type { SearchBackend } from '../types';
import { dedupeByUrl, enhanceQuery, isLikelyEnglish, rankHits, socialQueries } from './search-ranking';

const organicSchema = z.object({
  organic_results: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .default([]),
});

const newsSchema = z.object({
  news_results: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
        date: z.string().optional(),
        source: z.union([z.string(), z.object({ name: z.string().optional() })]).optional(),
      }),
    )
    .default([]),
});

const SNIPPET_LIMIT = 200;

export interface SerpApiConfig {
  apiKey?: string;
  timeoutMs: number;
}

export class SerpApiSearchBackend implements SearchBackend {
  constructor(
    private readonly config: SerpApiConfig,
    private readonly http: AxiosInstance = axios.create({ baseURL: 'https://serpapi.com' }),
  ) {}

  private async fetch(params: Record<string, string | number>, signal?: AbortSignal): Promise<unknown> {
    if (!this.config.apiKey) throw new Error('SERPAPI_KEY is not configured');
    const response = await this.http.get('/search.json', {
      params: { ...params, api_key: this.config.apiKey, hl: 'en', gl: 'us' },
      timeout: this.config.timeoutMs,
      signal,
    });
    return response.data;
  }

  private async organic(q: string, num: number, signal?: AbortSignal): Promise<SearchHit[]> {
    const data = organicSchema.parse(await this.fetch({ engine: 'google', q, num }, signal));
    return data.organic_results
      .filter((r) => r.link)
      .map((r) => ({
        title: r.title ?? '',
        snippet: r.snippet ?? '',
        url: r.link ?? '',
        queryUsed: q,
      }));
  }

  async webSearch(query: string, numResults: number, signal?: AbortSignal): Promise<SearchItem[]> {
    logger.info('search:web', { query, numResults });
    const collected: SearchHit[] = [];
    let lastError: string | null = null;

    for (const variant of enhanceQuery(query)) {
      try {
        collected.push(...(await this.organic(variant, numResults, signal)));
      } catch (err) {
        lastError = errorMessage(err);
        logger.warn('search:web_variant_failed', { variant, error: lastError });
        if (signal?.aborted) break;
      }
    }

    const ranked = rankHits(dedupeByUrl(collected.filter(isLikelyEnglish)), query).slice(0, numResults);
    if (ranked.length > 0) return ranked;
    return [{ error: lastError ?? 'No relevant English results found for this query' }];
  }

  async newsSearch(query: string, numResults: number, signal?: AbortSignal): Promise<SearchItem[]> {
    logger.info('search:news', { query, numResults });
    try {
      const data = newsSchema.parse(await this.fetch({ engine: 'google_news', q: query }, signal));
      const hits: SearchHit[] = data.news_results
        .filter((r) => r.link)
        .map((r) => {
          const snippet = r.snippet ?? '';
          return {
            title: r.title ?? '',
            source: typeof r.source === 'string' ? r.source : r.source?.name ?? '',
            date: r.date ?? '',
            url: r.link ?? '',
            snippet: snippet.length > SNIPPET_LIMIT ? `${snippet.slice(0, SNIPPET_LIMIT)}...` : snippet,
          };
        });
      const unique = dedupeByUrl(hits).slice(0, numResults);
      return unique.length > 0 ? unique : [{ error: 'No recent news found for this query' }];
    } catch (err) {
      logger.error('search:news_failed', { query, error: errorMessage(err) });
      return [{ error: errorMessage(err) }];
    }
  }

  async socialMediaSearch(query: string, platform: SocialPlatform, signal?: AbortSignal): Promise<SearchItem[]> {
    logger.info('search:social', { query, platform });
    const collected: SearchHit[] = [];
    for (const q of socialQueries(query, platform)) {
      try {
        const hits = await this.organic(q, 3, signal);
        collected.push(
          ...hits.map((h) => ({ title: h.title, snippet: h.snippet, url: h.url, platform, searchQuery: q })),
        );
      } catch (err) {
        logger.warn('search:social_variant_failed', { q, error: errorMessage(err) });
        if (signal?.aborted) break;
      }
    }

    const onPlatform = dedupeByUrl(collected).filter((h) => h.url.toLowerCase().includes(platform));
    return onPlatform.length > 0
      ? onPlatform.slice(0, 5)
      : [{ error: `No ${platform} specific results found for this query` }];
  }
}
