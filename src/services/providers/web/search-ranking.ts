// src/services/providers/web/search-ranking.ts — query variants, language filter and ordering for web hits
import type { SearchHit } from '@/types/core';

const OFFICIAL_DOMAINS = ['instagram.com', 'facebook.com', 'twitter.com', 'linkedin.com'];
const EXCLUDED_SITES = '-site:baidu.com -site:zhihu.com';

/** Up to three query strings: the original first, then topic-specific variants. */
export function enhanceQuery(query: string, year = new Date().getFullYear()): string[] {
  const lower = query.toLowerCase();
  let variants: string[];
  if (lower.includes('most') && (lower.includes('liked') || lower.includes('popular'))) {
    variants = [`${query} site:instagram.com`, `${query} official statistics`];
  } else if (lower.includes('stock') || lower.includes('price')) {
    variants = [`${query} today current`, `${query} real time`];
  } else if (lower.includes('news')) {
    variants = [`${query} latest breaking`, `${query} today ${year}`];
  } else {
    variants = [`${query} ${year}`, `${query} latest information`];
  }
  return [query, ...variants].slice(0, 3);
}

export function socialQueries(query: string, platform: string): string[] {
  return [
    `${query} site:${platform}.com`,
    `${query} ${platform} official statistics`,
    `${query} ${platform} records data`,
    `"${query}" ${platform} ${EXCLUDED_SITES}`,
  ];
}

/** At least 70% of the alphabetic characters in title + snippet are ASCII letters. */
export function isLikelyEnglish(hit: Pick<SearchHit, 'title' | 'snippet'>): boolean {
  const letters = Array.from(`${hit.title} ${hit.snippet}`).filter((c) => /\p{L}/u.test(c));
  if (letters.length === 0) return false;
  const ascii = letters.filter((c) => /[A-Za-z]/.test(c)).length;
  return ascii / letters.length >= 0.7;
}

export function dedupeByUrl<T extends { url: string }>(hits: T[]): T[] {
  const seen = new Set<string>();
  return hits.filter((h) => {
    if (seen.has(h.url)) return false;
    seen.add(h.url);
    return true;
  });
}

export function relevanceScore(hit: SearchHit, query: string, year = new Date().getFullYear()): number {
  let score = 0;
  const title = hit.title.toLowerCase();
  const snippet = hit.snippet.toLowerCase();
  const url = hit.url.toLowerCase();

  if (OFFICIAL_DOMAINS.some((d) => url.includes(d))) score += 10;

  const text = `${title} ${snippet}`;
  if (text.includes(String(year)) || text.includes(String(year - 1))) score += 5;

  const titleWords = new Set(title.split(/\s+/));
  const queryWords = query.toLowerCase().split(/\s+/).filter((w) => w.length > 0);
  if (queryWords.length > 0 && queryWords.every((w) => titleWords.has(w))) score += 8;

  return score;
}

/** Stable sort, highest relevance first. */
export function rankHits(hits: SearchHit[], query: string, year?: number): SearchHit[] {
  return hits
    .map((hit, index) => ({ hit, index, score: relevanceScore(hit, query, year) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((s) => s.hit);
}
