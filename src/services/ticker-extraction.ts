// src/services/ticker-extraction.ts — shared ticker extraction with a strict format guard
import { TICKER_PATTERN } from '@/agent/tools/stockInfoTool';
import type { ModelRouter } from './model-router';

const EXTRACTION_PROMPT = (query: string) => `Extract the stock ticker symbol from this query: "${query}"
Return ONLY the ticker symbol (e.g., AAPL, TSLA).
If no specific company or ticker is mentioned, return "NONE".`;

/**
 * Normalize a model answer to a ticker, or null.
 * "aapl" and "$AAPL." become "AAPL"; "NONE", sentences and anything
 * longer than five letters are rejected.
 */
export function normalizeTicker(raw: string): string | null {
  const candidate = raw
    .trim()
    .toUpperCase()
    .replace(/^["'`$]+/, '')
    .replace(/["'`.,;:!]+$/, '');
  if (candidate === 'NONE' || !TICKER_PATTERN.test(candidate)) return null;
  return candidate;
}

/** Throws when the generation call fails; returns null when the answer is not a ticker. */
export async function extractTicker(
  router: ModelRouter,
  query: string,
  signal?: AbortSignal,
): Promise<string | null> {
  const raw = await router.run('ticker_extraction', [{ role: 'user', content: EXTRACTION_PROMPT(query) }], signal);
  return normalizeTicker(raw);
}
