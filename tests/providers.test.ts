import { describe, it, expect } from 'vitest';
import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { FmpFinanceBackend, toStockQuote } from '@/services/providers/finance/fmp-quote';
import { SerpApiSearchBackend } from '@/services/providers/web/serp-search';

interface Recorded {
  url: string | undefined;
  params: Record<string, unknown>;
}

/** axios instance answered in-process by `respond`. */
function stubHttp(respond: (params: Record<string, unknown>) => unknown): { http: AxiosInstance; requests: Recorded[] } {
  const requests: Recorded[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const params: Record<string, unknown> = config.params ?? {};
      requests.push({ url: config.url, params });
      return { data: respond(params), status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { http, requests };
}

const serpConfig = { apiKey: 'test-secret', timeoutMs: 1000 };

describe('SerpApiSearchBackend', () => {
  it('merges variants, filters non-English hits and ranks by relevance', async () => {
    const { http, requests } = stubHttp(() => ({
      organic_results: [
        { title: 'Intro to ownership', link: 'https://a.dev/own', snippet: 'Moves and copies' },
        { title: 'Rust lifetimes explained', link: 'https://b.dev/lt', snippet: 'How borrows are tracked' },
        { title: '生命周期', link: 'https://c.example/lt', snippet: '中文教程' },
      ],
    }));
    const results = await new SerpApiSearchBackend(serpConfig, http).webSearch('rust lifetimes', 8);

    expect(results).toEqual([
      {
        title: 'Rust lifetimes explained',
        snippet: 'How borrows are tracked',
        url: 'https://b.dev/lt',
        queryUsed: 'rust lifetimes',
      },
      { title: 'Intro to ownership', snippet: 'Moves and copies', url: 'https://a.dev/own', queryUsed: 'rust lifetimes' },
    ]);
    expect(requests).toHaveLength(3);
    expect(requests[0]).toEqual({
      url: '/search.json',
      params: { engine: 'google', q: 'rust lifetimes', num: 8, api_key: 'test-secret', hl: 'en', gl: 'us' },
    });
  });

  it('returns an error item without an api key', async () => {
    const { http, requests } = stubHttp(() => ({}));
    const results = await new SerpApiSearchBackend({ timeoutMs: 1000 }, http).webSearch('rust', 8);
    expect(results).toEqual([{ error: 'SERPAPI_KEY is not configured' }]);
    expect(requests).toEqual([]);
  });

  it('shortens news snippets and reads nested publishers', async () => {
    const { http } = stubHttp(() => ({
      news_results: [
        { title: 'Chip shortage', link: 'https://news.example/1', snippet: 'x'.repeat(250), source: { name: 'Wire' }, date: '1 day ago' },
      ],
    }));
    const results = await new SerpApiSearchBackend(serpConfig, http).newsSearch('chips', 5);
    expect(results).toEqual([
      {
        title: 'Chip shortage',
        source: 'Wire',
        date: '1 day ago',
        url: 'https://news.example/1',
        snippet: `${'x'.repeat(200)}...`,
      },
    ]);
  });

  it('reports an empty news result', async () => {
    const { http } = stubHttp(() => ({ news_results: [] }));
    expect(await new SerpApiSearchBackend(serpConfig, http).newsSearch('chips', 5)).toEqual([
      { error: 'No recent news found for this query' },
    ]);
  });

  it('keeps only hits on the requested platform', async () => {
    const { http, requests } = stubHttp(() => ({
      organic_results: [
        { title: 'Top post', link: 'https://www.tiktok.com/@a/video/1', snippet: 's' },
        { title: 'Blog', link: 'https://blog.example.com/records', snippet: 's' },
      ],
    }));
    const results = await new SerpApiSearchBackend(serpConfig, http).socialMediaSearch('top post', 'tiktok');
    expect(requests).toHaveLength(4);
    expect(results).toEqual([
      {
        title: 'Top post',
        snippet: 's',
        url: 'https://www.tiktok.com/@a/video/1',
        platform: 'tiktok',
        searchQuery: 'top post site:tiktok.com',
      },
    ]);
  });
});

describe('FmpFinanceBackend', () => {
  const fmpConfig = { apiKey: 'test-secret', baseUrl: 'https://fmp.invalid', timeoutMs: 1000 };

  it('maps a quote', async () => {
    const { http, requests } = stubHttp(() => [
      { symbol: 'AAPL', name: 'Apple Inc.', price: 190, previousClose: 185, yearHigh: 200, yearLow: 150, exchange: 'NASDAQ' },
    ]);
    const result = await new FmpFinanceBackend(fmpConfig, http).getStockInfo('aapl');
    expect(requests).toEqual([{ url: 'quote', params: { symbol: 'AAPL', apikey: 'test-secret' } }]);
    expect(result).toEqual({
      symbol: 'AAPL',
      longName: 'Apple Inc.',
      currentPrice: 190,
      previousClose: 185,
      open: null,
      dayHigh: null,
      dayLow: null,
      volume: null,
      marketCap: null,
      fiftyTwoWeekHigh: 200,
      fiftyTwoWeekLow: 150,
      exchange: 'NASDAQ',
      priceChange: 5,
      priceChangePercent: 2.7,
    });
  });

  it('reports an unknown symbol', async () => {
    const { http } = stubHttp(() => []);
    expect(await new FmpFinanceBackend(fmpConfig, http).getStockInfo('ZZZZ')).toEqual({
      error: "No valid data found for ticker 'ZZZZ'. Please check the symbol.",
    });
  });

  it('reports a missing api key', async () => {
    const { http } = stubHttp(() => []);
    expect(await new FmpFinanceBackend({ ...fmpConfig, apiKey: undefined }, http).getStockInfo('AAPL')).toEqual({
      error: "Could not fetch data for ticker 'AAPL'. Error: FMP_API_KEY is not configured",
    });
  });

  it('leaves the change empty without a previous close', () => {
    expect(toStockQuote({ symbol: 'X', price: 10 })).toMatchObject({ longName: 'X', priceChange: null, priceChangePercent: null });
  });
});
