// src/services/providers/finance/fmp-quote.ts — stock quotes from Financial Modeling Prep
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '@/services/logger';
import type { StockQuote, StockQuoteResult } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import type { FinanceBackend } from '../types';

const num = z.number().nullable().optional();

const quoteSchema = z.array(
  z.object({
    symbol: z.string(),
    name: z.string().optional(),
    price: num,
    previousClose: num,
    open: num,
    dayHigh: num,
    dayLow: num,
    volume: num,
    marketCap: num,
    yearHigh: num,
    yearLow: num,
    exchange: z.string().optional(),
  }),
);

type FmpQuote = z.infer<typeof quoteSchema>[number];

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function toStockQuote(raw: FmpQuote): StockQuote {
  const current = raw.price ?? null;
  const previous = raw.previousClose ?? null;
  const change = current !== null && previous ? current - previous : null;
  return {
    symbol: raw.symbol,
    longName: raw.name ?? raw.symbol,
    currentPrice: current,
    previousClose: previous,
    open: raw.open ?? null,
    dayHigh: raw.dayHigh ?? null,
    dayLow: raw.dayLow ?? null,
    volume: raw.volume ?? null,
    marketCap: raw.marketCap ?? null,
    fiftyTwoWeekHigh: raw.yearHigh ?? null,
    fiftyTwoWeekLow: raw.yearLow ?? null,
    exchange: raw.exchange ?? null,
    priceChange: change === null ? null : round2(change),
    priceChangePercent: change === null || !previous ? null : round2((change / previous) * 100),
  };
}

export interface FmpConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
}

export class FmpFinanceBackend implements FinanceBackend {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: FmpConfig,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ baseURL: config.baseUrl, headers: { Accept: 'application/json' } });
  }

  async getStockInfo(ticker: string, signal?: AbortSignal): Promise<StockQuoteResult> {
    const symbol = ticker.trim().toUpperCase();
    logger.info('finance:quote', { symbol });
    try {
      if (!this.config.apiKey) throw new Error('FMP_API_KEY is not configured');
      const response = await this.http.get('quote', {
        params: { symbol, apikey: this.config.apiKey },
        timeout: this.config.timeoutMs,
        signal,
      });
      const quotes = quoteSchema.parse(response.data);
      const first = quotes[0];
      if (!first) {
        return { error: `No valid data found for ticker '${symbol}'. Please check the symbol.` };
      }
      return toStockQuote(first);
    } catch (err) {
      logger.error('finance:quote_failed', { symbol, error: errorMessage(err) });
      return { error: `Could not fetch data for ticker '${symbol}'. Error: ${errorMessage(err)}` };
    }
  }
}
