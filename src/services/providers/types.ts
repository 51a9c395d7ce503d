// src/services/providers/types.ts — external data backends the tools call through
import type { SearchItem, SocialPlatform, StockQuoteResult } from '@/types/core';

export interface SearchBackend {
  webSearch(query: string, numResults: number, signal?: AbortSignal): Promise<SearchItem[]>;
  newsSearch(query: string, numResults: number, signal?: AbortSignal): Promise<SearchItem[]>;
  socialMediaSearch(query: string, platform: SocialPlatform, signal?: AbortSignal): Promise<SearchItem[]>;
}

export interface FinanceBackend {
  getStockInfo(ticker: string, signal?: AbortSignal): Promise<StockQuoteResult>;
}
