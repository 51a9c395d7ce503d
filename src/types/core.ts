// src/types/core.ts — shared domain types for the query pipeline
import type { PatternAnalysis } from '@/services/analytics';
import type { LatestData } from '@/services/data-streams';

export type QueryCategory =
  | 'CASUAL'
  | 'SOCIAL_MEDIA'
  | 'FINANCIAL'
  | 'NEWS'
  | 'GENERAL_WEB'
  | 'MEMORY';

export interface Query {
  userId: string;
  text: string;
  receivedAt: Date;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ── Tools ───────────────────────────────────────────────────────

export type SocialPlatform = 'twitter' | 'tiktok' | 'facebook' | 'youtube' | 'instagram';

export type ToolCall =
  | { name: 'web_search'; parameters: { query: string; numResults?: number } }
  | { name: 'news_search'; parameters: { query: string; numResults?: number } }
  | { name: 'social_media_search'; parameters: { query: string; platform: SocialPlatform } }
  | { name: 'get_stock_info'; parameters: { ticker: string } };

export type ToolName = ToolCall['name'];

export interface Plan {
  category: QueryCategory;
  toolCalls: ToolCall[];
  log: string;
}

export interface ErrorItem {
  error: string;
}

export interface SearchHit {
  title: string;
  snippet: string;
  url: string;
  /** Publisher name for news hits. */
  source?: string;
  date?: string;
  platform?: string;
  queryUsed?: string;
  searchQuery?: string;
}

export type SearchItem = SearchHit | ErrorItem;

export interface StockQuote {
  symbol: string;
  longName: string;
  currentPrice: number | null;
  previousClose: number | null;
  open: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  volume: number | null;
  marketCap: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
  exchange: string | null;
  priceChange: number | null;
  priceChangePercent: number | null;
}

export type StockQuoteResult = StockQuote | ErrorItem;

export type ToolData = SearchItem[] | StockQuoteResult;

export type ToolResult =
  | { status: 'ok'; data: ToolData }
  | { status: 'error'; error: string };

/** Insertion-ordered: source numbering follows execution order. */
export type ToolOutputs = Map<ToolName, ToolResult>;

export function isErrorItem(value: unknown): value is ErrorItem {
  return typeof value === 'object' && value !== null && 'error' in value;
}

// ── Sources & responses ─────────────────────────────────────────

export type SourceType = 'research' | 'research_secondary' | 'financial' | 'news' | 'social' | 'web';

export interface Source {
  id: number;
  title: string;
  url: string;
  type: SourceType;
  platform: string;
}

export interface ProactiveSuggestion {
  type: 'automation' | 'knowledge_base' | 'monitoring';
  title: string;
  description: string;
  priority: 'low' | 'medium' | 'high';
}

export interface CacheStats {
  hitRate: number;
  totalEntries: number;
  totalRequests: number;
  hits: number;
  misses: number;
}

export type ResponseRoute = 'specialist' | 'fallback';

/** Latest snapshot of each default stream the query touched; empty when none applied. */
export type RealTimeData = Partial<Record<'financial' | 'news', LatestData>>;

export interface ResponsePayload {
  response: string;
  confidence: number;
  sources: Source[];
  /** Seconds, two decimals. */
  processingTime: number;
  method: string;
  route: ResponseRoute;
  toolsUsed: string[];
  sourcesFound: number;
  personalizationApplied: boolean;
  proactiveSuggestions: ProactiveSuggestion[];
  realTimeData: RealTimeData;
  analytics?: {
    cachePerformance: CacheStats;
    userPatterns: PatternAnalysis;
  };
}

/** Push channel for one request; `finalResponse` is called exactly once. */
export interface ProgressChannel {
  statusUpdate(message: string): void;
  finalResponse(payload: ResponsePayload): void;
}
