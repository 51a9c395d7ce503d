// src/agent/specialists/types.ts
import type { ChatMessage, SearchItem, StockQuoteResult } from '@/types/core';

export interface SpecialistContext {
  conversationHistory: ChatMessage[];
  timestamp: string;
  signal?: AbortSignal;
}

export type CreativeContentType = 'story' | 'poetry' | 'article' | 'list' | 'general_creative' | 'error';

export type SpecialistPayload =
  | {
      kind: 'research';
      agent: 'ResearchAgent';
      primaryResults: SearchItem[];
      secondaryResults: SearchItem[];
      researchStrategy: 'news_focused' | 'web_focused';
    }
  | {
      kind: 'analysis';
      agent: 'AnalysisAgent';
      financialAnalysis: StockQuoteResult | null;
      analyticalInsights: string;
      analysisType: 'financial' | 'general';
    }
  | {
      kind: 'creative';
      agent: 'CreativeAgent';
      creativeContent: string;
      contentType: CreativeContentType;
    };

export type SpecialistName = SpecialistPayload['agent'];

export interface SpecialistAgent {
  readonly name: SpecialistName;
  readonly specialization: string;
  canHandle(query: string): boolean;
  process(query: string, context: SpecialistContext): Promise<SpecialistPayload>;
}

export function containsAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((k) => lower.includes(k));
}
