// src/services/query-planner.ts — classify a query and turn the category into tool calls
import type { Plan, QueryCategory, SocialPlatform, ToolCall } from '@/types/core';
import { ClassificationError, errorMessage } from '@/utils/errors';
import { logger } from './logger';
import type { ModelRouter } from './model-router';
import { extractTicker } from './ticker-extraction';

const CLASSIFICATION_PROMPT = `Classify the user's message into exactly one category:

1. CASUAL: greetings, small talk, acknowledgments ("hi", "thanks", "how are you", "ok")
2. SOCIAL_MEDIA: social platforms, their statistics and trends ("most liked post on Instagram", "trending on TikTok")
3. FINANCIAL: stock prices, market data, company financials ("Apple stock price", "TSLA earnings")
4. NEWS: current events and recent developments ("latest news about", "what happened with")
5. GENERAL_WEB: facts, explanations, general information ("what is", "how does", "explain")
6. MEMORY: the conversation itself or the user's preferences ("what did I ask first?", "summarize our chat")

Respond with only the category name: CASUAL, SOCIAL_MEDIA, FINANCIAL, NEWS, GENERAL_WEB, or MEMORY`;

// First match wins when a response names several categories.
const CATEGORY_ORDER: QueryCategory[] = ['CASUAL', 'MEMORY', 'SOCIAL_MEDIA', 'FINANCIAL', 'NEWS'];

const PLATFORM_TABLE: Array<[string[], SocialPlatform]> = [
  [['twitter', 'x.com'], 'twitter'],
  [['tiktok'], 'tiktok'],
  [['facebook'], 'facebook'],
  [['youtube'], 'youtube'],
];

export function parseCategory(raw: string): QueryCategory {
  const upper = raw.toUpperCase();
  return CATEGORY_ORDER.find((c) => upper.includes(c)) ?? 'GENERAL_WEB';
}

export function detectPlatform(query: string): SocialPlatform {
  const lower = query.toLowerCase();
  for (const [needles, platform] of PLATFORM_TABLE) {
    if (needles.some((n) => lower.includes(n))) return platform;
  }
  return 'instagram';
}

function describe(category: QueryCategory, calls: ToolCall[]): string {
  return `Classified as ${category}, using tools: ${calls.map((c) => c.name).join(', ')}`;
}

export class QueryPlanner {
  constructor(private readonly router: ModelRouter) {}

  async plan(query: string, signal?: AbortSignal): Promise<Plan> {
    let category: QueryCategory;
    try {
      const raw = await this.router.prompt('classification', CLASSIFICATION_PROMPT, query, signal);
      if (!raw) throw new ClassificationError('Empty classification response');
      category = parseCategory(raw);
    } catch (err) {
      const log = `Error during classification, defaulting to web search: ${errorMessage(err)}`;
      logger.warn('planner:classification_failed', { error: errorMessage(err) });
      return { category: 'GENERAL_WEB', toolCalls: [{ name: 'web_search', parameters: { query } }], log };
    }

    const plan = await this.planFor(category, query, signal);
    logger.info('planner:plan', { category, tools: plan.toolCalls.map((c) => c.name) });
    return plan;
  }

  private async planFor(category: QueryCategory, query: string, signal?: AbortSignal): Promise<Plan> {
    switch (category) {
      case 'CASUAL':
        return { category, toolCalls: [], log: 'Detected casual conversation - no tools needed' };

      case 'MEMORY':
        return { category, toolCalls: [], log: 'Detected memory query - using conversation context' };

      case 'SOCIAL_MEDIA': {
        const toolCalls: ToolCall[] = [
          { name: 'social_media_search', parameters: { query, platform: detectPlatform(query) } },
          { name: 'web_search', parameters: { query } },
        ];
        return { category, toolCalls, log: describe(category, toolCalls) };
      }

      case 'FINANCIAL': {
        let ticker: string | null = null;
        try {
          ticker = await extractTicker(this.router, query, signal);
        } catch (err) {
          logger.warn('planner:ticker_extraction_failed', { error: errorMessage(err) });
        }
        const toolCalls: ToolCall[] = ticker
          ? [{ name: 'get_stock_info', parameters: { ticker } }]
          : [{ name: 'web_search', parameters: { query } }];
        return { category, toolCalls, log: describe(category, toolCalls) };
      }

      case 'NEWS': {
        const toolCalls: ToolCall[] = [
          { name: 'news_search', parameters: { query } },
          { name: 'web_search', parameters: { query } },
        ];
        return { category, toolCalls, log: describe(category, toolCalls) };
      }

      case 'GENERAL_WEB': {
        const toolCalls: ToolCall[] = [{ name: 'web_search', parameters: { query } }];
        return { category, toolCalls, log: describe(category, toolCalls) };
      }
    }
  }
}
