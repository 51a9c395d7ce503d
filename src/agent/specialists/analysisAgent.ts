// src/agent/specialists/analysisAgent.ts — quantitative questions, with a live quote when a ticker is named
import { logger } from '@/services/logger';
import type { ModelRouter } from '@/services/model-router';
import type { FinanceBackend } from '@/services/providers/types';
import { extractTicker } from '@/services/ticker-extraction';
import type { StockQuoteResult } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import { containsAny, type SpecialistAgent, type SpecialistContext, type SpecialistPayload } from './types';

const KEYWORDS = ['analyze', 'compare', 'statistics', 'data', 'trends', 'insights', 'stock', 'price', 'financial', 'market'];
const FINANCIAL_KEYWORDS = ['stock', 'price', 'financial', 'market', 'dividend', 'earnings'];

export const ANALYSIS_UNAVAILABLE = 'Analysis temporarily unavailable.';

const insightsPrompt = (query: string) => `Analyze the following query for key analytical insights:
Query: ${query}

Provide a structured analysis covering:
1. Key metrics to consider
2. Comparative analysis approach
3. Trend indicators

Keep it concise and analytical.`;

export class AnalysisAgent implements SpecialistAgent {
  readonly name = 'AnalysisAgent';
  readonly specialization = 'data_analysis';

  constructor(
    private readonly router: ModelRouter,
    private readonly finance: FinanceBackend,
  ) {}

  canHandle(query: string): boolean {
    return containsAny(query, KEYWORDS);
  }

  async process(query: string, context: SpecialistContext): Promise<SpecialistPayload> {
    logger.info('specialist:analysis', { query });

    let ticker: string | null = null;
    if (containsAny(query, FINANCIAL_KEYWORDS)) {
      try {
        ticker = await extractTicker(this.router, query, context.signal);
      } catch (err) {
        logger.warn('specialist:ticker_extraction_failed', { error: errorMessage(err) });
      }
    }

    let financialAnalysis: StockQuoteResult | null = null;
    if (ticker) financialAnalysis = await this.finance.getStockInfo(ticker, context.signal);

    let analyticalInsights: string;
    try {
      analyticalInsights = await this.router.run(
        'analysis',
        [{ role: 'user', content: insightsPrompt(query) }],
        context.signal,
      );
    } catch (err) {
      logger.warn('specialist:insights_failed', { error: errorMessage(err) });
      analyticalInsights = ANALYSIS_UNAVAILABLE;
    }

    return {
      kind: 'analysis',
      agent: this.name,
      financialAnalysis,
      analyticalInsights,
      analysisType: ticker ? 'financial' : 'general',
    };
  }
}
