// src/agent/tools/stockInfoTool.ts
import { z } from 'zod';
import type { FinanceBackend } from '@/services/providers/types';
import { defineTool, type AgentTool } from './types';

export const TICKER_PATTERN = /^[A-Z]{1,5}$/;

const schema = z.object({
  ticker: z.string().trim().toUpperCase().regex(TICKER_PATTERN, 'ticker must be 1-5 letters'),
});

export function createStockInfoTool(finance: FinanceBackend): AgentTool {
  return defineTool({
    name: 'get_stock_info',
    description: 'Fetches a current quote for a stock ticker: price, previous close, day range, volume and market cap.',
    schema,
    execute: ({ ticker }, { signal }) => finance.getStockInfo(ticker, signal),
  });
}
