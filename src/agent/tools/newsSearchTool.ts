// src/agent/tools/newsSearchTool.ts
import { z } from 'zod';
import type { SearchBackend } from '@/services/providers/types';
import { defineTool, type AgentTool } from './types';

const schema = z.object({
  query: z.string().trim().min(1),
  numResults: z.number().int().min(1).max(20).optional(),
});

export function createNewsSearchTool(search: SearchBackend): AgentTool {
  return defineTool({
    name: 'news_search',
    description: 'Searches recent news articles and returns title, publisher, date, url and a short snippet.',
    schema,
    execute: ({ query, numResults }, { signal }) => search.newsSearch(query, numResults ?? 5, signal),
  });
}
