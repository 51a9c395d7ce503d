// src/agent/tools/webSearchTool.ts
import { z } from 'zod';
import type { SearchBackend } from '@/services/providers/types';
import { defineTool, type AgentTool } from './types';

const schema = z.object({
  query: z.string().trim().min(1),
  numResults: z.number().int().min(1).max(20).optional(),
});

export function createWebSearchTool(search: SearchBackend): AgentTool {
  return defineTool({
    name: 'web_search',
    description:
      'Searches the web with several query variants, keeps English results, removes duplicates and ranks by relevance.',
    schema,
    execute: ({ query, numResults }, { signal }) => search.webSearch(query, numResults ?? 8, signal),
  });
}
