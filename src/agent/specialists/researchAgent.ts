// src/agent/specialists/researchAgent.ts — information gathering through web and news search
import { logger } from '@/services/logger';
import type { SearchBackend } from '@/services/providers/types';
import { containsAny, type SpecialistAgent, type SpecialistContext, type SpecialistPayload } from './types';

const KEYWORDS = [
  'research',
  'find information',
  'tell me about',
  'what is',
  'explain',
  'how does',
  'latest news',
  'recent developments',
];

export class ResearchAgent implements SpecialistAgent {
  readonly name = 'ResearchAgent';
  readonly specialization = 'information_research';

  constructor(private readonly search: SearchBackend) {}

  canHandle(query: string): boolean {
    return containsAny(query, KEYWORDS);
  }

  async process(query: string, context: SpecialistContext): Promise<SpecialistPayload> {
    logger.info('specialist:research', { query });
    if (containsAny(query, ['news', 'recent'])) {
      const primaryResults = await this.search.newsSearch(query, 5, context.signal);
      const secondaryResults = await this.search.webSearch(query, 3, context.signal);
      return { kind: 'research', agent: this.name, primaryResults, secondaryResults, researchStrategy: 'news_focused' };
    }
    const primaryResults = await this.search.webSearch(query, 8, context.signal);
    return { kind: 'research', agent: this.name, primaryResults, secondaryResults: [], researchStrategy: 'web_focused' };
  }
}
