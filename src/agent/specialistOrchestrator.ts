// src/agent/specialistOrchestrator.ts — pick a specialist by priority and synthesize its findings
import { logger } from '@/services/logger';
import type { ModelRouter } from '@/services/model-router';
import type { FinanceBackend, SearchBackend } from '@/services/providers/types';
import { formatSourceTitle, quoteSource, stripInlineUrls } from '@/services/synthesis';
import { isErrorItem, type ChatMessage, type SearchItem, type Source, type SourceType } from '@/types/core';
import { SpecialistPathError, errorMessage } from '@/utils/errors';
import { AnalysisAgent } from './specialists/analysisAgent';
import { CreativeAgent } from './specialists/creativeAgent';
import { ResearchAgent } from './specialists/researchAgent';
import type { SpecialistAgent, SpecialistName, SpecialistPayload } from './specialists/types';

const HISTORY_FOR_SYNTHESIS = 10;

export interface SpecialistResult {
  agentName: SpecialistName;
  payload: SpecialistPayload;
  content: string;
  sources: Source[];
}

export type SpecialistOutcome = { kind: 'no_specialist' } | { kind: 'handled'; result: SpecialistResult };

/** Research, then Analysis, then Creative: the first whose predicate matches wins. */
export function createSpecialists(
  router: ModelRouter,
  search: SearchBackend,
  finance: FinanceBackend,
): SpecialistAgent[] {
  return [new ResearchAgent(search), new AnalysisAgent(router, finance), new CreativeAgent(router)];
}

function pushItems(sources: Source[], items: SearchItem[], type: SourceType): void {
  for (const item of items) {
    if (isErrorItem(item) || !item.url) continue;
    const id = sources.length + 1;
    sources.push({
      id,
      title: formatSourceTitle(item.title || item.source || `Source ${id}`),
      url: item.url,
      type,
      platform: item.platform ?? '',
    });
  }
}

export function extractSpecialistSources(payload: SpecialistPayload): Source[] {
  const sources: Source[] = [];
  switch (payload.kind) {
    case 'research':
      pushItems(sources, payload.primaryResults, 'research');
      pushItems(sources, payload.secondaryResults, 'research_secondary');
      break;
    case 'analysis':
      if (payload.financialAnalysis && !isErrorItem(payload.financialAnalysis)) {
        sources.push(quoteSource(1, payload.financialAnalysis.symbol));
      }
      break;
    case 'creative':
      break;
  }
  return sources;
}

export class SpecialistOrchestrator {
  constructor(
    private readonly agents: SpecialistAgent[],
    private readonly router: ModelRouter,
    private readonly now: () => Date = () => new Date(),
  ) {}

  selectAgent(query: string): SpecialistAgent | null {
    return this.agents.find((agent) => agent.canHandle(query)) ?? null;
  }

  /**
   * Returns `no_specialist` when no agent matches.
   * Throws SpecialistPathError when the agent or the synthesis step fails.
   */
  async processWithSpecialist(
    query: string,
    history: ChatMessage[],
    signal?: AbortSignal,
  ): Promise<SpecialistOutcome> {
    const agent = this.selectAgent(query);
    if (!agent) return { kind: 'no_specialist' };

    logger.info('specialist:selected', { agent: agent.name });

    let payload: SpecialistPayload;
    try {
      payload = await agent.process(query, {
        conversationHistory: history,
        timestamp: this.now().toISOString(),
        signal,
      });
    } catch (err) {
      throw new SpecialistPathError(agent.name, `Specialist processing failed: ${errorMessage(err)}`, { cause: err });
    }

    const prompt =
      `A specialist agent (${agent.name}) has processed this query: "${query}"\n\n` +
      `Agent results: ${JSON.stringify(payload, null, 2)}\n\n` +
      'Synthesize this into a comprehensive, well-structured answer that directly addresses the query. Do not include URLs.';

    let content: string;
    try {
      content = await this.router.run(
        'specialist_synthesis',
        [...history.slice(-HISTORY_FOR_SYNTHESIS), { role: 'user', content: prompt }],
        signal,
      );
    } catch (err) {
      throw new SpecialistPathError(agent.name, `Specialist synthesis failed: ${errorMessage(err)}`, { cause: err });
    }

    return {
      kind: 'handled',
      result: {
        agentName: agent.name,
        payload,
        content: stripInlineUrls(content),
        sources: extractSpecialistSources(payload),
      },
    };
  }
}

/** Tool names a specialist actually called, for the response payload. */
export function toolsUsedBy(payload: SpecialistPayload): string[] {
  switch (payload.kind) {
    case 'research':
      return payload.researchStrategy === 'news_focused' ? ['news_search', 'web_search'] : ['web_search'];
    case 'analysis':
      return payload.financialAnalysis ? ['get_stock_info'] : [];
    case 'creative':
      return [];
  }
}
