// src/services/orchestrator.ts — drives one query from cache check to the final response
import { toolsUsedBy, type SpecialistOrchestrator } from '@/agent/specialistOrchestrator';
import type { ToolRegistry } from '@/agent/tools/registry';
import type { ConversationMemory } from '@/memory/conversationMemory';
import type { MemoryService } from '@/memory/memoryService';
import type { UserContext } from '@/memory/types';
import type {
  ChatMessage,
  ProactiveSuggestion,
  ProgressChannel,
  RealTimeData,
  ResponsePayload,
  ResponseRoute,
  Source,
} from '@/types/core';
import { errorMessage } from '@/utils/errors';
import type { AnalyticsRecorder } from './analytics';
import { makeCacheKey, type RequestCache } from './cache';
import type { DataStreamRegistry } from './data-streams';
import { logger } from './logger';
import type { PersonalizationLayer } from './personalization';
import { detectProactiveOpportunities } from './proactive';
import type { QueryPlanner } from './query-planner';
import { SYNTHESIS_FAILURE, type ResponseSynthesizer } from './synthesis';
import type { ToolDiscovery } from './tool-discovery';
import type { ToolExecutionEngine } from './tool-executor';

export const SPECIALIST_TTL_SECONDS = 1800;
export const FALLBACK_TTL_SECONDS = 900;
export const SPECIALIST_CONFIDENCE = 95;

export const DEFAULT_FINANCIAL_STREAM = 'default_financial';
export const DEFAULT_NEWS_STREAM = 'tech_news';
const DEFAULT_SYMBOLS = ['AAPL', 'GOOGL', 'MSFT', 'TSLA', 'NVDA'];
const DEFAULT_KEYWORDS = ['AI', 'technology', 'innovation', 'startup'];

const FINANCIAL_STREAM_WORDS = ['stock', 'price', 'market', 'financial'];
const NEWS_STREAM_WORDS = ['news', 'latest', 'recent', 'current'];

export interface OrchestratorDeps {
  cache: RequestCache<ResponsePayload>;
  memory: ConversationMemory;
  memoryService: MemoryService;
  analytics: AnalyticsRecorder;
  planner: QueryPlanner;
  executor: ToolExecutionEngine;
  tools: ToolRegistry;
  specialists: SpecialistOrchestrator;
  synthesizer: ResponseSynthesizer;
  personalization: PersonalizationLayer;
  discovery: ToolDiscovery;
  streams: DataStreamRegistry;
  options: {
    toolDiscoveryEnabled: boolean;
    bootstrapStreams: boolean;
  };
  now?: () => number;
}

export interface PipelineRequest {
  userId: string;
  text: string;
  history: ChatMessage[];
  signal?: AbortSignal;
}

interface ResolvedAnswer {
  route: ResponseRoute;
  agentUsed: string;
  response: string;
  confidence: number;
  sources: Source[];
  method: string;
  toolsUsed: string[];
  personalizationApplied: boolean;
  proactiveSuggestions: ProactiveSuggestion[];
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function mentions(text: string, words: string[]): boolean {
  const lower = text.toLowerCase();
  return words.some((w) => lower.includes(w));
}

const NEW_USER_CONTEXT: UserContext = {
  isNewUser: true,
  recentTopics: [],
  userPreferences: null,
  conversationFlow: [],
  suggestedApproach: 'standard',
};

export class PipelineDriver {
  private streamsReady: Promise<void> | null = null;
  private streamsInitialized = false;
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? Date.now;
  }

  isStreamsInitialized(): boolean {
    return this.streamsInitialized;
  }

  /**
   * Resolve one query. The channel receives any number of status updates and
   * exactly one final response, which is also the resolved value.
   */
  async run(request: PipelineRequest, channel: ProgressChannel): Promise<ResponsePayload> {
    const started = this.now();
    let emitted = false;
    const emit = (payload: ResponsePayload): ResponsePayload => {
      if (!emitted) {
        emitted = true;
        channel.finalResponse(payload);
      }
      return payload;
    };
    const status = (message: string): void => {
      try {
        channel.statusUpdate(message);
      } catch (err) {
        logger.debug('pipeline:status_failed', { error: errorMessage(err) });
      }
    };

    try {
      return emit(await this.process(request, status, started));
    } catch (err) {
      logger.error('pipeline:unexpected_error', { userId: request.userId, error: errorMessage(err) });
      return emit(this.failurePayload(started));
    }
  }

  private async process(
    request: PipelineRequest,
    status: (message: string) => void,
    started: number,
  ): Promise<ResponsePayload> {
    const { deps } = this;
    const { userId, text, signal } = request;
    const history = request.history.length > 0 ? request.history : await this.rehydrateHistory(userId);

    const cacheKey = makeCacheKey(userId, text);
    const cached = deps.cache.get(cacheKey);
    if (cached) {
      logger.info('pipeline:cache_hit', { userId });
      status('⚡ Found cached response');
      return cached;
    }

    await this.ensureStreams();
    status('🔍 Analyzing your query...');

    const toolGapDetected = await this.detectToolGap(text, status, signal);
    const realTimeData = this.collectStreamData(text, status);

    status('🧠 Loading your personalized context...');
    const userContext = this.loadUserContext(userId, text);
    const suggestions = this.detectSuggestions(userId);

    const answer =
      (await this.trySpecialist(request, history, realTimeData, userContext, suggestions, status)) ??
      (await this.fallback(request, history, realTimeData, status));

    const processingTime = round2((this.now() - started) / 1000);
    const payload: ResponsePayload = {
      response: answer.response,
      confidence: answer.confidence,
      sources: answer.sources,
      processingTime,
      method: answer.method,
      route: answer.route,
      toolsUsed: answer.toolsUsed,
      sourcesFound: answer.sources.length,
      personalizationApplied: answer.personalizationApplied,
      proactiveSuggestions: answer.proactiveSuggestions,
      realTimeData: realTimeData ?? {},
    };

    // Client went away: emit, but keep nothing.
    if (signal?.aborted) {
      logger.info('pipeline:aborted', { userId, route: answer.route });
      return payload;
    }

    const analytics = this.persist(userId, text, payload, answer.agentUsed, toolGapDetected);

    if (payload.response !== SYNTHESIS_FAILURE) {
      try {
        deps.cache.set(
          cacheKey,
          payload,
          answer.route === 'specialist' ? SPECIALIST_TTL_SECONDS : FALLBACK_TTL_SECONDS,
        );
      } catch (err) {
        logger.warn('pipeline:cache_write_failed', { error: errorMessage(err) });
      }
    }

    logger.info('pipeline:complete', { userId, route: answer.route, method: answer.method, processingTime });
    return analytics ? { ...payload, analytics } : payload;
  }

  private async rehydrateHistory(userId: string): Promise<ChatMessage[]> {
    try {
      return await this.deps.memoryService.getRecentHistory(userId, 10);
    } catch (err) {
      logger.warn('pipeline:history_rehydrate_failed', { userId, error: errorMessage(err) });
      return [];
    }
  }

  private ensureStreams(): Promise<void> {
    if (!this.deps.options.bootstrapStreams) return Promise.resolve();
    this.streamsReady ??= this.bootstrapStreams();
    return this.streamsReady;
  }

  private async bootstrapStreams(): Promise<void> {
    try {
      const financial = this.deps.streams.createStream(DEFAULT_FINANCIAL_STREAM, {
        type: 'financial',
        symbols: DEFAULT_SYMBOLS,
      });
      const news = this.deps.streams.createStream(DEFAULT_NEWS_STREAM, {
        type: 'news',
        keywords: DEFAULT_KEYWORDS,
      });
      this.streamsInitialized = financial && news;
      logger.info('pipeline:streams_bootstrapped', { financial, news });
    } catch (err) {
      logger.error('pipeline:streams_bootstrap_failed', { error: errorMessage(err) });
    }
  }

  private async detectToolGap(
    text: string,
    status: (message: string) => void,
    signal?: AbortSignal,
  ): Promise<boolean> {
    if (!this.deps.options.toolDiscoveryEnabled) return false;
    try {
      const analysis = await this.deps.discovery.analyzeToolNeeds(text, this.deps.tools.describe(), signal);
      const gap = this.deps.discovery.recordCapabilityGap(analysis);
      if (!gap) return false;
      status(`🔧 Noted a capability gap: ${gap.name}`);
      return true;
    } catch (err) {
      logger.warn('pipeline:tool_analysis_failed', { error: errorMessage(err) });
      return false;
    }
  }

  private collectStreamData(text: string, status: (message: string) => void): RealTimeData | null {
    const data: RealTimeData = {};
    try {
      if (mentions(text, FINANCIAL_STREAM_WORDS)) {
        const latest = this.deps.streams.getLatestData(DEFAULT_FINANCIAL_STREAM);
        if (latest.data) {
          data.financial = latest;
          status('📈 Using real-time market data');
        }
      }
      if (mentions(text, NEWS_STREAM_WORDS)) {
        const latest = this.deps.streams.getLatestData(DEFAULT_NEWS_STREAM);
        if (latest.data) {
          data.news = latest;
          status('📰 Using real-time news data');
        }
      }
    } catch (err) {
      logger.warn('pipeline:stream_lookup_failed', { error: errorMessage(err) });
    }
    return Object.keys(data).length > 0 ? data : null;
  }

  private loadUserContext(userId: string, text: string): UserContext {
    try {
      return this.deps.memory.getContextForQuery(userId, text);
    } catch (err) {
      logger.warn('pipeline:context_failed', { userId, error: errorMessage(err) });
      return NEW_USER_CONTEXT;
    }
  }

  private detectSuggestions(userId: string): ProactiveSuggestion[] {
    try {
      const recent = this.deps.memory.getRecentTurns(userId, 3).map((t) => t.query);
      return detectProactiveOpportunities(recent);
    } catch (err) {
      logger.warn('pipeline:proactive_failed', { userId, error: errorMessage(err) });
      return [];
    }
  }

  /** Null means "use the fallback": no specialist matched, or the specialist path failed. */
  private async trySpecialist(
    request: PipelineRequest,
    history: ChatMessage[],
    realTimeData: RealTimeData | null,
    userContext: UserContext,
    suggestions: ProactiveSuggestion[],
    status: (message: string) => void,
  ): Promise<ResolvedAnswer | null> {
    const specialistHistory: ChatMessage[] = realTimeData
      ? [...history, { role: 'system', content: `Real-time data available: ${JSON.stringify(realTimeData, null, 2)}` }]
      : history;

    try {
      status('🤖 Engaging specialist agents...');
      const outcome = await this.deps.specialists.processWithSpecialist(
        request.text,
        specialistHistory,
        request.signal,
      );
      if (outcome.kind === 'no_specialist') {
        status('🔄 Switching to standard processing...');
        return null;
      }

      const { result } = outcome;
      status(`✨ Personalizing the ${result.agentName} answer...`);
      const personalized = await this.deps.personalization.personalize(
        request.text,
        result.content,
        userContext,
        suggestions,
        request.signal,
      );

      return {
        route: 'specialist',
        agentUsed: result.agentName,
        response: personalized.response,
        confidence: SPECIALIST_CONFIDENCE,
        sources: result.sources,
        method: `Multi-Agent: ${result.agentName}`,
        toolsUsed: toolsUsedBy(result.payload),
        personalizationApplied: personalized.personalizationApplied,
        proactiveSuggestions: suggestions,
      };
    } catch (err) {
      logger.warn('pipeline:specialist_failed', { userId: request.userId, error: errorMessage(err) });
      status('🔄 Switching to standard processing...');
      return null;
    }
  }

  private async fallback(
    request: PipelineRequest,
    history: ChatMessage[],
    realTimeData: RealTimeData | null,
    status: (message: string) => void,
  ): Promise<ResolvedAnswer> {
    const plan = await this.deps.planner.plan(request.text, request.signal);
    status(`📋 ${plan.log}`);

    const outputs = await this.deps.executor.execute(plan, { onProgress: status, signal: request.signal });

    status('✍️ Synthesizing response...');
    const result = await this.deps.synthesizer.synthesize({
      query: request.text,
      outputs,
      history,
      isCasual: plan.toolCalls.length === 0,
      realTimeData: realTimeData ?? undefined,
      signal: request.signal,
    });

    const toolsUsed = Array.from(outputs.keys());
    let method: string;
    if (plan.category === 'CASUAL') method = 'Casual Chat';
    else if (plan.toolCalls.length === 0) method = 'Direct Answer';
    else method = `Search: ${plan.toolCalls.map((c) => c.name).join(', ')}`;

    return {
      route: 'fallback',
      agentUsed: 'fallback_processing',
      response: result.content,
      confidence: result.confidence,
      sources: result.sources,
      method,
      toolsUsed,
      personalizationApplied: false,
      proactiveSuggestions: [],
    };
  }

  /**
   * Memory turn, durable write and analytics; each step is independent and non-fatal.
   * Returns the analytics snapshot for this response, kept out of the cached payload.
   */
  private persist(
    userId: string,
    text: string,
    payload: ResponsePayload,
    agentUsed: string,
    toolGapDetected: boolean,
  ): ResponsePayload['analytics'] {
    const { deps } = this;
    let complexity = 1;
    try {
      const turn = deps.memory.addConversationTurn(userId, text, payload.response, {
        agentUsed,
        route: payload.route,
        processingTime: payload.processingTime,
        personalizationApplied: payload.personalizationApplied,
        proactiveSuggestionsCount: payload.proactiveSuggestions.length,
        realTimeDataUsed: Object.keys(payload.realTimeData).length > 0,
        toolGapDetected,
      });
      complexity = turn.complexity;
    } catch (err) {
      logger.warn('pipeline:memory_write_failed', { userId, error: errorMessage(err) });
    }

    deps.memoryService.remember(userId, text, payload.response);

    try {
      deps.analytics.track(userId, { agentUsed, processingTime: payload.processingTime, complexity });
      return {
        cachePerformance: deps.cache.stats(),
        userPatterns: deps.analytics.analyze(userId),
      };
    } catch (err) {
      logger.warn('pipeline:analytics_failed', { userId, error: errorMessage(err) });
      return undefined;
    }
  }

  private failurePayload(started: number): ResponsePayload {
    return {
      response: SYNTHESIS_FAILURE,
      confidence: 20,
      sources: [],
      processingTime: round2((this.now() - started) / 1000),
      method: 'Error',
      route: 'fallback',
      toolsUsed: [],
      sourcesFound: 0,
      personalizationApplied: false,
      proactiveSuggestions: [],
      realTimeData: {},
    };
  }
}
