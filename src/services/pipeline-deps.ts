// src/services/pipeline-deps.ts — builds the injected context shared by routes and the pipeline driver
import { createSpecialists, SpecialistOrchestrator } from '@/agent/specialistOrchestrator';
import { createToolRegistry } from '@/agent/tools/registry';
import type { AppConfig } from '@/config/app.config';
import { ChatHistoryStore } from '@/memory/chatHistory';
import { ConversationMemory } from '@/memory/conversationMemory';
import { InMemoryMemoryStore } from '@/memory/InMemoryMemoryStore';
import type { MemoryStore } from '@/memory/MemoryStore';
import { MemoryService } from '@/memory/memoryService';
import { RedisMemoryStore } from '@/memory/RedisMemoryStore';
import { RequestQueue } from '@/stability/requestQueue';
import type { ResponsePayload } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import { AnalyticsRecorder } from './analytics';
import { RequestCache } from './cache';
import { DataStreamRegistry } from './data-streams';
import { OpenAiGenerationBackend } from './llm-client';
import { logger } from './logger';
import { ModelRouter, type GenerationBackend } from './model-router';
import { PipelineDriver, type OrchestratorDeps } from './orchestrator';
import { PersonalizationLayer } from './personalization';
import { FmpFinanceBackend } from './providers/finance/fmp-quote';
import type { FinanceBackend, SearchBackend } from './providers/types';
import { SerpApiSearchBackend } from './providers/web/serp-search';
import { QueryPlanner } from './query-planner';
import { ResponseSynthesizer } from './synthesis';
import { ToolDiscovery } from './tool-discovery';
import { ToolExecutionEngine } from './tool-executor';

export interface PipelineDeps extends OrchestratorDeps {
  driver: PipelineDriver;
  queue: RequestQueue;
  chatHistory: ChatHistoryStore;
  /** Release external resources (pollers, Redis). */
  close(): Promise<void>;
}

export interface BackendOverrides {
  generation?: GenerationBackend;
  search?: SearchBackend;
  finance?: FinanceBackend;
  memoryStore?: MemoryStore;
  bootstrapStreams?: boolean;
}

async function createMemoryStore(config: AppConfig): Promise<{ store: MemoryStore; close: () => Promise<void> }> {
  if (config.redisUrl) {
    const redis = new RedisMemoryStore(config.redisUrl);
    try {
      await redis.connect();
      logger.info('deps:memory_store', { kind: 'redis' });
      return { store: redis, close: () => redis.destroy() };
    } catch (err) {
      logger.warn('deps:redis_unavailable', { error: errorMessage(err) });
      await redis.destroy();
    }
  }
  logger.info('deps:memory_store', { kind: 'in-memory' });
  return { store: new InMemoryMemoryStore(), close: async () => undefined };
}

export async function createPipelineDeps(
  config: AppConfig,
  overrides: BackendOverrides = {},
): Promise<PipelineDeps> {
  const generation = overrides.generation ?? new OpenAiGenerationBackend(config.llm);
  const search = overrides.search ?? new SerpApiSearchBackend(config.search);
  const finance =
    overrides.finance ?? new FmpFinanceBackend({ ...config.finance, timeoutMs: config.search.timeoutMs });

  const memoryStore = overrides.memoryStore
    ? { store: overrides.memoryStore, close: async () => undefined }
    : await createMemoryStore(config);

  const router = new ModelRouter(generation);
  const tools = createToolRegistry({ search, finance }, config.enabledTools);
  const streams = new DataStreamRegistry({ search });

  const orchestratorDeps: OrchestratorDeps = {
    cache: new RequestCache<ResponsePayload>({ maxSize: config.cacheMaxSize }),
    memory: new ConversationMemory(),
    memoryService: new MemoryService(memoryStore.store),
    analytics: new AnalyticsRecorder(),
    planner: new QueryPlanner(router),
    executor: new ToolExecutionEngine(tools),
    tools,
    specialists: new SpecialistOrchestrator(createSpecialists(router, search, finance), router),
    synthesizer: new ResponseSynthesizer(router),
    personalization: new PersonalizationLayer(router),
    discovery: new ToolDiscovery(router),
    streams,
    options: {
      toolDiscoveryEnabled: config.toolDiscoveryEnabled,
      bootstrapStreams: overrides.bootstrapStreams ?? true,
    },
  };

  return {
    ...orchestratorDeps,
    driver: new PipelineDriver(orchestratorDeps),
    queue: new RequestQueue({
      maxConcurrent: config.maxConcurrentRequests,
      maxQueueSize: config.maxQueueSize,
    }),
    chatHistory: new ChatHistoryStore(),
    async close() {
      await streams.stopAll();
      await memoryStore.close();
    },
  };
}
