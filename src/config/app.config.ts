// src/config/app.config.ts — environment-driven configuration, validated once at startup
import { z } from 'zod';

export const TOOL_NAMES = ['web_search', 'news_search', 'social_media_search', 'get_stock_info'] as const;

const toolList = z
  .string()
  .transform((raw) => raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0))
  .pipe(z.array(z.enum(TOOL_NAMES)));

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  OPENAI_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_SMALL_MODEL: z.string().default('gpt-4o-mini'),
  LLM_MAIN_MODEL: z.string().default('gpt-4.1-mini'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SERPAPI_KEY: z.string().optional(),
  FMP_API_KEY: z.string().optional(),
  FMP_BASE_URL: z.string().url().default('https://financialmodelingprep.com/stable'),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  REDIS_URL: z.string().optional(),
  CACHE_MAX_SIZE: z.coerce.number().int().positive().default(500),
  MAX_CONCURRENT_REQUESTS: z.coerce.number().int().positive().default(5),
  MAX_QUEUE_SIZE: z.coerce.number().int().nonnegative().default(20),
  TOOL_DISCOVERY_ENABLED: flag.default('true'),
  ENABLED_TOOLS: toolList.default(TOOL_NAMES.join(',')),
  CORS_ORIGIN: z.string().default('*'),
});

export type AppEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: AppEnv['NODE_ENV'];
  logLevel: AppEnv['LOG_LEVEL'];
  llm: {
    apiKey?: string;
    baseUrl?: string;
    smallModel: string;
    mainModel: string;
    timeoutMs: number;
  };
  search: {
    serpApiKey?: string;
    timeoutMs: number;
  };
  finance: {
    apiKey?: string;
    baseUrl: string;
  };
  redisUrl?: string;
  cacheMaxSize: number;
  maxConcurrentRequests: number;
  maxQueueSize: number;
  toolDiscoveryEnabled: boolean;
  enabledTools: Array<(typeof TOOL_NAMES)[number]>;
  corsOrigin: string;
}

/**
 * Parse and validate configuration from the environment.
 * Throws a ZodError listing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return Object.freeze({
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    llm: {
      apiKey: parsed.OPENAI_API_KEY,
      baseUrl: parsed.LLM_BASE_URL,
      smallModel: parsed.LLM_SMALL_MODEL,
      mainModel: parsed.LLM_MAIN_MODEL,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
    },
    search: {
      serpApiKey: parsed.SERPAPI_KEY,
      timeoutMs: parsed.SEARCH_TIMEOUT_MS,
    },
    finance: {
      apiKey: parsed.FMP_API_KEY,
      baseUrl: parsed.FMP_BASE_URL,
    },
    redisUrl: parsed.REDIS_URL,
    cacheMaxSize: parsed.CACHE_MAX_SIZE,
    maxConcurrentRequests: parsed.MAX_CONCURRENT_REQUESTS,
    maxQueueSize: parsed.MAX_QUEUE_SIZE,
    toolDiscoveryEnabled: parsed.TOOL_DISCOVERY_ENABLED,
    enabledTools: parsed.ENABLED_TOOLS,
    corsOrigin: parsed.CORS_ORIGIN,
  });
}
