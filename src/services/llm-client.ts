// src/services/llm-client.ts — OpenAI-compatible generation backend used by the model router
import OpenAI from 'openai';
import type { AppConfig } from '@/config/app.config';
import { CircuitBreaker } from '@/stability/circuitBreaker';
import { ExternalServiceError, errorMessage } from '@/utils/errors';
import { logger } from './logger';
import type { CompletionRequest, GenerationBackend } from './model-router';

export class OpenAiGenerationBackend implements GenerationBackend {
  private client: OpenAI | null = null;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly config: AppConfig['llm']) {
    // Slightly above the SDK timeout so the SDK's own error wins.
    this.breaker = new CircuitBreaker('llm', { timeout: config.timeoutMs + 1000 });
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.');
      }
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseUrl,
        maxRetries: 1,
      });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const client = this.getClient();
    const modelId = request.model === 'small' ? this.config.smallModel : this.config.mainModel;
    const started = Date.now();

    try {
      const res = await this.breaker.execute(() =>
        client.chat.completions.create(
          {
            model: modelId,
            messages: request.messages,
            temperature: request.temperature,
            max_tokens: request.maxTokens,
          },
          { signal: request.signal, timeout: this.config.timeoutMs },
        ),
        request.signal,
      );
      logger.debug('llm:complete', { task: request.task, model: modelId, ms: Date.now() - started });
      return res.choices[0]?.message?.content ?? '';
    } catch (err) {
      logger.warn('llm:error', { task: request.task, model: modelId, error: errorMessage(err) });
      throw new ExternalServiceError('llm', errorMessage(err), { cause: err });
    }
  }
}
