// src/services/model-router.ts — central routing of generation calls by task type
import type { ChatMessage } from '@/types/core';

export type ModelName = 'small' | 'main';

export type LlmTask =
  | 'classification'
  | 'ticker_extraction'
  | 'tool_analysis'
  | 'casual'
  | 'synthesis'
  | 'confidence'
  | 'analysis'
  | 'creative'
  | 'specialist_synthesis'
  | 'personalization';

export interface CompletionRequest {
  task: LlmTask;
  model: ModelName;
  messages: ChatMessage[];
  temperature: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/** Anything that turns chat messages into text. */
export interface GenerationBackend {
  complete(request: CompletionRequest): Promise<string>;
}

interface TaskProfile {
  model: ModelName;
  temperature: number;
  maxTokens?: number;
}

const TASK_PROFILES: Record<LlmTask, TaskProfile> = {
  classification: { model: 'small', temperature: 0, maxTokens: 20 },
  ticker_extraction: { model: 'small', temperature: 0, maxTokens: 10 },
  tool_analysis: { model: 'small', temperature: 0.3, maxTokens: 400 },
  casual: { model: 'small', temperature: 0.7, maxTokens: 150 },
  synthesis: { model: 'main', temperature: 0.7, maxTokens: 1024 },
  confidence: { model: 'small', temperature: 0, maxTokens: 10 },
  analysis: { model: 'small', temperature: 0.3, maxTokens: 300 },
  creative: { model: 'main', temperature: 0.8, maxTokens: 800 },
  specialist_synthesis: { model: 'main', temperature: 0.7, maxTokens: 1000 },
  personalization: { model: 'main', temperature: 0.7, maxTokens: 1200 },
};

export class ModelRouter {
  constructor(private readonly backend: GenerationBackend) {}

  /** Run a task with its fixed model, temperature and token budget. */
  async run(task: LlmTask, messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const profile = TASK_PROFILES[task];
    const text = await this.backend.complete({
      task,
      model: profile.model,
      messages,
      temperature: profile.temperature,
      maxTokens: profile.maxTokens,
      signal,
    });
    return text.trim();
  }

  /** Shorthand for a system + user exchange. */
  async prompt(task: LlmTask, system: string, user: string, signal?: AbortSignal): Promise<string> {
    return this.run(
      task,
      [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      signal,
    );
  }
}
