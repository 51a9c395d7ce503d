// src/services/tool-executor.ts — run a plan's tool calls in order, isolating each failure
import type { ToolRegistry } from '@/agent/tools/registry';
import type { Plan, ToolData, ToolOutputs } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import { logger } from './logger';

export interface ExecuteOptions {
  onProgress?: (message: string) => void;
  signal?: AbortSignal;
}

function describeOutcome(name: string, data: ToolData): string {
  if (Array.isArray(data)) {
    const found = data.filter((item) => !('error' in item)).length;
    return found > 0 ? `✅ ${name} found ${found} results` : `⚠️ ${name} returned limited results`;
  }
  return 'error' in data ? `⚠️ ${name} returned limited results` : `✅ ${name} completed`;
}

export class ToolExecutionEngine {
  constructor(private readonly registry: ToolRegistry) {}

  /** Never throws for a single tool: failures become `{ status: 'error' }` entries. */
  async execute(plan: Plan, options: ExecuteOptions = {}): Promise<ToolOutputs> {
    const outputs: ToolOutputs = new Map();
    const calls = plan.toolCalls.filter((call) => {
      if (this.registry.has(call.name)) return true;
      logger.warn('tools:unknown_tool', { name: call.name });
      return false;
    });

    for (const [index, call] of calls.entries()) {
      const tool = this.registry.get(call.name);
      if (!tool) continue;

      options.onProgress?.(`⚙️ Running ${call.name} (${index + 1}/${calls.length})...`);
      try {
        const data = await tool.run(call.parameters, { signal: options.signal });
        outputs.set(call.name, { status: 'ok', data });
        options.onProgress?.(describeOutcome(call.name, data));
      } catch (err) {
        logger.error('tools:execution_failed', { name: call.name, error: errorMessage(err) });
        outputs.set(call.name, { status: 'error', error: errorMessage(err) });
        options.onProgress?.(`❌ ${call.name} encountered an error`);
      }
    }

    return outputs;
  }
}
