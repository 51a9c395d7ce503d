// src/agent/tools/registry.ts — static catalog of callable tools, selected by configuration
import { logger } from '@/services/logger';
import type { FinanceBackend, SearchBackend } from '@/services/providers/types';
import type { ToolName } from '@/types/core';
import { createNewsSearchTool } from './newsSearchTool';
import { createSocialMediaSearchTool } from './socialMediaSearchTool';
import { createStockInfoTool } from './stockInfoTool';
import type { AgentTool } from './types';
import { createWebSearchTool } from './webSearchTool';

export class ToolRegistry {
  private readonly tools = new Map<ToolName, AgentTool>();

  register(tool: AgentTool): void {
    this.tools.set(tool.name, tool);
    logger.debug('tools:registered', { name: tool.name });
  }

  get(name: ToolName): AgentTool | undefined {
    return this.tools.get(name);
  }

  has(name: ToolName): boolean {
    return this.tools.has(name);
  }

  names(): ToolName[] {
    return Array.from(this.tools.keys());
  }

  /** One "- name: description" line per tool, for prompts. */
  describe(): string {
    return Array.from(this.tools.values())
      .map((t) => `- ${t.name}: ${t.description}`)
      .join('\n');
  }
}

export interface ToolBackends {
  search: SearchBackend;
  finance: FinanceBackend;
}

export function createToolRegistry(backends: ToolBackends, enabled: readonly ToolName[]): ToolRegistry {
  const factories: Record<ToolName, () => AgentTool> = {
    web_search: () => createWebSearchTool(backends.search),
    news_search: () => createNewsSearchTool(backends.search),
    social_media_search: () => createSocialMediaSearchTool(backends.search),
    get_stock_info: () => createStockInfoTool(backends.finance),
  };

  const registry = new ToolRegistry();
  for (const name of enabled) registry.register(factories[name]());
  return registry;
}
