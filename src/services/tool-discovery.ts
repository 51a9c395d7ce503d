// src/services/tool-discovery.ts — capability-gap detection recorded as telemetry against the static catalog
import { z } from 'zod';
import type { UserProfile } from '@/memory/types';
import { safeParseJson } from '@/utils/safe-parse-json';
import { errorMessage } from '@/utils/errors';
import { logger } from './logger';
import type { ModelRouter } from './model-router';

const analysisSchema = z.object({
  needs_new_tool: z.boolean().default(false),
  suggested_tool_name: z.string().optional(),
  tool_description: z.string().optional(),
  tool_capabilities: z.array(z.string()).default([]),
  priority: z.enum(['high', 'medium', 'low']).default('low'),
  reasoning: z.string().default(''),
});

export interface ToolNeedAnalysis {
  needsNewTool: boolean;
  suggestedToolName?: string;
  toolDescription?: string;
  toolCapabilities: string[];
  priority: 'high' | 'medium' | 'low';
  reasoning: string;
}

export interface CapabilityGap {
  name: string;
  description: string;
  capabilities: string[];
  priority: ToolNeedAnalysis['priority'];
  firstSeen: string;
  occurrences: number;
}

export interface ToolSuggestion {
  topic: string;
  tool: string;
  description: string;
}

const NO_GAP: ToolNeedAnalysis = {
  needsNewTool: false,
  toolCapabilities: [],
  priority: 'low',
  reasoning: 'Analysis failed',
};

const TOPIC_SUGGESTIONS: Partial<Record<string, ToolSuggestion>> = {
  technology: { topic: 'technology', tool: 'code_analyzer', description: 'Analyze code snippets and explain technical concepts' },
  business: { topic: 'business', tool: 'market_tracker', description: 'Track market movements and company fundamentals over time' },
  creative: { topic: 'creative', tool: 'writing_assistant', description: 'Draft, outline and revise longer creative pieces' },
};

export function normalizeToolName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export class ToolDiscovery {
  private readonly gaps = new Map<string, CapabilityGap>();

  constructor(
    private readonly router: ModelRouter,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async analyzeToolNeeds(query: string, availableTools: string, signal?: AbortSignal): Promise<ToolNeedAnalysis> {
    const prompt = `Decide whether the available tools can answer this query.

Query: ${query}

Available tools:
${availableTools}

Reply with JSON only:
{"needs_new_tool": boolean, "suggested_tool_name": string, "tool_description": string,
 "tool_capabilities": string[], "priority": "high" | "medium" | "low", "reasoning": string}`;

    try {
      const raw = await this.router.run('tool_analysis', [{ role: 'user', content: prompt }], signal);
      const parsed = analysisSchema.safeParse(safeParseJson(raw, 'tool_analysis'));
      if (!parsed.success) return NO_GAP;
      const a = parsed.data;
      return {
        needsNewTool: a.needs_new_tool,
        suggestedToolName: a.suggested_tool_name,
        toolDescription: a.tool_description,
        toolCapabilities: a.tool_capabilities,
        priority: a.priority,
        reasoning: a.reasoning,
      };
    } catch (err) {
      logger.warn('discovery:analysis_failed', { error: errorMessage(err) });
      return NO_GAP;
    }
  }

  /**
   * Record a high or medium gap for follow-up. Nothing is generated or executed;
   * returns the stored descriptor, or null when the analysis does not qualify.
   */
  recordCapabilityGap(analysis: ToolNeedAnalysis): CapabilityGap | null {
    if (!analysis.needsNewTool || analysis.priority === 'low' || !analysis.suggestedToolName) return null;
    const name = normalizeToolName(analysis.suggestedToolName);
    if (!name) return null;

    const existing = this.gaps.get(name);
    if (existing) {
      existing.occurrences++;
      return existing;
    }
    const gap: CapabilityGap = {
      name,
      description: analysis.toolDescription ?? '',
      capabilities: analysis.toolCapabilities,
      priority: analysis.priority,
      firstSeen: this.now().toISOString(),
      occurrences: 1,
    };
    this.gaps.set(name, gap);
    logger.info('discovery:capability_gap', { name, priority: gap.priority });
    return gap;
  }

  discoveredCount(): number {
    return this.gaps.size;
  }

  listGaps(): CapabilityGap[] {
    return Array.from(this.gaps.values());
  }

  /** Catalog suggestions for the user's preferred topics, most-discussed first. */
  getToolSuggestions(profile: UserProfile | null): ToolSuggestion[] {
    if (!profile) return [];
    return Object.entries(profile.preferredTopics)
      .sort((a, b) => (b[1] ?? 0) - (a[1] ?? 0))
      .map(([topic]) => TOPIC_SUGGESTIONS[topic])
      .filter((s): s is ToolSuggestion => s !== undefined);
  }
}
