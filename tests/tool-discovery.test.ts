import { describe, it, expect } from 'vitest';
import { ModelRouter } from '@/services/model-router';
import { ToolDiscovery, normalizeToolName, type ToolNeedAnalysis } from '@/services/tool-discovery';
import { ScriptedGeneration } from './helpers/fakes';

const fixed = () => new Date('2026-05-01T00:00:00.000Z');

function discovery(generation = new ScriptedGeneration()) {
  return new ToolDiscovery(new ModelRouter(generation), fixed);
}

const highGap: ToolNeedAnalysis = {
  needsNewTool: true,
  suggestedToolName: 'Weather Lookup',
  toolDescription: 'Current weather',
  toolCapabilities: ['forecast'],
  priority: 'high',
  reasoning: 'no weather tool',
};

describe('ToolDiscovery.analyzeToolNeeds', () => {
  it('reads fenced json', async () => {
    const generation = new ScriptedGeneration({
      tool_analysis:
        '```json\n{"needs_new_tool": true, "suggested_tool_name": "Weather Lookup", "tool_description": "Current weather", "tool_capabilities": ["forecast"], "priority": "medium", "reasoning": "no weather tool"}\n```',
    });
    expect(await discovery(generation).analyzeToolNeeds('weather?', '- web_search: ...')).toEqual({
      ...highGap,
      priority: 'medium',
    });
  });

  it('reports no gap for unreadable output', async () => {
    const result = await discovery(new ScriptedGeneration({ tool_analysis: 'not json' })).analyzeToolNeeds('q', '');
    expect(result).toEqual({ needsNewTool: false, toolCapabilities: [], priority: 'low', reasoning: 'Analysis failed' });
  });

  it('reports no gap when the call fails', async () => {
    const result = await discovery().analyzeToolNeeds('q', '');
    expect(result.needsNewTool).toBe(false);
  });
});

describe('ToolDiscovery.recordCapabilityGap', () => {
  it('ignores low priority gaps', () => {
    expect(discovery().recordCapabilityGap({ ...highGap, priority: 'low' })).toBeNull();
  });

  it('records and counts repeated gaps', () => {
    const d = discovery();
    expect(d.recordCapabilityGap(highGap)).toEqual({
      name: 'weather_lookup',
      description: 'Current weather',
      capabilities: ['forecast'],
      priority: 'high',
      firstSeen: '2026-05-01T00:00:00.000Z',
      occurrences: 1,
    });
    expect(d.recordCapabilityGap({ ...highGap, suggestedToolName: 'weather lookup' })?.occurrences).toBe(2);
    expect(d.discoveredCount()).toBe(1);
    expect(d.listGaps()).toHaveLength(1);
  });

  it('normalizes names', () => {
    expect(normalizeToolName('  Weather API! ')).toBe('weather_api');
  });
});

describe('ToolDiscovery.getToolSuggestions', () => {
  it('suggests catalog tools for the most discussed topics', () => {
    const suggestions = discovery().getToolSuggestions({
      preferredTopics: { business: 3, technology: 1, general: 5 },
      avgComplexity: 2,
      communicationStyle: 'formal',
      responseLengthPreference: 'medium',
      turnCount: 9,
    });
    expect(suggestions.map((s) => s.tool)).toEqual(['market_tracker', 'code_analyzer']);
    expect(discovery().getToolSuggestions(null)).toEqual([]);
  });
});
