// src/services/proactive.ts — suggests follow-up automations from the shape of recent queries
import type { ProactiveSuggestion } from '@/types/core';

const RESEARCH_MARKERS = ['research', 'find', 'tell me about', 'what is'];
const TIME_MARKERS = ['today', 'latest', 'recent', 'current'];

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter((w) => w.length > 0));
}

export function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const w of a) if (b.has(w)) shared++;
  return shared / (a.size + b.size - shared);
}

function hasRepeatedPattern(queries: string[]): boolean {
  for (let i = 0; i < queries.length - 1; i++) {
    if (jaccard(wordSet(queries[i]), wordSet(queries[i + 1])) > 0.5) return true;
  }
  return false;
}

/**
 * Pure over the last three query texts; at most one suggestion per kind.
 * Fewer than two prior queries yields nothing.
 */
export function detectProactiveOpportunities(recentQueries: string[]): ProactiveSuggestion[] {
  if (recentQueries.length < 2) return [];
  const queries = recentQueries.slice(-3).map((q) => q.toLowerCase());
  const suggestions: ProactiveSuggestion[] = [];

  if (hasRepeatedPattern(queries)) {
    suggestions.push({
      type: 'automation',
      title: 'Create Automated Workflow',
      description: "I notice you're asking similar questions. Would you like me to create an automated workflow?",
      priority: 'medium',
    });
  }

  const researchCount = queries.filter((q) => RESEARCH_MARKERS.some((m) => q.includes(m))).length;
  if (researchCount >= 2) {
    suggestions.push({
      type: 'knowledge_base',
      title: 'Personal Knowledge Base',
      description: 'Would you like me to compile your research into a personal knowledge base?',
      priority: 'low',
    });
  }

  if (queries.some((q) => TIME_MARKERS.some((m) => q.includes(m)))) {
    suggestions.push({
      type: 'monitoring',
      title: 'Set Up Monitoring',
      description: 'I can monitor these topics and notify you of updates automatically.',
      priority: 'high',
    });
  }

  return suggestions;
}
