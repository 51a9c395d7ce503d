// src/services/analytics.ts — per-user interaction analytics and pattern summaries
import { logger } from './logger';

export const MAX_PATTERNS = 100;
const RECENT_WINDOW = 10;
const MIN_RECENT = 5;

export interface InteractionPattern {
  timestamp: number;
  agentUsed: string;
  /** Seconds. */
  processingTime: number;
  complexity: number;
  satisfaction: number | null;
}

export interface AnalyticsRecord {
  totalInteractions: number;
  preferredAgents: Record<string, number>;
  queryPatterns: InteractionPattern[];
}

export type Trend = 'increasing' | 'decreasing' | 'stable';

export interface PatternTrends {
  complexityTrend: Trend;
  performanceTrend: 'improving' | 'degrading' | 'stable';
  interactionFrequency: 'regular' | 'sporadic';
}

export type PatternAnalysis =
  | { status: 'insufficient_data' }
  | { status: 'insufficient_recent_data' }
  | {
      status: 'ok';
      totalInteractions: number;
      avgComplexity: number;
      avgResponseTime: number;
      mostUsedAgent: string;
      trends: PatternTrends;
      recommendations: string[];
    };

export interface TrackInput {
  agentUsed: string;
  processingTime: number;
  complexity: number;
  satisfaction?: number | null;
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export class AnalyticsRecorder {
  private readonly records = new Map<string, AnalyticsRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  track(userId: string, input: TrackInput): void {
    const record = this.records.get(userId) ?? {
      totalInteractions: 0,
      preferredAgents: {},
      queryPatterns: [],
    };
    record.totalInteractions++;
    record.preferredAgents[input.agentUsed] = (record.preferredAgents[input.agentUsed] ?? 0) + 1;
    record.queryPatterns.push({
      timestamp: this.now(),
      agentUsed: input.agentUsed,
      processingTime: input.processingTime,
      complexity: input.complexity,
      satisfaction: input.satisfaction ?? null,
    });
    if (record.queryPatterns.length > MAX_PATTERNS) {
      record.queryPatterns.splice(0, record.queryPatterns.length - MAX_PATTERNS);
    }
    this.records.set(userId, record);
  }

  /** Attach a 1..5 score to the user's latest interaction. Returns false if there is none. */
  recordSatisfaction(userId: string, score: number): boolean {
    const latest = this.records.get(userId)?.queryPatterns.at(-1);
    if (!latest) return false;
    latest.satisfaction = Math.max(1, Math.min(5, Math.round(score)));
    return true;
  }

  getRecord(userId: string): AnalyticsRecord | null {
    return this.records.get(userId) ?? null;
  }

  analyze(userId: string): PatternAnalysis {
    const record = this.records.get(userId);
    if (!record) return { status: 'insufficient_data' };

    const recent = record.queryPatterns.slice(-RECENT_WINDOW);
    if (recent.length < MIN_RECENT) return { status: 'insufficient_recent_data' };

    const mostUsedAgent =
      Object.entries(record.preferredAgents).sort((a, b) => b[1] - a[1])[0]?.[0] ?? 'none';

    return {
      status: 'ok',
      totalInteractions: record.totalInteractions,
      avgComplexity: round2(mean(recent.map((p) => p.complexity))),
      avgResponseTime: round2(mean(recent.map((p) => p.processingTime))),
      mostUsedAgent,
      trends: this.trends(recent),
      recommendations: this.recommendations(record),
    };
  }

  /** Drop patterns older than `maxAgeMs`; users left with none are removed. */
  prune(maxAgeMs: number): number {
    const cutoff = this.now() - maxAgeMs;
    let removed = 0;
    for (const [userId, record] of this.records) {
      const before = record.queryPatterns.length;
      record.queryPatterns = record.queryPatterns.filter((p) => p.timestamp >= cutoff);
      removed += before - record.queryPatterns.length;
      if (record.queryPatterns.length === 0) this.records.delete(userId);
    }
    if (removed > 0) logger.debug('analytics:pruned', { removed });
    return removed;
  }

  private trends(patterns: InteractionPattern[]): PatternTrends {
    const complexities = patterns.map((p) => p.complexity);
    const first = complexities[0] ?? 0;
    const last = complexities[complexities.length - 1] ?? 0;
    const complexityTrend: Trend = last > first ? 'increasing' : last < first ? 'decreasing' : 'stable';

    const times = patterns.map((p) => p.processingTime);
    let performanceTrend: PatternTrends['performanceTrend'] = 'stable';
    if (times.length >= 3) {
      const early = mean(times.slice(0, 3));
      const late = mean(times.slice(-3));
      if (late > early * 1.2) performanceTrend = 'degrading';
      else if (late < early * 0.8) performanceTrend = 'improving';
    }

    return {
      complexityTrend,
      performanceTrend,
      interactionFrequency: patterns.length >= 5 ? 'regular' : 'sporadic',
    };
  }

  private recommendations(record: AnalyticsRecord): string[] {
    const out: string[] = [];
    const total = record.totalInteractions;
    const [topAgent, topCount] =
      Object.entries(record.preferredAgents).sort((a, b) => b[1] - a[1])[0] ?? ['', 0];
    if (total > 0 && topCount / total > 0.7) {
      out.push(`Consider exploring other agents beyond ${topAgent} for variety`);
    }

    const lastFive = record.queryPatterns.slice(-5).map((p) => p.complexity);
    if (lastFive.length > 0 && mean(lastFive) < 3) {
      out.push('Try more complex queries to unlock advanced features');
    }
    return out;
  }
}
