// src/services/synthesis.ts — turn tool outputs into one answer, a confidence score and numbered sources
import {
  isErrorItem,
  type ChatMessage,
  type Source,
  type SourceType,
  type ToolData,
  type ToolName,
  type ToolOutputs,
  type ToolResult,
} from '@/types/core';
import { errorMessage } from '@/utils/errors';
import { logger } from './logger';
import type { ModelRouter } from './model-router';

export const CASUAL_FALLBACK = 'Hello! How can I assist you today?';
export const SYNTHESIS_FAILURE =
  'I apologize, but I encountered an error while processing your request. Please try rephrasing your question or ask something else.';

const CASUAL_HISTORY_TURNS = 20;
const PROMPT_HIDDEN_KEYS = new Set(['url', 'queryUsed', 'searchQuery']);
const SOCIAL_DOMAINS = ['instagram.com', 'twitter.com', 'facebook.com', 'tiktok.com'];

const CASUAL_PROMPT = `You are a friendly and helpful AI assistant.

If the message is casual (greetings, small talk), reply naturally, briefly and warmly.
If the user asks about the conversation itself ("what did I ask before?", "summarize our chat"),
answer from the conversation history and be specific about what was discussed.`;

const ERROR_AWARE_PROMPT = `The search tools could not find good results for this query. Write a helpful reply that:
1. Acknowledges the limitation
2. Suggests alternative approaches
3. Offers to help with related questions
4. Shares general knowledge where useful, clearly marked as general knowledge`;

const SUCCESS_PROMPT = `You synthesize information from several tools into one well-structured answer.

Formatting rules:
- Never include URLs or links in the answer text; sources are listed separately
- Use markdown (bold, headers, lists) where it helps readability
- Merge overlapping information; point out conflicting results`;

export interface SynthesisInput {
  query: string;
  outputs: ToolOutputs;
  history: ChatMessage[];
  isCasual: boolean;
  /** Snapshot of live stream data, passed as an extra context block. */
  realTimeData?: Record<string, unknown>;
  signal?: AbortSignal;
}

export interface SynthesisResult {
  content: string;
  confidence: number;
  sources: Source[];
}

function dataHasError(data: ToolData): boolean {
  if (Array.isArray(data)) return data.some(isErrorItem);
  return isErrorItem(data);
}

export function hasToolErrors(outputs: ToolOutputs): boolean {
  for (const result of outputs.values()) {
    if (result.status === 'error' || dataHasError(result.data)) return true;
  }
  return false;
}

function withoutHiddenKeys(item: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(item).filter(([k]) => !PROMPT_HIDDEN_KEYS.has(k)));
}

/** Prompt-ready view of the outputs with URLs and query echoes removed. */
export function cleanOutputsForPrompt(outputs: ToolOutputs): Record<string, unknown> {
  const cleaned: Record<string, unknown> = {};
  for (const [name, result] of outputs) {
    if (result.status === 'error') {
      cleaned[name] = { error: result.error };
    } else if (Array.isArray(result.data)) {
      cleaned[name] = result.data.map(withoutHiddenKeys);
    } else {
      cleaned[name] = withoutHiddenKeys(result.data);
    }
  }
  return cleaned;
}

export function formatSourceTitle(raw: string): string {
  const title = raw.trim().replace(/\s+/g, ' ');
  return title.length > 100 ? `${title.slice(0, 97)}...` : title;
}

export function sourceTypeFor(toolName: string, url: string): SourceType {
  if (toolName.includes('financial') || toolName.includes('stock')) return 'financial';
  if (toolName.includes('news')) return 'news';
  if (toolName.includes('social_media')) return 'social';
  const lower = url.toLowerCase();
  if (SOCIAL_DOMAINS.some((d) => lower.includes(d))) return 'social';
  return 'web';
}

export function quoteSource(id: number, symbol: string): Source {
  return {
    id,
    title: `Financial Modeling Prep - ${symbol}`,
    url: `https://financialmodelingprep.com/financial-summary/${encodeURIComponent(symbol)}`,
    type: 'financial',
    platform: 'financial_modeling_prep',
  };
}

/** Dense 1-based numbering in output order; error items and url-less items are skipped. */
export function extractSources(outputs: Iterable<[ToolName, ToolResult]>): Source[] {
  const sources: Source[] = [];
  for (const [toolName, result] of outputs) {
    if (result.status === 'error') continue;
    const data = result.data;
    if (Array.isArray(data)) {
      for (const item of data) {
        if (isErrorItem(item) || !item.url) continue;
        const id = sources.length + 1;
        sources.push({
          id,
          title: formatSourceTitle(item.title || item.source || `Source ${id}`),
          url: item.url,
          type: sourceTypeFor(toolName, item.url),
          platform: item.platform ?? '',
        });
      }
    } else if (!isErrorItem(data)) {
      sources.push(quoteSource(sources.length + 1, data.symbol));
    }
  }
  return sources;
}

/** Digits of the reply read as one number, clamped to [0, 100]; `base` when there are none. */
export function parseConfidence(text: string, base: number): number {
  const digits = text.replace(/\D/g, '');
  if (digits.length === 0) return base;
  return Math.max(0, Math.min(100, Number.parseInt(digits, 10)));
}

/** Removes markdown links (keeping their text) and bare URLs. */
export function stripInlineUrls(text: string): string {
  return text
    .replace(/\[([^\]]+)\]\((https?:\/\/[^)\s]+)\)/g, '$1')
    .replace(/\s*\(?https?:\/\/[^\s)]+\)?/g, '')
    .replace(/[ \t]+\n/g, '\n')
    .trim();
}

export class ResponseSynthesizer {
  constructor(private readonly router: ModelRouter) {}

  async synthesize(input: SynthesisInput): Promise<SynthesisResult> {
    if (input.isCasual || input.outputs.size === 0) return this.casual(input);

    const hasErrors = hasToolErrors(input.outputs);
    const promptBody = [
      `User query: ${input.query}`,
      `Information from tools: ${JSON.stringify(cleanOutputsForPrompt(input.outputs), null, 2)}`,
      input.realTimeData ? `Real-time data: ${JSON.stringify(input.realTimeData, null, 2)}` : '',
      'Based on the information above, give a clear and complete answer without URLs or source references.',
    ]
      .filter((s) => s.length > 0)
      .join('\n\n');

    let content: string;
    try {
      content = await this.router.run(
        'synthesis',
        [
          { role: 'system', content: hasErrors ? ERROR_AWARE_PROMPT : SUCCESS_PROMPT },
          ...input.history,
          { role: 'user', content: promptBody },
        ],
        input.signal,
      );
    } catch (err) {
      logger.error('synthesis:failed', { error: errorMessage(err) });
      return { content: SYNTHESIS_FAILURE, confidence: 20, sources: [] };
    }

    const confidence = await this.scoreConfidence(content, hasErrors, input.signal);
    return {
      content: stripInlineUrls(content),
      confidence,
      sources: extractSources(input.outputs),
    };
  }

  private async casual(input: SynthesisInput): Promise<SynthesisResult> {
    try {
      const content = await this.router.run(
        'casual',
        [
          { role: 'system', content: CASUAL_PROMPT },
          ...input.history.slice(-CASUAL_HISTORY_TURNS),
          { role: 'user', content: input.query },
        ],
        input.signal,
      );
      return { content, confidence: 95, sources: [] };
    } catch (err) {
      logger.warn('synthesis:casual_failed', { error: errorMessage(err) });
      return { content: CASUAL_FALLBACK, confidence: 90, sources: [] };
    }
  }

  private async scoreConfidence(content: string, hasErrors: boolean, signal?: AbortSignal): Promise<number> {
    const base = hasErrors ? 60 : 85;
    const prompt =
      `Based on the following response and whether the search tools found good results ` +
      `(errors present: ${hasErrors}), what is your confidence score (0-100) in its accuracy ` +
      `and completeness? Reply with a number only.\n\nResponse: ${content}\n\nConfidence score:`;
    try {
      const text = await this.router.run('confidence', [{ role: 'user', content: prompt }], signal);
      return parseConfidence(text, base);
    } catch (err) {
      logger.debug('synthesis:confidence_failed', { error: errorMessage(err) });
      return base;
    }
  }
}
