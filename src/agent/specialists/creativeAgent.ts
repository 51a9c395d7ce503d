// src/agent/specialists/creativeAgent.ts
import { logger } from '@/services/logger';
import type { ModelRouter } from '@/services/model-router';
import { errorMessage } from '@/utils/errors';
import {
  containsAny,
  type CreativeContentType,
  type SpecialistAgent,
  type SpecialistContext,
  type SpecialistPayload,
} from './types';

const KEYWORDS = ['write', 'create', 'generate', 'compose', 'draft', 'brainstorm', 'ideas', 'creative', 'story', 'poem', 'article'];

const CONTENT_TYPES: Array<[string[], CreativeContentType]> = [
  [['story', 'tale', 'narrative'], 'story'],
  [['poem', 'poetry', 'verse'], 'poetry'],
  [['article', 'blog', 'post'], 'article'],
  [['list', 'ideas', 'brainstorm'], 'list'],
];

export const CREATIVE_UNAVAILABLE =
  "I'd be happy to help with creative tasks, but I'm experiencing some technical difficulties right now.";

export function detectContentType(query: string): CreativeContentType {
  return CONTENT_TYPES.find(([words]) => containsAny(query, words))?.[1] ?? 'general_creative';
}

export class CreativeAgent implements SpecialistAgent {
  readonly name = 'CreativeAgent';
  readonly specialization = 'creative_content';

  constructor(private readonly router: ModelRouter) {}

  canHandle(query: string): boolean {
    return containsAny(query, KEYWORDS);
  }

  async process(query: string, context: SpecialistContext): Promise<SpecialistPayload> {
    logger.info('specialist:creative', { query });
    const prompt =
      `You are a creative AI assistant. The user has requested: ${query}\n\n` +
      'Provide original content that directly fulfils the request, structured for the kind of content asked for.';
    try {
      const creativeContent = await this.router.run('creative', [{ role: 'user', content: prompt }], context.signal);
      return { kind: 'creative', agent: this.name, creativeContent, contentType: detectContentType(query) };
    } catch (err) {
      logger.warn('specialist:creative_failed', { error: errorMessage(err) });
      return { kind: 'creative', agent: this.name, creativeContent: CREATIVE_UNAVAILABLE, contentType: 'error' };
    }
  }
}
