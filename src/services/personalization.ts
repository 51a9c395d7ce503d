// src/services/personalization.ts — rewrite a draft answer for the user's profile and suggestions
import type { UserContext } from '@/memory/types';
import type { ProactiveSuggestion } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import { logger } from './logger';
import type { ModelRouter } from './model-router';

export interface PersonalizedResponse {
  response: string;
  personalizationApplied: boolean;
}

/** The parts of the user context worth sending to the model. */
export function summarizeContext(context: UserContext): Record<string, unknown> {
  if (context.isNewUser) return { status: 'new_user' };
  return {
    recentTopics: context.recentTopics,
    preferences: context.userPreferences,
    suggestedApproach: context.suggestedApproach,
    recentQueries: context.conversationFlow.map((t) => t.query),
  };
}

export class PersonalizationLayer {
  constructor(private readonly router: ModelRouter) {}

  async personalize(
    query: string,
    draft: string,
    context: UserContext,
    suggestions: ProactiveSuggestion[],
    signal?: AbortSignal,
  ): Promise<PersonalizedResponse> {
    const prompt = [
      'You are an adaptive assistant that tailors answers to the individual user.',
      `User context: ${JSON.stringify(summarizeContext(context), null, 2)}`,
      `Proactive opportunities: ${JSON.stringify(suggestions, null, 2)}`,
      `Current query: ${query}`,
      `Draft answer:\n${draft}`,
      'Rewrite the draft so that it:',
      "1. Matches the user's communication style and preferred topics",
      '2. Builds on what was discussed before where relevant',
      '3. Mentions a proactive suggestion only if it clearly helps',
      '4. Keeps every fact from the draft and adds no URLs',
    ].join('\n\n');

    try {
      const response = await this.router.run('personalization', [{ role: 'user', content: prompt }], signal);
      if (response.length === 0) return { response: draft, personalizationApplied: false };
      return { response, personalizationApplied: true };
    } catch (err) {
      logger.warn('personalization:failed', { error: errorMessage(err) });
      return { response: draft, personalizationApplied: false };
    }
  }
}
