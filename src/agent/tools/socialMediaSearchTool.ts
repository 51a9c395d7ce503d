// src/agent/tools/socialMediaSearchTool.ts
import { z } from 'zod';
import type { SearchBackend } from '@/services/providers/types';
import { defineTool, type AgentTool } from './types';

export const SOCIAL_PLATFORMS = ['twitter', 'tiktok', 'facebook', 'youtube', 'instagram'] as const;

const schema = z.object({
  query: z.string().trim().min(1),
  platform: z.enum(SOCIAL_PLATFORMS).default('instagram'),
});

export function createSocialMediaSearchTool(search: SearchBackend): AgentTool {
  return defineTool({
    name: 'social_media_search',
    description:
      'Searches statistics, trends and posts on a single social platform (Instagram, Twitter/X, TikTok, Facebook, YouTube).',
    schema,
    execute: ({ query, platform }, { signal }) => search.socialMediaSearch(query, platform, signal),
  });
}
