import { describe, it, expect } from 'vitest';
import { ModelRouter } from '@/services/model-router';
import { QueryPlanner, detectPlatform, parseCategory } from '@/services/query-planner';
import { normalizeTicker } from '@/services/ticker-extraction';
import { ScriptedGeneration } from './helpers/fakes';

function planner(generation: ScriptedGeneration): QueryPlanner {
  return new QueryPlanner(new ModelRouter(generation));
}

describe('QueryPlanner', () => {
  it('plans no tools for casual messages', async () => {
    const plan = await planner(new ScriptedGeneration({ classification: 'CASUAL' })).plan('hi');
    expect(plan).toEqual({
      category: 'CASUAL',
      toolCalls: [],
      log: 'Detected casual conversation - no tools needed',
    });
  });

  it('plans no tools for memory questions', async () => {
    const plan = await planner(new ScriptedGeneration({ classification: 'MEMORY' })).plan('what did I ask first?');
    expect(plan.toolCalls).toEqual([]);
    expect(plan.log).toBe('Detected memory query - using conversation context');
  });

  it('classifies with the small model at temperature zero', async () => {
    const generation = new ScriptedGeneration({ classification: 'CASUAL' });
    await planner(generation).plan('hi');
    expect(generation.calls[0]).toMatchObject({ task: 'classification', model: 'small', temperature: 0, maxTokens: 20 });
  });

  it('looks up a quote when a ticker is extracted', async () => {
    const generation = new ScriptedGeneration({ classification: 'FINANCIAL', ticker_extraction: 'AAPL' });
    const plan = await planner(generation).plan('Apple stock price');
    expect(plan).toEqual({
      category: 'FINANCIAL',
      toolCalls: [{ name: 'get_stock_info', parameters: { ticker: 'AAPL' } }],
      log: 'Classified as FINANCIAL, using tools: get_stock_info',
    });
  });

  it('falls back to web search when there is no ticker', async () => {
    const generation = new ScriptedGeneration({ classification: 'FINANCIAL', ticker_extraction: 'NONE' });
    const plan = await planner(generation).plan('how do bond markets work');
    expect(plan.toolCalls).toEqual([{ name: 'web_search', parameters: { query: 'how do bond markets work' } }]);
  });

  it('searches news and the web for news questions', async () => {
    const plan = await planner(new ScriptedGeneration({ classification: 'NEWS' })).plan('latest news about AI');
    expect(plan.toolCalls).toEqual([
      { name: 'news_search', parameters: { query: 'latest news about AI' } },
      { name: 'web_search', parameters: { query: 'latest news about AI' } },
    ]);
    expect(plan.log).toBe('Classified as NEWS, using tools: news_search, web_search');
  });

  it('passes the detected platform to social search', async () => {
    const plan = await planner(new ScriptedGeneration({ classification: 'SOCIAL_MEDIA' })).plan(
      'most liked post on TikTok',
    );
    expect(plan.toolCalls[0]).toEqual({
      name: 'social_media_search',
      parameters: { query: 'most liked post on TikTok', platform: 'tiktok' },
    });
  });

  it('defaults to web search when classification fails', async () => {
    const plan = await planner(new ScriptedGeneration({ classification: new Error('provider down') })).plan('q');
    expect(plan).toEqual({
      category: 'GENERAL_WEB',
      toolCalls: [{ name: 'web_search', parameters: { query: 'q' } }],
      log: 'Error during classification, defaulting to web search: provider down',
    });
  });

  it('treats an empty classification as a failure', async () => {
    const plan = await planner(new ScriptedGeneration({ classification: '   ' })).plan('q');
    expect(plan.log).toBe('Error during classification, defaulting to web search: Empty classification response');
  });
});

describe('parseCategory', () => {
  it('takes the first category in priority order', () => {
    expect(parseCategory('Category: news')).toBe('NEWS');
    expect(parseCategory('CASUAL or NEWS')).toBe('CASUAL');
    expect(parseCategory('no idea')).toBe('GENERAL_WEB');
  });
});

describe('detectPlatform', () => {
  it('maps mentions to platforms', () => {
    expect(detectPlatform('top tweets on x.com')).toBe('twitter');
    expect(detectPlatform('biggest YouTube channel')).toBe('youtube');
    expect(detectPlatform('most followed account')).toBe('instagram');
  });
});

describe('normalizeTicker', () => {
  it('accepts one to five letters', () => {
    expect(normalizeTicker('aapl')).toBe('AAPL');
    expect(normalizeTicker('$TSLA.')).toBe('TSLA');
    expect(normalizeTicker('"MSFT"')).toBe('MSFT');
  });

  it('rejects everything else', () => {
    expect(normalizeTicker('NONE')).toBeNull();
    expect(normalizeTicker('none')).toBeNull();
    expect(normalizeTicker('The ticker is AAPL')).toBeNull();
    expect(normalizeTicker('GOOGLEX')).toBeNull();
    expect(normalizeTicker('')).toBeNull();
  });
});
