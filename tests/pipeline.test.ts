import { describe, it, expect, afterEach, vi } from 'vitest';
import { quoteSource, SYNTHESIS_FAILURE } from '@/services/synthesis';
import { DEFAULT_FINANCIAL_STREAM } from '@/services/orchestrator';
import type { PipelineDeps } from '@/services/pipeline-deps';
import { CollectingProgressChannel } from '@/utils/progress';
import { FakeFinanceBackend, ScriptedGeneration, createTestDeps, hit, quote } from './helpers/fakes';

let open: PipelineDeps[] = [];

async function setup(options: Parameters<typeof createTestDeps>[0] = {}) {
  const built = await createTestDeps(options);
  open.push(built.deps);
  return built;
}

afterEach(async () => {
  await Promise.all(open.map((d) => d.close()));
  open = [];
});

describe('PipelineDriver', () => {
  it('answers through a specialist and personalizes the result', async () => {
    const generation = new ScriptedGeneration({
      specialist_synthesis: 'Rust lifetimes track borrows.',
      personalization: 'Since you like Rust: lifetimes track borrows.',
    });
    const { deps, search } = await setup({ generation });
    search.web = [hit('Lifetimes', 'https://doc.rust-lang.org/lifetimes'), hit('Borrowing', 'https://rust.dev/borrow')];
    const channel = new CollectingProgressChannel();

    const payload = await deps.driver.run({ userId: 'u1', text: 'tell me about rust lifetimes', history: [] }, channel);

    expect(payload).toMatchObject({
      response: 'Since you like Rust: lifetimes track borrows.',
      confidence: 95,
      method: 'Multi-Agent: ResearchAgent',
      route: 'specialist',
      toolsUsed: ['web_search'],
      sourcesFound: 2,
      personalizationApplied: true,
      proactiveSuggestions: [],
      realTimeData: {},
    });
    expect(payload.sources.map((s) => s.type)).toEqual(['research', 'research']);
    expect(channel.statusUpdates).toContain('✨ Personalizing the ResearchAgent answer...');
    expect(channel.finalResponses).toEqual([payload]);
  });

  it('keeps the draft when personalization returns nothing', async () => {
    const generation = new ScriptedGeneration({ specialist_synthesis: 'Draft answer.', personalization: '' });
    const { deps } = await setup({ generation });
    const payload = await deps.driver.run(
      { userId: 'u1', text: 'tell me about rust', history: [] },
      new CollectingProgressChannel(),
    );
    expect(payload.response).toBe('Draft answer.');
    expect(payload.personalizationApplied).toBe(false);
  });

  it('falls back to planned tools when the specialist fails', async () => {
    const generation = new ScriptedGeneration({
      classification: 'GENERAL_WEB',
      synthesis: 'Lifetimes explained.',
      confidence: '70',
    });
    const { deps, search } = await setup({ generation });
    search.web = [hit('Lifetimes', 'https://doc.rust-lang.org/lifetimes'), hit('Borrowing', 'https://rust.dev/borrow')];
    vi.spyOn(search, 'webSearch').mockRejectedValueOnce(new Error('search down'));
    const channel = new CollectingProgressChannel();

    const payload = await deps.driver.run({ userId: 'u1', text: 'tell me about rust lifetimes', history: [] }, channel);

    expect(payload).toMatchObject({
      response: 'Lifetimes explained.',
      confidence: 70,
      method: 'Search: web_search',
      route: 'fallback',
      toolsUsed: ['web_search'],
      sourcesFound: 2,
      personalizationApplied: false,
    });
    expect(channel.statusUpdates).toEqual([
      '🔍 Analyzing your query...',
      '🧠 Loading your personalized context...',
      '🤖 Engaging specialist agents...',
      '🔄 Switching to standard processing...',
      '📋 Classified as GENERAL_WEB, using tools: web_search',
      '⚙️ Running web_search (1/1)...',
      '✅ web_search found 2 results',
      '✍️ Synthesizing response...',
    ]);
    expect(channel.finalResponses).toHaveLength(1);
  });

  it('chats casually when no specialist applies', async () => {
    const generation = new ScriptedGeneration({ classification: 'CASUAL', casual: 'Hello!' });
    const { deps } = await setup({ generation });
    const payload = await deps.driver.run({ userId: 'u1', text: 'hi', history: [] }, new CollectingProgressChannel());
    expect(payload).toMatchObject({
      response: 'Hello!',
      confidence: 95,
      method: 'Casual Chat',
      route: 'fallback',
      toolsUsed: [],
      sources: [],
    });
  });

  it('serves a repeated query from the cache', async () => {
    const generation = new ScriptedGeneration({ classification: 'CASUAL', casual: 'Hello!' });
    const { deps } = await setup({ generation });
    const first = await deps.driver.run({ userId: 'u1', text: 'hi', history: [] }, new CollectingProgressChannel());
    const callsAfterFirst = generation.calls.length;

    const channel = new CollectingProgressChannel();
    const second = await deps.driver.run({ userId: 'u1', text: '  HI ', history: [] }, channel);

    const { analytics, ...cached } = first;
    expect(analytics).toBeDefined();
    expect(second).toEqual(cached);
    expect(second.analytics).toBeUndefined();
    expect(channel.statusUpdates).toEqual(['⚡ Found cached response']);
    expect(channel.finalResponses).toHaveLength(1);
    expect(generation.calls).toHaveLength(callsAfterFirst);
    expect(deps.cache.stats()).toMatchObject({ hits: 1, misses: 1 });
  });

  it('keeps nothing from a request whose client went away', async () => {
    const generation = new ScriptedGeneration({
      classification: 'GENERAL_WEB',
      synthesis: (request) => {
        if (request.signal?.aborted) throw new Error('Request was aborted.');
        return 'Lifetimes explained.';
      },
      confidence: '70',
    });
    const { deps, search } = await setup({ generation });
    search.web = [hit('Lifetimes', 'https://doc.rust-lang.org/lifetimes')];
    const controller = new AbortController();
    controller.abort();

    const first = await deps.driver.run(
      { userId: 'u1', text: 'tell me about rust lifetimes', history: [], signal: controller.signal },
      new CollectingProgressChannel(),
    );
    expect(first.response).toBe(SYNTHESIS_FAILURE);
    expect(deps.cache.size).toBe(0);
    expect(deps.memory.getRecentTurns('u1', 5)).toEqual([]);
    expect(deps.analytics.getRecord('u1')).toBeNull();

    const second = await deps.driver.run(
      { userId: 'u1', text: 'tell me about rust lifetimes', history: [] },
      new CollectingProgressChannel(),
    );
    expect(second.response).toBe('Lifetimes explained.');
    expect(deps.cache.stats()).toMatchObject({ hits: 0, misses: 2 });
  });

  it('does not cache a failed synthesis', async () => {
    const generation = new ScriptedGeneration({
      classification: 'GENERAL_WEB',
      synthesis: new Error('model down'),
      confidence: '70',
    });
    const { deps, search } = await setup({ generation });
    search.web = [hit('Lifetimes', 'https://doc.rust-lang.org/lifetimes')];

    const first = await deps.driver.run(
      { userId: 'u1', text: 'tell me about rust lifetimes', history: [] },
      new CollectingProgressChannel(),
    );
    expect(first).toMatchObject({ response: SYNTHESIS_FAILURE, confidence: 20, sources: [] });
    expect(deps.cache.size).toBe(0);

    generation.script('synthesis', 'Lifetimes explained.');
    const second = await deps.driver.run(
      { userId: 'u1', text: 'tell me about rust lifetimes', history: [] },
      new CollectingProgressChannel(),
    );
    expect(second.response).toBe('Lifetimes explained.');
    expect(deps.cache.size).toBe(1);
  });

  it('emits one failure response on an unexpected error', async () => {
    const { deps } = await setup();
    vi.spyOn(deps.cache, 'get').mockImplementation(() => {
      throw new Error('cache exploded');
    });
    const channel = new CollectingProgressChannel();
    const payload = await deps.driver.run({ userId: 'u1', text: 'hi', history: [] }, channel);
    expect(payload).toMatchObject({ response: SYNTHESIS_FAILURE, confidence: 20, method: 'Error', sources: [] });
    expect(channel.finalResponses).toEqual([payload]);
  });

  it('records the turn, durable memory and analytics', async () => {
    const generation = new ScriptedGeneration({ classification: 'CASUAL', casual: 'Hello!' });
    const { deps } = await setup({ generation });
    const payload = await deps.driver.run({ userId: 'u1', text: 'hi', history: [] }, new CollectingProgressChannel());

    expect(deps.memory.getRecentTurns('u1', 1)[0]?.metadata).toMatchObject({
      agentUsed: 'fallback_processing',
      route: 'fallback',
      personalizationApplied: false,
    });
    expect(deps.analytics.getRecord('u1')?.totalInteractions).toBe(1);
    expect(payload.analytics?.userPatterns).toEqual({ status: 'insufficient_recent_data' });
    await vi.waitFor(async () => {
      expect(await deps.memoryService.getRecentHistory('u1')).toEqual([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'Hello!' },
      ]);
    });
  });

  it('rehydrates history from durable memory for a fresh session', async () => {
    const generation = new ScriptedGeneration({ classification: 'CASUAL', casual: 'Welcome back!' });
    const { deps } = await setup({ generation });
    await deps.memoryService.addToMemory('u2', 'earlier question', 'earlier answer');

    await deps.driver.run({ userId: 'u2', text: 'hi again', history: [] }, new CollectingProgressChannel());

    const messages = generation.callsFor('casual')[0]?.messages ?? [];
    expect(messages.slice(1, 3)).toEqual([
      { role: 'user', content: 'earlier question' },
      { role: 'assistant', content: 'earlier answer' },
    ]);
  });

  it('notes a capability gap without changing the answer path', async () => {
    const generation = new ScriptedGeneration({
      tool_analysis: '{"needs_new_tool": true, "suggested_tool_name": "Weather API", "priority": "high", "reasoning": "no weather tool"}',
      classification: 'CASUAL',
      casual: 'Hello!',
    });
    const { deps } = await setup({ generation });
    const channel = new CollectingProgressChannel();
    await deps.driver.run({ userId: 'u1', text: 'weather in Oslo tomorrow', history: [] }, channel);
    expect(channel.statusUpdates).toContain('🔧 Noted a capability gap: weather_api');
    expect(deps.discovery.discoveredCount()).toBe(1);
    expect(deps.memory.getRecentTurns('u1', 1)[0]?.metadata.toolGapDetected).toBe(true);
  });

  it('skips gap analysis when discovery is disabled', async () => {
    const generation = new ScriptedGeneration({ classification: 'CASUAL', casual: 'Hello!' });
    const { deps } = await setup({ generation, env: { TOOL_DISCOVERY_ENABLED: 'false' } });
    await deps.driver.run({ userId: 'u1', text: 'hi', history: [] }, new CollectingProgressChannel());
    expect(generation.callsFor('tool_analysis')).toEqual([]);
  });

  it('starts the default streams once and uses their data', async () => {
    const generation = new ScriptedGeneration({
      classification: 'CASUAL',
      casual: 'Hello!',
      ticker_extraction: 'AAPL',
      analysis: 'Watch margins.',
      specialist_synthesis: 'AAPL trades near 190.',
      personalization: 'AAPL trades near 190 today.',
    });
    const finance = new FakeFinanceBackend({ AAPL: quote('AAPL') });
    const { deps } = await setup({ generation, finance, bootstrapStreams: true });

    await deps.driver.run({ userId: 'u1', text: 'hi', history: [] }, new CollectingProgressChannel());
    expect(deps.driver.isStreamsInitialized()).toBe(true);
    expect(deps.streams.activeCount()).toBe(2);

    await vi.waitFor(() => {
      expect(deps.streams.getLatestData(DEFAULT_FINANCIAL_STREAM).data).not.toBeNull();
    });

    const channel = new CollectingProgressChannel();
    const payload = await deps.driver.run(
      { userId: 'u1', text: 'show the stock price for AAPL', history: [] },
      channel,
    );

    expect(deps.streams.activeCount()).toBe(2);
    expect(channel.statusUpdates).toContain('📈 Using real-time market data');
    expect(payload).toMatchObject({
      response: 'AAPL trades near 190 today.',
      method: 'Multi-Agent: AnalysisAgent',
      toolsUsed: ['get_stock_info'],
    });
    expect(Object.keys(payload.realTimeData)).toEqual(['financial']);
    expect(payload.realTimeData.financial?.data).not.toBeNull();
    expect(payload.sources).toEqual([quoteSource(1, 'AAPL')]);
    const synthesisMessages = generation.callsFor('specialist_synthesis')[0]?.messages ?? [];
    expect(synthesisMessages.some((m) => m.role === 'system' && m.content.startsWith('Real-time data available:'))).toBe(
      true,
    );
  });
});
