import { describe, it, expect } from 'vitest';
import {
  ConversationMemory,
  MAX_TURNS_PER_USER,
  analyzeSentiment,
  calculateComplexity,
  extractTopics,
} from '@/memory/conversationMemory';

describe('turn analysis', () => {
  it('extracts topics by keyword', () => {
    expect(extractTopics('Explain machine learning stock trends')).toEqual(['technology', 'business']);
    expect(extractTopics('hello there')).toEqual(['general']);
  });

  it('scores sentiment by word counts', () => {
    expect(analyzeSentiment('I love this, it is great')).toBe('positive');
    expect(analyzeSentiment('this is terrible and awful')).toBe('negative');
    expect(analyzeSentiment('ok')).toBe('neutral');
  });

  it('scores complexity from length, technical terms and questions', () => {
    expect(calculateComplexity('hi')).toBe(1);
    expect(calculateComplexity('Can you analyze and compare these two algorithms? Which is faster? Why?')).toBe(8);
    expect(calculateComplexity('analyze compare explain implement algorithm optimize ????')).toBe(10);
  });

  it('adds two points past 100 characters', () => {
    const plain = 'Tell me about the weather'.padEnd(40, '.');
    const long = 'Can you analyze and compare these two options'.padEnd(119, ' and more') + '?';
    expect(plain).toHaveLength(40);
    expect(long).toHaveLength(120);
    expect(calculateComplexity(plain)).toBe(1);
    expect(calculateComplexity(long)).toBe(6);
  });
});

describe('ConversationMemory', () => {
  const fixed = () => new Date('2026-01-02T03:04:05.000Z');

  it('gives a new user the standard approach', () => {
    const memory = new ConversationMemory(fixed);
    expect(memory.getContextForQuery('u1', 'anything')).toEqual({
      isNewUser: true,
      recentTopics: [],
      userPreferences: null,
      conversationFlow: [],
      suggestedApproach: 'standard',
    });
  });

  it('records turns with derived fields', () => {
    const memory = new ConversationMemory(fixed);
    const turn = memory.addConversationTurn('u1', 'Tell me about the stock market', 'It went up.', { agentUsed: 'x' });
    expect(turn).toEqual({
      timestamp: '2026-01-02T03:04:05.000Z',
      query: 'Tell me about the stock market',
      response: 'It went up.',
      topics: ['business'],
      sentiment: 'neutral',
      complexity: 1,
      metadata: { agentUsed: 'x' },
    });
  });

  it('personalizes when the query touches a known topic', () => {
    const memory = new ConversationMemory(fixed);
    memory.addConversationTurn('u1', 'Tell me about the stock market', 'It went up.');
    expect(memory.getContextForQuery('u1', 'stock prices today').suggestedApproach).toBe('personalized');
    expect(memory.getContextForQuery('u1', 'write me a poem').suggestedApproach).toBe('standard');
  });

  it('keeps only the most recent turns', () => {
    const memory = new ConversationMemory(fixed);
    for (let i = 0; i < MAX_TURNS_PER_USER + 5; i++) memory.addConversationTurn('u1', `q${i}`, `r${i}`);
    const turns = memory.getRecentTurns('u1', 100);
    expect(turns).toHaveLength(MAX_TURNS_PER_USER);
    expect(turns[0]?.query).toBe('q5');
    expect(memory.getContextForQuery('u1', 'x').conversationFlow).toHaveLength(5);
  });

  it('keeps a running profile', () => {
    const memory = new ConversationMemory(fixed);
    memory.addConversationTurn('u1', 'hi', 'hello');
    memory.addConversationTurn('u1', 'Can you analyze and compare these two algorithms? Which is faster? Why?', '...');
    expect(memory.getProfile('u1')).toMatchObject({ turnCount: 2, avgComplexity: 4.5 });
  });

  it('clears a user', () => {
    const memory = new ConversationMemory(fixed);
    memory.addConversationTurn('u1', 'hi', 'hello');
    memory.clear('u1');
    expect(memory.getProfile('u1')).toBeNull();
    expect(memory.getRecentTurns('u1', 5)).toEqual([]);
  });
});
