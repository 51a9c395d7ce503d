import { describe, it, expect, vi } from 'vitest';
import { ChatHistoryStore } from '@/memory/chatHistory';
import { InMemoryMemoryStore } from '@/memory/InMemoryMemoryStore';
import { termOverlapScore } from '@/memory/MemoryStore';
import type { MemoryStore } from '@/memory/MemoryStore';
import { MemoryService, formatExchange, parseExchange } from '@/memory/memoryService';

function ticking(start = Date.UTC(2026, 0, 1)) {
  let t = start;
  return () => new Date((t += 1000));
}

describe('exchange documents', () => {
  it('round-trips a query and response', () => {
    const doc = formatExchange('what is rust?', 'A language.\nWith lifetimes.');
    expect(doc).toBe('User query: what is rust?\nAI response: A language.\nWith lifetimes.');
    expect(parseExchange(doc)).toEqual({ query: 'what is rust?', response: 'A language.\nWith lifetimes.' });
  });

  it('rejects documents that are not exchanges', () => {
    expect(parseExchange('just a note')).toBeNull();
  });
});

describe('MemoryService', () => {
  it('returns the most recent exchanges oldest first', async () => {
    const service = new MemoryService(new InMemoryMemoryStore(), ticking());
    await service.addToMemory('u1', 'q1', 'r1');
    await service.addToMemory('u1', 'q2', 'r2');
    await service.addToMemory('u1', 'q3', 'r3');
    expect(await service.getRecentHistory('u1', 2)).toEqual([
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'r2' },
      { role: 'user', content: 'q3' },
      { role: 'assistant', content: 'r3' },
    ]);
  });

  it('ranks matches by shared terms', async () => {
    const service = new MemoryService(new InMemoryMemoryStore(), ticking());
    await service.addToMemory('u1', 'rust borrow checker', 'It enforces ownership.');
    await service.addToMemory('u1', 'pasta recipe', 'Boil water.');
    const matches = await service.searchMemory('u1', 'borrow checker rules');
    expect(matches).toHaveLength(1);
    expect(matches[0]?.score).toBeCloseTo(2 / 3);
    expect(matches[0]?.document).toContain('rust borrow checker');
  });

  it('keeps users apart and forgets on request', async () => {
    const service = new MemoryService(new InMemoryMemoryStore(), ticking());
    await service.addToMemory('u1', 'q1', 'r1');
    await service.addToMemory('u2', 'q2', 'r2');
    await service.forget('u1');
    expect(await service.getRecentHistory('u1')).toEqual([]);
    expect(await service.getRecentHistory('u2')).toHaveLength(2);
  });

  it('never throws from a background write', async () => {
    const failing: MemoryStore = {
      add: vi.fn().mockRejectedValue(new Error('store offline')),
      query: async () => [],
      get: async () => [],
      delete: async () => undefined,
    };
    const service = new MemoryService(failing, ticking());
    expect(() => service.remember('u1', 'q', 'r')).not.toThrow();
    await vi.waitFor(() => expect(failing.add).toHaveBeenCalledTimes(1));
  });
});

describe('termOverlapScore', () => {
  it('ignores terms of two characters or fewer', () => {
    expect(termOverlapScore('the cat', 'cat')).toBe(0.5);
    expect(termOverlapScore('is it', 'is it')).toBe(0);
  });
});

describe('ChatHistoryStore', () => {
  it('appends, caps and clears per user', () => {
    const store = new ChatHistoryStore();
    for (let i = 0; i < 25; i++) {
      store.append('u1', { role: 'user', content: `q${i}` }, { role: 'assistant', content: `a${i}` });
    }
    const history = store.get('u1');
    expect(history).toHaveLength(40);
    expect(history[0]).toEqual({ role: 'user', content: 'q5' });
    store.clear('u1');
    expect(store.get('u1')).toEqual([]);
  });
});
