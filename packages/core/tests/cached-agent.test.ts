import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ValidationError } from '@qmem/shared';
import { MemoryStorage } from '@qmem/store';
import { CachedAgent, type AgentRunContext } from '../src/cached-agent.js';
import { QueryMemoryCache } from '../src/query-memory-cache.js';
import { queryHash } from '../src/normalize.js';
import { FlakyStorage } from './helpers.js';

function fakeAgent() {
  return {
    run: vi.fn(async (query: string, _context: AgentRunContext) => ({
      response: `answer to ${query}`,
      toolsUsed: ['sql'],
      tokenCounts: { input: 10, output: 20 },
    })),
  };
}

describe('CachedAgent', () => {
  let agent: ReturnType<typeof fakeAgent>;
  let cache: QueryMemoryCache;
  let cached: CachedAgent;

  beforeEach(() => {
    agent = fakeAgent();
    cache = new QueryMemoryCache(new MemoryStorage());
    cached = new CachedAgent(cache, agent);
  });

  it('runs the agent until the answer earns positive feedback', async () => {
    const first = await cached.ask('List tables');
    expect(first).toEqual({ response: 'answer to List tables', source: 'agent', toolsUsed: ['sql'] });

    const second = await cached.ask('list tables');
    expect(second.source).toBe('agent');

    const summary = await cached.rate('up');
    expect(summary?.trusted).toBe(true);

    const third = await cached.ask('LIST TABLES');
    expect(third).toEqual({ response: 'answer to list tables', source: 'cache', toolsUsed: ['sql'] });
    expect(agent.run).toHaveBeenCalledTimes(2);
  });

  it('records token counts reported by the agent', async () => {
    await cached.ask('count users');
    expect((await cache.getEntry('count users'))?.tokenCounts).toEqual({ input: 10, output: 20 });
  });

  it('passes the session to the agent', async () => {
    await cached.ask('q', { sessionId: 'chat-1' });
    expect(agent.run).toHaveBeenCalledWith('q', { sessionId: 'chat-1' });
  });

  it('rates the most recent query of each session', async () => {
    await cached.ask('first question', { sessionId: 'a' });
    await cached.ask('second question', { sessionId: 'b' });

    const summary = await cached.rate('down', 'b');

    expect(summary?.hash).toBe(queryHash('second question'));
    expect(summary?.negativeCount).toBe(1);
    expect(cached.lastQuery('a')).toBe('first question');
    expect((await cache.getEntry('first question'))?.feedback.negativeCount).toBe(0);
  });

  it('returns null when there is nothing to rate', async () => {
    expect(await cached.rate('up')).toBeNull();
    expect(await cached.rate('up', 'unknown-session')).toBeNull();
  });

  it('forgets a finished session', async () => {
    await cached.ask('q', { sessionId: 'chat-1' });

    expect(cached.forgetSession('chat-1')).toBe(true);
    expect(cached.lastQuery('chat-1')).toBeUndefined();
    expect(await cached.rate('up', 'chat-1')).toBeNull();
    expect(cached.forgetSession('chat-1')).toBe(false);
  });

  it('rejects malformed ratings', async () => {
    await cached.ask('q');
    await expect(cached.rate('maybe')).rejects.toThrow(ValidationError);
  });

  it('still answers when the cache cannot write', async () => {
    const storage = new FlakyStorage();
    storage.failWrites = true;
    const flaky = new CachedAgent(new QueryMemoryCache(storage), agent);

    const result = await flaky.ask('q');

    expect(result).toEqual({ response: 'answer to q', source: 'agent', toolsUsed: ['sql'] });
    expect(await flaky.rate('up')).toBeNull();
  });

  it('still answers when the cache cannot load', async () => {
    const broken = new CachedAgent(
      new QueryMemoryCache(new MemoryStorage('{"schemaVersion":"9.9"}')),
      agent,
    );

    expect((await broken.ask('q')).source).toBe('agent');
    expect(await broken.rate('up')).toBeNull();
  });

  it('runs uncached without a cache', async () => {
    const uncached = new CachedAgent(null, agent);

    await uncached.ask('q');
    await uncached.ask('q');

    expect(uncached.cachingEnabled).toBe(false);
    expect(agent.run).toHaveBeenCalledTimes(2);
    expect(await uncached.rate('up')).toBeNull();
  });
});
