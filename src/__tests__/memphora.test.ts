import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Memphora } from '../memphora.js';
import { AuthenticationError, ConfigError, NotFoundError, ServerError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { MemphoraOptions } from '../config.js';
import { MockMemphoraApi, MOCK_BASE_URL } from '../__test__/mock-api.js';

const USER = 'user-1';

describe('Memphora', () => {
  let api: MockMemphoraApi;

  function client(options: MemphoraOptions = {}) {
    return new Memphora(
      {
        userId: USER,
        apiKey: 'test-key',
        apiUrl: MOCK_BASE_URL,
        retryBaseDelayMs: 0,
        fetch: api.fetch,
        logger: createLogger('silent'),
        ...options,
      },
      {},
    );
  }

  beforeEach(() => {
    api = new MockMemphoraApi();
  });

  // ── Construction ──────────────────────────────────────────────────────────

  it('throws ConfigError without credentials', () => {
    expect(() => new Memphora({}, {})).toThrow(ConfigError);
  });

  it('reads credentials from the environment', () => {
    const memory = new Memphora(
      { fetch: api.fetch, logger: createLogger('silent') },
      { MEMPHORA_USER_ID: 'env-user', MEMPHORA_API_KEY: 'test-key' },
    );
    expect(memory.userId).toBe('env-user');
    expect(memory.config.apiUrl).toBe('https://api.memphora.ai/api/v1');
  });

  it('logs initialization at info level', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    client({ logger });
    expect(logger.info).toHaveBeenCalledWith('Memphora SDK initialized for user user-1');
  });

  // ── Core operations ───────────────────────────────────────────────────────

  it('stores and finds a memory', async () => {
    const memory = client();
    const stored = await memory.store('Prefers TypeScript over JavaScript', { topic: 'languages' });

    expect(stored).toMatchObject({ id: 'mem-1', content: 'Prefers TypeScript over JavaScript', metadata: { topic: 'languages' } });

    const results = await memory.search('typescript');
    expect(results.map((m) => m.id)).toEqual(['mem-1']);
    expect(api.calls[1].body).toMatchObject({ user_id: USER, query: 'typescript', limit: 10 });
  });

  it('updates then reads back a memory', async () => {
    const memory = client();
    const { id } = await memory.store('Lives in Porto');

    await memory.updateMemory(id, { content: 'Lives in Lisbon' });
    const fetched = await memory.getMemory(id);

    expect(fetched.content).toBe('Lives in Lisbon');
    expect(fetched.updated_at).toBe('2024-05-02T10:00:00Z');
  });

  it('deletes a memory so reads reject with NotFoundError', async () => {
    const memory = client();
    const { id } = await memory.store('Temporary note');

    await expect(memory.deleteMemory(id)).resolves.toBe(true);
    await expect(memory.getMemory(id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists only this user\'s memories', async () => {
    api.seed('someone-else', 'Not mine');
    const memory = client();
    await memory.store('Mine');

    const listed = await memory.listMemories();
    expect(listed.map((m) => m.content)).toEqual(['Mine']);
    expect(api.calls[1].query).toEqual({ limit: '100' });
  });

  it('clears all memories for the user', async () => {
    const memory = client();
    await memory.store('One');
    await memory.store('Two');

    await expect(memory.clear()).resolves.toEqual({ deleted_count: 2 });
    expect(api.memories.size).toBe(0);
  });

  // ── Context ───────────────────────────────────────────────────────────────

  describe('getContext', () => {
    it('uses the optimized endpoint when autoCompress is on', async () => {
      api.seed(USER, 'Likes green tea');
      api.seed(USER, 'Drinks tea every morning');
      const memory = client({ maxTokens: 300 });

      const context = await memory.getContext('tea', { limit: 2 });

      expect(context).toBe('Likes green tea | Drinks tea every morning');
      const call = api.calls[0];
      expect(call.path).toBe('/memories/search/optimized');
      expect(call.body).toMatchObject({ user_id: USER, query: 'tea', max_tokens: 300, max_memories: 2, use_compression: true });
    });

    it('formats plain search results when autoCompress is off', async () => {
      api.seed(USER, 'Likes green tea');
      const memory = client({ autoCompress: false });

      const context = await memory.getContext('tea');

      expect(context).toBe('Relevant context from past conversations:\n- Likes green tea');
      expect(api.calls[0].path).toBe('/memories/search');
      expect(api.calls[0].body).toMatchObject({ limit: 5 });
    });

    it('returns an empty string when nothing matches', async () => {
      const memory = client({ autoCompress: false });
      await expect(memory.getContext('anything')).resolves.toBe('');
    });

    it('propagates authentication failures', async () => {
      api.failNext(401, { detail: 'Invalid API key' });
      await expect(client().getContext('tea')).rejects.toBeInstanceOf(AuthenticationError);
    });
  });

  // ── Conversations ─────────────────────────────────────────────────────────

  it('stores a conversation as a user/assistant pair', async () => {
    const memory = client();
    await memory.storeConversation('I moved to Lisbon', 'Nice, noted!');

    expect(api.extracted).toEqual([
      [
        { role: 'user', content: 'I moved to Lisbon' },
        { role: 'assistant', content: 'Nice, noted!' },
      ],
    ]);
  });

  it('resolves getConversation to null on 404', async () => {
    await expect(client().getConversation('conv-404')).resolves.toBeNull();
  });

  it('rethrows other getConversation failures', async () => {
    api.failNext(500);
    await expect(client({ maxRetries: 0 }).getConversation('conv-1')).rejects.toBeInstanceOf(ServerError);
  });

  // ── remember ──────────────────────────────────────────────────────────────

  it('remember injects context and stores the exchange', async () => {
    api.seed(USER, 'Likes green tea');
    const memory = client({ autoCompress: false });

    const chat = memory.remember(async (message: string, memoryContext: string) => `${memoryContext ? 'with' : 'without'} context: ${message}`);
    const reply = await chat('What tea do I like?');

    expect(reply).toBe('with context: What tea do I like?');
    expect(api.calls.map((c) => `${c.method} ${c.path}`)).toEqual(['POST /memories/search', 'POST /conversations/extract']);
    expect(api.extracted).toEqual([
      [
        { role: 'user', content: 'What tea do I like?' },
        { role: 'assistant', content: 'with context: What tea do I like?' },
      ],
    ]);
  });

  // ── Graph and versions ────────────────────────────────────────────────────

  it('links memories and finds the path between them', async () => {
    const memory = client();
    const a = await memory.store('Started learning Rust');
    const b = await memory.store('Built a CLI in Rust');

    await memory.link(a.id, b.id, 'extends');
    const path = await memory.findPath(a.id, b.id);

    expect(api.links).toEqual([{ source_id: a.id, target_id: b.id, relationship_type: 'extends' }]);
    expect(path.path).toEqual([a.id, b.id]);
    expect(path.memories?.map((m) => m.content)).toEqual(['Started learning Rust', 'Built a CLI in Rust']);
  });

  it('records a version for each update', async () => {
    const memory = client();
    const { id } = await memory.store('v1 text');
    await memory.updateMemory(id, { content: 'v2 text' });

    const versions = await memory.getVersions(id);
    expect(versions.map((v) => [v.version, v.content])).toEqual([
      [1, 'v1 text'],
      [2, 'v2 text'],
    ]);
    expect(api.calls[2].query).toEqual({ limit: '50' });
  });

  // ── Retries through the facade ────────────────────────────────────────────

  it('retries transient read failures up to maxRetries', async () => {
    api.seed(USER, 'Resilient');
    api.failNext(503).failNext(503);
    const memory = client({ maxRetries: 2 });

    await expect(memory.listMemories()).resolves.toMatchObject([{ content: 'Resilient' }]);
    expect(api.calls).toHaveLength(3);
  });

  it('does not re-send a store after a server error', async () => {
    api.failNext(503);
    const memory = client({ maxRetries: 2 });

    await expect(memory.store('Once only')).rejects.toBeInstanceOf(ServerError);
    expect(api.calls).toHaveLength(1);
    expect(api.memories.size).toBe(0);
  });
});
