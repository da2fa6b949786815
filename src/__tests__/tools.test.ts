import { describe, it, expect, beforeEach } from 'vitest';
import { ToolHandlers, dispatchTool } from '../tools.js';
import { TOOL_DEFINITIONS } from '../tool-schemas.js';
import { Memphora } from '../memphora.js';
import { createLogger } from '../logger.js';
import { MockMemphoraApi, MOCK_BASE_URL } from '../__test__/mock-api.js';

const USER = 'user-1';

describe('ToolHandlers', () => {
  let api: MockMemphoraApi;
  let handlers: ToolHandlers;

  beforeEach(() => {
    api = new MockMemphoraApi();
    const memory = new Memphora(
      {
        userId: USER,
        apiKey: 'test-key',
        apiUrl: MOCK_BASE_URL,
        autoCompress: false,
        maxRetries: 0,
        fetch: api.fetch,
        logger: createLogger('silent'),
      },
      {},
    );
    handlers = new ToolHandlers(memory);
  });

  describe('handleStoreMemory', () => {
    it('returns error when content is missing', async () => {
      const result = await handlers.handleStoreMemory({});
      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe('Error: "content" required');
    });

    it('stores the memory with metadata', async () => {
      const result = await handlers.handleStoreMemory({ content: 'Prefers tabs', metadata: { topic: 'style' } });
      expect(result.content[0].text).toBe('Memory stored: mem-1\n  Prefers tabs');
      expect(api.memories.get('mem-1')?.metadata).toEqual({ topic: 'style' });
    });

    it('reports API failures as tool errors', async () => {
      api.failNext(401, { detail: 'Invalid API key' });
      const result = await handlers.handleStoreMemory({ content: 'x' });
      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe('Error storing memory: Invalid API key (HTTP 401)');
    });
  });

  describe('handleSearchMemory', () => {
    it('returns error when query is missing', async () => {
      const result = await handlers.handleSearchMemory({});
      expect(result.isError).toBe(true);
      expect(result.content[0].text).toContain('"query"');
    });

    it('rejects a limit above the maximum', async () => {
      const result = await handlers.handleSearchMemory({ query: 'tea', limit: 500 });
      expect(result.isError).toBe(true);
      expect(result.content[0].text).toContain('"limit"');
    });

    it('formats matches', async () => {
      api.seed(USER, 'Likes green tea');
      const result = await handlers.handleSearchMemory({ query: 'tea', limit: 3 });
      expect(result.content[0].text).toBe(
        'Found 1 memory(ies) for "tea":\n\n1. Likes green tea\n   ID: mem-1 | Score: 1.00\n   Created: 2024-05-01T10:00:00Z\n',
      );
      expect(api.calls[0].body).toMatchObject({ limit: 3 });
    });
  });

  describe('handleGetContext', () => {
    it('returns formatted context', async () => {
      api.seed(USER, 'Likes green tea');
      const result = await handlers.handleGetContext({ query: 'tea' });
      expect(result.content[0].text).toBe('Relevant context from past conversations:\n- Likes green tea');
    });

    it('says so when nothing is stored', async () => {
      const result = await handlers.handleGetContext({ query: 'tea' });
      expect(result.isError).toBeUndefined();
      expect(result.content[0].text).toBe('No stored context for "tea".');
    });
  });

  describe('handleListMemories', () => {
    it('lists with the default limit', async () => {
      api.seed(USER, 'Has a cat');
      const result = await handlers.handleListMemories({});
      expect(result.content[0].text).toBe('Stored Memories (1):\n\n  - Has a cat  [mem-1] (2024-05-01)');
      expect(api.calls[0].query).toEqual({ limit: '50' });
    });
  });

  describe('handleUpdateMemory', () => {
    it('requires content or metadata', async () => {
      const result = await handlers.handleUpdateMemory({ id: 'mem-1' });
      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe('Error: provide "content" and/or "metadata" to update.');
    });

    it('updates an existing memory', async () => {
      api.seed(USER, 'Lives in Porto');
      const result = await handlers.handleUpdateMemory({ id: 'mem-1', content: 'Lives in Lisbon' });
      expect(result.content[0].text).toBe('Memory updated: mem-1\n  Lives in Lisbon');
    });

    it('reports a missing memory without flagging an error', async () => {
      const result = await handlers.handleUpdateMemory({ id: 'nope', content: 'x' });
      expect(result.isError).toBeUndefined();
      expect(result.content[0].text).toBe('Memory not found: nope');
    });
  });

  describe('handleDeleteMemory', () => {
    it('deletes an existing memory', async () => {
      api.seed(USER, 'Temporary');
      const result = await handlers.handleDeleteMemory({ id: 'mem-1' });
      expect(result.content[0].text).toBe('Memory deleted: mem-1');
      expect(api.memories.size).toBe(0);
    });

    it('reports a missing memory', async () => {
      const result = await handlers.handleDeleteMemory({ id: 'nope' });
      expect(result.content[0].text).toBe('Memory not found: nope');
    });
  });

  describe('graph tools', () => {
    it('links two memories with the default relationship', async () => {
      const result = await handlers.handleLinkMemories({ id: 'mem-1', targetId: 'mem-2' });
      expect(result.content[0].text).toBe('Linked mem-1 -[related]-> mem-2');
      expect(api.calls[0].query).toEqual({ target_id: 'mem-2', relationship_type: 'related' });
    });

    it('rejects an unknown relationship', async () => {
      const result = await handlers.handleLinkMemories({ id: 'mem-1', targetId: 'mem-2', relationship: 'likes' });
      expect(result.isError).toBe(true);
      expect(api.calls).toHaveLength(0);
    });

    it('finds a path after linking', async () => {
      api.seed(USER, 'Start');
      api.seed(USER, 'End');
      await handlers.handleLinkMemories({ id: 'mem-1', targetId: 'mem-2', relationship: 'supports' });

      const result = await handlers.handleFindPath({ sourceId: 'mem-1', targetId: 'mem-2' });
      expect(result.content[0].text).toBe('Path from mem-1 to mem-2 (2 memories):\n  1. [mem-1] Start\n  2. [mem-2] End');
    });
  });

  describe('handleMemoryVersions', () => {
    it('lists versions', async () => {
      api.seed(USER, 'First');
      const result = await handlers.handleMemoryVersions({ id: 'mem-1' });
      expect(result.content[0].text).toBe(
        'Versions of memory mem-1 (1):\n\n  v1 create 2024-05-01T10:00:00Z\n    First',
      );
      expect(api.calls[0].query).toEqual({ limit: '20' });
    });
  });

  describe('dispatchTool', () => {
    it('routes every defined tool', async () => {
      for (const tool of TOOL_DEFINITIONS) {
        const result = await dispatchTool(handlers, tool.name, {});
        expect(result.content[0].text).not.toContain('Unknown tool');
      }
    });

    it('rejects unknown tools', async () => {
      const result = await dispatchTool(handlers, 'index_codebase');
      expect(result).toEqual({ content: [{ type: 'text', text: 'Unknown tool: index_codebase' }], isError: true });
    });
  });
});
