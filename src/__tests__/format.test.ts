import { describe, it, expect } from 'vitest';
import {
  CONTEXT_HEADER,
  formatContext,
  formatMemoryList,
  formatMemoryPath,
  formatMemorySearchResults,
  formatStored,
  formatVersions,
  textResult,
} from '../format.js';
import type { Memory } from '../schemas/memory.js';

function memory(id: string, content: string, extra: Partial<Memory> = {}): Memory {
  return { id, content, metadata: {}, ...extra };
}

describe('textResult', () => {
  it('wraps text without an error flag', () => {
    expect(textResult('ok')).toEqual({ content: [{ type: 'text', text: 'ok' }] });
  });

  it('sets isError when asked', () => {
    expect(textResult('bad', true)).toEqual({ content: [{ type: 'text', text: 'bad' }], isError: true });
  });
});

describe('formatContext', () => {
  it('returns an empty string for no memories', () => {
    expect(formatContext([])).toBe('');
  });

  it('renders a header and one bullet per memory', () => {
    expect(formatContext([{ content: 'Likes tea' }, { content: '  Lives in Lisbon ' }])).toBe(
      `${CONTEXT_HEADER}\n- Likes tea\n- Lives in Lisbon`,
    );
  });

  it('skips blank contents', () => {
    expect(formatContext([{ content: '   ' }])).toBe('');
    expect(formatContext([{ content: '' }, { content: 'Has a cat' }])).toBe(
      'Relevant context from past conversations:\n- Has a cat',
    );
  });
});

describe('formatStored', () => {
  it('shows id and content', () => {
    expect(formatStored(memory('mem-1', 'Likes tea'))).toBe('Memory stored: mem-1\n  Likes tea');
  });
});

describe('formatMemorySearchResults', () => {
  it('reports no results', () => {
    expect(formatMemorySearchResults([], 'tea')).toBe('No memories found for "tea".');
  });

  it('numbers results with score and creation time', () => {
    const text = formatMemorySearchResults(
      [
        memory('mem-1', 'Likes green tea', { score: 0.9, created_at: '2024-05-01T10:00:00Z' }),
        memory('mem-2', 'Dislikes coffee'),
      ],
      'tea',
    );
    expect(text).toBe(
      [
        'Found 2 memory(ies) for "tea":\n',
        '1. Likes green tea',
        '   ID: mem-1 | Score: 0.90',
        '   Created: 2024-05-01T10:00:00Z',
        '',
        '2. Dislikes coffee',
        '   ID: mem-2',
        '',
      ].join('\n'),
    );
  });
});

describe('formatMemoryList', () => {
  it('prompts to store when empty', () => {
    expect(formatMemoryList([])).toBe('No memories stored yet. Use `store_memory` to add one.');
  });

  it('shows the most recent date', () => {
    const text = formatMemoryList([
      memory('mem-1', 'Likes tea', { created_at: '2024-05-01T10:00:00Z', updated_at: '2024-06-02T08:00:00Z' }),
      memory('mem-2', 'Has a cat'),
    ]);
    expect(text).toBe('Stored Memories (2):\n\n  - Likes tea  [mem-1] (2024-06-02)\n  - Has a cat  [mem-2]');
  });
});

describe('formatVersions', () => {
  it('reports no versions', () => {
    expect(formatVersions([], 'mem-1')).toBe('No versions found for memory mem-1.');
  });

  it('lists each version with its content', () => {
    const text = formatVersions(
      [
        { id: 'v1', version: 1, content: 'Likes tea', change_type: 'create', created_at: '2024-05-01' },
        { id: 'v2', version: 2, content: 'Likes green tea' },
      ],
      'mem-1',
    );
    expect(text).toBe(
      'Versions of memory mem-1 (2):\n\n  v1 create 2024-05-01\n    Likes tea\n  v2\n    Likes green tea',
    );
  });
});

describe('formatMemoryPath', () => {
  it('reports a missing path', () => {
    expect(formatMemoryPath({ path: [], memories: [] }, 'a', 'b')).toBe('No path found between a and b.');
    expect(formatMemoryPath({}, 'a', 'b')).toBe('No path found between a and b.');
  });

  it('lists the memories along the path', () => {
    const text = formatMemoryPath({ memories: [memory('a', 'Start'), memory('b', 'End')] }, 'a', 'b');
    expect(text).toBe('Path from a to b (2 memories):\n  1. [a] Start\n  2. [b] End');
  });

  it('falls back to ids when only the path is returned', () => {
    expect(formatMemoryPath({ path: ['a', 'x', 'b'] }, 'a', 'b')).toBe('Path from a to b: a -> x -> b');
  });
});
