import { RELATIONSHIP_TYPES } from './schemas/memory.js';

const GET_CONTEXT_DESCRIPTION = `\
Fetch prompt-ready context for a question from the user's stored memories.

Call this before answering anything that may depend on what the user said in earlier sessions \
(preferences, projects, people, decisions). Returns a short bullet list, or an empty result \
when nothing relevant is stored.`;

const STORE_DESCRIPTION = `\
Store a memory for the configured user.

Store durable facts, not whole transcripts: one preference, decision or fact per call. \
Metadata is an optional flat object (e.g. {"topic": "travel"}).`;

export const TOOL_DEFINITIONS = [
  {
    name: 'store_memory',
    description: STORE_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        content: {
          type: 'string',
          description: 'The memory text to store.',
        },
        metadata: {
          type: 'object',
          description: 'Optional key-value metadata.',
        },
      },
      required: ['content'],
    },
  },
  {
    name: 'search_memory',
    description: 'Search stored memories using natural language. Returns memories ranked by relevance.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: {
          type: 'string',
          description: 'Natural language query to search memories.',
        },
        limit: {
          type: 'number',
          description: 'Maximum number of results.',
          default: 10,
          maximum: 50,
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'get_context',
    description: GET_CONTEXT_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: {
          type: 'string',
          description: 'The question or message to gather context for.',
        },
        limit: {
          type: 'number',
          description: 'Maximum number of memories to draw from.',
          default: 5,
          maximum: 20,
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'list_memories',
    description: 'List stored memories for the configured user, newest first as returned by the service.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: {
          type: 'number',
          description: 'Maximum number of memories to return.',
          default: 50,
          maximum: 100,
        },
      },
      required: [],
    },
  },
  {
    name: 'update_memory',
    description: 'Replace the content and/or metadata of an existing memory. The previous content is kept as a version.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: {
          type: 'string',
          description: 'The ID of the memory to update.',
        },
        content: {
          type: 'string',
          description: 'New content.',
        },
        metadata: {
          type: 'object',
          description: 'New metadata (replaces the existing object).',
        },
      },
      required: ['id'],
    },
  },
  {
    name: 'delete_memory',
    description: 'Delete a specific memory by its ID.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: {
          type: 'string',
          description: 'The ID of the memory to delete.',
        },
      },
      required: ['id'],
    },
  },
  {
    name: 'link_memories',
    description: 'Create a typed relationship from one memory to another in the memory graph.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: {
          type: 'string',
          description: 'Source memory ID.',
        },
        targetId: {
          type: 'string',
          description: 'Target memory ID.',
        },
        relationship: {
          type: 'string',
          description: 'Relationship kind.',
          enum: [...RELATIONSHIP_TYPES],
          default: 'related',
        },
      },
      required: ['id', 'targetId'],
    },
  },
  {
    name: 'find_path',
    description: 'Find the shortest chain of linked memories between two memories.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        sourceId: {
          type: 'string',
          description: 'Start memory ID.',
        },
        targetId: {
          type: 'string',
          description: 'End memory ID.',
        },
      },
      required: ['sourceId', 'targetId'],
    },
  },
  {
    name: 'memory_versions',
    description: 'View the stored versions of a memory, oldest changes included.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: {
          type: 'string',
          description: 'The ID of the memory to view versions for.',
        },
        limit: {
          type: 'number',
          description: 'Maximum number of versions.',
          default: 20,
        },
      },
      required: ['id'],
    },
  },
] as const;

export type ToolName = (typeof TOOL_DEFINITIONS)[number]['name'];
