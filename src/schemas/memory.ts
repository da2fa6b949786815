import { z } from 'zod';
import { MetadataSchema } from './common.js';

export const RELATIONSHIP_TYPES = ['related', 'contradicts', 'supports', 'extends'] as const;
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export const MERGE_STRATEGIES = ['combine', 'keep_latest', 'keep_most_relevant'] as const;
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export const SORT_ORDERS = ['relevance', 'recency', 'importance'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export const MemorySchema = z
  .object({
    id: z.string(),
    content: z.string(),
    metadata: MetadataSchema.default({}),
    user_id: z.string().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    score: z.number().optional(),
  })
  .passthrough();
export type Memory = z.infer<typeof MemorySchema>;

export const MemoryListSchema = z.array(MemorySchema);

export const MemoryVersionSchema = z
  .object({
    id: z.string(),
    memory_id: z.string().optional(),
    version: z.number(),
    content: z.string(),
    metadata: MetadataSchema.optional(),
    change_type: z.string().optional(),
    created_at: z.string().optional(),
  })
  .passthrough();
export type MemoryVersion = z.infer<typeof MemoryVersionSchema>;

export const MemoryVersionListSchema = z.array(MemoryVersionSchema);

export const MemoryContextGraphSchema = z
  .object({
    memory: MemorySchema.optional(),
    related_memories: z.array(MemorySchema).default([]),
  })
  .passthrough();
export type MemoryContextGraph = z.infer<typeof MemoryContextGraphSchema>;

export const MemoryPathSchema = z
  .object({
    path: z.array(z.string()).optional(),
    memories: z.array(MemorySchema).optional(),
    length: z.number().optional(),
  })
  .passthrough();
export type MemoryPath = z.infer<typeof MemoryPathSchema>;

export const LinkResultSchema = z
  .object({
    source_id: z.string().optional(),
    target_id: z.string().optional(),
    relationship_type: z.string().optional(),
  })
  .passthrough();
export type LinkResult = z.infer<typeof LinkResultSchema>;

/** Result of the server-side token-budgeted search endpoints. */
export const OptimizedContextSchema = z
  .object({
    context: z.string().default(''),
    memories: z.array(MemorySchema).optional(),
  })
  .passthrough();
export type OptimizedContext = z.infer<typeof OptimizedContextSchema>;

export const ImportResultSchema = z
  .object({
    count: z.number().optional(),
    memories: z.array(MemorySchema).optional(),
  })
  .passthrough();
export type ImportResult = z.infer<typeof ImportResultSchema>;
