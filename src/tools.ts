import { z } from 'zod';
import { ApiError, NotFoundError } from './errors.js';
import {
  textResult,
  formatMemoryList,
  formatMemoryPath,
  formatMemorySearchResults,
  formatStored,
  formatVersions,
} from './format.js';
import type { Memphora } from './memphora.js';
import { RELATIONSHIP_TYPES } from './schemas/memory.js';

export type ToolResult = ReturnType<typeof textResult>;

const idArg = z.string().trim().min(1);
const metadataArg = z.record(z.unknown()).optional();

const storeArgs = z.object({ content: z.string().trim().min(1), metadata: metadataArg });
const searchArgs = z.object({ query: z.string().trim().min(1), limit: z.number().int().min(1).max(50).default(10) });
const contextArgs = z.object({ query: z.string().trim().min(1), limit: z.number().int().min(1).max(20).default(5) });
const listArgs = z.object({ limit: z.number().int().min(1).max(100).default(50) });
const updateArgs = z.object({ id: idArg, content: z.string().trim().min(1).optional(), metadata: metadataArg });
const idOnlyArgs = z.object({ id: idArg });
const linkArgs = z.object({ id: idArg, targetId: idArg, relationship: z.enum(RELATIONSHIP_TYPES).default('related') });
const pathArgs = z.object({ sourceId: idArg, targetId: idArg });
const versionArgs = z.object({ id: idArg, limit: z.number().int().min(1).max(100).default(20) });

function describeError(err: unknown): string {
  if (err instanceof ApiError && err.status > 0) return `${err.message} (HTTP ${err.status})`;
  return err instanceof Error ? err.message : String(err);
}

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: Record<string, unknown>): T | string {
  const result = schema.safeParse(args);
  if (result.success) return result.data;
  return result.error.issues.map((i) => `"${i.path.join('.')}" ${i.message.toLowerCase()}`).join('; ');
}

/** MCP tool handlers over a user-bound Memphora client. */
export class ToolHandlers {
  constructor(private memory: Memphora) {}

  async handleStoreMemory(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(storeArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);

    try {
      const memory = await this.memory.store(parsed.content, parsed.metadata ?? {});
      return textResult(formatStored(memory));
    } catch (err) {
      return textResult(`Error storing memory: ${describeError(err)}`, true);
    }
  }

  async handleSearchMemory(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(searchArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);

    try {
      const results = await this.memory.search(parsed.query, { limit: parsed.limit });
      return textResult(formatMemorySearchResults(results, parsed.query));
    } catch (err) {
      return textResult(`Error searching memories: ${describeError(err)}`, true);
    }
  }

  async handleGetContext(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(contextArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);

    try {
      const context = await this.memory.getContext(parsed.query, { limit: parsed.limit });
      return textResult(context || `No stored context for "${parsed.query}".`);
    } catch (err) {
      return textResult(`Error fetching context: ${describeError(err)}`, true);
    }
  }

  async handleListMemories(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(listArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);

    try {
      const results = await this.memory.listMemories(parsed.limit);
      return textResult(formatMemoryList(results));
    } catch (err) {
      return textResult(`Error listing memories: ${describeError(err)}`, true);
    }
  }

  async handleUpdateMemory(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(updateArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);
    if (parsed.content === undefined && parsed.metadata === undefined) {
      return textResult('Error: provide "content" and/or "metadata" to update.', true);
    }

    try {
      const updated = await this.memory.updateMemory(parsed.id, {
        content: parsed.content,
        metadata: parsed.metadata,
      });
      return textResult(`Memory updated: ${updated.id}\n  ${updated.content}`);
    } catch (err) {
      if (err instanceof NotFoundError) return textResult(`Memory not found: ${parsed.id}`);
      return textResult(`Error updating memory: ${describeError(err)}`, true);
    }
  }

  async handleDeleteMemory(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(idOnlyArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);

    try {
      await this.memory.deleteMemory(parsed.id);
      return textResult(`Memory deleted: ${parsed.id}`);
    } catch (err) {
      if (err instanceof NotFoundError) return textResult(`Memory not found: ${parsed.id}`);
      return textResult(`Error deleting memory: ${describeError(err)}`, true);
    }
  }

  async handleLinkMemories(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(linkArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);

    try {
      await this.memory.link(parsed.id, parsed.targetId, parsed.relationship);
      return textResult(`Linked ${parsed.id} -[${parsed.relationship}]-> ${parsed.targetId}`);
    } catch (err) {
      return textResult(`Error linking memories: ${describeError(err)}`, true);
    }
  }

  async handleFindPath(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(pathArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);

    try {
      const result = await this.memory.findPath(parsed.sourceId, parsed.targetId);
      return textResult(formatMemoryPath(result, parsed.sourceId, parsed.targetId));
    } catch (err) {
      return textResult(`Error finding path: ${describeError(err)}`, true);
    }
  }

  async handleMemoryVersions(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(versionArgs, args);
    if (typeof parsed === 'string') return textResult(`Error: ${parsed}`, true);

    try {
      const versions = await this.memory.getVersions(parsed.id, parsed.limit);
      return textResult(formatVersions(versions, parsed.id));
    } catch (err) {
      return textResult(`Error retrieving versions: ${describeError(err)}`, true);
    }
  }
}

/** Route an MCP tool call by name. Unknown names produce an error result. */
export function dispatchTool(
  handlers: ToolHandlers,
  name: string,
  args: Record<string, unknown> = {},
): Promise<ToolResult> {
  switch (name) {
    case 'store_memory':
      return handlers.handleStoreMemory(args);
    case 'search_memory':
      return handlers.handleSearchMemory(args);
    case 'get_context':
      return handlers.handleGetContext(args);
    case 'list_memories':
      return handlers.handleListMemories(args);
    case 'update_memory':
      return handlers.handleUpdateMemory(args);
    case 'delete_memory':
      return handlers.handleDeleteMemory(args);
    case 'link_memories':
      return handlers.handleLinkMemories(args);
    case 'find_path':
      return handlers.handleFindPath(args);
    case 'memory_versions':
      return handlers.handleMemoryVersions(args);
    default:
      return Promise.resolve(textResult(`Unknown tool: ${name}`, true));
  }
}
