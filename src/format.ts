import type { Memory, MemoryPath, MemoryVersion } from './schemas/memory.js';

export const CONTEXT_HEADER = 'Relevant context from past conversations:';

export function textResult(text: string, isError = false) {
  return {
    content: [{ type: 'text' as const, text }],
    ...(isError ? { isError: true } : {}),
  };
}

/** Render memories as a prompt-ready bullet list; empty input gives ''. */
export function formatContext(memories: Pick<Memory, 'content'>[]): string {
  const lines = memories.map((m) => m.content.trim()).filter((c) => c.length > 0);
  if (lines.length === 0) return '';
  return [CONTEXT_HEADER, ...lines.map((c) => `- ${c}`)].join('\n');
}

export function formatStored(memory: Memory): string {
  return `Memory stored: ${memory.id}\n  ${memory.content}`;
}

export function formatMemorySearchResults(items: Memory[], query: string): string {
  if (items.length === 0) {
    return `No memories found for "${query}".`;
  }

  const lines: string[] = [`Found ${items.length} memory(ies) for "${query}":\n`];

  for (let i = 0; i < items.length; i++) {
    const m = items[i];
    const score = m.score !== undefined ? ` | Score: ${m.score.toFixed(2)}` : '';
    lines.push(`${i + 1}. ${m.content}`);
    lines.push(`   ID: ${m.id}${score}`);
    if (m.created_at) lines.push(`   Created: ${m.created_at}`);
    lines.push('');
  }

  return lines.join('\n');
}

export function formatMemoryList(items: Memory[]): string {
  if (items.length === 0) {
    return 'No memories stored yet. Use `store_memory` to add one.';
  }

  const lines: string[] = [`Stored Memories (${items.length}):\n`];
  for (const m of items) {
    const date = m.updated_at ?? m.created_at;
    const suffix = date ? ` (${date.slice(0, 10)})` : '';
    lines.push(`  - ${m.content}  [${m.id}]${suffix}`);
  }

  return lines.join('\n');
}

export function formatVersions(versions: MemoryVersion[], memoryId: string): string {
  if (versions.length === 0) {
    return `No versions found for memory ${memoryId}.`;
  }

  const lines: string[] = [`Versions of memory ${memoryId} (${versions.length}):\n`];
  for (const v of versions) {
    const change = v.change_type ? ` ${v.change_type}` : '';
    lines.push(`  v${v.version}${change} ${v.created_at ?? ''}`.trimEnd());
    lines.push(`    ${v.content}`);
  }

  return lines.join('\n');
}

export function formatMemoryPath(result: MemoryPath, sourceId: string, targetId: string): string {
  const hops = result.memories ?? [];
  if (hops.length === 0 && (result.path ?? []).length === 0) {
    return `No path found between ${sourceId} and ${targetId}.`;
  }

  if (hops.length > 0) {
    const lines = [`Path from ${sourceId} to ${targetId} (${hops.length} memories):`];
    hops.forEach((m, i) => lines.push(`  ${i + 1}. [${m.id}] ${m.content}`));
    return lines.join('\n');
  }

  return `Path from ${sourceId} to ${targetId}: ${(result.path ?? []).join(' -> ')}`;
}
