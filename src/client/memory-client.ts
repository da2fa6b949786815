import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { encodePath, type HttpTransport } from '../http/transport.js';
import {
  AuditLogListSchema,
  DeleteResultSchema,
  HealthSchema,
  RecordSchema,
  type DeleteResult,
  type Health,
  type JsonRecord,
  type Metadata,
} from '../schemas/common.js';
import {
  ConversationListSchema,
  ConversationSchema,
  type Conversation,
  type Message,
  type SummaryType,
} from '../schemas/conversation.js';
import {
  ImportResultSchema,
  LinkResultSchema,
  MemoryContextGraphSchema,
  MemoryListSchema,
  MemoryPathSchema,
  MemorySchema,
  MemoryVersionListSchema,
  MemoryVersionSchema,
  OptimizedContextSchema,
  type ImportResult,
  type LinkResult,
  type Memory,
  type MemoryContextGraph,
  type MemoryPath,
  type MemoryVersion,
  type MergeStrategy,
  type OptimizedContext,
  type RelationshipType,
  type SortOrder,
} from '../schemas/memory.js';
import { WebhookListSchema, WebhookSchema, type Webhook } from '../schemas/webhook.js';

export type RerankProvider = 'auto' | 'cohere' | 'jina';
export type ExportFormat = 'json' | 'csv';

export interface SearchOptions {
  limit?: number;
  /** Rerank results with an external provider before returning them. */
  rerank?: boolean;
  rerankProvider?: RerankProvider;
  cohereApiKey?: string;
  jinaApiKey?: string;
}

export interface AdvancedSearchOptions {
  limit?: number;
  filters?: Metadata;
  includeRelated?: boolean;
  minScore?: number;
  sortBy?: SortOrder;
}

export interface OptimizedSearchOptions {
  maxTokens?: number;
  maxMemories?: number;
  useCompression?: boolean;
  useCache?: boolean;
}

export type EnhancedSearchOptions = Omit<OptimizedSearchOptions, 'useCache'>;

export interface MemoryUpdate {
  content?: string;
  metadata?: Metadata;
}

export interface BatchMemoryInput {
  content: string;
  metadata?: Metadata;
}

export interface StoreImageOptions {
  imageUrl?: string;
  imageBase64?: string;
  description?: string;
  metadata?: Metadata;
}

export interface AgentMemoryInput {
  agentId: string;
  content: string;
  runId?: string;
  metadata?: Metadata;
}

export interface WebhookInput {
  url: string;
  events: string[];
  secret?: string;
}

export interface WebhookUpdate {
  url?: string;
  events?: string[];
  secret?: string;
  active?: boolean;
}

export interface RetentionPolicyInput {
  dataType: string;
  retentionDays: number;
  organizationId?: string;
  userId?: string;
  autoDelete?: boolean;
}

export interface ComplianceEventInput {
  complianceType: string;
  eventType: string;
  userId?: string;
  organizationId?: string;
  dataSubjectId?: string;
  details?: JsonRecord;
}

const RecordListSchema = z.array(RecordSchema);

function requireString(name: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`"${name}" must be a non-empty string.`);
  }
  return value;
}

function requireArray<T>(name: string, value: T[] | undefined, min = 0): T[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`"${name}" must be an array.`);
  }
  if (value.length < min) {
    throw new ValidationError(`"${name}" must contain at least ${min} item(s).`);
  }
  return value;
}

function requireNumber(name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`"${name}" must be a finite number.`);
  }
  return value;
}

function requireMessages(conversation: Message[] | undefined): Message[] {
  const messages = requireArray('conversation', conversation, 1);
  for (const [i, m] of messages.entries()) {
    if (!m || typeof m.role !== 'string' || typeof m.content !== 'string') {
      throw new ValidationError(`"conversation[${i}]" must have string "role" and "content".`);
    }
  }
  return messages;
}

/**
 * Endpoint-per-method client for the Memphora REST API.
 * Identifiers are explicit on every call; see Memphora for a user-bound facade.
 */
export class MemoryClient {
  constructor(private readonly http: HttpTransport) {}

  get baseUrl(): string {
    return this.http.baseUrl;
  }

  // ── Memories ──────────────────────────────────────────────────────────────

  async addMemory(userId: string, content: string, metadata: Metadata = {}): Promise<Memory> {
    return this.http.request('POST', '/memories', {
      body: { user_id: requireString('userId', userId), content: requireString('content', content), metadata },
      schema: MemorySchema,
    });
  }

  async getMemory(memoryId: string): Promise<Memory> {
    requireString('memoryId', memoryId);
    return this.http.request('GET', encodePath`/memories/${memoryId}`, { schema: MemorySchema });
  }

  async getUserMemories(userId: string, limit = 100): Promise<Memory[]> {
    requireString('userId', userId);
    return this.http.request('GET', encodePath`/memories/user/${userId}`, {
      query: { limit },
      schema: MemoryListSchema,
    });
  }

  async searchMemories(userId: string, query: string, options: SearchOptions = {}): Promise<Memory[]> {
    const body: Record<string, unknown> = {
      user_id: requireString('userId', userId),
      query: requireString('query', query),
      limit: options.limit ?? 5,
      rerank: options.rerank ?? false,
      rerank_provider: options.rerankProvider ?? 'auto',
    };
    if (options.cohereApiKey) body.cohere_api_key = options.cohereApiKey;
    if (options.jinaApiKey) body.jina_api_key = options.jinaApiKey;

    return this.http.request('POST', '/memories/search', { body, schema: MemoryListSchema });
  }

  async updateMemory(memoryId: string, update: MemoryUpdate): Promise<Memory> {
    requireString('memoryId', memoryId);
    const body: Record<string, unknown> = {};
    if (update.content !== undefined) body.content = requireString('content', update.content);
    if (update.metadata !== undefined) body.metadata = update.metadata;
    if (Object.keys(body).length === 0) {
      throw new ValidationError('Provide "content" and/or "metadata" to update.');
    }
    return this.http.request('PUT', encodePath`/memories/${memoryId}`, { body, schema: MemorySchema });
  }

  async deleteMemory(memoryId: string): Promise<true> {
    requireString('memoryId', memoryId);
    await this.http.request('DELETE', encodePath`/memories/${memoryId}`);
    return true;
  }

  async extractFromConversation(userId: string, conversation: Message[]): Promise<Memory[]> {
    return this.http.request('POST', '/conversations/extract', {
      body: { user_id: requireString('userId', userId), conversation: requireMessages(conversation) },
      schema: MemoryListSchema,
    });
  }

  async extractFromContent(userId: string, content: string, metadata: Metadata = {}): Promise<Memory[]> {
    return this.http.request('POST', '/memories/extract', {
      body: { user_id: requireString('userId', userId), content: requireString('content', content), metadata },
      schema: MemoryListSchema,
    });
  }

  async createAdvancedMemory(
    userId: string,
    content: string,
    metadata: Metadata = {},
    linkTo: string[] = [],
  ): Promise<Memory> {
    return this.http.request('POST', '/memories/advanced', {
      body: {
        user_id: requireString('userId', userId),
        content: requireString('content', content),
        metadata,
        link_to: requireArray('linkTo', linkTo),
      },
      schema: MemorySchema,
    });
  }

  async searchAdvanced(userId: string, query: string, options: AdvancedSearchOptions = {}): Promise<Memory[]> {
    return this.http.request('POST', '/memories/search/advanced', {
      body: {
        user_id: requireString('userId', userId),
        query: requireString('query', query),
        limit: options.limit ?? 5,
        filters: options.filters ?? {},
        include_related: options.includeRelated ?? false,
        min_score: options.minScore ?? 0,
        sort_by: options.sortBy ?? 'relevance',
      },
      schema: MemoryListSchema,
    });
  }

  async batchCreate(userId: string, memories: BatchMemoryInput[], linkRelated = true): Promise<Memory[]> {
    const items = requireArray('memories', memories, 1);
    items.forEach((m, i) => requireString(`memories[${i}].content`, m?.content));
    return this.http.request('POST', '/memories/batch', {
      body: {
        user_id: requireString('userId', userId),
        memories: items.map((m) => ({ content: m.content, metadata: m.metadata ?? {} })),
        link_related: linkRelated,
      },
      schema: MemoryListSchema,
    });
  }

  async mergeMemories(memoryIds: string[], strategy: MergeStrategy = 'combine'): Promise<Memory> {
    const ids = requireArray('memoryIds', memoryIds, 2);
    ids.forEach((id, i) => requireString(`memoryIds[${i}]`, id));
    return this.http.request('POST', '/memories/merge', {
      body: { memory_ids: ids, merge_strategy: strategy },
      schema: MemorySchema,
    });
  }

  async findContradictions(memoryId: string, similarityThreshold = 0.7): Promise<Memory[]> {
    requireString('memoryId', memoryId);
    return this.http.request('GET', encodePath`/memories/${memoryId}/contradictions`, {
      query: { similarity_threshold: requireNumber('similarityThreshold', similarityThreshold) },
      schema: MemoryListSchema,
    });
  }

  async deleteAllUserMemories(userId: string): Promise<DeleteResult> {
    requireString('userId', userId);
    return this.http.request('DELETE', encodePath`/users/${userId}/memories`, { schema: DeleteResultSchema });
  }

  async getSummary(userId: string): Promise<JsonRecord> {
    requireString('userId', userId);
    return this.http.request('GET', encodePath`/memory/summary/${userId}`, { schema: RecordSchema });
  }

  // ── Graph ─────────────────────────────────────────────────────────────────

  async linkMemories(
    memoryId: string,
    targetId: string,
    relationshipType: RelationshipType = 'related',
  ): Promise<LinkResult> {
    requireString('memoryId', memoryId);
    return this.http.request('POST', encodePath`/memories/${memoryId}/link`, {
      query: { target_id: requireString('targetId', targetId), relationship_type: relationshipType },
      schema: LinkResultSchema,
    });
  }

  async getMemoryContext(memoryId: string, depth = 2): Promise<MemoryContextGraph> {
    requireString('memoryId', memoryId);
    return this.http.request('GET', encodePath`/memories/${memoryId}/context`, {
      query: { depth },
      schema: MemoryContextGraphSchema,
    });
  }

  async findMemoryPath(sourceId: string, targetId: string): Promise<MemoryPath> {
    requireString('sourceId', sourceId);
    requireString('targetId', targetId);
    return this.http.request('GET', encodePath`/memories/${sourceId}/path/${targetId}`, {
      schema: MemoryPathSchema,
    });
  }

  // ── Export / import / statistics ──────────────────────────────────────────

  async exportMemories(userId: string, format: ExportFormat = 'json'): Promise<JsonRecord> {
    requireString('userId', userId);
    return this.http.request('GET', encodePath`/users/${userId}/export`, {
      query: { format },
      schema: RecordSchema,
    });
  }

  async importMemories(userId: string, data: string, format: ExportFormat = 'json'): Promise<ImportResult> {
    requireString('userId', userId);
    return this.http.request('POST', encodePath`/users/${userId}/import`, {
      query: { format },
      body: { data: requireString('data', data) },
      schema: ImportResultSchema,
    });
  }

  async getUserStatistics(userId: string): Promise<JsonRecord> {
    requireString('userId', userId);
    return this.http.request('GET', encodePath`/users/${userId}/statistics`, { schema: RecordSchema });
  }

  async getGlobalStatistics(): Promise<JsonRecord> {
    return this.http.request('GET', '/statistics', { schema: RecordSchema });
  }

  // ── Versioning ────────────────────────────────────────────────────────────

  async getMemoryVersions(memoryId: string, limit = 50): Promise<MemoryVersion[]> {
    requireString('memoryId', memoryId);
    return this.http.request('GET', encodePath`/memories/${memoryId}/versions`, {
      query: { limit },
      schema: MemoryVersionListSchema,
    });
  }

  async getVersion(versionId: string): Promise<MemoryVersion> {
    requireString('versionId', versionId);
    return this.http.request('GET', encodePath`/versions/${versionId}`, { schema: MemoryVersionSchema });
  }

  async getVersionHistory(memoryId: string, fromVersion?: number, toVersion?: number): Promise<JsonRecord[]> {
    requireString('memoryId', memoryId);
    return this.http.request('GET', encodePath`/memories/${memoryId}/history`, {
      query: { from_version: fromVersion, to_version: toVersion },
      schema: RecordListSchema,
    });
  }

  async rollbackMemory(memoryId: string, targetVersion: number, userId: string): Promise<JsonRecord> {
    requireString('memoryId', memoryId);
    return this.http.request('POST', encodePath`/memories/${memoryId}/rollback`, {
      query: { user_id: requireString('userId', userId) },
      body: { target_version: requireNumber('targetVersion', targetVersion) },
      schema: RecordSchema,
    });
  }

  async compareVersions(versionId1: string, versionId2: string): Promise<JsonRecord> {
    return this.http.request('GET', '/versions/compare', {
      query: {
        version_id_1: requireString('versionId1', versionId1),
        version_id_2: requireString('versionId2', versionId2),
      },
      schema: RecordSchema,
    });
  }

  // ── Conversations ─────────────────────────────────────────────────────────

  async recordConversation(
    userId: string,
    conversation: Message[],
    platform = 'unknown',
    metadata: Metadata = {},
  ): Promise<Conversation> {
    return this.http.request('POST', '/conversations/record', {
      body: {
        user_id: requireString('userId', userId),
        conversation: requireMessages(conversation),
        platform: platform || 'unknown',
        metadata,
      },
      schema: ConversationSchema,
    });
  }

  async getConversation(conversationId: string): Promise<Conversation> {
    requireString('conversationId', conversationId);
    return this.http.request('GET', encodePath`/conversations/${conversationId}`, { schema: ConversationSchema });
  }

  async getUserConversations(userId: string, platform?: string, limit = 50): Promise<Conversation[]> {
    requireString('userId', userId);
    return this.http.request('GET', encodePath`/conversations/user/${userId}`, {
      query: { limit, platform: platform || undefined },
      schema: ConversationListSchema,
    });
  }

  async summarizeConversation(conversation: Message[], summaryType: SummaryType = 'brief'): Promise<JsonRecord> {
    return this.http.request('POST', '/conversations/summarize', {
      body: { conversation: requireMessages(conversation), summary_type: summaryType },
      schema: RecordSchema,
    });
  }

  // ── Token-budgeted search ─────────────────────────────────────────────────

  async searchOptimized(userId: string, query: string, options: OptimizedSearchOptions = {}): Promise<OptimizedContext> {
    return this.http.request('POST', '/memories/search/optimized', {
      body: {
        user_id: requireString('userId', userId),
        query: requireString('query', query),
        max_tokens: options.maxTokens ?? 2000,
        max_memories: options.maxMemories ?? 20,
        use_compression: options.useCompression ?? true,
        use_cache: options.useCache ?? true,
      },
      schema: OptimizedContextSchema,
    });
  }

  async searchEnhanced(userId: string, query: string, options: EnhancedSearchOptions = {}): Promise<OptimizedContext> {
    return this.http.request('POST', '/memories/search/enhanced', {
      body: {
        user_id: requireString('userId', userId),
        query: requireString('query', query),
        max_tokens: options.maxTokens ?? 2000,
        max_memories: options.maxMemories ?? 20,
        use_compression: options.useCompression ?? true,
      },
      schema: OptimizedContextSchema,
    });
  }

  async conciseText(text: string): Promise<JsonRecord> {
    return this.http.request('POST', '/text/conciser', {
      body: { text: requireString('text', text) },
      schema: RecordSchema,
    });
  }

  // ── Images ────────────────────────────────────────────────────────────────

  async storeImage(userId: string, options: StoreImageOptions): Promise<Memory> {
    requireString('userId', userId);
    if (!options.imageUrl && !options.imageBase64) {
      throw new ValidationError('Provide "imageUrl" or "imageBase64".');
    }
    return this.http.request('POST', '/memories/image', {
      body: {
        user_id: userId,
        image_url: options.imageUrl ?? null,
        image_base64: options.imageBase64 ?? null,
        description: options.description ?? null,
        metadata: options.metadata ?? {},
      },
      schema: MemorySchema,
    });
  }

  async uploadImage(userId: string, data: Uint8Array, filename: string, metadata: Metadata = {}): Promise<Memory> {
    requireString('userId', userId);
    requireString('filename', filename);
    if (!(data instanceof Uint8Array) || data.byteLength === 0) {
      throw new ValidationError('"data" must be a non-empty Uint8Array.');
    }
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(data)]), filename);
    if (Object.keys(metadata).length > 0) form.append('metadata', JSON.stringify(metadata));

    return this.http.request('POST', '/memories/image/upload', {
      query: { user_id: userId },
      form,
      schema: MemorySchema,
    });
  }

  async searchImages(userId: string, query: string, limit = 5): Promise<Memory[]> {
    return this.http.request('POST', '/memories/image/search', {
      body: { user_id: requireString('userId', userId), query: requireString('query', query), limit },
      schema: MemoryListSchema,
    });
  }

  // ── Agent and group namespaces ────────────────────────────────────────────

  async storeAgentMemory(userId: string, input: AgentMemoryInput): Promise<Memory> {
    return this.http.request('POST', '/agents/memories', {
      body: {
        user_id: requireString('userId', userId),
        agent_id: requireString('agentId', input.agentId),
        content: requireString('content', input.content),
        run_id: input.runId ?? null,
        metadata: input.metadata ?? {},
      },
      schema: MemorySchema,
    });
  }

  async searchAgentMemories(
    userId: string,
    agentId: string,
    query: string,
    options: { runId?: string; limit?: number } = {},
  ): Promise<Memory[]> {
    return this.http.request('POST', '/agents/memories/search', {
      body: {
        user_id: requireString('userId', userId),
        agent_id: requireString('agentId', agentId),
        query: requireString('query', query),
        run_id: options.runId ?? null,
        limit: options.limit ?? 10,
      },
      schema: MemoryListSchema,
    });
  }

  async getAgentMemories(userId: string, agentId: string, limit = 100): Promise<Memory[]> {
    requireString('agentId', agentId);
    return this.http.request('GET', encodePath`/agents/${agentId}/memories`, {
      query: { user_id: requireString('userId', userId), limit },
      schema: MemoryListSchema,
    });
  }

  async storeGroupMemory(userId: string, groupId: string, content: string, metadata: Metadata = {}): Promise<Memory> {
    return this.http.request('POST', '/groups/memories', {
      body: {
        user_id: requireString('userId', userId),
        group_id: requireString('groupId', groupId),
        content: requireString('content', content),
        metadata,
      },
      schema: MemorySchema,
    });
  }

  async searchGroupMemories(userId: string, groupId: string, query: string, limit = 10): Promise<Memory[]> {
    return this.http.request('POST', '/groups/memories/search', {
      body: {
        user_id: requireString('userId', userId),
        group_id: requireString('groupId', groupId),
        query: requireString('query', query),
        limit,
      },
      schema: MemoryListSchema,
    });
  }

  async getGroupContext(userId: string, groupId: string, limit = 50): Promise<JsonRecord> {
    requireString('groupId', groupId);
    return this.http.request('GET', encodePath`/groups/${groupId}/context`, {
      query: { user_id: requireString('userId', userId), limit },
      schema: RecordSchema,
    });
  }

  // ── Analytics ─────────────────────────────────────────────────────────────

  async getUserAnalytics(userId: string): Promise<JsonRecord> {
    requireString('userId', userId);
    return this.http.request('GET', encodePath`/analytics/user-stats/${userId}`, { schema: RecordSchema });
  }

  async getMemoryGrowth(userId: string, days = 30): Promise<JsonRecord> {
    return this.http.request('GET', '/analytics/memory-growth', {
      query: { days, user_id: requireString('userId', userId) },
      schema: RecordSchema,
    });
  }

  // ── Webhooks ──────────────────────────────────────────────────────────────

  async createWebhook(input: WebhookInput): Promise<Webhook> {
    const events = requireArray('events', input.events, 1);
    return this.http.request('POST', '/webhooks', {
      body: { url: requireString('url', input.url), events, secret: input.secret ?? null },
      schema: WebhookSchema,
    });
  }

  async listWebhooks(userId?: string): Promise<Webhook[]> {
    return this.http.request('GET', '/webhooks', {
      query: { user_id: userId || undefined },
      schema: WebhookListSchema,
    });
  }

  async getWebhook(webhookId: string): Promise<Webhook> {
    requireString('webhookId', webhookId);
    return this.http.request('GET', encodePath`/webhooks/${webhookId}`, { schema: WebhookSchema });
  }

  async updateWebhook(webhookId: string, update: WebhookUpdate): Promise<Webhook> {
    requireString('webhookId', webhookId);
    const body: Record<string, unknown> = {};
    if (update.url !== undefined) body.url = update.url;
    if (update.events !== undefined) body.events = update.events;
    if (update.secret !== undefined) body.secret = update.secret;
    if (update.active !== undefined) body.active = update.active;
    return this.http.request('PUT', encodePath`/webhooks/${webhookId}`, { body, schema: WebhookSchema });
  }

  async deleteWebhook(webhookId: string): Promise<JsonRecord> {
    requireString('webhookId', webhookId);
    const result = await this.http.request('DELETE', encodePath`/webhooks/${webhookId}`, {
      schema: RecordSchema.nullable(),
    });
    return result ?? {};
  }

  async testWebhook(webhookId: string): Promise<JsonRecord> {
    requireString('webhookId', webhookId);
    return this.http.request('POST', encodePath`/webhooks/${webhookId}/test`, { schema: RecordSchema });
  }

  // ── Security and compliance ───────────────────────────────────────────────

  async exportGdpr(userId: string): Promise<JsonRecord> {
    requireString('userId', userId);
    return this.http.request('GET', encodePath`/security/compliance/gdpr/export/${userId}`, {
      schema: RecordSchema,
    });
  }

  async deleteGdpr(userId: string): Promise<JsonRecord> {
    requireString('userId', userId);
    return this.http.request('DELETE', encodePath`/security/compliance/gdpr/delete/${userId}`, {
      schema: RecordSchema,
    });
  }

  async setRetentionPolicy(input: RetentionPolicyInput): Promise<JsonRecord> {
    return this.http.request('POST', '/security/retention-policies', {
      body: {
        data_type: requireString('dataType', input.dataType),
        retention_days: requireNumber('retentionDays', input.retentionDays),
        organization_id: input.organizationId ?? null,
        user_id: input.userId ?? null,
        auto_delete: input.autoDelete ?? false,
      },
      schema: RecordSchema,
    });
  }

  async applyRetentionPolicies(scope: { organizationId?: string; userId?: string } = {}): Promise<JsonRecord> {
    return this.http.request('POST', '/security/apply-retention', {
      query: { organization_id: scope.organizationId || undefined, user_id: scope.userId || undefined },
      schema: RecordSchema,
    });
  }

  async recordComplianceEvent(input: ComplianceEventInput): Promise<JsonRecord> {
    return this.http.request('POST', '/security/compliance-events', {
      body: {
        compliance_type: requireString('complianceType', input.complianceType),
        event_type: requireString('eventType', input.eventType),
        user_id: input.userId ?? null,
        organization_id: input.organizationId ?? null,
        data_subject_id: input.dataSubjectId ?? null,
        details: input.details ?? {},
      },
      schema: RecordSchema,
    });
  }

  async getComplianceReport(organizationId: string, complianceType?: string): Promise<JsonRecord> {
    requireString('organizationId', organizationId);
    return this.http.request('GET', encodePath`/security/compliance/report/${organizationId}`, {
      query: { compliance_type: complianceType || undefined },
      schema: RecordSchema,
    });
  }

  async encryptData(data: string): Promise<JsonRecord> {
    return this.http.request('POST', '/security/encrypt', {
      body: { data: requireString('data', data) },
      schema: RecordSchema,
    });
  }

  async decryptData(encryptedData: string): Promise<JsonRecord> {
    return this.http.request('POST', '/security/decrypt', {
      body: { encrypted_data: requireString('encryptedData', encryptedData) },
      schema: RecordSchema,
    });
  }

  // ── Observability ─────────────────────────────────────────────────────────

  async healthCheck(): Promise<Health> {
    return this.http.request('GET', '/health', { schema: HealthSchema });
  }

  async getMetrics(): Promise<JsonRecord> {
    return this.http.request('GET', '/metrics', { schema: RecordSchema });
  }

  async getMetricsSummary(): Promise<JsonRecord> {
    return this.http.request('GET', '/metrics/summary', { schema: RecordSchema });
  }

  async getAuditLogs(userId?: string, limit = 100): Promise<JsonRecord[]> {
    const result = await this.http.request('GET', '/audit-logs', {
      query: { limit, user_id: userId || undefined },
      schema: AuditLogListSchema,
    });
    // The server wraps entries as { logs: [...] }
    return Array.isArray(result) ? result : result.logs;
  }
}
