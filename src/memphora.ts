import {
  MemoryClient,
  type AdvancedSearchOptions,
  type BatchMemoryInput,
  type ComplianceEventInput,
  type EnhancedSearchOptions,
  type ExportFormat,
  type MemoryUpdate,
  type OptimizedSearchOptions,
  type RetentionPolicyInput,
  type SearchOptions,
  type StoreImageOptions,
  type WebhookInput,
  type WebhookUpdate,
} from './client/memory-client.js';
import { resolveConfig, type Env, type MemphoraConfig, type MemphoraOptions } from './config.js';
import { NotFoundError } from './errors.js';
import { formatContext } from './format.js';
import { HttpTransport } from './http/transport.js';
import { createLogger, type Logger } from './logger.js';
import { remember, type RememberTarget, type Remembered } from './remember.js';
import type { DeleteResult, Health, JsonRecord, Metadata } from './schemas/common.js';
import type { Conversation, Message, SummaryType } from './schemas/conversation.js';
import type {
  ImportResult,
  LinkResult,
  Memory,
  MemoryContextGraph,
  MemoryPath,
  MemoryVersion,
  MergeStrategy,
  OptimizedContext,
  RelationshipType,
} from './schemas/memory.js';
import type { Webhook } from './schemas/webhook.js';

export interface GetContextOptions {
  limit?: number;
}

/**
 * User-bound client for the Memphora memory service.
 *
 * ```ts
 * const memory = new Memphora({ userId: 'user-123', apiKey: process.env.MEMPHORA_API_KEY });
 * await memory.store('Prefers TypeScript over JavaScript');
 * const context = await memory.getContext('Which language should I use?');
 * ```
 *
 * Every method maps to one API request (getContext and getRelatedMemories
 * shape the response) and rejects with an ApiError subclass on failure.
 */
export class Memphora {
  readonly config: MemphoraConfig;
  readonly client: MemoryClient;
  private readonly logger: Logger;

  constructor(options: MemphoraOptions = {}, env: Env = process.env) {
    this.config = resolveConfig(options, env);
    this.logger = options.logger ?? createLogger(this.config.logLevel);

    const transport = new HttpTransport({
      baseUrl: this.config.apiUrl,
      apiKey: this.config.apiKey,
      timeoutMs: this.config.timeoutMs,
      maxRetries: this.config.maxRetries,
      retryBaseDelayMs: options.retryBaseDelayMs,
      fetch: options.fetch,
      logger: this.logger,
    });
    this.client = new MemoryClient(transport);

    this.logger.info(`Memphora SDK initialized for user ${this.config.userId}`);
  }

  get userId(): string {
    return this.config.userId;
  }

  // ── Core ──────────────────────────────────────────────────────────────────

  async store(content: string, metadata: Metadata = {}): Promise<Memory> {
    return this.client.addMemory(this.userId, content, metadata);
  }

  async search(query: string, options: SearchOptions = {}): Promise<Memory[]> {
    return this.client.searchMemories(this.userId, query, { ...options, limit: options.limit ?? 10 });
  }

  /**
   * Prompt-ready context for `query`. With autoCompress the server builds a
   * compressed context within `maxTokens`; otherwise search results are
   * formatted locally.
   */
  async getContext(query: string, options: GetContextOptions = {}): Promise<string> {
    const limit = options.limit ?? 5;
    this.logger.debug('getContext', { userId: this.userId, query: query.slice(0, 50) });

    if (this.config.autoCompress) {
      const result = await this.client.searchOptimized(this.userId, query, {
        maxTokens: this.config.maxTokens,
        maxMemories: limit,
        useCompression: true,
      });
      return result.context;
    }

    const memories = await this.client.searchMemories(this.userId, query, { limit });
    return formatContext(memories);
  }

  /** Send a user/assistant exchange for server-side memory extraction. */
  async storeConversation(userMessage: string, aiResponse: string): Promise<Memory[]> {
    return this.client.extractFromConversation(this.userId, [
      { role: 'user', content: userMessage },
      { role: 'assistant', content: aiResponse },
    ]);
  }

  /** Delete every memory of this user. */
  async clear(): Promise<DeleteResult> {
    return this.client.deleteAllUserMemories(this.userId);
  }

  async getMemory(memoryId: string): Promise<Memory> {
    return this.client.getMemory(memoryId);
  }

  async updateMemory(memoryId: string, update: MemoryUpdate): Promise<Memory> {
    return this.client.updateMemory(memoryId, update);
  }

  async deleteMemory(memoryId: string): Promise<true> {
    return this.client.deleteMemory(memoryId);
  }

  async listMemories(limit = 100): Promise<Memory[]> {
    return this.client.getUserMemories(this.userId, limit);
  }

  /**
   * Wrap a handler so it receives memory context and its exchanges are stored.
   *
   * ```ts
   * const chat = memory.remember(async (message, memoryContext) => llm(`${memoryContext}\n\n${message}`));
   * await chat('What do I like?');
   * ```
   */
  remember<R, TRest extends unknown[] = []>(fn: RememberTarget<R, TRest>): Remembered<R, TRest> {
    return remember(fn, {
      fetchContext: (message) => this.getContext(message),
      store: (message, response) => this.storeConversation(message, response),
      logger: this.logger,
    });
  }

  // ── Conversations ─────────────────────────────────────────────────────────

  /** Resolves null when the conversation does not exist. */
  async getConversation(conversationId: string): Promise<Conversation | null> {
    try {
      return await this.client.getConversation(conversationId);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  async recordConversation(conversation: Message[], platform?: string, metadata: Metadata = {}): Promise<Conversation> {
    return this.client.recordConversation(this.userId, conversation, platform ?? 'unknown', metadata);
  }

  async getConversations(platform?: string, limit = 50): Promise<Conversation[]> {
    return this.client.getUserConversations(this.userId, platform, limit);
  }

  async summarizeConversation(conversation: Message[], summaryType: SummaryType = 'brief'): Promise<JsonRecord> {
    return this.client.summarizeConversation(conversation, summaryType);
  }

  async getSummary(): Promise<JsonRecord> {
    return this.client.getSummary(this.userId);
  }

  // ── Agent and group namespaces ────────────────────────────────────────────

  async storeAgentMemory(agentId: string, content: string, runId?: string, metadata: Metadata = {}): Promise<Memory> {
    return this.client.storeAgentMemory(this.userId, { agentId, content, runId, metadata });
  }

  async searchAgentMemories(agentId: string, query: string, runId?: string, limit = 10): Promise<Memory[]> {
    return this.client.searchAgentMemories(this.userId, agentId, query, { runId, limit });
  }

  async getAgentMemories(agentId: string, limit = 100): Promise<Memory[]> {
    return this.client.getAgentMemories(this.userId, agentId, limit);
  }

  async storeGroupMemory(groupId: string, content: string, metadata: Metadata = {}): Promise<Memory> {
    return this.client.storeGroupMemory(this.userId, groupId, content, metadata);
  }

  async searchGroupMemories(groupId: string, query: string, limit = 10): Promise<Memory[]> {
    return this.client.searchGroupMemories(this.userId, groupId, query, limit);
  }

  async getGroupContext(groupId: string, limit = 50): Promise<JsonRecord> {
    return this.client.getGroupContext(this.userId, groupId, limit);
  }

  // ── Analytics ─────────────────────────────────────────────────────────────

  async getUserAnalytics(): Promise<JsonRecord> {
    return this.client.getUserAnalytics(this.userId);
  }

  async getMemoryGrowth(days = 30): Promise<JsonRecord> {
    return this.client.getMemoryGrowth(this.userId, days);
  }

  async getStatistics(): Promise<JsonRecord> {
    return this.client.getUserStatistics(this.userId);
  }

  // ── Graph ─────────────────────────────────────────────────────────────────

  async link(memoryId: string, targetId: string, relationshipType: RelationshipType = 'related'): Promise<LinkResult> {
    return this.client.linkMemories(memoryId, targetId, relationshipType);
  }

  async findPath(sourceId: string, targetId: string): Promise<MemoryPath> {
    return this.client.findMemoryPath(sourceId, targetId);
  }

  async getRelatedMemories(memoryId: string, limit = 10): Promise<Memory[]> {
    const graph = await this.client.getMemoryContext(memoryId, 1);
    return graph.related_memories.slice(0, limit);
  }

  async getContextForMemory(memoryId: string, depth = 2): Promise<MemoryContextGraph> {
    return this.client.getMemoryContext(memoryId, depth);
  }

  async findContradictions(memoryId: string, threshold = 0.7): Promise<Memory[]> {
    return this.client.findContradictions(memoryId, threshold);
  }

  // ── Search variants ───────────────────────────────────────────────────────

  async searchAdvanced(query: string, options: AdvancedSearchOptions = {}): Promise<Memory[]> {
    return this.client.searchAdvanced(this.userId, query, options);
  }

  async searchOptimized(query: string, options: OptimizedSearchOptions = {}): Promise<OptimizedContext> {
    return this.client.searchOptimized(this.userId, query, options);
  }

  async searchEnhanced(query: string, options: EnhancedSearchOptions = {}): Promise<OptimizedContext> {
    return this.client.searchEnhanced(this.userId, query, { maxTokens: 1500, maxMemories: 15, ...options });
  }

  async getOptimizedContext(query: string, options: OptimizedSearchOptions = {}): Promise<string> {
    return (await this.searchOptimized(query, options)).context;
  }

  async getEnhancedContext(query: string, options: EnhancedSearchOptions = {}): Promise<string> {
    return (await this.searchEnhanced(query, options)).context;
  }

  // ── Batch and merge ───────────────────────────────────────────────────────

  async batchStore(memories: BatchMemoryInput[], linkRelated = true): Promise<Memory[]> {
    return this.client.batchCreate(this.userId, memories, linkRelated);
  }

  async merge(memoryIds: string[], strategy: MergeStrategy = 'combine'): Promise<Memory> {
    return this.client.mergeMemories(memoryIds, strategy);
  }

  // ── Versioning ────────────────────────────────────────────────────────────

  async getVersions(memoryId: string, limit = 50): Promise<MemoryVersion[]> {
    return this.client.getMemoryVersions(memoryId, limit);
  }

  async compareVersions(versionId1: string, versionId2: string): Promise<JsonRecord> {
    return this.client.compareVersions(versionId1, versionId2);
  }

  async rollback(memoryId: string, targetVersion: number): Promise<JsonRecord> {
    return this.client.rollbackMemory(memoryId, targetVersion, this.userId);
  }

  // ── Export / import ───────────────────────────────────────────────────────

  async export(format: ExportFormat = 'json'): Promise<JsonRecord> {
    return this.client.exportMemories(this.userId, format);
  }

  async importMemories(data: string, format: ExportFormat = 'json'): Promise<ImportResult> {
    return this.client.importMemories(this.userId, data, format);
  }

  // ── Images and text ───────────────────────────────────────────────────────

  async storeImage(options: StoreImageOptions): Promise<Memory> {
    return this.client.storeImage(this.userId, options);
  }

  async uploadImage(data: Uint8Array, filename: string, metadata: Metadata = {}): Promise<Memory> {
    return this.client.uploadImage(this.userId, data, filename, metadata);
  }

  async searchImages(query: string, limit = 5): Promise<Memory[]> {
    return this.client.searchImages(this.userId, query, limit);
  }

  async concise(text: string): Promise<JsonRecord> {
    return this.client.conciseText(text);
  }

  async health(): Promise<Health> {
    return this.client.healthCheck();
  }

  // ── Webhooks ──────────────────────────────────────────────────────────────

  async createWebhook(input: WebhookInput): Promise<Webhook> {
    return this.client.createWebhook(input);
  }

  async listWebhooks(userId?: string): Promise<Webhook[]> {
    return this.client.listWebhooks(userId ?? this.userId);
  }

  async getWebhook(webhookId: string): Promise<Webhook> {
    return this.client.getWebhook(webhookId);
  }

  async updateWebhook(webhookId: string, update: WebhookUpdate): Promise<Webhook> {
    return this.client.updateWebhook(webhookId, update);
  }

  async deleteWebhook(webhookId: string): Promise<JsonRecord> {
    return this.client.deleteWebhook(webhookId);
  }

  async testWebhook(webhookId: string): Promise<JsonRecord> {
    return this.client.testWebhook(webhookId);
  }

  // ── Security and compliance ───────────────────────────────────────────────

  async exportGdpr(): Promise<JsonRecord> {
    return this.client.exportGdpr(this.userId);
  }

  async deleteGdpr(): Promise<JsonRecord> {
    return this.client.deleteGdpr(this.userId);
  }

  async setRetentionPolicy(input: Omit<RetentionPolicyInput, 'userId'>): Promise<JsonRecord> {
    return this.client.setRetentionPolicy({ ...input, userId: this.userId });
  }

  async applyRetentionPolicies(organizationId?: string): Promise<JsonRecord> {
    return this.client.applyRetentionPolicies({ organizationId, userId: this.userId });
  }

  async recordComplianceEvent(input: Omit<ComplianceEventInput, 'userId'>): Promise<JsonRecord> {
    return this.client.recordComplianceEvent({ ...input, userId: this.userId });
  }

  async getComplianceReport(organizationId: string, complianceType?: string): Promise<JsonRecord> {
    return this.client.getComplianceReport(organizationId, complianceType);
  }

  async encryptData(data: string): Promise<JsonRecord> {
    return this.client.encryptData(data);
  }

  async decryptData(encryptedData: string): Promise<JsonRecord> {
    return this.client.decryptData(encryptedData);
  }

  // ── Observability ─────────────────────────────────────────────────────────

  async getMetrics(): Promise<JsonRecord> {
    return this.client.getMetrics();
  }

  async getMetricsSummary(): Promise<JsonRecord> {
    return this.client.getMetricsSummary();
  }

  async getAuditLogs(limit = 100): Promise<JsonRecord[]> {
    return this.client.getAuditLogs(this.userId, limit);
  }
}

export function init(options: MemphoraOptions = {}): Memphora {
  return new Memphora(options);
}

/** Build a client from `options` and return its bound remember wrapper. */
export function rememberFor(options: MemphoraOptions = {}) {
  const memory = new Memphora(options);
  return <R, TRest extends unknown[] = []>(fn: RememberTarget<R, TRest>) => memory.remember(fn);
}
