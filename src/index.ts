export { Memphora, init, rememberFor, type GetContextOptions } from './memphora.js';
export { remember, type RememberOptions, type RememberTarget, type Remembered } from './remember.js';
export {
  MemoryClient,
  type AdvancedSearchOptions,
  type AgentMemoryInput,
  type BatchMemoryInput,
  type ComplianceEventInput,
  type EnhancedSearchOptions,
  type ExportFormat,
  type MemoryUpdate,
  type OptimizedSearchOptions,
  type RerankProvider,
  type RetentionPolicyInput,
  type SearchOptions,
  type StoreImageOptions,
  type WebhookInput,
  type WebhookUpdate,
} from './client/memory-client.js';
export {
  HttpTransport,
  SDK_VERSION,
  encodePath,
  type HttpMethod,
  type QueryValue,
  type RequestOptions,
  type RequestSchema,
  type TransportOptions,
} from './http/transport.js';
export {
  MemphoraError,
  ConfigError,
  ValidationError,
  ApiError,
  AuthenticationError,
  NotFoundError,
  ApiValidationError,
  RateLimitError,
  ServerError,
  ConnectionError,
  ResponseFormatError,
  classifyStatus,
  type ApiErrorCode,
} from './errors.js';
export { DEFAULT_API_URL, resolveConfig, type Env, type MemphoraConfig, type MemphoraOptions } from './config.js';
export { LOG_LEVELS, createLogger, type LogLevel, type Logger } from './logger.js';
export { CONTEXT_HEADER, formatContext } from './format.js';
export * from './schemas/index.js';
