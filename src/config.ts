import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type Logger, type LogLevel } from './logger.js';

export const DEFAULT_API_URL = 'https://api.memphora.ai/api/v1';

const booleanString = z.preprocess((val) => {
  if (typeof val !== 'string') return val;
  const normalized = val.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return val;
}, z.boolean());

const configSchema = z.object({
  userId: z.string({ required_error: 'user id is required (option userId or MEMPHORA_USER_ID)' }),
  apiKey: z.string({ required_error: 'API key is required (option apiKey or MEMPHORA_API_KEY)' }),
  apiUrl: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), 'must be an http(s) URL')
    .transform((url) => url.replace(/\/+$/, ''))
    .default(DEFAULT_API_URL),
  autoCompress: booleanString.default(true),
  maxTokens: z.coerce.number().int().min(1).default(500),
  timeoutMs: z.coerce.number().int().min(1).default(30_000),
  maxRetries: z.coerce.number().int().min(0).max(10).default(3),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
});

export type MemphoraConfig = z.infer<typeof configSchema>;

export interface MemphoraOptions {
  userId?: string;
  apiKey?: string;
  /** Override the API base URL, e.g. for a self-hosted deployment. */
  apiUrl?: string;
  /** Ask the server to compress context returned by getContext. */
  autoCompress?: boolean;
  /** Token budget for compressed context. */
  maxTokens?: number;
  timeoutMs?: number;
  maxRetries?: number;
  logLevel?: LogLevel;
  logger?: Logger;
  fetch?: typeof fetch;
  /** Base delay for exponential retry backoff. */
  retryBaseDelayMs?: number;
}

export type Env = Record<string, string | undefined>;

/** Strip whitespace and surrounding quotes; blank values count as unset. */
function clean(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim().replace(/^(['"])(.*)\1$/, '$2').trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function pick<T>(explicit: T | undefined, fromEnv: string | undefined): T | string | undefined {
  if (typeof explicit === 'string') return clean(explicit) ?? clean(fromEnv);
  return explicit ?? clean(fromEnv);
}

/**
 * Resolve configuration once: explicit option, then environment variable,
 * then default. Throws ConfigError when a required value is missing or invalid.
 */
export function resolveConfig(options: MemphoraOptions = {}, env: Env = process.env): MemphoraConfig {
  const raw = {
    userId: pick(options.userId, env.MEMPHORA_USER_ID),
    apiKey: pick(options.apiKey, env.MEMPHORA_API_KEY),
    apiUrl: pick(options.apiUrl, env.MEMPHORA_API_URL),
    autoCompress: pick(options.autoCompress, env.MEMPHORA_AUTO_COMPRESS),
    maxTokens: pick(options.maxTokens, env.MEMPHORA_MAX_TOKENS),
    timeoutMs: pick(options.timeoutMs, env.MEMPHORA_TIMEOUT_MS),
    maxRetries: pick(options.maxRetries, env.MEMPHORA_MAX_RETRIES),
    logLevel: pick(options.logLevel, env.MEMPHORA_LOG_LEVEL),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  return result.data;
}
