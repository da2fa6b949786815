import { z } from 'zod';
import {
  ApiError,
  ConnectionError,
  RateLimitError,
  ResponseFormatError,
  toApiError,
} from '../errors.js';
import type { Logger } from '../logger.js';

export const SDK_VERSION = '0.1.0';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
const IDEMPOTENT_METHODS = new Set<HttpMethod>(['GET', 'PUT', 'DELETE']);
const MAX_RETRY_AFTER_MS = 60_000;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | null | undefined;

export interface TransportOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  maxRetries: number;
  /** Delay before the first retry; doubles on each further attempt. */
  retryBaseDelayMs?: number;
  fetch?: typeof fetch;
  logger: Logger;
}

export type RequestSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface RequestOptions<T> {
  query?: Record<string, QueryValue>;
  body?: unknown;
  form?: FormData;
  schema?: RequestSchema<T>;
  signal?: AbortSignal;
}

/** Encode each id so it is safe as a single path segment. */
export function encodePath(strings: TemplateStringsArray, ...ids: string[]): string {
  return strings.reduce((acc, part, i) => acc + part + (i < ids.length ? encodeURIComponent(ids[i]) : ''), '');
}

export function buildUrl(baseUrl: string, path: string, query?: Record<string, QueryValue>): string {
  const url = `${baseUrl}${path}`;
  if (!query) return url;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) continue;
    params.append(key, String(value));
  }
  const qs = params.toString();
  return qs ? `${url}?${qs}` : url;
}

/** Pull a human-readable message out of an error body (FastAPI `detail`, `message`, `error`). */
export function extractErrorMessage(body: unknown, fallback: string): string {
  if (typeof body === 'string' && body.trim()) return body.trim();
  if (!body || typeof body !== 'object') return fallback;

  const detail = 'detail' in body ? body.detail : undefined;
  if (typeof detail === 'string' && detail) return detail;
  if (Array.isArray(detail)) {
    const msgs = detail
      .map((d) => (d && typeof d === 'object' && 'msg' in d ? String(d.msg) : String(d)))
      .filter((m) => m.length > 0);
    if (msgs.length > 0) return msgs.join('; ');
  }
  const message = 'message' in body ? body.message : undefined;
  if (typeof message === 'string' && message) return message;
  const error = 'error' in body ? body.error : undefined;
  if (typeof error === 'string' && error) return error;
  return fallback;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = parseInt(header, 10);
  if (isNaN(seconds) || seconds < 0) return undefined;
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/** Settle with `work`, or reject as soon as `signal` aborts. */
function abortable<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

/**
 * Authenticated JSON transport over fetch with per-attempt timeouts and
 * exponential backoff on 429/5xx and connection failures. The caller's
 * signal cancels in-flight attempts and pending backoff alike.
 */
export class HttpTransport {
  private readonly fetchImpl: typeof fetch;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly options: TransportOptions) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /** With a schema the decoded body is validated and typed; without one it is returned as parsed JSON. */
  request<T>(method: HttpMethod, path: string, opts: RequestOptions<T> & { schema: RequestSchema<T> }): Promise<T>;
  request(method: HttpMethod, path: string, opts?: Omit<RequestOptions<unknown>, 'schema'>): Promise<unknown>;
  async request<T>(method: HttpMethod, path: string, opts: RequestOptions<T> = {}): Promise<T | unknown> {
    const url = buildUrl(this.options.baseUrl, path, opts.query);
    const { maxRetries, logger } = this.options;
    let lastError: ApiError | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (opts.signal?.aborted) throw abortedError(opts.signal.reason);
      const progress: AttemptProgress = { responded: false };
      try {
        logger.debug(`${method} ${url}`, attempt > 0 ? { attempt } : undefined);
        return await this.attempt(method, url, opts, progress);
      } catch (err) {
        if (!(err instanceof ApiError)) throw err;
        lastError = err;

        if (!isRetryable(method, err, progress, opts.signal) || attempt >= maxRetries) throw err;

        let delay = this.retryBaseDelayMs * 2 ** attempt;
        if (err instanceof RateLimitError && err.retryAfterMs !== undefined) {
          delay = err.retryAfterMs;
        }
        logger.warn(`${method} ${path} failed (${err.code}, status ${err.status}). Retrying in ${delay}ms...`);
        await sleep(delay, opts.signal);
      }
    }

    throw lastError ?? new ApiError('Unexpected: exhausted retries', 0);
  }

  private async attempt<T>(
    method: HttpMethod,
    url: string,
    opts: RequestOptions<T>,
    progress: AttemptProgress,
  ): Promise<T | unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.apiKey}`,
      Accept: 'application/json',
      'User-Agent': `memphora-js/${SDK_VERSION}`,
    };

    let body: string | FormData | undefined;
    if (opts.form) {
      body = opts.form;
    } else if (opts.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(opts.body);
    }

    // The timeout and the caller's signal cover the body read as well as the fetch.
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onExternalAbort = () => controller.abort();
    opts.signal?.addEventListener('abort', onExternalAbort, { once: true });

    let res: Response;
    let data: unknown;
    try {
      res = await this.fetchImpl(url, { method, headers, body, signal: controller.signal });
      progress.responded = true;
      data = await abortable(readBody(res), controller.signal);
    } catch (err) {
      if (opts.signal?.aborted) throw abortedError(err);
      if (controller.signal.aborted) {
        throw new ConnectionError(`Request timed out after ${this.options.timeoutMs}ms`, 0, undefined, 'TIMEOUT', err);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(
        progress.responded
          ? `Failed to read response from ${this.options.baseUrl}: ${reason}`
          : `Could not connect to ${this.options.baseUrl}: ${reason}`,
        0,
        undefined,
        'CONNECTION_FAILED',
        err,
      );
    } finally {
      clearTimeout(timeoutId);
      opts.signal?.removeEventListener('abort', onExternalAbort);
    }

    if (!res.ok) {
      const message = extractErrorMessage(data, res.statusText || `HTTP ${res.status}`);
      throw toApiError(res.status, message, data, parseRetryAfter(res.headers.get('retry-after')));
    }

    if (!opts.schema) return data;

    const parsed = opts.schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ResponseFormatError(
        `Unexpected response format from ${method} ${url}: ${issues}`,
        res.status,
        data,
        'SCHEMA_MISMATCH',
        parsed.error,
      );
    }
    return parsed.data;
  }
}

interface AttemptProgress {
  /** Set once response headers arrive; the server may have acted on the request by then. */
  responded: boolean;
}

function abortedError(cause: unknown): ConnectionError {
  return new ConnectionError('Request aborted', 0, undefined, 'CONNECTION_FAILED', cause);
}

/**
 * Status errors and timeouts are retried for GET, PUT and DELETE only. A POST
 * is re-sent only when the connection failed before any response arrived.
 */
function isRetryable(method: HttpMethod, err: ApiError, progress: AttemptProgress, signal?: AbortSignal): boolean {
  if (signal?.aborted) return false;
  const idempotent = IDEMPOTENT_METHODS.has(method);
  if (err instanceof ConnectionError) {
    if (err.code === 'TIMEOUT' || progress.responded) return idempotent;
    return true;
  }
  return idempotent && RETRYABLE_STATUS.has(err.status);
}

/** Resolves after `ms`, or early when `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
