/**
 * HTTP client shared by the catalog source, the geocoder and the
 * recommendation service.
 *
 * Bodies come back as `unknown`: each caller validates its own payload
 * (zod schemas, `isFeatureCollection`). The pipeline core never retries;
 * the policy lives here:
 * - 408, 425, 429, 500, 502, 503 and 504, timeouts and network failures are retried
 * - any other status, a parse failure or the caller's own abort fails at once
 * - a server `Retry-After` replaces the computed backoff, capped at maxDelayMs
 * - a retryable failure on the last attempt becomes HTTPRetryExhaustedError
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 10_000 });
 * const page = await client.getJSON(searchUrl, { signal });
 * const collection = await client.getFeatureCollection(geocodeUrl);
 * ```
 */

import type { FeatureCollection } from 'geojson';
import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface RetryPolicy {
  /** Retries after the first attempt (default: 3) */
  readonly maxRetries: number;

  /** Delay before the first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Growth factor between retries (default: 2) */
  readonly backoffMultiplier: number;

  /** Cap for computed and server-requested delays (default: 30000) */
  readonly maxDelayMs: number;

  /** Spread applied to each delay, 0-1 (default: 0.1) */
  readonly jitterFactor: number;
}

export interface HTTPClientConfig extends RetryPolicy {
  /** Per-attempt timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export interface RequestOptions {
  readonly timeoutMs?: number;
  readonly headers?: Readonly<Record<string, string>>;
  /** Caller cancellation; also interrupts a backoff wait */
  readonly signal?: AbortSignal;
}

interface HTTPRequest extends RequestOptions {
  readonly method: 'GET' | 'POST';
  readonly body?: string;
}

export const DEFAULT_HTTP_CONFIG: HTTPClientConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30_000,
  jitterFactor: 0.1,
  timeoutMs: 30_000,
  userAgent: 'CatalogPipeline/0.1',
};

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 425, 429, 500, 502, 503, 504]);

// ============================================================================
// Error Types
// ============================================================================

export class HTTPError extends Error {
  constructor(
    readonly statusCode: number,
    statusText: string,
    readonly url: string,
    /** Server-requested wait from `Retry-After`, if any */
    readonly retryAfterMs: number | null = null
  ) {
    super(`HTTP ${statusCode}: ${statusText}`);
    this.name = 'HTTPError';
  }
}

export class HTTPTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
  }
}

export class HTTPNetworkError extends Error {
  constructor(
    readonly url: string,
    cause: unknown
  ) {
    super(`Network error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'HTTPNetworkError';
  }
}

export type TransportFailure = HTTPError | HTTPTimeoutError | HTTPNetworkError;

export class HTTPRetryExhaustedError extends Error {
  constructor(
    readonly url: string,
    readonly attempts: number,
    readonly lastError: TransportFailure
  ) {
    super(`Retry exhausted after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'HTTPRetryExhaustedError';
  }
}

export class HTTPJSONParseError extends Error {
  /** First 500 characters of the body */
  readonly responseText: string;

  constructor(
    readonly url: string,
    responseText: string,
    cause: unknown
  ) {
    super(`Failed to parse JSON response: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// Retry helpers
// ============================================================================

/**
 * `Retry-After` as milliseconds: delta-seconds or an HTTP date
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (header === null) return null;

  const value = header.trim();
  if (/^\d+$/.test(value)) {
    return Number(value) * 1000;
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

/**
 * initialDelay * multiplier^(retry-1), capped, then spread by +/- jitter
 */
export function backoffDelay(policy: RetryPolicy, retry: number, random: () => number = Math.random): number {
  const base = Math.min(policy.initialDelayMs * policy.backoffMultiplier ** (retry - 1), policy.maxDelayMs);
  const spread = base * policy.jitterFactor;
  return Math.max(0, Math.floor(base + (random() * 2 - 1) * spread));
}

function retryableFailure(error: unknown): TransportFailure | null {
  if (error instanceof HTTPError) {
    return RETRYABLE_STATUSES.has(error.statusCode) ? error : null;
  }
  if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
    return error;
  }
  return null;
}

export function isFeatureCollection(value: unknown): value is FeatureCollection {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'FeatureCollection' &&
    'features' in value &&
    Array.isArray(value.features)
  );
}

function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config: Partial<HTTPClientConfig> = {}) {
    this.config = { ...DEFAULT_HTTP_CONFIG, ...config };
  }

  async getJSON(url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.requestJSON(url, { ...options, method: 'GET' });
  }

  async postJSON(url: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    return this.requestJSON(url, {
      ...options,
      method: 'POST',
      body: JSON.stringify(body),
      headers: { 'Content-Type': 'application/json', ...options.headers },
    });
  }

  /**
   * GeoJSON search responses (geocoding)
   */
  async getFeatureCollection(url: string, options: RequestOptions = {}): Promise<FeatureCollection> {
    const data = await this.getJSON(url, options);

    if (!isFeatureCollection(data)) {
      const type = typeof data === 'object' && data !== null && 'type' in data ? String(data.type) : typeof data;
      throw new Error(`Invalid GeoJSON response: expected FeatureCollection, got ${type}`);
    }
    return data;
  }

  private async requestJSON(url: string, request: HTTPRequest): Promise<unknown> {
    const response = await this.send(url, request);
    const text = await response.text();

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(url, text, error);
    }
  }

  /**
   * First attempt plus up to maxRetries retries
   */
  private async send(url: string, request: HTTPRequest): Promise<Response> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      let failure: TransportFailure;
      try {
        return await this.attempt(url, request);
      } catch (error) {
        const retryable = retryableFailure(error);
        if (!retryable) throw error;
        failure = retryable;
      }

      if (attempt >= attempts) {
        throw new HTTPRetryExhaustedError(url, attempt, failure);
      }

      const requested = failure instanceof HTTPError ? failure.retryAfterMs : null;
      const delayMs =
        requested !== null ? Math.min(requested, this.config.maxDelayMs) : backoffDelay(this.config, attempt);

      logger.warn('HTTP attempt failed, retrying', {
        url,
        attempt,
        maxAttempts: attempts,
        delayMs,
        error: failure.message,
      });
      await sleep(delayMs, request.signal);
    }
  }

  private async attempt(url: string, request: HTTPRequest): Promise<Response> {
    const timeoutMs = request.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = (): void => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: request.method,
        headers: { 'User-Agent': this.config.userAgent, ...request.headers },
        body: request.body,
        signal: controller.signal,
      });
    } catch (error) {
      // The caller's own abort is never retried
      if (request.signal?.aborted) throw error;
      if (controller.signal.aborted) throw new HTTPTimeoutError(url, timeoutMs);
      throw new HTTPNetworkError(url, error);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', forwardAbort);
    }

    if (!response.ok) {
      throw new HTTPError(
        response.status,
        response.statusText,
        url,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }
    return response;
  }
}
