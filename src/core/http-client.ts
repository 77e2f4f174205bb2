/**
 * HTTP Client
 *
 * Every outbound request of the validator goes through here:
 * - Configurable timeout via AbortController
 * - Exponential backoff with jitter on retryable failures
 * - Typed errors so callers can tell a timeout from a 404
 * - JSON bodies validated with a zod schema instead of trusted
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 10_000 });
 * const commits = await client.fetchJSON(url, commitListSchema);
 * const csv = await client.fetchText(rawUrl);
 * ```
 */

import type { ZodType } from 'zod';
import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'http' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts after the first request (default: 3) */
  readonly maxRetries: number;

  /** Delay before the first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  readonly backoffMultiplier: number;

  /** Upper bound on any single backoff delay (default: 30000) */
  readonly maxDelayMs: number;

  /** Per-attempt request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  readonly userAgent: string;

  /** Jitter factor, 0-1 (default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request overrides of the client defaults
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
  readonly signal?: AbortSignal;
}

/**
 * Status line and fully read body of one response
 */
export interface FetchedResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  readonly body: string;
}

export const DEFAULT_HTTP_CONFIG: HTTPClientConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 30000,
  userAgent: 'election-feed-validator/0.1',
  jitterFactor: 0.1,
};

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Request aborted by the client timeout
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection refused, DNS failure and the like
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
  }
}

export class HTTPRetryExhaustedError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly lastError: Error;

  constructor(url: string, attempts: number, lastError: Error) {
    super(`Retry exhausted after ${attempts} attempts: ${lastError.message}`);
    this.name = 'HTTPRetryExhaustedError';
    this.url = url;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Body is not JSON, or not the JSON shape the caller expected
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, detail: string) {
    super(`Failed to parse JSON response: ${detail}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

/**
 * True for errors that mean "the remote side could not be reached or
 * answered in time", as opposed to a definite answer such as a 404.
 */
export function isTransportError(error: unknown): boolean {
  return (
    error instanceof HTTPTimeoutError ||
    error instanceof HTTPNetworkError ||
    error instanceof HTTPRetryExhaustedError
  );
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

/**
 * Read a response body, rejecting with an AbortError as soon as `signal`
 * aborts even when the body stream ignores it
 */
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => reject(new DOMException('The operation was aborted', 'AbortError'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = { ...DEFAULT_HTTP_CONFIG, ...config };
  }

  /**
   * Fetch a JSON document and validate it against `schema`
   *
   * @throws {HTTPError} For non-retryable or final 4xx/5xx responses
   * @throws {HTTPTimeoutError} If the last attempt times out
   * @throws {HTTPJSONParseError} If the body is not JSON or fails the schema
   */
  async fetchJSON<T>(url: string, schema: ZodType<T>, options?: FetchOptions): Promise<T> {
    const text = await this.fetchText(url, {
      ...options,
      headers: { Accept: 'application/json', ...options?.headers },
    });

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new HTTPJSONParseError(url, text, error instanceof Error ? error.message : String(error));
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new HTTPJSONParseError(url, text, parsed.error.issues.map((i) => i.message).join('; '));
    }
    return parsed.data;
  }

  /**
   * Fetch a response body as text
   */
  async fetchText(url: string, options?: FetchOptions): Promise<string> {
    const response = await this.fetchWithRetry(url, options);
    return response.body;
  }

  /**
   * Fetch with retry, returning the first successful response. Each
   * attempt's timeout covers reading the body as well as the headers.
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<FetchedResponse> {
    const maxRetries = options?.retries ?? this.config.maxRetries;
    const maxAttempts = maxRetries + 1;
    let lastError: Error = new Error('No attempt made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const isLastAttempt = attempt === maxAttempts;

      try {
        const response = await this.fetchWithTimeout(url, options);
        if (response.ok) {
          return response;
        }

        const error = new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
        if (!RETRYABLE_STATUSES.has(response.status) || isLastAttempt) {
          throw error;
        }
        lastError = error;
        log.warn('HTTPClient attempt failed', { attempt, maxAttempts, statusCode: response.status, url });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (!this.isRetryableError(lastError) || isLastAttempt) {
          throw lastError;
        }
        log.warn('HTTPClient attempt failed', { attempt, maxAttempts, error: lastError.message, url });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }

    throw new HTTPRetryExhaustedError(url, maxAttempts, lastError);
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<FetchedResponse> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const external = options?.signal;
    const forwardAbort = (): void => controller.abort();
    external?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': this.config.userAgent, ...options?.headers },
        redirect: 'follow',
        signal: controller.signal,
      });
      const body = await readBody(response, controller.signal);
      return { ok: response.ok, status: response.status, statusText: response.statusText, body };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        if (external?.aborted) {
          throw error;
        }
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
      external?.removeEventListener('abort', forwardAbort);
    }
  }

  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay = this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;
    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return RETRYABLE_STATUSES.has(error.statusCode);
    }
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
