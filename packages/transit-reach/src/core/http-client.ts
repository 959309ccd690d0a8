/**
 * HTTP Client for the routing engine and geocoders
 *
 * Centralizes fetch operations with:
 * - Per-request timeouts via AbortController
 * - External cancellation (AbortSignal) alongside the timeout
 * - Typed errors for HTTP, timeout, network and JSON failures
 *
 * A failed request is reported once and never retried here; batch callers
 * record it as a failed item and move on.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 60000 });
 * const text = await client.fetchText('http://localhost:8080/otp/routers/default/isochrone?...');
 * ```
 */

import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'http-client' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Fetch implementation (default: global fetch) */
  readonly fetch: typeof fetch;
}

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
  /** AbortSignal for external cancellation */
  readonly signal?: AbortSignal;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;
  readonly body: string;

  constructor(message: string, statusCode: number, url: string, body: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    this.body = body.slice(0, 500);
  }
}

/**
 * Request timeout error (AbortController triggered)
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
 * Request cancelled through the caller's AbortSignal
 */
export class HTTPAbortedError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Request aborted: ${url}`);
    this.name = 'HTTPAbortedError';
    this.url = url;
  }
}

/**
 * Network error (connection refused, DNS resolution, etc.)
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

export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;
  readonly cause: Error;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
    this.cause = cause;
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: 60000,
      userAgent: 'transit-reach/1.0',
      fetch: (input, init) => fetch(input, init),
      ...config,
    };
  }

  /**
   * Fetch response body as text
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPAbortedError} If the caller's signal aborted the request
   * @throws {HTTPNetworkError} For network failures
   */
  async fetchText(url: string, options?: FetchOptions): Promise<string> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    // The caller's signal outlives this request; the listener is removed in `finally`
    const external = options?.signal;
    const onExternalAbort = (): void => controller.abort();
    if (external?.aborted) {
      controller.abort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    try {
      const response = await this.config.fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
          ...options?.headers,
        },
        signal: controller.signal,
      });

      const body = await response.text();

      if (!response.ok) {
        log.debug('HTTP request failed', { url, statusCode: response.status });
        throw new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url,
          body
        );
      }

      return body;
    } catch (error) {
      if (error instanceof HTTPError) {
        throw error;
      }

      // Distinguish timeout from other abort reasons
      if (error instanceof Error && error.name === 'AbortError') {
        if (external?.aborted) {
          throw new HTTPAbortedError(url);
        }
        if (controller.signal.aborted) {
          throw new HTTPTimeoutError(url, timeoutMs);
        }
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
      external?.removeEventListener('abort', onExternalAbort);
    }
  }

  /**
   * Fetch and parse JSON response
   *
   * @throws Same as fetchText, plus {HTTPJSONParseError}
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const text = await this.fetchText(url, options);

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }
}
