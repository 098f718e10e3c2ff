/**
 * HTTP Client for Region Atlas
 *
 * Native fetch with:
 * - Exponential backoff with jitter
 * - Timeouts via AbortController
 * - Error classification (retry 408/429/5xx, timeouts, network failures)
 * - Charset-aware text decoding (listing pages are often GB2312/GBK)
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 3, timeoutMs: 30000 });
 * const html = await client.fetchText('http://www.stats.gov.cn/...');
 * ```
 */

import { createLogger } from './utils/logger.js';

const logger = createLogger({ module: 'http' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface FetchedBody {
  readonly bytes: Uint8Array;
  readonly contentType: string;
}

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 3) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  readonly userAgent: string;

  /** Jitter factor (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
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

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

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
 * Connection failed, DNS resolution, etc.
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

// ============================================================================
// Decoding
// ============================================================================

const GB_CHARSETS = new Set(['gb2312', 'gbk', 'gb18030', 'x-gbk']);

/**
 * Map a declared charset to a TextDecoder label
 */
function decoderLabel(charset: string): string {
  const normalized = charset.trim().toLowerCase();
  if (GB_CHARSETS.has(normalized)) {
    // GB18030 is a superset of GB2312 and GBK
    return 'gb18030';
  }
  if (normalized === 'iso-8859-1' || normalized === 'latin1') {
    return 'windows-1252';
  }
  return normalized;
}

/**
 * Decode a response body using the header charset, then any <meta>
 * charset in the first 2KB, then UTF-8
 */
export function decodeBody(buffer: ArrayBuffer | Uint8Array, contentType: string): string {
  const headerCharset = contentType.match(/charset=["']?([^\s;"']+)/i)?.[1];
  const peek = new TextDecoder('ascii').decode(buffer.slice(0, 2048));
  const metaCharset = peek.match(/<meta[^>]*charset=["']?([\w-]+)/i)?.[1];
  const charset = headerCharset ?? metaCharset;

  if (charset !== undefined) {
    try {
      return new TextDecoder(decoderLabel(charset)).decode(buffer);
    } catch (error) {
      // TextDecoder throws RangeError for labels it does not know
      if (!(error instanceof RangeError)) throw error;
      logger.warn('Unknown charset, decoding as UTF-8', { charset });
    }
  }

  return new TextDecoder('utf-8').decode(buffer);
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 3,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 30000,
      userAgent: 'RegionAtlas/1.0',
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * Fetch a page and decode it to text
   *
   * @throws {HTTPError} For non-retryable or final HTTP error responses
   * @throws {HTTPTimeoutError} If the final attempt times out
   * @throws {HTTPNetworkError} For a final network failure
   */
  async fetchText(url: string, options?: FetchOptions): Promise<string> {
    const body = await this.fetchBytes(url, options);
    return decodeBody(body.bytes, body.contentType);
  }

  /**
   * Fetch a page without decoding it
   */
  async fetchBytes(url: string, options?: FetchOptions): Promise<FetchedBody> {
    const response = await this.fetchWithRetry(url, options);
    return {
      bytes: new Uint8Array(await response.arrayBuffer()),
      contentType: response.headers.get('content-type') ?? '',
    };
  }

  /**
   * Fetch raw response with retry logic
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxRetries = options?.retries ?? this.config.maxRetries;
    const maxAttempts = maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt >= maxAttempts;

      try {
        const response = await this.fetchWithTimeout(url, options);

        if (response.ok) {
          return response;
        }

        throw new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url
        );
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(lastError) || isLastAttempt) {
          throw lastError;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts,
          error: lastError.message,
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html, application/xhtml+xml, */*',
          ...options?.headers,
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * initialDelay * multiplier^(attempt - 1), capped, with +/- jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 ||
      status === 429 ||
      status === 500 ||
      status === 502 ||
      status === 503 ||
      status === 504
    );
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export function createHTTPClient(config?: Partial<HTTPClientConfig>): HTTPClient {
  return new HTTPClient(config);
}
