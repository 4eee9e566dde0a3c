import {
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_DELAY_MS,
  RETRY_MAX_RETRIES,
} from '../constants/defaults.js';
import { debugRetry } from '../utils/debug.js';
import type { HttpMethod, TransportResponse } from './middleware.js';

/**
 * Legacy-style policy: wraps a single operation and decides whether to replay it.
 */
export interface HttpErrorPolicy {
  execute(operation: () => Promise<TransportResponse>): Promise<TransportResponse>;
}

export interface ResilienceContext {
  url: string;
  method: HttpMethod;
  /** Aborted once the transport timeout for the whole request elapses */
  signal: AbortSignal;
}

/**
 * Pipeline-style policy: receives the request context alongside the operation.
 */
export interface ResiliencePipeline {
  execute(
    operation: () => Promise<TransportResponse>,
    context: ResilienceContext,
  ): Promise<TransportResponse>;
}

/**
 * Retry configuration for HTTP requests
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffFactor: number;
  /** Jitter percentage 0-1 (default: 0.1) */
  jitterPercent: number;
  /** Respect Retry-After header (default: true) */
  respectRetryAfter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: RETRY_MAX_RETRIES,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  backoffFactor: 2,
  jitterPercent: 0.1,
  respectRetryAfter: true,
};

/**
 * HTTP status codes that should trigger a retry
 */
const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

/**
 * Network errors that should trigger a retry
 */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

export function isRetryableStatus(statusCode: number): boolean {
  return RETRYABLE_STATUS_CODES.has(statusCode);
}

/**
 * Check if a thrown error is transient
 */
export function isRetryableError(error: unknown): boolean {
  if (error && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' && RETRYABLE_ERROR_CODES.has(code)) {
      return true;
    }
  }

  return false;
}

/**
 * Extract Retry-After header value in milliseconds
 */
export function getRetryAfterMs(
  headers: Record<string, string | string[] | undefined>,
): number | null {
  const retryAfter = headers['retry-after'];
  if (!retryAfter) return null;

  const value = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (!value) return null;

  // Try parsing as seconds
  const seconds = parseInt(value, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  // Try parsing as HTTP date
  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

/**
 * Calculate retry delay with exponential backoff and jitter
 */
export function calculateRetryDelay(
  attempt: number,
  config: RetryConfig,
  retryAfterMs?: number | null,
): number {
  if (config.respectRetryAfter && retryAfterMs !== null && retryAfterMs !== undefined) {
    return Math.min(retryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt);

  // Add jitter to avoid thundering herd
  const jitter = exponentialDelay * config.jitterPercent * (Math.random() * 2 - 1);
  const delayWithJitter = exponentialDelay + jitter;

  return Math.min(Math.max(delayWithJitter, 0), config.maxDelayMs);
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff policy replaying transient failures.
 *
 * Retryable responses are returned as-is once the retries are exhausted; retryable errors
 * are rethrown.
 */
export class RetryPolicy implements HttpErrorPolicy {
  readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  async execute(operation: () => Promise<TransportResponse>): Promise<TransportResponse> {
    const { maxRetries } = this.config;

    for (let attempt = 0; ; attempt++) {
      let retryAfterMs: number | null = null;

      try {
        const response = await operation();
        if (attempt === maxRetries || !isRetryableStatus(response.statusCode)) {
          return response;
        }

        retryAfterMs = getRetryAfterMs(response.headers);
        debugRetry(
          '%s: status %d on attempt %d/%d',
          response.url,
          response.statusCode,
          attempt + 1,
          maxRetries + 1,
        );
      } catch (error) {
        if (attempt === maxRetries || !isRetryableError(error)) {
          throw error;
        }

        debugRetry(
          'transient error on attempt %d/%d: %s',
          attempt + 1,
          maxRetries + 1,
          error instanceof Error ? error.message : String(error),
        );
      }

      const delayMs = calculateRetryDelay(attempt, this.config, retryAfterMs);
      debugRetry('retrying in %dms', delayMs);
      await sleep(delayMs);
    }
  }
}
