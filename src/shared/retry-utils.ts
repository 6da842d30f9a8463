/**
 * Retry Utilities
 * Provides configurable retry logic with exponential backoff for handling transient errors
 */

import { logger } from '@/config/logger.js';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  retryableErrors?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void | Promise<void>;
}

export interface RetryContext {
  attempt: number;
  maxAttempts: number;
  lastError?: unknown;
}

const DEFAULT_RETRY_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 250,
  retryableErrors: isTransientError,
};

const RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];

const RETRYABLE_ERROR_CODES = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'rate_limit_exceeded',
  'server_error',
  'timeout',
];

const TRANSIENT_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /connection reset/i,
  /ECONNRESET/i,
  /rate limit/i,
  /too many requests/i,
  /service unavailable/i,
  /temporarily unavailable/i,
  /fetch failed/i,
];

const SAFETY_ERROR_CODES = [
  'moderation_blocked',
  'content_policy_violation',
  'IMAGE_SAFETY_BLOCKED',
  'PROHIBITED_CONTENT',
  'SAFETY',
  'BLOCKLIST',
  'IMAGE_SAFETY',
];

const SAFETY_PATTERNS = [
  /safety system/i,
  /moderation/i,
  /content policy/i,
  /prohibited content/i,
  /safety.*blocked/i,
  /prompt blocked/i,
];

function readField(error: unknown, key: string): unknown {
  if (typeof error === 'object' && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

/**
 * HTTP status carried by an SDK or fetch error, if any.
 */
export function errorStatus(error: unknown): number | undefined {
  for (const key of ['status', 'statusCode', 'code']) {
    const value = readField(error, key);
    if (typeof value === 'number') {
      return value;
    }
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  const code = readField(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

function errorMessage(error: unknown): string {
  const message = readField(error, 'message');
  return typeof message === 'string' ? message : '';
}

/**
 * Determine if an error is transient and should be retried
 */
export function isTransientError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  const status = errorStatus(error);
  if (status !== undefined && RETRYABLE_STATUSES.includes(status)) {
    return true;
  }

  const code = errorCode(error) ?? errorCode(readField(error, 'cause'));
  if (code && RETRYABLE_ERROR_CODES.includes(code)) {
    return true;
  }

  const message = errorMessage(error);
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Determine if an error is a safety/moderation block (non-retryable)
 */
export function isSafetyBlockError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  const status = errorStatus(error);
  const code = errorCode(error);
  if (status === 422) {
    return true;
  }
  if (code && SAFETY_ERROR_CODES.includes(code)) {
    return true;
  }

  const message = errorMessage(error);
  return SAFETY_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Exponential backoff: baseDelay * 2^(attempt - 1), capped, with +/- jitter
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMs * 2 - jitterMs;
  return Math.floor(Math.max(0, cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async function with retry logic
 *
 * @returns The result of the function or throws the last error
 */
export async function withRetry<T>(
  fn: (context: RetryContext) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const config = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
    retryableErrors: options.retryableErrors || DEFAULT_RETRY_OPTIONS.retryableErrors,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn({ attempt, maxAttempts: config.maxAttempts, lastError });
    } catch (error) {
      lastError = error;

      if (isSafetyBlockError(error)) {
        logger.warn('Retry: Safety block error detected, not retrying', {
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const shouldRetry = config.retryableErrors(error);
      if (!shouldRetry || attempt >= config.maxAttempts) {
        logger.warn('Retry: Final attempt failed or error not retryable', {
          attempt,
          maxAttempts: config.maxAttempts,
          retryable: shouldRetry,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const delayMs = calculateDelay(
        attempt,
        config.baseDelayMs,
        config.maxDelayMs,
        config.jitterMs,
      );

      logger.warn('Retry: Attempt failed, retrying after delay', {
        attempt,
        maxAttempts: config.maxAttempts,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });

      if (options.onRetry) {
        await options.onRetry(attempt, error);
      }

      await sleep(delayMs);
    }
  }

  throw lastError;
}
