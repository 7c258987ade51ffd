import pRetry, { AbortError } from "p-retry";
import { logger, type ILogger } from "./logger.js";

export { AbortError };

export const DEFAULT_RETRIES = 3;

/**
 * HTTP statuses worth retrying. Any other 4xx means the request itself is
 * wrong and will fail again.
 */
const TRANSIENT_STATUSES = new Set([408, 429]);

/**
 * Message fragments of network failures that are worth retrying.
 */
export const DEFAULT_TRANSIENT_ERROR_PATTERNS: readonly RegExp[] = [
  /ECONNRESET/i,
  /ETIMEDOUT/i,
  /ECONNREFUSED/i,
  /EAI_AGAIN/i,
  /socket hang up/i,
  /fetch failed/i,
  /rate limit/i,
];

export interface RetryOptions {
  /** Number of retries after the first attempt (0 disables retrying). */
  retries?: number;
  /** Delay before the first retry, in milliseconds. */
  minTimeout?: number;
  /** Classifies errors that must not be retried. */
  isPermanent?: (error: unknown) => boolean;
  /** Receives a debug line per failed attempt. */
  log?: ILogger;
}

function getStatus(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  const status = getStatus(error);
  if (status !== undefined) {
    return status >= 500 || TRANSIENT_STATUSES.has(status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return DEFAULT_TRANSIENT_ERROR_PATTERNS.some((pattern) =>
    pattern.test(message)
  );
}

/**
 * Client errors (4xx other than 408 and 429) are permanent. Errors without a
 * status are retried, since most of them come from the network.
 */
export function isPermanentError(error: unknown): boolean {
  const status = getStatus(error);
  if (status === undefined) {
    return false;
  }
  return !isTransientError(error);
}

/**
 * Run an async operation, retrying with exponential backoff. Permanent
 * errors abort immediately and are rethrown as they are.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const isPermanent = options.isPermanent ?? isPermanentError;
  const log = options.log ?? logger;

  return pRetry(
    async () => {
      try {
        return await fn();
      } catch (error) {
        if (isPermanent(error)) {
          throw new AbortError(
            error instanceof Error ? error : new Error(String(error))
          );
        }
        throw error;
      }
    },
    {
      retries: options.retries ?? DEFAULT_RETRIES,
      minTimeout: options.minTimeout ?? 1000,
      onFailedAttempt: (error) => {
        log.debug(
          `Attempt ${error.attemptNumber} failed (${error.retriesLeft} retries left): ${error.message}`
        );
      },
    }
  );
}
