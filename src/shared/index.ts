// Logging
export { Logger, logger, type ILogger, type LoggerOptions } from "./logger.js";

// Retry utilities
export {
  withRetry,
  isPermanentError,
  isTransientError,
  DEFAULT_RETRIES,
  DEFAULT_TRANSIENT_ERROR_PATTERNS,
  AbortError,
  type RetryOptions,
} from "./retry-utils.js";

// Sanitization
export { sanitizeCredentials } from "./sanitize-utils.js";
