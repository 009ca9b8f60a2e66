/**
 * GitLab API client module
 *
 * Provides:
 * - GitLabClient with the project variables sub-client
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 */

// Main client
export {
  createClient,
  createDispatcher,
  encodeProjectId,
  apiRoot,
  extractErrorMessage,
  isRetryableCreateError,
  API_VERSION,
  PAGE_SIZE,
} from './client.js';

export type { GitLabClient, VariablesClient, ClientDependencies } from './client.js';

// Retry utilities
export {
  withRetry,
  ApiRequestError,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
  RATE_LIMIT_STATUS,
  SERVER_ERROR_THRESHOLD,
} from './retry.js';

export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  ApiLogger,
  redactString,
  redactPatterns,
  redactObject,
  redactValue,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  ApiError,
  HttpMethod,
  ProjectId,
  VariableType,
  RemoteVariable,
  CreateVariableRequest,
  UpdateVariableRequest,
  GitLabClientConfig,
  RetryConfig,
  RetryResult,
} from './types.js';
