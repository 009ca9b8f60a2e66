/**
 * Type definitions for the GitLab project variables API (REST v4)
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods used by the client
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Project identifier: numeric ID or `group/project` path
 */
export type ProjectId = string | number;

/**
 * API error response
 */
export interface ApiError {
  /** HTTP status code */
  status: number;
  /** Error message from API */
  message: string;
  /** Additional error details */
  details?: Record<string, unknown>;
}

// =============================================================================
// Variables
// =============================================================================

/**
 * GitLab variable type
 */
export type VariableType = 'env_var' | 'file';

/**
 * A project variable as returned by `GET /projects/:id/variables`
 */
export interface RemoteVariable {
  key: string;
  value: string;
  variable_type: VariableType;
  protected: boolean;
  masked: boolean;
  raw?: boolean;
  environment_scope?: string;
  description?: string | null;
}

/**
 * Body of `POST /projects/:id/variables`
 */
export interface CreateVariableRequest {
  key: string;
  value: string;
  variableType: VariableType;
  protected: boolean;
  masked: boolean;
  description?: string;
}

/**
 * Body of `PUT /projects/:id/variables/:key`
 */
export interface UpdateVariableRequest {
  value: string;
  variableType: VariableType;
  protected: boolean;
  masked: boolean;
}

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration options for the GitLab client
 */
export interface GitLabClientConfig {
  /** GitLab instance URL, e.g. https://gitlab.example.com */
  baseUrl: string;
  /** Personal, project or group access token */
  token: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Verify the server certificate (default: true) */
  verifySsl?: boolean;
  /** PEM file with the CA certificate(s) to trust */
  caBundle?: string;
  /** Retry configuration for transient failures */
  retry?: RetryConfig;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retried operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };
