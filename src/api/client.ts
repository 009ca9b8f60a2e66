/**
 * GitLab API Client
 *
 * Provides a typed interface to the project variables endpoints of the
 * GitLab REST API (v4) with:
 * - Retry with exponential backoff for transient failures
 * - Pagination of list endpoints
 * - JSON logging with secret redaction
 * - Custom TLS verification (self-signed instances, private CAs)
 */

import { readFileSync } from 'node:fs';
import { Agent, fetch, type Dispatcher, type RequestInit } from 'undici';
import type {
  CreateVariableRequest,
  GitLabClientConfig,
  HttpMethod,
  ProjectId,
  RemoteVariable,
  UpdateVariableRequest,
} from './types.js';
import {
  withRetry,
  ApiRequestError,
  parseRetryAfter,
  type RetryOptions,
} from './retry.js';
import { logger as defaultLogger, type ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Project variables sub-client
 */
export interface VariablesClient {
  list(projectId: ProjectId): Promise<RemoteVariable[]>;
  create(projectId: ProjectId, request: CreateVariableRequest): Promise<RemoteVariable>;
  update(projectId: ProjectId, key: string, request: UpdateVariableRequest): Promise<RemoteVariable>;
  delete(projectId: ProjectId, key: string): Promise<void>;
}

/**
 * Main GitLab client interface
 */
export interface GitLabClient {
  readonly variables: VariablesClient;

  /** Get current configuration (with redacted secrets) */
  getConfig(): { baseUrl: string; hasToken: boolean; verifySsl: boolean };
}

/**
 * Extra dependencies, mainly for tests
 */
export interface ClientDependencies {
  logger?: ApiLogger;
  /** Replaces the TLS dispatcher, e.g. with an undici MockAgent */
  dispatcher?: Dispatcher;
  /** Forwarded to the retry loop */
  sleep?: (ms: number) => Promise<void>;
}

export const API_VERSION = 'v4';
export const PAGE_SIZE = 100;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Encode a project identifier for use in a URL path.
 * Path-form identifiers (`group/sub/project`) are percent-encoded as a whole.
 */
export function encodeProjectId(projectId: ProjectId): string {
  return encodeURIComponent(String(projectId));
}

/**
 * Build the API root from an instance URL, tolerating trailing slashes
 */
export function apiRoot(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/api/${API_VERSION}`;
}

/**
 * Build a fetch dispatcher honouring the TLS settings, or undefined for the
 * runtime default
 */
export function createDispatcher(config: Pick<GitLabClientConfig, 'verifySsl' | 'caBundle'>): Dispatcher | undefined {
  const verifySsl = config.verifySsl ?? true;
  if (verifySsl && !config.caBundle) {
    return undefined;
  }
  return new Agent({
    connect: {
      rejectUnauthorized: verifySsl,
      ca: config.caBundle ? readFileSync(config.caBundle, 'utf-8') : undefined,
    },
  });
}

/**
 * Extract a readable message from a GitLab error body.
 * GitLab answers with `{"message": ...}` (string or field map) or `{"error": ...}`.
 */
export function extractErrorMessage(body: unknown, fallback: string): string {
  if (typeof body !== 'object' || body === null) {
    return fallback;
  }
  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string') return message;
    if (typeof message === 'object' && message !== null) {
      return Object.entries(message)
        .map(([field, problems]) =>
          `${field} ${Array.isArray(problems) ? problems.join(', ') : String(problems)}`
        )
        .join('; ');
    }
  }
  if ('error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return fallback;
}

/**
 * Retry policy for POST requests. A create that timed out or hit a gateway
 * error may already be committed, so only a rate-limit answer is retried.
 */
export function isRetryableCreateError(error: Error): boolean {
  return error instanceof ApiRequestError && error.status === 429;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a GitLab API client with retry and logging
 */
export function createClient(
  config: GitLabClientConfig,
  deps: ClientDependencies = {}
): GitLabClient {
  const root = apiRoot(config.baseUrl);
  const timeout = config.timeout ?? 30000;
  const log = (deps.logger ?? defaultLogger).child({ component: 'gitlab-client' });
  const dispatcher = deps.dispatcher ?? createDispatcher(config);

  const defaultHeaders: Record<string, string> = {
    'Content-Type': 'application/json',
    'PRIVATE-TOKEN': config.token,
  };

  interface RequestOptions {
    params?: Record<string, string | number | undefined>;
    body?: unknown;
  }

  interface RawResponse<T> {
    data: T;
    /** Value of the `x-next-page` header */
    nextPage: string | null;
  }

  /**
   * Make an API request with retry logic
   */
  async function send<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<RawResponse<T>> {
    const url = new URL(`${root}${path}`);
    if (options.params) {
      for (const [key, value] of Object.entries(options.params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    log.request(method, url.toString(), { headers: defaultHeaders, body: options.body });

    const makeRequest = async (): Promise<RawResponse<T>> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const startTime = Date.now();
        const init: RequestInit = {
          method,
          headers: defaultHeaders,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: controller.signal,
          dispatcher,
        };
        const response = await fetch(url.toString(), init);

        log.response(response.status, url.toString(), {
          durationMs: Date.now() - startTime,
        });

        if (!response.ok) {
          const fallback = `GitLab API error (${response.status} ${response.statusText})`;
          let message = fallback;
          let details: Record<string, unknown> | undefined;

          const text = await response.text();
          if (text) {
            try {
              const parsed: unknown = JSON.parse(text);
              message = extractErrorMessage(parsed, fallback);
              if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
                details = Object.fromEntries(Object.entries(parsed));
              }
            } catch {
              message = text.substring(0, 200);
            }
          }

          throw new ApiRequestError(message, response.status, {
            details,
            retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
          });
        }

        if (response.status === 204) {
          return { data: undefined as T, nextPage: null };
        }

        return {
          data: (await response.json()) as T,
          nextPage: response.headers.get('x-next-page'),
        };
      } finally {
        clearTimeout(timeoutId);
      }
    };

    const retryOptions: RetryOptions = {
      ...config.retry,
      logger: log,
      sleep: deps.sleep,
      ...(method === 'POST' ? { isRetryable: isRetryableCreateError } : {}),
    };

    const result = await withRetry(makeRequest, retryOptions);

    if (!result.success) {
      throw result.error;
    }

    return result.data;
  }

  async function request<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<T> {
    return (await send<T>(method, path, options)).data;
  }

  /**
   * Fetch every page of a list endpoint, following `x-next-page`
   */
  async function paginate<T>(path: string): Promise<T[]> {
    const items: T[] = [];
    let page: string | null = '1';

    while (page) {
      const response: RawResponse<T[]> = await send<T[]>('GET', path, {
        params: { per_page: PAGE_SIZE, page },
      });
      items.push(...response.data);
      const next = response.nextPage;
      page = next && next !== page ? next : null;
    }

    return items;
  }

  // ---------------------------------------------------------------------------
  // Variables Client
  // ---------------------------------------------------------------------------

  const variablesPath = (projectId: ProjectId): string =>
    `/projects/${encodeProjectId(projectId)}/variables`;

  const variables: VariablesClient = {
    async list(projectId: ProjectId): Promise<RemoteVariable[]> {
      return paginate<RemoteVariable>(variablesPath(projectId));
    },

    async create(projectId: ProjectId, req: CreateVariableRequest): Promise<RemoteVariable> {
      return request<RemoteVariable>('POST', variablesPath(projectId), {
        body: {
          key: req.key,
          value: req.value,
          variable_type: req.variableType,
          protected: req.protected,
          masked: req.masked,
          ...(req.description ? { description: req.description } : {}),
        },
      });
    },

    async update(
      projectId: ProjectId,
      key: string,
      req: UpdateVariableRequest
    ): Promise<RemoteVariable> {
      return request<RemoteVariable>(
        'PUT',
        `${variablesPath(projectId)}/${encodeURIComponent(key)}`,
        {
          body: {
            value: req.value,
            variable_type: req.variableType,
            protected: req.protected,
            masked: req.masked,
          },
        }
      );
    },

    async delete(projectId: ProjectId, key: string): Promise<void> {
      return request<void>(
        'DELETE',
        `${variablesPath(projectId)}/${encodeURIComponent(key)}`
      );
    },
  };

  return {
    variables,
    getConfig() {
      return {
        baseUrl: config.baseUrl,
        hasToken: config.token.length > 0,
        verifySsl: config.verifySsl ?? true,
      };
    },
  };
}
