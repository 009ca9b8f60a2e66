/**
 * JSON logging with secret redaction for the GitLab API client
 *
 * Security requirements:
 * - Never log access tokens or variable values in plaintext
 * - Redact sensitive headers (PRIVATE-TOKEN, Authorization)
 * - Support structured JSON logging for CI/automation
 */

import { appendFileSync } from 'node:fs';

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /**
   * Append every entry (debug level and up) to this file as JSON lines,
   * independent of the console level
   */
  filePath?: string;
  /** Context merged into every entry */
  context?: Record<string, unknown>;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // GitLab personal/deploy/runner/trigger tokens
  /gl(?:pat|dt|rt|ptt|oas|cbt)-[a-zA-Z0-9_-]{8,}/g,

  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]+/gi,

  // JWT tokens
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // private_token query parameter
  /private_token=[^&\s]+/gi,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'private-token',
  'job-token',
  'cookie',
  'set-cookie',
  'proxy-authorization',
]);

/**
 * Object keys (lower-cased) that should have their values redacted.
 * `value` is the payload of a CI/CD variable.
 */
const SENSITIVE_KEYS = new Set([
  'value',
  'token',
  'private_token',
  'privatetoken',
  'password',
  'secret',
  'authorization',
  'private-token',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('glpat-abcdefghij1234') // 'glpa...1234'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 12) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values in a JSON-like value (deep copy with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (typeof value === 'string') {
    return redactPatterns(value);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  return redactObject(Object.fromEntries(Object.entries(value)), depth);
}

/**
 * Redact sensitive values in a record
 */
export function redactObject(
  obj: Record<string, unknown>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      if (typeof value === 'string' && value.length > 0) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = value;
      }
    } else {
      result[key] = redactValue(value, depth + 1);
    }
  }
  return result;
}

/**
 * Redact sensitive headers from a Headers object or plain object
 */
export function redactHeaders(
  headers: Headers | Record<string, string>
): Record<string, string> {
  const result: Record<string, string> = {};

  const entries: Array<[string, string]> = [];
  if (headers instanceof Headers) {
    headers.forEach((value, key) => entries.push([key, value]));
  } else {
    entries.push(...Object.entries(headers));
  }

  for (const [key, value] of entries) {
    if (SENSITIVE_HEADERS.has(key.toLowerCase())) {
      result[key] = redactString(value);
    } else {
      result[key] = redactPatterns(value);
    }
  }

  return result;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Secure logger with JSON output and automatic secret redaction
 */
export class ApiLogger {
  private config: Required<Omit<LoggerConfig, 'filePath' | 'context'>> &
    Pick<LoggerConfig, 'filePath' | 'context'>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      filePath: config.filePath,
      context: config.context,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.config.context, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactObject(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  /**
   * Format entry for console output
   */
  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    const toConsole = this.shouldLog(level);
    if (!toConsole && !this.config.filePath) return;

    const entry = this.createEntry(level, message, context, error);

    if (this.config.filePath) {
      appendFileSync(this.config.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    }

    if (!toConsole) return;

    // stdout stays reserved for command output (and --json results)
    console.error(this.formatEntry(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(
    message: string,
    error?: Error,
    context?: Record<string, unknown>
  ): void {
    this.write('error', message, context, error);
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(
    method: string,
    url: string,
    options?: {
      headers?: Headers | Record<string, string>;
      body?: unknown;
    }
  ): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: options?.headers ? redactHeaders(options.headers) : undefined,
      body: options?.body !== undefined ? redactValue(options.body) : undefined,
    });
  }

  /**
   * Log an HTTP response
   */
  response(
    status: number,
    url: string,
    options?: { durationMs?: number }
  ): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    this.write(level, `HTTP Response ${status}: ${redactPatterns(url)}`, {
      status,
      durationMs: options?.durationMs,
    });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

function levelFromEnv(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return undefined;
  }
}

/**
 * Default logger instance
 */
export const logger = new ApiLogger({
  level: levelFromEnv(process.env.GITLAB_VARS_LOG_LEVEL) ?? 'warn',
  json: process.env.GITLAB_VARS_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): ApiLogger {
  return new ApiLogger(config);
}
