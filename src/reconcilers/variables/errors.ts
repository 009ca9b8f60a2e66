/**
 * Variable reconciliation error types
 *
 * - FormatError: the variables file is malformed; raised before any remote call
 * - RemoteError: the remote store rejected one plan operation
 *
 * Policy violations are not errors: they are recorded on the plan
 * (see PolicyViolation in types.ts) and the operation becomes a no-op.
 */

import { ApiRequestError } from '../../api/retry.js';
import type { ChangeOperation } from './types.js';

// =============================================================================
// Format Issues
// =============================================================================

/**
 * Format issue codes for variables files
 */
export type FormatIssueCode =
  | 'INVALID_DOCUMENT'
  | 'MISSING_VARIABLES'
  | 'INVALID_ENTRY'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_KEY'
  | 'DUPLICATE_KEY'
  | 'INVALID_VARIABLE_TYPE'
  | 'INVALID_FIELD_TYPE';

/**
 * A single problem found in a variables file
 */
export interface FormatIssue {
  code: FormatIssueCode;
  /** Human-readable error message */
  message: string;
  /** Path to the problematic field (e.g., "variables[3].key") */
  path: string;
}

/**
 * Error thrown when a variables file cannot be used as desired state
 */
export class FormatError extends Error {
  constructor(
    message: string,
    public readonly issues: FormatIssue[],
    public readonly source?: string
  ) {
    super(message);
    this.name = 'FormatError';
  }

  /**
   * Format the issues for display
   */
  formatIssues(): string {
    return this.issues
      .map((issue) => `[${issue.code}] ${issue.path}: ${issue.message}`)
      .join('\n');
  }
}

// =============================================================================
// Issue Builders
// =============================================================================

export function missingRequiredField(path: string, field: string): FormatIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    message: `Missing required field "${field}"`,
    path: `${path}.${field}`,
  };
}

export function invalidKey(path: string, key: string): FormatIssue {
  return {
    code: 'INVALID_KEY',
    message: `Key "${key}" may only contain letters, digits and underscores`,
    path: `${path}.key`,
  };
}

export function duplicateKey(path: string, key: string, firstPath: string): FormatIssue {
  return {
    code: 'DUPLICATE_KEY',
    message: `Key "${key}" is already defined at ${firstPath}`,
    path: `${path}.key`,
  };
}

export function invalidVariableType(path: string, value: unknown): FormatIssue {
  return {
    code: 'INVALID_VARIABLE_TYPE',
    message: `variable_type must be "env_var" or "file", got ${JSON.stringify(value)}`,
    path: `${path}.variable_type`,
  };
}

export function invalidFieldType(path: string, field: string, expected: string, value: unknown): FormatIssue {
  return {
    code: 'INVALID_FIELD_TYPE',
    message: `"${field}" must be a ${expected}, got ${value === null ? 'null' : typeof value}`,
    path: `${path}.${field}`,
  };
}

// =============================================================================
// Remote Errors
// =============================================================================

/**
 * A plan operation rejected by the remote store
 */
export class RemoteError extends Error {
  public readonly key: string;
  public readonly operation: ChangeOperation['type'];
  /** HTTP status, when the failure came from an API response */
  public readonly status?: number;

  constructor(operation: ChangeOperation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `${operation.type} ${operation.key} failed: ${reason}`,
      cause instanceof Error ? { cause } : undefined
    );
    this.name = 'RemoteError';
    this.key = operation.key;
    this.operation = operation.type;
    this.status = cause instanceof ApiRequestError ? cause.status : undefined;
  }
}
