/**
 * Types for CI/CD variable reconciliation
 */

import type { VariableType } from '../../api/types.js';
import type { RemoteError } from './errors.js';

export type { VariableType } from '../../api/types.js';

/**
 * Accepted values of `variable_type`
 */
export const VARIABLE_TYPES: readonly VariableType[] = ['env_var', 'file'];

/**
 * Keys may only contain letters, digits and underscores
 */
export const VARIABLE_KEY_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Value GitLab hands back for a masked variable whose value is withheld
 */
export const REDACTED_VALUE = '';

/**
 * Description written on export for a masked variable whose value was dropped
 */
export const MASKED_EXPORT_DESCRIPTION = 'Masked value not exported';

/**
 * A single CI/CD variable
 */
export interface Variable {
  key: string;
  value: string;
  variableType: VariableType;
  protected: boolean;
  masked: boolean;
  /** Local documentation only; never compared with the remote store */
  description?: string;
}

/**
 * Variables indexed by key, in file (or API) order
 */
export type VariableCollection = ReadonlyMap<string, Variable>;

// =============================================================================
// Plan
// =============================================================================

/**
 * Fields compared between desired and observed variables
 */
export type VariableField = 'value' | 'protected' | 'masked' | 'variableType';

/**
 * A single field difference
 */
export interface FieldChange {
  field: VariableField;
  oldValue: string | boolean;
  newValue: string | boolean;
  /**
   * True when the old value could not be read (masked variable) and the new
   * value is written regardless
   */
  unverified?: boolean;
}

export interface CreateOperation {
  type: 'create';
  key: string;
  variable: Variable;
}

export interface UpdateOperation {
  type: 'update';
  key: string;
  /** Full payload to send; carries the observed value when only flags change */
  variable: Variable;
  changes: FieldChange[];
}

export interface DeleteOperation {
  type: 'delete';
  key: string;
  /** The remote variable being removed */
  variable: Variable;
}

export interface NoOpOperation {
  type: 'noop';
  key: string;
  reason: string;
}

/**
 * Operations that change the remote store
 */
export type ChangeOperation = CreateOperation | UpdateOperation | DeleteOperation;

export type PlanOperation = ChangeOperation | NoOpOperation;

export type PlanOperationType = PlanOperation['type'];

/**
 * Reasons an operation is downgraded to a no-op
 */
export type PolicyViolationCode =
  /** Writing an empty value requires force */
  | 'EMPTY_VALUE'
  /** A masked variable would be written (or left) with an empty value */
  | 'MASKED_EMPTY_VALUE'
  /** Flags of a masked variable cannot change without its value */
  | 'MASKED_VALUE_UNKNOWN'
  /** Deleting requires prune */
  | 'PRUNE_REQUIRED';

/**
 * An operation that was requested by the data but refused by policy
 */
export interface PolicyViolation {
  code: PolicyViolationCode;
  key: string;
  /** Operation that would have been emitted without the policy */
  operation: ChangeOperation['type'];
  reason: string;
}

/**
 * Options that change how the plan is built
 */
export interface ReconcileOptions {
  /** Allow creating or updating variables with an empty value */
  force: boolean;
  /** Delete remote variables that are absent from the desired collection */
  prune: boolean;
}

/**
 * Reconciliation plan
 */
export interface Plan {
  /** Deletes, then creates, then updates */
  operations: ChangeOperation[];
  /** Keys that need nothing (or whose operation was refused) */
  skipped: NoOpOperation[];
  violations: PolicyViolation[];
  summary: {
    toCreate: number;
    toUpdate: number;
    toDelete: number;
    unchanged: number;
    total: number;
  };
  hasChanges: boolean;
}

// =============================================================================
// Apply
// =============================================================================

/**
 * Apply options for the reconciler
 */
export interface ApplyOptions {
  /** If true, only return the plan without making changes */
  dryRun: boolean;
  /** Stop at the first failed operation (default: true) */
  failFast?: boolean;
}

/**
 * Outcome of a single operation
 */
export type ApplyStatus = 'applied' | 'failed' | 'not_attempted' | 'planned';

export interface ApplyActionResult {
  operation: ChangeOperation;
  status: ApplyStatus;
  error?: RemoteError;
}

/**
 * Result of applying a plan
 */
export interface ApplyResult {
  results: ApplyActionResult[];
  summary: {
    created: number;
    updated: number;
    deleted: number;
    failed: number;
    notAttempted: number;
    skipped: number;
  };
  /** One line per failed operation */
  errors: string[];
  /** True when a failure stopped the run early */
  aborted: boolean;
  success: boolean;
}

// =============================================================================
// File format
// =============================================================================

/**
 * A variable as written in the variables file
 */
export interface VariableFileEntry {
  key: string;
  value: string;
  description?: string;
  protected: boolean;
  masked: boolean;
  variable_type: VariableType;
}

export interface VariableFileMetadata {
  project_id: string;
  exported_at: string;
  total_variables: number;
  gitlab_url: string;
}

/**
 * The variables file (export output, import/diff/push input)
 */
export interface VariableFile {
  variables: VariableFileEntry[];
  metadata?: VariableFileMetadata;
}
