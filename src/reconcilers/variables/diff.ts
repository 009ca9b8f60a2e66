/**
 * Variable diff algorithm
 *
 * Compares the desired variables (from a file) with the observed variables
 * (from GitLab) and builds a reconciliation plan. Pure: no network or file
 * access happens here.
 *
 * Masked variables may come back from the API with their value withheld
 * (REDACTED_VALUE). Such a value is never compared: a non-empty desired value
 * is always written, and an empty desired value never is.
 */

import type {
  ApplyResult,
  ChangeOperation,
  CreateOperation,
  DeleteOperation,
  FieldChange,
  NoOpOperation,
  Plan,
  PolicyViolation,
  ReconcileOptions,
  UpdateOperation,
  Variable,
  VariableCollection,
} from './types.js';
import { REDACTED_VALUE } from './types.js';

/**
 * Placeholder shown instead of masked values in reports
 */
export const MASKED_PLACEHOLDER = '[MASKED]';

/**
 * True when the observed value of a masked variable was withheld by the store
 */
export function isRedacted(observed: Variable): boolean {
  return observed.masked && observed.value === REDACTED_VALUE;
}

/**
 * Differences in `protected`, `masked` and `variableType`
 */
export function computeStructuralChanges(
  desired: Variable,
  observed: Variable
): FieldChange[] {
  const changes: FieldChange[] = [];

  if (desired.protected !== observed.protected) {
    changes.push({ field: 'protected', oldValue: observed.protected, newValue: desired.protected });
  }
  if (desired.masked !== observed.masked) {
    changes.push({ field: 'masked', oldValue: observed.masked, newValue: desired.masked });
  }
  if (desired.variableType !== observed.variableType) {
    changes.push({
      field: 'variableType',
      oldValue: observed.variableType,
      newValue: desired.variableType,
    });
  }

  return changes;
}

/**
 * Outcome of comparing the values of a variable present on both sides
 */
interface ValueComparison {
  change?: FieldChange;
  violation?: PolicyViolation;
}

function compareValues(
  desired: Variable,
  observed: Variable,
  options: ReconcileOptions
): ValueComparison {
  const redacted = isRedacted(observed);

  if (desired.value === '') {
    if (redacted) {
      return {
        violation: {
          code: 'MASKED_EMPTY_VALUE',
          key: desired.key,
          operation: 'update',
          reason: options.force
            ? 'Masked variable has an empty value in the file; the remote value is kept even with --force'
            : 'Masked variable has an empty value in the file (redacted export?); the remote value is kept',
        },
      };
    }
    if (observed.value === '') {
      return {};
    }
    if (!options.force) {
      return {
        violation: {
          code: 'EMPTY_VALUE',
          key: desired.key,
          operation: 'update',
          reason: 'Empty value in the file would blank the remote value; use --force to write it',
        },
      };
    }
    return { change: { field: 'value', oldValue: observed.value, newValue: '' } };
  }

  if (redacted) {
    return {
      change: { field: 'value', oldValue: REDACTED_VALUE, newValue: desired.value, unverified: true },
    };
  }

  if (desired.value !== observed.value) {
    return { change: { field: 'value', oldValue: observed.value, newValue: desired.value } };
  }

  return {};
}

/**
 * Plan the change for a key present in both collections
 */
function planExisting(
  desired: Variable,
  observed: Variable,
  options: ReconcileOptions
): { operation: UpdateOperation | NoOpOperation; violations: PolicyViolation[] } {
  const violations: PolicyViolation[] = [];
  const changes = computeStructuralChanges(desired, observed);
  const value = compareValues(desired, observed, options);

  if (value.violation) violations.push(value.violation);
  if (value.change) changes.unshift(value.change);

  if (changes.length === 0) {
    return {
      operation: {
        type: 'noop',
        key: desired.key,
        reason: value.violation ? value.violation.reason : 'Variable is in sync',
      },
      violations,
    };
  }

  if (!value.change && isRedacted(observed)) {
    // The update endpoint needs a value; sending the sentinel would wipe the secret
    const reason = `Cannot change ${changes.map((c) => c.field).join(', ')} of a masked variable without its value`;
    violations.push({ code: 'MASKED_VALUE_UNKNOWN', key: desired.key, operation: 'update', reason });
    return { operation: { type: 'noop', key: desired.key, reason }, violations };
  }

  return {
    operation: {
      type: 'update',
      key: desired.key,
      variable: value.change ? desired : { ...desired, value: observed.value },
      changes,
    },
    violations,
  };
}

/**
 * Plan the change for a key only present in the desired collection
 */
function planMissing(
  desired: Variable,
  options: ReconcileOptions
): { operation: CreateOperation | NoOpOperation; violation?: PolicyViolation } {
  if (desired.value === '') {
    const violation: PolicyViolation | undefined = desired.masked
      ? {
          code: 'MASKED_EMPTY_VALUE',
          key: desired.key,
          operation: 'create',
          reason: 'Masked variable has an empty value in the file; it is not created',
        }
      : !options.force
        ? {
            code: 'EMPTY_VALUE',
            key: desired.key,
            operation: 'create',
            reason: 'Variable has an empty value; use --force to create it',
          }
        : undefined;

    if (violation) {
      return { operation: { type: 'noop', key: desired.key, reason: violation.reason }, violation };
    }
  }

  return { operation: { type: 'create', key: desired.key, variable: desired } };
}

/**
 * Plan the change for a key only present in the observed collection
 */
function planOrphan(
  observed: Variable,
  options: ReconcileOptions
): { operation: DeleteOperation | NoOpOperation; violation?: PolicyViolation } {
  if (options.prune) {
    return { operation: { type: 'delete', key: observed.key, variable: observed } };
  }
  const reason = 'Variable exists remotely but not in the file; use push to delete it';
  return {
    operation: { type: 'noop', key: observed.key, reason },
    violation: { code: 'PRUNE_REQUIRED', key: observed.key, operation: 'delete', reason },
  };
}

/**
 * Main reconcile function - compares desired state with observed state
 * and generates a plan
 */
export function reconcile(
  desired: VariableCollection,
  observed: VariableCollection,
  options: ReconcileOptions
): Plan {
  const creates: CreateOperation[] = [];
  const updates: UpdateOperation[] = [];
  const deletes: DeleteOperation[] = [];
  const skipped: NoOpOperation[] = [];
  const violations: PolicyViolation[] = [];

  for (const [key, wanted] of desired) {
    const current = observed.get(key);

    if (!current) {
      const { operation, violation } = planMissing(wanted, options);
      if (violation) violations.push(violation);
      if (operation.type === 'create') creates.push(operation);
      else skipped.push(operation);
      continue;
    }

    const result = planExisting(wanted, current, options);
    violations.push(...result.violations);
    if (result.operation.type === 'update') updates.push(result.operation);
    else skipped.push(result.operation);
  }

  for (const [key, current] of observed) {
    if (desired.has(key)) continue;

    const { operation, violation } = planOrphan(current, options);
    if (violation) violations.push(violation);
    if (operation.type === 'delete') deletes.push(operation);
    else skipped.push(operation);
  }

  // Deletes first: frees keys before anything is created
  const operations: ChangeOperation[] = [...deletes, ...creates, ...updates];

  const summary = {
    toCreate: creates.length,
    toUpdate: updates.length,
    toDelete: deletes.length,
    unchanged: skipped.length,
    total: operations.length + skipped.length,
  };

  return {
    operations,
    skipped,
    violations,
    summary,
    hasChanges: operations.length > 0,
  };
}

// =============================================================================
// Report formatting
// =============================================================================

/**
 * Render a field value for a report, hiding values of masked variables
 */
function displayValue(change: FieldChange, masked: boolean, side: 'old' | 'new'): string {
  const value = side === 'old' ? change.oldValue : change.newValue;
  if (change.field === 'value') {
    if (side === 'old' && change.unverified) return '(hidden)';
    if (masked) return MASKED_PLACEHOLDER;
    return value === '' ? '(empty)' : truncate(String(value), 50);
  }
  return String(value);
}

/**
 * Format plan as human-readable summary
 */
export function formatPlanSummary(plan: Plan, projectId?: string): string {
  const lines: string[] = [];
  const { summary } = plan;

  lines.push('=== Variable Differences ===');
  if (projectId) lines.push(`Project: ${projectId}`);
  lines.push(`Create:    ${summary.toCreate}`);
  lines.push(`Update:    ${summary.toUpdate}`);
  lines.push(`Delete:    ${summary.toDelete}`);
  lines.push(`Unchanged: ${summary.unchanged}`);

  if (plan.violations.length > 0) {
    lines.push('');
    lines.push('Warnings:');
    for (const violation of plan.violations) {
      lines.push(`  ! ${violation.key}: ${violation.reason}`);
    }
  }

  lines.push('');
  lines.push(plan.hasChanges ? 'Status: CHANGES NEEDED' : 'Status: IN SYNC');

  return lines.join('\n');
}

/**
 * Format plan operations as detailed human-readable report
 */
export function formatPlanDetails(plan: Plan): string {
  const lines: string[] = [];

  const deletes = plan.operations.filter((op) => op.type === 'delete');
  const creates = plan.operations.filter((op) => op.type === 'create');
  const updates = plan.operations.filter((op): op is UpdateOperation => op.type === 'update');

  if (deletes.length > 0) {
    lines.push('Variables to remove:');
    for (const op of deletes) lines.push(`  - ${op.key}`);
  }

  if (creates.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Variables to add:');
    for (const op of creates) {
      const flags = describeFlags(op.variable);
      lines.push(`  + ${op.key}${flags ? ` (${flags})` : ''}`);
    }
  }

  if (updates.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Variables to modify:');
    for (const op of updates) {
      lines.push(`  ~ ${op.key}`);
      const masked = op.variable.masked || op.changes.some((c) => c.field === 'masked');
      for (const change of op.changes) {
        lines.push(
          `      ${change.field}: ${displayValue(change, masked, 'old')} -> ${displayValue(change, masked, 'new')}`
        );
      }
    }
  }

  return lines.join('\n');
}

function hideValue(variable: Variable): Variable {
  return variable.masked ? { ...variable, value: MASKED_PLACEHOLDER } : variable;
}

/**
 * Copy of an operation with masked values replaced by MASKED_PLACEHOLDER.
 * A value change is hidden when either side of it is masked.
 */
export function redactOperation(op: ChangeOperation): ChangeOperation {
  if (op.type !== 'update') {
    return { ...op, variable: hideValue(op.variable) };
  }

  const masked = op.variable.masked || op.changes.some((change) => change.field === 'masked');
  return {
    ...op,
    variable: hideValue(op.variable),
    changes: op.changes.map((change) =>
      change.field === 'value' && masked
        ? { ...change, oldValue: MASKED_PLACEHOLDER, newValue: MASKED_PLACEHOLDER }
        : change
    ),
  };
}

/**
 * Copy of a plan that is safe to print or log
 */
export function redactPlan(plan: Plan): Plan {
  return { ...plan, operations: plan.operations.map(redactOperation) };
}

export function redactApplyResult(result: ApplyResult): ApplyResult {
  return {
    ...result,
    results: result.results.map((action) => ({
      ...action,
      operation: redactOperation(action.operation),
    })),
  };
}

/**
 * Format plan as JSON (machine-readable), with masked values redacted
 */
export function formatPlanAsJson(plan: Plan): string {
  const { hasChanges, summary, operations, skipped, violations } = redactPlan(plan);
  return JSON.stringify({ hasChanges, summary, operations, skipped, violations }, null, 2);
}

function describeFlags(variable: Variable): string {
  const flags: string[] = [];
  if (variable.protected) flags.push('protected');
  if (variable.masked) flags.push('masked');
  if (variable.variableType === 'file') flags.push('file');
  return flags.join(', ');
}

/**
 * Helper: Truncate string with ellipsis
 */
function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}
