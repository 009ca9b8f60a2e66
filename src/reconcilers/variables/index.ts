/**
 * Variable reconciler exports
 *
 * Provides types and functions for managing CI/CD variable state between
 * desired (variables file) and observed (GitLab API) states.
 */

// Types from types.ts
export type {
  Variable,
  VariableType,
  VariableCollection,
  VariableField,
  FieldChange,
  CreateOperation,
  UpdateOperation,
  DeleteOperation,
  NoOpOperation,
  ChangeOperation,
  PlanOperation,
  PlanOperationType,
  PolicyViolation,
  PolicyViolationCode,
  ReconcileOptions,
  Plan,
  ApplyOptions,
  ApplyStatus,
  ApplyActionResult,
  ApplyResult,
  VariableFile,
  VariableFileEntry,
  VariableFileMetadata,
} from './types.js';

export {
  VARIABLE_TYPES,
  VARIABLE_KEY_PATTERN,
  REDACTED_VALUE,
  MASKED_EXPORT_DESCRIPTION,
} from './types.js';

// Errors
export { FormatError, RemoteError } from './errors.js';
export type { FormatIssue, FormatIssueCode } from './errors.js';

// Parsing
export {
  parseVariableDocument,
  parseVariableFileContent,
  loadVariableFile,
  variableFromRemote,
  collectionFromRemote,
  isYamlPath,
} from './parse.js';

// Diff functions
export {
  reconcile,
  isRedacted,
  computeStructuralChanges,
  formatPlanSummary,
  formatPlanDetails,
  formatPlanAsJson,
  redactOperation,
  redactPlan,
  redactApplyResult,
  MASKED_PLACEHOLDER,
} from './diff.js';

// Apply
export { applyPlan } from './apply.js';

// Export
export {
  buildExportDocument,
  uniqueByKey,
  toFileEntry,
  serializeVariableFile,
  writeVariableFile,
} from './export.js';

export type { ExportOptions } from './export.js';
