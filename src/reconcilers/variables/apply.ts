/**
 * Variable reconciliation apply logic
 *
 * Executes the operations of a plan, in plan order, against the GitLab
 * variables API. Failures never throw: each one is captured as a RemoteError
 * on its operation's result. With failFast (the default) the first failure
 * stops the run and the remaining operations are reported as not attempted.
 */

import type { GitLabClient } from '../../api/client.js';
import type { ProjectId } from '../../api/types.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { RemoteError } from './errors.js';
import type {
  ApplyActionResult,
  ApplyOptions,
  ApplyResult,
  ChangeOperation,
  Plan,
} from './types.js';

/**
 * Execute a single plan operation
 */
async function executeOperation(
  client: GitLabClient,
  projectId: ProjectId,
  operation: ChangeOperation
): Promise<void> {
  const { variable } = operation;

  switch (operation.type) {
    case 'create':
      await client.variables.create(projectId, {
        key: variable.key,
        value: variable.value,
        variableType: variable.variableType,
        protected: variable.protected,
        masked: variable.masked,
        description: variable.description,
      });
      return;

    case 'update':
      await client.variables.update(projectId, operation.key, {
        value: variable.value,
        variableType: variable.variableType,
        protected: variable.protected,
        masked: variable.masked,
      });
      return;

    case 'delete':
      await client.variables.delete(projectId, operation.key);
      return;
  }
}

function summarize(results: ApplyActionResult[], plan: Plan): ApplyResult['summary'] {
  const count = (type: ChangeOperation['type']): number =>
    results.filter((r) => r.status === 'applied' && r.operation.type === type).length;

  return {
    created: count('create'),
    updated: count('update'),
    deleted: count('delete'),
    failed: results.filter((r) => r.status === 'failed').length,
    notAttempted: results.filter((r) => r.status === 'not_attempted').length,
    skipped: plan.skipped.length,
  };
}

/**
 * Apply a reconciliation plan
 *
 * @param client - GitLab API client
 * @param projectId - Numeric ID or path of the project
 * @param plan - Plan built by reconcile()
 * @param options - Apply options including dryRun and failFast
 */
export async function applyPlan(
  client: GitLabClient,
  projectId: ProjectId,
  plan: Plan,
  options: ApplyOptions,
  log: ApiLogger = defaultLogger
): Promise<ApplyResult> {
  const failFast = options.failFast ?? true;

  if (options.dryRun) {
    const results: ApplyActionResult[] = plan.operations.map((operation) => ({
      operation,
      status: 'planned',
    }));
    return {
      results,
      summary: {
        created: plan.summary.toCreate,
        updated: plan.summary.toUpdate,
        deleted: plan.summary.toDelete,
        failed: 0,
        notAttempted: 0,
        skipped: plan.summary.unchanged,
      },
      errors: [],
      aborted: false,
      success: true,
    };
  }

  const results: ApplyActionResult[] = [];
  const errors: string[] = [];
  let aborted = false;

  for (const operation of plan.operations) {
    if (aborted) {
      results.push({ operation, status: 'not_attempted' });
      continue;
    }

    log.info(`Applying ${operation.type}`, { key: operation.key, projectId });

    try {
      await executeOperation(client, projectId, operation);
      results.push({ operation, status: 'applied' });
    } catch (err) {
      const error = new RemoteError(operation, err);
      log.error(error.message, error, { key: operation.key, operation: operation.type });
      results.push({ operation, status: 'failed', error });
      errors.push(error.message);
      if (failFast) aborted = true;
    }
  }

  return {
    results,
    summary: summarize(results, plan),
    errors,
    aborted,
    success: errors.length === 0,
  };
}
