/**
 * Shared plan-building steps for diff, import and push
 */

import type { CommandContext, CommandResult } from '../types.js';
import { verbose } from '../utils/output.js';
import type { FormatError } from '../reconcilers/variables/errors.js';
import { collectionFromRemote, loadVariableFile } from '../reconcilers/variables/parse.js';
import { reconcile } from '../reconcilers/variables/diff.js';
import type { Plan, ReconcileOptions } from '../reconcilers/variables/types.js';

/**
 * Load the desired state from `file`, fetch the observed state and reconcile.
 * The file is validated before any remote call.
 */
export async function buildPlan(
  ctx: CommandContext,
  file: string,
  options: ReconcileOptions
): Promise<Plan> {
  const { options: globalOpts, settings, client } = ctx;

  const desired = await loadVariableFile(file);
  verbose(`Loaded ${desired.size} variable(s) from ${file}`, globalOpts.verbose);

  const remote = await client.variables.list(settings.projectId);
  verbose(`Fetched ${remote.length} variable(s) from project ${settings.projectId}`, globalOpts.verbose);

  const plan = reconcile(desired, collectionFromRemote(remote), options);
  ctx.logger.debug('Plan built', {
    projectId: settings.projectId,
    ...plan.summary,
    violations: plan.violations.length,
  });
  return plan;
}

/**
 * Command result for a variables file that failed validation
 */
export function formatErrorResult(err: FormatError): CommandResult<never> {
  return {
    success: false,
    message: err.message,
    errors: err.issues.map((issue) => `[${issue.code}] ${issue.path}: ${issue.message}`),
  };
}
