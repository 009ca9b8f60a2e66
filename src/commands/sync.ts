/**
 * Shared flow of the import and push commands
 *
 * Both load the variables file, reconcile it against the project and apply
 * the resulting plan. They differ only in pruning: import never deletes,
 * push deletes variables absent from the file.
 */

import type { CommandContext, CommandResult } from '../types.js';
import {
  dryRunNotice,
  header,
  info,
  printApplyResult,
  printPlan,
  verbose,
  warn,
} from '../utils/output.js';
import { FormatError } from '../reconcilers/variables/errors.js';
import { applyPlan } from '../reconcilers/variables/apply.js';
import { redactApplyResult, redactPlan } from '../reconcilers/variables/diff.js';
import type { ApplyResult, Plan } from '../reconcilers/variables/types.js';
import { buildPlan, formatErrorResult } from './plan.js';

export interface SyncOptions {
  /** Allow empty values to be written */
  force?: boolean;
}

export interface SyncResult {
  projectId: string;
  /** Masked values replaced by [MASKED], as in `apply` */
  plan: Plan;
  apply: ApplyResult;
}

/**
 * Reconcile `file` against the project and apply the plan
 */
export async function runSync(
  ctx: CommandContext,
  file: string,
  mode: 'import' | 'push',
  options: SyncOptions = {}
): Promise<CommandResult<SyncResult>> {
  const { options: globalOpts, outputFormat, settings } = ctx;
  const prune = mode === 'push';

  verbose(`Executing ${mode} command`, globalOpts.verbose);
  verbose(`Project: ${settings.projectId}`, globalOpts.verbose);
  verbose(`Force: ${options.force ?? false}, prune: ${prune}, fail-fast: ${!globalOpts.bestEffort}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header(mode === 'push' ? 'Push Variables' : 'Import Variables');
    if (globalOpts.dryRun) {
      dryRunNotice();
    }
  }

  let plan: Plan;
  try {
    plan = await buildPlan(ctx, file, { force: options.force ?? false, prune });
  } catch (err) {
    if (err instanceof FormatError) return formatErrorResult(err);
    throw err;
  }

  if (outputFormat === 'human') {
    printPlan(plan, settings.projectId);
    if (!plan.hasChanges) {
      info('Nothing to apply');
    }
  }

  const apply = await applyPlan(
    ctx.client,
    settings.projectId,
    plan,
    { dryRun: globalOpts.dryRun, failFast: !globalOpts.bestEffort },
    ctx.logger
  );

  if (outputFormat === 'human' && plan.hasChanges) {
    printApplyResult(apply);
    if (apply.aborted) {
      warn('Stopped after the first failure; re-run with --best-effort to continue past failures');
    }
  }

  const data: SyncResult = {
    projectId: settings.projectId,
    plan: redactPlan(plan),
    apply: redactApplyResult(apply),
  };
  const { summary } = apply;

  if (globalOpts.dryRun) {
    return {
      success: true,
      message: `Dry run: would create ${summary.created}, update ${summary.updated}, delete ${summary.deleted}`,
      data,
    };
  }

  if (!apply.success) {
    return {
      success: false,
      message: `${mode} finished with ${summary.failed} failure(s)`,
      data,
      errors: apply.errors,
    };
  }

  return {
    success: true,
    message: `Created ${summary.created}, updated ${summary.updated}, deleted ${summary.deleted}, unchanged ${summary.skipped}`,
    data,
  };
}
