/**
 * diff command - Show what `push` would change, without writing anything
 */

import type { CommandContext, CommandResult } from '../types.js';
import { header, info, printPlan, verbose } from '../utils/output.js';
import { FormatError } from '../reconcilers/variables/errors.js';
import { redactPlan } from '../reconcilers/variables/diff.js';
import type { Plan } from '../reconcilers/variables/types.js';
import { buildPlan, formatErrorResult } from './plan.js';

export interface DiffOptions {
  /** Plan empty values as if --force were given */
  force?: boolean;
}

export interface DiffResult {
  projectId: string;
  /** Masked values replaced by [MASKED] */
  plan: Plan;
}

/**
 * Execute the diff command
 * Compares a variables file with the project's current variables
 */
export async function diffCommand(
  ctx: CommandContext,
  file: string,
  options: DiffOptions = {}
): Promise<CommandResult<DiffResult>> {
  const { options: globalOpts, outputFormat, settings } = ctx;

  verbose(`Executing diff command`, globalOpts.verbose);
  verbose(`Project: ${settings.projectId}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Variable Diff');
    info(`Comparing ${file} with project ${settings.projectId}...`);
  }

  let plan: Plan;
  try {
    plan = await buildPlan(ctx, file, { force: options.force ?? false, prune: true });
  } catch (err) {
    if (err instanceof FormatError) return formatErrorResult(err);
    throw err;
  }

  if (outputFormat === 'human') {
    printPlan(plan, settings.projectId);
  }

  const pending = plan.operations.length;

  return {
    success: true,
    message: pending === 0
      ? 'No differences found'
      : `Found ${pending} difference(s) (${plan.summary.toCreate} create, ${plan.summary.toUpdate} update, ${plan.summary.toDelete} delete)`,
    data: { projectId: settings.projectId, plan: redactPlan(plan) },
  };
}
