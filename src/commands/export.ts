/**
 * export command - Write the project's variables to a file
 */

import type { CommandContext, CommandResult } from '../types.js';
import { dryRunNotice, header, info, verbose, warn } from '../utils/output.js';
import { buildExportDocument, uniqueByKey, writeVariableFile } from '../reconcilers/variables/export.js';
import type { VariableFile } from '../reconcilers/variables/types.js';

export interface ExportCommandOptions {
  /** Write real values of masked variables */
  includeMasked?: boolean;
}

export interface ExportResult {
  file: string;
  total: number;
  /** Masked keys whose value was left out */
  withheld: string[];
  /** Keys listed for several environment scopes; only the first was exported */
  repeated: string[];
  written: boolean;
}

/**
 * Execute the export command
 */
export async function exportCommand(
  ctx: CommandContext,
  file: string,
  options: ExportCommandOptions = {}
): Promise<CommandResult<ExportResult>> {
  const { options: globalOpts, outputFormat, settings, client } = ctx;
  const includeMasked = options.includeMasked ?? false;

  verbose(`Executing export command`, globalOpts.verbose);
  verbose(`Project: ${settings.projectId}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Export Variables');
    if (globalOpts.dryRun) {
      dryRunNotice();
    }
  }

  const remote = await client.variables.list(settings.projectId);
  const { variables, repeated } = uniqueByKey(remote);
  const document: VariableFile = buildExportDocument(variables, {
    projectId: settings.projectId,
    gitlabUrl: settings.baseUrl,
    includeMasked,
  });

  const withheld = includeMasked
    ? []
    : variables.filter((variable) => variable.masked).map((variable) => variable.key);

  if (repeated.length > 0) {
    ctx.logger.warn('Variables defined in several environment scopes; exported the first of each', {
      keys: repeated,
    });
  }

  if (!globalOpts.dryRun) {
    await writeVariableFile(document, file);
  }
  ctx.logger.info('Variables exported', {
    projectId: settings.projectId,
    total: variables.length,
    withheld: withheld.length,
    file,
    dryRun: globalOpts.dryRun,
  });

  if (outputFormat === 'human') {
    info(`${variables.length} variable(s) found in project ${settings.projectId}`);
    if (withheld.length > 0) {
      warn(`Masked values not exported (use --include-masked): ${withheld.join(', ')}`);
    }
    if (repeated.length > 0) {
      warn(`Only the first environment scope was exported for: ${repeated.join(', ')}`);
    }
  }

  return {
    success: true,
    message: globalOpts.dryRun
      ? `Would export ${variables.length} variable(s) to ${file}`
      : `Exported ${variables.length} variable(s) to ${file}`,
    data: { file, total: variables.length, withheld, repeated, written: !globalOpts.dryRun },
  };
}
