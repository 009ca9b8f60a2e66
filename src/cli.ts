#!/usr/bin/env node
/**
 * gitlab-vars CLI - Manage GitLab project CI/CD variables as files
 *
 * This tool provides commands for keeping a project's variables in a file:
 * - export: Write the project's variables to a file
 * - import: Create and update variables from a file (never deletes)
 * - diff: Show what push would change
 * - push: Make the project's variables match a file exactly
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import { exportCommand, importCommand, diffCommand, pushCommand } from './commands/index.js';
import { printResult, printFailure, verbose as verboseLog } from './utils/output.js';
import { resolveGitLabSettings, DEFAULT_ENV_FILE } from './config/index.js';
import { createClient } from './api/client.js';
import { logger } from './api/logger.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 * Resolves connection settings from flags, environment or env file
 */
function createContext(options: GlobalOptions): CommandContext {
  const settings = resolveGitLabSettings({
    gitlabUrl: options.gitlabUrl,
    token: options.token,
    projectId: options.projectId,
    envFile: options.envFile,
    verifySsl: options.verifySsl,
    caBundle: options.caBundle,
  });

  logger.setConfig({
    ...(options.verbose ? { level: 'debug' as const } : {}),
    ...(options.json ? { json: true } : {}),
    ...(options.logFile ? { filePath: options.logFile } : {}),
  });

  if (options.verbose) {
    if (settings.envFile) {
      verboseLog(`Read settings from ${settings.envFile}`, true);
    }
    verboseLog(`GitLab URL: ${settings.baseUrl} (via ${settings.sources.baseUrl})`, true);
    verboseLog(`Token: (via ${settings.sources.token})`, true);
    verboseLog(`Project: ${settings.projectId} (via ${settings.sources.projectId})`, true);
  }

  if (!settings.verifySsl) {
    logger.warn('SSL certificate verification is disabled', { baseUrl: settings.baseUrl });
  }

  const client = createClient({
    baseUrl: settings.baseUrl,
    token: settings.token,
    verifySsl: settings.verifySsl,
    caBundle: settings.caBundle,
  });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    settings,
    client,
    logger,
  };
}

/**
 * Run a command action: build the context, print the result, set the exit code
 */
async function runAction<T>(
  label: string,
  run: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  const globalOpts = program.opts() as GlobalOptions;

  try {
    const ctx = createContext(globalOpts);
    const result = await run(ctx);
    printResult(result, ctx.outputFormat);
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.debug(`${label} failed`, { error: reason });
    printFailure(`${label} failed: ${reason}`, globalOpts.json ? 'json' : 'human');
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('gitlab-vars')
  .description('Export, import, diff and push GitLab project CI/CD variables')
  .version(VERSION)
  // Global options available to all commands
  // Environment fallbacks are resolved in config/gitlab-auth.ts
  .addOption(
    new Option('-p, --project-id <id>', 'Project ID or group/project path (env: GITLAB_PROJECT_ID)')
  )
  .addOption(
    new Option('-u, --gitlab-url <url>', 'GitLab instance URL (env: GITLAB_URL)')
  )
  .addOption(
    new Option('-t, --token <token>', 'GitLab access token (env: GITLAB_TOKEN)')
  )
  .addOption(
    new Option('-e, --env-file <path>', 'Env file with GITLAB_* settings')
      .default(DEFAULT_ENV_FILE)
  )
  .addOption(
    new Option('--no-verify-ssl', 'Skip TLS certificate verification')
  )
  .addOption(
    new Option('--ca-bundle <path>', 'PEM file with CA certificate(s) to trust')
  )
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--best-effort', 'Keep applying after a failed operation')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  )
  .addOption(
    new Option('-l, --log-file <path>', 'Append structured logs to a file')
  );

/**
 * export command - Write variables to a file
 */
program
  .command('export')
  .description('Export project variables to a JSON or YAML file')
  .argument('<file>', 'Output file (.json, .yaml or .yml)')
  .option('--include-masked', 'Include the values of masked variables', false)
  .action(async (file: string, cmdOpts: { includeMasked: boolean }) => {
    await runAction('Export', (ctx) =>
      exportCommand(ctx, file, { includeMasked: cmdOpts.includeMasked })
    );
  });

/**
 * import command - Create and update variables, never delete
 */
program
  .command('import')
  .description('Create and update project variables from a file')
  .argument('<file>', 'Variables file (.json, .yaml or .yml)')
  .option('--force', 'Write variables with empty values', false)
  .action(async (file: string, cmdOpts: { force: boolean }) => {
    await runAction('Import', (ctx) => importCommand(ctx, file, { force: cmdOpts.force }));
  });

/**
 * diff command - Show what push would change
 */
program
  .command('diff')
  .description('Show differences between a file and the project variables')
  .argument('<file>', 'Variables file (.json, .yaml or .yml)')
  .option('--force', 'Plan empty values as push --force would', false)
  .action(async (file: string, cmdOpts: { force: boolean }) => {
    await runAction('Diff', (ctx) => diffCommand(ctx, file, { force: cmdOpts.force }));
  });

/**
 * push command - Make project variables match a file
 */
program
  .command('push')
  .description('Make project variables match a file, deleting variables not in it')
  .argument('<file>', 'Variables file (.json, .yaml or .yml)')
  .option('--force', 'Write variables with empty values', false)
  .action(async (file: string, cmdOpts: { force: boolean }) => {
    await runAction('Push', (ctx) => pushCommand(ctx, file, { force: cmdOpts.force }));
  });

// Parse and execute
await program.parseAsync();
