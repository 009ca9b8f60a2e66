/**
 * gitlab-vars library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the pieces it is built from.
 */

export * from './api/index.js';
export * from './reconcilers/index.js';
export * from './config/index.js';
export {
  exportCommand,
  importCommand,
  diffCommand,
  pushCommand,
  type ExportCommandOptions,
  type ExportResult,
  type ImportOptions,
  type DiffOptions,
  type DiffResult,
  type PushOptions,
  type SyncOptions,
  type SyncResult,
} from './commands/index.js';
export type { GlobalOptions, CommandContext, CommandResult, OutputFormat } from './types.js';
