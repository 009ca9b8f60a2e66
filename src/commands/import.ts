/**
 * import command - Create and update variables from a file; never deletes
 */

import type { CommandContext, CommandResult } from '../types.js';
import { runSync, type SyncOptions, type SyncResult } from './sync.js';

export type ImportOptions = SyncOptions;

export async function importCommand(
  ctx: CommandContext,
  file: string,
  options: ImportOptions = {}
): Promise<CommandResult<SyncResult>> {
  return runSync(ctx, file, 'import', options);
}
