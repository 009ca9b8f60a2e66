/**
 * push command - Make the project's variables match a file exactly
 *
 * Variables present in the project but absent from the file are deleted.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { runSync, type SyncOptions, type SyncResult } from './sync.js';

export type PushOptions = SyncOptions;

export async function pushCommand(
  ctx: CommandContext,
  file: string,
  options: PushOptions = {}
): Promise<CommandResult<SyncResult>> {
  return runSync(ctx, file, 'push', options);
}
