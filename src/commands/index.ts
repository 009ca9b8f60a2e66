/**
 * Command exports
 */

export { exportCommand, type ExportCommandOptions, type ExportResult } from './export.js';
export { importCommand, type ImportOptions } from './import.js';
export { diffCommand, type DiffOptions, type DiffResult } from './diff.js';
export { pushCommand, type PushOptions } from './push.js';
export { runSync, type SyncOptions, type SyncResult } from './sync.js';
