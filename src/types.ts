/**
 * Shared types and interfaces for the gitlab-vars CLI
 */

import type { GitLabClient } from './api/client.js';
import type { ApiLogger } from './api/logger.js';
import type { GitLabSettings } from './config/gitlab-auth.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Numeric project ID or `group/project` path */
  projectId?: string;
  /** GitLab instance URL */
  gitlabUrl?: string;
  /** GitLab access token */
  token?: string;
  /** Env file holding GITLAB_* settings */
  envFile: string;
  /** Verify TLS certificates (false with --no-verify-ssl) */
  verifySsl: boolean;
  /** PEM file with CA certificate(s) to trust */
  caBundle?: string;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Keep applying after a failed operation */
  bestEffort: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** Append structured logs to this file */
  logFile?: string;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Everything a command needs to run
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Resolved connection settings */
  settings: GitLabSettings;
  client: GitLabClient;
  logger: ApiLogger;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
