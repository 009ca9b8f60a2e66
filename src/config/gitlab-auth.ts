/**
 * GitLab connection settings for gitlab-vars
 *
 * ## Resolution Order (per setting)
 *
 * 1. CLI flag (--gitlab-url, --token, --project-id)
 * 2. Process environment (GITLAB_URL, GITLAB_TOKEN, GITLAB_PROJECT_ID)
 * 3. Env file (default: ./gitlab.env), parsed with dotenv; process.env is
 *    never modified
 *
 * ## Environment Variables
 *
 * - GITLAB_URL: GitLab instance URL, e.g. https://gitlab.example.com
 * - GITLAB_TOKEN: access token with the `api` scope
 * - GITLAB_PROJECT_ID: numeric project ID or `group/project` path
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseDotenv } from 'dotenv';

export const DEFAULT_ENV_FILE = 'gitlab.env';

export const ENV_GITLAB_URL = 'GITLAB_URL';
export const ENV_GITLAB_TOKEN = 'GITLAB_TOKEN';
export const ENV_GITLAB_PROJECT_ID = 'GITLAB_PROJECT_ID';

/**
 * Where a setting came from
 */
export type SettingSource = 'cli' | 'env' | 'env_file';

/**
 * Inputs to settings resolution
 */
export interface SettingsResolveOptions {
  gitlabUrl?: string;
  token?: string;
  projectId?: string;
  /** Path of the env file (default: gitlab.env) */
  envFile?: string;
  /** Verify TLS certificates (default: true) */
  verifySsl?: boolean;
  /** PEM file with the CA certificate(s) to trust */
  caBundle?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Fully resolved connection settings
 */
export interface GitLabSettings {
  baseUrl: string;
  token: string;
  projectId: string;
  verifySsl: boolean;
  caBundle?: string;
  /** Path of the env file, when one was read */
  envFile?: string;
  sources: {
    baseUrl: SettingSource;
    token: SettingSource;
    projectId: SettingSource;
  };
}

/**
 * Error thrown when required settings are missing
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly missing: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read an env file. A missing file yields an empty record.
 */
export function loadEnvFile(filePath: string): Record<string, string> {
  if (!existsSync(filePath)) {
    return {};
  }
  return parseDotenv(readFileSync(filePath, 'utf-8'));
}

function pick(
  name: string,
  cliValue: string | undefined,
  env: NodeJS.ProcessEnv,
  fileEnv: Record<string, string>
): { value: string; source: SettingSource } | undefined {
  if (cliValue && cliValue.trim().length > 0) {
    return { value: cliValue.trim(), source: 'cli' };
  }
  const fromEnv = env[name];
  if (fromEnv && fromEnv.trim().length > 0) {
    return { value: fromEnv.trim(), source: 'env' };
  }
  const fromFile = fileEnv[name];
  if (fromFile && fromFile.trim().length > 0) {
    return { value: fromFile.trim(), source: 'env_file' };
  }
  return undefined;
}

/**
 * Resolve GitLab URL, token and project from flags, environment and env file
 *
 * @throws ConfigError naming every missing setting
 */
export function resolveGitLabSettings(options: SettingsResolveOptions = {}): GitLabSettings {
  const env = options.env ?? process.env;
  const envFile = options.envFile ?? DEFAULT_ENV_FILE;
  const fileEnv = loadEnvFile(envFile);
  const envFileUsed = Object.keys(fileEnv).length > 0;

  const baseUrl = pick(ENV_GITLAB_URL, options.gitlabUrl, env, fileEnv);
  const token = pick(ENV_GITLAB_TOKEN, options.token, env, fileEnv);
  const projectId = pick(ENV_GITLAB_PROJECT_ID, options.projectId, env, fileEnv);

  if (!baseUrl || !token || !projectId) {
    const missing: string[] = [];
    if (!baseUrl) missing.push(`${ENV_GITLAB_URL} (--gitlab-url)`);
    if (!token) missing.push(`${ENV_GITLAB_TOKEN} (--token)`);
    if (!projectId) missing.push(`${ENV_GITLAB_PROJECT_ID} (--project-id)`);
    throw new ConfigError(
      `Missing GitLab settings: ${missing.join(', ')}. Configure them using:\n` +
        '  1. Command line flags\n' +
        '  2. Environment variables\n' +
        `  3. An env file (--env-file, default: ${DEFAULT_ENV_FILE})`,
      missing
    );
  }

  return {
    baseUrl: baseUrl.value.replace(/\/+$/, ''),
    token: token.value,
    projectId: projectId.value,
    verifySsl: options.verifySsl ?? true,
    caBundle: options.caBundle,
    envFile: envFileUsed ? envFile : undefined,
    sources: {
      baseUrl: baseUrl.source,
      token: token.source,
      projectId: projectId.source,
    },
  };
}
