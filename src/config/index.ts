/**
 * Configuration module exports
 */

export {
  resolveGitLabSettings,
  loadEnvFile,
  ConfigError,
  DEFAULT_ENV_FILE,
  ENV_GITLAB_URL,
  ENV_GITLAB_TOKEN,
  ENV_GITLAB_PROJECT_ID,
  type GitLabSettings,
  type SettingSource,
  type SettingsResolveOptions,
} from './gitlab-auth.js';
