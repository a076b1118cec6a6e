/**
 * Configuration module exports
 */

export {
  resolveClientConfig,
  loadSettingsFile,
  defaultSettingsPath,
  ConfigError,
  DEFAULT_BASE_URL,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT_MS,
  type ResolvedClientConfig,
  type ResolveOptions,
} from './settings.js';
