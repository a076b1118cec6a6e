/**
 * Client configuration resolution
 *
 * ## Resolution order (first match wins)
 *
 * 1. Explicit options passed to createClient()
 * 2. Environment variables
 * 3. ~/.dirapps/settings.yaml
 * 4. Defaults
 *
 * ## Environment variables
 *
 * - DIRAPPS_BASE_URL: API host (default: https://graph.microsoft.com)
 * - DIRAPPS_API_VERSION: `beta` or `v1.0` (default: beta)
 * - DIRAPPS_TENANT_ID: tenant id for tenant-scoped paths
 * - DIRAPPS_ACCESS_TOKEN: bearer token
 * - DIRAPPS_TIMEOUT_MS: per-attempt timeout (default: 30000)
 * - DIRAPPS_SETTINGS: alternative settings file path
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ApiVersion, DirectoryClientConfig, DirectorySettings, TokenProvider } from '../api/types.js';

export const DEFAULT_BASE_URL = 'https://graph.microsoft.com';
export const DEFAULT_API_VERSION: ApiVersion = 'beta';
export const DEFAULT_TIMEOUT_MS = 30000;

const API_VERSIONS: readonly ApiVersion[] = ['beta', 'v1.0'];

/**
 * Configuration could not be resolved
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: 'MISSING_TOKEN' | 'INVALID_VALUE' | 'INVALID_SETTINGS_FILE'
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Configuration with every default applied
 */
export interface ResolvedClientConfig {
  baseUrl: string;
  apiVersion: ApiVersion;
  tenantId?: string;
  timeout: number;
  tokenProvider: TokenProvider;
  debug: boolean;
  userAgent?: string;
}

/**
 * Where to look for settings; overridable for tests
 */
export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  settingsPath?: string;
}

/**
 * Default settings file location
 */
export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.DIRAPPS_SETTINGS ?? path.join(os.homedir(), '.dirapps', 'settings.yaml');
}

function parseApiVersion(value: unknown, source: string): ApiVersion | undefined {
  if (value === undefined || value === '') return undefined;
  const version = API_VERSIONS.find((v) => v === value);
  if (!version) {
    throw new ConfigError(
      `Invalid API version ${JSON.stringify(value)} in ${source}; expected one of: ${API_VERSIONS.join(', ')}`,
      'INVALID_VALUE'
    );
  }
  return version;
}

function parseTimeout(value: unknown, source: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const timeout = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigError(`Invalid timeout ${JSON.stringify(value)} in ${source}; expected milliseconds > 0`, 'INVALID_VALUE');
  }
  return timeout;
}

function optionalString(value: unknown, key: string, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Setting "${key}" in ${source} must be a string`, 'INVALID_SETTINGS_FILE');
  }
  return value;
}

/**
 * Load the YAML settings file. Returns null when it does not exist.
 */
export function loadSettingsFile(settingsPath: string): DirectorySettings | null {
  if (!fs.existsSync(settingsPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(settingsPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not read settings file ${settingsPath}: ${reason}`, 'INVALID_SETTINGS_FILE');
  }

  if (raw === null || raw === undefined) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Settings file ${settingsPath} must contain a mapping`, 'INVALID_SETTINGS_FILE');
  }

  const entries = new Map(Object.entries(raw));
  return {
    baseUrl: optionalString(entries.get('baseUrl'), 'baseUrl', settingsPath),
    apiVersion: parseApiVersion(entries.get('apiVersion'), settingsPath),
    tenantId: optionalString(entries.get('tenantId'), 'tenantId', settingsPath),
    accessToken: optionalString(entries.get('accessToken'), 'accessToken', settingsPath),
    timeout: parseTimeout(entries.get('timeout'), settingsPath),
  };
}

/**
 * Merge explicit options, environment and settings file into a full config
 */
export function resolveClientConfig(
  config: DirectoryClientConfig = {},
  options: ResolveOptions = {}
): ResolvedClientConfig {
  const env = options.env ?? process.env;
  const settings = loadSettingsFile(options.settingsPath ?? defaultSettingsPath(env)) ?? {};

  const accessToken = config.accessToken ?? (env.DIRAPPS_ACCESS_TOKEN || undefined) ?? settings.accessToken;
  const tokenProvider: TokenProvider | undefined =
    config.tokenProvider ?? (accessToken ? () => accessToken : undefined);

  if (!tokenProvider) {
    throw new ConfigError(
      'Missing access token. Configure authentication using:\n' +
        '  1. Set DIRAPPS_ACCESS_TOKEN environment variable\n' +
        '  2. Add accessToken to ~/.dirapps/settings.yaml\n' +
        '  3. Or pass accessToken / tokenProvider to createClient()',
      'MISSING_TOKEN'
    );
  }

  return {
    baseUrl: config.baseUrl ?? (env.DIRAPPS_BASE_URL || undefined) ?? settings.baseUrl ?? DEFAULT_BASE_URL,
    apiVersion:
      config.apiVersion ??
      parseApiVersion(env.DIRAPPS_API_VERSION, 'DIRAPPS_API_VERSION') ??
      settings.apiVersion ??
      DEFAULT_API_VERSION,
    tenantId: config.tenantId ?? (env.DIRAPPS_TENANT_ID || undefined) ?? settings.tenantId,
    timeout:
      config.timeout ??
      parseTimeout(env.DIRAPPS_TIMEOUT_MS, 'DIRAPPS_TIMEOUT_MS') ??
      settings.timeout ??
      DEFAULT_TIMEOUT_MS,
    tokenProvider,
    debug: config.debug ?? false,
    userAgent: config.userAgent,
  };
}
