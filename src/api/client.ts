/**
 * Directory API Client
 *
 * Provides a typed interface to directory applications with:
 * - Consistency retries on eventually-consistent reads and writes
 * - Retry with exponential backoff for 429/5xx and network failures
 * - Idempotent reference edge mutations
 * - JSON logging with secret redaction
 */

import type { DirectoryClientConfig } from './types.js';
import { createTransport, type DirectoryTransport } from './transport.js';
import { createApplicationsClient, type ApplicationsClient } from './applications.js';
import { logger, ApiLogger } from './logger.js';
import { resolveClientConfig, type ResolveOptions } from '../config/index.js';

/**
 * Main directory client interface
 */
export interface DirectoryClient {
  readonly applications: ApplicationsClient;
  /** Underlying transport, for reconciler operations */
  readonly transport: DirectoryTransport;
  /** Logger shared by the transport and sub-clients */
  readonly logger: ApiLogger;

  /** Get current configuration (with secrets omitted) */
  getConfig(): { baseUrl: string; apiVersion: string; tenantId?: string; timeout: number };
}

/**
 * Create a directory client
 *
 * @throws ConfigError when no access token can be resolved
 */
export function createClient(config: DirectoryClientConfig = {}, resolve: ResolveOptions = {}): DirectoryClient {
  const resolved = resolveClientConfig(config, resolve);
  const base = config.logger ?? logger;
  const log = resolved.debug ? new ApiLogger({ ...base.getConfig(), level: 'debug' }) : base;

  const transport = createTransport({
    baseUrl: resolved.baseUrl,
    apiVersion: resolved.apiVersion,
    tenantId: resolved.tenantId,
    timeout: resolved.timeout,
    tokenProvider: resolved.tokenProvider,
    userAgent: resolved.userAgent,
    retry: config.retry,
    fetch: config.fetch ?? globalThis.fetch,
    logger: log,
  });

  return {
    applications: createApplicationsClient(transport, log),
    transport,
    logger: log,

    getConfig() {
      return {
        baseUrl: resolved.baseUrl,
        apiVersion: resolved.apiVersion,
        tenantId: resolved.tenantId,
        timeout: resolved.timeout,
      };
    },
  };
}
