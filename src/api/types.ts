/**
 * API types for the directory client
 *
 * Entity shapes are kept to what the client reads or writes; other fields
 * the directory returns are dropped on decode.
 */

import type { ApiLogger } from './logger.js';

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods supported by the directory API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Directory API versions
 */
export type ApiVersion = 'beta' | 'v1.0';

/**
 * OData metadata levels (sent through the Accept header)
 */
export type ODataMetadata = 'none' | 'minimal' | 'full';

/**
 * OData query options for a request
 */
export interface ODataQuery {
  /** Fields to return ($select) */
  select?: string[];
  /** Filter expression ($filter), passed through verbatim */
  filter?: string;
  /** Navigation properties to expand ($expand) */
  expand?: string[];
  /** Ordering ($orderby) */
  orderBy?: string[];
  /** Free text search ($search) */
  search?: string;
  /** Page size ($top); a positive value also disables paging */
  top?: number;
  /** Request a total count ($count) */
  count?: boolean;
  /** Metadata level for the response */
  metadata?: ODataMetadata;
  /** Sends ConsistencyLevel: eventual, required for advanced queries */
  consistencyLevel?: 'eventual';
}

/**
 * Target of a request, relative to the versioned base URL
 */
export interface Uri {
  /** Entity path, e.g. `/applications/{id}` */
  entity: string;
  /** Prefix the path with the configured tenant id */
  hasTenantId?: boolean;
}

/**
 * Minimal view of an HTTP response used by policies and classifiers
 */
export interface ResponseInfo {
  status: number;
  headers?: Headers;
}

/**
 * Structured OData error body (`{"error": {...}}`)
 */
export interface ODataErrorBody {
  code?: string;
  message?: string;
  target?: string;
  details?: ODataErrorBody[];
  innerError?: Record<string, unknown>;
}

// =============================================================================
// Entity Types
// =============================================================================

/**
 * Reference to any directory object
 */
export interface DirectoryObject {
  id?: string;
  /** Self link, serialized as `@odata.id` */
  odataId?: string;
  /** Type discriminator, serialized as `@odata.type` */
  odataType?: string;
  displayName?: string;
}

/**
 * Token issuance policy assigned to an application
 */
export interface TokenIssuancePolicy extends DirectoryObject {
  definition?: string[];
  isOrganizationDefault?: boolean;
}

/**
 * Password credential on an application
 */
export interface PasswordCredential {
  keyId?: string;
  displayName?: string;
  startDateTime?: string;
  endDateTime?: string;
  hint?: string;
  /** Only returned once, on creation */
  secretText?: string;
  customKeyIdentifier?: string;
}

/**
 * Federated identity credential on an application
 */
export interface FederatedIdentityCredential {
  id?: string;
  name?: string;
  description?: string;
  issuer?: string;
  subject?: string;
  audiences?: string[];
}

/**
 * Directory extension property registered by an application
 */
export interface ApplicationExtension {
  id?: string;
  name?: string;
  dataType?: string;
  targetObjects?: string[];
  isSyncedFromOnPremises?: boolean;
}

/**
 * Application object
 */
export interface Application extends DirectoryObject {
  appId?: string;
  description?: string;
  signInAudience?: string;
  identifierUris?: string[];
  tags?: string[];
  createdDateTime?: string;
  deletedDateTime?: string;
  passwordCredentials?: PasswordCredential[];
  /** Owners to link; only used by addOwners */
  owners?: DirectoryObject[];
  /** Policies to link; only used by assignTokenIssuancePolicy */
  tokenIssuancePolicies?: DirectoryObject[];
}

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Supplies a bearer token for each request
 */
export type TokenProvider = () => Promise<string> | string;

/**
 * Directory client configuration options
 */
export interface DirectoryClientConfig {
  /** Static access token */
  accessToken?: string;
  /** Token callback, takes precedence over accessToken */
  tokenProvider?: TokenProvider;
  /** Base URL for the API (defaults to https://graph.microsoft.com) */
  baseUrl?: string;
  /** API version segment (default: beta) */
  apiVersion?: ApiVersion;
  /** Tenant id, used for tenant-scoped paths */
  tenantId?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Custom user agent suffix */
  userAgent?: string;
  /** Retry tuning */
  retry?: RetryConfig;
  /** fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
  /** Logger (defaults to the shared client logger) */
  logger?: ApiLogger;
}

/**
 * Settings file structure (matches ~/.dirapps/settings.yaml)
 */
export interface DirectorySettings {
  baseUrl?: string;
  apiVersion?: ApiVersion;
  tenantId?: string;
  accessToken?: string;
  timeout?: number;
}

// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Maximum retries for transient failures (default: 3) */
  maxRetries?: number;
  /** Maximum retries for consistency failures (default: 8) */
  consistencyRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export interface RetryResult<T> {
  /** Whether the operation succeeded */
  success: boolean;
  /** The result data (if successful) */
  data?: T;
  /** The error (if failed) */
  error?: Error;
  /** Number of attempts made */
  attempts: number;
  /** Total time spent on retries (ms) */
  totalTimeMs: number;
}
