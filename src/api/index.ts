/**
 * Directory API client module
 *
 * Provides:
 * - DirectoryClient with the applications sub-client
 * - Consistency retry policies and outcome classifiers
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 */

// Main client
export { createClient } from './client.js';
export type { DirectoryClient } from './client.js';

export { createApplicationsClient } from './applications.js';
export type { ApplicationsClient, OperationResult, OperationOptions } from './applications.js';

// Transport
export { createTransport, buildUrl } from './transport.js';
export type { DirectoryTransport, DirectoryResponse, RequestInput, TransportConfig } from './transport.js';

// Policies and classifiers
export {
  statusIs,
  errorMatches,
  allOf,
  anyOf,
  isSuccessStatus,
  RETRY_ON_NOT_FOUND,
  RETRY_ON_ENTITLEMENT_CONFLICT,
  ACCEPT_REFERENCE_EXISTS,
  ACCEPT_REFERENCE_ABSENT,
} from './policies.js';
export type { ResponsePredicate } from './policies.js';

// OData
export {
  ODataError,
  parseODataError,
  applyQueryParams,
  queryHeaders,
  ERROR_ADDED_OBJECT_REFERENCES_ALREADY_EXIST,
  ERROR_REMOVED_OBJECT_REFERENCES_DO_NOT_EXIST,
  ERROR_RESOURCE_DOES_NOT_EXIST,
  ERROR_CANNOT_DELETE_OR_UPDATE_ENABLED_ENTITLEMENT,
} from './odata.js';

// Errors
export {
  DirectoryClientError,
  PreconditionError,
  TransportError,
  CodecError,
  CancelledError,
  ApiRequestError,
  isDirectoryError,
} from './errors.js';
export type { DirectoryError } from './errors.js';

// Retry utilities
export {
  withRetry,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';
export type { RetryOptions } from './retry.js';

// Logging
export {
  ApiLogger,
  logger,
  createLogger,
  parseLogLevel,
  redactString,
  redactPatterns,
  redactValue,
  redactObject,
  redactHeaders,
} from './logger.js';
export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  HttpMethod,
  ApiVersion,
  ODataMetadata,
  ODataQuery,
  Uri,
  ResponseInfo,
  ODataErrorBody,
  DirectoryObject,
  TokenIssuancePolicy,
  PasswordCredential,
  FederatedIdentityCredential,
  ApplicationExtension,
  Application,
  TokenProvider,
  DirectoryClientConfig,
  DirectorySettings,
  RetryConfig,
  RetryResult,
} from './types.js';
