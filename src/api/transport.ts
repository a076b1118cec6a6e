/**
 * Directory HTTP transport
 *
 * Sends one logical request, possibly over several attempts:
 * - responses in `validStatusCodes` are accepted
 * - otherwise `validStatusFunc` may accept the response (outcome classification)
 * - otherwise `consistencyFailureFunc` may flag it for a consistency retry
 * - transient statuses and network failures are retried with backoff
 *
 * GET requests follow `@odata.nextLink` unless paging is disabled.
 */

import type { ApiVersion, HttpMethod, ODataQuery, RetryConfig, TokenProvider, Uri } from './types.js';
import { ApiRequestError, CancelledError, TransportError } from './errors.js';
import { applyQueryParams, parseODataError, queryHeaders, type ODataError } from './odata.js';
import { isSuccessStatus, type ResponsePredicate } from './policies.js';
import { withRetry, parseRetryAfter } from './retry.js';
import { isRecord } from './codec.js';
import type { ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One logical request
 */
export interface RequestInput {
  method: HttpMethod;
  uri: Uri;
  query?: ODataQuery;
  /** Pre-encoded body */
  body?: string | Uint8Array;
  /** Defaults to application/json when a body is present */
  contentType?: string;
  /** Statuses that mean success */
  validStatusCodes: number[];
  /** Accepts additional responses as success */
  validStatusFunc?: ResponsePredicate;
  /** Flags a rejected response as a consistency failure worth retrying */
  consistencyFailureFunc?: ResponsePredicate;
  /** Return only the first page of a collection */
  disablePaging?: boolean;
  signal?: AbortSignal;
}

/**
 * Accepted response
 */
export interface DirectoryResponse {
  status: number;
  headers: Headers;
  /** Raw body text; for paged collections, the merged envelope */
  body: string;
  /** Whether the status matched directly or was accepted by the classifier */
  acceptedBy: 'status' | 'classifier';
  /** Decoded OData error, present when acceptedBy is 'classifier' */
  odataError?: ODataError;
  /** Attempts made for the final page */
  attempts: number;
}

/**
 * Request/response operations used by the façade and reconcilers
 */
export interface DirectoryTransport {
  request(input: RequestInput): Promise<DirectoryResponse>;
  /** Absolute `@odata.id` of a directory object, for `$ref` bodies */
  referenceUrl(id: string): string;
}

/**
 * Fully resolved transport settings
 */
export interface TransportConfig {
  baseUrl: string;
  apiVersion: ApiVersion;
  tenantId?: string;
  timeout: number;
  tokenProvider: TokenProvider;
  userAgent?: string;
  retry?: RetryConfig;
  fetch: typeof fetch;
  logger: ApiLogger;
}

// =============================================================================
// URL Construction
// =============================================================================

/**
 * Build the absolute URL for a request
 */
export function buildUrl(
  config: Pick<TransportConfig, 'baseUrl' | 'apiVersion' | 'tenantId'>,
  uri: Uri,
  query?: ODataQuery
): URL {
  const base = config.baseUrl.replace(/\/+$/, '');
  const tenant = uri.hasTenantId && config.tenantId ? `/${config.tenantId}` : '';
  const entity = uri.entity.startsWith('/') ? uri.entity : `/${uri.entity}`;

  const url = new URL(`${base}/${config.apiVersion}${tenant}${entity}`);
  applyQueryParams(url, query);
  return url;
}

// =============================================================================
// Transport Implementation
// =============================================================================

export function createTransport(config: TransportConfig): DirectoryTransport {
  const log = config.logger;

  async function buildHeaders(input: RequestInput): Promise<Record<string, string>> {
    let token: string;
    try {
      token = await config.tokenProvider();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Acquiring access token for ${input.uri.entity} failed: ${reason}`, { cause: err });
    }
    const headers: Record<string, string> = {
      ...queryHeaders(input.query),
      Authorization: `Bearer ${token}`,
    };

    if (input.body !== undefined) {
      headers['Content-Type'] = input.contentType ?? 'application/json';
    }

    if (config.userAgent) {
      headers['User-Agent'] = `dirapps ${config.userAgent}`;
    }

    return headers;
  }

  /**
   * A single HTTP exchange. Throws on anything not accepted.
   */
  async function attemptOnce(url: string, input: RequestInput, attempt: number): Promise<DirectoryResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);
    const onCallerAbort = (): void => controller.abort();
    input.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const classifyFailure = (err: unknown, what: string): Error => {
      if (input.signal?.aborted) {
        return new CancelledError(`Request to ${input.uri.entity} cancelled`, err);
      }
      if (controller.signal.aborted) {
        return new TransportError(`Request to ${input.uri.entity} timed out after ${config.timeout}ms`, {
          cause: err,
          timedOut: true,
        });
      }
      const reason = err instanceof Error ? err.message : String(err);
      return new TransportError(`${what} ${input.uri.entity} failed: ${reason}`, { cause: err });
    };

    try {
      const headers = await buildHeaders(input);
      log.request(input.method, url, { headers });

      const startTime = Date.now();
      let response: Response;
      try {
        response = await config.fetch(url, {
          method: input.method,
          headers,
          body: input.body,
          signal: controller.signal,
        });
      } catch (err) {
        throw classifyFailure(err, `${input.method}`);
      }

      let text: string;
      try {
        text = await response.text();
      } catch (err) {
        throw classifyFailure(err, 'Reading response body of');
      }

      const status = response.status;
      const odataError = isSuccessStatus(status) ? undefined : parseODataError(text);

      log.response(status, url, {
        durationMs: Date.now() - startTime,
        errorCode: odataError?.code,
        attempt,
      });

      const info = { status, headers: response.headers };

      if (input.validStatusCodes.includes(status)) {
        return { status, headers: response.headers, body: text, acceptedBy: 'status', attempts: attempt };
      }

      if (input.validStatusFunc?.(info, odataError)) {
        log.debug('Response accepted by outcome classifier', {
          status,
          errorCode: odataError?.code,
        });
        return {
          status,
          headers: response.headers,
          body: text,
          acceptedBy: 'classifier',
          odataError,
          attempts: attempt,
        };
      }

      const consistencyFailure =
        !isSuccessStatus(status) && (input.consistencyFailureFunc?.(info, odataError) ?? false);

      const message = odataError?.message
        ? `Directory API error (${status}): ${odataError.message}`
        : `Directory API error (${status}) for ${input.method} ${input.uri.entity}`;

      throw new ApiRequestError(message, status, {
        odataError,
        retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
        consistencyFailure,
      });
    } finally {
      clearTimeout(timeoutId);
      input.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  async function send(url: string, input: RequestInput): Promise<DirectoryResponse> {
    let attempt = 0;
    const result = await withRetry(() => attemptOnce(url, input, ++attempt), {
      ...config.retry,
      logger: log,
      signal: input.signal,
    });

    if (!result.success || result.data === undefined) {
      throw result.error ?? new TransportError(`${input.method} ${input.uri.entity} failed`);
    }

    return result.data;
  }

  /**
   * Merge `value` arrays across `@odata.nextLink` pages
   */
  async function followNextLinks(first: DirectoryResponse, input: RequestInput): Promise<DirectoryResponse> {
    let envelope: unknown;
    try {
      envelope = JSON.parse(first.body);
    } catch {
      // Not a collection envelope; decoding errors surface in the caller
      return first;
    }

    if (!isRecord(envelope) || !Array.isArray(envelope.value)) {
      return first;
    }

    const values: unknown[] = [...envelope.value];
    let nextLink = envelope['@odata.nextLink'];
    let last = first;

    while (typeof nextLink === 'string' && nextLink.length > 0) {
      last = await send(nextLink, input);
      let page: unknown;
      try {
        page = JSON.parse(last.body);
      } catch {
        return last;
      }
      if (!isRecord(page) || !Array.isArray(page.value)) {
        return last;
      }
      values.push(...page.value);
      nextLink = page['@odata.nextLink'];
    }

    if (last === first) {
      return first;
    }

    const merged: Record<string, unknown> = { ...envelope, value: values };
    delete merged['@odata.nextLink'];
    return { ...last, body: JSON.stringify(merged) };
  }

  return {
    async request(input: RequestInput): Promise<DirectoryResponse> {
      const url = buildUrl(config, input.uri, input.query).toString();
      const first = await send(url, input);

      if (input.method !== 'GET' || input.disablePaging) {
        return first;
      }

      return followNextLinks(first, input);
    },

    referenceUrl(id: string): string {
      return buildUrl(config, { entity: `/directoryObjects/${encodeURIComponent(id)}` }).toString();
    },
  };
}
