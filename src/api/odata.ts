/**
 * OData helpers: query encoding and structured error matching
 */

import type { ODataErrorBody, ODataQuery } from './types.js';

// =============================================================================
// Known Error Texts
// =============================================================================

/** Adding a `$ref` that is already linked */
export const ERROR_ADDED_OBJECT_REFERENCES_ALREADY_EXIST =
  /One or more added object references already exist/i;

/** Removing a `$ref` that is not linked */
export const ERROR_REMOVED_OBJECT_REFERENCES_DO_NOT_EXIST =
  /One or more removed object references do not exist/i;

/** Addressing a resource (or reference) that is not present */
export const ERROR_RESOURCE_DOES_NOT_EXIST =
  /Resource '.+' does not exist or one of its queried reference-property objects are not present/i;

/** Updating an application while one of its permissions is still enabled */
export const ERROR_CANNOT_DELETE_OR_UPDATE_ENABLED_ENTITLEMENT =
  /Permission \(scope or role\) cannot be deleted or updated unless disabled first/i;

// =============================================================================
// Structured Errors
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readErrorBody(value: unknown): ODataErrorBody | undefined {
  if (!isRecord(value)) return undefined;

  const body: ODataErrorBody = {};
  if (typeof value.code === 'string') body.code = value.code;
  if (typeof value.message === 'string') body.message = value.message;
  if (typeof value.target === 'string') body.target = value.target;
  if (Array.isArray(value.details)) {
    body.details = value.details
      .map(readErrorBody)
      .filter((d): d is ODataErrorBody => d !== undefined);
  }
  if (isRecord(value.innerError)) body.innerError = value.innerError;
  return body;
}

/**
 * Error object decoded from an OData error response
 */
export class ODataError {
  constructor(public readonly body: ODataErrorBody) {}

  get code(): string | undefined {
    return this.body.code;
  }

  get message(): string | undefined {
    return this.body.message;
  }

  /**
   * Flattened text of the error: code, message, then nested details and
   * inner error messages.
   */
  toString(): string {
    const parts: string[] = [];
    const visit = (body: ODataErrorBody): void => {
      if (body.code) parts.push(body.code);
      if (body.message) parts.push(body.message);
      for (const detail of body.details ?? []) visit(detail);
      const inner = body.innerError;
      if (inner && typeof inner.message === 'string') parts.push(inner.message);
    };
    visit(this.body);
    return parts.join(': ');
  }

  /**
   * Whether the error text matches a known error pattern
   */
  match(pattern: RegExp | string): boolean {
    const re = typeof pattern === 'string' ? new RegExp(pattern, 'i') : pattern;
    re.lastIndex = 0;
    return re.test(this.toString());
  }
}

/**
 * Decode an OData error from a response body. Returns undefined when the
 * body is empty or not an OData error envelope.
 */
export function parseODataError(text: string): ODataError | undefined {
  if (!text) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }

  if (!isRecord(parsed)) return undefined;
  const body = readErrorBody(parsed.error);
  return body ? new ODataError(body) : undefined;
}

// =============================================================================
// Query Encoding
// =============================================================================

/**
 * Append OData system query options to a URL
 */
export function applyQueryParams(url: URL, query: ODataQuery = {}): void {
  if (query.select?.length) url.searchParams.set('$select', query.select.join(','));
  if (query.filter) url.searchParams.set('$filter', query.filter);
  if (query.expand?.length) url.searchParams.set('$expand', query.expand.join(','));
  if (query.orderBy?.length) url.searchParams.set('$orderby', query.orderBy.join(','));
  if (query.search) url.searchParams.set('$search', query.search);
  if (query.top !== undefined && query.top > 0) url.searchParams.set('$top', String(query.top));
  if (query.count) url.searchParams.set('$count', 'true');
}

/**
 * Headers implied by an OData query
 */
export function queryHeaders(query: ODataQuery = {}): Record<string, string> {
  const headers: Record<string, string> = {};

  headers['Accept'] = query.metadata
    ? `application/json; odata.metadata=${query.metadata}`
    : 'application/json';

  if (query.consistencyLevel) {
    headers['ConsistencyLevel'] = query.consistencyLevel;
  }

  return headers;
}
