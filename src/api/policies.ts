/**
 * Response predicates
 *
 * Two kinds of predicate share one signature:
 * - consistency retry policies decide whether a rejected response is an
 *   artifact of replication lag and should be retried
 * - outcome classifiers decide whether a rejected response actually means
 *   the desired end state already holds
 *
 * The transport evaluates the classifier first; a classified response is
 * accepted and never retried.
 */

import type { ResponseInfo } from './types.js';
import {
  type ODataError,
  ERROR_ADDED_OBJECT_REFERENCES_ALREADY_EXIST,
  ERROR_REMOVED_OBJECT_REFERENCES_DO_NOT_EXIST,
  ERROR_RESOURCE_DOES_NOT_EXIST,
  ERROR_CANNOT_DELETE_OR_UPDATE_ENABLED_ENTITLEMENT,
} from './odata.js';

/**
 * Decision over a response and its decoded OData error (if any)
 */
export type ResponsePredicate = (response: ResponseInfo, error?: ODataError) => boolean;

// =============================================================================
// Building Blocks
// =============================================================================

export function statusIs(...statuses: number[]): ResponsePredicate {
  return (response) => statuses.includes(response.status);
}

export function errorMatches(pattern: RegExp): ResponsePredicate {
  return (_response, error) => error !== undefined && error.match(pattern);
}

export function allOf(...predicates: ResponsePredicate[]): ResponsePredicate {
  return (response, error) => predicates.every((p) => p(response, error));
}

export function anyOf(...predicates: ResponsePredicate[]): ResponsePredicate {
  return (response, error) => predicates.some((p) => p(response, error));
}

// =============================================================================
// Consistency Retry Policies
// =============================================================================

/**
 * Retry while the object has not reached the replica serving the request
 */
export const RETRY_ON_NOT_FOUND: ResponsePredicate = statusIs(404);

/**
 * Application updates can also bounce with an entitlement conflict while a
 * permission change is still propagating
 */
export const RETRY_ON_ENTITLEMENT_CONFLICT: ResponsePredicate = anyOf(
  RETRY_ON_NOT_FOUND,
  allOf(statusIs(400), errorMatches(ERROR_CANNOT_DELETE_OR_UPDATE_ENABLED_ENTITLEMENT))
);

// =============================================================================
// Outcome Classifiers
// =============================================================================

/**
 * Adding a reference that is already linked
 */
export const ACCEPT_REFERENCE_EXISTS: ResponsePredicate = allOf(
  statusIs(400),
  errorMatches(ERROR_ADDED_OBJECT_REFERENCES_ALREADY_EXIST)
);

/**
 * Removing a reference that is no longer linked
 */
export const ACCEPT_REFERENCE_ABSENT: ResponsePredicate = anyOf(
  allOf(statusIs(400), errorMatches(ERROR_REMOVED_OBJECT_REFERENCES_DO_NOT_EXIST)),
  allOf(statusIs(404), errorMatches(ERROR_RESOURCE_DOES_NOT_EXIST))
);

/**
 * 2xx statuses are never candidates for retry
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
