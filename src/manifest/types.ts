/**
 * Desired-state manifest types
 *
 * A manifest lists applications by object id together with the owners and
 * token issuance policies each one should have. A relation that is omitted
 * is left alone by sync.
 */

import type { RelationName } from '../reconcilers/relationships/index.js';

/**
 * Desired relationships for one application
 */
export interface ApplicationManifestEntry {
  /** Application object id */
  id: string;
  /** Label for output only */
  name?: string;
  owners?: string[];
  tokenIssuancePolicies?: string[];
  /** Remove live edges that are not listed (default: false) */
  prune?: boolean;
}

/**
 * Parsed manifest file
 */
export interface Manifest {
  apiVersion: string;
  applications: ApplicationManifestEntry[];
}

/**
 * Relations a manifest can manage, in the order sync applies them
 */
export const MANAGED_RELATIONS: readonly RelationName[] = ['owners', 'tokenIssuancePolicies'];

/**
 * Manifest error codes
 */
export type ManifestErrorCode =
  | 'MANIFEST_NOT_FOUND'
  | 'MANIFEST_PARSE_ERROR'
  | 'INVALID_API_VERSION'
  | 'MANIFEST_VALIDATION_ERROR';

/**
 * Error thrown when a manifest cannot be loaded
 */
export class ManifestError extends Error {
  constructor(
    message: string,
    public readonly code: ManifestErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ManifestError';
  }
}

/**
 * Relations an entry lists, paired with their desired target ids
 */
export function desiredRelations(
  entry: ApplicationManifestEntry
): Array<{ relation: RelationName; ids: string[] }> {
  const relations: Array<{ relation: RelationName; ids: string[] }> = [];
  for (const relation of MANAGED_RELATIONS) {
    const ids = entry[relation];
    if (ids !== undefined) relations.push({ relation, ids });
  }
  return relations;
}
