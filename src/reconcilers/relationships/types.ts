/**
 * Types for relationship reconciliation
 *
 * A relationship is a set of directed reference edges from an application to
 * other directory objects (owners, assigned token issuance policies). Each
 * edge is added or removed with its own call; there is no multi-edge
 * transaction, so a batch that fails part way leaves earlier edges applied.
 */

import type { ApiLogger } from '../../api/logger.js';
import type { DirectoryError } from '../../api/errors.js';

/**
 * Reference-valued relations of an application
 */
export type RelationName = 'owners' | 'tokenIssuancePolicies';

/**
 * Target of an edge. Two refs are the same edge target when their ids match.
 */
export interface DirectoryObjectRef {
  id: string;
  /** Absolute reference URL; derived from the id when absent */
  odataId?: string;
}

export type EdgeAction = 'add' | 'remove';

/**
 * - applied: the call changed the relationship
 * - already-satisfied: the end state already held (classified response, or skipped)
 * - failed: an unclassified error; the batch stops here
 */
export type EdgeOutcome = 'applied' | 'already-satisfied' | 'failed';

/**
 * Result of one edge operation
 */
export interface EdgeResult {
  targetId: string;
  action: EdgeAction;
  outcome: EdgeOutcome;
  /** Status of the mutating call (or of the failing check) */
  status?: number;
  /** Whether a mutating call for this edge got a response from the directory */
  called: boolean;
  error?: DirectoryError;
}

/**
 * Result of a batch of edge operations
 */
export interface ReconcileResult {
  success: boolean;
  /** Status of the last mutating call, of the failing call, or 204 when nothing was sent */
  status: number;
  edges: EdgeResult[];
  error?: DirectoryError;
}

/**
 * Options shared by every reconciler operation
 */
export interface RelationshipOptions {
  signal?: AbortSignal;
  logger?: ApiLogger;
}

/**
 * Planned changes to one relation
 */
export interface RelationshipPlan {
  relation: RelationName;
  toAdd: string[];
  toRemove: string[];
  unchanged: string[];
  /** Live edges that are not desired but were kept because pruning is off */
  retained: string[];
}

/**
 * Options for a full desired-state sync of one relation
 */
export interface ReconcileRelationshipOptions extends RelationshipOptions {
  /** Remove live edges that are not desired */
  prune?: boolean;
  /** Compute the plan only; send no mutations */
  dryRun?: boolean;
}

/**
 * Result of a full desired-state sync of one relation
 */
export interface RelationshipSyncResult extends ReconcileResult {
  applicationId: string;
  plan: RelationshipPlan;
  dryRun: boolean;
}
