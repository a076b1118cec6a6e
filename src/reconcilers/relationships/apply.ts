/**
 * Relationship apply logic
 *
 * Adds and removes reference edges one call at a time, in input order:
 * 1. Preconditions are checked before any call is sent
 * 2. Each edge is classified as applied, already-satisfied or failed
 * 3. The batch stops at the first failed edge; earlier edges stay applied
 *
 * Reads and mutations retry on 404 while a freshly written object propagates.
 * Add and remove calls accept the directory's "already linked" and "not
 * linked" errors as success.
 */

import type { DirectoryObject, ODataQuery } from '../../api/types.js';
import type { DirectoryTransport } from '../../api/transport.js';
import { ApiRequestError, PreconditionError, isDirectoryError, type DirectoryError } from '../../api/errors.js';
import { ACCEPT_REFERENCE_ABSENT, ACCEPT_REFERENCE_EXISTS, RETRY_ON_NOT_FOUND } from '../../api/policies.js';
import { decodeDirectoryObject, decodeList, encodeReference } from '../../api/codec.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type {
  DirectoryObjectRef,
  EdgeResult,
  ReconcileRelationshipOptions,
  ReconcileResult,
  RelationName,
  RelationshipOptions,
  RelationshipSyncResult,
} from './types.js';
import { diffRelationship } from './diff.js';

/**
 * Status reported when a batch completes without sending a mutation
 */
export const NO_CONTENT = 204;

/**
 * How each relation is listed
 */
const RELATIONS: Record<RelationName, { query?: ODataQuery; tenantScoped: boolean }> = {
  owners: { query: { select: ['id'] }, tenantScoped: false },
  tokenIssuancePolicies: { tenantScoped: true },
};

function relationPath(applicationId: string, relation: RelationName): string {
  return `/applications/${encodeURIComponent(applicationId)}/${relation}`;
}

function edgePath(applicationId: string, relation: RelationName, targetId: string): string {
  return `${relationPath(applicationId, relation)}/${encodeURIComponent(targetId)}/$ref`;
}

/**
 * Errors outside the client taxonomy are programming errors and propagate
 */
function toDirectoryError(error: unknown): DirectoryError {
  if (isDirectoryError(error)) {
    return error;
  }
  throw error;
}

function scopedLogger(
  options: RelationshipOptions,
  applicationId: string | undefined,
  relation: RelationName
): ApiLogger {
  return (options.logger ?? defaultLogger).child({ applicationId, relation });
}

function failed(edges: EdgeResult[], error: DirectoryError): ReconcileResult {
  return { success: false, status: error.status, edges, error };
}

function precondition(message: string): ReconcileResult {
  return failed([], new PreconditionError(message));
}

// =============================================================================
// Listing
// =============================================================================

/**
 * Live edge targets of a relation. Throws a DirectoryError on failure.
 */
export async function listRelation(
  transport: DirectoryTransport,
  applicationId: string,
  relation: RelationName,
  options: RelationshipOptions = {}
): Promise<{ status: number; targets: DirectoryObject[] }> {
  const { query, tenantScoped } = RELATIONS[relation];
  const response = await transport.request({
    method: 'GET',
    uri: { entity: relationPath(applicationId, relation), hasTenantId: tenantScoped },
    query,
    validStatusCodes: [200],
    consistencyFailureFunc: RETRY_ON_NOT_FOUND,
    signal: options.signal,
  });

  return {
    status: response.status,
    targets: decodeList(response.body, response.status).map(decodeDirectoryObject),
  };
}

// =============================================================================
// Single Edges
// =============================================================================

async function addEdge(
  transport: DirectoryTransport,
  applicationId: string,
  relation: RelationName,
  ref: DirectoryObjectRef,
  options: RelationshipOptions
): Promise<EdgeResult> {
  try {
    const body = encodeReference({
      id: ref.id,
      odataId: ref.odataId ?? transport.referenceUrl(ref.id),
    });

    const response = await transport.request({
      method: 'POST',
      uri: { entity: `${relationPath(applicationId, relation)}/$ref` },
      body,
      validStatusCodes: [204],
      validStatusFunc: ACCEPT_REFERENCE_EXISTS,
      consistencyFailureFunc: RETRY_ON_NOT_FOUND,
      signal: options.signal,
    });

    return {
      targetId: ref.id,
      action: 'add',
      outcome: response.acceptedBy === 'classifier' ? 'already-satisfied' : 'applied',
      status: response.status,
      called: true,
    };
  } catch (err) {
    const error = toDirectoryError(err);
    return {
      targetId: ref.id,
      action: 'add',
      outcome: 'failed',
      status: error.status,
      called: error instanceof ApiRequestError,
      error,
    };
  }
}

async function removeEdge(
  transport: DirectoryTransport,
  applicationId: string,
  relation: RelationName,
  targetId: string,
  options: RelationshipOptions
): Promise<EdgeResult> {
  try {
    const response = await transport.request({
      method: 'DELETE',
      uri: { entity: edgePath(applicationId, relation, targetId) },
      validStatusCodes: [204],
      validStatusFunc: ACCEPT_REFERENCE_ABSENT,
      consistencyFailureFunc: RETRY_ON_NOT_FOUND,
      signal: options.signal,
    });

    return {
      targetId,
      action: 'remove',
      outcome: response.acceptedBy === 'classifier' ? 'already-satisfied' : 'applied',
      status: response.status,
      called: true,
    };
  } catch (err) {
    const error = toDirectoryError(err);
    return {
      targetId,
      action: 'remove',
      outcome: 'failed',
      status: error.status,
      called: error instanceof ApiRequestError,
      error,
    };
  }
}

function skippedRemoval(targetId: string, status?: number): EdgeResult {
  return { targetId, action: 'remove', outcome: 'already-satisfied', status, called: false };
}

/**
 * Run edges in order, stopping at the first failure
 */
async function runEdges<T>(
  items: readonly T[],
  run: (item: T) => Promise<EdgeResult>,
  log: ApiLogger,
  edges: EdgeResult[] = []
): Promise<ReconcileResult> {
  let status =
    [...edges].reverse().find((edge) => edge.called && edge.status !== undefined)?.status ?? NO_CONTENT;

  for (const item of items) {
    const edge = await run(item);
    edges.push(edge);

    if (edge.outcome === 'failed' && edge.error) {
      log.error(`Failed to ${edge.action} edge ${edge.targetId}`, edge.error, { status: edge.status });
      return failed(edges, edge.error);
    }

    if (edge.called && edge.status !== undefined) {
      status = edge.status;
    }

    if (edge.outcome === 'applied') {
      log.info(`${edge.action === 'add' ? 'Added' : 'Removed'} edge ${edge.targetId}`);
    } else {
      log.debug(`Edge ${edge.targetId} already ${edge.action === 'add' ? 'present' : 'absent'}`, {
        called: edge.called,
      });
    }
  }

  return { success: true, status, edges };
}

// =============================================================================
// Batch Operations
// =============================================================================

/**
 * Link each ref to the application. Refs already linked count as satisfied.
 */
export async function addReferences(
  transport: DirectoryTransport,
  applicationId: string | undefined,
  relation: RelationName,
  refs: readonly DirectoryObjectRef[] | undefined,
  options: RelationshipOptions = {}
): Promise<ReconcileResult> {
  if (!applicationId) {
    return precondition(`cannot add ${relation}: application has no id`);
  }
  if (!refs) {
    return precondition(`cannot add ${relation}: no ${relation} given`);
  }
  const unnamed = refs.findIndex((ref) => !ref.id && !ref.odataId);
  if (unnamed >= 0) {
    return precondition(`cannot add ${relation}: reference ${unnamed} has no id`);
  }

  const log = scopedLogger(options, applicationId, relation);
  return runEdges(refs, (ref) => addEdge(transport, applicationId, relation, ref, options), log);
}

/**
 * Unlink each target, checking each edge with a read first. A 404 from the
 * read skips the edge without a delete.
 */
export async function removeReferencesChecked(
  transport: DirectoryTransport,
  applicationId: string | undefined,
  relation: RelationName,
  targetIds: readonly string[] | undefined,
  options: RelationshipOptions = {}
): Promise<ReconcileResult> {
  if (!applicationId) {
    return precondition(`cannot remove ${relation}: application has no id`);
  }
  if (!targetIds) {
    return precondition(`cannot remove ${relation}: no ids given`);
  }

  const log = scopedLogger(options, applicationId, relation);

  const checkThenRemove = async (targetId: string): Promise<EdgeResult> => {
    try {
      await transport.request({
        method: 'GET',
        uri: { entity: edgePath(applicationId, relation, targetId) },
        query: { select: ['id', 'url'] },
        validStatusCodes: [200],
        consistencyFailureFunc: RETRY_ON_NOT_FOUND,
        signal: options.signal,
      });
    } catch (err) {
      const error = toDirectoryError(err);
      if (error instanceof ApiRequestError && error.isNotFound()) {
        return skippedRemoval(targetId, error.status);
      }
      return { targetId, action: 'remove', outcome: 'failed', status: error.status, called: false, error };
    }

    // The edge can still vanish between the check and the delete
    return removeEdge(transport, applicationId, relation, targetId, options);
  };

  return runEdges(targetIds, checkThenRemove, log);
}

/**
 * Unlink each target that appears in the live relation, listed once up front.
 * An empty live relation completes with 204 and no deletes.
 */
export async function removeReferencesListed(
  transport: DirectoryTransport,
  applicationId: string | undefined,
  relation: RelationName,
  targetIds: readonly string[] | undefined,
  options: RelationshipOptions = {}
): Promise<ReconcileResult> {
  if (!applicationId) {
    return precondition(`cannot remove ${relation}: application has no id`);
  }
  if (!targetIds) {
    return precondition(`cannot remove ${relation}: no ids given`);
  }

  const log = scopedLogger(options, applicationId, relation);

  let live: Set<string>;
  try {
    const listed = await listRelation(transport, applicationId, relation, options);
    live = new Set(
      listed.targets.map((target) => target.id).filter((id): id is string => id !== undefined)
    );
  } catch (err) {
    const error = toDirectoryError(err);
    log.error(`Failed to list ${relation}`, error, { status: error.status });
    return failed([], error);
  }

  if (live.size === 0) {
    log.debug(`No ${relation} assigned; nothing to remove`);
    return { success: true, status: NO_CONTENT, edges: targetIds.map((id) => skippedRemoval(id)) };
  }

  return runEdges(
    targetIds,
    async (targetId) =>
      live.has(targetId)
        ? removeEdge(transport, applicationId, relation, targetId, options)
        : skippedRemoval(targetId),
    log
  );
}

/**
 * Make one relation of an application match the desired targets
 *
 * Lists the live edges, adds the missing ones and, with `prune`, removes the
 * ones not desired. With `dryRun` only the plan is returned.
 */
export async function reconcileRelationship(
  transport: DirectoryTransport,
  applicationId: string | undefined,
  relation: RelationName,
  desired: ReadonlyArray<string | DirectoryObjectRef>,
  options: ReconcileRelationshipOptions = {}
): Promise<RelationshipSyncResult> {
  const dryRun = options.dryRun ?? false;
  const emptyPlan = diffRelationship(relation, [], []);

  if (!applicationId) {
    return {
      ...precondition(`cannot reconcile ${relation}: application has no id`),
      applicationId: '',
      plan: emptyPlan,
      dryRun,
    };
  }

  const log = scopedLogger(options, applicationId, relation);

  let live: DirectoryObject[];
  try {
    live = (await listRelation(transport, applicationId, relation, options)).targets;
  } catch (err) {
    const error = toDirectoryError(err);
    log.error(`Failed to list ${relation}`, error, { status: error.status });
    return { ...failed([], error), applicationId, plan: emptyPlan, dryRun };
  }

  const liveIds = live.map((target) => target.id).filter((id): id is string => id !== undefined);
  const plan = diffRelationship(relation, desired, liveIds, { prune: options.prune });

  log.debug('Computed relationship plan', {
    toAdd: plan.toAdd.length,
    toRemove: plan.toRemove.length,
    unchanged: plan.unchanged.length,
  });

  if (dryRun) {
    return { success: true, status: NO_CONTENT, edges: [], applicationId, plan, dryRun };
  }

  const refsById = new Map<string, DirectoryObjectRef>();
  for (const ref of desired) {
    const asRef = typeof ref === 'string' ? { id: ref } : ref;
    if (!refsById.has(asRef.id)) refsById.set(asRef.id, asRef);
  }
  const toAdd = plan.toAdd.map((id) => refsById.get(id) ?? { id });

  const added = await runEdges(
    toAdd,
    (ref) => addEdge(transport, applicationId, relation, ref, options),
    log
  );
  if (!added.success) {
    return { ...added, applicationId, plan, dryRun };
  }

  const result = await runEdges(
    plan.toRemove,
    (targetId) => removeEdge(transport, applicationId, relation, targetId, options),
    log,
    added.edges
  );

  return { ...result, applicationId, plan, dryRun };
}
