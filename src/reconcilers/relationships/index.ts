/**
 * Relationship reconciler exports
 *
 * Adds and removes reference edges (owners, token issuance policies) so that
 * repeating a request converges on the same end state.
 */

export type {
  RelationName,
  DirectoryObjectRef,
  EdgeAction,
  EdgeOutcome,
  EdgeResult,
  ReconcileResult,
  RelationshipOptions,
  RelationshipPlan,
  ReconcileRelationshipOptions,
  RelationshipSyncResult,
} from './types.js';

export type { RelationshipDiffOptions } from './diff.js';
export { diffRelationship, planHasChanges, formatPlanSummary } from './diff.js';

export {
  NO_CONTENT,
  listRelation,
  addReferences,
  removeReferencesChecked,
  removeReferencesListed,
  reconcileRelationship,
} from './apply.js';
