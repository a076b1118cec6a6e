/**
 * Relationship diff
 *
 * Compares the desired edge targets of a relation with the live ones.
 */

import type { DirectoryObjectRef, RelationName, RelationshipPlan } from './types.js';

/**
 * Options for the diff operation
 */
export interface RelationshipDiffOptions {
  /** Put undesired live edges in toRemove rather than retained */
  prune?: boolean;
}

function idsOf(refs: ReadonlyArray<string | DirectoryObjectRef>): string[] {
  const seen = new Set<string>();
  const ids: string[] = [];
  for (const ref of refs) {
    const id = typeof ref === 'string' ? ref : ref.id;
    if (id && !seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Set difference of desired and live edges. Each list keeps the order of the
 * input it came from; duplicates are dropped.
 */
export function diffRelationship(
  relation: RelationName,
  desired: ReadonlyArray<string | DirectoryObjectRef>,
  live: ReadonlyArray<string | DirectoryObjectRef>,
  options: RelationshipDiffOptions = {}
): RelationshipPlan {
  const desiredIds = idsOf(desired);
  const liveIds = idsOf(live);
  const desiredSet = new Set(desiredIds);
  const liveSet = new Set(liveIds);

  const extra = liveIds.filter((id) => !desiredSet.has(id));

  return {
    relation,
    toAdd: desiredIds.filter((id) => !liveSet.has(id)),
    toRemove: options.prune ? extra : [],
    unchanged: desiredIds.filter((id) => liveSet.has(id)),
    retained: options.prune ? [] : extra,
  };
}

/**
 * Whether applying the plan would send any mutation
 */
export function planHasChanges(plan: RelationshipPlan): boolean {
  return plan.toAdd.length > 0 || plan.toRemove.length > 0;
}

/**
 * One-line summary, e.g. `owners: +2 -1 =3`
 */
export function formatPlanSummary(plan: RelationshipPlan): string {
  const parts = [`+${plan.toAdd.length}`, `-${plan.toRemove.length}`, `=${plan.unchanged.length}`];
  if (plan.retained.length > 0) {
    parts.push(`kept ${plan.retained.length}`);
  }
  return `${plan.relation}: ${parts.join(' ')}`;
}
