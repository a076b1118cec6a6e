/**
 * Unit Tests: Relationship diff
 */

import { describe, it, expect } from 'vitest';
import { diffRelationship, formatPlanSummary, planHasChanges } from '../../src/reconcilers/relationships/index.js';

describe('diffRelationship', () => {
  it('splits desired and live ids, dropping duplicates', () => {
    const plan = diffRelationship('owners', ['user-a', 'user-b', 'user-b', { id: 'user-c' }], ['user-b', 'user-d']);

    expect(plan).toEqual({
      relation: 'owners',
      toAdd: ['user-a', 'user-c'],
      toRemove: [],
      unchanged: ['user-b'],
      retained: ['user-d'],
    });
  });

  it('removes undesired live edges when pruning', () => {
    const plan = diffRelationship('tokenIssuancePolicies', ['policy-1'], ['policy-1', 'policy-2'], { prune: true });

    expect(plan.toRemove).toEqual(['policy-2']);
    expect(plan.retained).toEqual([]);
  });

  it('plans nothing for an empty desired set without pruning', () => {
    const plan = diffRelationship('owners', [], ['user-a']);

    expect(planHasChanges(plan)).toBe(false);
    expect(plan.retained).toEqual(['user-a']);
  });
});

describe('formatPlanSummary', () => {
  it('counts each bucket', () => {
    const plan = diffRelationship('owners', ['user-a', 'user-b'], ['user-b', 'user-c']);
    expect(formatPlanSummary(plan)).toBe('owners: +1 -0 =1 kept 1');
  });

  it('omits retained when there are none', () => {
    const plan = diffRelationship('owners', ['user-a'], ['user-b'], { prune: true });
    expect(formatPlanSummary(plan)).toBe('owners: +1 -1 =0');
  });
});
