/**
 * Unit Tests: Variable Diff
 *
 * Tests the reconcile algorithm including:
 * - Create/delete/no-op classification
 * - Empty-value and masked-value policies
 * - Structural (flag-only) changes
 * - Plan ordering and idempotence
 * - Report formatting
 */

import { describe, it, expect } from 'vitest';
import {
  reconcile,
  isRedacted,
  computeStructuralChanges,
  formatPlanSummary,
  formatPlanDetails,
  formatPlanAsJson,
} from '../../src/reconcilers/variables/diff.js';
import { applyPlan } from '../../src/reconcilers/variables/apply.js';
import { collectionFromRemote } from '../../src/reconcilers/variables/parse.js';
import { createLogger } from '../../src/api/logger.js';
import type {
  Variable,
  VariableCollection,
  ReconcileOptions,
} from '../../src/reconcilers/variables/types.js';
import { FakeVariableStore, fakeClient, remote } from '../helpers/fake-gitlab.js';

// =============================================================================
// Test Fixtures
// =============================================================================

function v(key: string, value: string, overrides: Partial<Variable> = {}): Variable {
  return {
    key,
    value,
    variableType: 'env_var',
    protected: false,
    masked: false,
    ...overrides,
  };
}

function coll(...vars: Variable[]): VariableCollection {
  return new Map(vars.map((item) => [item.key, item]));
}

const PUSH: ReconcileOptions = { force: false, prune: true };
const IMPORT: ReconcileOptions = { force: false, prune: false };

// =============================================================================
// Tests
// =============================================================================

describe('reconcile', () => {
  describe('disjoint key sets', () => {
    const desired = coll(v('A', '1'), v('B', '2'));
    const observed = coll(v('X', '9'), v('Y', '8'));

    it('creates every desired-only key exactly once', () => {
      const plan = reconcile(desired, observed, PUSH);
      const creates = plan.operations.filter((op) => op.type === 'create').map((op) => op.key);
      expect(creates).toEqual(['A', 'B']);
    });

    it('deletes every observed-only key when pruning', () => {
      const plan = reconcile(desired, observed, PUSH);
      const deletes = plan.operations.filter((op) => op.type === 'delete').map((op) => op.key);
      expect(deletes).toEqual(['X', 'Y']);
      expect(plan.skipped).toEqual([]);
    });

    it('skips observed-only keys without pruning', () => {
      const plan = reconcile(desired, observed, IMPORT);
      expect(plan.operations.map((op) => op.type)).toEqual(['create', 'create']);
      expect(plan.skipped.map((op) => op.key)).toEqual(['X', 'Y']);
      expect(plan.violations.map((violation) => violation.code)).toEqual([
        'PRUNE_REQUIRED',
        'PRUNE_REQUIRED',
      ]);
    });
  });

  it('orders deletes before creates for the mixed scenario', () => {
    const desired = coll(v('A', '1'), v('B', '2'));
    const observed = coll(v('B', '2'), v('C', '3'));

    const plan = reconcile(desired, observed, PUSH);

    expect(plan.operations.map((op) => [op.type, op.key])).toEqual([
      ['delete', 'C'],
      ['create', 'A'],
    ]);
    expect(plan.skipped).toEqual([{ type: 'noop', key: 'B', reason: 'Variable is in sync' }]);
    expect(plan.summary).toEqual({ toCreate: 1, toUpdate: 0, toDelete: 1, unchanged: 1, total: 3 });
    expect(plan.hasChanges).toBe(true);
  });

  it('puts updates after creates', () => {
    const desired = coll(v('A', 'new'), v('B', '2'));
    const observed = coll(v('A', 'old'));

    const plan = reconcile(desired, observed, PUSH);

    expect(plan.operations.map((op) => op.type)).toEqual(['create', 'update']);
  });

  it('reports an in-sync plan when nothing differs', () => {
    const both = coll(v('A', '1', { protected: true }));
    const plan = reconcile(both, both, PUSH);
    expect(plan.hasChanges).toBe(false);
    expect(plan.operations).toEqual([]);
    expect(plan.violations).toEqual([]);
  });

  describe('empty values', () => {
    it('skips creating an empty value without force', () => {
      const plan = reconcile(coll(v('K', '')), coll(), PUSH);
      expect(plan.operations).toEqual([]);
      expect(plan.violations).toHaveLength(1);
      expect(plan.violations[0]).toMatchObject({ code: 'EMPTY_VALUE', key: 'K', operation: 'create' });
    });

    it('creates an empty value with force', () => {
      const plan = reconcile(coll(v('K', '')), coll(), { force: true, prune: true });
      expect(plan.operations).toEqual([{ type: 'create', key: 'K', variable: v('K', '') }]);
      expect(plan.violations).toEqual([]);
    });

    it('refuses to blank an existing value without force', () => {
      const plan = reconcile(coll(v('K', '')), coll(v('K', 'set')), PUSH);
      expect(plan.operations).toEqual([]);
      expect(plan.violations[0]).toMatchObject({ code: 'EMPTY_VALUE', operation: 'update' });
    });

    it('blanks an existing value with force', () => {
      const plan = reconcile(coll(v('K', '')), coll(v('K', 'set')), { force: true, prune: true });
      expect(plan.operations).toEqual([
        {
          type: 'update',
          key: 'K',
          variable: v('K', ''),
          changes: [{ field: 'value', oldValue: 'set', newValue: '' }],
        },
      ]);
    });

    it('treats empty on both sides as in sync', () => {
      const plan = reconcile(coll(v('K', '')), coll(v('K', '')), PUSH);
      expect(plan.hasChanges).toBe(false);
      expect(plan.violations).toEqual([]);
    });
  });

  describe('masked variables', () => {
    it('never overwrites a redacted value with an empty one', () => {
      const desired = coll(v('K', '', { masked: true }));
      const observed = coll(v('K', '', { masked: true }));

      const plan = reconcile(desired, observed, PUSH);

      expect(plan.operations).toEqual([]);
      expect(plan.skipped.map((op) => op.key)).toEqual(['K']);
      expect(plan.violations).toHaveLength(1);
      expect(plan.violations[0]).toMatchObject({ code: 'MASKED_EMPTY_VALUE', key: 'K' });
    });

    it('keeps the redacted value even with force', () => {
      const plan = reconcile(
        coll(v('K', '', { masked: true })),
        coll(v('K', '', { masked: true })),
        { force: true, prune: true }
      );
      expect(plan.operations).toEqual([]);
      expect(plan.violations[0].code).toBe('MASKED_EMPTY_VALUE');
    });

    it('does not create a masked variable with an empty value, even with force', () => {
      const plan = reconcile(coll(v('K', '', { masked: true })), coll(), { force: true, prune: true });
      expect(plan.operations).toEqual([]);
      expect(plan.violations[0]).toMatchObject({ code: 'MASKED_EMPTY_VALUE', operation: 'create' });
    });

    it('writes a non-empty value over a redacted one, marking the old value unverified', () => {
      const plan = reconcile(
        coll(v('K', 'secret-value', { masked: true })),
        coll(v('K', '', { masked: true })),
        PUSH
      );
      expect(plan.operations).toEqual([
        {
          type: 'update',
          key: 'K',
          variable: v('K', 'secret-value', { masked: true }),
          changes: [{ field: 'value', oldValue: '', newValue: 'secret-value', unverified: true }],
        },
      ]);
    });

    it('compares a masked value normally when the store returns it', () => {
      const both = coll(v('K', 'secret-value', { masked: true }));
      expect(reconcile(both, both, PUSH).hasChanges).toBe(false);
    });

    it('skips a flag-only change when the masked value is unknown', () => {
      const plan = reconcile(
        coll(v('K', '', { masked: true, protected: true })),
        coll(v('K', '', { masked: true })),
        PUSH
      );
      expect(plan.operations).toEqual([]);
      expect(plan.violations.map((violation) => violation.code)).toEqual([
        'MASKED_EMPTY_VALUE',
        'MASKED_VALUE_UNKNOWN',
      ]);
      expect(plan.skipped[0].reason).toBe(
        'Cannot change protected of a masked variable without its value'
      );
    });
  });

  describe('structural changes', () => {
    it('produces exactly one update for a protected-only change', () => {
      const plan = reconcile(
        coll(v('K', 'x', { protected: false })),
        coll(v('K', 'x', { protected: true })),
        PUSH
      );
      expect(plan.operations).toEqual([
        {
          type: 'update',
          key: 'K',
          variable: v('K', 'x'),
          changes: [{ field: 'protected', oldValue: true, newValue: false }],
        },
      ]);
    });

    it('carries the observed value on a flag-only update', () => {
      const plan = reconcile(
        coll(v('K', '', { variableType: 'file' })),
        coll(v('K', 'contents')),
        PUSH
      );
      expect(plan.operations).toHaveLength(1);
      const [op] = plan.operations;
      expect(op.type).toBe('update');
      expect(op.variable.value).toBe('contents');
      expect(op.variable.variableType).toBe('file');
    });

    it('lists the value change before flag changes', () => {
      const plan = reconcile(
        coll(v('K', 'b', { masked: true, protected: true })),
        coll(v('K', 'a')),
        PUSH
      );
      const [op] = plan.operations;
      expect(op.type === 'update' ? op.changes.map((c) => c.field) : []).toEqual([
        'value',
        'protected',
        'masked',
      ]);
    });
  });

  it('is idempotent once the plan is applied', async () => {
    const store = new FakeVariableStore([
      remote('KEEP', 'same'),
      remote('CHANGE', 'old', { protected: true }),
      remote('GONE', 'x'),
    ]);
    const desired = coll(
      v('KEEP', 'same'),
      v('CHANGE', 'new'),
      v('NEW', 'value', { masked: true, variableType: 'file' })
    );
    const client = fakeClient(store);
    const log = createLogger({ level: 'error' });

    const first = reconcile(desired, collectionFromRemote(await store.list(1)), PUSH);
    expect(first.summary).toMatchObject({ toCreate: 1, toUpdate: 1, toDelete: 1 });

    const result = await applyPlan(client, 1, first, { dryRun: false }, log);
    expect(result.success).toBe(true);

    const second = reconcile(desired, collectionFromRemote(await store.list(1)), PUSH);
    expect(second.operations).toEqual([]);
    expect(second.skipped.every((op) => op.type === 'noop')).toBe(true);
  });
});

describe('isRedacted', () => {
  it('is true only for masked variables with an empty value', () => {
    expect(isRedacted(v('K', '', { masked: true }))).toBe(true);
    expect(isRedacted(v('K', 'x', { masked: true }))).toBe(false);
    expect(isRedacted(v('K', ''))).toBe(false);
  });
});

describe('computeStructuralChanges', () => {
  it('ignores the value', () => {
    expect(computeStructuralChanges(v('K', 'a'), v('K', 'b'))).toEqual([]);
  });
});

describe('formatPlanSummary', () => {
  it('summarizes counts, warnings and status', () => {
    const plan = reconcile(coll(v('A', '1'), v('E', '')), coll(v('C', '3')), PUSH);

    expect(formatPlanSummary(plan, 'group/app')).toBe(
      [
        '=== Variable Differences ===',
        'Project: group/app',
        'Create:    1',
        'Update:    0',
        'Delete:    1',
        'Unchanged: 1',
        '',
        'Warnings:',
        '  ! E: Variable has an empty value; use --force to create it',
        '',
        'Status: CHANGES NEEDED',
      ].join('\n')
    );
  });

  it('reports in sync without a project line', () => {
    const plan = reconcile(coll(), coll(), PUSH);
    expect(formatPlanSummary(plan).split('\n').at(-1)).toBe('Status: IN SYNC');
    expect(formatPlanSummary(plan)).not.toContain('Project:');
  });
});

describe('formatPlanDetails', () => {
  it('lists removals, additions and modifications', () => {
    const plan = reconcile(
      coll(v('A', '1', { protected: true, masked: true }), v('B', 'two')),
      coll(v('B', 'one'), v('C', '3')),
      PUSH
    );

    expect(formatPlanDetails(plan)).toBe(
      [
        'Variables to remove:',
        '  - C',
        '',
        'Variables to add:',
        '  + A (protected, masked)',
        '',
        'Variables to modify:',
        '  ~ B',
        '      value: one -> two',
      ].join('\n')
    );
  });

  it('hides masked values', () => {
    const plan = reconcile(
      coll(v('S', 'new-secret', { masked: true })),
      coll(v('S', '', { masked: true })),
      PUSH
    );
    expect(formatPlanDetails(plan)).toBe(
      ['Variables to modify:', '  ~ S', '      value: (hidden) -> [MASKED]'].join('\n')
    );
  });
});

describe('formatPlanAsJson', () => {
  it('replaces masked values', () => {
    const plan = reconcile(coll(v('S', 'new-secret', { masked: true })), coll(), PUSH);
    const parsed: unknown = JSON.parse(formatPlanAsJson(plan));
    expect(parsed).toMatchObject({
      hasChanges: true,
      operations: [{ type: 'create', key: 'S', variable: { value: '[MASKED]' } }],
    });
    expect(formatPlanAsJson(plan)).not.toContain('new-secret');
  });
});
