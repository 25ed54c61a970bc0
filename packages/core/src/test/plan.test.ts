/**
 * Plan Tests
 *
 * - Cursor movement and completion
 * - Stage insertion
 * - Snapshot codec: versioning, schema checks, context values
 * - Session helpers
 */
import { describe, it, expect } from 'vitest';
import { createPlan, currentStage, advancePlan, insertStageAfterCurrent, isPlanCompleted } from '../engine/plan';
import { serializePlan, deserializePlan } from '../engine/plan-codec';
import { loadSessionPlan, saveSessionPlan, stashedQuery, stashQuery } from '../engine/session';
import { MemorySessionStorage } from '../impl/memory-session';
import { PlanSnapshotError } from '../types/errors';
import { SESSION_KEY_GET, SESSION_KEY_PLAN } from '../types/plan';
import type { Flow } from '../types/flow';

const flow: Flow = {
  slug: 'two-step',
  stages: [
    { id: 'a', kind: 'prompt', name: 'a', config: {} },
    { id: 'b', kind: 'pass', name: 'b', config: { nested: { x: 1 } } },
  ],
};

describe('plan', () => {
  it('starts on the first stage with a copy of the context', () => {
    const context = { pending_user: 'u1' };
    const plan = createPlan(flow, context);
    context.pending_user = 'changed';

    expect(plan.cursor).toBe(0);
    expect(plan.flowSlug).toBe('two-step');
    expect(plan.context).toEqual({ pending_user: 'u1' });
    expect(currentStage(plan)?.id).toBe('a');
  });

  it('advances to completed after the last stage', () => {
    const plan = createPlan(flow);

    expect(advancePlan(plan)?.id).toBe('b');
    expect(advancePlan(plan)).toBeUndefined();
    expect(plan.cursor).toBe('completed');
    expect(isPlanCompleted(plan)).toBe(true);
    expect(advancePlan(plan)).toBeUndefined();
  });

  it('inserts a stage right after the active one', () => {
    const plan = createPlan(flow);
    insertStageAfterCurrent(plan, { id: 'extra', kind: 'pass', name: 'extra', config: {} });

    expect(plan.stages.map(s => s.id)).toEqual(['a', 'extra', 'b']);
    expect(advancePlan(plan)?.id).toBe('extra');
  });

  it('refuses a duplicate stage id', () => {
    const plan = createPlan(flow);
    expect(() => insertStageAfterCurrent(plan, { id: 'b', kind: 'pass', name: 'b', config: {} })).toThrow(
      `Stage "b" is already part of plan ${plan.id}`
    );
  });
});

describe('plan codec', () => {
  it('round-trips a plan with its context', () => {
    const plan = createPlan(flow, { pending_user: 'u1', email_sent: true, extra: { list: [1, 2] } });
    advancePlan(plan);

    expect(deserializePlan(serializePlan(plan))).toEqual(plan);
  });

  it('writes a versioned envelope', () => {
    const plan = createPlan(flow);
    expect(JSON.parse(serializePlan(plan))).toEqual({ version: 1, plan: JSON.parse(JSON.stringify(plan)) });
  });

  it('rejects context values JSON cannot carry', () => {
    const plan = createPlan(flow, { callback: () => undefined });
    expect(() => serializePlan(plan)).toThrow('Context value "callback" is not serializable (function)');
  });

  it('rejects nested values JSON would drop or change', () => {
    const nested = (value: unknown) => () => serializePlan(createPlan(flow, { profile: { tags: ['a', value] } }));

    expect(nested(undefined)).toThrow('Context value "profile.tags[1]" is not serializable (undefined)');
    expect(nested(new Date(0))).toThrow('Context value "profile.tags[1]" is not serializable (Date)');
    expect(nested(Number.NaN)).toThrow('Context value "profile.tags[1]" is not serializable (NaN)');
    expect(nested(10n)).toThrow(PlanSnapshotError);
    expect(nested({ ok: null, n: 1.5 })).not.toThrow();
  });

  it('rejects an unknown version', () => {
    const data = JSON.stringify({ version: 2, plan: createPlan(flow) });
    expect(() => deserializePlan(data)).toThrow('Unsupported plan snapshot version 2');
  });

  it('rejects a snapshot missing fields', () => {
    const plan = createPlan(flow);
    const data = JSON.stringify({
      version: 1,
      plan: { id: plan.id, flowSlug: plan.flowSlug, stages: plan.stages, context: {}, createdAt: 1, updatedAt: 1 },
    });

    expect(() => deserializePlan(data)).toThrow(PlanSnapshotError);
  });

  it('rejects a cursor past the last stage', () => {
    const plan = { ...createPlan(flow), cursor: 2 };
    expect(() => deserializePlan(JSON.stringify({ version: 1, plan }))).toThrow(
      'Plan cursor 2 is out of range (2 stages)'
    );
  });
});

describe('session helpers', () => {
  it('drops a session plan that does not decode', () => {
    const session = new MemorySessionStorage();
    session.set(SESSION_KEY_PLAN, '{"version":1}');

    expect(loadSessionPlan(session)).toBeUndefined();
    expect(session.has(SESSION_KEY_PLAN)).toBe(false);
  });

  it('stores the plan as a snapshot string', () => {
    const session = new MemorySessionStorage();
    const plan = createPlan(flow);
    saveSessionPlan(session, plan);

    expect(typeof session.get(SESSION_KEY_PLAN)).toBe('string');
    expect(loadSessionPlan(session)).toEqual(plan);
  });

  it('keeps only string values of the stashed query', () => {
    const session = new MemorySessionStorage();
    stashQuery(session, { next: '/home' });
    expect(stashedQuery(session)).toEqual({ next: '/home' });

    session.set(SESSION_KEY_GET, { next: '/x', count: 3 });
    expect(stashedQuery(session)).toEqual({ next: '/x' });
  });
});
