/**
 * FlowTokenService Tests
 *
 * - getOrCreate idempotence and expiry
 * - Rotation: same identifier, new key, strictly later expiry
 * - Redemption outcomes and single use
 * - Storage faults and event payloads
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FlowTokenService } from '../engine/token-service';
import { createPlan } from '../engine/plan';
import { MemoryFlowTokenStore } from '../impl/memory-token-store';
import { EventDispatcher, type DispatchedEvent } from '../impl/event-dispatcher';
import { StorageFaultError } from '../types/errors';
import type { FlowPlan } from '../types/plan';
import type { Flow } from '../types/flow';

const MINUTE = 60 * 1000;
const T = Date.parse('2026-01-01T00:00:00Z');

const flow: Flow = {
  slug: 'verify',
  title: 'Verify',
  stages: [{ id: 'email', kind: 'email', name: 'email', config: { subject: 'Verify' } }],
};

describe('FlowTokenService', () => {
  let store: MemoryFlowTokenStore;
  let service: FlowTokenService;
  let events: DispatchedEvent[];
  let plan: FlowPlan;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T);

    store = new MemoryFlowTokenStore();
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    events = [];
    dispatcher.on('*', e => { events.push(e); });
    service = new FlowTokenService(store, dispatcher);
    plan = createPlan(flow, { pending_user: 'alice' });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const input = (ttlMs = 16 * MINUTE) => ({ identifier: 'stage-email-alice', userId: 'alice', plan, ttlMs });

  describe('getOrCreateToken', () => {
    it('creates a token that expires after the ttl', async () => {
      const token = await service.getOrCreateToken(input());

      expect(token.identifier).toBe('stage-email-alice');
      expect(token.userId).toBe('alice');
      expect(token.flowSlug).toBe('verify');
      expect(token.expiresAt).toBe(T + 16 * MINUTE);
      expect(token.usedAt).toBeNull();
      expect(token.key).toMatch(/^[A-Za-z0-9_-]{64}$/);
    });

    it('returns the existing token unchanged', async () => {
      const a = await service.getOrCreateToken(input());
      vi.setSystemTime(T + 5 * MINUTE);
      const again = await service.getOrCreateToken(input(30 * MINUTE));

      expect(again).toEqual(a);
      expect(store.size).toBe(1);
    });

    it('returns an expired token unchanged too', async () => {
      const a = await service.getOrCreateToken(input());
      vi.setSystemTime(T + 17 * MINUTE);
      const again = await service.getOrCreateToken(input());

      expect(again.key).toBe(a.key);
      expect(service.isExpired(again)).toBe(true);
    });

    it('creates one token for concurrent callers', async () => {
      const [a, b] = await Promise.all([service.getOrCreateToken(input()), service.getOrCreateToken(input())]);

      expect(a.key).toBe(b.key);
      expect(store.size).toBe(1);
      expect(events.filter(e => e.type === 'token.created')).toHaveLength(1);
    });
  });

  describe('isExpired', () => {
    it('is false at the expiry instant and true after it', async () => {
      const token = await service.getOrCreateToken(input());

      vi.setSystemTime(token.expiresAt);
      expect(service.isExpired(token)).toBe(false);
      vi.setSystemTime(token.expiresAt + 1);
      expect(service.isExpired(token)).toBe(true);
    });
  });

  describe('issueToken', () => {
    it('reuses a live token and rotates an expired one', async () => {
      const a = await service.issueToken(input());
      expect(a.expiresAt).toBe(T + 16 * MINUTE);

      const repeat = await service.issueToken(input());
      expect(repeat.key).toBe(a.key);

      vi.setSystemTime(T + 17 * MINUTE);
      const b = await service.issueToken(input());

      expect(b.identifier).toBe(a.identifier);
      expect(b.key).not.toBe(a.key);
      expect(b.expiresAt).toBe(T + 17 * MINUTE + 16 * MINUTE);
      expect(await store.findByKey(a.key)).toBeNull();
    });

    it('rotates a used token', async () => {
      const a = await service.issueToken(input());
      await service.redeem(a.key);

      const b = await service.issueToken(input());

      expect(b.key).not.toBe(a.key);
      expect(b.usedAt).toBeNull();
    });

    it('snapshots the current plan when the used token carried an earlier one', async () => {
      const first = await service.issueToken(input());
      await service.redeem(first.key);

      const rerun = createPlan(flow, { pending_user: 'alice', marker: 'run-2' });
      const b = await service.issueToken({ ...input(), plan: rerun });
      const result = await service.redeem(b.key);

      expect(result.status).toBe('redeemed');
      if (result.status !== 'redeemed') return;
      expect(result.plan).toEqual(rerun);
    });

    it('replaces a live token that carries another plan', async () => {
      const a = await service.issueToken(input());
      const rerun = createPlan(flow, { pending_user: 'alice' });

      const b = await service.issueToken({ ...input(), plan: rerun });

      expect(b.key).not.toBe(a.key);
      expect(await store.findByKey(a.key)).toBeNull();
      expect(await service.redeem(b.key)).toMatchObject({ status: 'redeemed', plan: { id: rerun.id } });
    });

    it('never hands one user a token issued to another', async () => {
      const a = await service.issueToken(input());
      const bobPlan = createPlan(flow, { pending_user: 'bob' });

      const b = await service.issueToken({ ...input(), userId: 'bob', plan: bobPlan });

      expect(b.key).not.toBe(a.key);
      expect(b.userId).toBe('bob');
      expect(await service.redeem(a.key)).toEqual({ status: 'not-found' });
      expect(await service.redeem(b.key)).toMatchObject({ status: 'redeemed', plan: { context: { pending_user: 'bob' } } });
    });
  });

  describe('rotate', () => {
    it('keeps the identifier and plan and pushes expiry strictly later', async () => {
      const a = await service.getOrCreateToken(input());
      const b = await service.rotate(a, 0);

      expect(b.identifier).toBe(a.identifier);
      expect(b.plan).toBe(a.plan);
      expect(b.key).not.toBe(a.key);
      expect(b.expiresAt).toBe(a.expiresAt + 1);
    });

    it('lets only one of two concurrent rotations win', async () => {
      const a = await service.getOrCreateToken(input());
      vi.setSystemTime(T + 17 * MINUTE);

      const [first, second] = await Promise.all([service.rotate(a, 16 * MINUTE), service.rotate(a, 16 * MINUTE)]);

      expect(first.key).toBe(second.key);
      expect(events.filter(e => e.type === 'token.rotated')).toHaveLength(1);
    });
  });

  describe('redeem', () => {
    it('returns the snapshotted plan and marks the token used', async () => {
      const token = await service.issueToken(input());
      const result = await service.redeem(token.key);

      expect(result.status).toBe('redeemed');
      if (result.status !== 'redeemed') return;
      expect(result.plan).toEqual(plan);
      expect((await store.findByKey(token.key))?.usedAt).toBe(T);
    });

    it('rejects a second redemption', async () => {
      const token = await service.issueToken(input());
      await service.redeem(token.key);

      const result = await service.redeem(token.key);
      expect(result.status).toBe('used');
    });

    it('rejects an unknown key', async () => {
      expect(await service.redeem('nope')).toEqual({ status: 'not-found' });
      expect(events.at(-1)).toMatchObject({ type: 'token.rejected', status: 'not-found' });
    });

    it('rejects an expired token without consuming it', async () => {
      const token = await service.issueToken(input());
      vi.setSystemTime(T + 17 * MINUTE);

      const result = await service.redeem(token.key);

      expect(result.status).toBe('expired');
      expect((await store.findByKey(token.key))?.usedAt).toBeNull();
    });

    it('rejects a snapshot that does not decode', async () => {
      await store.getOrCreate({
        identifier: 'broken',
        key: 'test-key',
        userId: 'alice',
        flowSlug: 'verify',
        expiresAt: T + MINUTE,
        createdAt: T,
        plan: 'not json',
      });

      const result = await service.redeem('test-key');

      expect(result).toMatchObject({ status: 'invalid', reason: 'Plan snapshot is not valid JSON' });
      expect((await store.findByKey('test-key'))?.usedAt).toBeNull();
    });
  });

  describe('events', () => {
    it('never carry the key', async () => {
      const token = await service.issueToken(input());
      await service.redeem(token.key);

      expect(events.map(e => e.type)).toEqual(['token.created', 'token.redeemed']);
      for (const e of events) {
        expect(Object.values(e)).not.toContain(token.key);
      }
    });
  });

  describe('storage faults', () => {
    it('wraps store errors in StorageFaultError', async () => {
      vi.spyOn(store, 'findByKey').mockRejectedValue(new Error('connection reset'));

      const err = await service.redeem('any').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StorageFaultError);
      expect(err).toMatchObject({
        code: 'STORAGE_FAULT',
        operation: 'findByKey',
        message: 'Token storage failed during findByKey: connection reset',
      });
    });
  });

  describe('purgeExpired', () => {
    it('removes only tokens that expired before now', async () => {
      await service.getOrCreateToken(input(MINUTE));
      await service.getOrCreateToken({ ...input(60 * MINUTE), identifier: 'stage-email-bob', userId: 'bob' });
      vi.setSystemTime(T + 2 * MINUTE);

      expect(await service.purgeExpired()).toBe(1);
      expect(await store.findByIdentifier('stage-email-alice')).toBeNull();
      expect(await store.findByIdentifier('stage-email-bob')).not.toBeNull();
      expect(events.at(-1)).toMatchObject({ type: 'tokens.purged', count: 1 });
    });
  });
});
