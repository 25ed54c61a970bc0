import type { FlowToken, RedeemResult, TokenRotation } from '../types/token';
import type { FlowPlan } from '../types/plan';
import type { FlowTokenStore } from '../interfaces/token-store';
import type { EventBus } from '../interfaces/event-bus';
import { FlowGateError, PlanSnapshotError, StorageFaultError } from '../types/errors';
import { serializePlan, deserializePlan } from './plan-codec';
import { generateKey, now } from '../utils';

export interface FlowTokenServiceOptions {
  /** Bytes of entropy per key (default: 48) */
  keyBytes?: number;
}

export interface IssueTokenInput {
  /** Deterministic per (stage, user) */
  identifier: string;
  userId: string;
  /** Plan the link resumes */
  plan: FlowPlan;
  ttlMs: number;
}

function snapshotPlanId(token: FlowToken): string | undefined {
  try {
    return deserializePlan(token.plan).id;
  } catch (err) {
    if (err instanceof PlanSnapshotError) return undefined;
    throw err;
  }
}

/**
 * Issues, rotates and redeems flow tokens on top of a FlowTokenStore.
 *
 * Redemption policy: a token past its expiry is rejected (`expired`) and not consumed.
 * A successful redemption marks the token used, so a key restores its plan at most once.
 * Expired or used tokens get a fresh key the next time they are issued; used ones
 * also take a snapshot of the plan being verified.
 */
export class FlowTokenService {
  private readonly store: FlowTokenStore;
  private readonly events?: EventBus;
  private readonly keyBytes: number;

  constructor(store: FlowTokenStore, events?: EventBus, options?: FlowTokenServiceOptions) {
    this.store = store;
    this.events = events;
    this.keyBytes = options?.keyBytes ?? 48;
  }

  /**
   * Look up the token for `identifier`, creating it if none exists.
   * An existing token is returned unchanged, however close to expiry.
   */
  async getOrCreateToken(input: IssueTokenInput): Promise<FlowToken> {
    const createdAt = now();
    const { token, created } = await this.guard('getOrCreate', () =>
      this.store.getOrCreate({
        identifier: input.identifier,
        key: generateKey(this.keyBytes),
        userId: input.userId,
        flowSlug: input.plan.flowSlug,
        expiresAt: createdAt + input.ttlMs,
        createdAt,
        plan: serializePlan(input.plan),
      })
    );

    if (created) {
      this.events?.onTokenCreated?.({ identifier: token.identifier, userId: token.userId, expiresAt: token.expiresAt });
    }
    return token;
  }

  isExpired(token: FlowToken): boolean {
    return now() > token.expiresAt;
  }

  /**
   * Give `token` a new key and push its expiry out by `ttlMs`.
   * The identifier is kept; so is the plan snapshot unless `reissue` names a new
   * owner and plan. If another caller rotated first, their token is returned and
   * the key held by `token` stays dead.
   */
  async rotate(token: FlowToken, ttlMs: number, reissue?: { userId: string; plan: FlowPlan }): Promise<FlowToken> {
    const expiresAt = Math.max(now() + ttlMs, token.expiresAt + 1);
    const next: TokenRotation = {
      key: generateKey(this.keyBytes),
      expiresAt,
      reissue: reissue && {
        userId: reissue.userId,
        flowSlug: reissue.plan.flowSlug,
        plan: serializePlan(reissue.plan),
      },
    };
    const result = await this.guard('rotate', () => this.store.rotate(token.identifier, token.key, next));

    if (!result) {
      throw new FlowGateError('TOKEN_VANISHED', `Flow token "${token.identifier}" disappeared during rotation`);
    }

    if (result.rotated) {
      this.events?.onTokenRotated?.({
        identifier: result.token.identifier,
        userId: result.token.userId,
        expiresAt: result.token.expiresAt,
      });
    }
    return result.token;
  }

  /**
   * Token to put in a fresh link for `input.plan`.
   * The stored token is reused while it is live, unused, and carries this plan for this user.
   * A used token, or one snapshotting another plan or user, is reissued with the current plan;
   * an expired one only gets a new key.
   */
  async issueToken(input: IssueTokenInput): Promise<FlowToken> {
    const token = await this.getOrCreateToken(input);
    if (token.usedAt !== null || token.userId !== input.userId || snapshotPlanId(token) !== input.plan.id) {
      return this.rotate(token, input.ttlMs, { userId: input.userId, plan: input.plan });
    }
    if (this.isExpired(token)) {
      return this.rotate(token, input.ttlMs);
    }
    return token;
  }

  /**
   * Redeem a key for the plan it carries.
   */
  async redeem(key: string): Promise<RedeemResult> {
    const token = await this.guard('findByKey', () => this.store.findByKey(key));

    if (!token) {
      this.events?.onTokenRejected?.({ status: 'not-found' });
      return { status: 'not-found' };
    }

    if (this.isExpired(token)) {
      this.events?.onTokenRejected?.({ status: 'expired', identifier: token.identifier });
      return { status: 'expired', token };
    }

    let plan: FlowPlan;
    try {
      plan = deserializePlan(token.plan);
    } catch (err) {
      if (!(err instanceof PlanSnapshotError)) throw err;
      this.events?.onTokenRejected?.({ status: 'invalid', identifier: token.identifier });
      return { status: 'invalid', token, reason: err.message };
    }

    const claimed = token.usedAt === null && await this.guard('markUsed', () => this.store.markUsed(key, now()));
    if (!claimed) {
      this.events?.onTokenRejected?.({ status: 'used', identifier: token.identifier });
      return { status: 'used', token };
    }

    this.events?.onTokenRedeemed?.({ identifier: token.identifier, userId: token.userId });
    return { status: 'redeemed', token, plan };
  }

  /**
   * Housekeeping for external schedulers. Nothing in the flow path calls this.
   */
  async purgeExpired(before: number = now()): Promise<number> {
    const count = await this.guard('purgeExpired', () => this.store.purgeExpired(before));
    this.events?.onTokensPurged?.({ count });
    return count;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof FlowGateError) throw err;
      throw new StorageFaultError(operation, err);
    }
  }
}
