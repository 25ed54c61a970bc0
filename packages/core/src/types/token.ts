import type { FlowPlan } from './plan';

/**
 * A FlowToken lets a subject resume a plan from an out-of-band channel.
 */
export interface FlowToken {
  /** Deterministic per (stage, user); at most one token per identifier */
  readonly identifier: string;

  /** Random, URL-safe; the value that travels in links */
  readonly key: string;

  readonly userId: string;

  readonly flowSlug: string;

  /** Expiry timestamp (ms). Logical only; nothing deletes on expiry. */
  readonly expiresAt: number;

  readonly createdAt: number;

  /** When the key was redeemed; null while unused */
  readonly usedAt: number | null;

  /** Serialized plan snapshot (see plan codec) */
  readonly plan: string;
}

export type NewFlowToken = Omit<FlowToken, 'usedAt'>;

/**
 * New key and expiry for a rotation. With `reissue`, the owner and plan
 * snapshot are replaced in the same swap.
 */
export interface TokenRotation {
  readonly key: string;
  readonly expiresAt: number;
  readonly reissue?: Pick<FlowToken, 'userId' | 'flowSlug' | 'plan'>;
}

/**
 * Outcome of redeeming a token key.
 */
export type RedeemResult =
  | { readonly status: 'redeemed'; readonly token: FlowToken; readonly plan: FlowPlan }
  | { readonly status: 'not-found' }
  | { readonly status: 'expired'; readonly token: FlowToken }
  | { readonly status: 'used'; readonly token: FlowToken }
  | { readonly status: 'invalid'; readonly token: FlowToken; readonly reason: string };

export type RedeemStatus = RedeemResult['status'];
