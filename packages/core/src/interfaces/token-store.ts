import type { FlowToken, NewFlowToken, TokenRotation } from '../types/token';

/**
 * Persistence layer for flow tokens.
 * Implement this for Postgres, Redis, etc.
 *
 * Implementations must make `getOrCreate`, `rotate` and `markUsed` atomic:
 * two concurrent callers never create two tokens for one identifier,
 * and only one of two concurrent rotations takes effect.
 */
export interface FlowTokenStore {
  /** Insert `record` unless a token with the same identifier exists; return whichever is stored */
  getOrCreate(record: NewFlowToken): Promise<{ token: FlowToken; created: boolean }>;

  findByKey(key: string): Promise<FlowToken | null>;

  findByIdentifier(identifier: string): Promise<FlowToken | null>;

  listByUser(userId: string): Promise<FlowToken[]>;

  /**
   * Replace key and expiry (and, with `next.reissue`, owner and plan snapshot)
   * if the stored key still equals `expectedKey`; clears `usedAt`.
   * Returns the stored token either way, or null if the identifier is gone.
   */
  rotate(
    identifier: string,
    expectedKey: string,
    next: TokenRotation
  ): Promise<{ token: FlowToken; rotated: boolean } | null>;

  /** Set `usedAt` if the token is unused. Returns false if it was already used or is missing. */
  markUsed(key: string, usedAt: number): Promise<boolean>;

  /** Housekeeping: delete tokens that expired before `before`. Returns the count removed. */
  purgeExpired(before: number): Promise<number>;
}
