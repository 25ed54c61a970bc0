import type { FlowToken, NewFlowToken, TokenRotation } from '../types/token';
import type { FlowTokenStore } from '../interfaces/token-store';

/**
 * In-memory token store. For testing and single-instance use.
 * Every method does its map work synchronously, so each call is atomic
 * with respect to other callers on the same event loop.
 */
export class MemoryFlowTokenStore implements FlowTokenStore {
  private tokens = new Map<string, FlowToken>();
  /** key → identifier */
  private keys = new Map<string, string>();

  async getOrCreate(record: NewFlowToken): Promise<{ token: FlowToken; created: boolean }> {
    const existing = this.tokens.get(record.identifier);
    if (existing) {
      return { token: { ...existing }, created: false };
    }

    if (this.keys.has(record.key)) {
      throw new Error(`Duplicate token key for "${record.identifier}"`);
    }

    const token: FlowToken = { ...record, usedAt: null };
    this.tokens.set(token.identifier, token);
    this.keys.set(token.key, token.identifier);
    return { token: { ...token }, created: true };
  }

  async findByKey(key: string): Promise<FlowToken | null> {
    const identifier = this.keys.get(key);
    const token = identifier ? this.tokens.get(identifier) : undefined;
    return token ? { ...token } : null;
  }

  async findByIdentifier(identifier: string): Promise<FlowToken | null> {
    const token = this.tokens.get(identifier);
    return token ? { ...token } : null;
  }

  async listByUser(userId: string): Promise<FlowToken[]> {
    const results: FlowToken[] = [];
    for (const token of this.tokens.values()) {
      if (token.userId === userId) results.push({ ...token });
    }
    return results;
  }

  async rotate(
    identifier: string,
    expectedKey: string,
    next: TokenRotation
  ): Promise<{ token: FlowToken; rotated: boolean } | null> {
    const current = this.tokens.get(identifier);
    if (!current) return null;

    if (current.key !== expectedKey) {
      return { token: { ...current }, rotated: false };
    }

    const token: FlowToken = { ...current, ...next.reissue, key: next.key, expiresAt: next.expiresAt, usedAt: null };
    this.keys.delete(current.key);
    this.keys.set(token.key, identifier);
    this.tokens.set(identifier, token);
    return { token: { ...token }, rotated: true };
  }

  async markUsed(key: string, usedAt: number): Promise<boolean> {
    const identifier = this.keys.get(key);
    const token = identifier ? this.tokens.get(identifier) : undefined;
    if (!token || token.usedAt !== null) return false;

    this.tokens.set(token.identifier, { ...token, usedAt });
    return true;
  }

  async purgeExpired(before: number): Promise<number> {
    let count = 0;
    for (const [identifier, token] of this.tokens) {
      if (token.expiresAt < before) {
        this.tokens.delete(identifier);
        this.keys.delete(token.key);
        count++;
      }
    }
    return count;
  }

  // === Testing Utilities ===

  clear(): void {
    this.tokens.clear();
    this.keys.clear();
  }

  get size(): number {
    return this.tokens.size;
  }
}
