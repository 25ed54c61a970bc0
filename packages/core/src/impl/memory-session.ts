import type { SessionStorage } from '../interfaces/session-storage';

/**
 * Map-backed session. One instance per simulated browser session.
 */
export class MemorySessionStorage implements SessionStorage {
  private data = new Map<string, unknown>();

  get(key: string): unknown {
    const value = this.data.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  set(key: string, value: unknown): void {
    this.data.set(key, structuredClone(value));
  }

  delete(key: string): void {
    this.data.delete(key);
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  clear(): void {
    this.data.clear();
  }
}
