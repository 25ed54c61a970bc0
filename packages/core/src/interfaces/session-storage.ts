/**
 * Session-scoped key/value storage supplied by the host.
 * One session holds at most one live plan.
 */
export interface SessionStorage {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  delete(key: string): void;
}
