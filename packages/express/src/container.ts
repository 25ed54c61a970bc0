import type { ServiceToken } from './tokens';

export type ServiceFactory<T> = (container: ServiceContainer) => T;

type ServiceEntry =
  | { kind: 'instance'; value: unknown }
  | { kind: 'factory'; create: ServiceFactory<unknown>; singleton: boolean; cached?: { value: unknown } };

/**
 * Service locator for the Express integration. Services are keyed by
 * symbol; factories run on first resolve and see the container.
 *
 * @example
 * ```typescript
 * const container = new ServiceContainer()
 *   .registerInstance(ServiceTokens.FlowTokenStore, new MemoryFlowTokenStore())
 *   .registerFactory(ServiceTokens.FlowTokenService, (c) =>
 *     new FlowTokenService(c.resolve(ServiceTokens.FlowTokenStore))
 *   );
 *
 * const tokens = container.resolve<FlowTokenService>(ServiceTokens.FlowTokenService);
 * ```
 */
export class ServiceContainer {
  private readonly entries = new Map<ServiceToken, ServiceEntry>();
  /** Tokens whose factories are running, for cycle detection */
  private readonly resolving = new Set<ServiceToken>();

  registerInstance<T>(token: ServiceToken, instance: T): this {
    this.entries.set(token, { kind: 'instance', value: instance });
    return this;
  }

  /**
   * Register a lazily created service. Singletons (the default) are created
   * once; otherwise every resolve calls the factory.
   */
  registerFactory<T>(token: ServiceToken, factory: ServiceFactory<T>, singleton = true): this {
    this.entries.set(token, { kind: 'factory', create: factory, singleton });
    return this;
  }

  resolve<T>(token: ServiceToken): T {
    const entry = this.entries.get(token);
    if (!entry) {
      throw new Error(`Service not registered: ${String(token)}. Did you forget to register it?`);
    }
    // Registration pairs each token with its type; the map itself is untyped
    return this.valueOf(token, entry) as T;
  }

  has(token: ServiceToken): boolean {
    return this.entries.has(token);
  }

  tryResolve<T>(token: ServiceToken): T | undefined {
    return this.has(token) ? this.resolve<T>(token) : undefined;
  }

  clear(): void {
    this.entries.clear();
  }

  getRegisteredTokens(): ServiceToken[] {
    return [...this.entries.keys()];
  }

  private valueOf(token: ServiceToken, entry: ServiceEntry): unknown {
    if (entry.kind === 'instance') return entry.value;
    if (entry.cached) return entry.cached.value;

    if (this.resolving.has(token)) {
      const chain = [...this.resolving, token].map(t => String(t)).join(' -> ');
      throw new Error(`Circular service dependency: ${chain}`);
    }

    this.resolving.add(token);
    try {
      const value = entry.create(this);
      if (entry.singleton) entry.cached = { value };
      return value;
    } finally {
      this.resolving.delete(token);
    }
  }
}
