/**
 * Service tokens for dependency injection.
 *
 * These tokens identify services in the ServiceContainer.
 */
export const ServiceTokens = {
  // Core services
  FlowExecutor: Symbol.for('fg:FlowExecutor'),
  FlowRegistry: Symbol.for('fg:FlowRegistry'),
  StageRegistry: Symbol.for('fg:StageRegistry'),
  EventBus: Symbol.for('fg:EventBus'),

  // Tokens
  FlowTokenStore: Symbol.for('fg:FlowTokenStore'),
  FlowTokenService: Symbol.for('fg:FlowTokenService'),

  // Stage collaborators
  UserStore: Symbol.for('fg:UserStore'),
  NotificationDispatcher: Symbol.for('fg:NotificationDispatcher'),
  FlowUrlBuilder: Symbol.for('fg:FlowUrlBuilder'),

  // Database
  DatabasePool: Symbol.for('fg:DatabasePool'),
} as const;

export type ServiceToken = symbol;
