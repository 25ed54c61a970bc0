/**
 * FlowGateExpress - Main integration class for Express applications.
 */

import { Router, json, type Application, type RequestHandler } from 'express';
import session from 'express-session';
import {
  DefaultFlowRegistry,
  DefaultFlowUrlBuilder,
  DefaultStageRegistry,
  EventEmittingFlowRegistry,
  EventEmittingStageRegistry,
  FlowExecutor,
  FlowTokenService,
  MemoryFlowTokenStore,
  type EventBus,
  type ExecutorOptions,
  type Flow,
  type FlowRegistry,
  type FlowTokenStore,
  type FlowUrlBuilder,
  type NotificationDispatcher,
  type StageHandler,
  type StageRegistry,
  type UserStore,
} from '@flowgate/core';
import { PgFlowTokenStore, type PgQueryable } from '@flowgate/postgres';
import { ServiceContainer } from './container';
import { ServiceTokens } from './tokens';
import {
  createContextMiddleware,
  createErrorHandler,
  type ContextMiddlewareOptions,
} from './middleware';
import {
  registerExecutorRoutes,
  registerInterfaceRoutes,
  registerAdminRoutes,
  registerHealthRoutes,
} from './handlers';
import { Routes, type RouteConfig, DefaultRouteConfig } from './routes';

export interface SessionOptions {
  /** Secret used to sign the session cookie */
  secret: string;
  /** Cookie name (default: 'flowgate.sid') */
  cookieName?: string;
  /** Session store (default: express-session's MemoryStore) */
  store?: session.Store;
}

/**
 * Configuration for FlowGateExpress.
 */
export interface FlowGateExpressConfig {
  /**
   * Express application instance.
   */
  app: Application;

  /**
   * PostgreSQL pool. Tokens are stored in `fg_flow_tokens` when given.
   */
  database?: PgQueryable;

  /**
   * Custom token store. Takes precedence over `database`;
   * without either, tokens live in memory.
   */
  tokenStore?: FlowTokenStore;

  /**
   * Where stages look up and activate users.
   */
  users: UserStore;

  /**
   * Delivers the messages stages send out of band.
   */
  notifications: NotificationDispatcher;

  /**
   * Builds links back into the flow interface.
   * Defaults to the interface route under `prefix`.
   */
  urls?: FlowUrlBuilder;

  /**
   * Stages to register (before flows).
   */
  stages?: StageHandler[];

  /**
   * Flows to register. Each is validated against the registered stages.
   */
  flows?: Flow[];

  /**
   * Custom event bus.
   */
  eventBus?: EventBus;

  /**
   * Mount express-session on the FlowGate router.
   * Leave unset when the app installs its own session middleware.
   */
  session?: SessionOptions;

  /**
   * Executor options.
   */
  executor?: ExecutorOptions;

  /**
   * Route configuration.
   */
  routes?: RouteConfig;

  /**
   * Context middleware options.
   */
  context?: ContextMiddlewareOptions;

  /**
   * Route prefix (default: '').
   */
  prefix?: string;

  /**
   * Additional middleware to apply before FlowGate routes.
   */
  middleware?: RequestHandler[];

  /**
   * Lifecycle hooks.
   */
  hooks?: {
    /** Called once services are registered, before routes */
    onContainerReady?: (container: ServiceContainer) => void;
    /** Called after routes are registered */
    onRoutesRegistered?: (app: Application) => void;
  };
}

/**
 * Builder for FlowGateExpress configuration.
 */
export class FlowGateExpressBuilder {
  private config: Partial<FlowGateExpressConfig> = {};
  private stageList: StageHandler[] = [];
  private flowList: Flow[] = [];

  /**
   * Set the Express application.
   */
  app(app: Application): this {
    this.config.app = app;
    return this;
  }

  /**
   * Set the database pool.
   */
  database(pool: PgQueryable): this {
    this.config.database = pool;
    return this;
  }

  /**
   * Set custom token store.
   */
  tokenStore(store: FlowTokenStore): this {
    this.config.tokenStore = store;
    return this;
  }

  users(store: UserStore): this {
    this.config.users = store;
    return this;
  }

  notifications(dispatcher: NotificationDispatcher): this {
    this.config.notifications = dispatcher;
    return this;
  }

  urls(builder: FlowUrlBuilder): this {
    this.config.urls = builder;
    return this;
  }

  /**
   * Set custom event bus.
   */
  eventBus(bus: EventBus): this {
    this.config.eventBus = bus;
    return this;
  }

  /**
   * Mount express-session with these options.
   */
  session(options: SessionOptions): this {
    this.config.session = options;
    return this;
  }

  executor(options: ExecutorOptions): this {
    this.config.executor = options;
    return this;
  }

  /**
   * Configure routes.
   */
  routes(config: RouteConfig): this {
    this.config.routes = config;
    return this;
  }

  /**
   * Set route prefix.
   */
  prefix(prefix: string): this {
    this.config.prefix = prefix;
    return this;
  }

  /**
   * Add middleware.
   */
  use(...middleware: RequestHandler[]): this {
    this.config.middleware = [...(this.config.middleware ?? []), ...middleware];
    return this;
  }

  /**
   * Configure context extraction.
   */
  context(options: ContextMiddlewareOptions): this {
    this.config.context = options;
    return this;
  }

  /**
   * Add a stage.
   */
  stage(stage: StageHandler): this {
    this.stageList.push(stage);
    return this;
  }

  /**
   * Add a flow.
   */
  flow(flow: Flow): this {
    this.flowList.push(flow);
    return this;
  }

  /**
   * Add lifecycle hooks.
   */
  hooks(hooks: FlowGateExpressConfig['hooks']): this {
    this.config.hooks = { ...this.config.hooks, ...hooks };
    return this;
  }

  /**
   * Build the FlowGateExpress instance.
   */
  build(): FlowGateExpress {
    const { app, users, notifications } = this.config;
    if (!app) {
      throw new Error('Express app is required. Call .app(expressApp) first.');
    }
    if (!users) {
      throw new Error('User store is required. Call .users(store) first.');
    }
    if (!notifications) {
      throw new Error('Notification dispatcher is required. Call .notifications(dispatcher) first.');
    }

    return new FlowGateExpress({
      ...this.config,
      app,
      users,
      notifications,
      stages: [...(this.config.stages ?? []), ...this.stageList],
      flows: [...(this.config.flows ?? []), ...this.flowList],
    });
  }
}

/**
 * FlowGateExpress - Main integration class.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { Pool } from 'pg';
 * import { FlowGateExpress } from '@flowgate/express';
 * import { identificationStage, emailStage } from '@flowgate/stages';
 *
 * const app = express();
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 *
 * FlowGateExpress.builder()
 *   .app(app)
 *   .database(pool)
 *   .users(userStore)
 *   .notifications(mailer)
 *   .session({ secret: process.env.SESSION_SECRET ?? 'change-me' })
 *   .stage(identificationStage)
 *   .stage(emailStage)
 *   .flow(enrollmentFlow)
 *   .build();
 *
 * app.listen(3000);
 * ```
 */
export class FlowGateExpress {
  private container: ServiceContainer;
  private app: Application;
  private config: FlowGateExpressConfig;

  constructor(config: FlowGateExpressConfig) {
    this.config = {
      ...config,
      routes: { ...DefaultRouteConfig, ...config.routes },
    };
    this.app = config.app;
    this.container = new ServiceContainer();

    this.setupContainer();
    this.setupRoutes();
  }

  /**
   * Create a builder for configuring FlowGateExpress.
   */
  static builder(): FlowGateExpressBuilder {
    return new FlowGateExpressBuilder();
  }

  /**
   * Get the service container.
   */
  getContainer(): ServiceContainer {
    return this.container;
  }

  /**
   * Get a service by token.
   */
  resolve<T>(token: symbol): T {
    return this.container.resolve<T>(token);
  }

  /**
   * Register a stage.
   */
  registerStage(stage: StageHandler): void {
    this.container.resolve<StageRegistry>(ServiceTokens.StageRegistry).register(stage);
  }

  /**
   * Register a flow. Throws FlowValidationError if it references unknown stages.
   */
  registerFlow(flow: Flow): void {
    this.container.resolve<FlowRegistry>(ServiceTokens.FlowRegistry).register(flow);
  }

  /**
   * Get the flow executor.
   */
  getExecutor(): FlowExecutor {
    return this.container.resolve<FlowExecutor>(ServiceTokens.FlowExecutor);
  }

  getTokenService(): FlowTokenService {
    return this.container.resolve<FlowTokenService>(ServiceTokens.FlowTokenService);
  }

  private setupContainer(): void {
    const { database, tokenStore, users, notifications, urls, eventBus, prefix = '' } = this.config;

    if (database) {
      this.container.registerInstance(ServiceTokens.DatabasePool, database);
    }

    if (eventBus) {
      this.container.registerInstance(ServiceTokens.EventBus, eventBus);
    }

    this.container.registerInstance(
      ServiceTokens.FlowTokenStore,
      tokenStore ?? (database ? new PgFlowTokenStore(database) : new MemoryFlowTokenStore())
    );
    this.container.registerInstance(ServiceTokens.UserStore, users);
    this.container.registerInstance(ServiceTokens.NotificationDispatcher, notifications);
    this.container.registerInstance(
      ServiceTokens.FlowUrlBuilder,
      urls ?? new DefaultFlowUrlBuilder({ pathTemplate: `${prefix}${Routes.FlowInterface}` })
    );

    // Registries wrap in event emitters when a bus is configured
    const stageRegistry = new DefaultStageRegistry();
    const flowRegistry = new DefaultFlowRegistry(stageRegistry);
    this.container.registerInstance<StageRegistry>(
      ServiceTokens.StageRegistry,
      eventBus ? new EventEmittingStageRegistry(stageRegistry, eventBus) : stageRegistry
    );
    this.container.registerInstance<FlowRegistry>(
      ServiceTokens.FlowRegistry,
      eventBus ? new EventEmittingFlowRegistry(flowRegistry, eventBus) : flowRegistry
    );

    this.container.registerFactory(ServiceTokens.FlowTokenService, (c) =>
      new FlowTokenService(c.resolve<FlowTokenStore>(ServiceTokens.FlowTokenStore), c.tryResolve<EventBus>(ServiceTokens.EventBus))
    );

    this.container.registerFactory(ServiceTokens.FlowExecutor, (c) =>
      new FlowExecutor(
        c.resolve<FlowRegistry>(ServiceTokens.FlowRegistry),
        c.resolve<StageRegistry>(ServiceTokens.StageRegistry),
        {
          tokens: c.resolve<FlowTokenService>(ServiceTokens.FlowTokenService),
          users: c.resolve<UserStore>(ServiceTokens.UserStore),
          notifications: c.resolve<NotificationDispatcher>(ServiceTokens.NotificationDispatcher),
          urls: c.resolve<FlowUrlBuilder>(ServiceTokens.FlowUrlBuilder),
          events: c.tryResolve<EventBus>(ServiceTokens.EventBus),
        },
        c.tryResolve<EventBus>(ServiceTokens.EventBus),
        this.config.executor
      )
    );

    this.config.stages?.forEach((s) => this.registerStage(s));
    this.config.flows?.forEach((f) => this.registerFlow(f));

    this.config.hooks?.onContainerReady?.(this.container);
  }

  private setupRoutes(): void {
    const { routes, prefix = '', middleware = [], context } = this.config;
    const router = Router();

    if (this.config.session) {
      const { secret, cookieName = 'flowgate.sid', store } = this.config.session;
      router.use(session({ secret, name: cookieName, store, resave: false, saveUninitialized: false }));
    }

    router.use(json());

    // Apply context middleware
    router.use(createContextMiddleware(this.container, context));

    // Apply custom middleware
    for (const mw of middleware) {
      router.use(mw);
    }

    // Register routes based on configuration
    if (routes?.executor) {
      registerExecutorRoutes(router);
    }

    if (routes?.interface) {
      registerInterfaceRoutes(router);
    }

    if (routes?.admin) {
      registerAdminRoutes(router);
    }

    if (routes?.health) {
      registerHealthRoutes(router);
    }

    // Apply error handler
    router.use(createErrorHandler());

    // Mount router on app
    if (prefix) {
      this.app.use(prefix, router);
    } else {
      this.app.use(router);
    }

    this.config.hooks?.onRoutesRegistered?.(this.app);
  }
}
