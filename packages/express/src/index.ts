/**
 * @flowgate/express - Express integration for FlowGate authentication flows.
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
 *   .flow({
 *     slug: 'enroll',
 *     title: 'Enroll',
 *     stages: [
 *       { id: 'identify', kind: 'identification', name: 'identify', config: {} },
 *       { id: 'verify', kind: 'email', name: 'verify', config: { tokenExpiryMinutes: 30 } },
 *     ],
 *   })
 *   .build();
 *
 * // Routes are registered on the app:
 * // GET  /api/flows/executor/:flowSlug
 * // POST /api/flows/executor/:flowSlug
 * // POST /api/flows/executor/:flowSlug/cancel
 * // GET  /if/flow/:flowSlug/
 * // GET  /api/admin/flows
 * // GET  /api/admin/stages
 * // GET  /health
 * // GET  /ready
 *
 * app.listen(3000);
 * ```
 */

// Main class
export { FlowGateExpress, FlowGateExpressBuilder } from './flowgate-express';
export type { FlowGateExpressConfig, SessionOptions } from './flowgate-express';

// Service container
export { ServiceContainer, type ServiceFactory } from './container';
export { ServiceTokens, type ServiceToken } from './tokens';

// Session
export { ExpressSessionStorage } from './session';

// Routes
export { Routes, buildRoute, DefaultRouteConfig } from './routes';
export type { RouteName, RoutePath, RouteConfig } from './routes';

// Middleware
export {
  createContextMiddleware,
  createErrorHandler,
  asyncHandler,
  requireFlowGateContext,
  validateServices,
} from './middleware';
export type {
  FlowGateContext,
  ContextMiddlewareOptions,
  ErrorResponse,
} from './middleware';

// Route handlers (for custom routing)
export {
  registerExecutorRoutes,
  registerInterfaceRoutes,
  registerAdminRoutes,
  registerHealthRoutes,
} from './handlers';
