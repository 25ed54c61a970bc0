/**
 * Type-safe route definitions for the FlowGate Express integration.
 */

/**
 * API route definitions.
 */
export const Routes = {
  // ── Executor Routes ─────────────────────────────────────────────────
  /**
   * GET  /api/flows/executor/:flowSlug  Current challenge (restores from `flow_token`)
   * POST /api/flows/executor/:flowSlug  Submit a response to the active stage
   */
  Executor: '/api/flows/executor/:flowSlug',

  /**
   * POST /api/flows/executor/:flowSlug/cancel
   * Drop the live plan of this session.
   */
  CancelFlow: '/api/flows/executor/:flowSlug/cancel',

  // ── Interface Routes ────────────────────────────────────────────────
  /**
   * GET /if/flow/:flowSlug/
   * Target of links sent out of band; redirects once the flow completes.
   */
  FlowInterface: '/if/flow/:flowSlug/',

  // ── Admin Routes ────────────────────────────────────────────────────
  /**
   * GET /api/admin/flows
   * List all registered flows.
   */
  ListFlows: '/api/admin/flows',

  /**
   * GET /api/admin/stages
   * List all registered stage kinds.
   */
  ListStages: '/api/admin/stages',

  // ── Health Routes ───────────────────────────────────────────────────
  /**
   * GET /health
   */
  Health: '/health',

  /**
   * GET /ready
   * Readiness check (token store, database).
   */
  Ready: '/ready',
} as const;

export type RouteName = keyof typeof Routes;
export type RoutePath = (typeof Routes)[RouteName];

/**
 * Helper to build a route with parameters.
 *
 * @example
 * ```typescript
 * buildRoute(Routes.Executor, { flowSlug: 'enroll' });
 * // => '/api/flows/executor/enroll'
 * ```
 */
export function buildRoute(
  route: RoutePath,
  params: Record<string, string> = {}
): string {
  let result: string = route;
  for (const [key, value] of Object.entries(params)) {
    result = result.replace(`:${key}`, encodeURIComponent(value));
  }
  return result;
}

/**
 * Route configuration for enabling/disabling routes.
 */
export interface RouteConfig {
  /** Executor routes (get, submit, cancel) */
  executor?: boolean;
  /** Flow interface route that out-of-band links point at */
  interface?: boolean;
  /** Admin routes (list flows, stages) */
  admin?: boolean;
  /** Health check routes */
  health?: boolean;
}

/**
 * Default route configuration - all enabled.
 */
export const DefaultRouteConfig: RouteConfig = {
  executor: true,
  interface: true,
  admin: true,
  health: true,
};
