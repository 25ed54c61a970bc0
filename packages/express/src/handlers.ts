/**
 * Express route handlers for FlowGate.
 */

import type { Router, Request, Response } from 'express';
import type { Flow, FlowExecutor, FlowRegistry, FlowRequest, FlowTokenStore, StageRegistry } from '@flowgate/core';
import { Routes } from './routes';
import { ServiceTokens } from './tokens';
import { ExpressSessionStorage } from './session';
import { asyncHandler, requireFlowGateContext } from './middleware';
import type { PgQueryable } from '@flowgate/postgres';

/**
 * String-valued query parameters only; repeated or nested keys are dropped.
 */
function stringQuery(query: Request['query']): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === 'string') out[key] = value;
  }
  return out;
}

function requestBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

function flowRequest(req: Request): FlowRequest {
  const ctx = requireFlowGateContext(req);
  return {
    flowSlug: req.params.flowSlug,
    query: stringQuery(req.query),
    session: new ExpressSessionStorage(req),
    baseUrl: ctx.baseUrl,
    locale: ctx.locale,
  };
}

function executorOf(req: Request): FlowExecutor {
  return requireFlowGateContext(req).container.resolve<FlowExecutor>(ServiceTokens.FlowExecutor);
}

/**
 * Register executor routes (get, submit, cancel).
 */
export function registerExecutorRoutes(router: Router): void {
  // GET /api/flows/executor/:flowSlug - Current challenge
  router.get(
    Routes.Executor,
    asyncHandler(async (req: Request, res: Response) => {
      const response = await executorOf(req).get(flowRequest(req));
      res.json(response);
    })
  );

  // POST /api/flows/executor/:flowSlug - Submit a response
  router.post(
    Routes.Executor,
    asyncHandler(async (req: Request, res: Response) => {
      const response = await executorOf(req).submit(flowRequest(req), requestBody(req));
      res.json(response);
    })
  );

  // POST /api/flows/executor/:flowSlug/cancel - Drop the live plan
  router.post(
    Routes.CancelFlow,
    asyncHandler(async (req: Request, res: Response) => {
      const result = await executorOf(req).cancel(flowRequest(req));
      res.json(result);
    })
  );
}

/**
 * Register the flow interface route. Links sent by stages point here; a
 * completed flow redirects, anything else answers with the executor response.
 */
export function registerInterfaceRoutes(router: Router): void {
  router.get(
    Routes.FlowInterface,
    asyncHandler(async (req: Request, res: Response) => {
      const response = await executorOf(req).get(flowRequest(req));
      if (response.redirect !== undefined) {
        res.redirect(302, response.redirect);
        return;
      }
      res.json(response);
    })
  );
}

/**
 * Register admin routes.
 */
export function registerAdminRoutes(router: Router): void {
  // GET /api/admin/flows - List flows
  router.get(Routes.ListFlows, (req: Request, res: Response) => {
    const ctx = requireFlowGateContext(req);
    const flows = ctx.container.resolve<FlowRegistry>(ServiceTokens.FlowRegistry);

    const flowList = flows.slugs().map((slug) => flows.get(slug))
      .filter((f): f is Flow => f !== undefined)
      .map((flow) => ({
        slug: flow.slug,
        name: flow.name ?? flow.slug,
        title: flow.title,
        designation: flow.designation,
        stages: flow.stages.map((s) => ({ id: s.id, kind: s.kind, name: s.name })),
      }));

    res.json({ flows: flowList });
  });

  // GET /api/admin/stages - List stage kinds
  router.get(Routes.ListStages, (req: Request, res: Response) => {
    const ctx = requireFlowGateContext(req);
    const stages = ctx.container.resolve<StageRegistry>(ServiceTokens.StageRegistry);

    res.json({
      stages: stages.getAllMetadata().map((metadata) => ({
        kind: metadata.kind,
        name: metadata.name,
        description: metadata.description,
        configSchema: metadata.configSchema,
      })),
    });
  });
}

/**
 * Register health check routes.
 */
export function registerHealthRoutes(router: Router): void {
  // GET /health - Basic health check
  router.get(Routes.Health, (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  // GET /ready - Readiness check (checks dependencies)
  router.get(
    Routes.Ready,
    asyncHandler(async (req: Request, res: Response) => {
      const ctx = requireFlowGateContext(req);
      const checks: Record<string, 'ok' | 'error'> = {};

      checks.tokenStore = ctx.container.tryResolve<FlowTokenStore>(ServiceTokens.FlowTokenStore) ? 'ok' : 'error';

      const pool = ctx.container.tryResolve<PgQueryable>(ServiceTokens.DatabasePool);
      if (pool) {
        try {
          await pool.query('SELECT 1');
          checks.database = 'ok';
        } catch (err) {
          console.error('[FlowGate] Database readiness check failed:', err);
          checks.database = 'error';
        }
      }

      const isReady = Object.values(checks).every((status) => status === 'ok');

      res.status(isReady ? 200 : 503).json({
        ready: isReady,
        checks,
        timestamp: new Date().toISOString(),
      });
    })
  );
}
