/**
 * Express middleware for FlowGate.
 */

import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { FlowNotFoundError, FlowValidationError } from '@flowgate/core';
import type { ServiceContainer } from './container';

/**
 * Context attached to Express requests.
 */
export interface FlowGateContext {
  /** Service container for accessing FlowGate services */
  container: ServiceContainer;
  /** Scheme + host for links sent out of band */
  baseUrl: string;
  /** Locale negotiated for the request */
  locale?: string;
}

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      flowgate?: FlowGateContext;
    }
  }
}

/**
 * Options for FlowGate context middleware.
 */
export interface ContextMiddlewareOptions {
  /** Override the base URL (default: protocol and Host header of the request) */
  getBaseUrl?: (req: Request) => string;
  /** Extract the request locale (default: first Accept-Language entry) */
  getLocale?: (req: Request) => string | undefined;
}

function defaultBaseUrl(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

function defaultLocale(req: Request): string | undefined {
  const header = req.get('accept-language');
  const first = header?.split(',')[0]?.split(';')[0]?.trim();
  return first && first !== '*' ? first : undefined;
}

/**
 * Create middleware that attaches FlowGate context to requests.
 */
export function createContextMiddleware(
  container: ServiceContainer,
  options: ContextMiddlewareOptions = {}
): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.flowgate = {
      container,
      baseUrl: (options.getBaseUrl ?? defaultBaseUrl)(req),
      locale: (options.getLocale ?? defaultLocale)(req),
    };
    next();
  };
}

/**
 * Error response format.
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Create error handling middleware for FlowGate routes.
 * Unknown flows map to 404, invalid flows to 400; anything else is logged
 * and answered with a generic 500.
 */
export function createErrorHandler(): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof FlowNotFoundError) {
      const body: ErrorResponse = { error: { code: err.code, message: err.message } };
      res.status(404).json(body);
      return;
    }

    if (err instanceof FlowValidationError) {
      const body: ErrorResponse = { error: { code: err.code, message: err.message, details: err.issues } };
      res.status(400).json(body);
      return;
    }

    console.error('[FlowGate] Request failed:', err);
    const body: ErrorResponse = {
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    };
    res.status(500).json(body);
  };
}

/**
 * Request validation helpers.
 */
export function requireFlowGateContext(req: Request): FlowGateContext {
  if (!req.flowgate) {
    const err = new Error('FlowGate context not attached. Did you forget the middleware?');
    err.name = 'ConfigurationError';
    throw err;
  }
  return req.flowgate;
}

/**
 * Async handler wrapper to catch errors.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Validate that required services are registered.
 */
export function validateServices(container: ServiceContainer, tokens: symbol[]): void {
  const missing = tokens.filter(token => !container.has(token));
  if (missing.length > 0) {
    throw new Error(
      `Missing required services: ${missing.map(t => String(t)).join(', ')}`
    );
  }
}
