/**
 * Tests for route utilities.
 */

import { describe, it, expect } from 'vitest';
import { Routes, buildRoute, DefaultRouteConfig } from '../src/routes';

describe('Routes', () => {
  it('defines executor and interface routes', () => {
    expect(Routes.Executor).toBe('/api/flows/executor/:flowSlug');
    expect(Routes.CancelFlow).toBe('/api/flows/executor/:flowSlug/cancel');
    expect(Routes.FlowInterface).toBe('/if/flow/:flowSlug/');
  });

  describe('buildRoute', () => {
    it('substitutes parameters', () => {
      expect(buildRoute(Routes.Executor, { flowSlug: 'enroll' })).toBe('/api/flows/executor/enroll');
    });

    it('encodes parameter values', () => {
      expect(buildRoute(Routes.FlowInterface, { flowSlug: 'a b' })).toBe('/if/flow/a%20b/');
    });

    it('leaves missing params in place', () => {
      expect(buildRoute(Routes.CancelFlow, {})).toBe('/api/flows/executor/:flowSlug/cancel');
    });
  });

  it('enables every route group by default', () => {
    expect(DefaultRouteConfig).toEqual({ executor: true, interface: true, admin: true, health: true });
  });
});
