/**
 * Tests for FlowGateExpress setup: container wiring, builder, prefix,
 * route toggles and hooks.
 */

import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import {
  FlowExecutor,
  FlowValidationError,
  MemoryFlowTokenStore,
  MemoryNotificationDispatcher,
  MemoryUserStore,
  simpleFlow,
  testStages,
  type FlowUrlBuilder,
} from '@flowgate/core/test';
import { PgFlowTokenStore } from '@flowgate/postgres';
import { FlowGateExpress } from '../src/flowgate-express';
import { ServiceContainer } from '../src/container';
import { ServiceTokens } from '../src/tokens';
import { createTestApp } from './fixtures';

describe('FlowGateExpress', () => {
  describe('container', () => {
    it('registers the executor and its collaborators', () => {
      const { gate } = createTestApp();

      expect(gate.getExecutor()).toBeInstanceOf(FlowExecutor);
      expect(gate.getExecutor()).toBe(gate.getExecutor());
      expect(gate.getTokenService()).toBe(gate.getTokenService());
      expect(gate.getExecutor().flows.has('simple')).toBe(true);
      expect(gate.resolve(ServiceTokens.FlowTokenStore)).toBeInstanceOf(MemoryFlowTokenStore);
    });

    it('registers only the services the routes resolve', () => {
      const { gate } = createTestApp();

      expect(gate.getContainer().getRegisteredTokens()).toEqual([
        ServiceTokens.EventBus,
        ServiceTokens.FlowTokenStore,
        ServiceTokens.UserStore,
        ServiceTokens.NotificationDispatcher,
        ServiceTokens.FlowUrlBuilder,
        ServiceTokens.StageRegistry,
        ServiceTokens.FlowRegistry,
        ServiceTokens.FlowTokenService,
        ServiceTokens.FlowExecutor,
      ]);
    });

    it('stores tokens in Postgres when a database is given', () => {
      const { gate } = createTestApp({ database: { query: vi.fn() } });

      expect(gate.resolve(ServiceTokens.FlowTokenStore)).toBeInstanceOf(PgFlowTokenStore);
    });

    it('prefers an explicit token store', () => {
      const tokenStore = new MemoryFlowTokenStore();
      const { gate } = createTestApp({ database: { query: vi.fn() }, tokenStore });

      expect(gate.resolve(ServiceTokens.FlowTokenStore)).toBe(tokenStore);
    });

    it('emits registration events on the bus', () => {
      const { events } = createTestApp();

      expect(events.filter(e => e.type === 'stage.registered')).toHaveLength(5);
      expect(events.filter(e => e.type === 'flow.registered')).toHaveLength(5);
    });

    it('rejects a flow referencing an unknown stage kind', () => {
      expect(() =>
        createTestApp({ flows: [{ slug: 'bad', stages: [{ id: 'x', kind: 'ghost', name: 'x', config: {} }] }] })
      ).toThrow(FlowValidationError);
    });

    it('registers stages and flows after construction', async () => {
      const { app, gate } = createTestApp({ stages: [], flows: [] });
      testStages.forEach(s => gate.registerStage(s));
      gate.registerFlow(simpleFlow);

      const response = await request(app).get('/api/flows/executor/simple');

      expect(response.body.stageId).toBe('question');
    });
  });

  describe('routing', () => {
    it('mounts under a prefix and links point there', async () => {
      const { app, gate } = createTestApp({ prefix: '/auth' });

      const mounted = await request(app).get('/auth/api/flows/executor/simple');
      const bare = await request(app).get('/api/flows/executor/simple');

      expect(mounted.status).toBe(200);
      expect(bare.status).toBe(404);

      const urls = gate.resolve<FlowUrlBuilder>(ServiceTokens.FlowUrlBuilder);
      expect(urls.build({ baseUrl: 'http://testserver', flowSlug: 'simple' })).toBe(
        'http://testserver/auth/if/flow/simple/'
      );
    });

    it('skips disabled route groups', async () => {
      const { app } = createTestApp({ routes: { admin: false } });

      expect((await request(app).get('/api/admin/flows')).status).toBe(404);
      expect((await request(app).get('/health')).status).toBe(200);
    });

    it('runs custom middleware before the routes', async () => {
      const { app } = createTestApp({
        middleware: [
          (_req, res, next) => {
            res.setHeader('X-Gate', 'on');
            next();
          },
        ],
      });

      const response = await request(app).get('/health');

      expect(response.headers['x-gate']).toBe('on');
    });
  });

  describe('hooks', () => {
    it('calls container and routes hooks once', () => {
      const onContainerReady = vi.fn();
      const onRoutesRegistered = vi.fn();

      const { app } = createTestApp({ hooks: { onContainerReady, onRoutesRegistered } });

      expect(onContainerReady).toHaveBeenCalledTimes(1);
      expect(onContainerReady.mock.calls[0][0]).toBeInstanceOf(ServiceContainer);
      expect(onRoutesRegistered).toHaveBeenCalledWith(app);
    });
  });

  describe('builder', () => {
    it('requires an app', () => {
      expect(() => FlowGateExpress.builder().build()).toThrow('Express app is required. Call .app(expressApp) first.');
    });

    it('requires a user store and a notification dispatcher', () => {
      const app = express();

      expect(() => FlowGateExpress.builder().app(app).build()).toThrow(
        'User store is required. Call .users(store) first.'
      );
      expect(() => FlowGateExpress.builder().app(app).users(new MemoryUserStore()).build()).toThrow(
        'Notification dispatcher is required. Call .notifications(dispatcher) first.'
      );
    });

    it('registers stages before flows', async () => {
      const app = express();
      const builder = FlowGateExpress.builder()
        .app(app)
        .users(new MemoryUserStore())
        .notifications(new MemoryNotificationDispatcher())
        .session({ secret: 'test-secret', cookieName: 'gate.sid' })
        .flow(simpleFlow);
      testStages.forEach(s => builder.stage(s));

      builder.build();
      const response = await request(app).get('/api/flows/executor/simple');

      expect(response.status).toBe(200);
      expect(response.headers['set-cookie']?.[0]).toMatch(/^gate\.sid=/);
    });
  });
});
