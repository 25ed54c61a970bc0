/**
 * Test fixtures for @flowgate/express tests.
 */

import express, { type Express } from 'express';
import {
  EventDispatcher,
  MemoryNotificationDispatcher,
  MemoryUserStore,
  testFlows,
  testStages,
  type DispatchedEvent,
  type FlowUser,
} from '@flowgate/core/test';
import { FlowGateExpress, type FlowGateExpressConfig } from '../src/flowgate-express';

export interface TestApp {
  app: Express;
  gate: FlowGateExpress;
  users: MemoryUserStore;
  notifications: MemoryNotificationDispatcher;
  events: DispatchedEvent[];
}

export const carol: FlowUser = {
  id: 'u-carol',
  username: 'carol',
  email: 'carol@example.test',
  isActive: false,
};

/**
 * Express app with FlowGate mounted on in-memory collaborators,
 * the core test stages and flows, and a sync dispatcher capturing events.
 */
export function createTestApp(overrides: Partial<FlowGateExpressConfig> = {}): TestApp {
  const app = express();
  const users = new MemoryUserStore([carol]);
  const notifications = new MemoryNotificationDispatcher();
  const dispatcher = new EventDispatcher({ mode: 'sync' });
  const events: DispatchedEvent[] = [];
  dispatcher.on('*', (e) => {
    events.push(e);
  });

  const gate = new FlowGateExpress({
    app,
    users,
    notifications,
    eventBus: dispatcher,
    session: { secret: 'test-secret' },
    stages: testStages,
    flows: testFlows,
    ...overrides,
  });

  return { app, gate, users, notifications, events };
}
