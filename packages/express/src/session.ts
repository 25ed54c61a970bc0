import type { Request } from 'express';
import type { SessionStorage } from '@flowgate/core';

declare module 'express-session' {
  interface SessionData {
    /** Keys the executor keeps in the session */
    flowgate: Record<string, unknown>;
  }
}

/**
 * SessionStorage over express-session. Values live under `req.session.flowgate`
 * and are saved by the session middleware when the response ends.
 */
export class ExpressSessionStorage implements SessionStorage {
  constructor(private readonly req: Request) {
    if (!req.session) {
      throw new Error('express-session is not installed. Configure `session` or mount it before FlowGate routes.');
    }
  }

  get(key: string): unknown {
    return this.req.session.flowgate?.[key];
  }

  set(key: string, value: unknown): void {
    this.req.session.flowgate = { ...this.req.session.flowgate, [key]: value };
  }

  delete(key: string): void {
    const data = this.req.session.flowgate;
    if (!data || !(key in data)) return;
    const rest = { ...data };
    delete rest[key];
    this.req.session.flowgate = rest;
  }
}
