import type { SessionStorage } from '../interfaces/session-storage';
import { SESSION_KEY_GET, SESSION_KEY_PLAN, type FlowPlan } from '../types/plan';
import { PlanSnapshotError } from '../types/errors';
import { deserializePlan, serializePlan } from './plan-codec';

/**
 * Read the live plan from the session. A snapshot that no longer decodes is dropped.
 */
export function loadSessionPlan(session: SessionStorage): FlowPlan | undefined {
  const raw = session.get(SESSION_KEY_PLAN);
  if (raw === undefined || raw === null) return undefined;

  if (typeof raw !== 'string') {
    session.delete(SESSION_KEY_PLAN);
    return undefined;
  }

  try {
    return deserializePlan(raw);
  } catch (err) {
    if (!(err instanceof PlanSnapshotError)) throw err;
    session.delete(SESSION_KEY_PLAN);
    return undefined;
  }
}

export function saveSessionPlan(session: SessionStorage, plan: FlowPlan): void {
  session.set(SESSION_KEY_PLAN, serializePlan(plan));
}

export function clearSessionPlan(session: SessionStorage): void {
  session.delete(SESSION_KEY_PLAN);
  session.delete(SESSION_KEY_GET);
}

/**
 * Query parameters stashed when the live plan was started or restored.
 */
export function stashedQuery(session: SessionStorage): Record<string, string> {
  const raw = session.get(SESSION_KEY_GET);
  if (typeof raw !== 'object' || raw === null) return {};

  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') query[key] = value;
  }
  return query;
}

export function stashQuery(session: SessionStorage, query: Record<string, string>): void {
  session.set(SESSION_KEY_GET, { ...query });
}
