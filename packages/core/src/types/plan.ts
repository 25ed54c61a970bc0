import type { StageBinding } from './flow';

/** Cursor value once every stage has been passed. */
export const PLAN_COMPLETED = 'completed' as const;

export type PlanCursor = number | typeof PLAN_COMPLETED;

/** Shared data between stages. Values must be JSON-serializable. */
export type PlanContext = Record<string, unknown>;

/**
 * A FlowPlan is the live instance of a flow for one subject.
 */
export interface FlowPlan {
  /** Unique ID (UUID) */
  readonly id: string;

  /** Which flow this plan was built from */
  readonly flowSlug: string;

  /** Stage bindings copied from the flow at planning time */
  stages: StageBinding[];

  /** Index of the active stage, or PLAN_COMPLETED */
  cursor: PlanCursor;

  context: PlanContext;

  readonly createdAt: number;

  updatedAt: number;
}

// === Context keys ===

/** Id of the user the flow is acting on */
export const PLAN_CONTEXT_PENDING_USER = 'pending_user';

/** Set when the plan was rebuilt from a redeemed token; holds the token identifier */
export const PLAN_CONTEXT_IS_RESTORED = 'is_restored';

/** Set once the verification email for the active plan went out */
export const PLAN_CONTEXT_EMAIL_SENT = 'email_sent';

/** Overrides the recipient address of the verification email */
export const PLAN_CONTEXT_EMAIL_OVERRIDE = 'email';

// === Request-level keys ===

/** Reserved query key carrying a token key on return from an out-of-band link */
export const QS_KEY_TOKEN = 'flow_token';

/** Session key holding the serialized live plan */
export const SESSION_KEY_PLAN = 'flowgate/plan';

/** Session key holding the query parameters stashed when a plan was started or restored */
export const SESSION_KEY_GET = 'flowgate/get';
