import type { Flow, StageBinding } from '../types/flow';
import { PLAN_COMPLETED, type FlowPlan, type PlanContext } from '../types/plan';
import type { FlowPlanner } from '../interfaces/planner';
import { generateId, now } from '../utils';

/**
 * Build a fresh plan positioned on the first stage.
 */
export function createPlan(flow: Flow, context: PlanContext = {}): FlowPlan {
  const createdAt = now();
  return {
    id: generateId(),
    flowSlug: flow.slug,
    stages: flow.stages.map(s => ({ ...s, config: { ...s.config } })),
    cursor: flow.stages.length > 0 ? 0 : PLAN_COMPLETED,
    context: { ...context },
    createdAt,
    updatedAt: createdAt,
  };
}

export function isPlanCompleted(plan: FlowPlan): boolean {
  return plan.cursor === PLAN_COMPLETED;
}

/**
 * The active stage, or undefined once the plan is completed.
 */
export function currentStage(plan: FlowPlan): StageBinding | undefined {
  return plan.cursor === PLAN_COMPLETED ? undefined : plan.stages[plan.cursor];
}

/**
 * Move past the active stage. Returns the new active stage, or undefined when the plan completed.
 */
export function advancePlan(plan: FlowPlan): StageBinding | undefined {
  if (plan.cursor === PLAN_COMPLETED) return undefined;

  const next = plan.cursor + 1;
  plan.cursor = next < plan.stages.length ? next : PLAN_COMPLETED;
  plan.updatedAt = now();
  return currentStage(plan);
}

/**
 * Queue `stage` to run right after the active one.
 */
export function insertStageAfterCurrent(plan: FlowPlan, stage: StageBinding): void {
  if (plan.stages.some(s => s.id === stage.id)) {
    throw new Error(`Stage "${stage.id}" is already part of plan ${plan.id}`);
  }
  if (plan.cursor === PLAN_COMPLETED) {
    plan.stages.push(stage);
    plan.cursor = plan.stages.length - 1;
  } else {
    plan.stages.splice(plan.cursor + 1, 0, stage);
  }
  plan.updatedAt = now();
}

/**
 * Planner that copies the flow's stages verbatim.
 */
export class DefaultPlanner implements FlowPlanner {
  plan(flow: Flow, context?: PlanContext): FlowPlan {
    return createPlan(flow, context);
  }
}
