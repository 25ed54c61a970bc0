import type { Flow } from '../types/flow';
import type { FlowPlan, PlanContext } from '../types/plan';

/**
 * Turns a flow definition into a live plan.
 */
export interface FlowPlanner {
  plan(flow: Flow, context?: PlanContext): FlowPlan;
}
