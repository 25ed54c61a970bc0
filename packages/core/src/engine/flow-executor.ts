import type { Flow, StageBinding } from '../types/flow';
import type { FlowPlan, PlanContext } from '../types/plan';
import type { Challenge, FlowMessage } from '../types/challenge';
import { StageResult, type ResponseError } from '../types/result';
import type { FlowRegistry } from '../interfaces/flow-registry';
import type { StageRegistry } from '../interfaces/stage-registry';
import type { StageContext, StageHandler, StageServices } from '../interfaces/stage-handler';
import type { SessionStorage } from '../interfaces/session-storage';
import type { FlowPlanner } from '../interfaces/planner';
import type { EventBus } from '../interfaces/event-bus';
import { FlowGateError, FlowNotFoundError, StageNotFoundError } from '../types/errors';
import { PLAN_CONTEXT_IS_RESTORED, QS_KEY_TOKEN } from '../types/plan';
import { DefaultPlanner, advancePlan, currentStage, isPlanCompleted } from './plan';
import { ExecutorState, StateTracker, isTerminal } from './state-machine';
import { clearSessionPlan, loadSessionPlan, saveSessionPlan, stashQuery, stashedQuery } from './session';

export interface ExecutorOptions {
  /** Max stages entered in one request (default: 100) */
  maxStagesPerRequest?: number;
  /** Redirect target on completion when the query carries no `next` (default: '/') */
  defaultRedirect?: string;
  /** Planner used for fresh plans (default: DefaultPlanner) */
  planner?: FlowPlanner;
}

/**
 * One incoming request, as the executor sees it.
 */
export interface FlowRequest {
  flowSlug: string;
  query: Record<string, string>;
  session: SessionStorage;
  /** Scheme + host, used for links stages send out of band */
  baseUrl: string;
  locale?: string;
}

export interface FlowResponse {
  /** State the request ended in */
  state: ExecutorState;
  /** Every state visited during the request, in order */
  transitions: ExecutorState[];
  flowSlug: string;
  planId: string;
  /** Active stage, when a challenge is pending */
  stageId?: string;
  challenge?: Challenge;
  /** Flash messages left by stages */
  messages: FlowMessage[];
  /** Errors of a rejected response */
  errors?: ResponseError[];
  /** Set on completion */
  redirect?: string;
}

export interface CancelResult {
  flowSlug: string;
  /** Whether a live plan was dropped */
  cancelled: boolean;
  planId?: string;
}

interface Run {
  readonly flow: Flow;
  readonly plan: FlowPlan;
  readonly request: FlowRequest;
  readonly tracker: StateTracker;
  readonly messages: FlowMessage[];
}

/** Client component shown when a flow is aborted by a stage. */
export const ACCESS_DENIED_COMPONENT = 'access-denied';

/**
 * Drives a flow plan across request/response cycles.
 * Stateless: the live plan travels in the session and is committed once per request.
 */
export class FlowExecutor {
  private readonly _flows: FlowRegistry;
  private readonly _stages: StageRegistry;
  private readonly services: StageServices;
  private readonly events?: EventBus;
  private readonly planner: FlowPlanner;
  private readonly opts: Required<Omit<ExecutorOptions, 'planner'>>;

  constructor(
    flows: FlowRegistry,
    stages: StageRegistry,
    services: StageServices,
    events?: EventBus,
    options?: ExecutorOptions
  ) {
    this._flows = flows;
    this._stages = stages;
    this.services = services;
    this.events = events;
    this.planner = options?.planner ?? new DefaultPlanner();
    this.opts = {
      maxStagesPerRequest: options?.maxStagesPerRequest ?? 100,
      defaultRedirect: options?.defaultRedirect ?? '/',
    };
  }

  get flows(): FlowRegistry {
    return this._flows;
  }

  get stages(): StageRegistry {
    return this._stages;
  }

  /**
   * Plan the flow afresh with `context`, replacing any live plan, and enter it.
   */
  start(request: FlowRequest, context: PlanContext = {}): Promise<FlowResponse> {
    const scope: { planId?: string } = {};
    return this.guard(request, scope, async () => {
      const flow = this.requireFlow(request.flowSlug);
      const plan = this.createPlan(flow, request, context);
      scope.planId = plan.id;
      return this.enter(this.begin(flow, plan, request, ExecutorState.AwaitingChallenge));
    });
  }

  /**
   * Entry point for GET: restore from a token key in the query, or continue
   * the session plan, or plan the flow afresh.
   */
  get(request: FlowRequest): Promise<FlowResponse> {
    const scope: { planId?: string } = {};
    return this.guard(request, scope, async () => {
      const flow = this.requireFlow(request.flowSlug);

      const restored = await this.restore(flow, request);
      if (restored) {
        scope.planId = restored.id;
        return this.enter(this.begin(flow, restored, request, ExecutorState.Restored));
      }

      const plan = this.sessionPlan(flow, request.session) ?? this.createPlan(flow, request, {});
      scope.planId = plan.id;
      return this.enter(this.begin(flow, plan, request, ExecutorState.AwaitingChallenge));
    });
  }

  /**
   * Submit a response to the active stage.
   * Without a live plan for this flow the body is ignored and the flow is entered as on GET.
   */
  submit(request: FlowRequest, body: Record<string, unknown>): Promise<FlowResponse> {
    const scope: { planId?: string } = {};
    return this.guard(request, scope, async () => {
      const flow = this.requireFlow(request.flowSlug);

      const existing = this.sessionPlan(flow, request.session);
      if (!existing) {
        const plan = this.createPlan(flow, request, {});
        scope.planId = plan.id;
        return this.enter(this.begin(flow, plan, request, ExecutorState.AwaitingChallenge));
      }

      scope.planId = existing.id;
      const run = this.begin(flow, existing, request, ExecutorState.AwaitingResponse);
      const stage = this.requireCurrent(run);
      const handler = this.requireHandler(stage);
      const ctx = this.stageContext(run, stage);

      const validation = handler.validate(ctx, body);
      let result: StageResult;
      if (validation.valid) {
        result = await handler.onValid(ctx, validation.data);
      } else if (handler.onInvalid) {
        result = await handler.onInvalid(ctx, validation.errors);
      } else {
        result = StageResult.rejected(validation.errors);
      }

      // A bare re-prompt after a response counts as a rejection without errors
      if (result.outcome === 'challenge') {
        result = StageResult.rejected([]);
      }

      const response = await this.apply(run, stage, handler, result);
      return response ?? this.enter(run);
    });
  }

  /**
   * Drop the live plan, if any.
   */
  async cancel(request: FlowRequest): Promise<CancelResult> {
    const plan = loadSessionPlan(request.session);
    clearSessionPlan(request.session);

    if (!plan) {
      return { flowSlug: request.flowSlug, cancelled: false };
    }

    this.events?.onFlowCancelled?.({ planId: plan.id, flowSlug: plan.flowSlug, reason: 'user' });
    return { flowSlug: plan.flowSlug, cancelled: true, planId: plan.id };
  }

  // ── Stage loop ────────────────────────────────────────────────────

  /**
   * Enter stages from the cursor on until one needs a response or the plan finishes.
   */
  private async enter(run: Run): Promise<FlowResponse> {
    for (let entered = 0; entered < this.opts.maxStagesPerRequest; entered++) {
      if (run.tracker.current === ExecutorState.StageOk) {
        run.tracker.transition(ExecutorState.AwaitingChallenge);
      }

      const stage = this.requireCurrent(run);
      const handler = this.requireHandler(stage);
      this.events?.onStageEntered?.({ planId: run.plan.id, stageId: stage.id, kind: stage.kind });

      const result = handler.enter ? await handler.enter(this.stageContext(run, stage)) : undefined;

      if (!result || result.outcome === 'challenge') {
        if (run.tracker.current === ExecutorState.Restored) {
          run.tracker.transition(ExecutorState.AwaitingChallenge);
        }
        run.tracker.transition(ExecutorState.AwaitingResponse);
        return this.prompt(run, stage, handler);
      }

      const response = await this.apply(run, stage, handler, result);
      if (response) return response;
    }

    throw new FlowGateError(
      'STAGE_LIMIT_EXCEEDED',
      `Flow "${run.flow.slug}" entered more than ${this.opts.maxStagesPerRequest} stages in one request`
    );
  }

  /**
   * Act on a stage result. Returns the response, or undefined when the next stage should be entered.
   */
  private async apply(
    run: Run,
    stage: StageBinding,
    handler: StageHandler,
    result: StageResult
  ): Promise<FlowResponse | undefined> {
    const { plan, tracker } = run;

    switch (result.outcome) {
      case 'ok': {
        tracker.transition(ExecutorState.StageOk);
        this.events?.onStageOk?.({ planId: plan.id, stageId: stage.id });
        advancePlan(plan);
        if (isPlanCompleted(plan)) {
          tracker.transition(ExecutorState.Completed);
          return this.complete(run);
        }
        return undefined;
      }

      case 'challenge': {
        tracker.transition(ExecutorState.AwaitingResponse);
        return this.prompt(run, stage, handler);
      }

      case 'invalid': {
        tracker.transition(ExecutorState.StageInvalid);

        if (result.reason === 'validation-rejected') {
          this.events?.onStageInvalid?.({
            planId: plan.id,
            stageId: stage.id,
            reason: result.reason,
            code: result.errors[0]?.code ?? 'invalid',
          });
          tracker.transition(ExecutorState.AwaitingResponse);
          return this.prompt(run, stage, handler, result.errors);
        }

        this.events?.onStageInvalid?.({ planId: plan.id, stageId: stage.id, reason: result.reason, code: result.code });
        tracker.transition(ExecutorState.Cancelled);
        return this.abort(run, stage, result.code, result.message);
      }
    }
  }

  private prompt(run: Run, stage: StageBinding, handler: StageHandler, errors?: ResponseError[]): FlowResponse {
    const challenge: Challenge = {
      ...handler.challenge(this.stageContext(run, stage)),
      flowInfo: { slug: run.flow.slug, title: run.flow.title },
      ...(errors ? { responseErrors: errors } : {}),
    };
    this.commit(run);
    return {
      ...this.baseResponse(run),
      stageId: stage.id,
      challenge,
      ...(errors ? { errors } : {}),
    };
  }

  private complete(run: Run): FlowResponse {
    const redirect = this.redirectTarget(run.request);
    this.commit(run);
    this.events?.onFlowCompleted?.({ planId: run.plan.id, flowSlug: run.flow.slug });
    return {
      ...this.baseResponse(run),
      challenge: { type: 'redirect', component: 'redirect', to: redirect },
      redirect,
    };
  }

  private abort(run: Run, stage: StageBinding, code: string, message: string): FlowResponse {
    this.commit(run);
    this.events?.onFlowCancelled?.({ planId: run.plan.id, flowSlug: run.flow.slug, reason: code });
    return {
      ...this.baseResponse(run),
      stageId: stage.id,
      challenge: {
        type: 'native',
        component: ACCESS_DENIED_COMPONENT,
        errorMessage: message,
        flowInfo: { slug: run.flow.slug, title: run.flow.title },
      },
    };
  }

  // ── Plans and session ─────────────────────────────────────────────

  private async restore(flow: Flow, request: FlowRequest): Promise<FlowPlan | undefined> {
    const key = request.query[QS_KEY_TOKEN];
    if (!key) return undefined;

    const result = await this.services.tokens.redeem(key);
    if (result.status !== 'redeemed') return undefined;

    const { plan, token } = result;
    if (plan.flowSlug !== flow.slug || isPlanCompleted(plan)) return undefined;

    plan.context[PLAN_CONTEXT_IS_RESTORED] = token.identifier;
    stashQuery(request.session, request.query);
    this.events?.onPlanRestored?.({ planId: plan.id, flowSlug: flow.slug, identifier: token.identifier });
    return plan;
  }

  private sessionPlan(flow: Flow, session: SessionStorage): FlowPlan | undefined {
    const plan = loadSessionPlan(session);
    if (!plan) return undefined;
    if (plan.flowSlug !== flow.slug || isPlanCompleted(plan)) {
      clearSessionPlan(session);
      return undefined;
    }
    return plan;
  }

  private createPlan(flow: Flow, request: FlowRequest, context: PlanContext): FlowPlan {
    const plan = this.planner.plan(flow, context);
    stashQuery(request.session, request.query);
    this.events?.onPlanCreated?.({ planId: plan.id, flowSlug: flow.slug, stageCount: plan.stages.length });
    return plan;
  }

  /** Write the plan back once per request, or drop it when the flow ended. */
  private commit(run: Run): void {
    if (isTerminal(run.tracker.current)) {
      clearSessionPlan(run.request.session);
    } else {
      saveSessionPlan(run.request.session, run.plan);
    }
  }

  private redirectTarget(request: FlowRequest): string {
    const next = stashedQuery(request.session).next ?? request.query.next;
    // Only same-site paths
    if (next && next.startsWith('/') && !next.startsWith('//')) return next;
    return this.opts.defaultRedirect;
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private begin(flow: Flow, plan: FlowPlan, request: FlowRequest, initial: ExecutorState): Run {
    return { flow, plan, request, tracker: new StateTracker(initial), messages: [] };
  }

  private baseResponse(run: Run): FlowResponse {
    return {
      state: run.tracker.current,
      transitions: [...run.tracker.visited],
      flowSlug: run.flow.slug,
      planId: run.plan.id,
      messages: run.messages,
    };
  }

  private stageContext(run: Run, stage: StageBinding): StageContext {
    const { request } = run;
    return {
      flow: run.flow,
      plan: run.plan,
      stage,
      request: { query: request.query, session: request.session, baseUrl: request.baseUrl, locale: request.locale },
      services: this.services,
      messages: { add: (level, text) => { run.messages.push({ level, text }); } },
    };
  }

  private requireFlow(slug: string): Flow {
    const flow = this._flows.get(slug);
    if (!flow) throw new FlowNotFoundError(slug);
    return flow;
  }

  private requireCurrent(run: Run): StageBinding {
    const stage = currentStage(run.plan);
    if (!stage) {
      throw new FlowGateError('PLAN_COMPLETED', `Plan ${run.plan.id} has no active stage`);
    }
    return stage;
  }

  private requireHandler(stage: StageBinding): StageHandler {
    const handler = this._stages.get(stage.kind);
    if (!handler) throw new StageNotFoundError(stage.kind);
    return handler;
  }

  /**
   * Faults abort the flow: the live plan is dropped and the error propagates.
   */
  private async guard(
    request: FlowRequest,
    scope: { planId?: string },
    fn: () => Promise<FlowResponse>
  ): Promise<FlowResponse> {
    try {
      return await fn();
    } catch (err) {
      clearSessionPlan(request.session);
      this.events?.onFlowFailed?.({
        flowSlug: request.flowSlug,
        planId: scope.planId,
        error: {
          code: err instanceof FlowGateError ? err.code : 'STAGE_FAULT',
          message: err instanceof Error ? err.message : String(err),
        },
      });
      throw err;
    }
  }
}
