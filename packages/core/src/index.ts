// Types
export type { Flow, FlowDesignation, StageBinding } from './types/flow';
export type { FlowPlan, PlanContext, PlanCursor } from './types/plan';
export {
  PLAN_COMPLETED,
  PLAN_CONTEXT_PENDING_USER,
  PLAN_CONTEXT_IS_RESTORED,
  PLAN_CONTEXT_EMAIL_SENT,
  PLAN_CONTEXT_EMAIL_OVERRIDE,
  QS_KEY_TOKEN,
  SESSION_KEY_PLAN,
  SESSION_KEY_GET,
} from './types/plan';
export type { FlowToken, NewFlowToken, TokenRotation, RedeemResult, RedeemStatus } from './types/token';
export type { ResponseError, InvalidReason, ResponseValidation } from './types/result';
export { StageResult } from './types/result';
export type { Challenge, ChallengeType, ChallengeField, FlowMessage } from './types/challenge';
export {
  FlowGateError,
  FlowValidationError,
  FlowNotFoundError,
  StageNotFoundError,
  InvalidTransitionError,
  PlanSnapshotError,
  StorageFaultError,
} from './types/errors';
export type { ValidationIssue } from './types/errors';

// Interfaces
export type {
  StageHandler,
  StageMetadata,
  StageContext,
  StageRequest,
  StageServices,
  MessageSink,
  JSONSchema,
} from './interfaces/stage-handler';
export type { StageRegistry } from './interfaces/stage-registry';
export type { FlowRegistry } from './interfaces/flow-registry';
export type { FlowPlanner } from './interfaces/planner';
export type { FlowTokenStore } from './interfaces/token-store';
export type { SessionStorage } from './interfaces/session-storage';
export type { FlowUser, UserLookupField, UserStore } from './interfaces/user-store';
export type { NotificationDispatcher, NotificationMessage } from './interfaces/notification-dispatcher';
export type { FlowUrlBuilder } from './interfaces/url-builder';
export type { EventBus } from './interfaces/event-bus';

// Engine
export {
  FlowExecutor,
  ACCESS_DENIED_COMPONENT,
  type ExecutorOptions,
  type FlowRequest,
  type FlowResponse,
  type CancelResult,
} from './engine/flow-executor';
export { ExecutorState, StateTracker, canTransition, isTerminal } from './engine/state-machine';
export { FlowTokenService, type FlowTokenServiceOptions, type IssueTokenInput } from './engine/token-service';
export { createPlan, currentStage, advancePlan, insertStageAfterCurrent, isPlanCompleted, DefaultPlanner } from './engine/plan';
export { serializePlan, deserializePlan, PLAN_SNAPSHOT_VERSION } from './engine/plan-codec';
export { loadSessionPlan, saveSessionPlan, clearSessionPlan, stashedQuery, stashQuery } from './engine/session';

// Implementations
export { MemoryFlowTokenStore } from './impl/memory-token-store';
export { MemorySessionStorage } from './impl/memory-session';
export { MemoryUserStore } from './impl/memory-user-store';
export { MemoryNotificationDispatcher, type SentNotification } from './impl/memory-notifications';
export { DefaultFlowUrlBuilder, type FlowUrlBuilderOptions } from './impl/url-builder';
export { DefaultStageRegistry } from './impl/stage-registry';
export { DefaultFlowRegistry } from './impl/flow-registry';
export { EventEmittingFlowRegistry } from './impl/event-emitting-flow-registry';
export { EventEmittingStageRegistry } from './impl/event-emitting-stage-registry';

// Event Dispatcher
export {
  EventDispatcher,
  type EventDispatcherOptions,
  type EventType,
  type DispatchedEvent,
  type EventListener,
} from './impl/event-dispatcher';

// Utils
export { generateId, generateKey, now } from './utils';
export { validateFlow } from './utils/validation';
