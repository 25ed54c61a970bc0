import type { Flow, StageBinding } from '../types/flow';
import type { FlowPlan } from '../types/plan';
import type { Challenge, FlowMessage } from '../types/challenge';
import type { ResponseError, ResponseValidation, StageResult } from '../types/result';
import type { ValidationIssue } from '../types/errors';
import type { SessionStorage } from './session-storage';
import type { UserStore } from './user-store';
import type { NotificationDispatcher } from './notification-dispatcher';
import type { FlowUrlBuilder } from './url-builder';
import type { EventBus } from './event-bus';
import type { FlowTokenService } from '../engine/token-service';

/**
 * Minimal JSON Schema subset used for stage metadata.
 */
export type JSONSchema = {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null';
  properties?: Record<string, JSONSchema>;
  required?: string[];
  items?: JSONSchema;
  enum?: unknown[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  format?: string;
  description?: string;
  default?: unknown;
  additionalProperties?: boolean | JSONSchema;
  [key: string]: unknown;
};

export interface StageMetadata {
  kind: string;
  name: string;
  description?: string;
  configSchema: JSONSchema;
}

/**
 * The slice of the incoming request a stage may look at.
 */
export interface StageRequest {
  /** Query parameters of the current request */
  readonly query: Record<string, string>;
  readonly session: SessionStorage;
  /** Scheme + host the request arrived on, for absolute URLs */
  readonly baseUrl: string;
  /** Locale negotiated for the request */
  readonly locale?: string;
}

/**
 * Collaborators handed to every stage.
 */
export interface StageServices {
  readonly tokens: FlowTokenService;
  readonly users: UserStore;
  readonly notifications: NotificationDispatcher;
  readonly urls: FlowUrlBuilder;
  readonly events?: EventBus;
}

export interface MessageSink {
  add(level: FlowMessage['level'], text: string): void;
}

/**
 * Everything a stage operation receives. Stages mutate `plan.context` and nothing else.
 */
export interface StageContext {
  readonly flow: Flow;
  readonly plan: FlowPlan;
  readonly stage: StageBinding;
  readonly request: StageRequest;
  readonly services: StageServices;
  readonly messages: MessageSink;
}

/**
 * A stage implementation, registered by kind.
 */
export interface StageHandler {
  readonly kind: string;
  readonly metadata: StageMetadata;

  /** Report config problems at flow registration */
  validateConfig?(config: Record<string, unknown>): ValidationIssue[];

  /**
   * Called when the stage is entered without a response (GET).
   * Return a result to short-circuit, or undefined to render the challenge.
   */
  enter?(ctx: StageContext): Promise<StageResult | undefined>;

  /** Build the prompt. Must not mutate state. */
  challenge(ctx: StageContext): Challenge;

  validate(ctx: StageContext, body: Record<string, unknown>): ResponseValidation;

  onValid(ctx: StageContext, data: Record<string, unknown>): Promise<StageResult>;

  /** Defaults to re-prompting with the errors */
  onInvalid?(ctx: StageContext, errors: ResponseError[]): Promise<StageResult>;
}
