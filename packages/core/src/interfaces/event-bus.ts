import type { InvalidReason } from '../types/result';
import type { RedeemStatus } from '../types/token';

/**
 * Optional event publishing.
 * Every lifecycle transition of plans and tokens emits an event.
 * All methods are optional; subscribe only to what you need.
 * Token keys are secrets and never appear in payloads.
 */
export interface EventBus {
  // ── Registries ────────────────────────────────────────────────────
  onFlowRegistered?(e: { flowSlug: string; stageCount: number }): void;
  onStageRegistered?(e: { kind: string; name: string }): void;

  // ── Plan Lifecycle ────────────────────────────────────────────────
  onPlanCreated?(e: { planId: string; flowSlug: string; stageCount: number }): void;

  /**
   * Emitted when a plan is rebuilt from a redeemed token.
   */
  onPlanRestored?(e: { planId: string; flowSlug: string; identifier: string }): void;

  onFlowCompleted?(e: { planId: string; flowSlug: string }): void;

  /**
   * Emitted when a flow is aborted, by a stage or by the subject.
   */
  onFlowCancelled?(e: { planId: string; flowSlug: string; reason: string }): void;

  /**
   * Emitted when a fault aborts a flow mid-request.
   */
  onFlowFailed?(e: { flowSlug: string; planId?: string; error: { code: string; message: string } }): void;

  // ── Stage Lifecycle ───────────────────────────────────────────────
  onStageEntered?(e: { planId: string; stageId: string; kind: string }): void;
  onStageOk?(e: { planId: string; stageId: string }): void;
  onStageInvalid?(e: { planId: string; stageId: string; reason: InvalidReason; code: string }): void;

  // ── Tokens ────────────────────────────────────────────────────────
  onTokenCreated?(e: { identifier: string; userId: string; expiresAt: number }): void;

  /**
   * Emitted when an expired or used token gets a fresh key.
   */
  onTokenRotated?(e: { identifier: string; userId: string; expiresAt: number }): void;

  onTokenRedeemed?(e: { identifier: string; userId: string }): void;

  /**
   * Emitted when redemption fails for any reason.
   */
  onTokenRejected?(e: { status: Exclude<RedeemStatus, 'redeemed'>; identifier?: string }): void;

  onTokensPurged?(e: { count: number }): void;

  // ── Notifications ─────────────────────────────────────────────────
  onNotificationSent?(e: { planId: string; stageId: string; template: string; recipients: number }): void;
}
