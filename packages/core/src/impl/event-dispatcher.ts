/**
 * EventDispatcher: event bus with multi-listener support,
 * async dispatch, listener isolation, and automatic timestamping.
 *
 * Implements the EventBus interface so it drops into the executor, the token
 * service and the event-emitting registries.
 *
 * - Multiple listeners per event type via `.on(type, listener)`
 * - Wildcard `'*'` listener receives every event
 * - Async dispatch (queueMicrotask) by default; sync mode for tests
 * - try/catch per listener
 * - Every dispatched event has `type` and `timestamp` fields
 *
 * Usage:
 * ```typescript
 * const dispatcher = new EventDispatcher();
 *
 * const unsub = dispatcher.on('token.rejected', (e) => {
 *   metrics.increment(`flow_token_${e.status}`);
 * });
 *
 * dispatcher.on('*', (e) => auditLog.append(e));
 *
 * const executor = new FlowExecutor(flows, stages, services, dispatcher);
 * unsub();
 * ```
 */

import type { EventBus } from '../interfaces/event-bus';
import { now } from '../utils';

// ── Event Types ─────────────────────────────────────────────────

/** All event type strings emitted by the system. */
export type EventType =
  // Registries
  | 'flow.registered'
  | 'stage.registered'
  // Plan lifecycle
  | 'plan.created'
  | 'plan.restored'
  | 'flow.completed'
  | 'flow.cancelled'
  | 'flow.failed'
  // Stage lifecycle
  | 'stage.entered'
  | 'stage.ok'
  | 'stage.invalid'
  // Tokens
  | 'token.created'
  | 'token.rotated'
  | 'token.redeemed'
  | 'token.rejected'
  | 'tokens.purged'
  // Notifications
  | 'notification.sent';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/** Listener callback signature. */
export type EventListener = (event: DispatchedEvent) => void;

type Payload<K extends keyof EventBus> = Parameters<NonNullable<EventBus[K]>>[0];

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default): listeners fire on next microtask via queueMicrotask.
   * - `'sync'`: listeners fire inline. Use for testing or when you need
   *   to assert events immediately after an operation.
   */
  mode?: 'sync' | 'async';

  /**
   * Called when a listener throws. Defaults to logging with console.error.
   */
  onError?: (error: unknown, event: DispatchedEvent) => void;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements EventBus {
  private readonly _listeners = new Map<string, Set<EventListener>>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError: (error: unknown, event: DispatchedEvent) => void;

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._onError = options.onError ?? ((error, event) => {
      console.error(`[EventDispatcher] Listener for "${event.type}" threw:`, error);
    });
  }

  // ── EventBus ────────────────────────────────────────────────────

  onFlowRegistered(e: Payload<'onFlowRegistered'>): void { this._dispatch('flow.registered', e); }
  onStageRegistered(e: Payload<'onStageRegistered'>): void { this._dispatch('stage.registered', e); }

  onPlanCreated(e: Payload<'onPlanCreated'>): void { this._dispatch('plan.created', e); }
  onPlanRestored(e: Payload<'onPlanRestored'>): void { this._dispatch('plan.restored', e); }
  onFlowCompleted(e: Payload<'onFlowCompleted'>): void { this._dispatch('flow.completed', e); }
  onFlowCancelled(e: Payload<'onFlowCancelled'>): void { this._dispatch('flow.cancelled', e); }
  onFlowFailed(e: Payload<'onFlowFailed'>): void { this._dispatch('flow.failed', e); }

  onStageEntered(e: Payload<'onStageEntered'>): void { this._dispatch('stage.entered', e); }
  onStageOk(e: Payload<'onStageOk'>): void { this._dispatch('stage.ok', e); }
  onStageInvalid(e: Payload<'onStageInvalid'>): void { this._dispatch('stage.invalid', e); }

  onTokenCreated(e: Payload<'onTokenCreated'>): void { this._dispatch('token.created', e); }
  onTokenRotated(e: Payload<'onTokenRotated'>): void { this._dispatch('token.rotated', e); }
  onTokenRedeemed(e: Payload<'onTokenRedeemed'>): void { this._dispatch('token.redeemed', e); }
  onTokenRejected(e: Payload<'onTokenRejected'>): void { this._dispatch('token.rejected', e); }
  onTokensPurged(e: Payload<'onTokensPurged'>): void { this._dispatch('tokens.purged', e); }

  onNotificationSent(e: Payload<'onNotificationSent'>): void { this._dispatch('notification.sent', e); }

  // ── Public API ──────────────────────────────────────────────────

  /**
   * Subscribe to an event type. Use `'*'` to receive all events.
   * Returns an unsubscribe function.
   */
  on(type: EventType | '*', listener: EventListener): () => void {
    let set = this._listeners.get(type);
    if (!set) {
      set = new Set();
      this._listeners.set(type, set);
    }
    const listeners = set;
    listeners.add(listener);
    return () => { listeners.delete(listener); };
  }

  off(type: EventType | '*', listener: EventListener): void {
    this._listeners.get(type)?.delete(listener);
  }

  /**
   * Remove all listeners for a type, or all listeners if no type specified.
   */
  removeAll(type?: EventType | '*'): void {
    if (type) {
      this._listeners.delete(type);
    } else {
      this._listeners.clear();
    }
  }

  listenerCount(type?: EventType | '*'): number {
    if (type) {
      return this._listeners.get(type)?.size ?? 0;
    }
    let total = 0;
    for (const set of this._listeners.values()) {
      total += set.size;
    }
    return total;
  }

  /**
   * Wait for pending async dispatches. Resolves immediately in sync mode.
   */
  async flush(): Promise<void> {
    await Promise.resolve();
    await Promise.resolve();
  }

  // ── Internal ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: object): void {
    const specific = this._listeners.get(type);
    const wildcard = this._listeners.get('*');

    if (!specific?.size && !wildcard?.size) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: now() });

    if (this._mode === 'sync') {
      this._callListeners(specific, event);
      this._callListeners(wildcard, event);
    } else {
      queueMicrotask(() => {
        this._callListeners(specific, event);
        this._callListeners(wildcard, event);
      });
    }
  }

  private _callListeners(listeners: Set<EventListener> | undefined, event: DispatchedEvent): void {
    if (!listeners) return;
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        this._onError(err, event);
      }
    }
  }
}
