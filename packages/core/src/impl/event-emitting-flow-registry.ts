/**
 * EventEmittingFlowRegistry: decorator that wraps any FlowRegistry
 * and emits an event for each registered flow.
 */

import type { Flow } from '../types/flow';
import type { ValidationIssue } from '../types/errors';
import type { FlowRegistry } from '../interfaces/flow-registry';
import type { EventBus } from '../interfaces/event-bus';

export class EventEmittingFlowRegistry implements FlowRegistry {
  constructor(
    private readonly inner: FlowRegistry,
    private readonly events: EventBus
  ) {}

  register(flow: Flow): void {
    this.inner.register(flow);
    this.events.onFlowRegistered?.({ flowSlug: flow.slug, stageCount: flow.stages.length });
  }

  get(slug: string): Flow | undefined {
    return this.inner.get(slug);
  }

  has(slug: string): boolean {
    return this.inner.has(slug);
  }

  slugs(): string[] {
    return this.inner.slugs();
  }

  validate(flow: Flow): ValidationIssue[] {
    return this.inner.validate(flow);
  }
}
