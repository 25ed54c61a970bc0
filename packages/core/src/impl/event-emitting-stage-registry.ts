/**
 * EventEmittingStageRegistry: decorator that wraps any StageRegistry
 * and emits an event for each registered stage.
 */

import type { StageHandler, StageMetadata } from '../interfaces/stage-handler';
import type { StageRegistry } from '../interfaces/stage-registry';
import type { EventBus } from '../interfaces/event-bus';

export class EventEmittingStageRegistry implements StageRegistry {
  constructor(
    private readonly inner: StageRegistry,
    private readonly events: EventBus
  ) {}

  register(stage: StageHandler): void {
    this.inner.register(stage);
    this.events.onStageRegistered?.({ kind: stage.kind, name: stage.metadata.name });
  }

  registerAll(stages: StageHandler[]): void {
    stages.forEach(s => this.register(s));
  }

  get(kind: string): StageHandler | undefined {
    return this.inner.get(kind);
  }

  has(kind: string): boolean {
    return this.inner.has(kind);
  }

  kinds(): string[] {
    return this.inner.kinds();
  }

  unregister(kind: string): boolean {
    return this.inner.unregister(kind);
  }

  getMetadata(kind: string): StageMetadata | undefined {
    return this.inner.getMetadata(kind);
  }

  getAllMetadata(): StageMetadata[] {
    return this.inner.getAllMetadata();
  }
}
