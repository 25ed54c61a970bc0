import type { StageHandler, StageMetadata } from '../interfaces/stage-handler';
import type { StageRegistry } from '../interfaces/stage-registry';

export class DefaultStageRegistry implements StageRegistry {
  private entries = new Map<string, StageHandler>();

  register(stage: StageHandler): void {
    if (this.entries.has(stage.kind)) {
      throw new Error(`Stage "${stage.kind}" already registered`);
    }
    this.entries.set(stage.kind, stage);
  }

  registerAll(stages: StageHandler[]): void {
    stages.forEach(s => this.register(s));
  }

  get(kind: string): StageHandler | undefined {
    return this.entries.get(kind);
  }

  has(kind: string): boolean {
    return this.entries.has(kind);
  }

  kinds(): string[] {
    return [...this.entries.keys()];
  }

  unregister(kind: string): boolean {
    return this.entries.delete(kind);
  }

  getMetadata(kind: string): StageMetadata | undefined {
    return this.entries.get(kind)?.metadata;
  }

  getAllMetadata(): StageMetadata[] {
    return Array.from(this.entries.values()).map(s => s.metadata);
  }
}
