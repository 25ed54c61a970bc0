import type { StageHandler, StageMetadata } from './stage-handler';

/**
 * Registry of stage implementations, keyed by kind.
 */
export interface StageRegistry {
  /** Register a stage; throws if the kind is taken */
  register(stage: StageHandler): void;

  registerAll(stages: StageHandler[]): void;

  get(kind: string): StageHandler | undefined;

  has(kind: string): boolean;

  /** List all registered kinds */
  kinds(): string[];

  unregister(kind: string): boolean;

  getMetadata(kind: string): StageMetadata | undefined;

  getAllMetadata(): StageMetadata[];
}
