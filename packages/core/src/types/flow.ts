/**
 * What a flow is for. Informational; the executor treats all designations alike.
 */
export type FlowDesignation =
  | 'authentication'
  | 'enrollment'
  | 'recovery'
  | 'invalidation'
  | 'stage-configuration';

/**
 * A Flow is a named, ordered sequence of stages.
 */
export interface Flow {
  /** Unique identifier (kebab-case), used in URLs */
  readonly slug: string;

  /** Human-readable name */
  readonly name?: string;

  /** Title shown on challenges */
  readonly title?: string;

  readonly designation?: FlowDesignation;

  /** Stages in execution order */
  readonly stages: StageBinding[];
}

/**
 * A stage as placed in a flow: which implementation runs, and with what config.
 */
export interface StageBinding {
  /** Unique within the flow */
  readonly id: string;

  /** Stage kind (e.g. "email", "identification"); selects the implementation */
  readonly kind: string;

  /** Display name; also feeds token identifiers */
  readonly name: string;

  /** Kind-specific config (opaque to core) */
  readonly config: Record<string, unknown>;
}
