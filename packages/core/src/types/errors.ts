/**
 * Base error for all FlowGate errors.
 */
export class FlowGateError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FlowGateError';
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
  readonly severity: 'error' | 'warning';
}

/**
 * Flow definition is invalid.
 */
export class FlowValidationError extends FlowGateError {
  constructor(
    public readonly flowSlug: string,
    public readonly issues: ValidationIssue[]
  ) {
    super('FLOW_INVALID', `Flow "${flowSlug}" is invalid: ${(issues.find(i => i.severity === 'error') ?? issues[0])?.message}`);
    this.name = 'FlowValidationError';
  }
}

/**
 * No flow registered under the requested slug.
 */
export class FlowNotFoundError extends FlowGateError {
  constructor(public readonly flowSlug: string) {
    super('FLOW_NOT_FOUND', `Flow "${flowSlug}" not found`);
    this.name = 'FlowNotFoundError';
  }
}

/**
 * A plan references a stage kind nobody registered.
 */
export class StageNotFoundError extends FlowGateError {
  constructor(public readonly kind: string) {
    super('STAGE_NOT_FOUND', `No stage registered for kind "${kind}"`);
    this.name = 'StageNotFoundError';
  }
}

/**
 * Executor attempted a state change the state machine does not allow.
 */
export class InvalidTransitionError extends FlowGateError {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super('INVALID_TRANSITION', `Cannot transition from "${from}" to "${to}"`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Serialized plan could not be decoded.
 */
export class PlanSnapshotError extends FlowGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PLAN_SNAPSHOT_INVALID', message, options);
    this.name = 'PlanSnapshotError';
  }
}

/**
 * Persistence layer failed. Always fatal to the enclosing request.
 */
export class StorageFaultError extends FlowGateError {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(
      'STORAGE_FAULT',
      `Token storage failed during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'StorageFaultError';
  }
}
