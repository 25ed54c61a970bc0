/**
 * Field-level error attached to a rejected response.
 */
export interface ResponseError {
  readonly code: string;
  readonly message: string;
  /** Body field the error belongs to; omitted for errors about the response as a whole */
  readonly field?: string;
}

/**
 * Why a stage reported itself invalid.
 * - `precondition-missing`: plan context lacks something the stage needs. Aborts the flow.
 * - `validation-rejected`: the response was rejected. Re-prompts.
 */
export type InvalidReason = 'precondition-missing' | 'validation-rejected';

/**
 * Result returned by a stage.
 * This is the ONLY way stages communicate with the executor.
 */
export type StageResult =
  | { readonly outcome: 'ok' }
  | { readonly outcome: 'challenge' }
  | {
      readonly outcome: 'invalid';
      readonly reason: 'precondition-missing';
      readonly code: string;
      readonly message: string;
    }
  | {
      readonly outcome: 'invalid';
      readonly reason: 'validation-rejected';
      readonly errors: ResponseError[];
    };

/**
 * Helper functions for creating results.
 */
export const StageResult = {
  ok(): StageResult {
    return { outcome: 'ok' };
  },

  challenge(): StageResult {
    return { outcome: 'challenge' };
  },

  rejected(errors: ResponseError[]): StageResult {
    return { outcome: 'invalid', reason: 'validation-rejected', errors };
  },

  preconditionMissing(code: string, message: string): StageResult {
    return { outcome: 'invalid', reason: 'precondition-missing', code, message };
  },
} as const;

/**
 * Outcome of validating a submitted response.
 */
export type ResponseValidation<T = Record<string, unknown>> =
  | { readonly valid: true; readonly data: T }
  | { readonly valid: false; readonly errors: ResponseError[] };
