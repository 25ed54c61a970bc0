import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { FlowGateError, type JSONSchema, type ValidationIssue } from '@flowgate/core';

/** Shared instance; `useDefaults` fills in optional config fields. */
export const ajv = new Ajv({ allErrors: true, useDefaults: true });
addFormats(ajv);

export interface StageConfigReader<T> {
  /** Problems with `config`, for flow registration */
  issues(config: Record<string, unknown>): ValidationIssue[];
  /** `config` with defaults applied; throws if it does not validate */
  read(kind: string, config: Record<string, unknown>): T;
}

/**
 * Compile a stage's config schema once and read bindings against it.
 */
export function configReader<T>(schema: JSONSchema): StageConfigReader<T> {
  const validate = ajv.compile<T>(schema);

  return {
    issues(config) {
      return validate(structuredClone(config)) ? [] : toIssues(validate.errors);
    },

    read(kind, config) {
      const copy = structuredClone(config);
      if (!validate(copy)) {
        const first = toIssues(validate.errors)[0];
        throw new FlowGateError(
          'STAGE_CONFIG_INVALID',
          `Invalid ${kind} stage config${first ? ` at "${first.path}": ${first.message}` : ''}`
        );
      }
      return copy;
    },
  };
}

function toIssues(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors ?? []).map(err => {
    const path = err.keyword === 'required'
      ? String(err.params.missingProperty)
      : err.instancePath.replace(/^\//, '').replace(/\//g, '.');
    return { path, message: err.message ?? 'Invalid', severity: 'error' };
  });
}
