import Ajv from 'ajv';
import type { FlowPlan } from '../types/plan';
import { PlanSnapshotError } from '../types/errors';

/** Bump when the snapshot layout changes; old snapshots stop decoding. */
export const PLAN_SNAPSHOT_VERSION = 1;

interface PlanSnapshot {
  version: number;
  plan: FlowPlan;
}

const stageSchema = {
  type: 'object',
  required: ['id', 'kind', 'name', 'config'],
  properties: {
    id: { type: 'string', minLength: 1 },
    kind: { type: 'string', minLength: 1 },
    name: { type: 'string' },
    config: { type: 'object' },
  },
  additionalProperties: false,
};

const snapshotSchema = {
  type: 'object',
  required: ['version', 'plan'],
  properties: {
    version: { type: 'integer' },
    plan: {
      type: 'object',
      required: ['id', 'flowSlug', 'stages', 'cursor', 'context', 'createdAt', 'updatedAt'],
      properties: {
        id: { type: 'string', minLength: 1 },
        flowSlug: { type: 'string', minLength: 1 },
        stages: { type: 'array', items: stageSchema },
        cursor: {
          oneOf: [
            { type: 'integer', minimum: 0 },
            { const: 'completed' },
          ],
        },
        context: { type: 'object' },
        createdAt: { type: 'number' },
        updatedAt: { type: 'number' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateSnapshot = ajv.compile<PlanSnapshot>(snapshotSchema);

/**
 * Name of the first value under `value` that would not survive a JSON round trip,
 * as `[path, kind]`, or undefined when all of it does.
 */
function findNonJson(value: unknown, path: string): [string, string] | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? undefined : [path, String(value)];
  if (typeof value !== 'object') return [path, typeof value];

  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      const found = findNonJson(value[i], `${path}[${i}]`);
      if (found) return found;
    }
    return undefined;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    return [path, value.constructor?.name ?? 'object'];
  }

  for (const [key, child] of Object.entries(value)) {
    const found = findNonJson(child, `${path}.${key}`);
    if (found) return found;
  }
  return undefined;
}

/**
 * Serialize a plan into a versioned JSON snapshot.
 * Context values that JSON cannot carry exactly are rejected, at any depth.
 */
export function serializePlan(plan: FlowPlan): string {
  for (const [key, value] of Object.entries(plan.context)) {
    const found = findNonJson(value, key);
    if (found) {
      throw new PlanSnapshotError(`Context value "${found[0]}" is not serializable (${found[1]})`);
    }
  }

  const snapshot: PlanSnapshot = { version: PLAN_SNAPSHOT_VERSION, plan };
  return JSON.stringify(snapshot);
}

/**
 * Decode a snapshot produced by `serializePlan`. Throws PlanSnapshotError on
 * malformed input, schema mismatch, or a version this build does not read.
 */
export function deserializePlan(data: string): FlowPlan {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new PlanSnapshotError('Plan snapshot is not valid JSON', { cause: err });
  }

  if (!validateSnapshot(parsed)) {
    const first = validateSnapshot.errors?.[0];
    throw new PlanSnapshotError(
      `Plan snapshot failed validation: ${first ? `${first.instancePath || '/'} ${first.message}` : 'unknown error'}`
    );
  }

  if (parsed.version !== PLAN_SNAPSHOT_VERSION) {
    throw new PlanSnapshotError(`Unsupported plan snapshot version ${parsed.version}`);
  }

  const { plan } = parsed;
  if (plan.cursor !== 'completed' && plan.cursor >= plan.stages.length) {
    throw new PlanSnapshotError(`Plan cursor ${plan.cursor} is out of range (${plan.stages.length} stages)`);
  }

  return plan;
}
