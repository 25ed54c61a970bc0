import {
  StageResult,
  PLAN_CONTEXT_PENDING_USER,
  type JSONSchema,
  type ResponseError,
  type StageHandler,
  type UserLookupField,
} from '@flowgate/core';
import { ajv, configReader } from './config';

export type IdentificationStageConfig = {
  /** Which user fields `uid` is matched against (default: both) */
  userFields: UserLookupField[];
};

const configSchema: JSONSchema = {
  type: 'object',
  properties: {
    userFields: {
      type: 'array',
      items: { type: 'string', enum: ['username', 'email'] },
      minItems: 1,
      uniqueItems: true,
      default: ['username', 'email'],
    },
  },
  additionalProperties: false,
};

const config = configReader<IdentificationStageConfig>(configSchema);

const validateUid = ajv.compile<{ uid: string }>({
  type: 'object',
  required: ['uid'],
  properties: { uid: { type: 'string', minLength: 1, pattern: '\\S' } },
});

const validateEmailUid = ajv.compile<{ uid: string }>({
  type: 'object',
  required: ['uid'],
  properties: { uid: { type: 'string', format: 'email' } },
});

const FIELD_LABELS: Record<UserLookupField, string> = {
  username: 'Username',
  email: 'Email',
};

const FAILED: ResponseError = { code: 'invalid', message: 'Failed to authenticate.', field: 'uid' };

/**
 * Identification. Looks the subject up by username or email and sets the pending user.
 */
export const identificationStage: StageHandler = {
  kind: 'identification',

  metadata: {
    kind: 'identification',
    name: 'Identification',
    description: 'Ask for a username or email and set the pending user',
    configSchema,
  },

  validateConfig(cfg) {
    return config.issues(cfg);
  },

  challenge({ stage }) {
    const { userFields } = config.read('identification', stage.config);
    return {
      type: 'native',
      component: 'identification',
      title: 'Log in',
      fields: [{
        name: 'uid',
        label: userFields.map(f => FIELD_LABELS[f]).join(' or '),
        type: userFields.length === 1 && userFields[0] === 'email' ? 'email' : 'text',
        required: true,
      }],
    };
  },

  validate({ stage }, body) {
    const { userFields } = config.read('identification', stage.config);

    if (!validateUid(body)) {
      return { valid: false, errors: [{ code: 'required', message: 'This field is required.', field: 'uid' }] };
    }
    if (userFields.length === 1 && userFields[0] === 'email' && !validateEmailUid(body)) {
      return { valid: false, errors: [{ code: 'invalid', message: 'Enter a valid email address.', field: 'uid' }] };
    }
    return { valid: true, data: { uid: body.uid.trim() } };
  },

  async onValid({ plan, stage, services }, data) {
    const { userFields } = config.read('identification', stage.config);
    const uid = typeof data.uid === 'string' ? data.uid : '';

    const user = await services.users.findByIdentifier(uid, userFields);
    if (!user) {
      return StageResult.rejected([FAILED]);
    }

    plan.context[PLAN_CONTEXT_PENDING_USER] = user.id;
    return StageResult.ok();
  },
};
