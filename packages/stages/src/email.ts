import {
  StageResult,
  PLAN_CONTEXT_EMAIL_OVERRIDE,
  PLAN_CONTEXT_EMAIL_SENT,
  PLAN_CONTEXT_IS_RESTORED,
  PLAN_CONTEXT_PENDING_USER,
  QS_KEY_TOKEN,
  stashedQuery,
  type FlowUser,
  type JSONSchema,
  type ResponseError,
  type StageContext,
  type StageHandler,
} from '@flowgate/core';
import { configReader } from './config';

export type EmailStageConfig = {
  /** Subject line of the verification email */
  subject: string;
  /** Template the notification dispatcher renders */
  template: string;
  /** Minutes a link stays valid (default: 30) */
  tokenExpiryMinutes: number;
  /** Mark the pending user active once the link is followed (default: false) */
  activateUserOnSuccess: boolean;
};

const configSchema: JSONSchema = {
  type: 'object',
  properties: {
    subject: { type: 'string', minLength: 1, default: 'Verify your email address', description: 'Subject line' },
    template: { type: 'string', minLength: 1, default: 'email/account-confirmation.html', description: 'Template name' },
    tokenExpiryMinutes: { type: 'integer', minimum: 1, default: 30, description: 'Link lifetime in minutes' },
    activateUserOnSuccess: { type: 'boolean', default: false },
  },
  additionalProperties: false,
};

const config = configReader<EmailStageConfig>(configSchema);

const EMAIL_SENT_ERROR: ResponseError = { code: 'email-sent', message: 'email-sent' };

/**
 * Token identifier for the (stage, user) pair. Stable across requests so
 * repeated sends reuse one token. Both parts are encoded, so distinct pairs
 * never share an identifier.
 */
export function emailTokenIdentifier(stageName: string, userId: string): string {
  return `email-stage:${encodeURIComponent(stageName)}:${encodeURIComponent(userId)}`;
}

async function pendingUser({ plan, services }: StageContext): Promise<FlowUser | null> {
  const id = plan.context[PLAN_CONTEXT_PENDING_USER];
  if (typeof id !== 'string' || !id) return null;
  return services.users.get(id);
}

function noPendingUser({ messages }: StageContext): StageResult {
  messages.add('error', 'No pending user.');
  return StageResult.preconditionMissing('no-pending-user', 'No pending user.');
}

async function sendEmail(ctx: StageContext, user: FlowUser): Promise<void> {
  const { plan, stage, request, services } = ctx;
  const cfg = config.read('email', stage.config);

  const token = await services.tokens.issueToken({
    identifier: emailTokenIdentifier(stage.name, user.id),
    userId: user.id,
    plan,
    ttlMs: (cfg.tokenExpiryMinutes + 1) * 60 * 1000,
  });

  const override = plan.context[PLAN_CONTEXT_EMAIL_OVERRIDE];
  const to = typeof override === 'string' && override ? override : user.email;

  await services.notifications.send(stage, {
    subject: cfg.subject,
    to: [to],
    language: user.locale ?? request.locale,
    template: cfg.template,
    templateContext: {
      url: services.urls.build({
        baseUrl: request.baseUrl,
        flowSlug: plan.flowSlug,
        query: { [QS_KEY_TOKEN]: token.key },
      }),
      user: { id: user.id, username: user.username, email: user.email },
      expires: token.expiresAt,
    },
  });

  services.events?.onNotificationSent?.({ planId: plan.id, stageId: stage.id, template: cfg.template, recipients: 1 });
}

async function resendAndReprompt(ctx: StageContext, errors: ResponseError[]): Promise<StageResult> {
  const user = await pendingUser(ctx);
  if (!user) return noPendingUser(ctx);

  await sendEmail(ctx, user);
  return StageResult.rejected(errors);
}

/**
 * Email verification. Sends a link carrying a flow token and completes when
 * the subject comes back through it.
 */
export const emailStage: StageHandler = {
  kind: 'email',

  metadata: {
    kind: 'email',
    name: 'Email verification',
    description: 'Send a verification link and wait for the subject to follow it',
    configSchema,
  },

  validateConfig(cfg) {
    return config.issues(cfg);
  },

  async enter(ctx) {
    const { plan, stage, services, messages, request } = ctx;

    // Back from the link
    if (QS_KEY_TOKEN in stashedQuery(request.session) && plan.context[PLAN_CONTEXT_IS_RESTORED]) {
      messages.add('success', 'Successfully verified Email.');
      if (config.read('email', stage.config).activateUserOnSuccess) {
        const user = await pendingUser(ctx);
        if (!user) return noPendingUser(ctx);
        await services.users.setActive(user.id, true);
      }
      return StageResult.ok();
    }

    const user = await pendingUser(ctx);
    if (!user) return noPendingUser(ctx);

    if (!plan.context[PLAN_CONTEXT_EMAIL_SENT]) {
      await sendEmail(ctx, user);
      plan.context[PLAN_CONTEXT_EMAIL_SENT] = true;
    }
    return undefined;
  },

  challenge() {
    return { type: 'native', component: 'email', title: 'Email sent.' };
  },

  // No response completes this stage; only the link does
  validate() {
    return { valid: false, errors: [EMAIL_SENT_ERROR] };
  },

  async onValid(ctx) {
    return resendAndReprompt(ctx, [EMAIL_SENT_ERROR]);
  },

  async onInvalid(ctx, errors) {
    return resendAndReprompt(ctx, errors);
  },
};
