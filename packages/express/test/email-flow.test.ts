/**
 * End-to-end: identify, receive a verification link, follow it from
 * another browser session.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Flow } from '@flowgate/core';
import { builtinStages } from '@flowgate/stages';
import { createTestApp, type TestApp } from './fixtures';

const enrollFlow: Flow = {
  slug: 'enroll',
  title: 'Enroll',
  stages: [
    { id: 'identify', kind: 'identification', name: 'identify', config: {} },
    { id: 'verify', kind: 'email', name: 'verify', config: { tokenExpiryMinutes: 15, activateUserOnSuccess: true } },
  ],
};

describe('email verification over HTTP', () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp({ stages: builtinStages, flows: [enrollFlow] });
  });

  async function identify(agent: ReturnType<typeof request.agent>) {
    await agent.get('/api/flows/executor/enroll');
    return await agent.post('/api/flows/executor/enroll').set('Accept-Language', 'fr-FR').send({ uid: 'carol' });
  }

  function linkPath(): string {
    const url = t.notifications.last()?.message.templateContext.url;
    if (typeof url !== 'string') throw new Error('no link sent');
    const parsed = new URL(url);
    return `${parsed.pathname}${parsed.search}`;
  }

  it('sends the link after identification', async () => {
    const response = await identify(request.agent(t.app));

    expect(response.body.transitions).toEqual(['awaiting-response', 'stage-ok', 'awaiting-challenge', 'awaiting-response']);
    expect(response.body.challenge).toMatchObject({ component: 'email', title: 'Email sent.' });
    expect(t.notifications.outbox).toHaveLength(1);
    expect(t.notifications.outbox[0].message).toMatchObject({
      subject: 'Verify your email address',
      to: ['carol@example.test'],
      language: 'fr-FR',
      template: 'email/account-confirmation.html',
    });
    expect(linkPath()).toMatch(/^\/if\/flow\/enroll\/\?flow_token=[A-Za-z0-9_-]{64}$/);
  });

  it('rejects an unknown user', async () => {
    const agent = request.agent(t.app);
    await agent.get('/api/flows/executor/enroll');

    const response = await agent.post('/api/flows/executor/enroll').send({ uid: 'nobody' });

    expect(response.body.errors).toEqual([{ code: 'invalid', message: 'Failed to authenticate.', field: 'uid' }]);
    expect(t.notifications.outbox).toHaveLength(0);
  });

  it('does not resend on a repeated GET', async () => {
    const agent = request.agent(t.app);
    await identify(agent);

    const again = await agent.get('/api/flows/executor/enroll');

    expect(again.body.challenge.component).toBe('email');
    expect(t.notifications.outbox).toHaveLength(1);
  });

  it('resends with the same link on submit', async () => {
    const agent = request.agent(t.app);
    await identify(agent);
    const first = linkPath();

    const response = await agent.post('/api/flows/executor/enroll').send({});

    expect(response.body.errors).toEqual([{ code: 'email-sent', message: 'email-sent' }]);
    expect(t.notifications.outbox).toHaveLength(2);
    expect(linkPath()).toBe(first);
  });

  it('completes the flow from the link in another session', async () => {
    await identify(request.agent(t.app));

    const response = await request.agent(t.app).get(linkPath());

    expect(response.status).toBe(302);
    expect(response.headers.location).toBe('/');
    expect((await t.users.get('u-carol'))?.isActive).toBe(true);
    expect(t.events.filter(e => e.type === 'plan.restored')).toHaveLength(1);
    expect(t.events.filter(e => e.type === 'flow.completed')).toHaveLength(1);
  });

  it('does not honour a link twice', async () => {
    await identify(request.agent(t.app));
    const link = linkPath();
    await request.agent(t.app).get(link);

    const replay = await request.agent(t.app).get(link);

    expect(replay.status).toBe(200);
    expect(replay.body.challenge.component).toBe('identification');
    expect(t.events.filter(e => e.type === 'token.rejected')).toEqual([
      expect.objectContaining({ status: 'used' }),
    ]);
  });
});
