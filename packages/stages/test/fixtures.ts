import type { Flow, FlowUser } from '@flowgate/core';

export const alice: FlowUser = {
  id: 'u-alice',
  username: 'alice',
  email: 'alice@example.test',
  isActive: false,
  locale: 'de-DE',
};

export const bob: FlowUser = {
  id: 'u-bob',
  username: 'bob',
  email: 'bob@example.test',
  isActive: true,
};

/** Identify, then verify by email; activates the account */
export const enrollFlow: Flow = {
  slug: 'enroll',
  title: 'Enroll',
  stages: [
    { id: 'identify', kind: 'identification', name: 'identify', config: {} },
    { id: 'verify', kind: 'email', name: 'Verify Email', config: { tokenExpiryMinutes: 15, activateUserOnSuccess: true } },
  ],
};

/** Email stage alone; the pending user comes from the initial context */
export const emailOnlyFlow: Flow = {
  slug: 'email-only',
  title: 'Email only',
  stages: [
    { id: 'verify', kind: 'email', name: 'Verify Email', config: {} },
  ],
};

export const emailLoginFlow: Flow = {
  slug: 'email-login',
  title: 'Email login',
  stages: [
    { id: 'identify', kind: 'identification', name: 'identify', config: { userFields: ['email'] } },
  ],
};
