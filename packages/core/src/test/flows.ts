/**
 * Test Flows
 *
 * - simpleFlow: prompt, then a pass-through stage
 * - chainFlow: three pass-through stages, completes on entry
 * - guardedFlow: aborts without a pending user
 * - linkFlow: out-of-band link, then a prompt
 * - brokenFlow: stage that throws
 */
import type { Flow } from '../types/flow';

export const simpleFlow: Flow = {
  slug: 'simple',
  title: 'Simple',
  stages: [
    { id: 'question', kind: 'prompt', name: 'question', config: { expected: 'yes' } },
    { id: 'done', kind: 'pass', name: 'done', config: {} },
  ],
};

export const chainFlow: Flow = {
  slug: 'chain',
  title: 'Chain',
  stages: [
    { id: 'one', kind: 'pass', name: 'one', config: {} },
    { id: 'two', kind: 'pass', name: 'two', config: {} },
    { id: 'three', kind: 'pass', name: 'three', config: {} },
  ],
};

export const guardedFlow: Flow = {
  slug: 'guarded',
  title: 'Guarded',
  stages: [
    { id: 'guard', kind: 'require-user', name: 'guard', config: {} },
    { id: 'question', kind: 'prompt', name: 'question', config: {} },
  ],
};

export const linkFlow: Flow = {
  slug: 'link',
  title: 'Link',
  stages: [
    { id: 'link', kind: 'link', name: 'link', config: {} },
    { id: 'question', kind: 'prompt', name: 'question', config: {} },
  ],
};

export const brokenFlow: Flow = {
  slug: 'broken',
  title: 'Broken',
  stages: [
    { id: 'boom', kind: 'explode', name: 'boom', config: {} },
  ],
};

export const testFlows: Flow[] = [simpleFlow, chainFlow, guardedFlow, linkFlow, brokenFlow];
