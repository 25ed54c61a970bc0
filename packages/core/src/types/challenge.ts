import type { ResponseError } from './result';

/**
 * How the client should handle a challenge.
 */
export type ChallengeType = 'native' | 'shell' | 'redirect';

/**
 * The prompt a stage presents to the subject.
 */
export interface Challenge {
  readonly type: ChallengeType;

  /** Client component that renders this challenge */
  readonly component: string;

  readonly title?: string;

  /** Input fields the client should collect, if any */
  readonly fields?: ChallengeField[];

  /** Redirect target (redirect challenges) */
  readonly to?: string;

  /** Shown by error challenges */
  readonly errorMessage?: string;

  /** Filled in by the executor when re-prompting after a rejected response */
  readonly responseErrors?: ResponseError[];

  readonly flowInfo?: { readonly slug: string; readonly title?: string };
}

export interface ChallengeField {
  readonly name: string;
  readonly label: string;
  readonly type: 'text' | 'email' | 'password' | 'hidden';
  readonly required?: boolean;
}

/**
 * Flash message a stage leaves for the subject.
 */
export interface FlowMessage {
  readonly level: 'success' | 'info' | 'warning' | 'error';
  readonly text: string;
}
