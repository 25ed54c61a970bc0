import { InvalidTransitionError } from '../types/errors';

/**
 * States the executor passes through while handling one request.
 */
export const ExecutorState = {
  Restored: 'restored',
  AwaitingChallenge: 'awaiting-challenge',
  AwaitingResponse: 'awaiting-response',
  StageOk: 'stage-ok',
  StageInvalid: 'stage-invalid',
  Completed: 'completed',
  Cancelled: 'cancelled',
} as const;

export type ExecutorState = (typeof ExecutorState)[keyof typeof ExecutorState];

const TRANSITIONS: Readonly<Record<ExecutorState, readonly ExecutorState[]>> = {
  'restored': ['awaiting-challenge', 'stage-ok', 'stage-invalid'],
  'awaiting-challenge': ['awaiting-response', 'stage-ok', 'stage-invalid'],
  'awaiting-response': ['stage-ok', 'stage-invalid'],
  'stage-ok': ['awaiting-challenge', 'completed'],
  'stage-invalid': ['awaiting-response', 'cancelled'],
  'completed': [],
  'cancelled': [],
};

export function canTransition(from: ExecutorState, to: ExecutorState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: ExecutorState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Records the states visited during one request and rejects illegal moves.
 */
export class StateTracker {
  private readonly _visited: ExecutorState[];

  constructor(initial: ExecutorState) {
    this._visited = [initial];
  }

  get current(): ExecutorState {
    return this._visited[this._visited.length - 1] ?? ExecutorState.AwaitingChallenge;
  }

  get visited(): readonly ExecutorState[] {
    return this._visited;
  }

  transition(to: ExecutorState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(from, to);
    }
    this._visited.push(to);
  }
}
