/**
 * Per-request state machine.
 *
 *   received → authorized → admitted → dispatched → reconciled
 *
 * `rejected` is reachable before dispatch, `failed` only from `dispatched`.
 * reconciled, rejected and failed are terminal.
 */

import { LifecycleError } from '../errors.js';

export type LifecycleState =
  | 'received'
  | 'authorized'
  | 'admitted'
  | 'dispatched'
  | 'reconciled'
  | 'rejected'
  | 'failed';

const TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  received: ['authorized', 'rejected'],
  authorized: ['admitted', 'rejected'],
  admitted: ['dispatched', 'rejected'],
  dispatched: ['reconciled', 'failed'],
  reconciled: [],
  rejected: [],
  failed: [],
};

/** Whether a transition between two states is legal */
export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class RequestLifecycle {
  private readonly states: LifecycleState[] = ['received'];

  /** Current state */
  get state(): LifecycleState {
    return this.states[this.states.length - 1];
  }

  /** Every state visited, oldest first */
  get history(): readonly LifecycleState[] {
    return [...this.states];
  }

  /** True once no further transition is possible */
  get isTerminal(): boolean {
    return TRANSITIONS[this.state].length === 0;
  }

  /**
   * Move to the next state.
   * @throws LifecycleError on an illegal transition
   */
  advance(to: LifecycleState): void {
    const from = this.state;
    if (!canTransition(from, to)) {
      throw new LifecycleError(`Illegal request transition: ${from} -> ${to}`);
    }
    this.states.push(to);
  }
}
