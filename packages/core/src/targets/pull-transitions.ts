/**
 * Pull target state transitions
 */

import { InvalidTransitionError, PULL_TARGET_STATES, type PullTargetState } from '@logbridge/shared';

export interface StateTransition {
  from: PullTargetState;
  to: PullTargetState;
  condition?: string;
}

const VALID_TRANSITIONS: StateTransition[] = [
  { from: PULL_TARGET_STATES.CREATED, to: PULL_TARGET_STATES.RUNNING, condition: 'loops_started' },
  { from: PULL_TARGET_STATES.CREATED, to: PULL_TARGET_STATES.CANCELLING, condition: 'cancelled_before_start' },
  { from: PULL_TARGET_STATES.RUNNING, to: PULL_TARGET_STATES.CANCELLING, condition: 'stop_requested_or_subscription_ended' },
  { from: PULL_TARGET_STATES.CANCELLING, to: PULL_TARGET_STATES.STOPPED, condition: 'consumer_drained' },

  // STOPPED is terminal
];

export class TransitionValidator {
  private transitionMap: Map<PullTargetState, StateTransition[]>;

  constructor() {
    this.transitionMap = new Map();

    for (const transition of VALID_TRANSITIONS) {
      const existing = this.transitionMap.get(transition.from) || [];
      existing.push(transition);
      this.transitionMap.set(transition.from, existing);
    }
  }

  isValidTransition(from: PullTargetState, to: PullTargetState): boolean {
    const transitions = this.transitionMap.get(from) || [];
    return transitions.some((t) => t.to === to);
  }

  getValidTransitions(from: PullTargetState): PullTargetState[] {
    const transitions = this.transitionMap.get(from) || [];
    return transitions.map((t) => t.to);
  }

  /**
   * Validate and throw if invalid
   */
  validateTransition(from: PullTargetState, to: PullTargetState): void {
    if (!this.isValidTransition(from, to)) {
      throw new InvalidTransitionError(from, to, {
        validTransitions: this.getValidTransitions(from),
      });
    }
  }
}

// Singleton instance
export const transitionValidator = new TransitionValidator();
