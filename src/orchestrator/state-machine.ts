import { ConversationStatus } from '../memory/types';
import { STATE_TRANSITIONS, StateTransitionEvent } from './types';
import { logger } from '../observability/logger';
import { stateTransitions } from '../observability/metrics';

export class StateMachine {
  canTransition(current: ConversationStatus, target: ConversationStatus): boolean {
    return STATE_TRANSITIONS[current].includes(target);
  }

  /**
   * Attempt a status transition. Returns the new status if valid, or the current status if not.
   */
  transition(
    conversationId: string,
    currentState: ConversationStatus,
    targetState: ConversationStatus,
    reason: string,
  ): { newState: ConversationStatus; event: StateTransitionEvent | null } {
    if (currentState === targetState) {
      return { newState: currentState, event: null };
    }

    if (!this.canTransition(currentState, targetState)) {
      logger.warn(
        { conversationId, from: currentState, to: targetState, reason },
        'Invalid state transition attempted',
      );
      return { newState: currentState, event: null };
    }

    const event: StateTransitionEvent = {
      conversationId,
      from: currentState,
      to: targetState,
      reason,
      timestamp: Date.now(),
    };

    stateTransitions.inc({ from: currentState, to: targetState });
    logger.info(event, 'State transition');

    return { newState: targetState, event };
  }

  /** Terminal status reached by resolving from `current`, if resolving is allowed. */
  resolutionTarget(current: ConversationStatus): ConversationStatus | undefined {
    switch (current) {
      case 'ongoing':
        return 'resolved_ai';
      case 'escalated':
        return 'resolved_human';
      default:
        return undefined;
    }
  }
}

export const stateMachine = new StateMachine();
