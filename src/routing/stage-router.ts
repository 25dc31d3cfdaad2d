/**
 * Stage Router
 *
 * Pure decision function: given the session's urgency and the signal the last
 * stage produced, select the next stage or a terminal outcome. The graph is a
 * strict pipeline with one branch point (after retrieval) and one escape
 * valve (resolver -> escalation). Escalation never routes back.
 */

import { InvalidTransitionError } from '../orchestrator/errors';
import { RouteDecision, RouteFn, RoutingSignal, RoutingThresholds, RoutingView } from './types';

export const DEFAULT_THRESHOLDS: RoutingThresholds = {
  highUrgency: 0.75,
  standard: 0.6,
};

export function nextStep(
  session: RoutingView,
  signal: RoutingSignal,
  thresholds: RoutingThresholds = DEFAULT_THRESHOLDS,
): RouteDecision {
  switch (signal.type) {
    case 'classified':
      return { kind: 'stage', stage: 'retriever' };

    case 'retrieval_result': {
      const { confidence } = signal;
      if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
        throw new InvalidTransitionError(session.sessionId, `retrieval confidence ${confidence} outside [0, 1]`);
      }
      if (!session.urgency) {
        throw new InvalidTransitionError(session.sessionId, 'retrieval result received before urgency was classified');
      }
      const bar = session.urgency === 'high' ? thresholds.highUrgency : thresholds.standard;
      return confidence >= bar
        ? { kind: 'stage', stage: 'resolver' }
        : { kind: 'stage', stage: 'escalation' };
    }

    case 'resolution_outcome':
      return signal.outcome === 'resolved'
        ? { kind: 'terminal', outcome: 'resolved' }
        : { kind: 'stage', stage: 'escalation' };

    case 'escalation_complete':
      return { kind: 'terminal', outcome: 'escalated' };

    default: {
      const unknownSignal: never = signal;
      throw new InvalidTransitionError(session.sessionId, `unknown signal ${JSON.stringify(unknownSignal)}`);
    }
  }
}

/** Bind a router to a fixed pair of thresholds */
export function createStageRouter(thresholds: RoutingThresholds = DEFAULT_THRESHOLDS): RouteFn {
  if (thresholds.highUrgency < thresholds.standard) {
    throw new Error(
      `High-urgency threshold (${thresholds.highUrgency}) must not be below the standard threshold (${thresholds.standard})`,
    );
  }
  return (session, signal) => nextStep(session, signal, thresholds);
}
