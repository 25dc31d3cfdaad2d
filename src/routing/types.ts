/**
 * Routing signal & decision types
 */

import { IssueType, StageName, TerminalOutcome, Urgency } from '../config/types';

/** Emitted by the classifier */
export interface ClassifiedSignal {
  type: 'classified';
  issueType: IssueType;
  urgency: Urgency;
}

/** Emitted by the retriever */
export interface RetrievalResultSignal {
  type: 'retrieval_result';
  confidence: number;
  articlesFound: number;
}

/** Emitted by the resolver */
export interface ResolutionOutcomeSignal {
  type: 'resolution_outcome';
  outcome: 'resolved' | 'needs_escalation';
}

/** Emitted by the escalation stage */
export interface EscalationCompleteSignal {
  type: 'escalation_complete';
}

export type RoutingSignal =
  | ClassifiedSignal
  | RetrievalResultSignal
  | ResolutionOutcomeSignal
  | EscalationCompleteSignal;

export type RouteDecision =
  | { kind: 'stage'; stage: StageName }
  | { kind: 'terminal'; outcome: TerminalOutcome };

/** Confidence bars a retrieval result must clear to skip a human */
export interface RoutingThresholds {
  /** Applies when urgency is high */
  highUrgency: number;
  /** Applies when urgency is medium or low */
  standard: number;
}

/** The slice of session state the router reads */
export interface RoutingView {
  sessionId: string;
  urgency?: Urgency;
}

/** Router contract; the orchestrator accepts any implementation */
export type RouteFn = (session: RoutingView, signal: RoutingSignal) => RouteDecision;
