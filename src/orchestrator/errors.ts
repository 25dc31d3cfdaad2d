import { StageName } from '../config/types';

export type RoutingErrorCode =
  | 'INVALID_TRANSITION'
  | 'ROUTING_EXHAUSTED'
  | 'COLLABORATOR_FAILURE'
  | 'SESSION_NOT_FOUND'
  | 'RUN_ABORTED';

/** Which collaborator a failure came from. `contract` = unparseable reasoning output. */
export type CollaboratorKind = 'reasoning' | 'knowledge' | 'customers' | 'tickets' | 'store' | 'contract';

export abstract class RoutingError extends Error {
  abstract readonly code: RoutingErrorCode;
  /** Whether the orchestrator may retry the failing stage */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A stage emitted a signal the router cannot accept in the session's current phase. */
export class InvalidTransitionError extends RoutingError {
  readonly code = 'INVALID_TRANSITION' as const;

  constructor(
    readonly sessionId: string,
    reason: string,
  ) {
    super(`Invalid transition for session ${sessionId}: ${reason}`);
  }
}

/** The orchestrator hit its transition bound without reaching a terminal outcome. */
export class RoutingExhaustedError extends RoutingError {
  readonly code = 'ROUTING_EXHAUSTED' as const;

  constructor(
    readonly sessionId: string,
    readonly transitions: number,
    readonly path: StageName[],
  ) {
    super(`Routing exhausted for session ${sessionId} after ${transitions} transitions (${path.join(' -> ')})`);
  }
}

export class CollaboratorFailureError extends RoutingError {
  readonly code = 'COLLABORATOR_FAILURE' as const;
  override readonly retryable = true;

  constructor(
    readonly kind: CollaboratorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${kind}] ${message}`, options);
  }
}

export class SessionNotFoundError extends RoutingError {
  readonly code = 'SESSION_NOT_FOUND' as const;

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
  }
}

export class RunAbortedError extends RoutingError {
  readonly code = 'RUN_ABORTED' as const;

  constructor(
    readonly sessionId: string,
    readonly beforeStage?: StageName,
  ) {
    super(`Run for session ${sessionId} aborted${beforeStage ? ` before ${beforeStage}` : ''}`);
  }
}

/**
 * Wrap an arbitrary thrown value as a collaborator failure, leaving routing
 * errors untouched.
 */
export function asCollaboratorFailure(kind: CollaboratorKind, err: unknown): RoutingError {
  if (err instanceof RoutingError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new CollaboratorFailureError(kind, message, { cause: err });
}

/** Every configured reasoning provider failed or is circuit-broken */
export class ReasoningUnavailableError extends CollaboratorFailureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('reasoning', message, options);
  }
}
