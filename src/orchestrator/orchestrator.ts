import { ConversationMessage, SessionStatus, StageName } from '../config/types';
import { env } from '../config/env';
import { runLogger } from '../observability/logger';
import { TraceContext, createTraceContext, endSpan, startSpan } from '../observability/trace';
import {
  routerDecisions,
  runFailures,
  stageDuration,
  stageRetries,
  stageRuns,
  terminalOutcomes,
} from '../observability/metrics';
import { retryWithBackoff } from '../resilience/retry';
import { createStageRouter } from '../routing/stage-router';
import { RouteDecision, RouteFn } from '../routing/types';
import { newSession } from '../session/mutation';
import { SessionStore, TicketSession } from '../session/types';
import { StageResult, StageSet } from '../stages/types';
import { callTickets, messageId, toTicketMessage } from '../stages/stage-utils';
import { TicketingService } from '../ticketing/types';
import {
  CollaboratorFailureError,
  RoutingError,
  RoutingExhaustedError,
  RunAbortedError,
  SessionNotFoundError,
} from './errors';
import { SessionRunQueue } from './session-queue';

export interface OrchestratorOptions {
  /** Router decisions allowed per run, the entry decision included */
  maxTransitions?: number;
  /** Attempts per stage when it fails with a retryable error */
  maxStageAttempts?: number;
  backoffMs?: number;
  route?: RouteFn;
}

export interface HandleMessageOptions {
  externalUserId?: string;
  /** Checked between stages and between retry attempts */
  signal?: AbortSignal;
  trace?: TraceContext;
}

export interface HandleMessageResult {
  status: SessionStatus;
  /** Latest agent message on the session, if any */
  lastCustomerVisibleMessage: string | null;
}

/**
 * Drives one ticket through router → stage → router until the router
 * returns a terminal outcome or the transition bound is hit.
 *
 * Runs for the same session are serialised; a terminal session is answered
 * from its stored state without running anything.
 */
export class TicketOrchestrator {
  private readonly queue = new SessionRunQueue();
  private readonly route: RouteFn;
  private readonly maxTransitions: number;
  private readonly maxStageAttempts: number;
  private readonly backoffMs: number;

  constructor(
    private readonly store: SessionStore,
    private readonly tickets: TicketingService,
    private readonly stages: StageSet,
    options: OrchestratorOptions = {},
  ) {
    this.route = options.route ?? createStageRouter({
      highUrgency: env.router.highUrgencyThreshold,
      standard: env.router.standardThreshold,
    });
    this.maxTransitions = options.maxTransitions ?? env.router.maxTransitions;
    this.maxStageAttempts = options.maxStageAttempts ?? env.stages.maxAttempts;
    this.backoffMs = options.backoffMs ?? env.stages.backoffMs;
  }

  handleMessage(sessionId: string, message: string, options: HandleMessageOptions = {}): Promise<HandleMessageResult> {
    return this.queue.run(sessionId, () => this.process(sessionId, message, options));
  }

  private async process(sessionId: string, message: string, options: HandleMessageOptions): Promise<HandleMessageResult> {
    const trace = options.trace ?? createTraceContext({ sessionId });
    trace.sessionId = sessionId;
    const log = runLogger(trace.requestId, sessionId);
    const spanRun = startSpan(trace, 'orchestrator.handleMessage');

    try {
      let session = await this.loadOrCreate(sessionId, options.externalUserId, trace);

      if (session.status !== 'open') {
        log.info({ status: session.status }, 'Session already terminal; replaying stored outcome');
        endSpan(spanRun);
        return toResult(session);
      }

      session = await this.intake(session, message, options.externalUserId, trace);

      let decision: RouteDecision = session.lastSignal
        ? this.decide(session, session.lastSignal)
        : { kind: 'stage', stage: 'classifier' };
      let transitions = 1;
      const path: StageName[] = [];

      if (session.lastSignal) {
        log.info({ resumeFrom: session.lastSignal.type }, 'Resuming interrupted run');
      }

      while (decision.kind === 'stage') {
        if (options.signal?.aborted) throw new RunAbortedError(sessionId, decision.stage);

        path.push(decision.stage);
        const result = await this.runStage(decision.stage, session, message, trace, options.signal);
        session = result.session;

        if (transitions >= this.maxTransitions) {
          throw new RoutingExhaustedError(sessionId, transitions, path);
        }
        decision = this.decide(session, result.signal);
        transitions++;
      }

      if (session.status !== decision.outcome) {
        session = await this.store.commit(sessionId, { set: { status: decision.outcome } });
      }

      terminalOutcomes.inc({ outcome: decision.outcome, urgency: session.urgency ?? 'unknown' });
      log.info({ outcome: decision.outcome, path, transitions }, 'Ticket reached terminal outcome');
      endSpan(spanRun);
      return toResult(session);
    } catch (err) {
      endSpan(spanRun, 'error');
      const code = err instanceof RoutingError ? err.code : 'UNEXPECTED';
      runFailures.inc({ code });
      log.error({ err, code }, 'Routing run failed; session left at its last committed state');
      throw err;
    }
  }

  private async loadOrCreate(sessionId: string, externalUserId: string | undefined, trace: TraceContext): Promise<TicketSession> {
    const span = startSpan(trace, 'session.load');
    const existing = await this.store.load(sessionId);
    if (existing) {
      endSpan(span);
      return existing;
    }

    const created = await this.store.create(newSession(sessionId, externalUserId));
    endSpan(span);
    return created;
  }

  /**
   * Record the customer's message before any stage runs. The ticket is
   * upserted on every turn since a session can outlive its ticket.
   */
  private async intake(
    session: TicketSession,
    message: string,
    externalUserId: string | undefined,
    trace: TraceContext,
  ): Promise<TicketSession> {
    const span = startSpan(trace, 'session.intake');
    const turn = session.turn + 1;
    const inbound: ConversationMessage = {
      id: messageId(session.sessionId, turn, 'customer', 'message'),
      role: 'customer',
      content: message,
      createdAt: Date.now(),
    };

    const userId = session.externalUserId ?? externalUserId;
    await callTickets(async () => {
      await this.tickets.updateTicket({ ticketId: session.sessionId, userId });
      await this.tickets.appendMessage(session.sessionId, toTicketMessage(inbound));
    });
    const next = await this.store.commit(session.sessionId, {
      set: { turn, externalUserId: userId },
      append: [inbound],
    });
    endSpan(span);
    return next;
  }

  private decide(session: TicketSession, signal: StageResult['signal']): RouteDecision {
    const decision = this.route({ sessionId: session.sessionId, urgency: session.urgency }, signal);
    routerDecisions.inc({
      signal: signal.type,
      next: decision.kind === 'stage' ? decision.stage : decision.outcome,
    });
    return decision;
  }

  /**
   * Run one stage, retrying retryable failures with exponential backoff.
   * Each attempt starts from the session as currently stored.
   */
  private async runStage(
    stageName: StageName,
    session: TicketSession,
    message: string,
    trace: TraceContext,
    signal: AbortSignal | undefined,
  ): Promise<StageResult> {
    const stage = this.stages[stageName];
    const log = runLogger(trace.requestId, session.sessionId, { stage: stageName });

    return retryWithBackoff(
      async (attempt) => {
        if (attempt > 1 && signal?.aborted) throw new RunAbortedError(session.sessionId, stageName);
        const current = attempt === 1 ? session : await this.reload(session.sessionId);

        const span = startSpan(trace, `stage.${stageName}`, { attempt });
        const timer = stageDuration.startTimer({ stage: stageName });
        try {
          const result = await stage.run({ session: current, message, store: this.store, log, trace });
          stageRuns.inc({ stage: stageName, result: 'ok' });
          endSpan(span);
          return result;
        } catch (err) {
          stageRuns.inc({ stage: stageName, result: 'error' });
          endSpan(span, 'error');
          throw err;
        } finally {
          timer();
        }
      },
      {
        attempts: this.maxStageAttempts,
        backoffMs: this.backoffMs,
        shouldRetry: (err) => err instanceof RoutingError && err.retryable,
        onRetry: (err, attempt, delayMs) => {
          const kind = err instanceof CollaboratorFailureError ? err.kind : 'unknown';
          stageRetries.inc({ stage: stageName, kind });
          log.warn({ err, attempt, delayMs }, 'Stage failed; retrying');
        },
      },
    );
  }

  private async reload(sessionId: string): Promise<TicketSession> {
    const session = await this.store.load(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }
}

function toResult(session: TicketSession): HandleMessageResult {
  return { status: session.status, lastCustomerVisibleMessage: lastAgentMessage(session) };
}

export function lastAgentMessage(session: TicketSession): string | null {
  for (let i = session.conversation.length - 1; i >= 0; i--) {
    const message = session.conversation[i];
    if (message.role === 'agent') return message.content;
  }
  return null;
}
