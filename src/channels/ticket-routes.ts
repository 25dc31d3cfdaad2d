import { FastifyInstance, FastifyReply } from 'fastify';
import { TicketOrchestrator } from '../orchestrator/orchestrator';
import {
  CollaboratorFailureError,
  InvalidTransitionError,
  RoutingError,
  RoutingExhaustedError,
  SessionNotFoundError,
} from '../orchestrator/errors';
import { SessionStore } from '../session/types';
import { createTraceContext } from '../observability/trace';
import { logger } from '../observability/logger';

/** POST /tickets/:sessionId/messages */
interface MessageBody {
  message: string;
  externalUserId?: string;
}

interface SessionParams {
  sessionId: string;
}

interface UserParams {
  userId: string;
}

const MESSAGE_BODY_SCHEMA = {
  type: 'object',
  required: ['message'],
  properties: {
    message: { type: 'string', maxLength: 8000 },
    externalUserId: { type: 'string', minLength: 1, maxLength: 128 },
  },
} as const;

/** HTTP status for a routing error */
export function statusForError(err: unknown): number {
  if (err instanceof InvalidTransitionError || err instanceof RoutingExhaustedError) return 409;
  if (err instanceof SessionNotFoundError) return 404;
  if (err instanceof CollaboratorFailureError) return 503;
  if (err instanceof RoutingError) return 503;
  return 500;
}

export function registerTicketRoutes(app: FastifyInstance, orchestrator: TicketOrchestrator, store: SessionStore): void {
  const log = logger.child({ component: 'ticket-routes' });

  const sendError = (reply: FastifyReply, err: unknown) => {
    const status = statusForError(err);
    if (err instanceof RoutingError) {
      return reply.status(status).send({ error: err.code, message: err.message });
    }
    log.error({ err }, 'Unhandled error in ticket route');
    return reply.status(status).send({ error: 'INTERNAL', message: 'Internal error' });
  };

  // ─────────────────────────────────────────────
  // POST /tickets/:sessionId/messages — route one customer message
  // ─────────────────────────────────────────────
  app.post<{ Params: SessionParams; Body: MessageBody }>(
    '/tickets/:sessionId/messages',
    { schema: { body: MESSAGE_BODY_SCHEMA } },
    async (req, reply) => {
      const { sessionId } = req.params;
      const message = req.body.message.trim();
      if (!message) {
        return reply.status(400).send({ error: 'BAD_REQUEST', message: 'message must not be empty' });
      }

      const trace = createTraceContext({ sessionId });
      try {
        const result = await orchestrator.handleMessage(sessionId, message, {
          externalUserId: req.body.externalUserId,
          trace,
        });
        reply.header('x-request-id', trace.requestId);
        return reply.status(200).send({
          sessionId,
          status: result.status,
          message: result.lastCustomerVisibleMessage,
        });
      } catch (err) {
        return sendError(reply, err);
      }
    },
  );

  // ─────────────────────────────────────────────
  // GET /tickets/:sessionId — customer-visible view of a session
  // ─────────────────────────────────────────────
  app.get<{ Params: SessionParams }>('/tickets/:sessionId', async (req, reply) => {
    try {
      const session = await store.load(req.params.sessionId);
      if (!session) {
        return reply.status(404).send({ error: 'SESSION_NOT_FOUND', message: `Session ${req.params.sessionId} not found` });
      }
      return reply.status(200).send({
        sessionId: session.sessionId,
        status: session.status,
        issueType: session.issueType ?? null,
        urgency: session.urgency ?? null,
        sentiment: session.sentiment ?? null,
        retrievalConfidence: session.retrievalConfidence ?? null,
        articlesFound: session.articlesFound,
        tags: session.tags,
        turn: session.turn,
        conversation: session.conversation
          .filter((m) => m.role !== 'internal')
          .map((m) => ({ role: m.role, content: m.content, createdAt: m.createdAt })),
      });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ─────────────────────────────────────────────
  // GET /customers/:userId/tickets — ticket history, newest first
  // ─────────────────────────────────────────────
  app.get<{ Params: UserParams }>('/customers/:userId/tickets', async (req, reply) => {
    try {
      const sessions = await store.listSessionsByUser(req.params.userId);
      return reply.status(200).send({
        userId: req.params.userId,
        tickets: sessions.map((s) => ({
          sessionId: s.sessionId,
          status: s.status,
          issueType: s.issueType ?? null,
          createdAt: s.createdAt,
        })),
      });
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
