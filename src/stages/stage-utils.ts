import { ConversationMessage, MessageRole, StageName } from '../config/types';
import { asCollaboratorFailure } from '../orchestrator/errors';
import { TicketSession } from '../session/types';
import { TicketMessage } from '../ticketing/types';

const RECENT_MESSAGE_LIMIT = 6;

/**
 * Deterministic message id: `sessionId:turn:source:kind`.
 * Re-running a stage for the same turn yields the same ids, so appends dedupe.
 */
export function messageId(sessionId: string, turn: number, source: StageName | 'customer', kind: string): string {
  return `${sessionId}:${turn}:${source}:${kind}`;
}

export function stageMessage(
  session: TicketSession,
  stage: StageName,
  kind: string,
  role: MessageRole,
  content: string,
  now = Date.now(),
): ConversationMessage {
  return {
    id: messageId(session.sessionId, session.turn, stage, kind),
    role,
    content,
    stage,
    createdAt: now,
  };
}

/** The message a stage wrote for the session's current turn, if it has been committed */
export function findStageMessage(session: TicketSession, stage: StageName, kind: string): ConversationMessage | undefined {
  const id = messageId(session.sessionId, session.turn, stage, kind);
  return session.conversation.find((m) => m.id === id);
}

export function toTicketMessage(message: ConversationMessage): TicketMessage {
  return { id: message.id, role: message.role, content: message.content, createdAt: message.createdAt };
}

export function formatClassification(session: TicketSession): string {
  return [
    `Ticket: ${session.sessionId}`,
    `Issue type: ${session.issueType ?? 'unclassified'}`,
    `Urgency: ${session.urgency ?? 'unknown'}`,
    `Sentiment: ${session.sentiment ?? 'unknown'}`,
    ...(session.summary ? [`Summary: ${session.summary}`] : []),
  ].join('\n');
}

/** Last few customer / agent messages, oldest first. Internal notes are left out. */
export function formatRecentConversation(session: TicketSession, limit = RECENT_MESSAGE_LIMIT): string {
  const visible = session.conversation.filter((m) => m.role !== 'internal').slice(-limit);
  if (visible.length === 0) return 'Conversation: (empty)';
  return ['Conversation:', ...visible.map((m) => `  ${m.role}: ${m.content}`)].join('\n');
}

/** Run a ticket collaborator call, surfacing failures as `tickets` collaborator failures */
export async function callTickets<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw asCollaboratorFailure('tickets', err);
  }
}
