/** Issue categories a ticket can be classified into */
export const ISSUE_TYPES = ['login', 'billing', 'reservation', 'subscription', 'account', 'general'] as const;
export type IssueType = (typeof ISSUE_TYPES)[number];

/** Urgency levels assigned by the classifier */
export const URGENCY_LEVELS = ['high', 'medium', 'low'] as const;
export type Urgency = (typeof URGENCY_LEVELS)[number];

export const SENTIMENTS = ['frustrated', 'negative', 'neutral', 'positive'] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

/** Ticket session status. Only open -> resolved and open -> escalated are legal. */
export type SessionStatus = 'open' | 'resolved' | 'escalated';

export type TerminalOutcome = Exclude<SessionStatus, 'open'>;

/** Processing stages, in pipeline order */
export type StageName = 'classifier' | 'retriever' | 'resolver' | 'escalation';

/**
 * Message roles on a session conversation.
 * - customer: inbound text from the customer
 * - agent: customer-visible reply
 * - internal: notes for human staff and downstream stages
 */
export type MessageRole = 'customer' | 'agent' | 'internal';

export interface ConversationMessage {
  id: string;
  role: MessageRole;
  content: string;
  stage?: StageName;
  createdAt: number;
}

/** A knowledge article the retriever judged relevant to the ticket */
export interface RetrievedArticle {
  articleId: string;
  title: string;
  summary: string;
  relevance: string;
}

/** Preferred contact channel for follow-ups */
export type PreferredChannel = 'chat' | 'email' | 'phone' | 'sms';
