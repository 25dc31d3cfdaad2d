import {
  ConversationMessage,
  IssueType,
  PreferredChannel,
  RetrievedArticle,
  Sentiment,
  SessionStatus,
  Urgency,
} from '../config/types';
import { RoutingSignal } from '../routing/types';

/** The durable per-ticket state threaded through every stage */
export interface TicketSession {
  /** Stable identifier; doubles as thread key and ticket id */
  sessionId: string;
  issueType?: IssueType;
  urgency?: Urgency;
  sentiment?: Sentiment;
  status: SessionStatus;
  retrievalConfidence?: number;
  articlesFound: number;
  /** Append-only */
  conversation: ConversationMessage[];
  externalUserId?: string;
  /** One-line classifier summary */
  summary?: string;
  tags: string[];
  /** Knowledge context handed from the retriever to the resolver */
  retrievedArticles: RetrievedArticle[];
  /** Most recent signal; lets an interrupted run resume from its last completed stage */
  lastSignal?: RoutingSignal;
  /** Number of customer messages received */
  turn: number;
  createdAt: number;
  updatedAt: number;
  closedAt?: number;
}

/** Fields a stage may set in a commit */
export type SessionPatch = Partial<
  Pick<
    TicketSession,
    | 'issueType'
    | 'urgency'
    | 'sentiment'
    | 'status'
    | 'retrievalConfidence'
    | 'articlesFound'
    | 'externalUserId'
    | 'summary'
    | 'tags'
    | 'retrievedArticles'
    | 'lastSignal'
    | 'turn'
  >
>;

/** One atomic read-modify-write against a session */
export interface SessionMutation {
  set?: SessionPatch;
  /** Messages to append; ids already on the conversation are skipped */
  append?: ConversationMessage[];
}

export interface PreferenceRecord {
  userId: string;
  language?: string;
  channel?: PreferredChannel;
  notes?: string;
  updatedAt?: number;
}

export type PreferenceFields = Partial<Pick<PreferenceRecord, 'language' | 'channel' | 'notes'>>;

/** Session store interface */
export interface SessionStore {
  /** Returns null when the session does not exist */
  load(sessionId: string): Promise<TicketSession | null>;
  /** Create if absent; returns whichever session is stored afterwards */
  create(session: TicketSession): Promise<TicketSession>;
  /** Atomic read-modify-write. Throws SessionNotFoundError for unknown ids. */
  commit(sessionId: string, mutation: SessionMutation): Promise<TicketSession>;
  appendMessage(sessionId: string, message: ConversationMessage): Promise<TicketSession>;
  /** Empty record (only userId) when nothing is stored */
  getPreferences(userId: string): Promise<PreferenceRecord>;
  /** Partial update merged into the existing record */
  putPreferences(userId: string, fields: PreferenceFields): Promise<PreferenceRecord>;
  /** Sessions linked to a customer, newest first */
  listSessionsByUser(userId: string, limit?: number): Promise<TicketSession[]>;
}
