import { IssueType, MessageRole, Urgency } from '../config/types';

/** Ticket status as seen by support staff; `in_progress` once classified */
export type TicketStatus = 'open' | 'in_progress' | 'resolved' | 'escalated';

export interface TicketMessage {
  id: string;
  role: MessageRole;
  content: string;
  createdAt: number;
}

export interface TicketRecord {
  /** Same value as the session id */
  ticketId: string;
  userId?: string;
  status: TicketStatus;
  issueType?: IssueType;
  urgency?: Urgency;
  summary?: string;
  tags: string[];
  messages: TicketMessage[];
  createdAt: number;
  updatedAt: number;
}

export interface UpdateTicketParams {
  ticketId: string;
  userId?: string;
  status?: TicketStatus;
  issueType?: IssueType;
  urgency?: Urgency;
  summary?: string;
  /** Merged into the existing tags */
  tags?: string[];
}

export interface TicketingService {
  getTicket(ticketId: string): Promise<TicketRecord | null>;
  /** Creates the ticket on first update */
  updateTicket(params: UpdateTicketParams): Promise<TicketRecord>;
  /** Messages with an id already on the ticket are ignored */
  appendMessage(ticketId: string, message: TicketMessage): Promise<TicketRecord>;
  /** Tickets for a customer, newest first */
  getCustomerHistory(userId: string, limit?: number): Promise<TicketRecord[]>;
}
