import { TicketMessage, TicketRecord, TicketingService, UpdateTicketParams } from './types';
import { logger } from '../observability/logger';
import { ticketOperations } from '../observability/metrics';

const DEFAULT_HISTORY_LIMIT = 5;

/**
 * In-memory ticket store for local development and testing.
 * Records are copied in and out.
 */
export class InMemoryTicketingService implements TicketingService {
  private tickets: Map<string, TicketRecord> = new Map();

  async getTicket(ticketId: string): Promise<TicketRecord | null> {
    const ticket = this.tickets.get(ticketId);
    return ticket ? structuredClone(ticket) : null;
  }

  async updateTicket(params: UpdateTicketParams): Promise<TicketRecord> {
    const now = Date.now();
    const ticket: TicketRecord = this.tickets.get(params.ticketId) ?? {
      ticketId: params.ticketId,
      status: 'open',
      tags: [],
      messages: [],
      createdAt: now,
      updatedAt: now,
    };

    if (params.userId) ticket.userId = params.userId;
    if (params.status) ticket.status = params.status;
    if (params.issueType) ticket.issueType = params.issueType;
    if (params.urgency) ticket.urgency = params.urgency;
    if (params.summary) ticket.summary = params.summary;
    if (params.tags) ticket.tags = [...new Set([...ticket.tags, ...params.tags])];
    ticket.updatedAt = now;

    this.tickets.set(params.ticketId, ticket);

    ticketOperations.inc({ operation: 'update', status: 'success' });
    logger.debug({ ticketId: params.ticketId, status: ticket.status }, 'Ticket updated');

    return structuredClone(ticket);
  }

  async appendMessage(ticketId: string, message: TicketMessage): Promise<TicketRecord> {
    const ticket = this.tickets.get(ticketId);
    if (!ticket) {
      ticketOperations.inc({ operation: 'append', status: 'error' });
      throw new Error(`Ticket ${ticketId} not found`);
    }

    if (!ticket.messages.some((m) => m.id === message.id)) {
      ticket.messages.push({ ...message });
      ticket.updatedAt = Date.now();
    }

    ticketOperations.inc({ operation: 'append', status: 'success' });
    return structuredClone(ticket);
  }

  async getCustomerHistory(userId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<TicketRecord[]> {
    return Array.from(this.tickets.values())
      .filter((t) => t.userId === userId)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map((t) => structuredClone(t));
  }
}
