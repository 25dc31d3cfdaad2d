import { TicketingService } from './types';
import { InMemoryTicketingService } from './in-memory-ticketing';
import { logger } from '../observability/logger';

/**
 * Factory: the in-memory ticket store is the only backend shipped;
 * a helpdesk adapter plugs in behind the same interface.
 */
export function createTicketingService(): TicketingService {
  logger.info('Using in-memory ticketing service');
  return new InMemoryTicketingService();
}
