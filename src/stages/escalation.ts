import { Urgency } from '../config/types';
import { formatCustomerContext, loadCustomerSnapshot } from '../customers/customer-directory';
import { CustomerDirectory } from '../customers/types';
import { ReasoningEngine } from '../llm/types';
import { EscalationCompleteSignal } from '../routing/types';
import { TicketSession } from '../session/types';
import { TicketingService } from '../ticketing/types';
import { PromptManager } from './prompt-manager';
import { formatArticles } from './resolver';
import { ESCALATION_SCHEMA, EscalationOutput, parseEscalationOutput } from './stage-contracts';
import { Stage, StageContext, StageResult } from './types';
import {
  callTickets,
  findStageMessage,
  formatClassification,
  formatRecentConversation,
  stageMessage,
  toTicketMessage,
} from './stage-utils';

const ESCALATION_COMPLETE: EscalationCompleteSignal = { type: 'escalation_complete' };

/** How soon a human follows up on an escalated ticket */
export function followUpWindow(urgency: Urgency | undefined): string {
  return urgency === 'high' ? '4 hours' : '24 hours';
}

/**
 * Escalation — hands the ticket to a human with an internal note and tells
 * the customer who will follow up and when.
 */
export class EscalationStage implements Stage {
  readonly name = 'escalation' as const;

  constructor(
    private readonly engine: ReasoningEngine,
    private readonly tickets: TicketingService,
    private readonly customers: CustomerDirectory,
    private readonly prompts: PromptManager,
  ) {}

  async run(ctx: StageContext): Promise<StageResult> {
    const { session, store, log } = ctx;

    // A retry after the terminal commit only has the ticket mirror left to do
    if (session.status === 'escalated') {
      await this.mirrorEscalation(session);
      log.info('Escalation already committed; ticket mirror re-applied');
      return { session, signal: ESCALATION_COMPLETE };
    }

    const snapshot = await loadCustomerSnapshot(this.customers, session.externalUserId);

    const inference = await this.engine.infer({
      stage: this.name,
      sessionId: session.sessionId,
      instructions: this.prompts.get(this.name),
      context: [
        formatClassification(session),
        formatArticles(session),
        formatCustomerContext(snapshot),
        formatRecentConversation(session),
      ].join('\n\n'),
      customerMessage: ctx.message,
      responseSchema: ESCALATION_SCHEMA,
    });
    const output = parseEscalationOutput(inference.content);

    const accountStatus = snapshot.account ? snapshot.account.status.toUpperCase() : 'unknown';
    const note = stageMessage(session, this.name, 'note', 'internal', formatEscalationNote(output, session.urgency, accountStatus));
    const customerMessage = stageMessage(
      session,
      this.name,
      'reply',
      'agent',
      [
        output.customer_message.trim(),
        '',
        `Your ticket reference is ${session.sessionId}. ` +
          `A member of our support team will follow up within ${followUpWindow(session.urgency)}.`,
      ].join('\n'),
    );

    const next = await store.commit(session.sessionId, {
      set: { status: 'escalated', lastSignal: ESCALATION_COMPLETE },
      append: [note, customerMessage],
    });
    await this.mirrorEscalation(next);

    log.info({ urgency: session.urgency, recommendedAction: output.recommended_action }, 'Ticket escalated');
    return { session: next, signal: ESCALATION_COMPLETE };
  }

  /** Copy the committed hand-off note, customer message and status to the ticket; safe to repeat */
  private async mirrorEscalation(session: TicketSession): Promise<void> {
    const written = [findStageMessage(session, this.name, 'note'), findStageMessage(session, this.name, 'reply')];
    await callTickets(async () => {
      await this.tickets.updateTicket({ ticketId: session.sessionId, status: 'escalated', tags: ['escalated'] });
      for (const message of written) {
        if (message) await this.tickets.appendMessage(session.sessionId, toTicketMessage(message));
      }
    });
  }
}

export function formatEscalationNote(output: EscalationOutput, urgency: Urgency | undefined, accountStatus: string): string {
  const attempted = output.attempted_steps.length > 0 ? output.attempted_steps.join('; ') : 'none';
  return [
    'ESCALATION NOTE',
    `Summary: ${output.summary}`,
    `Root cause hypothesis: ${output.root_cause}`,
    `Attempted: ${attempted}`,
    `Recommended action: ${output.recommended_action}`,
    `Urgency: ${urgency ?? 'unknown'}`,
    `Account status: ${accountStatus}`,
  ].join('\n');
}
