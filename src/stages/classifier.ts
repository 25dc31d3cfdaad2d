import { ReasoningEngine } from '../llm/types';
import { ClassifiedSignal } from '../routing/types';
import { TicketingService } from '../ticketing/types';
import { PromptManager } from './prompt-manager';
import { CLASSIFIER_SCHEMA, parseClassifierOutput } from './stage-contracts';
import { Stage, StageContext, StageResult } from './types';
import { callTickets, formatClassification, formatRecentConversation, stageMessage, toTicketMessage } from './stage-utils';

/**
 * Classifier — issue type, urgency and sentiment for the ticket.
 * Commits the classification, then mirrors it to the ticket and marks the
 * ticket in progress.
 */
export class ClassifierStage implements Stage {
  readonly name = 'classifier' as const;

  constructor(
    private readonly engine: ReasoningEngine,
    private readonly tickets: TicketingService,
    private readonly prompts: PromptManager,
  ) {}

  async run(ctx: StageContext): Promise<StageResult> {
    const { session, store, log } = ctx;

    const inference = await this.engine.infer({
      stage: this.name,
      sessionId: session.sessionId,
      instructions: this.prompts.get(this.name),
      context: [formatClassification(session), formatRecentConversation(session)].join('\n\n'),
      customerMessage: ctx.message,
      responseSchema: CLASSIFIER_SCHEMA,
    });
    const output = parseClassifierOutput(inference.content);

    const signal: ClassifiedSignal = { type: 'classified', issueType: output.issue_type, urgency: output.urgency };
    const tags = [`issue:${output.issue_type}`, `urgency:${output.urgency}`, `sentiment:${output.sentiment}`];
    const note = stageMessage(
      session,
      this.name,
      'note',
      'internal',
      `CLASSIFIED: issue_type=${output.issue_type}, urgency=${output.urgency}, sentiment=${output.sentiment}`,
    );

    const next = await store.commit(session.sessionId, {
      set: {
        issueType: output.issue_type,
        urgency: output.urgency,
        sentiment: output.sentiment,
        summary: output.summary,
        tags: [...new Set([...session.tags, ...tags])],
        lastSignal: signal,
      },
      append: [note],
    });
    await callTickets(async () => {
      await this.tickets.updateTicket({
        ticketId: session.sessionId,
        userId: session.externalUserId,
        status: 'in_progress',
        issueType: output.issue_type,
        urgency: output.urgency,
        summary: output.summary,
        tags,
      });
      await this.tickets.appendMessage(session.sessionId, toTicketMessage(note));
    });

    log.info({ issueType: output.issue_type, urgency: output.urgency, sentiment: output.sentiment }, 'Ticket classified');
    return { session: next, signal };
  }
}
