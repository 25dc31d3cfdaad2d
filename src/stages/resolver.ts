import { formatCustomerContext, loadCustomerSnapshot } from '../customers/customer-directory';
import { CustomerDirectory } from '../customers/types';
import { ReasoningEngine } from '../llm/types';
import { ResolutionOutcomeSignal } from '../routing/types';
import { PreferenceFields, PreferenceRecord, SessionStore, TicketSession } from '../session/types';
import { TicketRecord, TicketingService } from '../ticketing/types';
import { PromptManager } from './prompt-manager';
import { PreferenceUpdates, RESOLVER_SCHEMA, parseResolverOutput } from './stage-contracts';
import { Stage, StageContext, StageResult } from './types';
import {
  callTickets,
  findStageMessage,
  formatClassification,
  formatRecentConversation,
  stageMessage,
  toTicketMessage,
} from './stage-utils';

const HISTORY_LIMIT = 5;
const RESOLVED: ResolutionOutcomeSignal = { type: 'resolution_outcome', outcome: 'resolved' };

/**
 * Resolver — answers from the articles the retriever already put on the
 * session plus customer context. It has no knowledge search handle.
 */
export class ResolverStage implements Stage {
  readonly name = 'resolver' as const;

  constructor(
    private readonly engine: ReasoningEngine,
    private readonly tickets: TicketingService,
    private readonly customers: CustomerDirectory,
    private readonly prompts: PromptManager,
  ) {}

  async run(ctx: StageContext): Promise<StageResult> {
    const { session, store, log } = ctx;
    const userId = session.externalUserId;

    // A retry after the terminal commit only has the ticket mirror left to do
    if (session.status === 'resolved') {
      await this.mirrorResolution(session);
      log.info('Resolution already committed; ticket mirror re-applied');
      return { session, signal: RESOLVED };
    }

    const [snapshot, preferences, history] = await Promise.all([
      loadCustomerSnapshot(this.customers, userId),
      userId ? store.getPreferences(userId) : Promise.resolve(null),
      userId ? callTickets(() => this.tickets.getCustomerHistory(userId, HISTORY_LIMIT)) : Promise.resolve([]),
    ]);

    const inference = await this.engine.infer({
      stage: this.name,
      sessionId: session.sessionId,
      instructions: this.prompts.get(this.name),
      context: [
        formatClassification(session),
        formatArticles(session),
        formatCustomerContext(snapshot),
        formatPreferences(preferences),
        formatHistory(history, session.sessionId),
        formatRecentConversation(session),
      ].join('\n\n'),
      customerMessage: ctx.message,
      responseSchema: RESOLVER_SCHEMA,
    });
    const output = parseResolverOutput(inference.content);

    if (userId && output.preference_updates) {
      await this.savePreferences(store, userId, output.preference_updates);
    }

    if (output.outcome === 'resolved' && output.reply) {
      const reply = stageMessage(session, this.name, 'reply', 'agent', output.reply.trim());

      // Reply and terminal status land in one commit; the ticket follows
      const next = await store.commit(session.sessionId, {
        set: { status: 'resolved', lastSignal: RESOLVED },
        append: [reply],
      });
      await this.mirrorResolution(next);

      log.info({ articles: session.retrievedArticles.length }, 'Ticket resolved');
      return { session: next, signal: RESOLVED };
    }

    const signal: ResolutionOutcomeSignal = { type: 'resolution_outcome', outcome: 'needs_escalation' };
    const note = stageMessage(
      session,
      this.name,
      'note',
      'internal',
      `NEEDS_ESCALATION: ${output.escalation_reason?.trim() || 'resolver could not answer from available context'}`,
    );

    const next = await store.commit(session.sessionId, { set: { lastSignal: signal }, append: [note] });
    await callTickets(() => this.tickets.appendMessage(session.sessionId, toTicketMessage(note)));

    log.info({ reason: output.escalation_reason }, 'Resolver requested escalation');
    return { session: next, signal };
  }

  /** Copy the committed reply and status to the ticket; safe to repeat */
  private async mirrorResolution(session: TicketSession): Promise<void> {
    const reply = findStageMessage(session, this.name, 'reply');
    await callTickets(async () => {
      await this.tickets.updateTicket({ ticketId: session.sessionId, status: 'resolved' });
      if (reply) await this.tickets.appendMessage(session.sessionId, toTicketMessage(reply));
    });
  }

  private async savePreferences(store: SessionStore, userId: string, updates: PreferenceUpdates): Promise<void> {
    const fields: PreferenceFields = {};
    if (updates.language) fields.language = updates.language;
    if (updates.channel) fields.channel = updates.channel;
    if (updates.notes) fields.notes = updates.notes;
    if (Object.keys(fields).length === 0) return;
    await store.putPreferences(userId, fields);
  }
}

export function formatArticles(session: TicketSession): string {
  if (session.retrievedArticles.length === 0) return 'Retrieved articles: none';
  const lines = [`Retrieved articles (confidence ${session.retrievalConfidence?.toFixed(2) ?? 'n/a'}):`];
  for (const a of session.retrievedArticles) {
    lines.push(`[${a.articleId}] ${a.title}`, `  ${a.summary}`, `  Relevance: ${a.relevance}`);
  }
  return lines.join('\n');
}

function formatPreferences(preferences: PreferenceRecord | null): string {
  if (!preferences) return 'Preferences: unknown';
  const parts = [
    preferences.language ? `language=${preferences.language}` : undefined,
    preferences.channel ? `channel=${preferences.channel}` : undefined,
    preferences.notes ? `notes=${preferences.notes}` : undefined,
  ].filter((p): p is string => p !== undefined);
  return parts.length > 0 ? `Preferences: ${parts.join(', ')}` : 'Preferences: none stored';
}

function formatHistory(history: TicketRecord[], currentTicketId: string): string {
  const earlier = history.filter((t) => t.ticketId !== currentTicketId);
  if (earlier.length === 0) return 'Earlier tickets: none';
  return [
    'Earlier tickets:',
    ...earlier.map((t) => `  - ${t.ticketId}: ${t.issueType ?? 'unclassified'} [${t.status}]${t.summary ? ` ${t.summary}` : ''}`),
  ].join('\n');
}
