import { ClassifierStage } from '../../src/stages/classifier';
import { RetrieverStage } from '../../src/stages/retriever';
import { ResolverStage } from '../../src/stages/resolver';
import { EscalationStage, followUpWindow } from '../../src/stages/escalation';
import { createStages } from '../../src/stages';
import { PromptManager } from '../../src/stages/prompt-manager';
import { CLASSIFIER_SCHEMA } from '../../src/stages/stage-contracts';
import { StageContext } from '../../src/stages/types';
import { InMemorySessionStore } from '../../src/session/session-store';
import { newSession } from '../../src/session/mutation';
import { SessionPatch, TicketSession } from '../../src/session/types';
import { InMemoryTicketingService } from '../../src/ticketing/in-memory-ticketing';
import { KnowledgeHit, KnowledgeSearch } from '../../src/knowledge/types';
import { CollaboratorFailureError } from '../../src/orchestrator/errors';
import { logger } from '../../src/observability/logger';
import { createTraceContext } from '../../src/observability/trace';
import {
  FakeKnowledge,
  PROMPTS_DIR,
  ScriptedEngine,
  classifiedReply,
  escalationReply,
  needsEscalationReply,
  resolvedReply,
  retrievalReply,
  testCustomers,
} from '../helpers/fakes';

const SESSION_ID = 't-1';
const prompts = new PromptManager(PROMPTS_DIR);

let engine: ScriptedEngine;
let store: InMemorySessionStore;
let tickets: InMemoryTicketingService;

beforeEach(() => {
  engine = new ScriptedEngine();
  store = new InMemorySessionStore();
  tickets = new InMemoryTicketingService();
});

async function seed(set: SessionPatch = {}, userId?: string): Promise<TicketSession> {
  await store.create(newSession(SESSION_ID, userId));
  await tickets.updateTicket({ ticketId: SESSION_ID, userId, status: 'open' });
  return store.commit(SESSION_ID, {
    set: { turn: 1, ...set },
    append: [{ id: `${SESSION_ID}:1:customer:message`, role: 'customer', content: 'How do I pause?', createdAt: 1 }],
  });
}

function ctxFor(session: TicketSession, message = 'How do I pause?'): StageContext {
  return { session, message, store, log: logger, trace: createTraceContext() };
}

describe('ClassifierStage', () => {
  it('commits the classification and emits Classified', async () => {
    const session = await seed();
    engine.script('classifier', classifiedReply('billing', 'high', 'frustrated'));

    const result = await new ClassifierStage(engine, tickets, prompts).run(ctxFor(session, 'My card was charged twice'));

    expect(result.signal).toEqual({ type: 'classified', issueType: 'billing', urgency: 'high' });
    expect(result.session.issueType).toBe('billing');
    expect(result.session.urgency).toBe('high');
    expect(result.session.sentiment).toBe('frustrated');
    expect(result.session.summary).toBe('billing issue reported');
    expect(result.session.tags).toEqual(['issue:billing', 'urgency:high', 'sentiment:frustrated']);
    expect(result.session.lastSignal).toEqual(result.signal);

    const stored = await store.load(SESSION_ID);
    expect(stored?.conversation.at(-1)).toMatchObject({
      id: 't-1:1:classifier:note',
      role: 'internal',
      content: 'CLASSIFIED: issue_type=billing, urgency=high, sentiment=frustrated',
    });
  });

  it('mirrors the classification to the ticket', async () => {
    const session = await seed();
    engine.script('classifier', classifiedReply('login', 'medium'));

    await new ClassifierStage(engine, tickets, prompts).run(ctxFor(session));

    const ticket = await tickets.getTicket(SESSION_ID);
    expect(ticket?.status).toBe('in_progress');
    expect(ticket?.issueType).toBe('login');
    expect(ticket?.tags).toEqual(['issue:login', 'urgency:medium', 'sentiment:neutral']);
  });

  it('asks the engine for JSON with the classifier schema', async () => {
    const session = await seed();
    engine.script('classifier', classifiedReply('general', 'low'));

    await new ClassifierStage(engine, tickets, prompts).run(ctxFor(session, 'hello there'));

    expect(engine.requests[0].responseSchema).toBe(CLASSIFIER_SCHEMA);
    expect(engine.requests[0].customerMessage).toBe('hello there');
    expect(engine.requests[0].context).toContain('Ticket: t-1');
  });

  it('can be re-run on the same turn without duplicating its note', async () => {
    const session = await seed();
    engine.script('classifier', classifiedReply('login', 'low'), classifiedReply('login', 'low'));
    const stage = new ClassifierStage(engine, tickets, prompts);

    await stage.run(ctxFor(session));
    const second = await stage.run(ctxFor(session));

    expect(second.session.conversation.filter((m) => m.stage === 'classifier')).toHaveLength(1);
  });

  it('surfaces malformed engine output as a contract failure and commits nothing', async () => {
    const session = await seed();
    engine.script('classifier', 'not json at all');

    await expect(new ClassifierStage(engine, tickets, prompts).run(ctxFor(session))).rejects.toMatchObject({
      kind: 'contract',
    });
    expect((await store.load(SESSION_ID))?.issueType).toBeUndefined();
  });
});

describe('RetrieverStage', () => {
  it('searches, scores and commits the retrieval result', async () => {
    const session = await seed({ issueType: 'subscription', urgency: 'low' });
    const knowledge = new FakeKnowledge();
    engine.script('retriever', retrievalReply(0.8, 1));

    const result = await new RetrieverStage(engine, knowledge, prompts).run(ctxFor(session));

    expect(knowledge.queries).toEqual(['subscription How do I pause?']);
    expect(result.signal).toEqual({ type: 'retrieval_result', confidence: 0.8, articlesFound: 1 });
    expect(result.session.retrievalConfidence).toBe(0.8);
    expect(result.session.articlesFound).toBe(1);
    expect(result.session.retrievedArticles).toEqual([
      { articleId: 'kb-test-1', title: 'Pausing a subscription', summary: 'How to pause', relevance: 'Covers pausing' },
    ]);
    expect(result.session.conversation.at(-1)?.content).toBe('RETRIEVAL_RESULT: confidence=0.80, articles_found=1');
  });

  it('searches for the opening message on a follow-up turn', async () => {
    const session = await seed({ issueType: 'subscription', urgency: 'low' });
    const knowledge = new FakeKnowledge();
    engine.script('retriever', retrievalReply(0.8, 1));

    await new RetrieverStage(engine, knowledge, prompts).run(ctxFor(session, 'Any update?'));

    expect(knowledge.queries).toEqual(['subscription How do I pause?']);
    expect(engine.requests[0].customerMessage).toBe('How do I pause?');
  });

  it('does not touch the classification', async () => {
    const session = await seed({ issueType: 'subscription', urgency: 'high' });
    engine.script('retriever', retrievalReply(0.3, 0));

    const result = await new RetrieverStage(engine, new FakeKnowledge(), prompts).run(ctxFor(session));

    expect(result.session.issueType).toBe('subscription');
    expect(result.session.urgency).toBe('high');
  });

  it('hands the search results to the engine', async () => {
    const session = await seed({ issueType: 'general', urgency: 'low' });
    engine.script('retriever', retrievalReply(0.7));

    await new RetrieverStage(engine, new FakeKnowledge(), prompts).run(ctxFor(session));

    expect(engine.requests[0].context).toContain('[kb-test-1] Pausing a subscription (score 0.75)');
  });

  it('still asks the engine when nothing matched', async () => {
    const session = await seed({ issueType: 'general', urgency: 'low' });
    engine.script('retriever', retrievalReply(0.1, 0));

    const result = await new RetrieverStage(engine, new FakeKnowledge([]), prompts).run(ctxFor(session));

    expect(engine.requests[0].context).toContain('Knowledge base results: none matched this message.');
    expect(result.session.retrievedArticles).toEqual([]);
  });

  it('wraps knowledge search errors as knowledge collaborator failures', async () => {
    const session = await seed({ issueType: 'general', urgency: 'low' });
    const broken: KnowledgeSearch = {
      search: async (): Promise<KnowledgeHit[]> => {
        throw new Error('index offline');
      },
    };

    const run = new RetrieverStage(engine, broken, prompts).run(ctxFor(session));
    await expect(run).rejects.toBeInstanceOf(CollaboratorFailureError);
    await expect(run).rejects.toMatchObject({ kind: 'knowledge', message: '[knowledge] index offline' });
  });
});

describe('ResolverStage', () => {
  const articles = [{ articleId: 'kb-test-1', title: 'Pausing a subscription', summary: 'How to pause', relevance: 'Covers pausing' }];

  it('has no knowledge search handle', () => {
    const knowledge = new FakeKnowledge();
    const stages = createStages({ engine, knowledge, customers: testCustomers(), tickets, prompts });

    expect(Object.values(stages.resolver)).not.toContain(knowledge);
    expect(Object.values(stages.retriever)).toContain(knowledge);
  });

  it('appends the answer and resolves in one commit', async () => {
    const session = await seed(
      { issueType: 'subscription', urgency: 'low', retrievalConfidence: 0.8, retrievedArticles: articles },
      'user-1',
    );
    engine.script('resolver', resolvedReply('Open settings and choose Pause.'));

    const result = await new ResolverStage(engine, tickets, testCustomers(), prompts).run(ctxFor(session));

    expect(result.signal).toEqual({ type: 'resolution_outcome', outcome: 'resolved' });
    expect(result.session.status).toBe('resolved');
    expect(result.session.conversation.at(-1)).toMatchObject({
      id: 't-1:1:resolver:reply',
      role: 'agent',
      content: 'Open settings and choose Pause.',
    });

    const ticket = await tickets.getTicket(SESSION_ID);
    expect(ticket?.status).toBe('resolved');
    expect(ticket?.messages.map((m) => m.id)).toEqual(['t-1:1:resolver:reply']);
  });

  it('builds its context from session articles and customer data', async () => {
    const session = await seed(
      { issueType: 'subscription', urgency: 'low', retrievalConfidence: 0.8, retrievedArticles: articles },
      'user-1',
    );
    await tickets.updateTicket({
      ticketId: 'old-1',
      userId: 'user-1',
      status: 'resolved',
      issueType: 'subscription',
      summary: 'Paused plan',
    });
    engine.script('resolver', resolvedReply('Done.'));

    await new ResolverStage(engine, tickets, testCustomers(), prompts).run(ctxFor(session));

    const context = engine.requests[0].context;
    expect(context).toContain('Retrieved articles (confidence 0.80):');
    expect(context).toContain('[kb-test-1] Pausing a subscription');
    expect(context).toContain('Customer: Test User (user-1)');
    expect(context).toContain('Subscription: premium / active');
    expect(context).toContain('  - res-1: Pottery evening at 2026-11-02T18:00 [reserved]');
    expect(context).toContain('Preferences: none stored');
    expect(context).toContain('  - old-1: subscription [resolved] Paused plan');
    expect(context).not.toContain('  - t-1:');
  });

  it('persists preference updates reported by the engine', async () => {
    const session = await seed({ issueType: 'general', urgency: 'low', retrievedArticles: articles }, 'user-1');
    engine.script('resolver', {
      outcome: 'resolved',
      reply: 'Bien sûr.',
      preference_updates: { language: 'fr', channel: 'email' },
    });

    await new ResolverStage(engine, tickets, testCustomers(), prompts).run(ctxFor(session));

    const prefs = await store.getPreferences('user-1');
    expect(prefs.language).toBe('fr');
    expect(prefs.channel).toBe('email');
  });

  it('leaves status open and emits needs_escalation', async () => {
    const session = await seed({ issueType: 'billing', urgency: 'low', retrievedArticles: articles }, 'user-1');
    engine.script('resolver', needsEscalationReply('refund request'));

    const result = await new ResolverStage(engine, tickets, testCustomers(), prompts).run(ctxFor(session));

    expect(result.signal).toEqual({ type: 'resolution_outcome', outcome: 'needs_escalation' });
    expect(result.session.status).toBe('open');
    expect(result.session.conversation.some((m) => m.role === 'agent')).toBe(false);
    expect(result.session.conversation.at(-1)?.content).toBe('NEEDS_ESCALATION: refund request');
  });

  it('only re-applies the ticket mirror for a session already resolved', async () => {
    await seed({ issueType: 'general', urgency: 'low' });
    const resolved = await store.commit(SESSION_ID, {
      set: { status: 'resolved', lastSignal: { type: 'resolution_outcome', outcome: 'resolved' } },
      append: [{ id: 't-1:1:resolver:reply', role: 'agent', content: 'Here you go.', createdAt: 2 }],
    });

    const result = await new ResolverStage(engine, tickets, testCustomers(), prompts).run(ctxFor(resolved));

    expect(engine.requests).toHaveLength(0);
    expect(result.signal).toEqual({ type: 'resolution_outcome', outcome: 'resolved' });
    const ticket = await tickets.getTicket(SESSION_ID);
    expect(ticket?.status).toBe('resolved');
    expect(ticket?.messages.map((m) => m.id)).toEqual(['t-1:1:resolver:reply']);
  });

  it('works without a linked customer', async () => {
    const session = await seed({ issueType: 'general', urgency: 'low' });
    engine.script('resolver', resolvedReply('Here you go.'));

    await new ResolverStage(engine, tickets, testCustomers(), prompts).run(ctxFor(session));

    expect(engine.requests[0].context).toContain('Customer: unknown (no linked account)');
    expect(engine.requests[0].context).toContain('Retrieved articles: none');
  });
});

describe('EscalationStage', () => {
  it('writes the note and customer message and escalates', async () => {
    const session = await seed({ issueType: 'account', urgency: 'high', retrievalConfidence: 0.4 }, 'user-2');
    engine.script('escalation', escalationReply('We are sorry your account is blocked.'));

    const result = await new EscalationStage(engine, tickets, testCustomers(), prompts).run(ctxFor(session));

    expect(result.signal).toEqual({ type: 'escalation_complete' });
    expect(result.session.status).toBe('escalated');

    const [note, reply] = result.session.conversation.slice(-2);
    expect(note).toMatchObject({ id: 't-1:1:escalation:note', role: 'internal' });
    expect(note.content).toBe(
      [
        'ESCALATION NOTE',
        'Summary: Customer cannot complete the request',
        'Root cause hypothesis: Not covered by self-service',
        'Attempted: knowledge search',
        'Recommended action: Review manually',
        'Urgency: high',
        'Account status: BLOCKED',
      ].join('\n'),
    );
    expect(reply).toMatchObject({ id: 't-1:1:escalation:reply', role: 'agent' });
    expect(reply.content).toBe(
      'We are sorry your account is blocked.\n\n' +
        'Your ticket reference is t-1. A member of our support team will follow up within 4 hours.',
    );

    const ticket = await tickets.getTicket(SESSION_ID);
    expect(ticket?.status).toBe('escalated');
    expect(ticket?.tags).toContain('escalated');
  });

  it('only re-applies the ticket mirror for a session already escalated', async () => {
    await seed({ issueType: 'account', urgency: 'high' });
    const escalated = await store.commit(SESSION_ID, {
      set: { status: 'escalated', lastSignal: { type: 'escalation_complete' } },
      append: [
        { id: 't-1:1:escalation:note', role: 'internal', content: 'ESCALATION NOTE', createdAt: 2 },
        { id: 't-1:1:escalation:reply', role: 'agent', content: 'We are on it.', createdAt: 2 },
      ],
    });

    const result = await new EscalationStage(engine, tickets, testCustomers(), prompts).run(ctxFor(escalated));

    expect(engine.requests).toHaveLength(0);
    expect(result.signal).toEqual({ type: 'escalation_complete' });
    const ticket = await tickets.getTicket(SESSION_ID);
    expect(ticket?.status).toBe('escalated');
    expect(ticket?.tags).toEqual(['escalated']);
    expect(ticket?.messages.map((m) => m.id)).toEqual(['t-1:1:escalation:note', 't-1:1:escalation:reply']);
  });

  it('promises a 24 hour follow-up below high urgency', async () => {
    const session = await seed({ issueType: 'general', urgency: 'medium' });
    engine.script('escalation', escalationReply('Sorry about this.'));

    const result = await new EscalationStage(engine, tickets, testCustomers(), prompts).run(ctxFor(session));

    expect(result.session.conversation.at(-1)?.content).toBe(
      'Sorry about this.\n\nYour ticket reference is t-1. A member of our support team will follow up within 24 hours.',
    );
    expect(result.session.conversation.at(-2)?.content).toContain('Account status: unknown');
  });
});

describe('followUpWindow', () => {
  it('is 4 hours for high urgency and 24 hours otherwise', () => {
    expect(followUpWindow('high')).toBe('4 hours');
    expect(followUpWindow('medium')).toBe('24 hours');
    expect(followUpWindow('low')).toBe('24 hours');
    expect(followUpWindow(undefined)).toBe('24 hours');
  });
});
