import { createStageRouter, nextStep } from '../../src/routing/stage-router';
import { InvalidTransitionError } from '../../src/orchestrator/errors';
import { RoutingSignal } from '../../src/routing/types';
import { URGENCY_LEVELS, Urgency } from '../../src/config/types';

const retrieval = (confidence: number): RoutingSignal => ({ type: 'retrieval_result', confidence, articlesFound: 1 });

describe('nextStep', () => {
  it('routes Classified to the retriever regardless of urgency', () => {
    for (const urgency of URGENCY_LEVELS) {
      expect(
        nextStep({ sessionId: 's-1', urgency }, { type: 'classified', issueType: 'login', urgency }),
      ).toEqual({ kind: 'stage', stage: 'retriever' });
    }
  });

  it('routes Classified to the retriever even before urgency is stored', () => {
    expect(
      nextStep({ sessionId: 's-1' }, { type: 'classified', issueType: 'general', urgency: 'low' }),
    ).toEqual({ kind: 'stage', stage: 'retriever' });
  });

  describe('high urgency threshold', () => {
    const session = { sessionId: 's-high', urgency: 'high' as const };

    const cases: Array<[number, string]> = [
      [0.74, 'escalation'],
      [0.75, 'resolver'],
      [0.76, 'resolver'],
    ];

    it.each(cases)('confidence %p -> %s', (confidence, stage) => {
      expect(nextStep(session, retrieval(confidence))).toEqual({ kind: 'stage', stage });
    });
  });

  describe('medium and low urgency threshold', () => {
    const cases: Array<[Urgency, number, string]> = [
      ['medium', 0.59, 'escalation'],
      ['medium', 0.6, 'resolver'],
      ['medium', 0.61, 'resolver'],
      ['low', 0.59, 'escalation'],
      ['low', 0.6, 'resolver'],
      ['low', 0.61, 'resolver'],
    ];

    it.each(cases)('%s urgency, confidence %p -> %s', (urgency, confidence, stage) => {
      expect(nextStep({ sessionId: 's-std', urgency }, retrieval(confidence))).toEqual({ kind: 'stage', stage });
    });
  });

  it('rejects a retrieval result when urgency is unset', () => {
    expect(() => nextStep({ sessionId: 's-2' }, retrieval(0.9))).toThrow(InvalidTransitionError);
  });

  it.each([-0.1, 1.01, Number.NaN])('rejects confidence %p', (confidence) => {
    expect(() => nextStep({ sessionId: 's-3', urgency: 'low' }, retrieval(confidence))).toThrow(
      InvalidTransitionError,
    );
  });

  it('ends resolved on a resolved outcome', () => {
    expect(
      nextStep({ sessionId: 's-4', urgency: 'low' }, { type: 'resolution_outcome', outcome: 'resolved' }),
    ).toEqual({ kind: 'terminal', outcome: 'resolved' });
  });

  it('sends needs_escalation to the escalation stage', () => {
    expect(
      nextStep({ sessionId: 's-5', urgency: 'low' }, { type: 'resolution_outcome', outcome: 'needs_escalation' }),
    ).toEqual({ kind: 'stage', stage: 'escalation' });
  });

  it('ends escalated after escalation completes', () => {
    expect(nextStep({ sessionId: 's-6', urgency: 'high' }, { type: 'escalation_complete' })).toEqual({
      kind: 'terminal',
      outcome: 'escalated',
    });
  });

  it('rejects an unknown signal', () => {
    const bogus = JSON.parse('{"type":"rerouted"}');
    expect(() => nextStep({ sessionId: 's-7' }, bogus)).toThrow(/unknown signal/);
  });
});

describe('createStageRouter', () => {
  it('applies custom thresholds', () => {
    const route = createStageRouter({ highUrgency: 0.9, standard: 0.5 });
    expect(route({ sessionId: 's', urgency: 'high' }, retrieval(0.85))).toEqual({ kind: 'stage', stage: 'escalation' });
    expect(route({ sessionId: 's', urgency: 'low' }, retrieval(0.5))).toEqual({ kind: 'stage', stage: 'resolver' });
  });

  it('refuses a high-urgency bar below the standard bar', () => {
    expect(() => createStageRouter({ highUrgency: 0.5, standard: 0.6 })).toThrow(/must not be below/);
  });
});
