import { EscalationEvaluator, HistoryEntry } from '../../src/escalation/escalation-evaluator';
import { questionSimilarity } from '../../src/escalation/similarity';
import { candidate } from '../helpers/candidates';

describe('EscalationEvaluator', () => {
  let evaluator: EscalationEvaluator;

  beforeEach(() => {
    evaluator = new EscalationEvaluator();
  });

  it('should not escalate a confident, reviewed answer', () => {
    expect(evaluator.evaluate(candidate(), [])).toEqual({ trigger: false });
  });

  it('should escalate below the confidence threshold and ask for contact first', () => {
    expect(evaluator.evaluate(candidate({ confidence: 0.49 }), [])).toEqual({
      trigger: true,
      reason: 'low_confidence',
      collectContact: true,
    });
  });

  it('should not ask for contact when an address is on file', () => {
    expect(evaluator.evaluate(candidate({ confidence: 0.2 }), [], 'user@example.com')).toEqual({
      trigger: true,
      reason: 'low_confidence',
      collectContact: false,
    });
  });

  it('should escalate a rejected answer immediately as a policy violation', () => {
    const decision = evaluator.evaluate(candidate({ verdict: 'reject', failure: 'policy_violation', confidence: 0 }), []);
    expect(decision).toEqual({ trigger: true, reason: 'policy_violation', collectContact: false });
  });

  it('should escalate a degraded answer immediately', () => {
    const decision = evaluator.evaluate(candidate({ verdict: 'reject', failure: 'service_degraded', confidence: 0 }), []);
    expect(decision).toEqual({ trigger: true, reason: 'service_degraded', collectContact: false });
  });

  it('should escalate explicit human requests', () => {
    const decision = evaluator.evaluate(
      candidate({ route: 'escalation_request', generated: false, confidence: 1, retrievedCount: 0 }),
      [],
    );
    expect(decision).toEqual({ trigger: true, reason: 'explicit_request', collectContact: true });
  });

  it('should apply the stricter threshold when nothing was retrieved', () => {
    expect(evaluator.evaluate(candidate({ retrievedCount: 0, confidence: 0.6 }), [])).toEqual({
      trigger: true,
      reason: 'no_knowledge_match',
      collectContact: true,
    });
    expect(evaluator.evaluate(candidate({ retrievedCount: 0, confidence: 0.7 }), [])).toEqual({ trigger: false });
    expect(evaluator.evaluate(candidate({ retrievedCount: 2, confidence: 0.6 }), [])).toEqual({ trigger: false });
  });

  it('should not apply the no-match threshold to conversational turns', () => {
    const decision = evaluator.evaluate(candidate({ route: 'conversational', retrievedCount: 0, confidence: 0.6 }), []);
    expect(decision).toEqual({ trigger: false });
  });

  it('should escalate the third asking of the same question', () => {
    const history: HistoryEntry[] = [
      { sender: 'user', content: 'How long does a refund take?' },
      { sender: 'ai', content: 'Refunds take 5 days.' },
      { sender: 'user', content: 'how long does the refund take' },
      { sender: 'ai', content: 'Refunds take 5 days.' },
    ];
    expect(evaluator.evaluate(candidate(), history)).toEqual({
      trigger: true,
      reason: 'repeated_unresolved_question',
      collectContact: true,
    });
  });

  it('should not count a question asked only twice', () => {
    const history: HistoryEntry[] = [
      { sender: 'user', content: 'How long does a refund take?' },
      { sender: 'ai', content: 'Refunds take 5 days.' },
    ];
    expect(evaluator.evaluate(candidate(), history)).toEqual({ trigger: false });
  });

  it('should ignore assistant messages and unrelated questions when counting repeats', () => {
    const history: HistoryEntry[] = [
      { sender: 'ai', content: 'How long does a refund take?' },
      { sender: 'user', content: 'How much is express shipping?' },
      { sender: 'ai', content: 'How long does a refund take?' },
    ];
    expect(evaluator.countRepeats('How long does a refund take?', history)).toBe(0);
  });

  it('should prefer a policy violation over every other reason', () => {
    const history: HistoryEntry[] = [
      { sender: 'user', content: 'How long does a refund take?' },
      { sender: 'user', content: 'How long does a refund take?' },
    ];
    const decision = evaluator.evaluate(
      candidate({ verdict: 'reject', failure: 'policy_violation', confidence: 0, retrievedCount: 0 }),
      history,
    );
    expect(decision.trigger && decision.reason).toBe('policy_violation');
  });

  it('should take per-call policy overrides', () => {
    const decision = evaluator.evaluate(candidate({ confidence: 0.75 }), [], undefined, { confidenceThreshold: 0.8 });
    expect(decision).toEqual({ trigger: true, reason: 'low_confidence', collectContact: true });
  });

  it('should not escalate fixed non-generated answers on confidence', () => {
    const decision = evaluator.evaluate(candidate({ route: 'math_query', generated: false, confidence: 1, retrievedCount: 0 }), []);
    expect(decision).toEqual({ trigger: false });
  });
});

describe('questionSimilarity', () => {
  it('should ignore case, punctuation and stop words', () => {
    expect(questionSimilarity('How long does a refund take?', 'how long does the refund take')).toBe(1);
  });

  it('should score unrelated questions low', () => {
    expect(questionSimilarity('How long does a refund take?', 'Where is my parcel')).toBe(0);
  });
});
