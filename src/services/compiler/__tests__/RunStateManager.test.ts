import { describe, it, expect } from 'vitest';
import { RunStateManager } from '../RunStateManager';
import { parsedRequest, slackSendMessage } from '../../__tests__/fixtures';

describe('RunStateManager', () => {
  it('creates a run in PARSE with a unique id', () => {
    const first = RunStateManager.createRunState();
    const second = RunStateManager.createRunState();

    expect(first).toMatchObject({ status: 'PARSE', repairCount: 0, transitions: ['PARSE'] });
    expect(first.runId).not.toBe(second.runId);
  });

  it('summarizes the parameter state', () => {
    const state = RunStateManager.createRunState();
    state.selectedAction = slackSendMessage;
    state.parameterSet = {
      values: { channel: { source: 'literal', value: '#general' } },
      unresolved: new Set(['message']),
      validationErrors: { message: 'missing' },
      rejected: {},
    };

    expect(RunStateManager.summarize(state)).toEqual({
      platformHint: null,
      selectedActionId: 'slack.send_message',
      repairCount: 0,
      resolvedParameters: ['channel'],
      unresolved: ['message'],
      failingParameters: ['message'],
    });
  });

  it('asks an open question when there are no candidates', () => {
    const clarification = RunStateManager.buildClarification('no_candidates', [], parsedRequest());

    expect(clarification.question).toBe(
      'No known action matches this request. Which platform and operation did you mean?',
    );
    expect(clarification.candidates).toEqual([]);
  });

  it('reports a terminal state without a result as an error', () => {
    const state = RunStateManager.createRunState();
    state.status = 'FINALIZE';

    expect(RunStateManager.toResult(state)).toMatchObject({
      outcome: 'error',
      error: { kind: 'AssemblyInvariantViolation', reason: 'Run ended in FINALIZE without a result' },
    });
  });
});
