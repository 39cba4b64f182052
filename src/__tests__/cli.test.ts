import { describe, it, expect } from 'vitest';
import { exitCodeFor } from '../cli';
import { parsedRequest } from '../services/__tests__/fixtures';

describe('exitCodeFor', () => {
  const base = { runId: 'run_test', transitions: [] };

  it('maps each outcome to its exit code', () => {
    expect(
      exitCodeFor({
        ...base,
        outcome: 'workflow',
        workflow: { actionId: 'a', parameters: {}, transformSteps: [] },
        summary: { explanation: '', unusedOptionalParameters: [], parameterSources: {} },
      }),
    ).toBe(0);
    expect(
      exitCodeFor({
        ...base,
        outcome: 'clarification',
        clarification: { reason: 'no_candidates', question: '?', candidates: [], parsedRequest: parsedRequest() },
      }),
    ).toBe(2);
    expect(exitCodeFor({ ...base, outcome: 'error', error: { kind: 'ParseFailure', reason: 'x' } })).toBe(1);
  });
});
