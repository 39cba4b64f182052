import { describe, it, expect } from 'vitest';
import { createSilentLogger } from '../../../utils/logger';
import { resolveCompilerOptions } from '../../compiler/options';
import { ParameterGenerator } from '../ParameterGenerator';
import { RepairStage, repairTargets } from '../RepairStage';
import { newsletterAddSubscriber, parameterSet, parsedRequest, slackSendMessage, stubModel } from '../../__tests__/fixtures';

function repairStage(maxRepairs: number, answer?: (prompt: string) => string): RepairStage {
  const logger = createSilentLogger();
  const generator = new ParameterGenerator({
    logger,
    options: resolveCompilerOptions({ allowModelInference: answer !== undefined }),
    model: answer ? stubModel(answer) : undefined,
  });
  return new RepairStage({ logger, generator, maxRepairs });
}

describe('repairTargets', () => {
  it('combines failing and unresolved names', () => {
    const set = parameterSet({ validationErrors: { a: 'missing', b: 'bad' }, unresolved: new Set(['b', 'c']) });
    expect(repairTargets(set)).toEqual(['a', 'b', 'c']);
  });
});

describe('RepairStage', () => {
  it('leaves passing parameters untouched', async () => {
    const sentinel = { source: 'literal', value: '#sentinel' } as const;
    const outcome = await repairStage(2).repair({
      action: slackSendMessage,
      request: parsedRequest({ literalParams: { channel: '#other', message: '' } }),
      variables: [],
      parameterSet: parameterSet({
        values: { channel: sentinel, message: { source: 'literal', value: '' } },
        validationErrors: { message: 'must be at least 1 characters' },
      }),
      repairCount: 0,
    });

    expect(outcome.kind).toBe('repaired');
    if (outcome.kind !== 'repaired') return;
    expect(outcome.targets).toEqual(['message']);
    expect(outcome.parameterSet.values.channel).toBe(sentinel);
    expect(outcome.parameterSet.values.message).toBeUndefined();
    expect(outcome.parameterSet.validationErrors).toEqual({ message: 'missing' });
    expect(outcome.parameterSet.rejected).toEqual({
      message: [{ value: { source: 'literal', value: '' }, reason: 'must be at least 1 characters' }],
    });
    expect(outcome.repairCount).toBe(1);
  });

  it('replaces a rejected value with a fresh inference', async () => {
    const outcome = await repairStage(1, () => '{"value": "jane@example.com"}').repair({
      action: newsletterAddSubscriber,
      request: parsedRequest({ literalParams: { email: 'not-an-email' } }),
      variables: [],
      parameterSet: parameterSet({
        values: { email: { source: 'literal', value: 'not-an-email' } },
        validationErrors: { email: 'invalid email format' },
      }),
      repairCount: 0,
    });

    expect(outcome).toMatchObject({
      kind: 'repaired',
      repairCount: 1,
      parameterSet: { values: { email: { source: 'inferred', value: 'jane@example.com' } }, validationErrors: {} },
    });
  });

  it('does not re-validate parameters outside the repair targets', async () => {
    const outcome = await repairStage(2).repair({
      action: slackSendMessage,
      request: parsedRequest({ literalParams: { message: 'hello' } }),
      variables: [],
      parameterSet: parameterSet({
        values: { channel: { source: 'literal', value: 'general' } },
        validationErrors: { message: 'missing' },
      }),
      repairCount: 0,
    });

    expect(outcome.kind === 'repaired' && outcome.parameterSet.validationErrors).toEqual({});
  });

  it('reports exhaustion once the budget is spent', async () => {
    const outcome = await repairStage(1).repair({
      action: newsletterAddSubscriber,
      request: parsedRequest(),
      variables: [],
      parameterSet: parameterSet({ validationErrors: { email: 'missing' }, unresolved: new Set(['email']) }),
      repairCount: 1,
    });

    expect(outcome).toEqual({ kind: 'exhausted', parameterErrors: { email: 'missing' }, repairCount: 1 });
  });
});
