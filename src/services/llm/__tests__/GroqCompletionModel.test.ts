import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('groq-sdk', () => {
  class APIConnectionTimeoutError extends Error {
    constructor({ message }: { message?: string } = {}) {
      super(message ?? 'Request timed out.');
    }
  }
  class Groq {
    static APIConnectionTimeoutError = APIConnectionTimeoutError;
    chat = { completions: { create } };
  }
  return { default: Groq };
});

import Groq from 'groq-sdk';
import { createSilentLogger } from '../../../utils/logger';
import { ModelCallError } from '../../errors';
import { GroqCompletionModel } from '../GroqCompletionModel';

function model(): GroqCompletionModel {
  return new GroqCompletionModel({
    logger: createSilentLogger(),
    apiKey: 'test-secret',
    model: 'test-model',
    maxTokens: 256,
  });
}

describe('GroqCompletionModel', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('requires an API key', () => {
    expect(
      () => new GroqCompletionModel({ logger: createSilentLogger(), apiKey: '', model: 'm', maxTokens: 1 }),
    ).toThrow('GROQ_API_KEY is required for GroqCompletionModel');
  });

  it('sends a deterministic JSON-mode request with the caller timeout', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '{"value": 1}' } }], usage: { total_tokens: 12 } });
    const controller = new AbortController();

    const text = await model().complete('prompt text', { timeoutMs: 2500, signal: controller.signal });

    expect(text).toBe('{"value": 1}');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'test-model',
        messages: [{ role: 'user', content: 'prompt text' }],
        temperature: 0,
        max_tokens: 256,
        response_format: { type: 'json_object' },
        stream: false,
      },
      { timeout: 2500, signal: controller.signal, maxRetries: 0 },
    );
  });

  it('returns an empty string when the model sends no content', async () => {
    create.mockResolvedValue({ choices: [] });
    await expect(model().complete('p', { timeoutMs: 10 })).resolves.toBe('');
  });

  it('wraps transport errors in ModelCallError', async () => {
    create.mockRejectedValue(new Error('connection reset'));

    const error = await model()
      .complete('p', { timeoutMs: 10 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error).toMatchObject({ message: 'Groq API error: connection reset', timedOut: false });
  });

  it('marks timeouts', async () => {
    create.mockRejectedValue(new Groq.APIConnectionTimeoutError({ message: 'Request timed out.' }));

    const error = await model()
      .complete('p', { timeoutMs: 10 })
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ kind: 'ModelCallError', timedOut: true });
  });
});
