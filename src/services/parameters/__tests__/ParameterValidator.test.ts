import { describe, it, expect } from 'vitest';
import { ParameterSchema } from '../../../models/action.model';
import { validateParameter, validateParameters } from '../ParameterValidator';
import { parameterSet } from '../../__tests__/fixtures';

const schema: ParameterSchema = {
  channel: { type: 'string', required: true, constraints: { pattern: '^#' } },
  title: { type: 'string', required: false, constraints: { minLength: 3, maxLength: 5 } },
  count: { type: 'integer', required: false, constraints: { minimum: 1, maximum: 10 } },
  amount: { type: 'number', required: false },
  status: { type: 'string', required: false, constraints: { enum: ['open', 'closed'] } },
  email: { type: 'email', required: false },
  link: { type: 'url', required: false },
  due: { type: 'date', required: false },
  tags: { type: 'array', required: false },
  notify: { type: 'boolean', required: false },
};

function reasonFor(name: string, value: string | number | boolean): string | null {
  return validateParameter(name, schema[name], parameterSet({ values: { [name]: { source: 'literal', value } } }));
}

describe('validateParameter', () => {
  it('reports a missing required parameter and ignores a missing optional one', () => {
    expect(validateParameter('channel', schema.channel, parameterSet())).toBe('missing');
    expect(validateParameter('title', schema.title, parameterSet())).toBeNull();
  });

  it('reports type mismatches', () => {
    expect(reasonFor('amount', '42')).toBe('expected number, got string');
    expect(reasonFor('count', 3.5)).toBe('expected integer, got float');
    expect(reasonFor('notify', 'true')).toBe('expected boolean, got string');
  });

  it('reports constraint violations', () => {
    expect(reasonFor('channel', 'general')).toBe('must match pattern ^#');
    expect(reasonFor('title', 'ab')).toBe('must be at least 3 characters');
    expect(reasonFor('title', 'abcdef')).toBe('must be at most 5 characters');
    expect(reasonFor('count', 0)).toBe('must be >= 1');
    expect(reasonFor('count', 11)).toBe('must be <= 10');
    expect(reasonFor('status', 'pending')).toBe('must be one of: open, closed');
  });

  it('reports format violations', () => {
    expect(reasonFor('email', 'not-an-email')).toBe('invalid email format');
    expect(reasonFor('link', 'not a url')).toBe('invalid url format');
    expect(reasonFor('due', 'next tuesday')).toBe('invalid date format');
  });

  it('accepts well-formed values', () => {
    expect(reasonFor('email', 'jane@example.com')).toBeNull();
    expect(reasonFor('link', 'https://example.com/a')).toBeNull();
    expect(reasonFor('due', '2024-05-01')).toBeNull();
    expect(reasonFor('due', '2024-05-01T09:30:00Z')).toBeNull();
    expect(reasonFor('status', 'open')).toBeNull();
  });

  it('checks inferred structured values', () => {
    const set = parameterSet({ values: { tags: { source: 'inferred', value: ['a', 'b'] } } });
    expect(validateParameter('tags', schema.tags, set)).toBeNull();

    const wrong = parameterSet({ values: { tags: { source: 'inferred', value: { a: 1 } } } });
    expect(validateParameter('tags', schema.tags, wrong)).toBe('expected array, got object');
  });

  it('checks only the type of context references', () => {
    const ok = parameterSet({ values: { count: { source: 'context', variable: 'total', variableType: 'number' } } });
    expect(validateParameter('count', schema.count, ok)).toBeNull();

    const bad = parameterSet({ values: { email: { source: 'context', variable: 'is_active', variableType: 'boolean' } } });
    expect(validateParameter('email', schema.email, bad)).toBe(
      'context variable "is_active" of type boolean cannot be used as email',
    );
  });
});

describe('validateParameters', () => {
  it('returns no errors for a complete, valid set', () => {
    const set = parameterSet({
      values: {
        channel: { source: 'literal', value: '#general' },
        count: { source: 'literal', value: 3 },
      },
    });
    expect(validateParameters(schema, set)).toEqual({});
  });

  it('collects one reason per failing parameter', () => {
    const set = parameterSet({ values: { count: { source: 'literal', value: 50 } } });
    expect(validateParameters(schema, set)).toEqual({ channel: 'missing', count: 'must be <= 10' });
  });

  it('checks only the requested names', () => {
    const set = parameterSet({ values: { count: { source: 'literal', value: 50 } } });
    expect(validateParameters(schema, set, ['count'])).toEqual({ count: 'must be <= 10' });
    expect(validateParameters(schema, set, ['title'])).toEqual({});
  });
});
