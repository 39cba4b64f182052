import { describe, it, expect } from 'vitest';
import { jaccard, nameKey, normalize, singularize, tokenize } from '../text';

describe('text helpers', () => {
  it('normalizes case, camelCase and separators', () => {
    expect(normalize('leadScore')).toBe('lead score');
    expect(normalize('  Google-Calendar!! ')).toBe('google calendar');
    expect(tokenize('')).toEqual([]);
    expect(nameKey('Lead Email')).toBe('lead_email');
  });

  it('singularizes common plurals', () => {
    expect(singularize('tickets')).toBe('ticket');
    expect(singularize('entries')).toBe('entry');
    expect(singularize('address')).toBe('address');
    expect(singularize('bus')).toBe('bus');
  });

  it('computes Jaccard overlap', () => {
    expect(jaccard(['a', 'b'], ['b', 'c'])).toBeCloseTo(1 / 3);
    expect(jaccard([], [])).toBe(0);
  });
});
