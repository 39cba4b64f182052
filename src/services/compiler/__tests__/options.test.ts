import { describe, it, expect } from 'vitest';
import { DEFAULT_COMPILER_OPTIONS, resolveCompilerOptions } from '../options';

describe('resolveCompilerOptions', () => {
  it('returns the defaults when nothing is given', () => {
    expect(resolveCompilerOptions()).toEqual(DEFAULT_COMPILER_OPTIONS);
  });

  it('merges partial weights with the defaults', () => {
    const options = resolveCompilerOptions({ weights: { platform: 0.5 }, maxRepairs: 4 });

    expect(options.weights).toEqual({ platform: 0.5, operation: 0.3, entity: 0.2, coverage: 0.1 });
    expect(options.contextMatchWeights).toEqual({ name: 0.7, type: 0.3 });
    expect(options.maxRepairs).toBe(4);
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveCompilerOptions({ maxRepairs: -1 })).toThrow(/maxRepairs/);
    expect(() => resolveCompilerOptions({ clarificationTopK: 1.5 })).toThrow(/clarificationTopK/);
    expect(() => resolveCompilerOptions({ weights: { entity: -0.2 } })).toThrow(/weights\.entity/);
  });
});
