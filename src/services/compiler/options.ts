// src/services/compiler/options.ts
import { z } from 'zod';

/**
 * Tunable policy for a compiler instance. Every value here has a default;
 * none of them is meant to be a single correct constant.
 */
export interface ScoringWeights {
  platform: number;
  operation: number;
  entity: number;
  coverage: number;
}

export interface ContextMatchWeights {
  name: number;
  type: number;
}

export interface CompilerOptions {
  weights: ScoringWeights;
  /** Winner must score at least this */
  minConfidence: number;
  /** Winner must beat the runner-up by at least this */
  minMargin: number;
  clarificationTopK: number;
  contextMatchWeights: ContextMatchWeights;
  minContextMatch: number;
  maxRepairs: number;
  allowModelInference: boolean;
  modelTimeoutMs: number;
}

export const DEFAULT_COMPILER_OPTIONS: CompilerOptions = {
  weights: { platform: 0.4, operation: 0.3, entity: 0.2, coverage: 0.1 },
  minConfidence: 0.5,
  minMargin: 0.1,
  clarificationTopK: 3,
  contextMatchWeights: { name: 0.7, type: 0.3 },
  minContextMatch: 0.5,
  maxRepairs: 2,
  allowModelInference: false,
  modelTimeoutMs: 15000,
};

const weight = z.number().min(0);

const compilerOptionsSchema = z.object({
  weights: z.object({ platform: weight, operation: weight, entity: weight, coverage: weight }),
  minConfidence: z.number().min(0).max(1),
  minMargin: z.number().min(0).max(1),
  clarificationTopK: z.number().int().min(1),
  contextMatchWeights: z.object({ name: weight, type: weight }),
  minContextMatch: z.number().min(0).max(1),
  maxRepairs: z.number().int().min(0),
  allowModelInference: z.boolean(),
  modelTimeoutMs: z.number().int().positive(),
});

export type CompilerOptionsInput = Partial<Omit<CompilerOptions, 'weights' | 'contextMatchWeights'>> & {
  weights?: Partial<ScoringWeights>;
  contextMatchWeights?: Partial<ContextMatchWeights>;
};

export function resolveCompilerOptions(input: CompilerOptionsInput = {}): CompilerOptions {
  const merged: CompilerOptions = {
    ...DEFAULT_COMPILER_OPTIONS,
    ...input,
    weights: { ...DEFAULT_COMPILER_OPTIONS.weights, ...input.weights },
    contextMatchWeights: { ...DEFAULT_COMPILER_OPTIONS.contextMatchWeights, ...input.contextMatchWeights },
  };
  const parsed = compilerOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid compiler options: ${issues}`);
  }
  return parsed.data;
}
