// src/services/parameters/contextMatching.ts
import { ParameterSpec } from '../../models/action.model';
import { ContextVariable } from '../../models/context.model';
import { containsAllTokens, jaccard, nameKey, tokenize } from '../../utils/text';
import { ContextMatchWeights } from '../compiler/options';
import { Compatibility, compatibility } from './typeCompatibility';

/**
 * Name similarity between a parameter and a context variable:
 *   1.0  same name once case and separators are ignored
 *   0.8  variable is named like one of the parameter's aliases
 *   0.6  one name's tokens all appear in the other (`email` / `lead_email`)
 *   0.5 * token Jaccard overlap otherwise
 */
export function nameSimilarity(parameterName: string, spec: ParameterSpec, variableName: string): number {
  const variableKey = nameKey(variableName);
  if (nameKey(parameterName) === variableKey) return 1;
  if ((spec.aliases ?? []).some((alias) => nameKey(alias) === variableKey)) return 0.8;

  const parameterTokens = tokenize(parameterName);
  const variableTokens = tokenize(variableName);
  if (containsAllTokens(variableTokens, parameterTokens) || containsAllTokens(parameterTokens, variableTokens)) {
    return 0.6;
  }
  return 0.5 * jaccard(parameterTokens, variableTokens);
}

/** 1 when the variable can be passed as is, 0.5 when a transform step is needed */
export function typeScore(result: Compatibility): number {
  switch (result.kind) {
    case 'assignable':
      return 1;
    case 'coercible':
      return 0.5;
    case 'incompatible':
      return 0;
  }
}

export interface ContextMatch {
  variable: ContextVariable;
  score: number;
  nameScore: number;
  compatibility: Compatibility;
  catalogIndex: number;
}

export interface ContextMatchPolicy {
  weights: ContextMatchWeights;
  minScore: number;
}

/**
 * Context variables that could fill `parameterName`, best first.
 * Incompatible types and names with no similarity are never returned.
 * Ties go to the better name match, then to catalog order.
 */
export function rankContextMatches(
  parameterName: string,
  spec: ParameterSpec,
  variables: readonly ContextVariable[],
  policy: ContextMatchPolicy,
): ContextMatch[] {
  const matches: ContextMatch[] = [];
  variables.forEach((variable, catalogIndex) => {
    const result = compatibility(variable.type, spec.type);
    if (result.kind === 'incompatible') return;
    const nameScore = nameSimilarity(parameterName, spec, variable.name);
    if (nameScore === 0) return;
    const raw = policy.weights.name * nameScore + policy.weights.type * typeScore(result);
    const score = Math.round(raw * 1e6) / 1e6;
    if (score < policy.minScore) return;
    matches.push({ variable, score, nameScore, compatibility: result, catalogIndex });
  });

  return matches.sort(
    (a, b) => b.score - a.score || b.nameScore - a.nameScore || a.catalogIndex - b.catalogIndex,
  );
}
