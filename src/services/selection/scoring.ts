// src/services/selection/scoring.ts
import { IntegrationAction, requiredParameterNames } from '../../models/action.model';
import { ContextVariable } from '../../models/context.model';
import { ParsedRequest } from '../../models/request.model';
import { jaccard, normalize, singularize, tokenize } from '../../utils/text';
import { ContextMatchPolicy, rankContextMatches } from '../parameters/contextMatching';
import { findLiteral } from '../parameters/literals';
import { ScoringWeights } from '../compiler/options';
import { DEFAULT_VOCABULARY, Vocabulary, canonicalOperation } from './vocabulary';

export function platformMatch(hint: string | null, platform: string): number {
  if (hint === null) return 0;
  return normalize(hint) === normalize(platform) ? 1 : 0;
}

/**
 * 1 for the same operation, 0.8 when it is the same after mapping synonyms
 * (`notify` / `send`), otherwise Jaccard overlap of the synonym-mapped tokens.
 */
export function operationSimilarity(
  hint: string | null,
  operation: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY,
): number {
  if (hint === null) return 0;
  const hintTokens = tokenize(hint);
  const operationTokens = tokenize(operation);
  if (hintTokens.join(' ') === operationTokens.join(' ')) return hintTokens.length > 0 ? 1 : 0;
  const hintCanonical = hintTokens.map((token) => canonicalOperation(token, vocabulary));
  const operationCanonical = operationTokens.map((token) => canonicalOperation(token, vocabulary));
  if (hintCanonical.length > 0 && hintCanonical.join(' ') === operationCanonical.join(' ')) return 0.8;
  return jaccard(hintCanonical, operationCanonical);
}

export function entityMatch(hint: string | null, entityType: string): number {
  if (hint === null) return 0;
  const hintTokens = tokenize(hint).map(singularize);
  const entityTokens = tokenize(entityType).map(singularize);
  if (hintTokens.length === 0 || entityTokens.length === 0) return 0;
  if (hintTokens.join(' ') === entityTokens.join(' ')) return 1;
  return hintTokens.some((token) => entityTokens.includes(token)) ? 0.5 : 0;
}

export interface CoverageResult {
  covered: number;
  required: number;
  /** 1 when the action has no required parameters */
  ratio: number;
}

/** Required parameters that a literal hint or a compatible context variable could fill */
export function requiredCoverage(
  action: IntegrationAction,
  request: ParsedRequest,
  variables: readonly ContextVariable[],
  policy: ContextMatchPolicy,
): CoverageResult {
  const required = requiredParameterNames(action.parameterSchema);
  if (required.length === 0) return { covered: 0, required: 0, ratio: 1 };
  const covered = required.filter((name) => {
    const spec = action.parameterSchema[name];
    if (findLiteral(name, spec, request.literalParams) !== undefined) return true;
    return rankContextMatches(name, spec, variables, policy).length > 0;
  }).length;
  return { covered, required: required.length, ratio: covered / required.length };
}

export interface ActionScore {
  score: number;
  matchedSignals: string[];
  unresolvedRequired: number;
}

export function scoreAction(
  action: IntegrationAction,
  request: ParsedRequest,
  variables: readonly ContextVariable[],
  weights: ScoringWeights,
  contextPolicy: ContextMatchPolicy,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY,
): ActionScore {
  const platform = platformMatch(request.platformHint, action.platform);
  const operation = operationSimilarity(request.operationHint, action.operation, vocabulary);
  const entity = entityMatch(request.entityTypeHint, action.entityType);
  const coverage = requiredCoverage(action, request, variables, contextPolicy);

  const matchedSignals: string[] = [];
  if (platform > 0) matchedSignals.push(`platform:${action.platform}`);
  if (operation === 1) matchedSignals.push(`operation:${action.operation}`);
  else if (operation > 0) matchedSignals.push(`operation:${request.operationHint ?? ''}~${action.operation}`);
  if (entity > 0) matchedSignals.push(`entity:${action.entityType}`);
  if (coverage.required > 0) matchedSignals.push(`coverage:${coverage.covered}/${coverage.required}`);

  const score =
    weights.platform * platform +
    weights.operation * operation +
    weights.entity * entity +
    weights.coverage * coverage.ratio;

  return {
    score: Math.round(score * 1e6) / 1e6,
    matchedSignals,
    unresolvedRequired: coverage.required - coverage.covered,
  };
}
