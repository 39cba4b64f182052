// src/services/selection/ActionSelector.ts
import { ContextVariable } from '../../models/context.model';
import { ParsedRequest } from '../../models/request.model';
import { ActionCandidate, SelectionResult } from '../../models/run.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { ActionCatalog } from '../catalog/ActionCatalog';
import { CompilerOptions } from '../compiler/options';
import { scoreAction } from './scoring';
import { DEFAULT_VOCABULARY, Vocabulary } from './vocabulary';

export interface ActionSelectorConfig extends ServiceConfig {
  catalog: ActionCatalog;
  options: CompilerOptions;
  vocabulary?: Vocabulary;
}

export type AmbiguityReason = 'no_candidates' | 'below_confidence' | 'insufficient_margin';

/** Score desc, then fewer unresolved required parameters, then catalog order */
export function compareCandidates(a: ActionCandidate, b: ActionCandidate): number {
  return b.score - a.score || a.unresolvedRequired - b.unresolvedRequired || a.catalogIndex - b.catalogIndex;
}

export class ActionSelector extends BaseService {
  private readonly catalog: ActionCatalog;
  private readonly options: CompilerOptions;
  private readonly vocabulary: Vocabulary;

  constructor(config: ActionSelectorConfig) {
    super(config);
    this.catalog = config.catalog;
    this.options = config.options;
    this.vocabulary = config.vocabulary ?? DEFAULT_VOCABULARY;
  }

  /** Every catalog action scored against the request, best first */
  public rank(request: ParsedRequest, variables: readonly ContextVariable[]): ActionCandidate[] {
    const policy = { weights: this.options.contextMatchWeights, minScore: this.options.minContextMatch };
    return this.catalog
      .getAll()
      .map((action, catalogIndex) => ({
        action,
        catalogIndex,
        ...scoreAction(action, request, variables, this.options.weights, policy, this.vocabulary),
      }))
      .sort(compareCandidates);
  }

  public select(request: ParsedRequest, variables: readonly ContextVariable[]): SelectionResult {
    const ranked = this.rank(request, variables);
    const [best, runnerUp] = ranked;
    const runnerUpScore = runnerUp?.score ?? 0;

    let reason: AmbiguityReason | null = null;
    if (!best || best.score <= 0) {
      reason = 'no_candidates';
    } else if (best.score < this.options.minConfidence) {
      reason = 'below_confidence';
    } else if (best.score <= runnerUpScore || best.score - runnerUpScore < this.options.minMargin - 1e-9) {
      reason = 'insufficient_margin';
    }

    if (best && reason === null) {
      this.logger.info('ActionSelector: Selected action', {
        actionId: best.action.id,
        score: best.score,
        runnerUp: runnerUp?.action.id ?? null,
        runnerUpScore,
        matchedSignals: best.matchedSignals,
      });
      return { kind: 'selected', candidate: best, ranked };
    }

    const candidates = ranked
      .filter((candidate) => candidate.score > 0)
      .slice(0, this.options.clarificationTopK);

    this.logger.info('ActionSelector: Selection is ambiguous', {
      reason,
      candidates: candidates.map((candidate) => ({ id: candidate.action.id, score: candidate.score })),
    });
    return { kind: 'ambiguous', reason: reason ?? 'no_candidates', candidates };
  }
}
