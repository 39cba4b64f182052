// src/services/compiler/RunStateManager.ts
import { v4 as uuidv4 } from 'uuid';
import { ParsedRequest } from '../../models/request.model';
import {
  ActionCandidate,
  ClarificationRequest,
  CompileResult,
  ParameterSet,
  RunState,
  RunStateSummary,
} from '../../models/run.model';

/**
 * Lifecycle helpers for RunState objects. A RunState lives only inside one
 * `compile` call; nothing here keeps a reference to it.
 */
export class RunStateManager {
  public static createRunState(): RunState {
    return {
      runId: `run_${uuidv4()}`,
      status: 'PARSE',
      repairCount: 0,
      transitions: ['PARSE'],
    };
  }

  public static emptyParameterSet(): ParameterSet {
    return { values: {}, unresolved: new Set(), validationErrors: {}, rejected: {} };
  }

  /** Compact view of a run, attached to transition events and logs */
  public static summarize(state: RunState): RunStateSummary {
    const parameterSet = state.parameterSet;
    return {
      platformHint: state.parsedRequest?.platformHint ?? null,
      selectedActionId: state.selectedAction?.id ?? null,
      repairCount: state.repairCount,
      resolvedParameters: parameterSet ? Object.keys(parameterSet.values) : [],
      unresolved: parameterSet ? [...parameterSet.unresolved] : [],
      failingParameters: parameterSet ? Object.keys(parameterSet.validationErrors) : [],
    };
  }

  public static buildClarification(
    reason: string,
    candidates: readonly ActionCandidate[],
    parsedRequest: ParsedRequest,
  ): ClarificationRequest {
    const options = candidates.map((candidate) => ({
      actionId: candidate.action.id,
      platform: candidate.action.platform,
      operation: candidate.action.operation,
      entityType: candidate.action.entityType,
      score: candidate.score,
      matchedSignals: [...candidate.matchedSignals],
    }));

    const question =
      options.length === 0
        ? 'No known action matches this request. Which platform and operation did you mean?'
        : `Which action did you mean: ${options
            .map((option) => `${option.actionId} (${option.operation} ${option.entityType} on ${option.platform})`)
            .join(', ')}?`;

    return { reason, question, candidates: options, parsedRequest };
  }

  /** Final result for a run in a terminal status */
  public static toResult(state: RunState): CompileResult {
    const base = { runId: state.runId, transitions: [...state.transitions] };
    if (state.status === 'FINALIZE' && state.workflow && state.summary) {
      return { ...base, outcome: 'workflow', workflow: state.workflow, summary: state.summary };
    }
    if (state.status === 'CLARIFY' && state.clarification) {
      return { ...base, outcome: 'clarification', clarification: state.clarification };
    }
    return {
      ...base,
      outcome: 'error',
      error: state.failure ?? {
        kind: 'AssemblyInvariantViolation',
        reason: `Run ended in ${state.status} without a result`,
      },
    };
  }
}
