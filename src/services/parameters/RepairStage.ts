// src/services/parameters/RepairStage.ts
import { ContextVariable } from '../../models/context.model';
import { IntegrationAction } from '../../models/action.model';
import { ParsedRequest } from '../../models/request.model';
import { ParameterSet } from '../../models/run.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { ParameterGenerator, cloneParameterSet } from './ParameterGenerator';
import { validateParameters } from './ParameterValidator';

export interface RepairStageConfig extends ServiceConfig {
  generator: ParameterGenerator;
  maxRepairs: number;
}

export interface RepairInput {
  action: IntegrationAction;
  request: ParsedRequest;
  variables: readonly ContextVariable[];
  parameterSet: ParameterSet;
  repairCount: number;
  signal?: AbortSignal;
}

export type RepairOutcome =
  | { kind: 'repaired'; parameterSet: ParameterSet; repairCount: number; targets: string[] }
  | { kind: 'exhausted'; parameterErrors: Record<string, string>; repairCount: number };

/** Names a repair cycle regenerates: failing validation or unresolved */
export function repairTargets(parameterSet: ParameterSet): string[] {
  const names = new Set([...Object.keys(parameterSet.validationErrors), ...parameterSet.unresolved]);
  return [...names];
}

/**
 * One bounded regenerate-then-validate pass over the failing parameters.
 * Parameters that currently pass are neither regenerated nor re-validated.
 */
export class RepairStage extends BaseService {
  private readonly generator: ParameterGenerator;
  private readonly maxRepairs: number;

  constructor(config: RepairStageConfig) {
    super(config);
    this.generator = config.generator;
    this.maxRepairs = config.maxRepairs;
  }

  public async repair(input: RepairInput): Promise<RepairOutcome> {
    if (input.repairCount >= this.maxRepairs) {
      return {
        kind: 'exhausted',
        parameterErrors: { ...input.parameterSet.validationErrors },
        repairCount: input.repairCount,
      };
    }

    const targets = repairTargets(input.parameterSet);
    const withHistory = cloneParameterSet(input.parameterSet);
    for (const name of targets) {
      const current = withHistory.values[name];
      if (!current) continue;
      withHistory.rejected[name] = [
        ...(withHistory.rejected[name] ?? []),
        { value: current, reason: withHistory.validationErrors[name] ?? 'unresolved' },
      ];
    }

    const regenerated = await this.generator.generate({
      action: input.action,
      request: input.request,
      variables: input.variables,
      parameterSet: withHistory,
      targets,
      signal: input.signal,
    });

    const targetErrors = validateParameters(input.action.parameterSchema, regenerated, targets);
    const validationErrors = { ...regenerated.validationErrors };
    for (const name of targets) delete validationErrors[name];
    Object.assign(validationErrors, targetErrors);

    const repairCount = input.repairCount + 1;
    this.logger.info('RepairStage: Repair cycle completed', {
      actionId: input.action.id,
      repairCount,
      targets,
      remainingErrors: validationErrors,
    });

    return { kind: 'repaired', parameterSet: { ...regenerated, validationErrors }, repairCount, targets };
  }
}
