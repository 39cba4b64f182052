// src/services/parameters/ParameterGenerator.ts
import { z } from 'zod';
import { IntegrationAction, ParameterSpec } from '../../models/action.model';
import { ContextVariable } from '../../models/context.model';
import { ParsedRequest } from '../../models/request.model';
import { ParameterSet, RejectedValue, ResolvedValue } from '../../models/run.model';
import { JsonValue } from '../../types/json';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { CompilerOptions } from '../compiler/options';
import { extractJson, jsonValueSchema } from '../llm/json';
import { PARAMETER_INFERENCE_PROMPT_TEMPLATE } from '../llm/prompts/parameterInferencePrompt';
import { CompletionModel } from '../llm/types';
import { rankContextMatches } from './contextMatching';
import { coerceLiteral, findLiteral } from './literals';

export interface ParameterGeneratorConfig extends ServiceConfig {
  options: CompilerOptions;
  /** Only consulted when `options.allowModelInference` is set */
  model?: CompletionModel;
}

export interface GenerateInput {
  action: IntegrationAction;
  request: ParsedRequest;
  variables: readonly ContextVariable[];
  parameterSet: ParameterSet;
  /** Parameters to (re)generate; every other entry of the set is left as it is */
  targets: readonly string[];
  signal?: AbortSignal;
}

const inferenceResponseSchema = z.object({ value: jsonValueSchema.nullable() });

export function cloneParameterSet(parameterSet: ParameterSet): ParameterSet {
  return {
    values: { ...parameterSet.values },
    unresolved: new Set(parameterSet.unresolved),
    validationErrors: { ...parameterSet.validationErrors },
    rejected: Object.fromEntries(
      Object.entries(parameterSet.rejected).map(([name, history]) => [name, [...history]]),
    ),
  };
}

function sameValue(a: ResolvedValue, b: ResolvedValue): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export class ParameterGenerator extends BaseService {
  private readonly options: CompilerOptions;
  private readonly model?: CompletionModel;

  constructor(config: ParameterGeneratorConfig) {
    super(config);
    this.options = config.options;
    this.model = config.model;
  }

  /**
   * Resolves each target parameter from, in order: a literal in the request,
   * the best matching context variable, model inference (when enabled).
   * Values already rejected for a parameter are skipped. A required parameter
   * nothing can fill is marked unresolved; an optional one is left out.
   */
  public async generate(input: GenerateInput): Promise<ParameterSet> {
    const next = cloneParameterSet(input.parameterSet);
    const targets = new Set(input.targets);
    const schema = input.action.parameterSchema;

    for (const [name, spec] of Object.entries(schema)) {
      if (!targets.has(name)) continue;
      const rejected = next.rejected[name] ?? [];
      const resolved = await this.resolve(name, spec, input, rejected);

      delete next.validationErrors[name];
      if (resolved) {
        next.values[name] = resolved;
        next.unresolved.delete(name);
      } else {
        delete next.values[name];
        if (spec.required) next.unresolved.add(name);
        else next.unresolved.delete(name);
      }
    }

    this.logger.debug('ParameterGenerator: Generated parameters', {
      actionId: input.action.id,
      targets: [...targets],
      resolved: [...targets].filter((name) => next.values[name] !== undefined),
      unresolved: [...next.unresolved],
    });
    return next;
  }

  private async resolve(
    name: string,
    spec: ParameterSpec,
    input: GenerateInput,
    rejected: readonly RejectedValue[],
  ): Promise<ResolvedValue | null> {
    const isFresh = (candidate: ResolvedValue) => !rejected.some((entry) => sameValue(entry.value, candidate));

    const literal = findLiteral(name, spec, input.request.literalParams);
    if (literal !== undefined) {
      const candidate: ResolvedValue = { source: 'literal', value: coerceLiteral(literal, spec.type) };
      if (isFresh(candidate)) return candidate;
    }

    const matches = rankContextMatches(name, spec, input.variables, {
      weights: this.options.contextMatchWeights,
      minScore: this.options.minContextMatch,
    });
    for (const match of matches) {
      const candidate: ResolvedValue = {
        source: 'context',
        variable: match.variable.name,
        variableType: match.variable.type,
      };
      if (isFresh(candidate)) return candidate;
    }

    if (this.options.allowModelInference && this.model) {
      const value = await this.infer(name, spec, input, rejected);
      if (value !== null) {
        const candidate: ResolvedValue = { source: 'inferred', value };
        if (isFresh(candidate)) return candidate;
      }
    }
    return null;
  }

  /** Model errors propagate as ModelCallError; an unusable answer counts as no value */
  private async infer(
    name: string,
    spec: ParameterSpec,
    input: GenerateInput,
    rejected: readonly RejectedValue[],
  ): Promise<JsonValue | null> {
    const model = this.model;
    if (!model) return null;

    const rejectedSection =
      rejected.length > 0
        ? `Previously rejected values (do not repeat them):\n${rejected
            .map((entry) => `- ${JSON.stringify(entry.value)}: ${entry.reason}`)
            .join('\n')}\n`
        : '';
    const prompt = PARAMETER_INFERENCE_PROMPT_TEMPLATE.replace('{{RAW_TEXT}}', () => input.request.rawText)
      .replace('{{ACTION_ID}}', () => input.action.id)
      .replace('{{PARAMETER_NAME}}', () => name)
      .replace('{{PARAMETER_TYPE}}', () => spec.type)
      .replace('{{PARAMETER_DESCRIPTION}}', () => spec.description ?? 'n/a')
      .replace('{{PARAMETER_CONSTRAINTS}}', () => JSON.stringify(spec.constraints ?? {}))
      .replace('{{REJECTED_SECTION}}', () => rejectedSection);

    const text = await model.complete(prompt, { timeoutMs: this.options.modelTimeoutMs, signal: input.signal });
    const parsed = inferenceResponseSchema.safeParse(extractJson(text));
    if (!parsed.success) {
      this.logger.warn('ParameterGenerator: Ignoring malformed inference response', {
        actionId: input.action.id,
        parameter: name,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return null;
    }
    return parsed.data.value;
  }
}
