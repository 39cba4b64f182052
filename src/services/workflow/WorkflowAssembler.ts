// src/services/workflow/WorkflowAssembler.ts
import { IntegrationAction, requiredParameterNames } from '../../models/action.model';
import { ParameterSet } from '../../models/run.model';
import { ParameterSource, TransformStep, WorkflowDefinition, WorkflowSummary } from '../../models/workflow.model';
import { JsonValue } from '../../types/json';
import { AssemblyInvariantViolation } from '../errors';
import { compatibility } from '../parameters/typeCompatibility';

export interface AssembledWorkflow {
  workflow: WorkflowDefinition;
  summary: WorkflowSummary;
}

export function transformStepId(parameter: string): string {
  return `transform_${parameter}`;
}

export function stepOutputRef(stepId: string): string {
  return `{{steps.${stepId}.output}}`;
}

export function variableRef(variable: string): string {
  return `{{${variable}}}`;
}

function assertComplete(action: IntegrationAction, parameterSet: ParameterSet): void {
  const errors = Object.keys(parameterSet.validationErrors);
  if (errors.length > 0) {
    throw new AssemblyInvariantViolation(`Cannot assemble ${action.id}: invalid parameters ${errors.join(', ')}`);
  }
  if (parameterSet.unresolved.size > 0) {
    throw new AssemblyInvariantViolation(
      `Cannot assemble ${action.id}: unresolved parameters ${[...parameterSet.unresolved].join(', ')}`,
    );
  }
  const missing = requiredParameterNames(action.parameterSchema).filter((name) => !parameterSet.values[name]);
  if (missing.length > 0) {
    throw new AssemblyInvariantViolation(`Cannot assemble ${action.id}: missing required ${missing.join(', ')}`);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function explain(
  action: IntegrationAction,
  sources: Record<string, ParameterSource>,
  steps: readonly TransformStep[],
  unused: readonly string[],
): string {
  const parts = [`Run ${action.operation} on ${action.platform} ${action.entityType} (${action.id}).`];
  const byOrigin = (origin: ParameterSource) =>
    Object.keys(sources).filter((name) => sources[name] === origin);

  const literal = byOrigin('literal');
  const context = byOrigin('context');
  const inferred = byOrigin('inferred');
  if (literal.length > 0) parts.push(`From the request: ${literal.join(', ')}.`);
  if (context.length > 0) parts.push(`From context: ${context.join(', ')}.`);
  if (inferred.length > 0) parts.push(`Inferred: ${inferred.join(', ')}.`);
  if (steps.length > 0) {
    parts.push(`Conversions: ${steps.map((step) => `${step.parameter} ${step.from} -> ${step.to}`).join(', ')}.`);
  }
  if (unused.length > 0) parts.push(`Optional parameters not set: ${unused.join(', ')}.`);
  return parts.join(' ');
}

/**
 * Turns a complete parameter set into a frozen workflow definition. Context
 * values become `{{variable}}` templates; when the variable's type differs
 * from the parameter's, a transform step is inserted and the parameter
 * points at its output. Same input, same output: no ids or timestamps.
 */
export function assembleWorkflow(action: IntegrationAction, parameterSet: ParameterSet): AssembledWorkflow {
  assertComplete(action, parameterSet);

  const parameters: Record<string, JsonValue> = {};
  const transformSteps: TransformStep[] = [];
  const parameterSources: Record<string, ParameterSource> = {};
  const unusedOptionalParameters: string[] = [];

  for (const [name, spec] of Object.entries(action.parameterSchema)) {
    const resolved = parameterSet.values[name];
    if (!resolved) {
      unusedOptionalParameters.push(name);
      continue;
    }
    parameterSources[name] = resolved.source;

    if (resolved.source !== 'context') {
      parameters[name] = resolved.value;
      continue;
    }

    const fit = compatibility(resolved.variableType, spec.type);
    if (fit.kind === 'incompatible') {
      throw new AssemblyInvariantViolation(
        `Cannot assemble ${action.id}: context variable ${resolved.variable} does not fit ${name}`,
      );
    }
    if (fit.kind === 'assignable') {
      parameters[name] = variableRef(resolved.variable);
      continue;
    }

    const step: TransformStep = {
      id: transformStepId(name),
      kind: fit.transform,
      parameter: name,
      input: variableRef(resolved.variable),
      from: resolved.variableType,
      to: spec.type,
    };
    transformSteps.push(step);
    parameters[name] = stepOutputRef(step.id);
  }

  const workflow: WorkflowDefinition = { actionId: action.id, parameters, transformSteps };
  const summary: WorkflowSummary = {
    explanation: explain(action, parameterSources, transformSteps, unusedOptionalParameters),
    unusedOptionalParameters,
    parameterSources,
  };
  return { workflow: deepFreeze(workflow), summary };
}
