// src/models/workflow.model.ts
import { ParameterType } from './action.model';
import { JsonValue } from '../types/json';

export type TransformKind =
  | 'to_string'
  | 'parse_number'
  | 'parse_boolean'
  | 'parse_json'
  | 'stringify_json'
  | 'round';

export interface TransformStep {
  id: string;
  kind: TransformKind;
  parameter: string;
  /** Template reference the step reads, e.g. `{{lead_score}}` */
  input: string;
  from: ParameterType;
  to: ParameterType;
}

export interface WorkflowDefinition {
  readonly actionId: string;
  readonly parameters: Readonly<Record<string, JsonValue>>;
  readonly transformSteps: readonly TransformStep[];
}

export type ParameterSource = 'literal' | 'context' | 'inferred';

export interface WorkflowSummary {
  explanation: string;
  unusedOptionalParameters: string[];
  parameterSources: Record<string, ParameterSource>;
}
