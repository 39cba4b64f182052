// src/models/action.model.ts

export type ParameterType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'email'
  | 'url'
  | 'date'
  | 'object'
  | 'array';

export const PARAMETER_TYPES: readonly ParameterType[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'email',
  'url',
  'date',
  'object',
  'array',
];

export interface ParameterConstraints {
  enum?: Array<string | number>;
  minimum?: number;
  maximum?: number;
  pattern?: string;
  minLength?: number;
  maxLength?: number;
}

export interface ParameterSpec {
  type: ParameterType;
  required: boolean;
  constraints?: ParameterConstraints;
  description?: string;
  /** Alternative names a context variable or literal hint may use for this parameter */
  aliases?: string[];
}

/** Parameter name -> spec. Key insertion order is the declared order. */
export type ParameterSchema = Readonly<Record<string, ParameterSpec>>;

export interface IntegrationAction {
  id: string;
  platform: string;
  operation: string;
  entityType: string;
  description?: string;
  parameterSchema: ParameterSchema;
}

export function requiredParameterNames(schema: ParameterSchema): string[] {
  return Object.entries(schema)
    .filter(([, spec]) => spec.required)
    .map(([name]) => name);
}
