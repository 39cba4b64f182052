// src/models/context.model.ts
import { ParameterType } from './action.model';

export type LiteralValue = string | number | boolean;

export interface ContextVariable {
  name: string;
  type: ParameterType;
  exampleValue?: unknown;
}
