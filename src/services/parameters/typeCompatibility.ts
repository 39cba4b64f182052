// src/services/parameters/typeCompatibility.ts
import { ParameterType } from '../../models/action.model';
import { TransformKind } from '../../models/workflow.model';

export type Compatibility =
  | { kind: 'assignable' }
  | { kind: 'coercible'; transform: TransformKind }
  | { kind: 'incompatible' };

const STRING_LIKE: readonly ParameterType[] = ['email', 'url', 'date'];
const SCALARS_TO_STRING: readonly ParameterType[] = ['number', 'integer', 'boolean'];

/**
 * Whether a value of type `from` can fill a parameter declared as `to`,
 * and which transform step the workflow needs if it can't be passed as is.
 */
export function compatibility(from: ParameterType, to: ParameterType): Compatibility {
  if (from === to) return { kind: 'assignable' };
  if (to === 'string' && STRING_LIKE.includes(from)) return { kind: 'assignable' };
  if (from === 'integer' && to === 'number') return { kind: 'assignable' };

  if (to === 'string' && SCALARS_TO_STRING.includes(from)) return { kind: 'coercible', transform: 'to_string' };
  if (to === 'string' && (from === 'object' || from === 'array')) {
    return { kind: 'coercible', transform: 'stringify_json' };
  }
  if (from === 'string' && (to === 'number' || to === 'integer')) {
    return { kind: 'coercible', transform: 'parse_number' };
  }
  if (from === 'string' && to === 'boolean') return { kind: 'coercible', transform: 'parse_boolean' };
  if (from === 'string' && (to === 'object' || to === 'array')) return { kind: 'coercible', transform: 'parse_json' };
  if (from === 'number' && to === 'integer') return { kind: 'coercible', transform: 'round' };

  return { kind: 'incompatible' };
}
