// src/services/parameters/literals.ts
import { ParameterSpec, ParameterType } from '../../models/action.model';
import { LiteralValue } from '../../models/context.model';
import { nameKey } from '../../utils/text';

const NUMERIC = /^-?\d+(\.\d+)?$/;

/** The number a numeric string denotes, or undefined when the conversion would change it */
function exactNumber(text: string): number | undefined {
  if (!NUMERIC.test(text)) return undefined;
  const parsed = Number(text);
  if (!text.includes('.')) return Number.isSafeInteger(parsed) ? parsed : undefined;
  const canonical = text.replace(/\.?0+$/, '').replace(/^(-?)0+(?=\d)/, '$1');
  return String(parsed) === canonical ? parsed : undefined;
}

/** Literal hint for a parameter, by exact name, normalized name, then alias */
export function findLiteral(
  parameterName: string,
  spec: ParameterSpec,
  literals: Readonly<Record<string, LiteralValue>>,
): LiteralValue | undefined {
  if (Object.prototype.hasOwnProperty.call(literals, parameterName)) {
    return literals[parameterName];
  }
  const wanted = [parameterName, ...(spec.aliases ?? [])].map(nameKey);
  for (const [key, value] of Object.entries(literals)) {
    if (wanted.includes(nameKey(key))) return value;
  }
  return undefined;
}

/**
 * Converts a literal to the declared type when that loses nothing
 * (`"42"` -> 42, `"true"` -> true, 7 -> `"7"`). Anything else is returned
 * unchanged and left for the validator to report.
 */
export function coerceLiteral(value: LiteralValue, type: ParameterType): LiteralValue {
  switch (type) {
    case 'number':
    case 'integer':
      if (typeof value === 'string') return exactNumber(value.trim()) ?? value;
      return value;
    case 'boolean':
      if (typeof value === 'string') {
        const lowered = value.trim().toLowerCase();
        if (lowered === 'true' || lowered === 'yes') return true;
        if (lowered === 'false' || lowered === 'no') return false;
      }
      return value;
    case 'string':
      return typeof value === 'string' ? value : String(value);
    default:
      return value;
  }
}
