// src/services/parameters/ParameterValidator.ts
import { z } from 'zod';
import { ParameterConstraints, ParameterSchema, ParameterSpec } from '../../models/action.model';
import { ParameterSet } from '../../models/run.model';
import { compatibility } from './typeCompatibility';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

function withStringConstraints(schema: z.ZodString, constraints: ParameterConstraints): z.ZodString {
  let result = schema;
  if (constraints.minLength !== undefined) {
    result = result.min(constraints.minLength, `must be at least ${constraints.minLength} characters`);
  }
  if (constraints.maxLength !== undefined) {
    result = result.max(constraints.maxLength, `must be at most ${constraints.maxLength} characters`);
  }
  if (constraints.pattern !== undefined) {
    result = result.regex(new RegExp(constraints.pattern), `must match pattern ${constraints.pattern}`);
  }
  return result;
}

function withNumberConstraints(schema: z.ZodNumber, constraints: ParameterConstraints): z.ZodNumber {
  let result = schema;
  if (constraints.minimum !== undefined) {
    result = result.min(constraints.minimum, `must be >= ${constraints.minimum}`);
  }
  if (constraints.maximum !== undefined) {
    result = result.max(constraints.maximum, `must be <= ${constraints.maximum}`);
  }
  return result;
}

function typeSchema(spec: ParameterSpec, constraints: ParameterConstraints): z.ZodTypeAny {
  switch (spec.type) {
    case 'string':
      return withStringConstraints(z.string(), constraints);
    case 'email':
      return withStringConstraints(z.string().email('invalid email format'), constraints);
    case 'url':
      return withStringConstraints(z.string().url('invalid url format'), constraints);
    case 'date':
      return withStringConstraints(z.string().regex(ISO_DATE, 'invalid date format'), constraints).refine(
        (value) => !Number.isNaN(Date.parse(value)),
        'invalid date format',
      );
    case 'number':
      return withNumberConstraints(z.number(), constraints);
    case 'integer':
      return withNumberConstraints(z.number().int(), constraints);
    case 'boolean':
      return z.boolean();
    case 'object':
      return z.record(z.unknown());
    case 'array':
      return z.array(z.unknown());
  }
}

/** zod schema for one parameter: declared type, format, then constraints */
export function parameterValueSchema(spec: ParameterSpec): z.ZodTypeAny {
  const constraints = spec.constraints ?? {};
  const schema = typeSchema(spec, constraints);

  const allowed = constraints.enum;
  if (allowed === undefined) return schema;
  return schema.superRefine((value: unknown, ctx) => {
    if (!allowed.some((option) => option === value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be one of: ${allowed.join(', ')}` });
    }
  });
}

function issueReason(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return `expected ${issue.expected}, got ${issue.received}`;
  }
  return issue.message;
}

/** Reason the parameter is invalid, or null when it passes */
export function validateParameter(name: string, spec: ParameterSpec, parameterSet: ParameterSet): string | null {
  const resolved = parameterSet.values[name];
  if (!resolved) {
    return spec.required ? 'missing' : null;
  }

  // Context values are bound at execution time; only their declared type can be checked here.
  if (resolved.source === 'context') {
    if (compatibility(resolved.variableType, spec.type).kind === 'incompatible') {
      return `context variable "${resolved.variable}" of type ${resolved.variableType} cannot be used as ${spec.type}`;
    }
    return null;
  }

  const result = parameterValueSchema(spec).safeParse(resolved.value);
  if (result.success) return null;
  const [first] = result.error.issues;
  return first ? issueReason(first) : 'invalid value';
}

/**
 * Checks `names` (default: every schema parameter) and returns a fresh
 * name -> reason map. Does not touch the parameter set.
 */
export function validateParameters(
  schema: ParameterSchema,
  parameterSet: ParameterSet,
  names?: Iterable<string>,
): Record<string, string> {
  const targets = names ? new Set(names) : null;
  const errors: Record<string, string> = {};

  for (const [name, spec] of Object.entries(schema)) {
    if (targets && !targets.has(name)) continue;
    const reason = validateParameter(name, spec, parameterSet);
    if (reason !== null) errors[name] = reason;
  }
  return errors;
}
