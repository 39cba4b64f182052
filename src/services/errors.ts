// src/services/errors.ts
import { CompilationErrorKind, CompilationFailure } from '../models/run.model';

/**
 * Base class for every fatal compilation error. The orchestrator turns these
 * into an `error` outcome carrying `kind` and a human-readable reason.
 */
export class CompilationError extends Error {
  readonly kind: CompilationErrorKind;

  constructor(kind: CompilationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }

  toFailure(): CompilationFailure {
    return { kind: this.kind, reason: this.message };
  }
}

/** The model call failed (timeout, transport, abort) */
export class ModelCallError extends CompilationError {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super('ModelCallError', message, { cause: options.cause });
    this.timedOut = options.timedOut ?? false;
  }
}

export class ParseFailure extends CompilationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ParseFailure', message, options);
  }
}

/** Selected action id is missing from the catalog: the selector and catalog disagree */
export class UnknownActionError extends CompilationError {
  readonly actionId: string;

  constructor(actionId: string) {
    super('UnknownActionError', `Action "${actionId}" is not in the action catalog`);
    this.actionId = actionId;
  }

  override toFailure(): CompilationFailure {
    return { ...super.toFailure(), actionId: this.actionId };
  }
}

export class RepairExhausted extends CompilationError {
  readonly parameterErrors: Record<string, string>;
  readonly repairCount: number;

  constructor(parameterErrors: Record<string, string>, repairCount: number) {
    const names = Object.keys(parameterErrors);
    super(
      'RepairExhausted',
      `Parameters still invalid after ${repairCount} repair cycle(s): ${names
        .map((name) => `${name} (${parameterErrors[name]})`)
        .join(', ')}`,
    );
    this.parameterErrors = { ...parameterErrors };
    this.repairCount = repairCount;
  }

  override toFailure(): CompilationFailure {
    return { ...super.toFailure(), parameterErrors: { ...this.parameterErrors } };
  }
}

/** Programming error: the assembler was reached with an incomplete parameter set */
export class AssemblyInvariantViolation extends CompilationError {
  constructor(message: string) {
    super('AssemblyInvariantViolation', message);
  }
}

export class CatalogLoadError extends CompilationError {
  readonly path?: string;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super('CatalogLoadError', message, { cause: options.cause });
    this.path = options.path;
  }
}

/** Thrown out of `compile` when the caller aborts; the run state is discarded */
export class CompilationCancelledError extends CompilationError {
  constructor(runId: string) {
    super('Cancelled', `Run ${runId} was cancelled`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
