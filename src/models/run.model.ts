// src/models/run.model.ts
import { IntegrationAction, ParameterSchema, ParameterType } from './action.model';
import { LiteralValue } from './context.model';
import { ParsedRequest } from './request.model';
import { WorkflowDefinition, WorkflowSummary } from './workflow.model';
import { JsonValue } from '../types/json';

export type RunStatus =
  | 'PARSE'
  | 'SELECT'
  | 'CLARIFY'
  | 'RETRIEVE_SCHEMA'
  | 'GENERATE'
  | 'VALIDATE'
  | 'REPAIR'
  | 'ASSEMBLE'
  | 'FINALIZE'
  | 'FAILED';

export const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>(['CLARIFY', 'FINALIZE', 'FAILED']);

export type ResolvedValue =
  | { source: 'literal'; value: LiteralValue }
  | { source: 'context'; variable: string; variableType: ParameterType }
  | { source: 'inferred'; value: JsonValue };

export interface RejectedValue {
  value: ResolvedValue;
  reason: string;
}

export interface ParameterSet {
  values: Record<string, ResolvedValue>;
  /** Required parameters no source could fill */
  unresolved: Set<string>;
  validationErrors: Record<string, string>;
  /** Values that failed validation, so later repair cycles propose something else */
  rejected: Record<string, RejectedValue[]>;
}

export interface ActionCandidate {
  action: IntegrationAction;
  score: number;
  matchedSignals: string[];
  unresolvedRequired: number;
  catalogIndex: number;
}

export type SelectionResult =
  | { kind: 'selected'; candidate: ActionCandidate; ranked: ActionCandidate[] }
  | { kind: 'ambiguous'; reason: string; candidates: ActionCandidate[] };

export interface ClarificationCandidate {
  actionId: string;
  platform: string;
  operation: string;
  entityType: string;
  score: number;
  matchedSignals: string[];
}

export interface ClarificationRequest {
  reason: string;
  question: string;
  candidates: ClarificationCandidate[];
  parsedRequest: ParsedRequest;
}

export type CompilationErrorKind =
  | 'ParseFailure'
  | 'UnknownActionError'
  | 'RepairExhausted'
  | 'AssemblyInvariantViolation'
  | 'ModelCallError'
  | 'CatalogLoadError'
  | 'Cancelled';

export interface CompilationFailure {
  kind: CompilationErrorKind;
  reason: string;
  actionId?: string;
  /** Parameter name -> last validation reason, for RepairExhausted */
  parameterErrors?: Record<string, string>;
}

export interface RunState {
  runId: string;
  status: RunStatus;
  repairCount: number;
  transitions: RunStatus[];
  parsedRequest?: ParsedRequest;
  candidates?: ActionCandidate[];
  selectedAction?: IntegrationAction;
  schema?: ParameterSchema;
  parameterSet?: ParameterSet;
  workflow?: WorkflowDefinition;
  summary?: WorkflowSummary;
  clarification?: ClarificationRequest;
  failure?: CompilationFailure;
}

export interface RunStateSummary {
  platformHint: string | null;
  selectedActionId: string | null;
  repairCount: number;
  resolvedParameters: string[];
  unresolved: string[];
  failingParameters: string[];
}

export interface TransitionEvent {
  runId: string;
  from: RunStatus | null;
  to: RunStatus;
  timestamp: string;
  summary: RunStateSummary;
}

interface CompileResultBase {
  runId: string;
  transitions: RunStatus[];
}

export type CompileResult =
  | (CompileResultBase & { outcome: 'workflow'; workflow: WorkflowDefinition; summary: WorkflowSummary })
  | (CompileResultBase & { outcome: 'clarification'; clarification: ClarificationRequest })
  | (CompileResultBase & { outcome: 'error'; error: CompilationFailure });
