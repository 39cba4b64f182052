// src/services/compiler/WorkflowCompiler.ts
import { EventEmitter } from 'events';
import { CompileResult, RunState, RunStatus, TERMINAL_STATUSES, TransitionEvent } from '../../models/run.model';
import { Logger } from '../base/types';
import { ActionCatalog } from '../catalog/ActionCatalog';
import { ContextCatalog } from '../catalog/ContextCatalog';
import {
  AssemblyInvariantViolation,
  CompilationCancelledError,
  CompilationError,
  RepairExhausted,
  errorMessage,
} from '../errors';
import { CompletionModel } from '../llm/types';
import { ParameterGenerator } from '../parameters/ParameterGenerator';
import { validateParameters } from '../parameters/ParameterValidator';
import { RepairStage } from '../parameters/RepairStage';
import { RequestParser } from '../parser/RequestParser';
import { SchemaRetriever } from '../schema/SchemaRetriever';
import { ActionSelector } from '../selection/ActionSelector';
import { Vocabulary } from '../selection/vocabulary';
import { assembleWorkflow } from '../workflow/WorkflowAssembler';
import { CompilerOptions, CompilerOptionsInput, resolveCompilerOptions } from './options';
import { RunStateManager } from './RunStateManager';

export interface WorkflowCompilerConfig {
  logger: Logger;
  actionCatalog: ActionCatalog;
  parser: RequestParser;
  options?: CompilerOptionsInput;
  /** Used for parameter inference when `options.allowModelInference` is set */
  model?: CompletionModel;
  vocabulary?: Vocabulary;
}

export interface CompileOptions {
  signal?: AbortSignal;
}

/** Every edge of the run state machine; anything else is a bug */
const ALLOWED_TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  PARSE: ['SELECT', 'FAILED'],
  SELECT: ['CLARIFY', 'RETRIEVE_SCHEMA', 'FAILED'],
  RETRIEVE_SCHEMA: ['GENERATE', 'FAILED'],
  GENERATE: ['VALIDATE', 'FAILED'],
  VALIDATE: ['ASSEMBLE', 'REPAIR', 'FAILED'],
  REPAIR: ['VALIDATE', 'FAILED'],
  ASSEMBLE: ['FINALIZE', 'FAILED'],
  CLARIFY: [],
  FINALIZE: [],
  FAILED: [],
};

function requireValue<T>(value: T | undefined, status: RunStatus, what: string): T {
  if (value === undefined) {
    throw new AssemblyInvariantViolation(`Run reached ${status} without ${what}`);
  }
  return value;
}

/**
 * Drives one request through PARSE -> SELECT -> (CLARIFY | RETRIEVE_SCHEMA)
 * -> GENERATE -> VALIDATE -> (ASSEMBLE | REPAIR) -> FINALIZE.
 *
 * Emits `transition` with a {@link TransitionEvent} on every state change.
 * Catalogs are shared read-only; each `compile` call owns its own RunState,
 * so concurrent calls on one instance are independent.
 */
export class WorkflowCompiler extends EventEmitter {
  private readonly logger: Logger;
  private readonly actionCatalog: ActionCatalog;
  private readonly parser: RequestParser;
  private readonly options: CompilerOptions;
  private readonly selector: ActionSelector;
  private readonly retriever: SchemaRetriever;
  private readonly generator: ParameterGenerator;
  private readonly repairStage: RepairStage;

  constructor(config: WorkflowCompilerConfig) {
    super({ captureRejections: true });
    this.logger = config.logger;
    this.actionCatalog = config.actionCatalog;
    this.parser = config.parser;
    this.options = resolveCompilerOptions(config.options);

    this.selector = new ActionSelector({
      logger: config.logger,
      catalog: config.actionCatalog,
      options: this.options,
      vocabulary: config.vocabulary,
    });
    this.retriever = new SchemaRetriever(config.actionCatalog);
    this.generator = new ParameterGenerator({ logger: config.logger, options: this.options, model: config.model });
    this.repairStage = new RepairStage({
      logger: config.logger,
      generator: this.generator,
      maxRepairs: this.options.maxRepairs,
    });

    if (this.options.allowModelInference && !config.model) {
      this.logger.warn('WorkflowCompiler: Model inference enabled but no model configured; inference is skipped');
    }
  }

  public getOptions(): CompilerOptions {
    return this.options;
  }

  /**
   * Compiles one request. Resolves with a workflow, a clarification request
   * or an error outcome; rejects only with CompilationCancelledError when
   * `signal` aborts, or on an unexpected internal error.
   */
  public async compile(
    rawText: string,
    context: ContextCatalog = ContextCatalog.empty(),
    options: CompileOptions = {},
  ): Promise<CompileResult> {
    const { signal } = options;
    const state = RunStateManager.createRunState();
    this.logger.info('WorkflowCompiler: Run started', { runId: state.runId, textLength: rawText.length });
    this.emitTransition(state, null);

    try {
      while (!TERMINAL_STATUSES.has(state.status)) {
        this.throwIfCancelled(state, signal);
        const next = await this.step(state, rawText, context, signal);
        this.throwIfCancelled(state, signal);
        this.transition(state, next);
      }
    } catch (error) {
      if (error instanceof CompilationCancelledError) throw error;
      if (signal?.aborted) {
        this.logger.info('WorkflowCompiler: Run cancelled', { runId: state.runId, status: state.status });
        throw new CompilationCancelledError(state.runId);
      }
      if (!(error instanceof CompilationError)) {
        this.logger.error('WorkflowCompiler: Unexpected error', {
          runId: state.runId,
          status: state.status,
          error: errorMessage(error),
        });
        throw error;
      }

      state.failure = error.toFailure();
      if (state.selectedAction && state.failure.actionId === undefined) {
        state.failure.actionId = state.selectedAction.id;
      }
      this.logger.warn('WorkflowCompiler: Run failed', {
        runId: state.runId,
        status: state.status,
        kind: error.kind,
        reason: error.message,
      });
      this.transition(state, 'FAILED');
    }

    const result = RunStateManager.toResult(state);
    this.logger.info('WorkflowCompiler: Run finished', {
      runId: state.runId,
      outcome: result.outcome,
      transitions: state.transitions,
      repairCount: state.repairCount,
    });
    return result;
  }

  /** Runs the stage for the current status and returns the next status */
  private async step(
    state: RunState,
    rawText: string,
    context: ContextCatalog,
    signal: AbortSignal | undefined,
  ): Promise<RunStatus> {
    switch (state.status) {
      case 'PARSE': {
        state.parsedRequest = await this.parser.parse({
          rawText,
          variables: context.getAll(),
          knownPlatforms: this.actionCatalog.getPlatforms(),
          signal,
        });
        return 'SELECT';
      }

      case 'SELECT': {
        const request = requireValue(state.parsedRequest, state.status, 'a parsed request');
        const selection = this.selector.select(request, context.getAll());
        if (selection.kind === 'ambiguous') {
          state.candidates = selection.candidates;
          state.clarification = RunStateManager.buildClarification(selection.reason, selection.candidates, request);
          return 'CLARIFY';
        }
        state.candidates = selection.ranked;
        state.selectedAction = selection.candidate.action;
        return 'RETRIEVE_SCHEMA';
      }

      case 'RETRIEVE_SCHEMA': {
        const action = requireValue(state.selectedAction, state.status, 'a selected action');
        state.schema = this.retriever.retrieve(action.id);
        state.parameterSet = RunStateManager.emptyParameterSet();
        return 'GENERATE';
      }

      case 'GENERATE': {
        const action = requireValue(state.selectedAction, state.status, 'a selected action');
        const schema = requireValue(state.schema, state.status, 'a schema');
        state.parameterSet = await this.generator.generate({
          action,
          request: requireValue(state.parsedRequest, state.status, 'a parsed request'),
          variables: context.getAll(),
          parameterSet: requireValue(state.parameterSet, state.status, 'a parameter set'),
          targets: Object.keys(schema),
          signal,
        });
        return 'VALIDATE';
      }

      case 'VALIDATE': {
        const schema = requireValue(state.schema, state.status, 'a schema');
        const parameterSet = requireValue(state.parameterSet, state.status, 'a parameter set');
        // After REPAIR the failing subset has already been re-validated.
        const previous = state.transitions[state.transitions.length - 2];
        if (previous === 'GENERATE') {
          parameterSet.validationErrors = validateParameters(schema, parameterSet);
        }
        if (Object.keys(parameterSet.validationErrors).length === 0) return 'ASSEMBLE';
        if (state.repairCount >= this.options.maxRepairs) {
          throw new RepairExhausted(parameterSet.validationErrors, state.repairCount);
        }
        return 'REPAIR';
      }

      case 'REPAIR': {
        const outcome = await this.repairStage.repair({
          action: requireValue(state.selectedAction, state.status, 'a selected action'),
          request: requireValue(state.parsedRequest, state.status, 'a parsed request'),
          variables: context.getAll(),
          parameterSet: requireValue(state.parameterSet, state.status, 'a parameter set'),
          repairCount: state.repairCount,
          signal,
        });
        if (outcome.kind === 'exhausted') {
          throw new RepairExhausted(outcome.parameterErrors, outcome.repairCount);
        }
        state.parameterSet = outcome.parameterSet;
        state.repairCount = outcome.repairCount;
        return 'VALIDATE';
      }

      case 'ASSEMBLE': {
        const assembled = assembleWorkflow(
          requireValue(state.selectedAction, state.status, 'a selected action'),
          requireValue(state.parameterSet, state.status, 'a parameter set'),
        );
        state.workflow = assembled.workflow;
        state.summary = assembled.summary;
        return 'FINALIZE';
      }

      case 'CLARIFY':
      case 'FINALIZE':
      case 'FAILED':
        throw new AssemblyInvariantViolation(`No stage runs in terminal status ${state.status}`);
    }
  }

  private transition(state: RunState, to: RunStatus): void {
    const from = state.status;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new AssemblyInvariantViolation(`Illegal transition ${from} -> ${to}`);
    }
    state.status = to;
    state.transitions.push(to);
    this.logger.info('WorkflowCompiler: Transition', { runId: state.runId, from, to, repairCount: state.repairCount });
    this.emitTransition(state, from);
  }

  private emitTransition(state: RunState, from: RunStatus | null): void {
    const event: TransitionEvent = {
      runId: state.runId,
      from,
      to: state.status,
      timestamp: new Date().toISOString(),
      summary: RunStateManager.summarize(state),
    };
    try {
      this.emit('transition', event);
    } catch (error) {
      this.logger.warn('WorkflowCompiler: Transition listener threw', {
        runId: state.runId,
        to: state.status,
        error: errorMessage(error),
      });
    }
  }

  /** Rejections from async `transition` listeners land here instead of going unhandled */
  public [EventEmitter.captureRejectionSymbol](error: Error, event: string | symbol): void {
    this.logger.warn('WorkflowCompiler: Transition listener rejected', {
      event: String(event),
      error: errorMessage(error),
    });
  }

  private throwIfCancelled(state: RunState, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      this.logger.info('WorkflowCompiler: Run cancelled', { runId: state.runId, status: state.status });
      throw new CompilationCancelledError(state.runId);
    }
  }
}
