// src/index.ts
export * from './models/action.model';
export * from './models/context.model';
export * from './models/request.model';
export * from './models/run.model';
export * from './models/workflow.model';
export * from './types/json';

export * from './services/errors';
export type { Logger, ServiceConfig } from './services/base/types';
export { ActionCatalog } from './services/catalog/ActionCatalog';
export { ContextCatalog } from './services/catalog/ContextCatalog';
export { CatalogLoader } from './services/catalog/CatalogLoader';

export { DEFAULT_COMPILER_OPTIONS, resolveCompilerOptions } from './services/compiler/options';
export type {
  CompilerOptions,
  CompilerOptionsInput,
  ContextMatchWeights,
  ScoringWeights,
} from './services/compiler/options';
export { WorkflowCompiler } from './services/compiler/WorkflowCompiler';
export type { CompileOptions, WorkflowCompilerConfig } from './services/compiler/WorkflowCompiler';
export { RunStateManager } from './services/compiler/RunStateManager';

export type { CompletionModel, CompletionOptions } from './services/llm/types';
export { GroqCompletionModel } from './services/llm/GroqCompletionModel';
export { ModelRequestParser, resolvePlatformHint } from './services/parser/RequestParser';
export type { ParseInput, RequestParser } from './services/parser/RequestParser';
export { KeywordRequestParser } from './services/parser/KeywordRequestParser';

export { ActionSelector } from './services/selection/ActionSelector';
export { entityMatch, operationSimilarity, platformMatch, scoreAction } from './services/selection/scoring';
export { rankContextMatches, nameSimilarity } from './services/parameters/contextMatching';
export { compatibility } from './services/parameters/typeCompatibility';
export type { Compatibility } from './services/parameters/typeCompatibility';
export { ParameterGenerator } from './services/parameters/ParameterGenerator';
export { validateParameter, validateParameters } from './services/parameters/ParameterValidator';
export { RepairStage } from './services/parameters/RepairStage';
export { SchemaRetriever } from './services/schema/SchemaRetriever';
export { assembleWorkflow } from './services/workflow/WorkflowAssembler';
export { createLogger, createSilentLogger } from './utils/logger';
