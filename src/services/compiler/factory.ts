// src/services/compiler/factory.ts
import { CONFIG } from '../../config';
import { createLogger } from '../../utils/logger';
import { ContextCatalog } from '../catalog/ContextCatalog';
import { CatalogLoader } from '../catalog/CatalogLoader';
import { GroqCompletionModel } from '../llm/GroqCompletionModel';
import { CompletionModel } from '../llm/types';
import { KeywordRequestParser } from '../parser/KeywordRequestParser';
import { ModelRequestParser, RequestParser } from '../parser/RequestParser';
import { CompilerOptionsInput } from './options';
import { WorkflowCompiler } from './WorkflowCompiler';

export interface ConfiguredCompiler {
  compiler: WorkflowCompiler;
  context: ContextCatalog;
  parserKind: 'model' | 'keyword';
}

export function compilerOptionsFromConfig(): CompilerOptionsInput {
  return {
    minConfidence: CONFIG.MIN_CONFIDENCE,
    minMargin: CONFIG.MIN_MARGIN,
    clarificationTopK: CONFIG.CLARIFICATION_TOP_K,
    minContextMatch: CONFIG.MIN_CONTEXT_MATCH,
    maxRepairs: CONFIG.MAX_REPAIRS,
    allowModelInference: CONFIG.ALLOW_MODEL_INFERENCE,
    modelTimeoutMs: CONFIG.MODEL_TIMEOUT_MS,
  };
}

/**
 * Wires a compiler from environment configuration: catalogs from the
 * configured JSON files, the Groq model when GROQ_API_KEY is set and the
 * keyword parser otherwise.
 */
export function createCompilerFromConfig(): ConfiguredCompiler {
  const logger = createLogger('workflow-compiler', CONFIG.LOG_LEVEL);
  const loader = new CatalogLoader({ logger });
  const actionCatalog = loader.loadActionCatalog(CONFIG.ACTION_CATALOG_PATH);
  const context = loader.loadContextCatalog(CONFIG.CONTEXT_CATALOG_PATH);

  let model: CompletionModel | undefined;
  let parser: RequestParser;
  if (CONFIG.GROQ_API_KEY) {
    model = new GroqCompletionModel({
      logger,
      apiKey: CONFIG.GROQ_API_KEY,
      model: CONFIG.MODEL_NAME,
      maxTokens: CONFIG.MAX_TOKENS,
    });
    parser = new ModelRequestParser({ logger, model, timeoutMs: CONFIG.MODEL_TIMEOUT_MS });
  } else {
    logger.info('GROQ_API_KEY not set; using keyword request parser');
    parser = new KeywordRequestParser({ logger });
  }

  const compiler = new WorkflowCompiler({
    logger,
    actionCatalog,
    parser,
    model,
    options: compilerOptionsFromConfig(),
  });
  return { compiler, context, parserKind: model ? 'model' : 'keyword' };
}
