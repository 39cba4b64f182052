// src/services/parser/RequestParser.ts
import { z } from 'zod';
import { ContextVariable } from '../../models/context.model';
import { ParsedRequest, freezeParsedRequest } from '../../models/request.model';
import { normalize } from '../../utils/text';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { ParseFailure, errorMessage } from '../errors';
import { extractJson } from '../llm/json';
import { REQUEST_PARSER_PROMPT_TEMPLATE } from '../llm/prompts/requestParserPrompt';
import { CompletionModel } from '../llm/types';

export interface ParseInput {
  rawText: string;
  variables: readonly ContextVariable[];
  /** Platforms present in the action catalog */
  knownPlatforms: readonly string[];
  signal?: AbortSignal;
}

export interface RequestParser {
  parse(input: ParseInput): Promise<ParsedRequest>;
}

/**
 * Keeps a platform hint only when it names a catalog platform. A known
 * platform the text never mentions is kept but flagged as implied.
 */
export function resolvePlatformHint(
  candidate: string | null,
  rawText: string,
  knownPlatforms: readonly string[],
): { platform: string | null; flags: string[] } {
  if (candidate === null || candidate.trim() === '') return { platform: null, flags: [] };
  const known = knownPlatforms.find((platform) => normalize(platform) === normalize(candidate));
  if (!known) return { platform: null, flags: [`unknown_platform:${candidate}`] };
  const mentioned = ` ${normalize(rawText)} `.includes(` ${normalize(known)} `);
  return { platform: known, flags: mentioned ? [] : [`platform_implied:${known}`] };
}

const literalSchema = z.union([z.string(), z.number(), z.boolean()]);

const parserResponseSchema = z.object({
  platform: z.string().nullable().default(null),
  operation: z.string().nullable().default(null),
  entityType: z.string().nullable().default(null),
  literalParams: z.record(z.union([literalSchema, z.null()])).default({}),
  ambiguityFlags: z.array(z.string()).default([]),
});

function blankToNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim().toLowerCase();
  return trimmed === '' ? null : trimmed;
}

export interface ModelRequestParserConfig extends ServiceConfig {
  model: CompletionModel;
  timeoutMs: number;
}

/** Turns free text into a ParsedRequest through the completion model */
export class ModelRequestParser extends BaseService implements RequestParser {
  private readonly model: CompletionModel;
  private readonly timeoutMs: number;

  constructor(config: ModelRequestParserConfig) {
    super(config);
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
  }

  public async parse(input: ParseInput): Promise<ParsedRequest> {
    const prompt = REQUEST_PARSER_PROMPT_TEMPLATE.replace('{{RAW_TEXT}}', () => input.rawText)
      .replace('{{KNOWN_PLATFORMS}}', () => input.knownPlatforms.join(', ') || '(none)')
      .replace(
        '{{CONTEXT_VARIABLES}}',
        () => input.variables.map((variable) => `- ${variable.name}: ${variable.type}`).join('\n') || '(none)',
      );

    let text: string;
    try {
      text = await this.model.complete(prompt, { timeoutMs: this.timeoutMs, signal: input.signal });
    } catch (error) {
      throw new ParseFailure(`Request parsing failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = parserResponseSchema.safeParse(extractJson(text));
    if (!parsed.success) {
      this.logger.warn('ModelRequestParser: Malformed parser response', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      throw new ParseFailure('Request parsing failed: model returned malformed output');
    }

    const { platform, flags } = resolvePlatformHint(parsed.data.platform, input.rawText, input.knownPlatforms);
    const literalParams: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(parsed.data.literalParams)) {
      if (value !== null) literalParams[key] = value;
    }

    const request = freezeParsedRequest({
      rawText: input.rawText,
      platformHint: platform,
      operationHint: blankToNull(parsed.data.operation),
      entityTypeHint: blankToNull(parsed.data.entityType),
      literalParams,
      ambiguityFlags: [...parsed.data.ambiguityFlags, ...flags],
    });
    this.logger.info('ModelRequestParser: Parsed request', {
      platformHint: request.platformHint,
      operationHint: request.operationHint,
      entityTypeHint: request.entityTypeHint,
      literalParams: Object.keys(request.literalParams),
      ambiguityFlags: request.ambiguityFlags,
    });
    return request;
  }
}
