// src/services/parser/KeywordRequestParser.ts
import { LiteralValue } from '../../models/context.model';
import { ParsedRequest, freezeParsedRequest } from '../../models/request.model';
import { normalize, singularize, tokenize } from '../../utils/text';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { DEFAULT_VOCABULARY, Vocabulary, isEntityWord, operationGroupOf } from '../selection/vocabulary';
import { ParseInput, RequestParser } from './RequestParser';

const CHANNEL = /(?:^|\s)(#[\w-]+)/;
const EMAIL = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const URL_PATTERN = /https?:\/\/[^\s"']+/;
const QUOTED = /(\w+)\s+"([^"]*)"/g;
const SAYING = /\bsaying\s+(.+)$/i;

/** Quoted-value keys that name a different parameter */
const KEY_ALIASES: ReadonlyMap<string, string> = new Map([
  ['saying', 'message'],
  ['titled', 'title'],
  ['named', 'name'],
]);

export interface KeywordRequestParserConfig extends ServiceConfig {
  vocabulary?: Vocabulary;
}

/**
 * Offline parser: catalog platform names, the operation and entity
 * vocabulary, and a few literal patterns (`#channel`, e-mail addresses,
 * URLs, `key "value"`, `saying ...`). Used when no model is configured.
 */
export class KeywordRequestParser extends BaseService implements RequestParser {
  private readonly vocabulary: Vocabulary;

  constructor(config: KeywordRequestParserConfig) {
    super(config);
    this.vocabulary = config.vocabulary ?? DEFAULT_VOCABULARY;
  }

  public async parse(input: ParseInput): Promise<ParsedRequest> {
    const literalParams = this.extractLiterals(input.rawText);
    const commandText = input.rawText.replace(SAYING, ' ').replace(QUOTED, ' $1 ');
    const tokens = tokenize(commandText).filter((token) => !this.vocabulary.stopWords.includes(token));

    const flags: string[] = [];
    const mentioned = this.mentionedPlatforms(input.rawText, input.knownPlatforms);
    if (mentioned.length > 1) flags.push(`multiple_platforms:${mentioned.join(',')}`);
    if (mentioned.length === 0) flags.push('no_platform');

    const operationToken = tokens.find((token) => operationGroupOf(token, this.vocabulary) !== -1) ?? null;
    if (operationToken === null) flags.push('no_operation');
    const entityToken =
      tokens.find((token) => token !== operationToken && isEntityWord(token, this.vocabulary)) ?? null;
    if (entityToken === null) flags.push('no_entity');

    const request = freezeParsedRequest({
      rawText: input.rawText,
      platformHint: mentioned[0] ?? null,
      operationHint: operationToken,
      entityTypeHint: entityToken === null ? null : singularize(entityToken),
      literalParams,
      ambiguityFlags: flags,
    });
    this.logger.info('KeywordRequestParser: Parsed request', {
      platformHint: request.platformHint,
      operationHint: request.operationHint,
      entityTypeHint: request.entityTypeHint,
      literalParams: Object.keys(literalParams),
      ambiguityFlags: flags,
    });
    return request;
  }

  /** Known platforms named in the text, in order of appearance */
  private mentionedPlatforms(rawText: string, knownPlatforms: readonly string[]): string[] {
    const text = ` ${normalize(rawText)} `;
    return knownPlatforms
      .map((platform) => ({ platform, at: text.indexOf(` ${normalize(platform)} `) }))
      .filter((entry) => entry.at !== -1)
      .sort((a, b) => a.at - b.at)
      .map((entry) => entry.platform);
  }

  private extractLiterals(rawText: string): Record<string, LiteralValue> {
    const literals: Record<string, LiteralValue> = {};

    for (const match of rawText.matchAll(QUOTED)) {
      const key = match[1].toLowerCase();
      literals[KEY_ALIASES.get(key) ?? key] = match[2];
    }

    const channel = rawText.match(CHANNEL);
    if (channel && literals.channel === undefined) literals.channel = channel[1];

    const email = rawText.match(EMAIL);
    if (email && literals.email === undefined) literals.email = email[0];

    const url = rawText.match(URL_PATTERN);
    if (url && literals.url === undefined) literals.url = url[0];

    const saying = rawText.match(SAYING);
    if (saying && literals.message === undefined) {
      literals.message = saying[1].trim().replace(/^"(.*)"$/, '$1');
    }
    return literals;
  }
}
