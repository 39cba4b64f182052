// src/services/catalog/CatalogLoader.ts
import fs from 'fs';
import Ajv from 'ajv';
import { IntegrationAction, PARAMETER_TYPES } from '../../models/action.model';
import { ContextVariable } from '../../models/context.model';
import { isJsonObject } from '../../types/json';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { CatalogLoadError, errorMessage } from '../errors';
import { ActionCatalog } from './ActionCatalog';
import { ContextCatalog } from './ContextCatalog';

const parameterTypeSchema = { type: 'string', enum: [...PARAMETER_TYPES] };

const parameterSpecSchema = {
  type: 'object',
  required: ['type'],
  properties: {
    type: parameterTypeSchema,
    required: { type: 'boolean', default: false },
    description: { type: 'string' },
    aliases: { type: 'array', items: { type: 'string' } },
    constraints: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enum: { type: 'array', minItems: 1, items: { type: ['string', 'number'] } },
        minimum: { type: 'number' },
        maximum: { type: 'number' },
        pattern: { type: 'string' },
        minLength: { type: 'integer', minimum: 0 },
        maxLength: { type: 'integer', minimum: 0 },
      },
    },
  },
};

const actionSchema = {
  type: 'object',
  required: ['id', 'platform', 'operation', 'entityType', 'parameterSchema'],
  properties: {
    id: { type: 'string', minLength: 1 },
    platform: { type: 'string', minLength: 1 },
    operation: { type: 'string', minLength: 1 },
    entityType: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    parameterSchema: { type: 'object', additionalProperties: parameterSpecSchema },
  },
};

const contextVariableSchema = {
  type: 'object',
  required: ['name', 'type'],
  properties: {
    name: { type: 'string', minLength: 1 },
    type: parameterTypeSchema,
    exampleValue: {},
  },
};

const actionListSchema = { type: 'array', items: actionSchema };
const contextListSchema = { type: 'array', items: contextVariableSchema };

/** `action.parameter: message` for every pattern constraint that is not a valid regular expression */
function invalidPatterns(actions: readonly IntegrationAction[]): string[] {
  const problems: string[] = [];
  for (const action of actions) {
    for (const [name, spec] of Object.entries(action.parameterSchema)) {
      const pattern = spec.constraints?.pattern;
      if (pattern === undefined) continue;
      try {
        new RegExp(pattern);
      } catch (error) {
        problems.push(`${action.id}.${name}: ${errorMessage(error)}`);
      }
    }
  }
  return problems;
}

/** Catalog files are either a bare array or an object wrapping it under `key` */
function unwrapList(data: unknown, key: string): unknown {
  if (Array.isArray(data)) return data;
  if (isJsonObject(data) && key in data) {
    return data[key];
  }
  return data;
}

/**
 * Builds catalog snapshots from JSON documents. Reload policy is the caller's
 * concern: every call produces a fresh, independent snapshot.
 */
export class CatalogLoader extends BaseService {
  private ajv: InstanceType<typeof Ajv>;

  constructor(config: ServiceConfig) {
    super(config);
    this.ajv = new Ajv({ allErrors: true, useDefaults: true, allowUnionTypes: true });
  }

  public loadActionCatalog(filePath: string): ActionCatalog {
    return this.parseActionCatalog(this.readJson(filePath), filePath);
  }

  public loadContextCatalog(filePath: string): ContextCatalog {
    return this.parseContextCatalog(this.readJson(filePath), filePath);
  }

  public parseActionCatalog(data: unknown, source = 'inline'): ActionCatalog {
    const validate = this.ajv.compile<IntegrationAction[]>(actionListSchema);
    const actions = unwrapList(data, 'actions');
    if (!validate(actions)) {
      throw new CatalogLoadError(`Invalid action catalog (${source}): ${this.ajv.errorsText(validate.errors)}`, {
        path: source,
      });
    }
    const badPatterns = invalidPatterns(actions);
    if (badPatterns.length > 0) {
      throw new CatalogLoadError(`Invalid action catalog (${source}): ${badPatterns.join('; ')}`, { path: source });
    }
    const catalog = new ActionCatalog(actions);

    this.logger.info('CatalogLoader: Loaded action catalog', {
      source,
      totalActions: catalog.size,
      platforms: catalog.getPlatforms(),
    });
    return catalog;
  }

  public parseContextCatalog(data: unknown, source = 'inline'): ContextCatalog {
    const validate = this.ajv.compile<ContextVariable[]>(contextListSchema);
    const variables = unwrapList(data, 'variables');
    if (!validate(variables)) {
      throw new CatalogLoadError(`Invalid context catalog (${source}): ${this.ajv.errorsText(validate.errors)}`, {
        path: source,
      });
    }
    const catalog = new ContextCatalog(variables);

    this.logger.info('CatalogLoader: Loaded context catalog', { source, variables: catalog.names() });
    return catalog;
  }

  private readJson(filePath: string): unknown {
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      return JSON.parse(content);
    } catch (error) {
      this.logger.error('CatalogLoader: Failed to read catalog file', { path: filePath, error: errorMessage(error) });
      throw new CatalogLoadError(`Cannot read catalog file ${filePath}: ${errorMessage(error)}`, {
        path: filePath,
        cause: error,
      });
    }
  }
}
