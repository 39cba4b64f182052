// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';
import { createLogger } from '../utils/logger';

const logger = createLogger('config');

const nodeEnv = process.env.NODE_ENV || 'development';

// src/config -> project root
const projectRootEnvPath = path.resolve(__dirname, '../../.env');
const dotenvResult = dotenv.config({ path: projectRootEnvPath });

if (dotenvResult.error) {
  logger.debug('No .env file loaded, using process environment', { path: projectRootEnvPath, nodeEnv });
} else {
  logger.debug('.env file loaded', { path: projectRootEnvPath, keys: Object.keys(dotenvResult.parsed ?? {}).length });
}

const getEnvVar = (key: string, defaultValue?: string, isCritical: boolean = false): string => {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    if (isCritical) {
      const errorMessage = `Environment variable ${key} is missing or empty and has no default. This is required.`;
      logger.error(errorMessage);
      throw new Error(errorMessage);
    }
    return '';
  }
  return value;
};

const getNumberVar = (key: string, defaultValue: number): number => {
  const raw = getEnvVar(key, String(defaultValue));
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got '${raw}'`);
  }
  return parsed;
};

export const CONFIG = {
  GROQ_API_KEY: getEnvVar('GROQ_API_KEY'),
  MODEL_NAME: getEnvVar('MODEL_NAME', 'llama-3.3-70b-versatile'),
  MODEL_TIMEOUT_MS: getNumberVar('MODEL_TIMEOUT_MS', 15000),
  MAX_TOKENS: getNumberVar('MAX_TOKENS', 1000),
  MAX_REPAIRS: getNumberVar('MAX_REPAIRS', 2),
  MIN_CONFIDENCE: getNumberVar('MIN_CONFIDENCE', 0.5),
  MIN_MARGIN: getNumberVar('MIN_MARGIN', 0.1),
  CLARIFICATION_TOP_K: getNumberVar('CLARIFICATION_TOP_K', 3),
  MIN_CONTEXT_MATCH: getNumberVar('MIN_CONTEXT_MATCH', 0.5),
  ALLOW_MODEL_INFERENCE: getEnvVar('ALLOW_MODEL_INFERENCE', 'false') === 'true',
  ACTION_CATALOG_PATH: getEnvVar('ACTION_CATALOG_PATH', path.resolve(__dirname, '../../data/actions.json')),
  CONTEXT_CATALOG_PATH: getEnvVar('CONTEXT_CATALOG_PATH', path.resolve(__dirname, '../../data/context.json')),
  LOG_LEVEL: getEnvVar('LOG_LEVEL', 'info'),
  NODE_ENV: nodeEnv,
};
