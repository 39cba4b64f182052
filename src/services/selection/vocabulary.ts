// src/services/selection/vocabulary.ts
import vocabularyData from '../../config/vocabulary.json';
import { singularize } from '../../utils/text';

export interface Vocabulary {
  operationSynonyms: readonly (readonly string[])[];
  entityTypes: readonly string[];
  stopWords: readonly string[];
}

export const DEFAULT_VOCABULARY: Vocabulary = vocabularyData;

export function operationGroupOf(token: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): number {
  return vocabulary.operationSynonyms.findIndex((group) => group.includes(token));
}

export function isEntityWord(token: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): boolean {
  return vocabulary.entityTypes.includes(singularize(token));
}

/** First word of the token's synonym group, or the token itself */
export function canonicalOperation(token: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): string {
  const group = operationGroupOf(token, vocabulary);
  return group === -1 ? token : vocabulary.operationSynonyms[group][0];
}
