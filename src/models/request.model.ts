// src/models/request.model.ts
import { LiteralValue } from './context.model';

export interface ParsedRequest {
  readonly rawText: string;
  readonly platformHint: string | null;
  readonly operationHint: string | null;
  readonly entityTypeHint: string | null;
  readonly literalParams: Readonly<Record<string, LiteralValue>>;
  readonly ambiguityFlags: readonly string[];
}

export function freezeParsedRequest(request: ParsedRequest): ParsedRequest {
  return Object.freeze({
    ...request,
    literalParams: Object.freeze({ ...request.literalParams }),
    ambiguityFlags: Object.freeze([...request.ambiguityFlags]),
  });
}
