// src/services/schema/SchemaRetriever.ts
import { ParameterSchema } from '../../models/action.model';
import { ActionCatalog } from '../catalog/ActionCatalog';
import { UnknownActionError } from '../errors';

/** Looks up the parameter schema of a selected action. The catalog copy is frozen, so it is returned as is. */
export class SchemaRetriever {
  constructor(private readonly catalog: ActionCatalog) {}

  public retrieve(actionId: string): ParameterSchema {
    const action = this.catalog.get(actionId);
    if (!action) {
      throw new UnknownActionError(actionId);
    }
    return action.parameterSchema;
  }
}
