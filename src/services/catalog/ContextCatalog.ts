// src/services/catalog/ContextCatalog.ts
import { ContextVariable } from '../../models/context.model';
import { CatalogLoadError } from '../errors';

/** Read-only snapshot of the context variables available to a requester */
export class ContextCatalog {
  private readonly variables: readonly ContextVariable[];
  private readonly byName = new Map<string, ContextVariable>();

  constructor(variables: readonly ContextVariable[]) {
    const frozen: ContextVariable[] = [];
    for (const variable of variables) {
      if (this.byName.has(variable.name)) {
        throw new CatalogLoadError(`Duplicate context variable name: ${variable.name}`);
      }
      const copy = Object.freeze({ ...variable });
      this.byName.set(copy.name, copy);
      frozen.push(copy);
    }
    this.variables = Object.freeze(frozen);
  }

  static empty(): ContextCatalog {
    return new ContextCatalog([]);
  }

  get size(): number {
    return this.variables.length;
  }

  public getAll(): readonly ContextVariable[] {
    return this.variables;
  }

  public get(name: string): ContextVariable | undefined {
    return this.byName.get(name);
  }

  public names(): string[] {
    return this.variables.map((variable) => variable.name);
  }
}
